/**
 * Error types raised by the geometry pipeline.
 *
 * All of them are programming or input errors: callers are expected to fix
 * the input, so nothing here is retried.
 */

/** Invalid geometry input: non-positive dimensions, degenerate edges, bad transforms */
export class GeometryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GeometryError';
  }
}

/** A document has no cut geometry, so it has no footprint to place */
export class EmptyGeometryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmptyGeometryError';
  }
}

/** A parameter override file is malformed */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function assertFiniteNumber(value: unknown, field: string): asserts value is number {
  if (typeof value !== 'number' || !isFinite(value)) {
    throw new GeometryError(`${field} must be a finite number, got ${String(value)}`);
  }
}

export function assertPositive(value: unknown, field: string): asserts value is number {
  assertFiniteNumber(value, field);
  if (value <= 0) {
    throw new GeometryError(`${field} must be positive, got ${value}`);
  }
}

export function assertNonNegative(value: unknown, field: string): asserts value is number {
  assertFiniteNumber(value, field);
  if (value < 0) {
    throw new GeometryError(`${field} must not be negative, got ${value}`);
  }
}
