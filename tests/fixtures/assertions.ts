/**
 * Custom Test Assertions
 *
 * Helper functions for common test assertions.
 */

import { expect } from 'vitest';
import type { Point, Rect2D } from '../../src/types';
import { checkPathValidity, type PathCheckResult, type PathSubject } from '../../src/validators/PathChecker';

/**
 * Tolerance for floating point comparisons (mm)
 */
export const TOLERANCE = 0.01;

const DIGITS = Math.abs(Math.log10(TOLERANCE));

/**
 * Assert that every outline passes the path checker with no warnings
 */
export function expectValidOutlines(subjects: PathSubject[]): PathCheckResult {
  const result = checkPathValidity(subjects);
  if (!result.valid || result.warnings.length > 0) {
    console.error('Outline validation failed:');
    [...result.errors, ...result.warnings].forEach((e) => {
      console.error(`  [${e.rule}] ${e.message}`);
    });
  }
  expect(result.valid).toBe(true);
  expect(result.warnings).toHaveLength(0);
  return result;
}

export function expectPointClose(actual: Point, expected: Point, digits: number = DIGITS): void {
  expect(actual.x).toBeCloseTo(expected.x, digits);
  expect(actual.y).toBeCloseTo(expected.y, digits);
}

export function expectRectClose(actual: Rect2D, expected: Rect2D, digits: number = DIGITS): void {
  expect(actual.minX).toBeCloseTo(expected.minX, digits);
  expect(actual.minY).toBeCloseTo(expected.minY, digits);
  expect(actual.maxX).toBeCloseTo(expected.maxX, digits);
  expect(actual.maxY).toBeCloseTo(expected.maxY, digits);
}
