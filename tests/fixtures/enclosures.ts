/**
 * Enclosure configurations for tests.
 */

import { deriveEnclosure } from '../../src/config/enclosure';
import { NAS_2BAY, NAS_4BAY } from '../../src/config/presets';

export const nas4bay = deriveEnclosure('nas-4bay', NAS_4BAY);

export const nas2bay = deriveEnclosure('nas-2bay', NAS_2BAY);

export const ALL_ENCLOSURES = [nas4bay, nas2bay];
