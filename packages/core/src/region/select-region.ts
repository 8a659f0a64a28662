import { ValidationError } from '@gridtrend/utils';
import type { RegionIndices, RegionSelection } from '../types/grid.js';

const BOUND_KEYS = ['lonMin', 'lonMax', 'latMin', 'latMax'] as const;

export function assertValidBounds(bounds: RegionSelection): void {
  for (const key of BOUND_KEYS) {
    const value = bounds[key];
    if (!Number.isFinite(value)) {
      throw new ValidationError(`Region bound ${key} must be a finite number`, { bound: key, value });
    }
  }
  if (bounds.latMin > bounds.latMax) {
    throw new ValidationError(
      `Region latMin (${bounds.latMin}) is greater than latMax (${bounds.latMax})`,
      { ...bounds }
    );
  }
}

/**
 * Indices of the coordinates that fall inside inclusive bounds.
 *
 * Bounds must already be in the dataset's longitude convention. When
 * `lonMin > lonMax` the band wraps: longitudes >= lonMin or <= lonMax match.
 * A selection matching nothing is returned empty on that axis; averaging it
 * raises `EmptyRegionError`.
 */
export function selectRegion(
  longitude: ArrayLike<number>,
  latitude: ArrayLike<number>,
  bounds: RegionSelection
): RegionIndices {
  assertValidBounds(bounds);

  const wraps = bounds.lonMin > bounds.lonMax;
  const lonIndices: number[] = [];
  for (let i = 0; i < longitude.length; i++) {
    const lon = longitude[i];
    const inside = wraps
      ? lon >= bounds.lonMin || lon <= bounds.lonMax
      : lon >= bounds.lonMin && lon <= bounds.lonMax;
    if (inside) {
      lonIndices.push(i);
    }
  }

  const latIndices: number[] = [];
  for (let j = 0; j < latitude.length; j++) {
    if (latitude[j] >= bounds.latMin && latitude[j] <= bounds.latMax) {
      latIndices.push(j);
    }
  }

  return Object.freeze({ lonIndices: Object.freeze(lonIndices), latIndices: Object.freeze(latIndices) });
}
