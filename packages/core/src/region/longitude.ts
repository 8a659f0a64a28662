/**
 * Longitude conventions
 *
 * A dataset stores longitude either as 0..360 or as -180..180. Bounds given
 * in the other convention select nothing (or the wrong band) without any
 * error, so the convention is made explicit here instead of assumed.
 */

import type { LongitudeConvention, RegionSelection } from '../types/grid.js';

/**
 * Infer the convention from coordinate values. Grids that only cover
 * 0..180 read the same in both conventions and are reported as `ambiguous`.
 */
export function detectLongitudeConvention(longitude: ArrayLike<number>): LongitudeConvention {
  let hasNegative = false;
  let hasAbove180 = false;
  for (let i = 0; i < longitude.length; i++) {
    if (longitude[i] < 0) hasNegative = true;
    if (longitude[i] > 180) hasAbove180 = true;
  }
  if (hasAbove180) return '0-360';
  if (hasNegative) return '-180-180';
  return 'ambiguous';
}

function convertLongitude(value: number, target: LongitudeConvention): number {
  if (target === '0-360' && value < 0) {
    return value + 360;
  }
  if (target === '-180-180' && value > 180) {
    return value - 360;
  }
  return value;
}

const FULL_RANGE: Record<Exclude<LongitudeConvention, 'ambiguous'>, { lonMin: number; lonMax: number }> = {
  '0-360': { lonMin: 0, lonMax: 360 },
  '-180-180': { lonMin: -180, lonMax: 180 },
};

/**
 * Express bounds in the target convention. A band that straddles the seam
 * after conversion comes back with `lonMin > lonMax`, which region
 * selection treats as a wrapped band. A band 360 degrees wide or more
 * becomes the target's full range; converting its ends one by one would
 * collapse it onto a single meridian.
 */
export function toLongitudeConvention(
  bounds: RegionSelection,
  target: LongitudeConvention
): RegionSelection {
  if (target !== 'ambiguous' && bounds.lonMax - bounds.lonMin >= 360) {
    return { ...FULL_RANGE[target], latMin: bounds.latMin, latMax: bounds.latMax };
  }
  return {
    lonMin: convertLongitude(bounds.lonMin, target),
    lonMax: convertLongitude(bounds.lonMax, target),
    latMin: bounds.latMin,
    latMax: bounds.latMax,
  };
}
