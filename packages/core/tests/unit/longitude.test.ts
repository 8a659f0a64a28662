import { describe, it, expect } from 'vitest';
import { detectLongitudeConvention, selectRegion, toLongitudeConvention } from '../../src/index.js';

describe('detectLongitudeConvention', () => {
  it('detects 0-360 grids', () => {
    expect(detectLongitudeConvention([0, 90, 270])).toBe('0-360');
  });

  it('detects -180-180 grids', () => {
    expect(detectLongitudeConvention([-170, 0, 170])).toBe('-180-180');
  });

  it('reports grids within 0..180 as ambiguous', () => {
    expect(detectLongitudeConvention([0, 90, 180])).toBe('ambiguous');
    expect(detectLongitudeConvention([])).toBe('ambiguous');
  });
});

describe('toLongitudeConvention', () => {
  const lat = { latMin: -10, latMax: 10 };

  it('converts western longitudes to 0-360', () => {
    expect(toLongitudeConvention({ lonMin: -160, lonMax: -150, ...lat }, '0-360')).toEqual({
      lonMin: 200,
      lonMax: 210,
      ...lat,
    });
  });

  it('converts eastern longitudes above 180 to -180-180', () => {
    expect(toLongitudeConvention({ lonMin: 200, lonMax: 210, ...lat }, '-180-180')).toEqual({
      lonMin: -160,
      lonMax: -150,
      ...lat,
    });
  });

  it('turns a band across the prime meridian into a wrapped band', () => {
    const bounds = toLongitudeConvention({ lonMin: -10, lonMax: 10, ...lat }, '0-360');
    expect(bounds).toEqual({ lonMin: 350, lonMax: 10, ...lat });
    expect(selectRegion([0, 5, 180, 355], [0], bounds).lonIndices).toEqual([0, 1, 3]);
  });

  it('keeps a whole-globe band whole when converting to 0-360', () => {
    const bounds = toLongitudeConvention({ lonMin: -180, lonMax: 180, ...lat }, '0-360');
    expect(bounds).toEqual({ lonMin: 0, lonMax: 360, ...lat });
    expect(selectRegion([0, 45, 90, 135, 180, 225, 270, 315], [0], bounds).lonIndices).toEqual([
      0, 1, 2, 3, 4, 5, 6, 7,
    ]);
  });

  it('keeps a whole-globe band whole when converting to -180-180', () => {
    const bounds = toLongitudeConvention({ lonMin: 0, lonMax: 360, ...lat }, '-180-180');
    expect(bounds).toEqual({ lonMin: -180, lonMax: 180, ...lat });
    expect(selectRegion([-180, -135, -90, -45, 0, 45, 90, 135], [0], bounds).lonIndices).toEqual([
      0, 1, 2, 3, 4, 5, 6, 7,
    ]);
  });

  it('still converts a band just under 360 degrees end by end', () => {
    expect(toLongitudeConvention({ lonMin: -179, lonMax: 180, ...lat }, '0-360')).toEqual({
      lonMin: 181,
      lonMax: 180,
      ...lat,
    });
  });

  it('leaves bounds unchanged for an ambiguous target', () => {
    const bounds = { lonMin: -10, lonMax: 200, ...lat };
    expect(toLongitudeConvention(bounds, 'ambiguous')).toEqual(bounds);
  });
});
