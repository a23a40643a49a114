import { describe, expect, it } from 'vitest';
import { InvalidStateError } from '../lib/errors';
import { centroid, greatCircleDistanceDeg, pathLengthDeg, toCoordinate } from '../lib/geo';

describe('geo helpers', () => {
  it('averages points for a centroid', () => {
    expect(centroid([toCoordinate([0, 0]), toCoordinate([4, 0]), toCoordinate([4, 2]), toCoordinate([0, 2])])).toEqual({
      lng: 2,
      lat: 1
    });
  });

  it('rejects an empty point set', () => {
    expect(() => centroid([])).toThrow(InvalidStateError);
  });

  it('measures great-circle distance in degrees', () => {
    expect(greatCircleDistanceDeg({ lng: 0, lat: 0 }, { lng: 90, lat: 0 })).toBeCloseTo(90, 6);
    expect(greatCircleDistanceDeg({ lng: 10, lat: 0 }, { lng: 10, lat: 10 })).toBeCloseTo(10, 6);
    expect(greatCircleDistanceDeg({ lng: 5, lat: 5 }, { lng: 5, lat: 5 })).toBe(0);
  });

  it('sums path segments', () => {
    const path = [
      { lng: 0, lat: 0 },
      { lng: 10, lat: 0 },
      { lng: 10, lat: 10 }
    ];
    expect(pathLengthDeg(path)).toBeCloseTo(20, 6);
    expect(pathLengthDeg(path.slice(0, 1))).toBe(0);
  });
});
