import { describe, expect, it } from 'vitest';
import { createLandingDetector } from '../lib/landing';

const plane = { lng: 0, lat: 0 };
const at = (lng: number) => ({ lng, lat: 0 });

describe('landing detector', () => {
  const detector = createLandingDetector();

  it('only lands on a low pass inside the radius', () => {
    expect(detector.checkLanding(plane, at(5), true)).toBe(true);
    expect(detector.checkLanding(plane, at(5), false)).toBe(false);
    expect(detector.checkLanding(plane, at(9), true)).toBe(false);
  });

  it('grades proximity', () => {
    expect(detector.getProximity(plane, at(5), true)).toBe('landing');
    expect(detector.getProximity(plane, at(5))).toBe('near');
    expect(detector.getProximity(plane, at(20))).toBe('approaching');
    expect(detector.getProximity(plane, at(40))).toBe('far');
  });

  it('accepts custom thresholds', () => {
    const tight = createLandingDetector({ landingThresholdDeg: 1, nearThresholdDeg: 2, approachingThresholdDeg: 3 });
    expect(tight.getProximity(plane, at(1.5), true)).toBe('near');
    expect(tight.getProximity(plane, at(5))).toBe('far');
  });
});
