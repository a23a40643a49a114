import { greatCircleDistanceDeg } from './geo';
import type { Coordinate } from './types';

export type LandingProximity = 'far' | 'approaching' | 'near' | 'landing';

export interface LandingThresholds {
  /** Max great-circle distance (degrees) that counts as a landing. */
  landingThresholdDeg?: number;
  nearThresholdDeg?: number;
  approachingThresholdDeg?: number;
}

export interface LandingDetector {
  checkLanding(plane: Coordinate, target: Coordinate, isLowAltitude: boolean): boolean;
  getProximity(plane: Coordinate, target: Coordinate, isLowAltitude?: boolean): LandingProximity;
}

export function createLandingDetector({
  landingThresholdDeg = 8,
  nearThresholdDeg = 15,
  approachingThresholdDeg = 30
}: LandingThresholds = {}): LandingDetector {
  return {
    checkLanding: (plane, target, isLowAltitude) =>
      isLowAltitude && greatCircleDistanceDeg(plane, target) <= landingThresholdDeg,
    getProximity: (plane, target, isLowAltitude = false) => {
      const distance = greatCircleDistanceDeg(plane, target);
      // Only a low pass inside the landing radius counts as landing.
      if (distance <= landingThresholdDeg && isLowAltitude) return 'landing';
      if (distance <= nearThresholdDeg) return 'near';
      if (distance <= approachingThresholdDeg) return 'approaching';
      return 'far';
    }
  };
}
