import { DEFAULT_COUNTRY_RATING } from './country-difficulty';

export const BASE_SCORE = 10000;
export const MAX_SCORE = 10000;
export const MAX_FUEL_PENALTY = 5000;

/**
 * Per-tier hint penalties, escalating:
 * new clue 500, reveal country 1000, wayline 1500, auto-navigate 2500.
 * All four together cost 5500.
 */
export const HINT_TIER_PENALTIES = [500, 1000, 1500, 2500] as const;

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

/** Sums the first `hintsUsed` tiers; counts past the last tier add nothing. */
export function hintPenalty(hintsUsed: number): number {
  let penalty = 0;
  for (let tier = 0; tier < hintsUsed && tier < HINT_TIER_PENALTIES.length; tier += 1) {
    penalty += HINT_TIER_PENALTIES[tier];
  }
  return penalty;
}

/** Clamps into [0, 1]; NaN reads as an empty tank. */
export const clampFuelFraction = (fuelFraction: number) => (Number.isNaN(fuelFraction) ? 0 : clamp(fuelFraction, 0, 1));

export const fuelPenalty = (fuelFraction: number) => Math.round((1 - clampFuelFraction(fuelFraction)) * MAX_FUEL_PENALTY);

export const computeRawScore = (hintsUsed: number, fuelFraction: number) =>
  clamp(BASE_SCORE - hintPenalty(hintsUsed) - fuelPenalty(fuelFraction), 0, MAX_SCORE);

/** Whole hint count: fractions floor, negatives and NaN read as none. */
export const normalizeHintsUsed = (hintsUsed: number) => (Number.isNaN(hintsUsed) ? 0 : Math.max(0, Math.floor(hintsUsed)));

/**
 * `0.5 + 0.5 × rating`. Easy targets compress the score toward half,
 * obscure ones keep nearly all of it. A NaN rating reads as the default rating.
 */
export const difficultyMultiplier = (rating: number) =>
  0.5 + 0.5 * clamp(Number.isNaN(rating) ? DEFAULT_COUNTRY_RATING : rating, 0, 1);

export const computeScore = (rawScore: number, rating: number) =>
  clamp(Math.round(rawScore * difficultyMultiplier(rating)), 0, MAX_SCORE);
