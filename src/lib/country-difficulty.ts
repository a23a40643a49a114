import type { ClueType, GameDifficulty, RatingFilter } from './types';

// 0.0 = universally recognised, 1.0 = extremely obscure.
export const DEFAULT_COUNTRY_RATING = 0.55;

export const EASY_THRESHOLD = 0.35;
export const HARD_MINIMUM = 0.45;

// Ordered easiest to hardest: borders < flag < capital < stats < outline.
export const CLUE_TYPE_DIFFICULTY: Partial<Record<ClueType, number>> = {
  borders: 0.1,
  flag: 0.3,
  capital: 0.5,
  stats: 0.7,
  outline: 0.9
};

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

const DIFFICULTY_BANDS: Array<{ max: number; label: string }> = [
  { max: 0.15, label: 'Clear Skies' },
  { max: 0.3, label: 'Tailwind' },
  { max: 0.45, label: 'Fair Weather' },
  { max: 0.6, label: 'Crosswinds' },
  { max: 0.75, label: 'Turbulence' },
  { max: 0.9, label: 'Storm Front' }
];

export const difficultyBandIndex = (fraction: number) => {
  const index = DIFFICULTY_BANDS.findIndex((band) => fraction <= band.max);
  return index === -1 ? DIFFICULTY_BANDS.length : index;
};

export const difficultyLabel = (fraction: number) => DIFFICULTY_BANDS[difficultyBandIndex(fraction)]?.label ?? 'Cat-5 Headwind';

export const clueTypeWeight = (clueType: ClueType) => CLUE_TYPE_DIFFICULTY[clueType] ?? 0.5;

/** `(clueWeight + countryRating) / 2`, both in [0, 1]. */
export const roundDifficulty = (clueType: ClueType, countryRating: number) =>
  (clueTypeWeight(clueType) + clamp(Number.isNaN(countryRating) ? DEFAULT_COUNTRY_RATING : countryRating, 0, 1)) / 2;

export function dailyDifficultyPercent(rounds: Array<{ clueType: ClueType; countryRating: number }>): number {
  if (rounds.length === 0) return 50;
  const sum = rounds.reduce((total, round) => total + roundDifficulty(round.clueType, round.countryRating), 0);
  return clamp(Math.round((sum / rounds.length) * 100), 0, 100);
}

export const ratingRangeForTier = (tier: GameDifficulty): RatingFilter => {
  if (tier === 'easy') return { maxRating: EASY_THRESHOLD };
  if (tier === 'hard') return { minRating: HARD_MINIMUM };
  return {};
};

export const parseDifficulty = (value: unknown): GameDifficulty | undefined =>
  value === 'easy' || value === 'normal' || value === 'hard' ? value : undefined;
