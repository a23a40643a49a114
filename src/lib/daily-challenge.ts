import { WORLD_CLUE_TYPES } from './clues';
import { DataError } from './errors';
import { createSeededRandom, randomInt, shuffle } from './random';
import type { Clock, RandomSource } from './types';

interface DailyTheme {
  title: string;
  description: string;
  /** Fixed clue types, or how many to draw from the seed. */
  clueTypes: readonly string[] | number;
  coinReward: number;
}

export interface DailyChallenge {
  /** UTC calendar day, `YYYY-MM-DD`. */
  date: string;
  title: string;
  description: string;
  enabledClueTypes: string[];
  coinReward: number;
  bonusCoinReward: number;
  seed: number;
}

export const DAILY_THEMES: readonly DailyTheme[] = [
  { title: 'All Clues', description: 'Every clue type is in play -- use them all!', clueTypes: WORLD_CLUE_TYPES, coinReward: 50 },
  { title: 'Flag Frenzy', description: 'Flags and flags alone. Do you know your colours?', clueTypes: ['flag'], coinReward: 75 },
  { title: 'Capital Sprint', description: 'Name the nation from its capital city.', clueTypes: ['capital'], coinReward: 75 },
  { title: 'Border Patrol', description: 'Only neighbouring-country clues today.', clueTypes: ['borders'], coinReward: 75 },
  { title: 'Stats Master', description: 'Population, area, GDP -- crunch the numbers.', clueTypes: ['stats'], coinReward: 75 },
  { title: 'Outline Challenge', description: 'Silhouettes only. Can you spot the shape?', clueTypes: ['outline'], coinReward: 75 },
  { title: 'Duo Mix', description: 'Two random clue types -- adapt or lose!', clueTypes: 2, coinReward: 60 },
  { title: 'Triple Threat', description: 'Three clue types thrown into the mix.', clueTypes: 3, coinReward: 55 }
];

const BONUS_MULTIPLIER = 3;

const dayKey = (date: Date) => date.toISOString().slice(0, 10);

/** `yyyy * 10000 + mm * 100 + dd` of the UTC day. */
export const dailySeed = (date: Date) => date.getUTCFullYear() * 10000 + (date.getUTCMonth() + 1) * 100 + date.getUTCDate();

const resolveClueTypes = (theme: DailyTheme, random: RandomSource) =>
  typeof theme.clueTypes === 'number' ? shuffle(random, WORLD_CLUE_TYPES).slice(0, theme.clueTypes) : [...theme.clueTypes];

export function dailyChallengeForDate(date: Date): DailyChallenge {
  const seed = dailySeed(date);
  const random = createSeededRandom(seed);
  const theme = DAILY_THEMES[randomInt(random, DAILY_THEMES.length)];
  return {
    date: dayKey(date),
    title: theme.title,
    description: theme.description,
    enabledClueTypes: resolveClueTypes(theme, random),
    coinReward: theme.coinReward,
    bonusCoinReward: theme.coinReward * BONUS_MULTIPLIER,
    seed
  };
}

export const dailyChallengeForToday = (clock: Clock = () => new Date()) => dailyChallengeForDate(clock());

export const dailyChallengeToJson = (challenge: DailyChallenge) => ({
  date: challenge.date,
  title: challenge.title,
  description: challenge.description,
  enabled_clue_types: [...challenge.enabledClueTypes],
  coin_reward: challenge.coinReward,
  bonus_coin_reward: challenge.bonusCoinReward,
  seed: challenge.seed
});

export function dailyChallengeFromJson(json: unknown): DailyChallenge {
  if (typeof json !== 'object' || json === null) throw new DataError('daily challenge must be an object');
  const row: Record<string, unknown> = { ...json };
  const clueTypes = row.enabled_clue_types;
  if (
    typeof row.date !== 'string' ||
    typeof row.title !== 'string' ||
    typeof row.seed !== 'number' ||
    typeof row.coin_reward !== 'number' ||
    !Array.isArray(clueTypes)
  ) {
    throw new DataError('daily challenge is missing required fields');
  }
  return {
    date: row.date.slice(0, 10),
    title: row.title,
    description: typeof row.description === 'string' ? row.description : '',
    enabledClueTypes: clueTypes.filter((type): type is string => typeof type === 'string'),
    coinReward: row.coin_reward,
    bonusCoinReward: typeof row.bonus_coin_reward === 'number' ? row.bonus_coin_reward : row.coin_reward * BONUS_MULTIPLIER,
    seed: row.seed
  };
}
