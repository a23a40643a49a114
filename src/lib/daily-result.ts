import { DataError } from './errors';

export interface DailyRoundResult {
  /** Hint tiers used this round (0-4). */
  hintsUsed: number;
  /** False when fuel ran out before the target was found. */
  completed: boolean;
  timeMs: number;
  score: number;
}

export interface DailyResult {
  /** `YYYY-MM-DD` */
  date: string;
  /** Played rounds only; the rest are inferred from `totalRounds`. */
  rounds: DailyRoundResult[];
  totalScore: number;
  totalTimeMs: number;
  totalRounds: number;
  theme: string;
}

const RED = '\u{1F534}';
const GREEN = '\u{1F7E2}';
const ORANGE = '\u{1F7E0}';
const YELLOW = '\u{1F7E1}';

export const DEFAULT_DAILY_ROUNDS = 5;

export function roundEmoji(round: DailyRoundResult): string {
  if (!round.completed) return RED;
  if (round.hintsUsed === 0) return GREEN;
  if (round.hintsUsed === 1) return ORANGE;
  if (round.hintsUsed <= 3) return YELLOW;
  return ORANGE;
}

export const formatScore = (score: number) => String(Math.trunc(score)).replace(/\B(?=(\d{3})+(?!\d))/g, ',');

export function formatTime(totalMs: number): string {
  const totalSeconds = Math.floor(totalMs / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m${String(seconds).padStart(2, '0')}s` : `${seconds}s`;
}

export const emojiRow = (result: DailyResult) =>
  Array.from({ length: result.totalRounds }, (_, index) => {
    const round = result.rounds[index];
    return round ? roundEmoji(round) : RED;
  }).join('');

export const toShareText = (result: DailyResult) =>
  [
    '     \u{1F6EB} \u{1F30D} \u{1F6EC}',
    'Flit daily challenge!',
    emojiRow(result),
    `Score: ${formatScore(result.totalScore)} pts`,
    `Time: ${formatTime(result.totalTimeMs)}`
  ].join('\n');

export const buildDailyResult = (
  date: string,
  theme: string,
  rounds: DailyRoundResult[],
  totalRounds = DEFAULT_DAILY_ROUNDS
): DailyResult => ({
  date,
  theme,
  rounds: [...rounds],
  totalScore: rounds.reduce((sum, round) => sum + round.score, 0),
  totalTimeMs: rounds.reduce((sum, round) => sum + round.timeMs, 0),
  totalRounds
});

const toSafeInt = (value: unknown, fallback = 0) => {
  const numeric = Number(value);
  if (!Number.isFinite(numeric)) return fallback;
  return Math.max(0, Math.floor(numeric));
};

const isObject = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

export const dailyResultToJson = (result: DailyResult) => ({
  date: result.date,
  rounds: result.rounds.map((round) => ({
    hints_used: round.hintsUsed,
    completed: round.completed,
    time_ms: round.timeMs,
    score: round.score
  })),
  total_score: result.totalScore,
  total_time_ms: result.totalTimeMs,
  total_rounds: result.totalRounds,
  theme: result.theme
});

const roundFromJson = (json: unknown): DailyRoundResult => {
  const row: Record<string, unknown> = isObject(json) ? json : {};
  return {
    hintsUsed: toSafeInt(row.hints_used),
    completed: row.completed === true,
    timeMs: toSafeInt(row.time_ms),
    score: toSafeInt(row.score)
  };
};

export function dailyResultFromJson(json: unknown): DailyResult {
  if (!isObject(json) || typeof json.date !== 'string' || !Array.isArray(json.rounds)) {
    throw new DataError('daily result needs a date and a list of rounds');
  }
  return {
    date: json.date,
    rounds: json.rounds.map(roundFromJson),
    totalScore: toSafeInt(json.total_score),
    totalTimeMs: toSafeInt(json.total_time_ms),
    totalRounds: toSafeInt(json.total_rounds, DEFAULT_DAILY_ROUNDS),
    theme: typeof json.theme === 'string' ? json.theme : ''
  };
}
