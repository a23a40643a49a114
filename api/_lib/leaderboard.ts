import type { SupabaseClient } from '@supabase/supabase-js';
import { isClueType } from '../../src/lib/clues.js';
import { isGameRegion } from '../../src/lib/regions.js';
import { MAX_SCORE } from '../../src/lib/scoring.js';
import type { ClueType, GameRegion } from '../../src/lib/types.js';

export type ScoreRegion = GameRegion | 'daily';

export interface ApiRequest {
  method?: string;
  query?: Record<string, string | string[] | undefined>;
  body?: unknown;
}

export interface ApiResponse {
  setHeader(name: string, value: string): unknown;
  status(code: number): ApiResponse;
  json(body: unknown): unknown;
  end(): unknown;
}

export interface ScoreSubmission {
  userId: string;
  targetCode: string;
  clueType: ClueType;
  elapsedMs: number;
  score: number;
  region: ScoreRegion;
}

export type DbScore = {
  user_id: string;
  country_code: string;
  clue_type: string;
  time_ms: number;
  score: number;
  region: string;
  rounds_completed: number;
  created_at: string;
};

export interface ScoreQuery {
  region: ScoreRegion;
  /** `YYYY-MM-DD`; restricts to rows created on that UTC day. */
  date?: string;
  limit: number;
}

/** Persistence seam for the score handlers. */
export interface ScoreStore {
  insertScore(row: DbScore): Promise<void>;
  listScores(query: ScoreQuery): Promise<DbScore[]>;
}

const TABLE = 'scores';
const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

let supabaseClient: SupabaseClient | null = null;

export const required = (name: string): string => {
  const value = process.env[name];
  if (!value) throw new Error(`Missing required environment variable: ${name}`);
  return value;
};

export const getSupabase = async (): Promise<SupabaseClient> => {
  if (supabaseClient) return supabaseClient;
  const { createClient } = await import('@supabase/supabase-js');
  const url = required('SUPABASE_URL');
  const serviceRoleKey = required('SUPABASE_SERVICE_ROLE_KEY');
  supabaseClient = createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false }
  });
  return supabaseClient;
};

export const setCors = (res: ApiResponse) => {
  res.setHeader('Access-Control-Allow-Origin', process.env.LEADERBOARD_CORS_ORIGIN || '*');
  res.setHeader('Access-Control-Allow-Methods', 'GET,POST,OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
};

const isObject = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

export const parseBody = (req: ApiRequest): Record<string, unknown> => {
  if (isObject(req.body)) return req.body;
  if (typeof req.body === 'string') {
    try {
      const parsed: unknown = JSON.parse(req.body);
      return isObject(parsed) ? parsed : {};
    } catch {
      return {};
    }
  }
  return {};
};

export const firstQueryValue = (value: string | string[] | undefined) => (Array.isArray(value) ? value[0] : value);

export const parseLimit = (value: unknown, fallback = 50) => {
  const numeric = Number(value);
  if (value === undefined || !Number.isFinite(numeric)) return fallback;
  return Math.max(1, Math.min(100, Math.floor(numeric)));
};

export const parseRegion = (value: unknown): ScoreRegion | undefined =>
  value === 'daily' || isGameRegion(value) ? value : undefined;

/** A real calendar day in `YYYY-MM-DD` form; days that would roll over (02-31) are rejected. */
export const parseDay = (value: unknown): string | undefined => {
  if (typeof value !== 'string' || !DAY_PATTERN.test(value)) return undefined;
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value ? value : undefined;
};

/** Returns the submission, or the reason it was rejected. */
export function parseSubmission(body: Record<string, unknown>): ScoreSubmission | string {
  const { userId, targetCode, clueType, elapsedMs, score, region } = body;
  if (typeof userId !== 'string' || !userId.trim()) return 'userId is required';
  if (typeof targetCode !== 'string' || !targetCode.trim()) return 'targetCode is required';
  if (!isClueType(clueType)) return 'clueType is not a known clue type';
  if (typeof elapsedMs !== 'number' || !Number.isFinite(elapsedMs) || elapsedMs < 0) {
    return 'elapsedMs must be a non-negative number';
  }
  if (typeof score !== 'number' || !Number.isInteger(score) || score < 0 || score > MAX_SCORE) {
    return `score must be an integer between 0 and ${MAX_SCORE}`;
  }
  const parsedRegion = parseRegion(region);
  if (!parsedRegion) return 'region must be daily or a game region';
  return {
    userId: userId.trim(),
    targetCode: targetCode.trim().toUpperCase(),
    clueType,
    elapsedMs: Math.round(elapsedMs),
    score,
    region: parsedRegion
  };
}

export const toDbScore = (submission: ScoreSubmission, now: Date): DbScore => ({
  user_id: submission.userId,
  country_code: submission.targetCode,
  clue_type: submission.clueType,
  time_ms: submission.elapsedMs,
  score: submission.score,
  region: submission.region,
  rounds_completed: 1,
  created_at: now.toISOString()
});

export const toApiRow = (row: DbScore, rank: number) => ({
  rank,
  userId: row.user_id,
  score: row.score,
  timeMs: row.time_ms,
  createdAt: row.created_at
});

const nextDay = (day: string) => {
  const date = new Date(`${day}T00:00:00Z`);
  date.setUTCDate(date.getUTCDate() + 1);
  return date.toISOString();
};

export function createSupabaseScoreStore(supabase: SupabaseClient): ScoreStore {
  return {
    insertScore: async (row) => {
      const { error } = await supabase.from(TABLE).insert(row);
      if (error) throw error;
    },
    listScores: async ({ region, date, limit }) => {
      let query = supabase
        .from(TABLE)
        .select('user_id,country_code,clue_type,time_ms,score,region,rounds_completed,created_at')
        .eq('region', region);
      if (date) query = query.gte('created_at', `${date}T00:00:00.000Z`).lt('created_at', nextDay(date));
      const { data, error } = await query
        .order('score', { ascending: false })
        .order('time_ms', { ascending: true })
        .order('created_at', { ascending: true })
        .limit(limit)
        .returns<DbScore[]>();
      if (error) throw error;
      return data ?? [];
    }
  };
}

export const getScoreStore = async (): Promise<ScoreStore> => createSupabaseScoreStore(await getSupabase());
