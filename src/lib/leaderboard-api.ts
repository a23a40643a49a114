import { loadConfig } from './config';
import { ApiError } from './errors';
import type { RoundSubmission } from './game-session';
import type { GameRegion } from './types';

export interface LeaderboardRow {
  rank: number;
  userId: string;
  score: number;
  timeMs: number;
  createdAt: string;
}

export interface SubmitScoreRequest extends RoundSubmission {
  userId: string;
  region: GameRegion | 'daily';
}

export interface LeaderboardQuery {
  region?: GameRegion | 'daily';
  /** `YYYY-MM-DD`, daily boards only. */
  date?: string;
  limit?: number;
}

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface LeaderboardClientOptions {
  baseUrl?: string;
  fetch?: FetchLike;
}

export function createLeaderboardClient(options: LeaderboardClientOptions = {}) {
  const baseUrl = (options.baseUrl ?? loadConfig().apiBaseUrl).replace(/\/+$/, '');
  const doFetch: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));

  const withBaseUrl = (path: string) => (baseUrl ? `${baseUrl}${path}` : path);

  const jsonRequest = async <T,>(path: string, init?: RequestInit): Promise<T> => {
    const response = await doFetch(withBaseUrl(path), {
      ...init,
      headers: {
        'Content-Type': 'application/json',
        ...(init?.headers ?? {})
      }
    });

    if (!response.ok) {
      const text = await response.text();
      throw new ApiError(text || `Request failed (${response.status})`, response.status);
    }

    return response.json() as Promise<T>;
  };

  return {
    submitScore: async (payload: SubmitScoreRequest): Promise<void> => {
      await jsonRequest<{ ok: boolean }>('/api/scores/submit', {
        method: 'POST',
        body: JSON.stringify(payload)
      });
    },
    fetchLeaderboard: async ({ region = 'daily', date, limit = 50 }: LeaderboardQuery = {}): Promise<LeaderboardRow[]> => {
      const params = new URLSearchParams({ region, limit: String(limit) });
      if (date) params.set('date', date);
      const data = await jsonRequest<{ rows: LeaderboardRow[] }>(`/api/leaderboard?${params.toString()}`);
      return data.rows;
    },
    fetchHealth: async (): Promise<boolean> => {
      const data = await jsonRequest<{ ok: boolean }>('/api/health');
      return Boolean(data.ok);
    }
  };
}

export type LeaderboardClient = ReturnType<typeof createLeaderboardClient>;
