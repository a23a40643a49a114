import { afterEach, describe, expect, it, vi } from 'vitest';
import { parseDay, parseLimit, parseSubmission } from '../../api/_lib/leaderboard';
import type { ApiResponse, DbScore, ScoreStore } from '../../api/_lib/leaderboard';
import healthHandler from '../../api/health';
import { createLeaderboardHandler } from '../../api/leaderboard';
import { createSubmitHandler } from '../../api/scores/submit';

class FakeResponse implements ApiResponse {
  statusCode = 0;
  body: unknown = undefined;
  ended = false;
  readonly headers: Record<string, string> = {};

  setHeader(name: string, value: string) {
    this.headers[name] = value;
    return this;
  }

  status(code: number) {
    this.statusCode = code;
    return this;
  }

  json(body: unknown) {
    this.body = body;
    return this;
  }

  end() {
    this.ended = true;
    return this;
  }
}

const scoreRow = (userId: string, score: number, timeMs: number, createdAt: string, region = 'daily'): DbScore => ({
  user_id: userId,
  country_code: 'FR',
  clue_type: 'flag',
  time_ms: timeMs,
  score,
  region,
  rounds_completed: 1,
  created_at: createdAt
});

const compareScores = (a: DbScore, b: DbScore) =>
  b.score - a.score || a.time_ms - b.time_ms || a.created_at.localeCompare(b.created_at);

const memoryStore = (rows: DbScore[] = []) => {
  const store: ScoreStore = {
    insertScore: async (row) => {
      rows.push(row);
    },
    listScores: async ({ region, date, limit }) =>
      rows
        .filter((row) => row.region === region && (!date || row.created_at.startsWith(date)))
        .sort(compareScores)
        .slice(0, limit)
  };
  return { rows, store };
};

const failingStore: ScoreStore = {
  insertScore: async () => {
    throw new Error('database unavailable');
  },
  listScores: async () => {
    throw new Error('database unavailable');
  }
};

const validBody = {
  userId: 'player-1',
  targetCode: 'fr',
  clueType: 'flag',
  elapsedMs: 45000,
  score: 5500,
  region: 'daily'
};

const now = () => new Date('2026-03-07T12:00:00.000Z');

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('submission parsing', () => {
  it('rejects out-of-range and unknown values', () => {
    expect(parseSubmission({ ...validBody, score: 10001 })).toBe('score must be an integer between 0 and 10000');
    expect(parseSubmission({ ...validBody, score: 12.5 })).toBe('score must be an integer between 0 and 10000');
    expect(parseSubmission({ ...validBody, elapsedMs: -1 })).toBe('elapsedMs must be a non-negative number');
    expect(parseSubmission({ ...validBody, clueType: 'smell' })).toBe('clueType is not a known clue type');
    expect(parseSubmission({ ...validBody, region: 'moon' })).toBe('region must be daily or a game region');
    expect(parseSubmission({ ...validBody, userId: ' ' })).toBe('userId is required');
  });

  it('clamps leaderboard limits', () => {
    expect(parseLimit(undefined)).toBe(50);
    expect(parseLimit('abc')).toBe(50);
    expect(parseLimit('0')).toBe(1);
    expect(parseLimit('500')).toBe(100);
    expect(parseLimit('12.9')).toBe(12);
  });

  it('accepts only real calendar days', () => {
    expect(parseDay('2026-02-28')).toBe('2026-02-28');
    expect(parseDay('2024-02-29')).toBe('2024-02-29');
    expect(parseDay('2026-02-29')).toBeUndefined();
    expect(parseDay('2026-02-31')).toBeUndefined();
    expect(parseDay('2026-13-01')).toBeUndefined();
    expect(parseDay(20260228)).toBeUndefined();
  });
});

describe('score submit handler', () => {
  it('answers preflight requests with CORS headers', async () => {
    vi.stubEnv('LEADERBOARD_CORS_ORIGIN', 'https://flit.test');
    const res = new FakeResponse();
    await createSubmitHandler(async () => memoryStore().store)({ method: 'OPTIONS' }, res);
    expect(res.statusCode).toBe(204);
    expect(res.ended).toBe(true);
    expect(res.headers['Access-Control-Allow-Origin']).toBe('https://flit.test');
  });

  it('only accepts POST', async () => {
    const res = new FakeResponse();
    await createSubmitHandler(async () => memoryStore().store)({ method: 'GET' }, res);
    expect(res.statusCode).toBe(405);
    expect(res.body).toEqual({ error: 'method not allowed' });
  });

  it('rejects invalid payloads', async () => {
    const { rows, store } = memoryStore();
    const res = new FakeResponse();
    await createSubmitHandler(async () => store)({ method: 'POST', body: { ...validBody, score: -5 } }, res);
    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: 'score must be an integer between 0 and 10000' });
    expect(rows).toEqual([]);
  });

  it('stores a valid round', async () => {
    const { rows, store } = memoryStore();
    const res = new FakeResponse();
    await createSubmitHandler(async () => store, now)({ method: 'POST', body: JSON.stringify(validBody) }, res);
    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({ ok: true });
    expect(rows).toEqual([scoreRow('player-1', 5500, 45000, '2026-03-07T12:00:00.000Z')]);
  });

  it('reports storage failures', async () => {
    const res = new FakeResponse();
    await createSubmitHandler(async () => failingStore)({ method: 'POST', body: validBody }, res);
    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ error: 'database unavailable' });
  });
});

describe('leaderboard handler', () => {
  const seeded = () =>
    memoryStore([
      scoreRow('slow', 8000, 90000, '2026-03-07T09:00:00.000Z'),
      scoreRow('best', 9000, 60000, '2026-03-07T10:00:00.000Z'),
      scoreRow('fast', 8000, 30000, '2026-03-07T11:00:00.000Z'),
      scoreRow('yesterday', 9900, 10000, '2026-03-06T11:00:00.000Z'),
      scoreRow('world', 9999, 10000, '2026-03-07T11:00:00.000Z', 'world')
    ]).store;

  it('ranks by score, then time', async () => {
    const res = new FakeResponse();
    await createLeaderboardHandler(async () => seeded())({ method: 'GET', query: { date: '2026-03-07' } }, res);
    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({
      rows: [
        { rank: 1, userId: 'best', score: 9000, timeMs: 60000, createdAt: '2026-03-07T10:00:00.000Z' },
        { rank: 2, userId: 'fast', score: 8000, timeMs: 30000, createdAt: '2026-03-07T11:00:00.000Z' },
        { rank: 3, userId: 'slow', score: 8000, timeMs: 90000, createdAt: '2026-03-07T09:00:00.000Z' }
      ]
    });
  });

  it('applies region and limit', async () => {
    const res = new FakeResponse();
    await createLeaderboardHandler(async () => seeded())({ method: 'GET', query: { region: 'daily', limit: '1' } }, res);
    expect(res.body).toEqual({
      rows: [{ rank: 1, userId: 'yesterday', score: 9900, timeMs: 10000, createdAt: '2026-03-06T11:00:00.000Z' }]
    });
  });

  it('rejects unknown regions and malformed dates', async () => {
    const badRegion = new FakeResponse();
    await createLeaderboardHandler(async () => seeded())({ method: 'GET', query: { region: 'moon' } }, badRegion);
    expect(badRegion.statusCode).toBe(400);

    const badDate = new FakeResponse();
    await createLeaderboardHandler(async () => seeded())({ method: 'GET', query: { date: '07/03/2026' } }, badDate);
    expect(badDate.statusCode).toBe(400);
    expect(badDate.body).toEqual({ error: 'date must be YYYY-MM-DD' });

    const rolledDate = new FakeResponse();
    await createLeaderboardHandler(async () => seeded())({ method: 'GET', query: { date: '2026-02-31' } }, rolledDate);
    expect(rolledDate.statusCode).toBe(400);
  });

  it('reports storage failures', async () => {
    const res = new FakeResponse();
    await createLeaderboardHandler(async () => failingStore)({ method: 'GET' }, res);
    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ error: 'database unavailable' });
  });
});

describe('health handler', () => {
  it('reports the storage backend', async () => {
    const res = new FakeResponse();
    await healthHandler({ method: 'GET' }, res);
    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({ ok: true, storage: 'supabase' });
  });
});
