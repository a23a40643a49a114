import {
  firstQueryValue,
  getScoreStore,
  parseDay,
  parseLimit,
  parseRegion,
  setCors,
  toApiRow
} from './_lib/leaderboard.js';
import type { ApiRequest, ApiResponse, ScoreStore } from './_lib/leaderboard.js';
import { errorMessage } from '../src/lib/errors.js';
import { gameLog } from '../src/lib/game-log.js';

export const config = { runtime: 'nodejs' };

export function createLeaderboardHandler(getStore: () => Promise<ScoreStore>) {
  return async function handler(req: ApiRequest, res: ApiResponse) {
    setCors(res);
    if (req.method === 'OPTIONS') return res.status(204).end();
    if (req.method !== 'GET') return res.status(405).json({ error: 'method not allowed' });

    const rawRegion = firstQueryValue(req.query?.region);
    const region = rawRegion === undefined ? 'daily' : parseRegion(rawRegion);
    if (!region) return res.status(400).json({ error: 'unknown region' });

    const rawDate = firstQueryValue(req.query?.date);
    const date = rawDate === undefined ? undefined : parseDay(rawDate);
    if (rawDate !== undefined && !date) return res.status(400).json({ error: 'date must be YYYY-MM-DD' });

    const limit = parseLimit(firstQueryValue(req.query?.limit), 50);

    try {
      const store = await getStore();
      const scores = await store.listScores({ region, date, limit });
      const rows = scores.map((row, index) => toApiRow(row, index + 1));
      return res.status(200).json({ rows });
    } catch (error) {
      gameLog.error('api', 'leaderboard fetch failed', error, { region });
      return res.status(500).json({ error: errorMessage(error, 'leaderboard fetch failed') });
    }
  };
}

export default createLeaderboardHandler(getScoreStore);
