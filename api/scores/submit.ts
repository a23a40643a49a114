import {
  getScoreStore,
  parseBody,
  parseSubmission,
  setCors,
  toDbScore
} from '../_lib/leaderboard.js';
import type { ApiRequest, ApiResponse, ScoreStore } from '../_lib/leaderboard.js';
import { errorMessage } from '../../src/lib/errors.js';
import { gameLog } from '../../src/lib/game-log.js';

export const config = { runtime: 'nodejs' };

export function createSubmitHandler(getStore: () => Promise<ScoreStore>, now: () => Date = () => new Date()) {
  return async function handler(req: ApiRequest, res: ApiResponse) {
    setCors(res);
    if (req.method === 'OPTIONS') return res.status(204).end();
    if (req.method !== 'POST') return res.status(405).json({ error: 'method not allowed' });

    const submission = parseSubmission(parseBody(req));
    if (typeof submission === 'string') return res.status(400).json({ error: submission });

    try {
      const store = await getStore();
      await store.insertScore(toDbScore(submission, now()));
      return res.status(200).json({ ok: true });
    } catch (error) {
      gameLog.error('api', 'score submit failed', error, { region: submission.region });
      return res.status(500).json({ error: errorMessage(error, 'score submit failed') });
    }
  };
}

export default createSubmitHandler(getScoreStore);
