import { describe, expect, it } from 'vitest';
import { createSeededRandom } from '../lib/random';
import { createTestDataSource } from './fixtures';

describe('round data source', () => {
  const source = createTestDataSource();

  it('draws targets from the playable pool', () => {
    expect(source.getRandomTarget({ next: () => 0 }).code).toBe('FR');
    expect(source.getTargetsFiltered({ minRating: 0.9 }).map((target) => target.code)).toEqual(['NR']);
  });

  it('builds clues for a target', () => {
    const clue = source.getClueFor('BR', { allowedTypes: new Set(['capital']), random: createSeededRandom(1) });
    expect(clue).toEqual({ type: 'capital', targetCode: 'BR', capitalName: 'Brasilia' });
  });

  it('exposes ratings and capitals', () => {
    expect(source.getDifficultyRating('NR')).toBe(0.95);
    expect(source.getCapital('NR')?.location).toEqual({ lng: 166.92, lat: -0.55 });
  });

  it('builds regional clues for the area itself', () => {
    const [area] = source.getAreas('caribbean');
    expect(source.getRegionalClue('caribbean', area, createSeededRandom(4)).targetCode).toBe(area.code);
  });
});
