import { afterEach, describe, expect, it, vi } from 'vitest';
import { GameModeController } from '../lib/game-mode';
import { createSeededRandom } from '../lib/random';
import { createTestDataSource, fixedClock } from './fixtures';

const dataSource = createTestDataSource();

describe('game mode controller', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reads the default difficulty from the environment', () => {
    vi.stubEnv('FLIT_DEFAULT_DIFFICULTY', 'hard');
    const controller = new GameModeController({ random: createSeededRandom(8), dataSource });
    expect(controller.difficulty).toBe('hard');
    expect(['NR', 'XX']).toContain(controller.startNewGame().target.code);
    expect(new GameModeController({ difficulty: 'easy', dataSource }).difficulty).toBe('easy');
  });

  it('starts from the region centre before a round', () => {
    const controller = new GameModeController({ region: 'ireland', dataSource });
    expect(controller.currentSession).toBeNull();
    expect(controller.startPosition).toEqual({ lng: -8, lat: 53.5 });
    expect(controller.targetName).toBe('');
    expect(controller.clueText).toBe('');
  });

  it('scores a landing on the target only', () => {
    const controller = new GameModeController({ difficulty: 'easy', random: createSeededRandom(3), dataSource });
    const session = controller.startNewGame();
    expect(session.target.code).toBe('FR');
    expect(controller.startPosition).toEqual(session.startPosition);

    expect(controller.onLanding('BR')).toBe(false);
    expect(controller.isComplete).toBe(false);

    expect(controller.onLanding('FR', { hintsUsed: 1, fuelFraction: 1 })).toBe(true);
    expect(controller.isComplete).toBe(true);
    expect(controller.lastScore).toBe(5225);
    expect(controller.onLanding('FR')).toBe(false);
  });

  it('clears the round on reset', () => {
    const controller = new GameModeController({ random: createSeededRandom(5), dataSource });
    controller.startNewGame();
    controller.reset();
    expect(controller.currentSession).toBeNull();
    expect(controller.lastScore).toBe(0);
    expect(controller.startPosition).toEqual({ lng: 0, lat: 0 });
  });

  it('gives every daily player the same round', () => {
    const { clock } = fixedClock('2026-03-07T08:00:00Z');
    const first = new GameModeController({ mode: 'daily', dataSource, clock }).startNewGame();
    const second = new GameModeController({ mode: 'daily', dataSource, clock, random: createSeededRandom(99) }).startNewGame();
    expect(second.target.code).toBe(first.target.code);
    expect(second.clue).toEqual(first.clue);
    expect(second.startPosition).toEqual(first.startPosition);
  });

  it('limits daily clues to the theme', () => {
    const { clock } = fixedClock('2026-03-07T08:00:00Z');
    const session = new GameModeController({ mode: 'daily', dataSource, clock, dailyClueTypes: new Set(['flag']) }).startNewGame();
    expect(session.clue.type).toBe('flag');
  });
});
