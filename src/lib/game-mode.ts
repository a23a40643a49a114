import { loadConfig } from './config';
import { dailySeed } from './daily-challenge';
import type { RoundDataSource } from './data-source';
import { gameLog } from './game-log';
import { GameSession } from './game-session';
import type { CompleteOptions } from './game-session';
import { regionCenter } from './regions';
import type { Clock, Coordinate, GameDifficulty, GameRegion, RandomSource } from './types';

export type GameMode = 'solo' | 'challenge' | 'daily';

export interface GameModeOptions {
  region?: GameRegion;
  mode?: GameMode;
  difficulty?: GameDifficulty;
  /** Clue types allowed in daily rounds, from the day's theme. */
  dailyClueTypes?: ReadonlySet<string>;
  random?: RandomSource;
  dataSource?: RoundDataSource;
  clock?: Clock;
}

/** Starts rounds for one mode and region and scores landings. */
export class GameModeController {
  readonly region: GameRegion;
  readonly mode: GameMode;
  /** Falls back to `FLIT_DEFAULT_DIFFICULTY` when not given. */
  readonly difficulty: GameDifficulty;

  private readonly options: GameModeOptions;
  private readonly clock: Clock;
  private session: GameSession | null = null;
  private lastRoundScore = 0;

  constructor(options: GameModeOptions = {}) {
    this.options = options;
    this.region = options.region ?? 'world';
    this.mode = options.mode ?? 'solo';
    this.difficulty = options.difficulty ?? loadConfig().defaultDifficulty;
    this.clock = options.clock ?? (() => new Date());
  }

  get currentSession() {
    return this.session;
  }

  get isComplete() {
    return this.session?.completed ?? false;
  }

  get lastScore() {
    return this.lastRoundScore;
  }

  startNewGame(): GameSession {
    const { dataSource, random } = this.options;
    this.lastRoundScore = 0;
    this.session =
      this.mode === 'daily'
        ? GameSession.seeded(dailySeed(this.clock()), {
            allowedClueTypes: this.options.dailyClueTypes,
            dataSource,
            clock: this.clock
          })
        : GameSession.random({ region: this.region, difficulty: this.difficulty, random, dataSource, clock: this.clock });
    gameLog.info('game', 'round started', { mode: this.mode, region: this.region, target: this.session.target.code });
    return this.session;
  }

  /** True when `areaCode` is the target; the round is then completed and scored. */
  onLanding(areaCode: string, result: CompleteOptions = {}): boolean {
    const session = this.session;
    if (!session || session.completed) return false;
    if (areaCode !== session.target.code) {
      gameLog.debug('game', 'landed on the wrong area', { landed: areaCode, target: session.target.code });
      return false;
    }
    session.complete(result);
    this.lastRoundScore = session.score;
    return true;
  }

  reset() {
    this.session = null;
    this.lastRoundScore = 0;
  }

  get startPosition(): Coordinate {
    return this.session ? { ...this.session.startPosition } : regionCenter(this.region);
  }

  get targetName() {
    return this.session?.targetName ?? '';
  }

  get clueText() {
    return this.session?.clueText ?? '';
  }
}
