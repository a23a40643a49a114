import { clueDisplayText } from './clues';
import { DEFAULT_COUNTRY_RATING, ratingRangeForTier, roundDifficulty } from './country-difficulty';
import { getDefaultDataSource } from './data-source';
import type { RoundDataSource } from './data-source';
import { InvalidStateError } from './errors';
import { gameLog } from './game-log';
import { centroid, pathLengthDeg } from './geo';
import { createSeededRandom, randomInRange, randomInt, systemRandom } from './random';
import { REGION_INFO } from './regions';
import { clampFuelFraction, computeRawScore, computeScore, difficultyMultiplier, normalizeHintsUsed } from './scoring';
import type {
  Clock,
  Clue,
  ClueType,
  Coordinate,
  CountryShape,
  GameDifficulty,
  GameRegion,
  RandomSource,
  RegionalArea
} from './types';

// Start positions stay clear of the poles.
const START_LATITUDE_LIMIT = 70;

export interface SessionInit {
  target: CountryShape;
  clue: Clue;
  startPosition: Coordinate;
  region?: GameRegion;
  targetArea?: RegionalArea | null;
  dataSource?: RoundDataSource;
  clock?: Clock;
}

export interface SessionFactoryOptions {
  preferredClueType?: string;
  allowedClueTypes?: ReadonlySet<string>;
  /** Percent chance per draw of taking `preferredClueType` outright. */
  clueBoost?: number;
  dataSource?: RoundDataSource;
  clock?: Clock;
}

export interface RandomSessionOptions extends SessionFactoryOptions {
  region?: GameRegion;
  difficulty?: GameDifficulty;
  random?: RandomSource;
}

export interface CompleteOptions {
  /** Hint tiers used this round, 0-4; stored as a whole count. */
  hintsUsed?: number;
  /** Fuel remaining as a fraction of max; clamped into [0, 1]. */
  fuelFraction?: number;
}

/** Result payload handed to the leaderboard service. */
export interface RoundSubmission {
  targetCode: string;
  clueType: ClueType;
  elapsedMs: number;
  score: number;
}

const defaultClock: Clock = () => new Date();

const areaAsTarget = (area: RegionalArea): CountryShape => ({
  code: area.code,
  name: area.name,
  capital: area.capital,
  points: area.points,
  playable: true
});

const emptyPool = (message: string, data: Record<string, unknown>): never => {
  const error = new InvalidStateError(message);
  gameLog.error('session', message, error, data);
  throw error;
};

/**
 * One round of play: the target and clue, the start position, the recorded
 * flight path, and the score once the round is completed. Completion happens
 * once; later calls to {@link GameSession.complete} are ignored.
 */
export class GameSession {
  readonly target: CountryShape;
  readonly clue: Clue;
  readonly startPosition: Readonly<Coordinate>;
  readonly startTime: Date;
  readonly region: GameRegion;
  readonly targetArea: RegionalArea | null;

  private readonly dataSource: RoundDataSource;
  private readonly clock: Clock;
  private readonly path: Array<Readonly<Coordinate>> = [];
  private finishedAt: Date | null = null;
  private hints = 0;
  private fuel = 1;

  private constructor(init: SessionInit) {
    this.target = init.target;
    this.clue = init.clue;
    this.startPosition = Object.freeze({ lng: init.startPosition.lng, lat: init.startPosition.lat });
    this.region = init.region ?? 'world';
    this.targetArea = init.targetArea ?? null;
    this.dataSource = init.dataSource ?? getDefaultDataSource();
    this.clock = init.clock ?? defaultClock;
    this.startTime = this.clock();
  }

  static create(init: SessionInit): GameSession {
    if (init.clue.targetCode !== init.target.code) {
      throw new InvalidStateError(`clue describes ${init.clue.targetCode}, not the target ${init.target.code}`);
    }
    if (init.targetArea && init.targetArea.code !== init.target.code) {
      throw new InvalidStateError(`area ${init.targetArea.code} does not match the target ${init.target.code}`);
    }
    return new GameSession(init);
  }

  /**
   * A round drawn from `random`. World rounds filter the playable pool by
   * difficulty tier; regional rounds pick one of the region's areas and
   * start inside the region's bounds.
   */
  static random(options: RandomSessionOptions = {}): GameSession {
    const { region = 'world', difficulty = 'normal', random = systemRandom, clock } = options;
    const dataSource = options.dataSource ?? getDefaultDataSource();

    if (region === 'world') {
      const pool = dataSource.getTargetsFiltered(ratingRangeForTier(difficulty));
      if (pool.length === 0) return emptyPool(`no targets for difficulty ${difficulty}`, { difficulty });
      const target = pool[randomInt(random, pool.length)];
      const clue = dataSource.getClueFor(target.code, {
        allowedTypes: options.allowedClueTypes,
        preferredType: options.preferredClueType,
        clueBoost: options.clueBoost,
        random
      });
      const startPosition = {
        lng: randomInRange(random, -180, 180),
        lat: randomInRange(random, -START_LATITUDE_LIMIT, START_LATITUDE_LIMIT)
      };
      gameLog.debug('session', 'random round', { target: target.code, clue: clue.type, difficulty });
      return GameSession.create({ target, clue, startPosition, region, dataSource, clock });
    }

    const areas = dataSource.getAreas(region);
    if (areas.length === 0) return emptyPool(`no areas defined for region ${region}`, { region });
    const area = areas[randomInt(random, areas.length)];
    const clue = dataSource.getRegionalClue(region, area, random);
    const [minLng, minLat, maxLng, maxLat] = REGION_INFO[region].bounds;
    const startPosition = { lng: randomInRange(random, minLng, maxLng), lat: randomInRange(random, minLat, maxLat) };
    gameLog.debug('session', 'regional round', { region, area: area.code, clue: clue.type });
    return GameSession.create({ target: areaAsTarget(area), clue, startPosition, region, targetArea: area, dataSource, clock });
  }

  /**
   * A round that every caller with the same seed sees identically (daily
   * challenges, head-to-head matches). Draw order is fixed: target index,
   * clue, longitude, latitude.
   */
  static seeded(seed: number, options: SessionFactoryOptions = {}): GameSession {
    const dataSource = options.dataSource ?? getDefaultDataSource();
    const random = createSeededRandom(seed);
    const pool = dataSource.getTargetsFiltered();
    if (pool.length === 0) return emptyPool('no playable targets for a seeded round', { seed });

    const target = pool[randomInt(random, pool.length)];
    const clue = dataSource.getClueFor(target.code, {
      allowedTypes: options.allowedClueTypes,
      preferredType: options.preferredClueType,
      clueBoost: options.clueBoost,
      random
    });
    const lng = randomInRange(random, -180, 180);
    const lat = randomInRange(random, -START_LATITUDE_LIMIT, START_LATITUDE_LIMIT);
    gameLog.debug('session', 'seeded round', { seed, target: target.code, clue: clue.type });
    return GameSession.create({ target, clue, startPosition: { lng, lat }, dataSource, clock: options.clock });
  }

  get completed() {
    return this.finishedAt !== null;
  }

  get endTime(): Date | null {
    return this.finishedAt;
  }

  get hintsUsed() {
    return this.hints;
  }

  get fuelFraction() {
    return this.fuel;
  }

  get flightPath(): ReadonlyArray<Readonly<Coordinate>> {
    return [...this.path];
  }

  /** Appends a copy; recording after completion leaves the score untouched. */
  recordPosition(position: Coordinate) {
    this.path.push(Object.freeze({ lng: position.lng, lat: position.lat }));
  }

  complete({ hintsUsed = 0, fuelFraction = 1 }: CompleteOptions = {}) {
    if (this.finishedAt) return;
    this.hints = normalizeHintsUsed(hintsUsed);
    this.fuel = clampFuelFraction(fuelFraction);
    this.finishedAt = this.clock();
    gameLog.info('session', 'round completed', {
      target: this.target.code,
      hintsUsed: this.hints,
      fuelFraction: this.fuel,
      score: this.score
    });
  }

  /** Base 10000 minus hint and fuel penalties, within [0, 10000]; 0 until completed. */
  get rawScore() {
    return this.completed ? computeRawScore(this.hints, this.fuel) : 0;
  }

  /** Regional areas carry no rating of their own and sit at the default. */
  get difficultyRating() {
    return this.targetArea ? DEFAULT_COUNTRY_RATING : this.dataSource.getDifficultyRating(this.target.code);
  }

  get difficultyMultiplier() {
    return difficultyMultiplier(this.difficultyRating);
  }

  get score() {
    return this.completed ? computeScore(this.rawScore, this.difficultyRating) : 0;
  }

  get targetPosition(): Coordinate {
    if (this.targetArea) return centroid(this.targetArea.points);
    const capital = this.dataSource.getCapital(this.target.code);
    if (capital) return { ...capital.location };
    return centroid(this.target.points);
  }

  get targetName() {
    return this.targetArea?.name ?? this.target.name;
  }

  get clueText() {
    return clueDisplayText(this.clue);
  }

  get elapsedMs() {
    return (this.finishedAt ?? this.clock()).getTime() - this.startTime.getTime();
  }

  get roundDifficulty() {
    return roundDifficulty(this.clue.type, this.difficultyRating);
  }

  get flightDistanceDeg() {
    return pathLengthDeg(this.path);
  }

  toSubmission(): RoundSubmission {
    if (!this.completed) throw new InvalidStateError('cannot submit a round that is not completed');
    return { targetCode: this.target.code, clueType: this.clue.type, elapsedMs: this.elapsedMs, score: this.score };
  }
}
