export interface Coordinate {
  lng: number;
  lat: number;
}

export interface CountryShape {
  code: string;
  name: string;
  capital?: string;
  points: Coordinate[];
  playable: boolean;
}

export interface CityData {
  name: string;
  countryCode: string;
  location: Coordinate;
  isCapital: boolean;
}

export type CountryStats = Record<string, string>;

export interface CountryRecord {
  code: string;
  name: string;
  capital?: string;
  capitalLocation?: [number, number];
  difficulty?: number;
  neighbors?: string[];
  stats?: CountryStats;
  points: Array<[number, number]>;
  playable?: boolean;
}

export type GameRegion = 'world' | 'usStates' | 'ukCounties' | 'caribbean' | 'ireland';

export interface RegionalArea {
  code: string;
  name: string;
  points: Coordinate[];
  capital?: string;
  population?: number;
  funFact?: string;
}

export type GameDifficulty = 'easy' | 'normal' | 'hard';

export type WorldClueType = 'flag' | 'outline' | 'borders' | 'capital' | 'stats';
export type RegionalClueType = 'sportsTeam' | 'leader' | 'nickname' | 'landmark' | 'flagDescription';
export type ClueType = WorldClueType | RegionalClueType;

interface ClueBase {
  targetCode: string;
}

export interface FlagClue extends ClueBase {
  type: 'flag';
  flagEmoji: string;
}

export interface OutlineClue extends ClueBase {
  type: 'outline';
  polygons: Coordinate[][];
  areaName?: string;
}

export interface BordersClue extends ClueBase {
  type: 'borders';
  neighbors: string[];
}

export interface CapitalClue extends ClueBase {
  type: 'capital';
  capitalName: string;
  areaName?: string;
}

export interface StatsClue extends ClueBase {
  type: 'stats';
  stats: CountryStats;
  areaName?: string;
}

export interface TextClue extends ClueBase {
  type: RegionalClueType;
  text: string;
}

export type Clue = FlagClue | OutlineClue | BordersClue | CapitalClue | StatsClue | TextClue;

export interface RatingFilter {
  minRating?: number;
  maxRating?: number;
}

export interface ClueRequest {
  allowedTypes?: ReadonlySet<string>;
  preferredType?: string;
  clueBoost?: number;
}

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

export type Clock = () => Date;
