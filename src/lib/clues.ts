import type { CountryCatalog } from './country-data';
import { pick, randomInt, shuffle } from './random';
import { regionalTextClues } from './regional-clues';
import type { RegionalClueTables } from './regional-clues';
import type {
  BordersClue,
  CapitalClue,
  Clue,
  ClueRequest,
  ClueType,
  FlagClue,
  GameRegion,
  OutlineClue,
  RandomSource,
  RegionalArea,
  StatsClue,
  WorldClueType
} from './types';

export const WORLD_CLUE_TYPES: readonly WorldClueType[] = ['flag', 'outline', 'borders', 'capital', 'stats'];
export const CLUE_TYPES: readonly ClueType[] = [
  ...WORLD_CLUE_TYPES,
  'sportsTeam',
  'leader',
  'nickname',
  'landmark',
  'flagDescription'
];

const MAX_CLUE_ATTEMPTS = 10;
const MIN_OUTLINE_VERTICES = 10;
const STATS_PER_CLUE = 3;

const STAT_LABELS: Record<string, string> = {
  population: 'Pop',
  continent: 'Continent',
  language: 'Predominant language',
  currency: 'Currency',
  religion: 'Predominant religion',
  headOfState: 'Leader',
  sport: 'Sport',
  celebrity: 'Celebrity',
  funFact: 'Fun fact'
};

export const isClueType = (value: unknown): value is ClueType =>
  typeof value === 'string' && CLUE_TYPES.some((type) => type === value);

const isWorldClueType = (value: string): value is WorldClueType => WORLD_CLUE_TYPES.some((type) => type === value);

const mentionsUnknown = (value: string) => value.toLowerCase().includes('unknown');

// Regional indicator symbols start at U+1F1E6 for 'A'.
export const countryCodeToFlagEmoji = (code: string) =>
  String.fromCodePoint(...[...code.toUpperCase()].map((char) => (char.codePointAt(0) ?? 0) + 127397));

export const flagClue = (code: string): FlagClue => ({ type: 'flag', targetCode: code, flagEmoji: countryCodeToFlagEmoji(code) });

export const outlineClue = (code: string, catalog: CountryCatalog): OutlineClue => {
  const country = catalog.getCountry(code);
  return { type: 'outline', targetCode: code, polygons: country ? [country.points] : [] };
};

export const bordersClue = (code: string, catalog: CountryCatalog): BordersClue => ({
  type: 'borders',
  targetCode: code,
  neighbors: catalog.getNeighbors(code)
});

export const capitalClue = (code: string, catalog: CountryCatalog): CapitalClue => ({
  type: 'capital',
  targetCode: code,
  capitalName: catalog.getCapital(code)?.name ?? catalog.getCountry(code)?.capital ?? ''
});

/** A random trio of the country's stats. */
export const statsClue = (code: string, catalog: CountryCatalog, random: RandomSource): StatsClue => {
  const all = catalog.getStats(code) ?? {};
  const keys = shuffle(random, Object.keys(all)).slice(0, STATS_PER_CLUE);
  const stats: Record<string, string> = {};
  for (const key of keys) stats[key] = all[key];
  return { type: 'stats', targetCode: code, stats };
};

export function isValidClue(clue: Clue): boolean {
  switch (clue.type) {
    case 'flag':
      return true;
    case 'outline':
      // Shapes with fewer vertices read as generic rectangles.
      return clue.polygons.reduce((sum, polygon) => sum + polygon.length, 0) >= MIN_OUTLINE_VERTICES;
    case 'borders':
      return clue.neighbors.length > 0 && !clue.neighbors.some(mentionsUnknown);
    case 'capital':
      return clue.capitalName.length > 0 && !mentionsUnknown(clue.capitalName);
    case 'stats': {
      const values = Object.values(clue.stats);
      return values.length > 0 && values.every((value) => value.length > 0 && !mentionsUnknown(value));
    }
    default:
      return clue.text.length > 0;
  }
}

const buildWorldClue = (type: WorldClueType, code: string, catalog: CountryCatalog, random: RandomSource): Clue => {
  switch (type) {
    case 'flag':
      return flagClue(code);
    case 'outline':
      return outlineClue(code, catalog);
    case 'borders':
      return bordersClue(code, catalog);
    case 'capital':
      return capitalClue(code, catalog);
    case 'stats':
      return statsClue(code, catalog, random);
  }
};

/**
 * Picks a clue type at random and returns the first one whose data holds up,
 * trying each type at most once. `allowedTypes` narrows the pool (an empty or
 * unusable filter means all types); `preferredType` is taken outright with a
 * `clueBoost` percent chance per attempt. Falls back to a flag clue.
 */
export function randomClue(code: string, request: ClueRequest, catalog: CountryCatalog, random: RandomSource): Clue {
  const { allowedTypes, preferredType, clueBoost = 0 } = request;
  const filtered = allowedTypes?.size ? WORLD_CLUE_TYPES.filter((type) => allowedTypes.has(type)) : [];
  const types = filtered.length ? filtered : [...WORLD_CLUE_TYPES];
  const preferred = preferredType && clueBoost > 0 && isWorldClueType(preferredType) && types.includes(preferredType)
    ? preferredType
    : undefined;
  const tried = new Set<WorldClueType>();

  for (let attempt = 0; attempt < MAX_CLUE_ATTEMPTS; attempt += 1) {
    const available = types.filter((type) => !tried.has(type));
    if (available.length === 0) break;

    const type = preferred && available.includes(preferred) && randomInt(random, 100) < clueBoost
      ? preferred
      : pick(random, available);
    tried.add(type);

    const clue = buildWorldClue(type, code, catalog, random);
    if (isValidClue(clue)) return clue;
  }

  return flagClue(code);
}

const formatPopulation = (population: number) => {
  if (population >= 1000000) return `${(population / 1000000).toFixed(1)}M`;
  if (population >= 1000) return `${(population / 1000).toFixed(0)}K`;
  return String(population);
};

/**
 * Outline always; capital and population stats when the area has them; plus the
 * region's text clues (teams, leaders, nicknames, landmarks, flags) where a
 * table row exists. One candidate is picked uniformly.
 */
export function regionalAreaClue(
  area: RegionalArea,
  random: RandomSource,
  region: GameRegion = 'world',
  tables?: RegionalClueTables
): Clue {
  const candidates: Clue[] = [{ type: 'outline', targetCode: area.code, polygons: [area.points], areaName: area.name }];

  if (area.capital && !mentionsUnknown(area.capital)) {
    candidates.push({ type: 'capital', targetCode: area.code, capitalName: area.capital, areaName: area.name });
  }

  if (area.population !== undefined && area.population > 0) {
    const stats: Record<string, string> = { population: formatPopulation(area.population) };
    if (area.funFact) stats.funFact = area.funFact;
    candidates.push({ type: 'stats', targetCode: area.code, stats, areaName: area.name });
  }

  candidates.push(...regionalTextClues(region, area.code, random, tables));

  return pick(random, candidates);
}

export function clueDisplayText(clue: Clue): string {
  switch (clue.type) {
    case 'flag':
      return clue.flagEmoji;
    case 'outline':
      return clue.areaName ? '[Area Outline]' : '[Country Outline]';
    case 'borders':
      return `Borders: ${clue.neighbors.join(', ')}`;
    case 'capital':
      return `Capital: ${clue.capitalName}`;
    case 'stats':
      return Object.entries(clue.stats)
        .map(([key, value]) => `${STAT_LABELS[key] ?? key}: ${value}`)
        .join('\n');
    default:
      return clue.text;
  }
}
