import regionRecords from '../data/regions.json';
import type { CountryCatalog } from './country-data';
import { DataError } from './errors';
import type { Coordinate, GameRegion, RegionalArea } from './types';

/** `[minLng, minLat, maxLng, maxLat]` */
export type RegionBounds = readonly [number, number, number, number];

interface RegionInfo {
  displayName: string;
  description: string;
  bounds: RegionBounds;
  requiredLevel: number;
}

export const REGION_INFO: Record<GameRegion, RegionInfo> = {
  world: { displayName: 'World', description: 'Navigate the entire globe', bounds: [-180, -85, 180, 85], requiredLevel: 1 },
  usStates: { displayName: 'US States', description: 'Explore all 50 US states', bounds: [-125, 24, -66, 50], requiredLevel: 3 },
  ukCounties: {
    displayName: 'UK Counties',
    description: 'Discover counties of the UK',
    bounds: [-11, 49, 3, 61],
    requiredLevel: 5
  },
  caribbean: {
    displayName: 'Caribbean',
    description: 'Island hop through the Caribbean',
    bounds: [-85, 10, -59, 28],
    requiredLevel: 7
  },
  ireland: {
    displayName: 'Ireland',
    description: 'Tour all 32 counties of Ireland',
    bounds: [-11, 51, -5, 56],
    requiredLevel: 10
  }
};

export const GAME_REGIONS: readonly GameRegion[] = ['world', 'usStates', 'ukCounties', 'caribbean', 'ireland'];

export const isGameRegion = (value: unknown): value is GameRegion =>
  typeof value === 'string' && Object.prototype.hasOwnProperty.call(REGION_INFO, value);

export const regionCenter = (region: GameRegion): Coordinate => {
  const [minLng, minLat, maxLng, maxLat] = REGION_INFO[region].bounds;
  return { lng: (minLng + maxLng) / 2, lat: (minLat + maxLat) / 2 };
};

export const isRegionUnlocked = (region: GameRegion, level: number) => level >= REGION_INFO[region].requiredLevel;

const isObject = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

const parseArea = (raw: unknown, where: string): RegionalArea => {
  if (!isObject(raw)) throw new DataError(`${where}: expected an object`);
  const { code, name, capital, population, funFact, points } = raw;
  if (typeof code !== 'string' || typeof name !== 'string') throw new DataError(`${where}: missing code or name`);
  if (!Array.isArray(points) || points.length === 0) throw new DataError(`${where}: missing points`);
  return {
    code,
    name,
    capital: typeof capital === 'string' ? capital : undefined,
    population: typeof population === 'number' ? population : undefined,
    funFact: typeof funFact === 'string' ? funFact : undefined,
    points: points.map((point: unknown) => {
      if (!Array.isArray(point) || typeof point[0] !== 'number' || typeof point[1] !== 'number') {
        throw new DataError(`${where}: expected [lng, lat] points`);
      }
      return { lng: point[0], lat: point[1] };
    })
  };
};

export const loadRegionalAreas = (raw: unknown): Partial<Record<GameRegion, RegionalArea[]>> => {
  if (!isObject(raw)) throw new DataError('region data must be an object');
  const result: Partial<Record<GameRegion, RegionalArea[]>> = {};
  for (const [key, areas] of Object.entries(raw)) {
    if (!isGameRegion(key) || key === 'world') throw new DataError(`unknown region ${key}`);
    if (!Array.isArray(areas)) throw new DataError(`region ${key}: expected a list of areas`);
    result[key] = areas.map((area: unknown, index: number) => parseArea(area, `${key} #${index}`));
  }
  return result;
};

let regionalAreas: Partial<Record<GameRegion, RegionalArea[]>> | null = null;

export function getAreas(region: GameRegion, catalog: CountryCatalog): RegionalArea[] {
  if (region === 'world') {
    return catalog.countries.map((country) => ({
      code: country.code,
      name: country.name,
      points: country.points,
      capital: country.capital
    }));
  }
  if (!regionalAreas) regionalAreas = loadRegionalAreas(regionRecords);
  return regionalAreas[region] ?? [];
}
