import countryRecords from '../data/countries.json';
import { DEFAULT_COUNTRY_RATING } from './country-difficulty';
import { DataError } from './errors';
import { toCoordinate } from './geo';
import { pick } from './random';
import type { CityData, CountryRecord, CountryShape, CountryStats, RandomSource, RatingFilter } from './types';

export interface CountryCatalog {
  readonly countries: readonly CountryShape[];
  /** Countries that can be drawn as round targets. */
  readonly playableCountries: readonly CountryShape[];
  getCountry(code: string): CountryShape | undefined;
  getCapital(code: string): CityData | undefined;
  getDifficultyRating(code: string): number;
  getNeighbors(code: string): string[];
  getStats(code: string): CountryStats | undefined;
  getCountriesFiltered(filter?: RatingFilter): CountryShape[];
  getRandomCountry(random: RandomSource): CountryShape;
}

const isObject = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;
const isFiniteNumber = (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value);

const toPair = (value: unknown, where: string): [number, number] => {
  if (!Array.isArray(value) || value.length !== 2 || !isFiniteNumber(value[0]) || !isFiniteNumber(value[1])) {
    throw new DataError(`${where}: expected a [lng, lat] pair`);
  }
  return [value[0], value[1]];
};

const toStringList = (value: unknown, where: string): string[] => {
  if (!Array.isArray(value)) throw new DataError(`${where}: expected a list of names`);
  return value.map((entry) => {
    if (typeof entry !== 'string') throw new DataError(`${where}: expected a list of names`);
    return entry;
  });
};

const toRating = (value: unknown, where: string): number => {
  if (!isFiniteNumber(value) || value < 0 || value > 1) throw new DataError(`${where}: difficulty must be within [0, 1]`);
  return value;
};

const toStats = (value: unknown, where: string): CountryStats => {
  if (!isObject(value)) throw new DataError(`${where}: expected a stats object`);
  const stats: CountryStats = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') throw new DataError(`${where}: stat ${key} must be a string`);
    stats[key] = entry;
  }
  return stats;
};

export function parseCountryRecord(raw: unknown, index = 0): CountryRecord {
  if (!isObject(raw)) throw new DataError(`country #${index}: expected an object`);
  const { code, name, capital, capitalLocation, difficulty, neighbors, stats, points, playable } = raw;
  if (typeof code !== 'string' || !code) throw new DataError(`country #${index}: missing code`);
  if (typeof name !== 'string' || !name) throw new DataError(`country ${code}: missing name`);
  if (!Array.isArray(points) || points.length === 0) throw new DataError(`country ${code}: missing points`);

  return {
    code,
    name,
    capital: typeof capital === 'string' && capital ? capital : undefined,
    capitalLocation: capitalLocation === undefined ? undefined : toPair(capitalLocation, `country ${code} capital`),
    difficulty: difficulty === undefined ? undefined : toRating(difficulty, `country ${code}`),
    neighbors: neighbors === undefined ? undefined : toStringList(neighbors, `country ${code} neighbors`),
    stats: stats === undefined ? undefined : toStats(stats, `country ${code} stats`),
    points: points.map((point, pointIndex) => toPair(point, `country ${code} point ${pointIndex}`)),
    playable: playable !== false
  };
}

export function createCountryCatalog(records: readonly CountryRecord[]): CountryCatalog {
  const byCode = new Map(records.map((record) => [record.code, record]));
  const countries: CountryShape[] = records.map((record) => ({
    code: record.code,
    name: record.name,
    capital: record.capital,
    points: record.points.map(toCoordinate),
    playable: record.playable !== false
  }));
  const shapeByCode = new Map(countries.map((country) => [country.code, country]));
  const playableCountries = countries.filter((country) => country.playable);

  const getDifficultyRating = (code: string) => byCode.get(code)?.difficulty ?? DEFAULT_COUNTRY_RATING;

  return {
    countries,
    playableCountries,
    getCountry: (code) => shapeByCode.get(code),
    getCapital: (code) => {
      const record = byCode.get(code);
      if (!record?.capital || !record.capitalLocation) return undefined;
      return {
        name: record.capital,
        countryCode: record.code,
        location: toCoordinate(record.capitalLocation),
        isCapital: true
      };
    },
    getDifficultyRating,
    getNeighbors: (code) => [...(byCode.get(code)?.neighbors ?? [])],
    getStats: (code) => {
      const stats = byCode.get(code)?.stats;
      return stats ? { ...stats } : undefined;
    },
    getCountriesFiltered: (filter = {}) =>
      playableCountries.filter((country) => {
        const rating = getDifficultyRating(country.code);
        if (filter.minRating !== undefined && rating < filter.minRating) return false;
        if (filter.maxRating !== undefined && rating > filter.maxRating) return false;
        return true;
      }),
    getRandomCountry: (random) => pick(random, playableCountries)
  };
}

export const loadCountryRecords = (raw: unknown): CountryRecord[] => {
  if (!Array.isArray(raw)) throw new DataError('country data must be a list');
  return raw.map((entry, index) => parseCountryRecord(entry, index));
};

let defaultCatalog: CountryCatalog | null = null;

export const getCountryCatalog = (): CountryCatalog => {
  if (!defaultCatalog) defaultCatalog = createCountryCatalog(loadCountryRecords(countryRecords));
  return defaultCatalog;
};
