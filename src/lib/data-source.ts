import { randomClue, regionalAreaClue } from './clues';
import { getCountryCatalog } from './country-data';
import type { CountryCatalog } from './country-data';
import { getAreas } from './regions';
import type { CityData, Clue, ClueRequest, CountryShape, GameRegion, RandomSource, RatingFilter, RegionalArea } from './types';

/** What a round needs to know about targets and clues. */
export interface RoundDataSource {
  getRandomTarget(random: RandomSource): CountryShape;
  /** Playable targets whose rating falls within the filter (inclusive). */
  getTargetsFiltered(filter?: RatingFilter): CountryShape[];
  getClueFor(targetCode: string, request: ClueRequest & { random: RandomSource }): Clue;
  getCapital(targetCode: string): CityData | undefined;
  /** 0.0 trivially easy, 1.0 maximally obscure. */
  getDifficultyRating(targetCode: string): number;
  getAreas(region: GameRegion): RegionalArea[];
  getRegionalClue(region: GameRegion, area: RegionalArea, random: RandomSource): Clue;
}

export function createDataSource(catalog: CountryCatalog = getCountryCatalog()): RoundDataSource {
  return {
    getRandomTarget: (random) => catalog.getRandomCountry(random),
    getTargetsFiltered: (filter) => catalog.getCountriesFiltered(filter),
    getClueFor: (targetCode, { random, ...request }) => randomClue(targetCode, request, catalog, random),
    getCapital: (targetCode) => catalog.getCapital(targetCode),
    getDifficultyRating: (targetCode) => catalog.getDifficultyRating(targetCode),
    getAreas: (region) => getAreas(region, catalog),
    getRegionalClue: (region, area, random) => regionalAreaClue(area, random, region)
  };
}

let defaultSource: RoundDataSource | null = null;

export const getDefaultDataSource = (): RoundDataSource => {
  if (!defaultSource) defaultSource = createDataSource();
  return defaultSource;
};
