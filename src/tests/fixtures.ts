import { createCountryCatalog } from '../lib/country-data';
import { createDataSource } from '../lib/data-source';
import type { CountryRecord } from '../lib/types';

const ring = (lng: number, lat: number, count: number): Array<[number, number]> =>
  Array.from({ length: count }, (_, index) => {
    const angle = (index / count) * Math.PI * 2;
    return [lng + Math.cos(angle) * 4, lat + Math.sin(angle) * 3];
  });

export const TEST_COUNTRIES: CountryRecord[] = [
  {
    code: 'FR',
    name: 'France',
    capital: 'Paris',
    capitalLocation: [2.35, 48.86],
    difficulty: 0.1,
    neighbors: ['Spain', 'Germany'],
    stats: { population: '68M', continent: 'Europe', language: 'French', currency: 'Euro' },
    points: ring(2, 46, 12)
  },
  {
    code: 'NR',
    name: 'Nauru',
    capital: 'Yaren',
    capitalLocation: [166.92, -0.55],
    difficulty: 0.95,
    neighbors: [],
    stats: { population: '12K' },
    points: [
      [166.9, -0.5],
      [166.95, -0.5],
      [166.95, -0.55],
      [166.9, -0.55]
    ]
  },
  {
    code: 'BR',
    name: 'Brazil',
    capital: 'Brasilia',
    capitalLocation: [-47.88, -15.79],
    difficulty: 0.4,
    neighbors: ['Argentina', 'Peru'],
    stats: { population: '216M', continent: 'South America', language: 'Portuguese' },
    points: ring(-52, -10, 14)
  },
  {
    code: 'XX',
    name: 'Placeholderia',
    points: [
      [10, 10],
      [12, 10],
      [11, 13]
    ]
  },
  {
    code: 'AQ',
    name: 'Antarctica',
    points: ring(0, -80, 12),
    playable: false
  }
];

export const createTestCatalog = () => createCountryCatalog(TEST_COUNTRIES);

export const createTestDataSource = () => createDataSource(createTestCatalog());

export const fixedClock = (iso: string) => {
  let now = new Date(iso);
  return {
    clock: () => now,
    advance: (ms: number) => {
      now = new Date(now.getTime() + ms);
    }
  };
};
