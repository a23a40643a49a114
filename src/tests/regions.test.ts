import { describe, expect, it } from 'vitest';
import { DataError } from '../lib/errors';
import { getAreas, isGameRegion, isRegionUnlocked, loadRegionalAreas, regionCenter } from '../lib/regions';
import { createTestCatalog } from './fixtures';

describe('regions', () => {
  const catalog = createTestCatalog();

  it('recognises region names', () => {
    expect(isGameRegion('ireland')).toBe(true);
    expect(isGameRegion('daily')).toBe(false);
    expect(isGameRegion('toString')).toBe(false);
  });

  it('centres on the region bounds', () => {
    expect(regionCenter('world')).toEqual({ lng: 0, lat: 0 });
    expect(regionCenter('ireland')).toEqual({ lng: -8, lat: 53.5 });
  });

  it('unlocks regions by level', () => {
    expect(isRegionUnlocked('world', 1)).toBe(true);
    expect(isRegionUnlocked('ireland', 9)).toBe(false);
    expect(isRegionUnlocked('ireland', 10)).toBe(true);
  });

  it('loads bundled regional areas', () => {
    expect(getAreas('usStates', catalog)).toHaveLength(50);
    expect(getAreas('ukCounties', catalog)).toHaveLength(97);
    expect(getAreas('caribbean', catalog)).toHaveLength(14);
    expect(getAreas('ireland', catalog)).toHaveLength(32);
  });

  it('maps world areas from the catalog countries', () => {
    const areas = getAreas('world', catalog);
    expect(areas.map((area) => area.code)).toEqual(['FR', 'NR', 'BR', 'XX', 'AQ']);
    expect(areas[0].capital).toBe('Paris');
  });

  it('rejects unknown regions in area data', () => {
    expect(() => loadRegionalAreas({ mars: [] })).toThrow(DataError);
    expect(() => loadRegionalAreas({ ireland: [{ code: 'KY', name: 'Kerry', points: [] }] })).toThrow(DataError);
  });
});
