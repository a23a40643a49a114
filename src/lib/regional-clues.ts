import regionalClueRecords from '../data/regional-clues.json';
import { DataError } from './errors';
import { pick } from './random';
import type { GameRegion, RandomSource, RegionalClueType, TextClue } from './types';

interface UsStateClueData {
  nickname: string;
  famousLandmark: string;
  flag: string;
  sportsTeams: string[];
  senators: string[];
}

interface IrishCountyClueData {
  nickname: string;
  famousLandmark: string;
  province: string;
  gaaTeam: string;
  famousPerson: string;
}

interface UkCountyClueData {
  nickname: string;
  famousLandmark: string;
  country: string;
  footballTeam: string;
  famousPerson: string;
}

export interface RegionalClueTables {
  usStates: Record<string, UsStateClueData>;
  ireland: Record<string, IrishCountyClueData>;
  ukCounties: Record<string, UkCountyClueData>;
}

const isObject = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

const text = (row: Record<string, unknown>, key: string, where: string): string => {
  const value = row[key];
  if (typeof value !== 'string' || !value) throw new DataError(`${where}: missing ${key}`);
  return value;
};

const textList = (row: Record<string, unknown>, key: string, where: string): string[] => {
  const value = row[key];
  if (value === undefined) return [];
  if (!Array.isArray(value) || value.some((entry) => typeof entry !== 'string')) {
    throw new DataError(`${where}: ${key} must be a list of names`);
  }
  return value.filter((entry): entry is string => typeof entry === 'string');
};

const parseTable = <T,>(raw: unknown, region: string, parseRow: (row: Record<string, unknown>, where: string) => T) => {
  if (raw === undefined) return {};
  if (!isObject(raw)) throw new DataError(`regional clues ${region}: expected an object keyed by area code`);
  const table: Record<string, T> = {};
  for (const [code, row] of Object.entries(raw)) {
    const where = `regional clues ${region} ${code}`;
    if (!isObject(row)) throw new DataError(`${where}: expected an object`);
    table[code] = parseRow(row, where);
  }
  return table;
};

export function loadRegionalClueTables(raw: unknown): RegionalClueTables {
  if (!isObject(raw)) throw new DataError('regional clue data must be an object');
  return {
    usStates: parseTable(raw.usStates, 'usStates', (row, where) => ({
      nickname: text(row, 'nickname', where),
      famousLandmark: text(row, 'famousLandmark', where),
      flag: text(row, 'flag', where),
      sportsTeams: textList(row, 'sportsTeams', where),
      senators: textList(row, 'senators', where)
    })),
    ireland: parseTable(raw.ireland, 'ireland', (row, where) => ({
      nickname: text(row, 'nickname', where),
      famousLandmark: text(row, 'famousLandmark', where),
      province: text(row, 'province', where),
      gaaTeam: text(row, 'gaaTeam', where),
      famousPerson: text(row, 'famousPerson', where)
    })),
    ukCounties: parseTable(raw.ukCounties, 'ukCounties', (row, where) => ({
      nickname: text(row, 'nickname', where),
      famousLandmark: text(row, 'famousLandmark', where),
      country: text(row, 'country', where),
      footballTeam: text(row, 'footballTeam', where),
      famousPerson: text(row, 'famousPerson', where)
    }))
  };
}

let defaultTables: RegionalClueTables | null = null;

export const getRegionalClueTables = (): RegionalClueTables => {
  if (!defaultTables) defaultTables = loadRegionalClueTables(regionalClueRecords);
  return defaultTables;
};

const textClue = (type: RegionalClueType, targetCode: string, value: string): TextClue => ({ type, targetCode, text: value });

/**
 * Text clues for one area, in a fixed order. Regions without tables (world,
 * caribbean) and areas without a row yield none. A US state's team is drawn
 * from `random`.
 */
export function regionalTextClues(
  region: GameRegion,
  code: string,
  random: RandomSource,
  tables: RegionalClueTables = getRegionalClueTables()
): TextClue[] {
  const clues: TextClue[] = [];

  if (region === 'usStates') {
    const data = tables.usStates[code];
    if (!data) return clues;
    if (data.sportsTeams.length) clues.push(textClue('sportsTeam', code, pick(random, data.sportsTeams)));
    if (data.senators.length) clues.push(textClue('leader', code, `Senator: ${data.senators.join(', ')}`));
    clues.push(textClue('nickname', code, data.nickname));
    clues.push(textClue('landmark', code, data.famousLandmark));
    clues.push(textClue('flagDescription', code, data.flag));
  } else if (region === 'ireland') {
    const data = tables.ireland[code];
    if (!data) return clues;
    clues.push(textClue('nickname', code, `${data.nickname} (${data.province})`));
    clues.push(textClue('landmark', code, data.famousLandmark));
    clues.push(textClue('sportsTeam', code, `GAA: ${data.gaaTeam}`));
    clues.push(textClue('leader', code, data.famousPerson));
  } else if (region === 'ukCounties') {
    const data = tables.ukCounties[code];
    if (!data) return clues;
    clues.push(textClue('sportsTeam', code, data.footballTeam));
    clues.push(textClue('landmark', code, data.famousLandmark));
    clues.push(textClue('leader', code, data.famousPerson));
    clues.push(textClue('nickname', code, `${data.nickname} (${data.country})`));
  }

  return clues;
}
