import { InvalidStateError } from './errors';
import type { RandomSource } from './types';

export const systemRandom: RandomSource = { next: () => Math.random() };

/** mulberry32: same seed, same sequence, on every platform. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next: () => {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }
  };
}

export const randomInt = (random: RandomSource, maxExclusive: number) => Math.floor(random.next() * maxExclusive);

export const randomInRange = (random: RandomSource, min: number, max: number) => min + random.next() * (max - min);

export const pick = <T,>(random: RandomSource, items: readonly T[]): T => {
  if (items.length === 0) throw new InvalidStateError('cannot pick from an empty list');
  return items[randomInt(random, items.length)];
};

export const shuffle = <T,>(random: RandomSource, items: readonly T[]): T[] => {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i -= 1) {
    const j = randomInt(random, i + 1);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
};
