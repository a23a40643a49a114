import { dailyChallengeForDate } from '../src/lib/daily-challenge';
import { GameSession } from '../src/lib/game-session';
import { createSeededRandom } from '../src/lib/random';
import { GAME_REGIONS } from '../src/lib/regions';
import { MAX_SCORE } from '../src/lib/scoring';
import type { GameDifficulty } from '../src/lib/types';

const isCiMode = process.argv.includes('--ci');
const ROUNDS_PER_SETTING = isCiMode ? 300 : 3000;
const SEED_CHECKS = isCiMode ? 50 : 500;
const DIFFICULTIES: GameDifficulty[] = ['easy', 'normal', 'hard'];

const percent = (count: number, total: number) => ((count / total) * 100).toFixed(1);

function printDistribution(title: string, counts: Record<string, number>, total: number): void {
  console.log(`\n${title}`);
  for (const [key, count] of Object.entries(counts).sort((a, b) => b[1] - a[1])) {
    console.log(`  ${key.padEnd(20)} ${String(count).padStart(6)}  (${percent(count, total)}%)`);
  }
}

function verifySeeds(): string[] {
  const failures: string[] = [];
  for (let seed = 20260101; seed < 20260101 + SEED_CHECKS; seed += 1) {
    const a = GameSession.seeded(seed);
    const b = GameSession.seeded(seed);
    if (
      a.target.code !== b.target.code ||
      a.clue.type !== b.clue.type ||
      a.clueText !== b.clueText ||
      a.startPosition.lng !== b.startPosition.lng ||
      a.startPosition.lat !== b.startPosition.lat
    ) {
      failures.push(`seed ${seed}: ${a.target.code}/${a.clue.type} vs ${b.target.code}/${b.clue.type}`);
    }
  }
  console.log(`\n=== Seeded rounds: ${SEED_CHECKS} seeds replayed, ${failures.length} mismatches ===`);
  return failures;
}

function verifyWorldRounds(): string[] {
  const failures: string[] = [];
  for (const difficulty of DIFFICULTIES) {
    const random = createSeededRandom(difficulty.length * 7919);
    const clueCounts: Record<string, number> = {};
    const scores: number[] = [];
    for (let i = 0; i < ROUNDS_PER_SETTING; i += 1) {
      const session = GameSession.random({ difficulty, random });
      clueCounts[session.clue.type] = (clueCounts[session.clue.type] ?? 0) + 1;
      session.complete({ hintsUsed: i % 5, fuelFraction: random.next() });
      if (session.score < 0 || session.score > MAX_SCORE || !Number.isInteger(session.score)) {
        failures.push(`${difficulty}: score ${session.score} for ${session.target.code}`);
      }
      if (difficulty === 'easy' && session.difficultyRating > 0.35) {
        failures.push(`easy round drew ${session.target.code} rated ${session.difficultyRating}`);
      }
      if (difficulty === 'hard' && session.difficultyRating < 0.45) {
        failures.push(`hard round drew ${session.target.code} rated ${session.difficultyRating}`);
      }
      scores.push(session.score);
    }
    const mean = Math.round(scores.reduce((sum, score) => sum + score, 0) / scores.length);
    printDistribution(`=== World @ ${difficulty} (${ROUNDS_PER_SETTING} rounds, mean score ${mean}) ===`, clueCounts, ROUNDS_PER_SETTING);
  }
  return failures;
}

function verifyRegionalRounds(): string[] {
  const failures: string[] = [];
  for (const region of GAME_REGIONS.filter((entry) => entry !== 'world')) {
    const random = createSeededRandom(region.length * 104729);
    const areas = new Set<string>();
    for (let i = 0; i < ROUNDS_PER_SETTING; i += 1) {
      const session = GameSession.random({ region, random });
      areas.add(session.target.code);
      if (session.clue.targetCode !== session.target.code) failures.push(`${region}: clue for another area`);
    }
    console.log(`  ${region.padEnd(12)} ${String(areas.size).padStart(4)} distinct areas drawn`);
  }
  return failures;
}

function printDailyThemes(): void {
  const themes: Record<string, number> = {};
  const start = Date.UTC(2026, 0, 1);
  for (let day = 0; day < 365; day += 1) {
    const challenge = dailyChallengeForDate(new Date(start + day * 86400000));
    themes[challenge.title] = (themes[challenge.title] ?? 0) + 1;
  }
  printDistribution('=== Daily themes across 2026 ===', themes, 365);
}

const failures = [...verifySeeds(), ...verifyWorldRounds()];
console.log('\n=== Regional rounds ===');
failures.push(...verifyRegionalRounds());
printDailyThemes();

if (failures.length) {
  console.error(`\nFound ${failures.length} problems. First 10:\n${failures.slice(0, 10).join('\n')}`);
  process.exitCode = 1;
} else {
  console.log('\nAll round checks passed.');
}
