import { parseDifficulty } from './country-difficulty';
import { consoleSink, gameLog } from './game-log';
import type { GameLog, LogLevel } from './game-log';
import type { GameDifficulty } from './types';

export interface FlitConfig {
  apiBaseUrl: string;
  logLevel: LogLevel;
  defaultDifficulty: GameDifficulty;
}

type Env = Record<string, string | undefined>;

/** `process.env` where the runtime has one; empty in a browser bundle. */
export const runtimeEnv = (scope: { process?: { env?: Env } } = globalThis): Env => scope.process?.env ?? {};

const parseLogLevel = (value: unknown): LogLevel =>
  value === 'debug' || value === 'info' || value === 'warning' || value === 'error' ? value : 'info';

export function loadConfig(env: Env = runtimeEnv()): FlitConfig {
  return {
    apiBaseUrl: env.FLIT_API_BASE_URL?.trim().replace(/\/+$/, '') ?? '',
    logLevel: parseLogLevel(env.FLIT_LOG_LEVEL?.trim().toLowerCase()),
    defaultDifficulty: parseDifficulty(env.FLIT_DEFAULT_DIFFICULTY?.trim().toLowerCase()) ?? 'normal'
  };
}

/** Routes the shared game log to the console at the configured level. */
export const applyLogConfig = (config: Pick<FlitConfig, 'logLevel'>, log: GameLog = gameLog) =>
  log.configure({ sink: consoleSink, sinkLevel: config.logLevel });
