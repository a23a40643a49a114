export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warning: 2, error: 3 };
const LEVEL_TAG: Record<LogLevel, string> = { debug: 'DBG', info: 'INF', warning: 'WRN', error: 'ERR' };

export const MAX_LOG_ENTRIES = 500;

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  category: string;
  message: string;
  data?: Record<string, unknown>;
  error?: unknown;
}

export type LogSink = (entry: LogEntry) => void;

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

export const formatLogEntry = (entry: LogEntry) => {
  const { timestamp: t } = entry;
  const time = `${pad(t.getHours())}:${pad(t.getMinutes())}:${pad(t.getSeconds())}.${pad(t.getMilliseconds(), 3)}`;
  let line = `[${time} ${LEVEL_TAG[entry.level]} ${entry.category}] ${entry.message}`;
  if (entry.data && Object.keys(entry.data).length) line += ` | ${JSON.stringify(entry.data)}`;
  if (entry.error !== undefined) {
    line += `\n  error: ${entry.error instanceof Error ? entry.error.message : String(entry.error)}`;
  }
  return line;
};

export const consoleSink: LogSink = (entry) => {
  const line = formatLogEntry(entry);
  if (entry.level === 'error') console.error(line);
  else if (entry.level === 'warning') console.warn(line);
  else console.log(line);
};

interface GameLogOptions {
  capacity?: number;
  /** Entries below this level are kept in the buffer but not sent to the sink. */
  sinkLevel?: LogLevel;
  sink?: LogSink | null;
  clock?: () => Date;
}

/** Structured log with a bounded ring buffer, oldest entries dropped first. */
export class GameLog {
  private readonly entries: LogEntry[] = [];
  private readonly capacity: number;
  private readonly clock: () => Date;
  private sink: LogSink | null;
  private sinkLevel: LogLevel;
  private errors = 0;

  constructor(options: GameLogOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? MAX_LOG_ENTRIES);
    this.sink = options.sink === undefined ? consoleSink : options.sink;
    this.sinkLevel = options.sinkLevel ?? 'info';
    this.clock = options.clock ?? (() => new Date());
  }

  get all(): readonly LogEntry[] {
    return [...this.entries];
  }

  get errorCount() {
    return this.errors;
  }

  entriesAtLevel(minLevel: LogLevel) {
    return this.entries.filter((entry) => LEVEL_ORDER[entry.level] >= LEVEL_ORDER[minLevel]);
  }

  configure({ sink, sinkLevel }: Pick<GameLogOptions, 'sink' | 'sinkLevel'>) {
    if (sink !== undefined) this.sink = sink;
    if (sinkLevel) this.sinkLevel = sinkLevel;
  }

  log(level: LogLevel, category: string, message: string, data?: Record<string, unknown>, error?: unknown) {
    const entry: LogEntry = { timestamp: this.clock(), level, category, message, data, error };
    this.entries.push(entry);
    if (this.entries.length > this.capacity) this.entries.splice(0, this.entries.length - this.capacity);
    if (level === 'error') this.errors += 1;
    if (this.sink && LEVEL_ORDER[level] >= LEVEL_ORDER[this.sinkLevel]) this.sink(entry);
  }

  debug(category: string, message: string, data?: Record<string, unknown>) {
    this.log('debug', category, message, data);
  }

  info(category: string, message: string, data?: Record<string, unknown>) {
    this.log('info', category, message, data);
  }

  warning(category: string, message: string, data?: Record<string, unknown>) {
    this.log('warning', category, message, data);
  }

  error(category: string, message: string, error?: unknown, data?: Record<string, unknown>) {
    this.log('error', category, message, data, error);
  }

  clear() {
    this.entries.length = 0;
    this.errors = 0;
  }

  exportText() {
    return this.entries.map(formatLogEntry).join('\n');
  }
}

export const gameLog = new GameLog({ sink: null });
