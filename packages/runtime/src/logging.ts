// Structured logging for registry operations

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

/**
 * Structured logger interface.
 * The registry only ever calls these four methods.
 */
export type RegistryLogger = {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type ConsoleLoggerOptions = {
  /** Entries below this level are dropped (default: 'info') */
  minLevel?: LogLevel;
  /** Prefix written before the level tag (default: 'lineage') */
  prefix?: string;
};

/**
 * Console logger with a level threshold.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): RegistryLogger {
  const minLevel = options.minLevel ?? 'info';
  const prefix = options.prefix ?? 'lineage';

  const write =
    (level: LogLevel, sink: (...args: unknown[]) => void) => (message: string, data?: LogData) => {
      if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
      sink(`[${prefix}] [${level.toUpperCase()}] ${message}`, data ?? '');
    };

  return {
    debug: write('debug', console.debug),
    info: write('info', console.info),
    warn: write('warn', console.warn),
    error: write('error', console.error),
  };
}

export const consoleLogger: RegistryLogger = createConsoleLogger();

/**
 * Silent logger for testing
 */
export const silentLogger: RegistryLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Wrap a logger so every entry carries the given context fields.
 * Fields passed per call win over the bound context.
 */
export function withLogContext(logger: RegistryLogger, context: LogData): RegistryLogger {
  const bind = (level: LogLevel) => (message: string, data?: LogData) =>
    logger[level](message, { ...context, ...data });

  return {
    debug: bind('debug'),
    info: bind('info'),
    warn: bind('warn'),
    error: bind('error'),
  };
}

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: LogData;
  timestamp: string;
};

/**
 * Logger that keeps entries in memory for inspection.
 */
export function createCapturingLogger(): RegistryLogger & {
  entries: LogEntry[];
  at(level: LogLevel): LogEntry[];
} {
  const entries: LogEntry[] = [];

  const log = (level: LogLevel) => (message: string, data?: LogData) => {
    entries.push({ level, message, data, timestamp: new Date().toISOString() });
  };

  return {
    entries,
    at: (level) => entries.filter((entry) => entry.level === level),
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
