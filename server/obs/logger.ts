import type { AppConfig } from '../../shared/config';

export type LogLevel = AppConfig['observability']['logLevel'];
export type LogMeta = Record<string, unknown>;

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
}

/** Receives one serialized JSON line per record. */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  /* eslint-disable no-console */
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
  /* eslint-enable no-console */
};

export interface LoggerOptions {
  sink?: LogSink;
  now?: () => Date;
  /** Fields stamped onto every record. */
  bindings?: LogMeta;
}

export const createLogger = (config: Pick<AppConfig, 'observability'>, options: LoggerOptions = {}): Logger => {
  const sink = options.sink ?? consoleSink;
  const now = options.now ?? (() => new Date());
  const bindings = options.bindings ?? {};
  const threshold = levelWeights[config.observability.logLevel];

  const write = (level: LogLevel, message: string, meta?: LogMeta) => {
    // errors always go out, whatever the threshold
    if (level !== 'error' && levelWeights[level] < threshold) {
      return;
    }
    sink(level, JSON.stringify({ level, message, ts: now().toISOString(), ...bindings, ...meta }));
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
};

/**
 * Wraps a logger so every record carries `bindings`. Per-call meta wins on
 * key clashes.
 */
export const withContext = (logger: Logger, bindings: LogMeta): Logger => ({
  debug: (message, meta) => logger.debug(message, { ...bindings, ...meta }),
  info: (message, meta) => logger.info(message, { ...bindings, ...meta }),
  warn: (message, meta) => logger.warn(message, { ...bindings, ...meta }),
  error: (message, meta) => logger.error(message, { ...bindings, ...meta }),
});

export const createNoopLogger = (): Logger => ({
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
});

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));
