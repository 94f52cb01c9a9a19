import pino, { type Logger } from 'pino';
import { getHostSettings, type LogLevel } from './host-settings';

export type { LogLevel } from './host-settings';

export interface LogOptions {
  meta?: Record<string, unknown>;
}

export interface LoggingConfig {
  level: LogLevel;
  /** Destination file; null writes to stderr. */
  file: string | null;
}

let rootLogger: Logger | null = null;
const namespaceLoggers = new Map<string, Logger>();

function createStderrLogger(level: LogLevel): Logger {
  return pino({ level, base: undefined }, pino.destination({ dest: 2, sync: true }));
}

/** A log file that cannot be opened falls back to stderr. */
function createRootLogger(config: LoggingConfig): Logger {
  if (!config.file) return createStderrLogger(config.level);
  try {
    return pino(
      { level: config.level, base: undefined },
      pino.destination({ dest: config.file, mkdir: true, sync: true }),
    );
  } catch (err) {
    const fallback = createStderrLogger(config.level);
    fallback.warn(
      { logFile: config.file, error: err instanceof Error ? err.message : String(err) },
      'Cannot open log file, logging to stderr',
    );
    return fallback;
  }
}

/** Replaces the active logger. Called once by the host bootstrap. */
export function configureLogging(config: LoggingConfig): void {
  rootLogger = createRootLogger(config);
  namespaceLoggers.clear();
}

function getLogger(namespace: string): Logger {
  let logger = namespaceLoggers.get(namespace);
  if (!logger) {
    if (!rootLogger) {
      const settings = getHostSettings();
      rootLogger = createRootLogger({ level: settings.logLevel, file: settings.logFile });
    }
    logger = rootLogger.child({ ns: namespace });
    namespaceLoggers.set(namespace, logger);
  }
  return logger;
}

export function appLog(namespace: string, level: LogLevel, message: string, opts?: LogOptions): void {
  const logger = getLogger(namespace);
  if (opts?.meta) {
    logger[level](opts.meta, message);
  } else {
    logger[level](message);
  }
}
