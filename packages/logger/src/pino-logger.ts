import os from 'node:os';
import { Writable } from 'node:stream';

import pino from 'pino';

import { logLevelsSchema, validateLoggerEnv, type LoggerEnvConfig, type LogLevelName } from './env.schema.js';

/**
 * Category logger with the custom `audit` level used for committed-transfer records.
 */
export type Logger = pino.Logger<'audit'>;

export interface LoggerOverrides {
  /** Write every record to this stream instead of the configured transports */
  destination?: pino.DestinationStream | undefined;
  level?: LogLevelName | undefined;
  console?: boolean | undefined;
  file?: boolean | undefined;
}

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

let env: LoggerEnvConfig = validateLoggerEnv(process.env);
let overrides: LoggerOverrides = {};
let rootLogger: Logger | undefined;
const loggerCache = new Map<string, Logger>();

/**
 * Pads or truncates a category to a fixed width so pretty output lines up.
 * Long categories keep their tail, prefixed with an ellipsis.
 */
function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

function isTestEnvironment(): boolean {
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

/**
 * Transport targets for the given settings. Console output goes to stderr so
 * stdout stays free for command output such as `--json` responses.
 */
export function buildTransportTargets(config: LoggerEnvConfig, settings: LoggerOverrides = {}): TransportTarget[] {
  const targets: TransportTarget[] = [];
  const consoleEnabled = settings.console ?? config.LOGGER_CONSOLE_ENABLED;
  const fileEnabled = settings.file ?? config.LOGGER_FILE_LOG_ENABLED;

  if (consoleEnabled) {
    if (config.NODE_ENV === 'development') {
      targets.push({
        level: 'trace',
        options: { destination: 2, ignore: 'pid,hostname,category,categoryLabel,service,environment' },
        target: 'pino-pretty',
      });
    } else {
      targets.push({ level: 'trace', options: { destination: 2 }, target: 'pino/file' });
    }
  }

  if (fileEnabled) {
    targets.push({
      level: 'trace',
      options: { destination: `./${config.LOGGER_AUDIT_LOG_DIRNAME}/${config.LOGGER_FILE_LOG_FILENAME}`, mkdir: true },
      target: 'pino/file',
    });
  }

  if (config.LOGGER_AUDIT_LOG_ENABLED) {
    targets.push({
      level: 'audit',
      options: {
        file: `./${config.LOGGER_AUDIT_LOG_DIRNAME}/${config.LOGGER_AUDIT_LOG_FILENAME}_${os.hostname()}.log`,
        frequency: 'daily',
        limit: { count: config.LOGGER_AUDIT_LOG_RETENTION_DAYS },
        mkdir: true,
        size: '10m',
      },
      target: 'pino-roll',
    });
  }

  return targets;
}

function silentStream(): Writable {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
}

function createRootLogger(): Logger {
  const config: pino.LoggerOptions<'audit'> = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    customLevels: logLevelsSchema,
    level: overrides.level ?? env.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    useOnlyCustomLevels: true,
  };

  if (overrides.destination) {
    return pino<'audit'>(config, overrides.destination);
  }

  // Under test, swallow output entirely so no transport worker threads are spawned
  if (isTestEnvironment()) {
    return pino<'audit'>(config, silentStream());
  }

  const targets = buildTransportTargets(env, overrides);
  // pino's fallback with no destination is stdout; no enabled target means no output
  if (targets.length === 0) {
    return pino<'audit'>(config, silentStream());
  }
  config.transport = { targets };
  return pino<'audit'>(config);
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 25),
  });
  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Returns a category logger that follows later reconfiguration.
 *
 * Modules create their loggers at top level, before the CLI has parsed its
 * flags, so the returned Proxy resolves the current pino child on every access.
 */
export const getLogger = (category: string): Logger => {
  return new Proxy({} as Logger, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop, logger);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
};

/**
 * Replace transport settings at runtime. Cached loggers are dropped so the new
 * configuration applies to every category immediately.
 */
export function configureLogger(next: LoggerOverrides): void {
  overrides = { ...overrides, ...next };
  rootLogger = undefined;
  loggerCache.clear();
}

/**
 * Re-read LOGGER_* variables and clear overrides.
 */
export function resetLogger(source: NodeJS.ProcessEnv = process.env): void {
  env = validateLoggerEnv(source);
  overrides = {};
  rootLogger = undefined;
  loggerCache.clear();
}
