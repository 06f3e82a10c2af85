export { getLogger, configureLogger, resetLogger, type Logger, type LoggerOverrides } from './pino-logger.js';
export { logLevelsSchema, validateLoggerEnv, type LogLevelName, type LoggerEnvConfig } from './env.schema.js';
