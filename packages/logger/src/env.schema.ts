import { z } from 'zod';

// `audit` ranks above error so audit records pass any LOGGER_LOG_LEVEL; the audit transport takes only those
export const logLevelsSchema = {
  audit: 55,
  debug: 20,
  error: 50,
  info: 30,
  trace: 10,
  warn: 40,
} as const;

export type LogLevelName = keyof typeof logLevelsSchema;

const booleanString = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val: string) => val === 'true');

export const loggerEnvSchema = z.object({
  LOGGER_AUDIT_LOG_DIRNAME: z.string().trim().min(1, { message: 'Invalid audit log directory name' }).default('logs'),
  // Off by default: enabling it spawns a pino-roll worker thread
  LOGGER_AUDIT_LOG_ENABLED: booleanString('false'),
  LOGGER_AUDIT_LOG_FILENAME: z.string().trim().min(1, { message: 'Invalid audit log file name' }).default('transfers'),
  LOGGER_AUDIT_LOG_RETENTION_DAYS: z
    .string()
    .default('30')
    .transform((val: string) => parseInt(val, 10))
    .pipe(z.number().int().positive()),
  LOGGER_CONSOLE_ENABLED: booleanString('false'),
  LOGGER_FILE_LOG_ENABLED: booleanString('false'),
  LOGGER_FILE_LOG_FILENAME: z.string().trim().min(1, { message: 'Invalid file log name' }).default('levy.log'),
  LOGGER_LOG_LEVEL: z
    .string()
    .default('info')
    .transform((val: string) => val.toLowerCase())
    .refine((val): val is LogLevelName => Object.keys(logLevelsSchema).includes(val), {
      message: 'Invalid log level',
    }),
  LOGGER_SERVICE_NAME: z.string().default('levy-ledger'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
