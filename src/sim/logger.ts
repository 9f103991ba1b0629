import winston from 'winston';
import { z } from 'zod';

const LogEnvSchema = z.object({
  GO_KERNEL_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'silly']).default('warn'),
  GO_KERNEL_LOG_FORMAT: z.enum(['text', 'json']).default('text'),
});

export type LogEnv = z.infer<typeof LogEnvSchema>;

export const parseLogEnv = (env: Readonly<Record<string, string | undefined>>): LogEnv => LogEnvSchema.parse(env);

const textFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta, bigintReplacer)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
  }),
);

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json({ replacer: bigintReplacer }),
);

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export const createSimLogger = (env: LogEnv): winston.Logger =>
  winston.createLogger({
    level: env.GO_KERNEL_LOG_LEVEL,
    defaultMeta: { service: 'go-kernel-sim' },
    format: env.GO_KERNEL_LOG_FORMAT === 'json' ? jsonFormat : textFormat,
    transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'debug', 'silly'] })],
  });

const DEFAULT_LOG_ENV: LogEnv = LogEnvSchema.parse({});

/**
 * Logger for the given environment. Unusable settings fall back to the
 * defaults and are reported once through the resulting logger.
 */
export const resolveSimLogger = (env: Readonly<Record<string, string | undefined>>): winston.Logger => {
  const parsed = LogEnvSchema.safeParse(env);
  if (parsed.success) {
    return createSimLogger(parsed.data);
  }

  const fallback = createSimLogger(DEFAULT_LOG_ENV);
  fallback.warn('ignoring invalid logger environment', {
    issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  });
  return fallback;
};

let processLogger: winston.Logger | undefined;

/** Process-wide logger, built from `process.env` on first use. */
export const getSimLogger = (): winston.Logger => {
  if (processLogger === undefined) {
    processLogger = resolveSimLogger(process.env);
  }
  return processLogger;
};
