import { z } from 'zod';
import { ConfigError } from '../../domain/index.js';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Environment variables read at startup. Command-line options override them.
 *
 * - `LOG_LEVEL`: pino level, default `info`.
 * - `CB_VOCABULARY_PATH`: alternative vocabulary JSON file.
 * - `CB_OUTPUT_DIR`: directory for CSV output, default current directory.
 */
export const runtimeEnvSchema = z.object({
  LOG_LEVEL: logLevelSchema.default('info'),
  CB_VOCABULARY_PATH: z.string().min(1).optional(),
  CB_OUTPUT_DIR: z.string().min(1).default('.'),
});

export interface RuntimeConfig {
  readonly logLevel: LogLevel;
  readonly vocabularyPath: string | undefined;
  readonly outputDir: string;
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = runtimeEnvSchema.safeParse({
    LOG_LEVEL: env['LOG_LEVEL'] || undefined,
    CB_VOCABULARY_PATH: env['CB_VOCABULARY_PATH'] || undefined,
    CB_OUTPUT_DIR: env['CB_OUTPUT_DIR'] || undefined,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`, 'env', parsed.error);
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    vocabularyPath: parsed.data.CB_VOCABULARY_PATH,
    outputDir: parsed.data.CB_OUTPUT_DIR,
  };
}

/** Validates a `--log-level` option value. */
export function parseLogLevel(value: string): LogLevel {
  const parsed = logLevelSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`Invalid log level "${value}", expected one of: ${logLevelSchema.options.join(', ')}`, 'cli');
  }
  return parsed.data;
}
