import { z } from 'zod';
import { createLogger } from '../logger.js';

const logger = createLogger('config');

const EnvSchema = z.object({
  /** Absent: baselines and events live in memory for the lifetime of the process. */
  DATABASE_URL: z.string().url().optional(),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  SCAN_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  EVENT_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
  TRUSTED_APPS_PATH: z.string().min(1).default('data/trusted-apps.json'),
  APP_CATEGORIES_PATH: z.string().min(1).default('data/app-categories.json'),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

let _config: EnvConfig | null = null;

export function loadConfig(env: Record<string, string | undefined> = process.env): EnvConfig {
  // Blank lines in a .env file mean "unset", not "empty string".
  const defined = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const result = EnvSchema.safeParse(defined);
  if (!result.success) {
    for (const issue of result.error.issues) {
      logger.error({ path: issue.path.join('.') }, issue.message);
    }
    throw new Error('Invalid configuration');
  }
  _config = result.data;
  return _config;
}

export function getConfig(): EnvConfig {
  if (_config === null) {
    return loadConfig();
  }
  return _config;
}
