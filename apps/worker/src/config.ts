/**
 * Worker configuration from the environment
 */
import { z } from 'zod';
import { CONVERSATION_LIMITS } from '@pedibot/shared';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: optionalString,

  ANTHROPIC_API_KEY: z.string().min(1, 'ANTHROPIC_API_KEY is required'),
  ANTHROPIC_MODEL: optionalString,
  STORE_NAME: optionalString,

  WORKER_CONCURRENCY: z.coerce.number().int().positive().optional(),
  SESSION_MESSAGE_CAP: z.coerce.number().int().positive().default(CONVERSATION_LIMITS.DEFAULT_SESSION_MESSAGE_CAP),
  DEFAULT_LOCATION_NAME: optionalString,
  IO_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  REPLY_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  CATALOG_TTL_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
});

export type WorkerEnv = z.infer<typeof EnvSchema>;

export class ConfigError extends Error {
  constructor(
    message: string,
    public issues: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): WorkerEnv {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid worker configuration: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}
