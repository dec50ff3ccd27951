import { z } from 'zod';
import { ConfigurationError } from '@tutorbot/shared';
import { DEFAULT_COMPLETION_CONCURRENCY, DEFAULT_COMPLETION_TIMEOUT_MS } from '@tutorbot/tutor';

// Empty strings count as unset, the way `.env` templates leave them
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema);

const required = (name: string) =>
  z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

const envSchema = z.object({
  TELEGRAM_TOKEN: required('TELEGRAM_TOKEN'),
  OPENROUTER_API_KEY: required('OPENROUTER_API_KEY'),
  OPENROUTER_BASE_URL: optional(z.string().url().default('https://openrouter.ai/api/v1')),
  OPENROUTER_MODEL: optional(z.string().min(1).default('google/gemini-2.0-flash-001')),
  COMPLETION_TIMEOUT_MS: optional(
    z.coerce.number().int().positive().default(DEFAULT_COMPLETION_TIMEOUT_MS)
  ),
  COMPLETION_CONCURRENCY: optional(
    z.coerce.number().int().positive().default(DEFAULT_COMPLETION_CONCURRENCY)
  ),
  HEALTH_PORT: optional(z.coerce.number().int().min(0).max(65535).default(47319)),
  HEALTH_LOG_INTERVAL_MS: optional(z.coerce.number().int().positive().default(30 * 60 * 1000)),
  STARTUP_DELAY_MS: optional(z.coerce.number().int().min(0).default(10000)),
});

export interface BotConfig {
  telegramToken: string;
  openRouter: {
    apiKey: string;
    baseURL: string;
    model: string;
  };
  completion: {
    timeoutMs: number;
    concurrency: number;
  };
  /** 0 disables the health endpoint */
  healthPort: number;
  healthLogIntervalMs: number;
  startupDelayMs: number;
}

/**
 * Validate the process environment into a typed config.
 * Throws ConfigurationError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const problems = result.error.issues.map((issue) =>
      issue.message.includes(String(issue.path[0]))
        ? issue.message
        : `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, {
      variables: result.error.issues.map((issue) => issue.path.join('.')),
    });
  }

  const vars = result.data;
  return {
    telegramToken: vars.TELEGRAM_TOKEN,
    openRouter: {
      apiKey: vars.OPENROUTER_API_KEY,
      baseURL: vars.OPENROUTER_BASE_URL,
      model: vars.OPENROUTER_MODEL,
    },
    completion: {
      timeoutMs: vars.COMPLETION_TIMEOUT_MS,
      concurrency: vars.COMPLETION_CONCURRENCY,
    },
    healthPort: vars.HEALTH_PORT,
    healthLogIntervalMs: vars.HEALTH_LOG_INTERVAL_MS,
    startupDelayMs: vars.STARTUP_DELAY_MS,
  };
}
