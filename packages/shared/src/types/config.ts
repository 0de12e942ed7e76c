import { z } from 'zod';
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_MAX_ROUNDS,
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
  DEFAULT_USER_AGENT,
} from '../constants.js';
import { ConfigError } from '../errors.js';
import { formatZodIssues } from '../utils/validation.js';

export const AgentSettings = z.object({
  model: z.string().min(1).default(DEFAULT_MODEL),
  maxTokens: z.coerce.number().int().positive().default(DEFAULT_MAX_TOKENS),
  temperature: z.coerce.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
  maxRounds: z.coerce.number().int().positive().default(DEFAULT_MAX_ROUNDS),
});
export type AgentSettings = z.infer<typeof AgentSettings>;

export const ProviderSettings = z.object({
  openaiApiKey: z.string().optional(),
  openaiBaseUrl: z.string().url().optional(),
  anthropicApiKey: z.string().optional(),
});
export type ProviderSettings = z.infer<typeof ProviderSettings>;

export const HttpSettings = z.object({
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_HTTP_TIMEOUT_MS),
  userAgent: z.string().default(DEFAULT_USER_AGENT),
});
export type HttpSettings = z.infer<typeof HttpSettings>;

export const AlmanacConfig = z.object({
  agent: AgentSettings.default({}),
  providers: ProviderSettings.default({}),
  http: HttpSettings.default({}),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});
export type AlmanacConfig = z.infer<typeof AlmanacConfig>;

/** Parse a config object, throwing ConfigError listing every invalid field */
export function parseConfig(input: unknown): AlmanacConfig {
  const result = AlmanacConfig.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodIssues(result.error)}`, { cause: result.error });
  }
  return result.data;
}

/**
 * Build the configuration from environment variables.
 * Empty strings count as unset so a blank line in .env falls back to the default.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AlmanacConfig {
  const read = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  return parseConfig({
    agent: {
      model: read('ALMANAC_MODEL'),
      maxTokens: read('ALMANAC_MAX_TOKENS'),
      temperature: read('ALMANAC_TEMPERATURE'),
      maxRounds: read('ALMANAC_MAX_ROUNDS'),
    },
    providers: {
      openaiApiKey: read('OPENAI_API_KEY'),
      openaiBaseUrl: read('OPENAI_BASE_URL'),
      anthropicApiKey: read('ANTHROPIC_API_KEY'),
    },
    http: {
      timeoutMs: read('ALMANAC_HTTP_TIMEOUT_MS'),
      userAgent: read('ALMANAC_USER_AGENT'),
    },
    logLevel: read('LOG_LEVEL')?.toLowerCase(),
  });
}
