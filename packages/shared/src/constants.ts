/** Timeout for a single upstream HTTP call made by a tool (30s) */
export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

export const DEFAULT_USER_AGENT = 'Almanac-Agent/0.1 (compatible; bot)';

/** Default chat model */
export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_MAX_TOKENS = 1_000;
export const DEFAULT_TEMPERATURE = 0.1;

/** Max model calls per agent run before BudgetExceededError */
export const DEFAULT_MAX_ROUNDS = 10;

/** Max error text length kept in log lines */
export const MAX_ERROR_LENGTH = 400;

/** Project name */
export const PROJECT_NAME = 'Almanac';
export const PROJECT_VERSION = '0.1.0';
