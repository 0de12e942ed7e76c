/**
 * Demonstration entry point: answers one question and prints the answer.
 *
 * Usage:
 *   tsx packages/agent-runtime/src/cli.ts "How tall is the Eiffel Tower in feet?"
 *   npm run demo
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createLogger, errorMessage, isAlmanacError, loadConfigFromEnv, setLogLevel, PROJECT_NAME, PROJECT_VERSION } from '@almanac/shared';
import { createToolRegistry } from '@almanac/tools';
import { ProviderRegistry } from './llm/provider-registry.js';
import { ChatModelClient } from './engine/decision.js';
import { Agent } from './engine/agent.js';

const DEFAULT_QUERY = 'What is the current weather in London?';

const log = createLogger('cli');

/**
 * Load .env from the repository root, filling in only values that are
 * missing or empty in the shell environment.
 */
function loadDotenv(): void {
  const here = dirname(fileURLToPath(import.meta.url));
  const envPath = process.env['DOTENV_CONFIG_PATH'] ?? resolve(here, '..', '..', '..', '.env');
  const parsed = dotenvConfig({ path: envPath, processEnv: {} }).parsed ?? {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!process.env[key] || process.env[key] === '') {
      process.env[key] = value;
    }
  }
}

async function main(): Promise<void> {
  loadDotenv();
  const config = loadConfigFromEnv();
  setLogLevel(config.logLevel);

  log.info(`=== ${PROJECT_NAME} ${PROJECT_VERSION} ===`);
  log.info(`Model: ${config.agent.model} (max ${config.agent.maxRounds} rounds)`);

  const providers = new ProviderRegistry({
    openaiApiKey: config.providers.openaiApiKey,
    openaiBaseUrl: config.providers.openaiBaseUrl,
    anthropicApiKey: config.providers.anthropicApiKey,
    defaultModel: config.agent.model,
  });
  const client = new ChatModelClient(providers, {
    model: config.agent.model,
    maxTokens: config.agent.maxTokens,
    temperature: config.agent.temperature,
  });
  const agent = new Agent({
    client,
    tools: createToolRegistry({ http: config.http }),
    maxRounds: config.agent.maxRounds,
  });

  const query = process.argv.slice(2).join(' ').trim() || DEFAULT_QUERY;
  log.info(`Query: ${query}`);

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new Error('Interrupted')));

  const answer = await agent.run(query, { signal: controller.signal });
  process.stdout.write(`${answer}\n`);
}

main().catch((err: unknown) => {
  const code = isAlmanacError(err) ? ` [${err.code}]` : '';
  log.error(`Run failed${code}: ${errorMessage(err)}`);
  process.exitCode = 1;
});
