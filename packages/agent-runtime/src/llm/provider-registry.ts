import { ProviderError, createLogger } from '@almanac/shared';
import type { LLMProvider, ChatRequest, ChatResponse } from './types.js';
import { AnthropicProvider } from './providers/anthropic.js';
import { OpenAIProvider } from './providers/openai.js';

const log = createLogger('llm:registry');

export interface ProviderRegistryConfig {
  anthropicApiKey?: string;
  openaiApiKey?: string;
  /** Any OpenAI-compatible chat completions endpoint */
  openaiBaseUrl?: string;
  defaultModel?: string;
}

/**
 * ProviderRegistry - Central registry for the configured LLM providers.
 * Resolves which provider serves a model ID.
 */
export class ProviderRegistry {
  private providers = new Map<string, LLMProvider>();
  private modelProviderMap = new Map<string, string>(); // modelId -> providerId
  private defaultModel: string;

  constructor(config: ProviderRegistryConfig) {
    this.defaultModel = config.defaultModel ?? 'gpt-4o-mini';

    // Initialize providers based on available keys
    if (config.openaiApiKey) {
      this.registerProvider(new OpenAIProvider(config.openaiApiKey, config.openaiBaseUrl));
    }
    if (config.anthropicApiKey) {
      this.registerProvider(new AnthropicProvider(config.anthropicApiKey));
    }

    log.info(`Initialized with ${this.providers.size} providers`);
  }

  registerProvider(provider: LLMProvider): void {
    this.providers.set(provider.id, provider);
    for (const model of provider.listModels()) {
      this.modelProviderMap.set(model.id, provider.id);
    }
    log.debug(`Registered provider: ${provider.name} (${provider.id})`);
  }

  /** Resolve provider for a given model ID */
  resolveProvider(modelId: string): LLMProvider | undefined {
    const providerId = this.modelProviderMap.get(modelId);
    if (providerId) return this.providers.get(providerId);

    // Heuristic: guess provider from model name
    if (modelId.startsWith('claude-')) return this.providers.get('anthropic');
    if (modelId.startsWith('gpt-') || modelId.startsWith('o1') || modelId.startsWith('o3') || modelId.startsWith('o4')) return this.providers.get('openai');

    // An OpenAI-compatible endpoint may serve models we have never heard of
    return this.providers.get('openai');
  }

  /** Send chat request, auto-resolving provider from model ID */
  async chat(request: ChatRequest): Promise<ChatResponse> {
    const model = request.model || this.defaultModel;
    const provider = this.resolveProvider(model);
    if (!provider) throw new ProviderError(`No provider found for model: ${model}`);
    if (!provider.isAvailable()) throw new ProviderError(`Provider ${provider.id} is not available`, provider.id);

    return provider.chat({ ...request, model });
  }
}
