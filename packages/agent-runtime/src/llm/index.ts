export type {
  LLMProvider, ChatRequest, ChatResponse, StopReason,
  Message, UserMessage, AssistantMessage, ToolResultMessage, ToolCall,
  ToolDefinition, TokenUsage, ModelInfo, UsageAccumulator,
} from './types.js';
export { createUsageAccumulator, mergeUsage } from './types.js';
export { ProviderRegistry, type ProviderRegistryConfig } from './provider-registry.js';
export { AnthropicProvider, ANTHROPIC_API_URL } from './providers/anthropic.js';
export { OpenAIProvider, OPENAI_BASE_URL } from './providers/openai.js';
