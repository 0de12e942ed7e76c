/**
 * @almanac/agent-runtime - Agent execution engine
 *
 * Drives the Deciding/Executing loop between a language model and the
 * lookup tools.
 */

export { Agent, type AgentConfig, type AgentEvent, type RunOptions, type RunResult } from './engine/agent.js';
export { Transcript } from './engine/transcript.js';
export {
  ChatModelClient, toDecision,
  type ModelClient, type DecisionOutcome, type DecideOptions, type ChatBackend, type ChatModelClientConfig,
} from './engine/decision.js';
export { buildSystemPrompt, type PromptContext } from './system-prompt/index.js';

// LLM
export {
  ProviderRegistry, type ProviderRegistryConfig,
  AnthropicProvider, OpenAIProvider, ANTHROPIC_API_URL, OPENAI_BASE_URL,
  type LLMProvider, type ChatRequest, type ChatResponse, type StopReason,
  type Message, type UserMessage, type AssistantMessage, type ToolResultMessage, type ToolCall,
  type ToolDefinition, type TokenUsage, type ModelInfo, type UsageAccumulator,
  createUsageAccumulator, mergeUsage,
} from './llm/index.js';
