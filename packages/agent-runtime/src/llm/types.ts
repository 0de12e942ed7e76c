/**
 * Core LLM types: the transcript the agent owns and the provider contract.
 */

import type { ToolDefinition } from '@almanac/tools';

export type { ToolDefinition };

/** A model-issued request to run one tool */
export interface ToolCall {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface UserMessage {
  role: 'user';
  content: string;
}

export interface AssistantMessage {
  role: 'assistant';
  content: string;
  /** Empty when the model answered directly */
  toolCalls: ToolCall[];
}

export interface ToolResultMessage {
  role: 'tool';
  toolCallId: string;
  /** Tool that produced the result */
  name: string;
  content: string;
  isError: boolean;
}

export type Message = UserMessage | AssistantMessage | ToolResultMessage;

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens' | 'stop_sequence';

export interface ChatRequest {
  model: string;
  messages: Message[];
  system?: string;
  tools?: ToolDefinition[];
  temperature?: number;
  max_tokens?: number;
  signal?: AbortSignal;
}

export interface ChatResponse {
  content: string;
  toolCalls: ToolCall[];
  stopReason: StopReason;
  usage: TokenUsage;
  model: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface ModelInfo {
  id: string;
  name: string;
  provider: string;
  contextWindow: number;
  maxOutputTokens: number;
  supportsTools: boolean;
}

export interface LLMProvider {
  id: string;
  name: string;

  /** Send a chat request and get a complete response */
  chat(request: ChatRequest): Promise<ChatResponse>;

  /** List known models */
  listModels(): ModelInfo[];

  /** Check if provider is available (has API key etc.) */
  isAvailable(): boolean;
}

/** Usage accumulator for tracking tokens across the calls of one run */
export interface UsageAccumulator {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  callCount: number;
}

export function createUsageAccumulator(): UsageAccumulator {
  return {
    inputTokens: 0,
    outputTokens: 0,
    totalTokens: 0,
    callCount: 0,
  };
}

export function mergeUsage(acc: UsageAccumulator, usage: TokenUsage): void {
  acc.inputTokens += usage.inputTokens;
  acc.outputTokens += usage.outputTokens;
  acc.totalTokens += usage.totalTokens;
  acc.callCount++;
}
