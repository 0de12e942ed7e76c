import { DEFAULT_MAX_TOKENS, DEFAULT_MODEL, DEFAULT_TEMPERATURE } from '@almanac/shared';
import type { ToolDefinition } from '@almanac/tools';
import type { AssistantMessage, ChatResponse, ChatRequest, ToolCall, TokenUsage } from '../llm/types.js';
import { buildSystemPrompt } from '../system-prompt/index.js';
import type { Transcript } from './transcript.js';

export type DecisionOutcome =
  | { kind: 'direct_answer'; text: string; message: AssistantMessage; usage?: TokenUsage }
  | { kind: 'tool_requests'; requests: ToolCall[]; message: AssistantMessage; usage?: TokenUsage };

export interface DecideOptions {
  signal?: AbortSignal;
}

/** The model's turn: answer directly, or ask for tool calls */
export interface ModelClient {
  decide(transcript: Transcript, tools: ToolDefinition[], options?: DecideOptions): Promise<DecisionOutcome>;
}

/** Anything that can serve a chat request: a single provider or the provider registry */
export interface ChatBackend {
  chat(request: ChatRequest): Promise<ChatResponse>;
}

export interface ChatModelClientConfig {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Overrides the prompt built from the tool list */
  systemPrompt?: string;
}

export class ChatModelClient implements ModelClient {
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(
    private readonly backend: ChatBackend,
    private readonly config: ChatModelClientConfig = {},
  ) {
    this.model = config.model ?? DEFAULT_MODEL;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
  }

  async decide(transcript: Transcript, tools: ToolDefinition[], options: DecideOptions = {}): Promise<DecisionOutcome> {
    const response = await this.backend.chat({
      model: this.model,
      messages: transcript.messages(),
      system: this.config.systemPrompt ?? buildSystemPrompt({ tools }),
      tools,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      signal: options.signal,
    });
    return toDecision(response);
  }
}

/** Classify a chat response; any tool call makes it a tool request, whatever the stop reason */
export function toDecision(response: ChatResponse): DecisionOutcome {
  const message: AssistantMessage = {
    role: 'assistant',
    content: response.content,
    toolCalls: response.toolCalls,
  };
  if (response.toolCalls.length > 0) {
    return { kind: 'tool_requests', requests: response.toolCalls, message, usage: response.usage };
  }
  return { kind: 'direct_answer', text: response.content, message, usage: response.usage };
}
