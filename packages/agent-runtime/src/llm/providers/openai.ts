import { z } from 'zod';
import { ProviderError, createLogger, formatZodIssues } from '@almanac/shared';
import type {
  LLMProvider, ChatRequest, ChatResponse, ModelInfo, Message, ToolCall,
} from '../types.js';
import { postJson, parseToolArguments } from './request.js';

const log = createLogger('llm:openai');

export const OPENAI_BASE_URL = 'https://api.openai.com/v1';

const MODELS: ModelInfo[] = [
  { id: 'gpt-4o-mini', name: 'GPT-4o mini', provider: 'openai', contextWindow: 128000, maxOutputTokens: 16384, supportsTools: true },
  { id: 'gpt-4o', name: 'GPT-4o', provider: 'openai', contextWindow: 128000, maxOutputTokens: 16384, supportsTools: true },
  { id: 'gpt-4.1-mini', name: 'GPT-4.1 mini', provider: 'openai', contextWindow: 1047576, maxOutputTokens: 32768, supportsTools: true },
  { id: 'gpt-3.5-turbo', name: 'GPT-3.5 Turbo', provider: 'openai', contextWindow: 16385, maxOutputTokens: 4096, supportsTools: true },
];

const OpenAIResponse = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({
                  name: z.string(),
                  arguments: z.string().optional(),
                }),
              }),
            )
            .nullish(),
        }),
        finish_reason: z.string().nullish(),
      }),
    )
    .min(1, 'missing or empty choices array'),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
  model: z.string().optional(),
});

export class OpenAIProvider implements LLMProvider {
  readonly id = 'openai';
  readonly name = 'OpenAI';

  constructor(
    private apiKey: string,
    private baseUrl: string = OPENAI_BASE_URL,
  ) {}

  isAvailable(): boolean {
    return !!this.apiKey;
  }

  listModels(): ModelInfo[] {
    return MODELS;
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    const url = `${this.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    const data = await postJson(this.id, 'OpenAI', url, this.buildRequestBody(request), {
      headers: this.getHeaders(),
      signal: request.signal,
    });
    return this.parseResponse(data);
  }

  private getHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      'Authorization': `Bearer ${this.apiKey}`,
    };
  }

  buildRequestBody(request: ChatRequest): Record<string, unknown> {
    const messages: Record<string, unknown>[] = request.messages.map((m) => this.convertMessage(m));
    if (request.system) {
      messages.unshift({ role: 'system', content: request.system });
    }

    const body: Record<string, unknown> = {
      model: request.model,
      messages,
    };

    if (request.max_tokens) body['max_tokens'] = request.max_tokens;
    if (request.temperature !== undefined) body['temperature'] = request.temperature;

    if (request.tools && request.tools.length > 0) {
      body['tools'] = request.tools.map((t) => ({
        type: 'function',
        function: {
          name: t.name,
          description: t.description,
          parameters: t.input_schema,
        },
      }));
      body['tool_choice'] = 'auto';
    }

    return body;
  }

  private convertMessage(msg: Message): Record<string, unknown> {
    switch (msg.role) {
      case 'user':
        return { role: 'user', content: msg.content };

      case 'assistant':
        if (msg.toolCalls.length === 0) {
          return { role: 'assistant', content: msg.content };
        }
        return {
          role: 'assistant',
          content: msg.content || null,
          tool_calls: msg.toolCalls.map((tc) => ({
            id: tc.id,
            type: 'function',
            function: {
              name: tc.name,
              arguments: JSON.stringify(tc.input),
            },
          })),
        };

      // OpenAI requires a separate { role: 'tool' } message for EACH tool result
      case 'tool':
        return { role: 'tool', tool_call_id: msg.toolCallId, content: msg.content };
    }
  }

  parseResponse(data: unknown): ChatResponse {
    const parsed = OpenAIResponse.safeParse(data);
    if (!parsed.success) {
      log.error('Malformed chat completion', { issues: formatZodIssues(parsed.error) });
      throw new ProviderError(`Invalid OpenAI response: ${formatZodIssues(parsed.error)}`, this.id);
    }

    const { choices, usage, model } = parsed.data;
    const choice = choices[0];
    const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map((tc) => ({
      id: tc.id,
      name: tc.function.name,
      input: parseToolArguments(tc.function.arguments),
    }));

    return {
      content: choice.message.content ?? '',
      toolCalls,
      stopReason: toolCalls.length > 0 ? 'tool_use' : mapFinishReason(choice.finish_reason),
      usage: {
        inputTokens: usage?.prompt_tokens ?? 0,
        outputTokens: usage?.completion_tokens ?? 0,
        totalTokens: usage?.total_tokens ?? 0,
      },
      model: model ?? '',
    };
  }
}

function mapFinishReason(reason?: string | null): ChatResponse['stopReason'] {
  switch (reason) {
    case 'stop': return 'end_turn';
    case 'tool_calls': return 'tool_use';
    case 'length': return 'max_tokens';
    default: return 'end_turn';
  }
}
