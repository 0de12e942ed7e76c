import { z } from 'zod';
import { ProviderError, createLogger, formatZodIssues } from '@almanac/shared';
import type {
  LLMProvider, ChatRequest, ChatResponse, ModelInfo, Message, ToolCall,
} from '../types.js';
import { postJson } from './request.js';

const log = createLogger('llm:anthropic');

export const ANTHROPIC_API_URL = 'https://api.anthropic.com/v1/messages';
const ANTHROPIC_VERSION = '2023-06-01';
/** Default max tokens if not specified in request */
const DEFAULT_MAX_TOKENS = 1024;

const MODELS: ModelInfo[] = [
  { id: 'claude-sonnet-4-5', name: 'Claude Sonnet 4.5', provider: 'anthropic', contextWindow: 200000, maxOutputTokens: 64000, supportsTools: true },
  { id: 'claude-haiku-4-5', name: 'Claude Haiku 4.5', provider: 'anthropic', contextWindow: 200000, maxOutputTokens: 64000, supportsTools: true },
  { id: 'claude-3-5-haiku-latest', name: 'Claude 3.5 Haiku', provider: 'anthropic', contextWindow: 200000, maxOutputTokens: 8192, supportsTools: true },
];

const AnthropicResponse = z.object({
  content: z.array(
    z.discriminatedUnion('type', [
      z.object({ type: z.literal('text'), text: z.string() }),
      z.object({
        type: z.literal('tool_use'),
        id: z.string(),
        name: z.string(),
        input: z.record(z.unknown()).default({}),
      }),
      z.object({ type: z.literal('thinking'), thinking: z.string().optional() }),
    ]),
  ),
  stop_reason: z.string().nullish(),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
  model: z.string().optional(),
});

type AnthropicBlock = Record<string, unknown>;

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string | AnthropicBlock[];
}

export class AnthropicProvider implements LLMProvider {
  readonly id = 'anthropic';
  readonly name = 'Anthropic';

  constructor(
    private apiKey: string,
    private baseUrl: string = ANTHROPIC_API_URL,
  ) {}

  isAvailable(): boolean {
    return !!this.apiKey;
  }

  listModels(): ModelInfo[] {
    return MODELS;
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    const data = await postJson(this.id, 'Anthropic', this.baseUrl, this.buildRequestBody(request), {
      headers: this.getHeaders(),
      signal: request.signal,
    });
    return this.parseResponse(data);
  }

  private getHeaders(): Record<string, string> {
    if (!this.apiKey) throw new ProviderError('Anthropic API key not configured', this.id);
    return {
      'Content-Type': 'application/json',
      'anthropic-version': ANTHROPIC_VERSION,
      'x-api-key': this.apiKey,
    };
  }

  buildRequestBody(request: ChatRequest): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: request.model,
      messages: this.convertMessages(request.messages),
      max_tokens: request.max_tokens ?? DEFAULT_MAX_TOKENS,
    };

    if (request.system) {
      body['system'] = request.system;
    }

    if (request.temperature !== undefined) {
      body['temperature'] = request.temperature;
    }

    if (request.tools && request.tools.length > 0) {
      body['tools'] = request.tools.map((t) => ({
        name: t.name,
        description: t.description,
        input_schema: t.input_schema,
      }));
    }

    return body;
  }

  /** Tool results travel as tool_result blocks in a user turn; consecutive ones share that turn. */
  private convertMessages(messages: Message[]): AnthropicMessage[] {
    const out: AnthropicMessage[] = [];

    for (const msg of messages) {
      switch (msg.role) {
        case 'user':
          out.push({ role: 'user', content: msg.content });
          break;

        case 'assistant': {
          if (msg.toolCalls.length === 0) {
            out.push({ role: 'assistant', content: msg.content });
            break;
          }
          const blocks: AnthropicBlock[] = [];
          if (msg.content) blocks.push({ type: 'text', text: msg.content });
          for (const tc of msg.toolCalls) {
            blocks.push({ type: 'tool_use', id: tc.id, name: tc.name, input: tc.input });
          }
          out.push({ role: 'assistant', content: blocks });
          break;
        }

        case 'tool': {
          const block: AnthropicBlock = {
            type: 'tool_result',
            tool_use_id: msg.toolCallId,
            content: msg.content,
            is_error: msg.isError,
          };
          const last = out[out.length - 1];
          if (last && last.role === 'user' && Array.isArray(last.content)) {
            last.content.push(block);
          } else {
            out.push({ role: 'user', content: [block] });
          }
          break;
        }
      }
    }

    return out;
  }

  parseResponse(data: unknown): ChatResponse {
    const parsed = AnthropicResponse.safeParse(data);
    if (!parsed.success) {
      log.error('Malformed messages response', { issues: formatZodIssues(parsed.error) });
      throw new ProviderError(`Invalid Anthropic response: ${formatZodIssues(parsed.error)}`, this.id);
    }

    const { content, stop_reason, usage, model } = parsed.data;
    const text: string[] = [];
    const toolCalls: ToolCall[] = [];
    for (const block of content) {
      if (block.type === 'text') text.push(block.text);
      else if (block.type === 'tool_use') toolCalls.push({ id: block.id, name: block.name, input: block.input });
    }

    const inputTokens = usage?.input_tokens ?? 0;
    const outputTokens = usage?.output_tokens ?? 0;
    return {
      content: text.join(''),
      toolCalls,
      stopReason: toolCalls.length > 0 ? 'tool_use' : mapStopReason(stop_reason),
      usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens },
      model: model ?? '',
    };
  }
}

function mapStopReason(reason?: string | null): ChatResponse['stopReason'] {
  switch (reason) {
    case 'end_turn': return 'end_turn';
    case 'tool_use': return 'tool_use';
    case 'max_tokens': return 'max_tokens';
    case 'stop_sequence': return 'stop_sequence';
    default: return 'end_turn';
  }
}
