import { describe, it, expect, vi } from 'vitest';
import { createToolRegistry } from '@almanac/tools';
import { ChatModelClient, toDecision } from '../engine/decision.js';
import { Transcript } from '../engine/transcript.js';
import { buildSystemPrompt } from '../system-prompt/index.js';
import type { ChatRequest, ChatResponse } from '../llm/types.js';

const USAGE = { inputTokens: 12, outputTokens: 4, totalTokens: 16 };

function response(overrides: Partial<ChatResponse> = {}): ChatResponse {
  return { content: '', toolCalls: [], stopReason: 'end_turn', usage: USAGE, model: 'gpt-4o-mini', ...overrides };
}

describe('ChatModelClient', () => {
  it('sends the transcript, tools and sampling settings', async () => {
    const chat = vi.fn(async (_request: ChatRequest) => response({ content: 'Hello!' }));
    const client = new ChatModelClient({ chat }, { model: 'gpt-4o', maxTokens: 256, temperature: 0 });
    const tools = createToolRegistry().getDefinitions();
    const transcript = new Transcript([{ role: 'user', content: 'Hi' }]);
    const controller = new AbortController();

    await client.decide(transcript, tools, { signal: controller.signal });

    expect(chat).toHaveBeenCalledWith({
      model: 'gpt-4o',
      messages: [{ role: 'user', content: 'Hi' }],
      system: buildSystemPrompt({ tools }),
      tools,
      max_tokens: 256,
      temperature: 0,
      signal: controller.signal,
    });
  });

  it('falls back to the default model settings', async () => {
    const chat = vi.fn(async (_request: ChatRequest) => response({ content: 'ok' }));
    const client = new ChatModelClient({ chat });

    await client.decide(new Transcript([{ role: 'user', content: 'Hi' }]), []);

    const request = chat.mock.calls[0][0];
    expect(request.model).toBe('gpt-4o-mini');
    expect(request.max_tokens).toBe(1000);
    expect(request.temperature).toBe(0.1);
  });

  it('uses a configured system prompt verbatim', async () => {
    const chat = vi.fn(async (_request: ChatRequest) => response());
    const client = new ChatModelClient({ chat }, { systemPrompt: 'Answer in French.' });

    await client.decide(new Transcript(), []);

    expect(chat.mock.calls[0][0].system).toBe('Answer in French.');
  });
});

describe('toDecision', () => {
  it('classifies a reply without tool calls as a direct answer', () => {
    expect(toDecision(response({ content: 'It is 15.5°C.' }))).toEqual({
      kind: 'direct_answer',
      text: 'It is 15.5°C.',
      message: { role: 'assistant', content: 'It is 15.5°C.', toolCalls: [] },
      usage: USAGE,
    });
  });

  it('classifies any tool call as a tool request regardless of stop reason', () => {
    const toolCalls = [{ id: 'call_1', name: 'calculate', input: { expression: '1 + 1' } }];
    const decision = toDecision(response({ content: 'Let me compute.', toolCalls, stopReason: 'end_turn' }));

    expect(decision.kind).toBe('tool_requests');
    expect(decision.kind === 'tool_requests' && decision.requests).toEqual(toolCalls);
    expect(decision.message).toEqual({ role: 'assistant', content: 'Let me compute.', toolCalls });
  });
});

describe('buildSystemPrompt', () => {
  it('lists every tool', () => {
    const prompt = buildSystemPrompt({ tools: createToolRegistry().getDefinitions() });
    expect(prompt).toContain('- **get_coordinates_from_city**: ');
    expect(prompt).toContain('- **calculate**: ');
    expect(prompt).toContain('## Tool Errors');
  });

  it('omits the tool section without tools and appends extra instructions', () => {
    const prompt = buildSystemPrompt({ tools: [], extraInstructions: 'Reply in one line.' });
    expect(prompt).not.toContain('## Tools\n');
    expect(prompt.endsWith('Reply in one line.')).toBe(true);
  });
});
