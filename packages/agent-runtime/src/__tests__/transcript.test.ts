import { describe, it, expect } from 'vitest';
import { Transcript } from '../engine/transcript.js';

const coords = { id: 'call_a', name: 'get_coordinates_from_city', input: { city_name: 'Paris' } };
const wiki = { id: 'call_b', name: 'search_wikipedia', input: { query: 'Paris' } };

describe('Transcript', () => {
  it('lists tool calls that still lack a result', () => {
    const transcript = new Transcript([
      { role: 'user', content: 'Tell me about Paris' },
      { role: 'assistant', content: '', toolCalls: [coords, wiki] },
    ]);
    expect(transcript.pendingToolCalls()).toEqual([coords, wiki]);

    transcript.append({ role: 'tool', toolCallId: 'call_a', name: coords.name, content: '{}', isError: false });
    expect(transcript.pendingToolCalls()).toEqual([wiki]);

    transcript.append({ role: 'tool', toolCallId: 'call_b', name: wiki.name, content: '{}', isError: false });
    expect(transcript.pendingToolCalls()).toEqual([]);
  });

  it('has nothing pending before the first model reply', () => {
    expect(new Transcript([{ role: 'user', content: 'Hi' }]).pendingToolCalls()).toEqual([]);
  });

  it('hands out copies of its history', () => {
    const transcript = new Transcript([{ role: 'user', content: 'Hi' }]);
    transcript.messages().push({ role: 'user', content: 'injected' });
    expect(transcript.length).toBe(1);
  });

  it('exposes the final answer only after a direct reply', () => {
    const transcript = new Transcript([{ role: 'user', content: 'Hi' }]);
    expect(transcript.finalAnswer()).toBeUndefined();

    transcript.append({ role: 'assistant', content: 'Hello!', toolCalls: [] });
    expect(transcript.finalAnswer()).toBe('Hello!');
    expect(transcript.messages()).toEqual([
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello!', toolCalls: [] },
    ]);
  });
});
