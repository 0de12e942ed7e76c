import type { Message, ToolCall, ToolResultMessage } from '../llm/types.js';

/**
 * Ordered message history of one run. Append-only; the agent loop is its
 * only writer.
 */
export class Transcript {
  private readonly entries: Message[] = [];

  constructor(initial: Message[] = []) {
    for (const message of initial) {
      this.append(message);
    }
  }

  append(message: Message): void {
    this.entries.push(message);
  }

  /** Snapshot of the history; mutating the array does not touch the transcript */
  messages(): Message[] {
    return [...this.entries];
  }

  get length(): number {
    return this.entries.length;
  }

  last(): Message | undefined {
    return this.entries[this.entries.length - 1];
  }

  /**
   * Tool calls of the most recent assistant message that have no result yet.
   * Empty whenever the loop is back in the Deciding state.
   */
  pendingToolCalls(): ToolCall[] {
    let assistantIndex = -1;
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (this.entries[i].role === 'assistant') {
        assistantIndex = i;
        break;
      }
    }
    if (assistantIndex === -1) return [];

    const assistant = this.entries[assistantIndex];
    if (assistant.role !== 'assistant') return [];

    const answered = new Set(
      this.entries
        .slice(assistantIndex + 1)
        .filter((m): m is ToolResultMessage => m.role === 'tool')
        .map((m) => m.toolCallId),
    );
    return assistant.toolCalls.filter((tc) => !answered.has(tc.id));
  }

  /** Final assistant text, if the transcript ends with a direct answer */
  finalAnswer(): string | undefined {
    const last = this.last();
    if (last?.role === 'assistant' && last.toolCalls.length === 0) {
      return last.content;
    }
    return undefined;
  }
}

