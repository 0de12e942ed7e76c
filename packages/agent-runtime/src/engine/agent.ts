import { randomUUID } from 'node:crypto';
import { BudgetExceededError, ConfigError, DEFAULT_MAX_ROUNDS, createLogger } from '@almanac/shared';
import type { Logger } from '@almanac/shared';
import type { ToolRegistry } from '@almanac/tools';
import type {
  AssistantMessage, ToolCall, ToolResultMessage, UserMessage, UsageAccumulator,
} from '../llm/types.js';
import { createUsageAccumulator, mergeUsage } from '../llm/types.js';
import type { ModelClient } from './decision.js';
import { Transcript } from './transcript.js';

export interface AgentConfig {
  client: ModelClient;
  tools: ToolRegistry;
  /** Upper bound on model calls per run */
  maxRounds?: number;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/** One event per transcript mutation, in transcript order */
export type AgentEvent =
  | { type: 'user_message'; message: UserMessage }
  | { type: 'model_response'; round: number; message: AssistantMessage }
  | { type: 'tool_result'; round: number; message: ToolResultMessage }
  | { type: 'final_answer'; round: number; text: string };

export interface RunResult {
  answer: string;
  transcript: Transcript;
  /** Model calls made */
  rounds: number;
  usage: UsageAccumulator;
}

interface RunState {
  transcript: Transcript;
  usage: UsageAccumulator;
  rounds: number;
}

/**
 * Deciding/Executing control loop: ask the model, run whatever tools it
 * requests, feed the results back, until it answers directly.
 */
export class Agent {
  private readonly client: ModelClient;
  private readonly tools: ToolRegistry;
  private readonly maxRounds: number;
  private readonly log: Logger;

  constructor(config: AgentConfig) {
    const maxRounds = config.maxRounds ?? DEFAULT_MAX_ROUNDS;
    if (!Number.isInteger(maxRounds) || maxRounds < 1) {
      throw new ConfigError(`maxRounds must be a positive integer, got ${maxRounds}`);
    }
    this.client = config.client;
    this.tools = config.tools;
    this.maxRounds = maxRounds;
    this.log = config.logger ?? createLogger('agent');
    this.tools.seal();
  }

  /** Run one query, yielding every transcript mutation as it happens */
  async *stream(query: string, options: RunOptions = {}): AsyncGenerator<AgentEvent, void, undefined> {
    yield* this.execute(query, newState(), options.signal);
  }

  async run(query: string, options: RunOptions = {}): Promise<string> {
    const { answer } = await this.runWithTranscript(query, options);
    return answer;
  }

  async runWithTranscript(query: string, options: RunOptions = {}): Promise<RunResult> {
    const state = newState();
    let answer: string | undefined;
    for await (const event of this.execute(query, state, options.signal)) {
      if (event.type === 'final_answer') answer = event.text;
    }
    if (answer === undefined) {
      // execute() either yields final_answer or throws
      throw new BudgetExceededError(this.maxRounds);
    }
    return { answer, transcript: state.transcript, rounds: state.rounds, usage: state.usage };
  }

  private async *execute(query: string, state: RunState, signal?: AbortSignal): AsyncGenerator<AgentEvent, void, undefined> {
    const runId = randomUUID();
    const log = this.log.child(runId.slice(0, 8));
    const definitions = this.tools.getDefinitions();

    const userMessage: UserMessage = { role: 'user', content: query };
    state.transcript.append(userMessage);
    yield { type: 'user_message', message: userMessage };

    let lastRequests: ToolCall[] = [];

    for (let round = 1; round <= this.maxRounds; round++) {
      signal?.throwIfAborted();
      log.info(`Round ${round}/${this.maxRounds}`);

      const decision = await this.client.decide(state.transcript, definitions, { signal });
      state.rounds = round;
      if (decision.usage) mergeUsage(state.usage, decision.usage);

      state.transcript.append(decision.message);
      yield { type: 'model_response', round, message: decision.message };

      if (decision.kind === 'direct_answer') {
        log.info(`Answered after ${round} round(s)`, {
          inputTokens: state.usage.inputTokens,
          outputTokens: state.usage.outputTokens,
        });
        yield { type: 'final_answer', round, text: decision.text };
        return;
      }

      lastRequests = decision.requests;
      log.info(`Executing ${lastRequests.length} tool call(s): ${lastRequests.map((r) => r.name).join(', ')}`);

      const results = await Promise.all(
        lastRequests.map((request) => this.runTool(request, runId, signal)),
      );
      for (const result of results) {
        state.transcript.append(result);
        yield { type: 'tool_result', round, message: result };
      }
    }

    log.warn(`Round budget of ${this.maxRounds} exhausted`);
    throw new BudgetExceededError(this.maxRounds, lastRequests.map((r) => r.name));
  }

  private async runTool(request: ToolCall, runId: string, signal?: AbortSignal): Promise<ToolResultMessage> {
    const result = await this.tools.execute(request.name, request.input, { signal, runId });
    return {
      role: 'tool',
      toolCallId: request.id,
      name: request.name,
      content: result.content,
      isError: result.type === 'error',
    };
  }
}

function newState(): RunState {
  return { transcript: new Transcript(), usage: createUsageAccumulator(), rounds: 0 };
}
