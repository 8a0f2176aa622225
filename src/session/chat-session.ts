import { randomUUID } from 'node:crypto';
import type { StructuredToolInterface } from '@langchain/core/tools';
import { Agent } from '../agent/agent.js';
import type { DoneEvent, TokenUsage, ToolCallRecord, ToolCallingModel } from '../agent/types.js';
import type { ChartPayload } from '../charts/schema.js';
import { InMemoryChatHistory, type ChatEntry } from '../utils/in-memory-chat-history.js';
import { SessionBusyError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { extractCharts, formatSteps, summarizeSteps, type StepSummary } from './response-adapter.js';

export interface ChatSessionOptions {
  model: ToolCallingModel;
  id?: string;
  tools?: StructuredToolInterface[];
  systemPrompt?: string;
  maxIterations?: number;
  historyMaxTurns?: number;
}

export interface ChatReply {
  answer: string;
  charts: ChartPayload[];
  steps: StepSummary[];
  toolCalls: ToolCallRecord[];
  usage?: TokenUsage;
  /** Set when the turn failed; the answer then carries the error text. */
  error?: string;
}

/**
 * One conversation: owns its history and runs one agent turn at a time.
 */
export class ChatSession {
  readonly id: string;
  private readonly history: InMemoryChatHistory;
  private busy = false;
  private lastActive = Date.now();

  constructor(private readonly options: ChatSessionOptions) {
    this.id = options.id ?? randomUUID();
    this.history = new InMemoryChatHistory(options.historyMaxTurns);
  }

  get isBusy(): boolean {
    return this.busy;
  }

  /** Epoch milliseconds of the last turn started or finished (creation time before the first). */
  get lastActiveAt(): number {
    return this.lastActive;
  }

  async send(text: string): Promise<ChatReply> {
    if (this.busy) {
      throw new SessionBusyError(this.id);
    }
    this.busy = true;
    this.lastActive = Date.now();
    try {
      const done = await this.runTurn(text);
      this.history.addTurn(text, done.answer);
      const steps = summarizeSteps(done.toolCalls);
      logger.debug(`[Session ${this.id}]\n${formatSteps(steps)}`);
      return {
        answer: done.answer,
        charts: extractCharts(done.toolCalls),
        steps,
        toolCalls: done.toolCalls,
        ...(done.tokenUsage ? { usage: done.tokenUsage } : {}),
      };
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`[Session ${this.id}] turn failed`, { error: message });
      return { answer: `Error processing request: ${message}`, charts: [], steps: [], toolCalls: [], error: message };
    } finally {
      this.busy = false;
      this.lastActive = Date.now();
    }
  }

  getHistory(): ChatEntry[] {
    return this.history.getEntries();
  }

  private async runTurn(text: string): Promise<DoneEvent> {
    const agent = Agent.create({
      model: this.options.model,
      ...(this.options.tools ? { tools: this.options.tools } : {}),
      ...(this.options.systemPrompt ? { systemPrompt: this.options.systemPrompt } : {}),
      ...(this.options.maxIterations ? { maxIterations: this.options.maxIterations } : {}),
    });

    let done: DoneEvent | undefined;
    for await (const event of agent.run(text, this.history)) {
      switch (event.type) {
        case 'tool_start':
          logger.debug(`[Session ${this.id}] ${event.tool}`, event.args);
          break;
        case 'tool_error':
          logger.warn(`[Session ${this.id}] ${event.tool} failed`, { error: event.error });
          break;
        case 'done':
          done = event;
          break;
        default:
          break;
      }
    }
    if (!done) {
      throw new Error('Agent finished without an answer');
    }
    logger.info(`[Session ${this.id}] answered in ${done.totalTime}ms with ${done.toolCalls.length} tool call(s)`);
    return done;
  }
}
