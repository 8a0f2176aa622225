import { HumanMessage, SystemMessage, ToolMessage, isAIMessage, type BaseMessage } from '@langchain/core/messages';
import type { ToolCall } from '@langchain/core/messages/tool';
import { ToolInputParsingException, type StructuredToolInterface } from '@langchain/core/tools';
import { logDebug } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { getTools } from '../tools/registry.js';
import { errorResult, formatToolResultForModel, parseToolResult, type ToolResult } from '../tools/types.js';
import { extractUsage } from '../model/llm.js';
import { buildSystemPrompt } from './prompts.js';
import { extractTextContent, hasToolCalls } from '../utils/ai-message.js';
import type { InMemoryChatHistory } from '../utils/in-memory-chat-history.js';
import type { AgentConfig, AgentEvent, ToolCallRecord, ToolCallingModel, ToolEvent } from './types.js';
import { TokenCounter } from './token-counter.js';

export const DEFAULT_MAX_ITERATIONS = 5;

/**
 * Relays between the chat model and the tools. The model picks the tools;
 * the loop executes each requested call and feeds the results back until the
 * model answers without tool calls.
 */
export class Agent {
  private readonly model: ToolCallingModel;
  private readonly maxIterations: number;
  private readonly toolMap: Map<string, StructuredToolInterface>;
  private readonly systemPrompt: string;
  private readonly signal?: AbortSignal;

  private constructor(config: AgentConfig, tools: StructuredToolInterface[], systemPrompt: string) {
    this.model = config.model;
    this.maxIterations = config.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.toolMap = new Map(tools.map((t) => [t.name, t]));
    this.systemPrompt = systemPrompt;
    this.signal = config.signal;
  }

  static create(config: AgentConfig): Agent {
    const tools = config.tools ?? getTools();
    const systemPrompt = config.systemPrompt ?? buildSystemPrompt();
    return new Agent(config, tools, systemPrompt);
  }

  /**
   * Run one turn and yield events as they happen. The last event is always
   * `done`. Model failures propagate to the caller.
   */
  async *run(query: string, history?: InMemoryChatHistory): AsyncGenerator<AgentEvent> {
    const startTime = Date.now();
    const tokenCounter = new TokenCounter();
    const toolCalls: ToolCallRecord[] = [];

    const messages: BaseMessage[] = [
      new SystemMessage(this.systemPrompt),
      ...(history?.toMessages() ?? []),
      new HumanMessage(query),
    ];

    let iteration = 0;

    while (iteration < this.maxIterations) {
      if (this.signal?.aborted) {
        logDebug(`[Agent] Aborted during iteration ${iteration}`);
        yield { type: 'done', answer: 'Agent aborted.', toolCalls, iterations: iteration, totalTime: Date.now() - startTime };
        return;
      }
      iteration++;

      logDebug(`[Agent] Iteration ${iteration}: calling model with ${messages.length} messages`);
      yield { type: 'thinking', message: 'Thinking...' };
      const response = await this.model.invoke(messages, this.signal ? { signal: this.signal } : undefined);
      tokenCounter.add(extractUsage(response));
      const responseText = extractTextContent(response);

      if (!isAIMessage(response) || !hasToolCalls(response)) {
        logDebug('[Agent] No tool calls; returning the model answer');
        yield { type: 'answer_start' };
        const totalTime = Date.now() - startTime;
        yield {
          type: 'done',
          answer: responseText,
          toolCalls,
          iterations: iteration,
          totalTime,
          tokenUsage: tokenCounter.getUsage(),
          tokensPerSecond: tokenCounter.getTokensPerSecond(totalTime),
        };
        return;
      }

      if (responseText.trim()) {
        yield { type: 'thinking', message: responseText.trim() };
      }

      messages.push(response);
      const requested = response.tool_calls ?? [];
      for (const [index, toolCall] of requested.entries()) {
        const record: ToolCallRecord = yield* this.executeToolCall(toolCall);
        toolCalls.push(record);
        messages.push(
          new ToolMessage({
            content: formatToolResultForModel(record.result),
            tool_call_id: toolCall.id ?? `${toolCall.name}-${iteration}-${index}`,
            name: toolCall.name,
          })
        );
      }
    }

    logDebug(`[Agent] Reached maximum iterations (${this.maxIterations})`);
    yield { type: 'answer_start' };
    const totalTime = Date.now() - startTime;
    yield {
      type: 'done',
      answer: `Reached maximum iterations (${this.maxIterations}) without a final answer.`,
      toolCalls,
      iterations: iteration,
      totalTime,
      tokenUsage: tokenCounter.getUsage(),
      tokensPerSecond: tokenCounter.getTokensPerSecond(totalTime),
    };
  }

  /**
   * Execute a single tool call. Unknown tools and thrown errors become error
   * results so the model can recover on the next iteration.
   */
  private async *executeToolCall(toolCall: ToolCall): AsyncGenerator<ToolEvent, ToolCallRecord> {
    const toolName = toolCall.name;
    const toolArgs: Record<string, unknown> = { ...toolCall.args };

    yield { type: 'tool_start', tool: toolName, args: toolArgs };
    const toolStartTime = Date.now();

    const tool = this.toolMap.get(toolName);
    if (!tool) {
      const message = `Tool '${toolName}' not found`;
      yield { type: 'tool_error', tool: toolName, error: message };
      return { tool: toolName, args: toolArgs, result: errorResult('invalid_input', message), duration: Date.now() - toolStartTime };
    }

    let result: ToolResult;
    try {
      const raw: unknown = await tool.invoke(toolArgs, this.signal ? { signal: this.signal } : undefined);
      result = parseToolResult(raw, tickerArg(toolArgs));
    } catch (error) {
      const message = errorMessage(error);
      logDebug(`[Agent] Tool ${toolName} threw: ${message}`);
      yield { type: 'tool_error', tool: toolName, error: message };
      const code = error instanceof ToolInputParsingException ? 'invalid_input' : 'provider_error';
      return { tool: toolName, args: toolArgs, result: errorResult(code, message), duration: Date.now() - toolStartTime };
    }

    const duration = Date.now() - toolStartTime;
    logDebug(`[Agent] Tool ${toolName} finished in ${duration}ms (${result.kind})`);
    yield { type: 'tool_end', tool: toolName, args: toolArgs, result, duration };
    return { tool: toolName, args: toolArgs, result, duration };
  }
}

function tickerArg(args: Record<string, unknown>): string {
  return typeof args.ticker === 'string' ? args.ticker.trim().toUpperCase() : '';
}
