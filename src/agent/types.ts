import type { BaseMessage } from '@langchain/core/messages';
import type { StructuredToolInterface } from '@langchain/core/tools';
import type { ToolResult } from '../tools/types.js';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * The slice of a tool-bound LangChain chat model the agent loop needs.
 * Tests pass a scripted implementation.
 */
export interface ToolCallingModel {
  invoke(messages: BaseMessage[], options?: { signal?: AbortSignal }): Promise<BaseMessage>;
}

export interface AgentConfig {
  model: ToolCallingModel;
  /** Defaults to the full registry */
  tools?: StructuredToolInterface[];
  systemPrompt?: string;
  maxIterations?: number;
  signal?: AbortSignal;
}

export interface ToolCallRecord {
  tool: string;
  args: Record<string, unknown>;
  result: ToolResult;
  /** Milliseconds */
  duration: number;
}

export interface ThinkingEvent {
  type: 'thinking';
  message: string;
}

export interface ToolStartEvent {
  type: 'tool_start';
  tool: string;
  args: Record<string, unknown>;
}

export interface ToolEndEvent {
  type: 'tool_end';
  tool: string;
  args: Record<string, unknown>;
  result: ToolResult;
  duration: number;
}

export interface ToolErrorEvent {
  type: 'tool_error';
  tool: string;
  error: string;
}

export interface AnswerStartEvent {
  type: 'answer_start';
}

export interface DoneEvent {
  type: 'done';
  answer: string;
  toolCalls: ToolCallRecord[];
  iterations: number;
  totalTime: number;
  tokenUsage?: TokenUsage;
  tokensPerSecond?: number;
}

export type ToolEvent = ToolStartEvent | ToolEndEvent | ToolErrorEvent;

export type AgentEvent = ThinkingEvent | ToolEvent | AnswerStartEvent | DoneEvent;
