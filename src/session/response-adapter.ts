import type { ChartPayload } from '../charts/schema.js';
import type { ToolCallRecord } from '../agent/types.js';
import { describeToolResult } from '../tools/types.js';

const INPUT_LIMIT = 100;
const OUTPUT_LIMIT = 150;

const TOOL_TASKS: Record<string, string> = {
  get_stock_price: 'Fetch current stock price and basic metrics',
  get_stock_fundamentals: 'Retrieve fundamental analysis data',
  get_company_info: 'Get company overview and business details',
  get_company_news: 'Fetch recent news articles',
  compare_stocks: 'Compare multiple stocks side-by-side',
  plot_stock_price: 'Generate candlestick price chart',
  plot_multiple_stocks: 'Create performance comparison chart',
  plot_volume: 'Generate trading volume chart',
};

export const NO_TOOLS_MESSAGE = 'No tools were called - agent responded directly from knowledge.';

export interface StepSummary {
  /** 1-based position in the trace */
  step: number;
  tool: string;
  task: string;
  input: string;
  output: string;
}

function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

function formatArg(value: unknown): string {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
    ? String(value)
    : JSON.stringify(value);
}

/** Chart payloads of the turn, in execution order. */
export function extractCharts(trace: ToolCallRecord[]): ChartPayload[] {
  const charts: ChartPayload[] = [];
  for (const call of trace) {
    if (call.result.kind === 'chart') {
      charts.push({ message: call.result.message, figure: call.result.figure });
    }
  }
  return charts;
}

export function summarizeSteps(trace: ToolCallRecord[]): StepSummary[] {
  return trace.map((call, i) => {
    const input = Object.entries(call.args)
      .map(([key, value]) => `${key}=${formatArg(value)}`)
      .join(', ');
    return {
      step: i + 1,
      tool: call.tool,
      task: TOOL_TASKS[call.tool] ?? 'Execute tool operation',
      input: truncate(input, INPUT_LIMIT),
      output: truncate(describeToolResult(call.result), OUTPUT_LIMIT),
    };
  });
}

/** Plain-text rendering of the step summaries for log output and CLI clients. */
export function formatSteps(steps: StepSummary[]): string {
  if (steps.length === 0) return NO_TOOLS_MESSAGE;
  const blocks = steps.map((s) => [`Step ${s.step}: ${s.tool}`, `Task: ${s.task}`, `Input: ${s.input}`, `Output: ${s.output}`].join('\n'));
  return ['Tool Execution Steps:', '', blocks.join('\n\n---\n\n')].join('\n');
}
