import { z } from 'zod';
import { ChartFigureSchema, ChartKindSchema } from '../charts/schema.js';
import { PeriodSchema } from './market/periods.js';

// ============================================================================
// Tool result variants
// ============================================================================

export const MetricsEntrySchema = z.object({
  ticker: z.string(),
  name: z.string(),
  metrics: z.record(z.number().nullable()),
  /** Non-numeric fields that belong with the metrics (currency, analyst rating). */
  labels: z.record(z.string()).optional(),
});

export const MetricsResultSchema = z.object({
  kind: z.literal('metrics'),
  title: z.string(),
  entries: z.array(MetricsEntrySchema).min(1),
  summary: z.string(),
});

export const NewsArticleSchema = z.object({
  title: z.string(),
  publisher: z.string(),
  published: z.string(),
  link: z.string().optional(),
});

export const TextResultSchema = z.object({
  kind: z.literal('text'),
  ticker: z.string(),
  title: z.string(),
  text: z.string(),
  attributes: z.record(z.string()),
  articles: z.array(NewsArticleSchema).optional(),
});

export const ChartResultSchema = z.object({
  kind: z.literal('chart'),
  chartKind: ChartKindSchema,
  tickers: z.array(z.string()).min(1),
  period: PeriodSchema,
  message: z.string().min(1),
  figure: ChartFigureSchema,
});

export const ToolErrorCodeSchema = z.enum(['not_found', 'invalid_input', 'provider_error']);

export const ErrorResultSchema = z.object({
  kind: z.literal('error'),
  code: ToolErrorCodeSchema,
  message: z.string(),
  ticker: z.string().optional(),
});

export const ToolResultSchema = z.discriminatedUnion('kind', [
  MetricsResultSchema,
  TextResultSchema,
  ChartResultSchema,
  ErrorResultSchema,
]);

export type MetricsEntry = z.infer<typeof MetricsEntrySchema>;
export type MetricsResult = z.infer<typeof MetricsResultSchema>;
export type NewsArticle = z.infer<typeof NewsArticleSchema>;
export type TextResult = z.infer<typeof TextResultSchema>;
export type ChartResult = z.infer<typeof ChartResultSchema>;
export type ToolErrorCode = z.infer<typeof ToolErrorCodeSchema>;
export type ErrorResult = z.infer<typeof ErrorResultSchema>;
export type ToolResult = z.infer<typeof ToolResultSchema>;

export function errorResult(code: ToolErrorCode, message: string, ticker?: string): ErrorResult {
  return ticker === undefined ? { kind: 'error', code, message } : { kind: 'error', code, message, ticker };
}

// ============================================================================
// Serialization across the tool boundary
// ============================================================================

/** Tools return their result as a JSON string, the form LangChain passes through unchanged. */
export function serializeToolResult(result: ToolResult): string {
  return JSON.stringify(result);
}

/**
 * Recover the tagged result from whatever a tool invocation produced. Output
 * that is not a serialized ToolResult is kept as free text.
 */
export function parseToolResult(raw: unknown, ticker = ''): ToolResult {
  let candidate: unknown = raw;
  if (typeof raw === 'string') {
    try {
      candidate = JSON.parse(raw);
    } catch {
      return { kind: 'text', ticker, title: 'Tool output', text: raw, attributes: {} };
    }
  }

  const parsed = ToolResultSchema.safeParse(candidate);
  if (parsed.success) return parsed.data;

  const text = typeof raw === 'string' ? raw : JSON.stringify(raw);
  return { kind: 'text', ticker, title: 'Tool output', text, attributes: {} };
}

/**
 * The view of a result that goes back to the chat model. Figures stay out of
 * the model's context; it only sees the caption.
 */
export function formatToolResultForModel(result: ToolResult): string {
  switch (result.kind) {
    case 'chart':
      return JSON.stringify({
        kind: 'chart',
        chartKind: result.chartKind,
        tickers: result.tickers,
        period: result.period,
        message: result.message,
      });
    case 'error':
      return JSON.stringify({ kind: 'error', code: result.code, message: result.message, ticker: result.ticker });
    default:
      return JSON.stringify(result);
  }
}

/** One-line description of a result, used for step summaries and logs. */
export function describeToolResult(result: ToolResult): string {
  switch (result.kind) {
    case 'metrics':
      return result.summary;
    case 'text':
      return result.text;
    case 'chart':
      return result.message;
    case 'error':
      return `Error: ${result.message}`;
  }
}
