/**
 * Chart figure schemas.
 *
 * Figures are Plotly-compatible JSON (`data` traces plus `layout`) so a client
 * can hand them to `Plotly.newPlot` unchanged. Each trace type carries only the
 * fields the builders fill in.
 */

import { z } from 'zod';

export const ChartKindSchema = z.enum(['candlestick', 'comparison', 'volume']);
export type ChartKind = z.infer<typeof ChartKindSchema>;

const AxisSchema = z.object({
  title: z.object({ text: z.string() }),
  rangeslider: z.object({ visible: z.boolean() }).optional(),
});

export const CandlestickTraceSchema = z.object({
  type: z.literal('candlestick'),
  name: z.string(),
  x: z.array(z.string()),
  open: z.array(z.number()),
  high: z.array(z.number()),
  low: z.array(z.number()),
  close: z.array(z.number()),
});

export const LineTraceSchema = z.object({
  type: z.literal('scatter'),
  mode: z.literal('lines'),
  name: z.string(),
  x: z.array(z.string()),
  y: z.array(z.number()),
  line: z.object({ width: z.number() }),
});

export const BarTraceSchema = z.object({
  type: z.literal('bar'),
  name: z.string(),
  x: z.array(z.string()),
  y: z.array(z.number()),
  marker: z.object({ color: z.array(z.enum(['red', 'green'])) }),
});

export const ChartTraceSchema = z.discriminatedUnion('type', [
  CandlestickTraceSchema,
  LineTraceSchema,
  BarTraceSchema,
]);

export const ChartLayoutSchema = z.object({
  title: z.object({ text: z.string().min(1) }),
  xaxis: AxisSchema,
  yaxis: AxisSchema,
  height: z.number().int().positive(),
  hovermode: z.literal('x unified').optional(),
});

export const ChartFigureSchema = z.object({
  chartKind: ChartKindSchema,
  data: z.array(ChartTraceSchema).min(1),
  layout: ChartLayoutSchema,
});

export const ChartPayloadSchema = z.object({
  message: z.string().min(1),
  figure: ChartFigureSchema,
});

export type CandlestickTrace = z.infer<typeof CandlestickTraceSchema>;
export type LineTrace = z.infer<typeof LineTraceSchema>;
export type BarTrace = z.infer<typeof BarTraceSchema>;
export type ChartTrace = z.infer<typeof ChartTraceSchema>;
export type ChartLayout = z.infer<typeof ChartLayoutSchema>;
export type ChartFigure = z.infer<typeof ChartFigureSchema>;
export type ChartPayload = z.infer<typeof ChartPayloadSchema>;
