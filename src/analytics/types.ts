/**
 * Minutes Insights - Analytics Types
 *
 * The analysis plan is the only thing the model contributes; every
 * operation in it is computed locally.
 */

import { z } from 'zod';

// =============================================================================
// Analysis Plan
// =============================================================================

export const AggregateKindSchema = z.enum(['count', 'sum', 'avg', 'min', 'max']);
export const IntervalSchema = z.enum(['day', 'week', 'month']);
export const ChartTypeSchema = z.enum(['bar', 'line', 'pie']);

export const DescribeOperationSchema = z.object({
  type: z.literal('describe'),
  column: z.string().min(1),
});

export const FrequencyOperationSchema = z.object({
  type: z.literal('frequency'),
  column: z.string().min(1),
  split: z.boolean().default(false),
  top: z.number().int().min(1).max(50).default(10),
});

export const GroupAggregateOperationSchema = z.object({
  type: z.literal('group_aggregate'),
  groupBy: z.string().min(1),
  aggregate: AggregateKindSchema.default('count'),
  column: z.string().min(1).optional(),
});

export const TimeSeriesOperationSchema = z.object({
  type: z.literal('time_series'),
  dateColumn: z.string().min(1),
  interval: IntervalSchema.default('month'),
  aggregate: AggregateKindSchema.default('count'),
  column: z.string().min(1).optional(),
});

export const AnalysisOperationSchema = z.discriminatedUnion('type', [
  DescribeOperationSchema,
  FrequencyOperationSchema,
  GroupAggregateOperationSchema,
  TimeSeriesOperationSchema,
]);

export const ChartRequestSchema = z.object({
  type: ChartTypeSchema,
  operation: z.number().int().min(0).default(0),
  title: z.string().min(1).optional(),
});

export const AnalysisPlanSchema = z.object({
  operations: z.array(AnalysisOperationSchema).min(1).max(4),
  chart: ChartRequestSchema.optional(),
});

export type AggregateKind = z.infer<typeof AggregateKindSchema>;
export type Interval = z.infer<typeof IntervalSchema>;
export type ChartType = z.infer<typeof ChartTypeSchema>;
export type AnalysisOperation = z.output<typeof AnalysisOperationSchema>;
export type ChartRequest = z.output<typeof ChartRequestSchema>;
export type AnalysisPlan = z.output<typeof AnalysisPlanSchema>;

// =============================================================================
// Results
// =============================================================================

export interface FrequencyEntry {
  label: string;
  count: number;
}

export interface SeriesPoint {
  label: string;
  value: number | null;
}

export interface NumericStats {
  kind: 'numeric';
  count: number;
  sum: number;
  mean: number | null;
  median: number | null;
  min: number | null;
  max: number | null;
  stdDev: number | null;
}

export interface TextStats {
  kind: 'text';
  count: number;
  distinct: number;
  top: FrequencyEntry[];
}

export type OperationResult =
  | { type: 'describe'; column: string; stats: NumericStats | TextStats; summary: string }
  | { type: 'frequency'; column: string; entries: FrequencyEntry[]; summary: string }
  | {
      type: 'group_aggregate';
      groupBy: string;
      aggregate: AggregateKind;
      column?: string;
      points: SeriesPoint[];
      summary: string;
    }
  | {
      type: 'time_series';
      dateColumn: string;
      interval: Interval;
      aggregate: AggregateKind;
      column?: string;
      points: SeriesPoint[];
      summary: string;
    };

/**
 * A Vega-Lite v5 specification
 */
export type VegaLiteSpec = Record<string, unknown>;

export interface ChartArtifact {
  id: string;
  kind: 'chart';
  title: string;
  spec: VegaLiteSpec;
  createdAt: string;
}

export type PlanSource = 'llm' | 'heuristic';

export interface AnalysisResult {
  plan: AnalysisPlan | null;
  source: PlanSource;
  operations: OperationResult[];
  summary: string;
  artifacts: ChartArtifact[];
  warnings: string[];
}
