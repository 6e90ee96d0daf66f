/**
 * Minutes Insights - Analytics Module
 */

export { AnalyticsAgent, runOperation } from './service.js';
export { AnalysisPlanner, heuristicPlan, reconcilePlan } from './planner.js';
export type { PlannerConfig, PlanOutcome } from './planner.js';
export { buildChartSpec, createChartArtifact, defaultChartTitle, VEGA_LITE_SCHEMA } from './charts.js';
export {
  aggregate,
  bucketDate,
  describeNumeric,
  describeText,
  frequency,
  groupAggregate,
  timeSeries,
} from './statistics.js';
export { AnalysisPlanSchema, AnalysisOperationSchema } from './types.js';
export type {
  AggregateKind,
  AnalysisOperation,
  AnalysisPlan,
  AnalysisResult,
  ChartArtifact,
  ChartType,
  FrequencyEntry,
  Interval,
  NumericStats,
  OperationResult,
  SeriesPoint,
  TextStats,
  VegaLiteSpec,
} from './types.js';
