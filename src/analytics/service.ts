/**
 * Minutes Insights - Analytics Agent
 *
 * Runs an analysis plan over rows already fetched by the NL2SQL agent and
 * turns the results into summary sentences and chart artifacts.
 */

import type { ShapedResult } from '../nl-query/types.js';
import { logAgent } from '../utils/logger.js';
import { buildChartSpec, createChartArtifact, defaultChartTitle } from './charts.js';
import type { AnalysisPlanner } from './planner.js';
import {
  describeNumeric,
  describeText,
  frequency,
  groupAggregate,
  numericValues,
  timeSeries,
} from './statistics.js';
import type { AnalysisOperation, AnalysisPlan, AnalysisResult, ChartArtifact, OperationResult } from './types.js';

type Row = Record<string, unknown>;

function formatNumber(value: number | null): string {
  if (value === null) return 'no value';
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

function valueLabel(aggregate: string, column?: string): string {
  return column !== undefined ? `${aggregate} of ${column}` : aggregate;
}

// =============================================================================
// Operations
// =============================================================================

/**
 * Compute one operation over the rows, with its summary sentence
 */
export function runOperation(op: AnalysisOperation, rows: Row[], columns: ShapedResult['columns']): OperationResult {
  switch (op.type) {
    case 'describe': {
      const kind = columns.find((c) => c.name === op.column)?.kind;
      if (kind === 'number') {
        const stats = describeNumeric(numericValues(rows, op.column));
        const summary =
          stats.count === 0
            ? `${op.column} has no numeric values.`
            : `${op.column} over ${stats.count} values: mean ${formatNumber(stats.mean)}, ` +
              `median ${formatNumber(stats.median)}, min ${formatNumber(stats.min)}, max ${formatNumber(stats.max)}.`;
        return { type: 'describe', column: op.column, stats, summary };
      }

      const stats = describeText(rows.map((r) => r[op.column]));
      const first = stats.top[0];
      const summary =
        first === undefined
          ? `${op.column} has no values.`
          : `${op.column} has ${stats.count} values (${stats.distinct} distinct); ` +
            `the most common is "${first.label}" (${first.count}).`;
      return { type: 'describe', column: op.column, stats, summary };
    }

    case 'frequency': {
      const entries = frequency(
        rows.map((r) => r[op.column]),
        { split: op.split, top: op.top }
      );
      const summary =
        entries.length === 0
          ? `No ${op.column} values to count.`
          : `Most frequent ${op.column}: ${entries
              .slice(0, 3)
              .map((e) => `${e.label} (${e.count})`)
              .join(', ')}.`;
      return { type: 'frequency', column: op.column, entries, summary };
    }

    case 'group_aggregate': {
      const points = groupAggregate(rows, op.groupBy, op.aggregate, op.column);
      const first = points[0];
      const label = valueLabel(op.aggregate, op.column);
      const summary =
        first === undefined
          ? `No groups of ${op.groupBy} found.`
          : `${points.length} ${op.groupBy} group(s); the highest ${label} is ` +
            `${first.label} (${formatNumber(first.value)}).`;
      return {
        type: 'group_aggregate',
        groupBy: op.groupBy,
        aggregate: op.aggregate,
        ...(op.column !== undefined ? { column: op.column } : {}),
        points,
        summary,
      };
    }

    case 'time_series': {
      const { points, skipped } = timeSeries(rows, op.dateColumn, op.interval, op.aggregate, op.column);
      const label = valueLabel(op.aggregate, op.column);
      let summary: string;
      if (points.length === 0) {
        summary = `No dated rows to chart by ${op.interval}.`;
      } else {
        let peak = points[0];
        for (const point of points) {
          if (point.value !== null && (peak?.value == null || point.value > peak.value)) {
            peak = point;
          }
        }
        summary = `${label} per ${op.interval} across ${points.length} period(s)`;
        if (peak !== undefined && peak.value !== null) {
          summary += `, peaking at ${formatNumber(peak.value)} in ${peak.label}`;
        }
        summary += '.';
      }
      if (skipped > 0) {
        summary += ` ${skipped} row(s) without a date were skipped.`;
      }
      return {
        type: 'time_series',
        dateColumn: op.dateColumn,
        interval: op.interval,
        aggregate: op.aggregate,
        ...(op.column !== undefined ? { column: op.column } : {}),
        points,
        summary,
      };
    }
  }
}

// =============================================================================
// Agent
// =============================================================================

export class AnalyticsAgent {
  constructor(private readonly planner: AnalysisPlanner) {}

  async analyze(question: string, result: ShapedResult): Promise<AnalysisResult> {
    if (result.rowCount === 0) {
      return {
        plan: null,
        source: 'heuristic',
        operations: [],
        summary: 'There are no rows to analyse for this question.',
        artifacts: [],
        warnings: [],
      };
    }

    const outcome = await this.planner.plan(question, result.columns);
    const warnings = [...outcome.warnings];

    if (outcome.plan === null) {
      return {
        plan: null,
        source: outcome.source,
        operations: [],
        summary: 'The result has no columns that can be analysed.',
        artifacts: [],
        warnings,
      };
    }

    const operations = outcome.plan.operations.map((op) => runOperation(op, result.rows, result.columns));
    const artifacts = this.buildArtifacts(outcome.plan, operations, warnings);

    if (result.truncated) {
      warnings.push(`Analysis covers the first ${result.rowCount} of ${result.totalRowCount} rows`);
    }

    logAgent({
      agent: 'analytics',
      event: 'analysis_completed',
      source: outcome.source,
      operations: operations.map((o) => o.type),
      artifacts: artifacts.length,
    });

    return {
      plan: outcome.plan,
      source: outcome.source,
      operations,
      summary: operations.map((o) => o.summary).join(' '),
      artifacts,
      warnings,
    };
  }

  private buildArtifacts(plan: AnalysisPlan, operations: OperationResult[], warnings: string[]): ChartArtifact[] {
    if (plan.chart === undefined) {
      return [];
    }

    const target = operations[plan.chart.operation];
    if (target === undefined) {
      warnings.push(`Chart refers to missing operation ${plan.chart.operation}`);
      return [];
    }

    const title = plan.chart.title ?? defaultChartTitle(target);
    const spec = buildChartSpec(target, plan.chart.type, title);
    if (spec === null) {
      warnings.push(`No chart could be drawn for the ${target.type} result`);
      return [];
    }
    return [createChartArtifact(title, spec)];
  }
}
