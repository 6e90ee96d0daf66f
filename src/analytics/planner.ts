/**
 * Minutes Insights - Analysis Planner
 *
 * Chooses which operations to run over a result set: the chat model
 * proposes a plan, keyword heuristics stand in when it can't.
 */

import { formatValidationErrors } from '../config/schema.js';
import type { ChatModel } from '../llm/index.js';
import { extractJson } from '../llm/json.js';
import type { ShapedColumn } from '../nl-query/types.js';
import { buildAnalyticsInstruction, buildGlobalInstruction } from '../prompts/index.js';
import { toIsoDate } from '../utils/helpers.js';
import { logAgent } from '../utils/logger.js';
import {
  AnalysisPlanSchema,
  type AnalysisOperation,
  type AnalysisPlan,
  type ChartRequest,
  type Interval,
  type PlanSource,
} from './types.js';

export interface PlannerConfig {
  model: string;
  temperature: number;
}

export interface PlanOutcome {
  plan: AnalysisPlan | null;
  source: PlanSource;
  warnings: string[];
}

function operationColumns(op: AnalysisOperation): string[] {
  switch (op.type) {
    case 'describe':
    case 'frequency':
      return [op.column];
    case 'group_aggregate':
      return op.column !== undefined ? [op.groupBy, op.column] : [op.groupBy];
    case 'time_series':
      return op.column !== undefined ? [op.dateColumn, op.column] : [op.dateColumn];
  }
}

/**
 * Drop operations naming unknown columns and re-point the chart
 */
export function reconcilePlan(
  plan: AnalysisPlan,
  columns: ShapedColumn[]
): { plan: AnalysisPlan | null; warnings: string[] } {
  const known = new Set(columns.map((c) => c.name));
  const warnings: string[] = [];
  const kept: AnalysisOperation[] = [];
  const indexMap = new Map<number, number>();

  plan.operations.forEach((op, index) => {
    const unknown = operationColumns(op).filter((c) => !known.has(c));
    if (unknown.length > 0) {
      warnings.push(`Dropped ${op.type} operation: unknown column(s) ${unknown.join(', ')}`);
      return;
    }
    indexMap.set(index, kept.length);
    kept.push(op);
  });

  if (kept.length === 0) {
    return { plan: null, warnings };
  }

  let chart: ChartRequest | undefined;
  if (plan.chart !== undefined) {
    const target = indexMap.get(plan.chart.operation);
    if (target === undefined) {
      warnings.push('Dropped chart: its operation was removed or does not exist');
    } else {
      chart = { ...plan.chart, operation: target };
    }
  }

  return { plan: chart ? { operations: kept, chart } : { operations: kept }, warnings };
}

// =============================================================================
// Heuristics
// =============================================================================

function pickInterval(question: string): Interval {
  if (/\b(day|daily)\b/.test(question)) return 'day';
  if (/\b(week|weekly)\b/.test(question)) return 'week';
  return 'month';
}

/**
 * Keyword-driven plan for when the model is unavailable
 */
export function heuristicPlan(question: string, columns: ShapedColumn[]): AnalysisPlan | null {
  const q = question.toLowerCase();
  const has = (name: string): boolean => columns.some((c) => c.name === name);
  const dateColumn =
    columns.find((c) => c.name === 'meeting_date')?.name ?? columns.find((c) => c.kind === 'date')?.name;
  const numericColumn = columns.find((c) => c.kind === 'number' && c.name !== 'id')?.name;
  const textColumn = columns.find((c) => c.kind === 'text')?.name;

  const wantsChart = /\b(chart|plot|graph|visuali[sz]e|trend)\b/.test(q);
  const wantsPie = /\b(pie|share|proportion)\b/.test(q);
  const overTime = /\b(per|by|each|every)\s+(day|week|month)\b|\bover time\b|\btrend|\b(daily|weekly|monthly)\b/.test(q);

  let operation: AnalysisOperation | null = null;

  if (overTime && dateColumn !== undefined) {
    operation = { type: 'time_series', dateColumn, interval: pickInterval(q), aggregate: 'count' };
  } else if (/\b(responsible|owner|owns|assigned)\b/.test(q) && has('responsible')) {
    operation = { type: 'frequency', column: 'responsible', split: true, top: 10 };
  } else if (/\b(attend\w*|who|people|person|participants?)\b/.test(q) && has('attendees')) {
    operation = { type: 'frequency', column: 'attendees', split: true, top: 10 };
  } else if (/\b(topics?|subjects?)\b/.test(q) && has('meeting_topic')) {
    operation = { type: 'frequency', column: 'meeting_topic', split: false, top: 10 };
  } else if (/\bpurposes?\b/.test(q) && has('meeting_purpose')) {
    operation = { type: 'frequency', column: 'meeting_purpose', split: false, top: 10 };
  } else if (/\b(average|mean|median|statistics?|describe|distribution)\b/.test(q) && numericColumn !== undefined) {
    operation = { type: 'describe', column: numericColumn };
  } else if (dateColumn !== undefined) {
    operation = { type: 'time_series', dateColumn, interval: pickInterval(q), aggregate: 'count' };
  } else if (textColumn !== undefined) {
    operation = { type: 'frequency', column: textColumn, split: false, top: 10 };
  } else if (numericColumn !== undefined) {
    operation = { type: 'describe', column: numericColumn };
  }

  if (operation === null) {
    return null;
  }

  const plan: AnalysisPlan = { operations: [operation] };
  if (wantsChart || wantsPie || operation.type === 'time_series') {
    const type = wantsPie ? 'pie' : operation.type === 'time_series' ? 'line' : 'bar';
    plan.chart = { type, operation: 0 };
  }
  return plan;
}

// =============================================================================
// Planner
// =============================================================================

export class AnalysisPlanner {
  private config: PlannerConfig;

  constructor(
    private readonly chatModel: ChatModel,
    config: Partial<PlannerConfig> & { model: string },
    private readonly now: () => Date = () => new Date()
  ) {
    this.config = { temperature: 0.2, ...config };
  }

  async plan(question: string, columns: ShapedColumn[]): Promise<PlanOutcome> {
    const warnings: string[] = [];

    if (this.chatModel.isConfigured()) {
      try {
        const proposed = await this.askModel(question, columns);
        const reconciled = reconcilePlan(proposed, columns);
        warnings.push(...reconciled.warnings);
        if (reconciled.plan !== null) {
          return { plan: reconciled.plan, source: 'llm', warnings };
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        warnings.push(`Analysis planning fell back to heuristics: ${message}`);
        logAgent({ agent: 'analytics', event: 'planning_failed', error: message });
      }
    }

    return { plan: heuristicPlan(question, columns), source: 'heuristic', warnings };
  }

  private async askModel(question: string, columns: ShapedColumn[]): Promise<AnalysisPlan> {
    const reply = await this.chatModel.complete(
      [
        {
          role: 'system',
          content: `${buildGlobalInstruction(toIsoDate(this.now()))}\n\n${buildAnalyticsInstruction(columns)}`,
        },
        { role: 'user', content: `Question: ${question}` },
      ],
      { model: this.config.model, temperature: this.config.temperature, json: true }
    );

    const parsed = AnalysisPlanSchema.safeParse(extractJson(reply));
    if (!parsed.success) {
      throw new Error(`invalid analysis plan: ${formatValidationErrors(parsed.error).join('; ')}`);
    }
    return parsed.data;
  }
}
