/**
 * Minutes Insights - Result Shaper
 *
 * Turns raw store rows into JSON-safe, typed result sets and derives the
 * answer text and visualization hint.
 */

import { isIsoDate, toIsoDate } from '../utils/helpers.js';
import type {
  ColumnKind,
  QueryIntent,
  ShapedColumn,
  ShapedResult,
  VisualizationType,
} from './types.js';

export interface ResultShaperConfig {
  maxRows: number;
}

const NUMERIC_STRING = /^-?\d+(\.\d+)?$/;
const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?Z$/;

function normalizeValue(value: unknown): unknown {
  if (value === undefined) return null;
  if (value instanceof Date) {
    const isMidnight =
      value.getUTCHours() === 0 &&
      value.getUTCMinutes() === 0 &&
      value.getUTCSeconds() === 0 &&
      value.getUTCMilliseconds() === 0;
    return isMidnight ? toIsoDate(value) : value.toISOString();
  }
  if (typeof value === 'bigint') {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }
  return value;
}

function numericValue(value: string): number | null {
  if (!NUMERIC_STRING.test(value)) return null;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) return null;
  if (!value.includes('.') && !Number.isSafeInteger(parsed)) return null;
  return parsed;
}

function inferKind(values: unknown[]): ColumnKind {
  const present = values.filter((v) => v !== null);
  if (present.length === 0) return 'null';
  if (present.every((v) => typeof v === 'number')) return 'number';
  if (present.every((v) => typeof v === 'boolean')) return 'boolean';
  if (present.every((v) => typeof v === 'string' && (isIsoDate(v) || ISO_TIMESTAMP.test(v)))) {
    return 'date';
  }
  if (present.every((v) => typeof v === 'string')) return 'text';
  return 'mixed';
}

function formatScalar(value: unknown): string {
  if (value === null) return 'no value';
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : value.toFixed(2);
  }
  return String(value);
}

export class ResultShaper {
  private config: ResultShaperConfig;

  constructor(config: Partial<ResultShaperConfig> = {}) {
    this.config = { maxRows: 500, ...config };
  }

  shape(rawRows: Record<string, unknown>[], executionTimeMs: number): ShapedResult {
    const totalRowCount = rawRows.length;
    const truncated = totalRowCount > this.config.maxRows;
    const kept = truncated ? rawRows.slice(0, this.config.maxRows) : rawRows;

    const names: string[] = [];
    for (const row of kept) {
      for (const key of Object.keys(row)) {
        if (!names.includes(key)) names.push(key);
      }
    }

    const rows = kept.map((row) => {
      const out: Record<string, unknown> = {};
      for (const name of names) {
        out[name] = normalizeValue(row[name]);
      }
      return out;
    });

    // PostgreSQL returns bigint and numeric as strings
    for (const name of names) {
      const values = rows.map((r) => r[name]);
      const hasString = values.some((v) => typeof v === 'string');
      const convertible = values.every(
        (v) => v === null || typeof v === 'number' || (typeof v === 'string' && numericValue(v) !== null)
      );
      if (hasString && convertible) {
        for (const row of rows) {
          const value = row[name];
          if (typeof value === 'string') {
            row[name] = numericValue(value);
          }
        }
      }
    }

    const columns: ShapedColumn[] = names.map((name) => ({
      name,
      kind: inferKind(rows.map((r) => r[name])),
    }));

    return {
      columns,
      rows,
      rowCount: rows.length,
      totalRowCount,
      truncated,
      executionTimeMs,
    };
  }

  /**
   * Natural language answer for a shaped result
   */
  describe(intent: QueryIntent, result: ShapedResult, explanation: string): string {
    const note = explanation.trim() === '' ? '' : ` ${explanation.trim()}`;
    const first = result.rows[0];

    if (first === undefined) {
      return `No meetings matched your question.${note}`;
    }

    const [onlyColumn] = result.columns;
    if (result.rowCount === 1 && result.columns.length === 1 && onlyColumn !== undefined) {
      return `The answer is ${formatScalar(first[onlyColumn.name])} (${onlyColumn.name}).`;
    }

    if (result.rowCount === 1 && result.columns.length <= 3 && intent !== 'meeting_lookup') {
      const values = result.columns
        .map((c) => `${c.name}: ${formatScalar(first[c.name])}`)
        .join(', ');
      return `Result: ${values}.`;
    }

    const isMeetingRows = result.columns.some((c) => c.name === 'meeting_date' || c.name === 'id');
    const noun = isMeetingRows
      ? result.totalRowCount === 1
        ? 'meeting'
        : 'meetings'
      : result.totalRowCount === 1
        ? 'result'
        : 'results';
    const shown = result.truncated ? ` (showing the first ${result.rowCount})` : '';

    return `Found ${result.totalRowCount} ${noun}${shown}.${note}`;
  }

  /**
   * Pick the best visualization for a shaped result
   */
  visualize(intent: QueryIntent, result: ShapedResult): VisualizationType {
    if (result.rowCount === 0) {
      return 'text';
    }

    const numeric = result.columns.filter((c) => c.kind === 'number');

    if (result.rowCount === 1 && result.columns.length <= 2 && numeric.length > 0) {
      return 'number';
    }

    if (result.columns.length === 2 && numeric.length === 1) {
      const category = result.columns.find((c) => c.kind !== 'number');
      if (category?.kind === 'date' || intent === 'time_series') {
        return 'line_chart';
      }
      if (result.rowCount <= 20) {
        return 'bar_chart';
      }
    }

    return 'table';
  }
}
