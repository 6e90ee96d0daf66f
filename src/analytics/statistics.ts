/**
 * Minutes Insights - Statistics
 *
 * Pure aggregation helpers over shaped result rows.
 */

import { isIsoDate, toIsoDate } from '../utils/helpers.js';
import type {
  AggregateKind,
  FrequencyEntry,
  Interval,
  NumericStats,
  SeriesPoint,
  TextStats,
} from './types.js';

type Row = Record<string, unknown>;

const LIST_SEPARATOR = /,|;|\s+and\s+/i;

/**
 * Numeric value of a cell: numbers and numeric strings, nothing else
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function numericValues(rows: Row[], column: string): number[] {
  return rows.map((r) => toNumber(r[column])).filter((v): v is number => v !== null);
}

// =============================================================================
// Descriptive Statistics
// =============================================================================

export function describeNumeric(values: number[]): NumericStats {
  if (values.length === 0) {
    return { kind: 'numeric', count: 0, sum: 0, mean: null, median: null, min: null, max: null, stdDev: null };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const count = sorted.length;
  const sum = sorted.reduce((acc, v) => acc + v, 0);
  const mean = sum / count;
  const middle = Math.floor(count / 2);
  const median =
    count % 2 === 0 ? ((sorted[middle - 1] ?? 0) + (sorted[middle] ?? 0)) / 2 : (sorted[middle] ?? 0);
  const variance = sorted.reduce((acc, v) => acc + (v - mean) ** 2, 0) / count;

  return {
    kind: 'numeric',
    count,
    sum,
    mean,
    median,
    min: sorted[0] ?? null,
    max: sorted[count - 1] ?? null,
    stdDev: Math.sqrt(variance),
  };
}

export function describeText(values: unknown[], top = 5): TextStats {
  const present = values.filter((v) => v !== null && v !== undefined);
  const entries = frequency(present, { split: false, top: Number.MAX_SAFE_INTEGER });
  return {
    kind: 'text',
    count: present.length,
    distinct: entries.length,
    top: entries.slice(0, top),
  };
}

// =============================================================================
// Frequency
// =============================================================================

/**
 * Count values case-insensitively, keeping the first spelling seen
 *
 * With `split`, list cells ("Ana, Ben and Carla") count each name once.
 */
export function frequency(values: unknown[], options: { split: boolean; top: number }): FrequencyEntry[] {
  const counts = new Map<string, FrequencyEntry>();

  for (const value of values) {
    if (value === null || value === undefined) continue;
    const text = String(value);
    const labels = options.split ? text.split(LIST_SEPARATOR) : [text];

    for (const raw of labels) {
      const label = raw.trim();
      if (label === '') continue;
      const key = label.toLowerCase();
      const entry = counts.get(key);
      if (entry) {
        entry.count++;
      } else {
        counts.set(key, { label, count: 1 });
      }
    }
  }

  return [...counts.values()]
    .sort((a, b) => b.count - a.count || (a.label < b.label ? -1 : a.label > b.label ? 1 : 0))
    .slice(0, options.top);
}

// =============================================================================
// Aggregation
// =============================================================================

export function aggregate(kind: AggregateKind, rows: Row[], column?: string): number | null {
  if (kind === 'count') {
    return column === undefined ? rows.length : rows.filter((r) => r[column] != null).length;
  }
  if (column === undefined) {
    return null;
  }

  const values = numericValues(rows, column);
  if (values.length === 0) return null;

  switch (kind) {
    case 'sum':
      return values.reduce((acc, v) => acc + v, 0);
    case 'avg':
      return values.reduce((acc, v) => acc + v, 0) / values.length;
    case 'min':
      return Math.min(...values);
    case 'max':
      return Math.max(...values);
  }
}

/**
 * Aggregate per distinct value of `groupBy`, largest first
 */
export function groupAggregate(
  rows: Row[],
  groupBy: string,
  kind: AggregateKind,
  column?: string
): SeriesPoint[] {
  const groups = new Map<string, Row[]>();
  for (const row of rows) {
    const value = row[groupBy];
    const label = value === null || value === undefined ? '(none)' : String(value);
    const bucket = groups.get(label);
    if (bucket) {
      bucket.push(row);
    } else {
      groups.set(label, [row]);
    }
  }

  return [...groups.entries()]
    .map(([label, groupRows]) => ({ label, value: aggregate(kind, groupRows, column) }))
    .sort((a, b) => {
      if (a.value === null && b.value === null) return a.label < b.label ? -1 : 1;
      if (a.value === null) return 1;
      if (b.value === null) return -1;
      return b.value - a.value || (a.label < b.label ? -1 : a.label > b.label ? 1 : 0);
    });
}

// =============================================================================
// Time Series
// =============================================================================

/**
 * Bucket label for a date: the day, the Monday of its ISO week, or YYYY-MM
 */
export function bucketDate(value: unknown, interval: Interval): string | null {
  let day: string;
  if (value instanceof Date) {
    day = toIsoDate(value);
  } else if (typeof value === 'string' && isIsoDate(value.slice(0, 10))) {
    day = value.slice(0, 10);
  } else {
    return null;
  }

  switch (interval) {
    case 'day':
      return day;
    case 'month':
      return day.slice(0, 7);
    case 'week': {
      const date = new Date(`${day}T00:00:00Z`);
      const offset = (date.getUTCDay() + 6) % 7;
      date.setUTCDate(date.getUTCDate() - offset);
      return toIsoDate(date);
    }
  }
}

export interface TimeSeriesResult {
  points: SeriesPoint[];
  skipped: number;
}

export function timeSeries(
  rows: Row[],
  dateColumn: string,
  interval: Interval,
  kind: AggregateKind,
  column?: string
): TimeSeriesResult {
  const buckets = new Map<string, Row[]>();
  let skipped = 0;

  for (const row of rows) {
    const label = bucketDate(row[dateColumn], interval);
    if (label === null) {
      skipped++;
      continue;
    }
    const bucket = buckets.get(label);
    if (bucket) {
      bucket.push(row);
    } else {
      buckets.set(label, [row]);
    }
  }

  const points = [...buckets.keys()]
    .sort()
    .map((label) => ({ label, value: aggregate(kind, buckets.get(label) ?? [], column) }));

  return { points, skipped };
}
