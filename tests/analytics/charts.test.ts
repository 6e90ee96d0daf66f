/**
 * Minutes Insights - Chart Specification Tests
 */

import { describe, it, expect } from '@jest/globals';

import {
  VEGA_LITE_SCHEMA,
  buildChartSpec,
  createChartArtifact,
  defaultChartTitle,
} from '../../src/analytics/charts.js';
import { describeNumeric } from '../../src/analytics/statistics.js';
import type { OperationResult } from '../../src/analytics/types.js';

const TOPICS: OperationResult = {
  type: 'frequency',
  column: 'meeting_topic',
  entries: [
    { label: 'Budget', count: 2 },
    { label: 'Hiring', count: 1 },
  ],
  summary: '',
};

const PER_MONTH: OperationResult = {
  type: 'time_series',
  dateColumn: 'meeting_date',
  interval: 'month',
  aggregate: 'count',
  points: [
    { label: '2026-01', value: 3 },
    { label: '2026-02', value: 2 },
  ],
  summary: '',
};

describe('buildChartSpec', () => {
  it('should draw frequencies as bars', () => {
    expect(buildChartSpec(TOPICS, 'bar', 'Topics')).toEqual({
      $schema: VEGA_LITE_SCHEMA,
      title: 'Topics',
      data: {
        values: [
          { label: 'Budget', value: 2 },
          { label: 'Hiring', value: 1 },
        ],
      },
      mark: { type: 'bar', tooltip: true },
      encoding: {
        x: { field: 'label', type: 'nominal', sort: null, title: 'meeting_topic' },
        y: { field: 'value', type: 'quantitative', title: 'count' },
      },
    });
  });

  it('should draw time series as ordered lines', () => {
    const spec = buildChartSpec(PER_MONTH, 'line', 'Meetings per month');

    expect(spec?.['mark']).toEqual({ type: 'line', point: true, tooltip: true });
    expect(spec?.['encoding']).toEqual({
      x: { field: 'label', type: 'ordinal', sort: null, title: 'month' },
      y: { field: 'value', type: 'quantitative', title: 'count' },
    });
  });

  it('should draw pies as arcs', () => {
    const spec = buildChartSpec(TOPICS, 'pie', 'Topic share');

    expect(spec?.['mark']).toEqual({ type: 'arc', tooltip: true });
    expect(spec?.['encoding']).toEqual({
      theta: { field: 'value', type: 'quantitative', title: 'count' },
      color: { field: 'label', type: 'nominal', title: 'meeting_topic' },
    });
  });

  it('should label aggregated columns on the value axis', () => {
    const result: OperationResult = {
      type: 'group_aggregate',
      groupBy: 'meeting_topic',
      aggregate: 'avg',
      column: 'week_number',
      points: [{ label: 'Budget', value: 3.5 }],
      summary: '',
    };

    expect(buildChartSpec(result, 'bar', 'x')?.['encoding']).toEqual({
      x: { field: 'label', type: 'nominal', sort: null, title: 'meeting_topic' },
      y: { field: 'value', type: 'quantitative', title: 'avg(week_number)' },
    });
  });

  it('should return null for numeric descriptions and empty results', () => {
    const numeric: OperationResult = {
      type: 'describe',
      column: 'week_number',
      stats: describeNumeric([1, 2]),
      summary: '',
    };

    expect(buildChartSpec(numeric, 'bar', 'x')).toBeNull();
    expect(buildChartSpec({ type: 'frequency', column: 'notes', entries: [], summary: '' }, 'bar', 'x')).toBeNull();
  });
});

describe('defaultChartTitle', () => {
  it('should describe the operation', () => {
    expect(defaultChartTitle(TOPICS)).toBe('Most frequent meeting_topic');
    expect(defaultChartTitle(PER_MONTH)).toBe('count per month');
  });
});

describe('createChartArtifact', () => {
  it('should wrap the spec with an id and timestamp', () => {
    const artifact = createChartArtifact('Topics', { mark: 'bar' });

    expect(artifact.kind).toBe('chart');
    expect(artifact.title).toBe('Topics');
    expect(artifact.spec).toEqual({ mark: 'bar' });
    expect(artifact.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(Number.isNaN(Date.parse(artifact.createdAt))).toBe(false);
  });
});
