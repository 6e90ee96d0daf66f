/**
 * Minutes Insights - Chart Specifications
 *
 * Renders operation results as Vega-Lite v5 specs returned to the caller
 * as artifacts.
 */

import { v4 as uuidv4 } from 'uuid';

import type { ChartArtifact, ChartType, OperationResult, SeriesPoint, VegaLiteSpec } from './types.js';

export const VEGA_LITE_SCHEMA = 'https://vega.github.io/schema/vega-lite/v5.json';

interface ChartData {
  points: SeriesPoint[];
  labelTitle: string;
  valueTitle: string;
  temporal: boolean;
}

function chartData(result: OperationResult): ChartData | null {
  switch (result.type) {
    case 'frequency':
      return {
        points: result.entries.map((e) => ({ label: e.label, value: e.count })),
        labelTitle: result.column,
        valueTitle: 'count',
        temporal: false,
      };
    case 'group_aggregate':
      return {
        points: result.points,
        labelTitle: result.groupBy,
        valueTitle: result.column ? `${result.aggregate}(${result.column})` : result.aggregate,
        temporal: false,
      };
    case 'time_series':
      return {
        points: result.points,
        labelTitle: result.interval,
        valueTitle: result.column ? `${result.aggregate}(${result.column})` : result.aggregate,
        temporal: true,
      };
    case 'describe':
      if (result.stats.kind === 'text') {
        return {
          points: result.stats.top.map((e) => ({ label: e.label, value: e.count })),
          labelTitle: result.column,
          valueTitle: 'count',
          temporal: false,
        };
      }
      return null;
  }
}

/**
 * Build a Vega-Lite spec for an operation result, or null when it has no tabular shape
 */
export function buildChartSpec(result: OperationResult, type: ChartType, title: string): VegaLiteSpec | null {
  const data = chartData(result);
  if (data === null || data.points.length === 0) {
    return null;
  }

  const values = data.points.map((p) => ({ label: p.label, value: p.value }));
  const base = {
    $schema: VEGA_LITE_SCHEMA,
    title,
    data: { values },
  };

  if (type === 'pie') {
    return {
      ...base,
      mark: { type: 'arc', tooltip: true },
      encoding: {
        theta: { field: 'value', type: 'quantitative', title: data.valueTitle },
        color: { field: 'label', type: 'nominal', title: data.labelTitle },
      },
    };
  }

  return {
    ...base,
    mark: type === 'line' ? { type: 'line', point: true, tooltip: true } : { type: 'bar', tooltip: true },
    encoding: {
      x: {
        field: 'label',
        type: data.temporal ? 'ordinal' : 'nominal',
        sort: null,
        title: data.labelTitle,
      },
      y: { field: 'value', type: 'quantitative', title: data.valueTitle },
    },
  };
}

export function createChartArtifact(title: string, spec: VegaLiteSpec): ChartArtifact {
  return {
    id: uuidv4(),
    kind: 'chart',
    title,
    spec,
    createdAt: new Date().toISOString(),
  };
}

export function defaultChartTitle(result: OperationResult): string {
  switch (result.type) {
    case 'describe':
      return `Most common ${result.column}`;
    case 'frequency':
      return `Most frequent ${result.column}`;
    case 'group_aggregate':
      return `${result.aggregate} by ${result.groupBy}`;
    case 'time_series':
      return `${result.aggregate} per ${result.interval}`;
  }
}
