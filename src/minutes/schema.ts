/**
 * Minutes Insights - Minutes Table Schema
 *
 * One row per meeting. Rows are imported from an external source and are
 * never written by this service.
 */

import { z } from 'zod';

import { isIsoDate, toIsoDate } from '../utils/helpers.js';

// =============================================================================
// Column Definitions
// =============================================================================

export type ColumnType = 'integer' | 'date' | 'text';

export interface ColumnDefinition {
  name: string;
  type: ColumnType;
  nullable: boolean;
  description: string;
  /** Cell holds a delimited list of names */
  list?: boolean;
}

export const MINUTES_COLUMNS: readonly ColumnDefinition[] = [
  { name: 'id', type: 'integer', nullable: false, description: 'Unique meeting identifier' },
  { name: 'week_number', type: 'integer', nullable: false, description: 'Week index the meeting belongs to' },
  { name: 'meeting_date', type: 'date', nullable: false, description: 'Date the meeting took place (YYYY-MM-DD)' },
  { name: 'details', type: 'text', nullable: false, description: 'Free-text details of the meeting' },
  {
    name: 'attendees',
    type: 'text',
    nullable: false,
    description: 'Names of attendees separated by commas',
    list: true,
  },
  { name: 'meeting_topic', type: 'text', nullable: false, description: 'Main topic of the meeting' },
  { name: 'meeting_purpose', type: 'text', nullable: false, description: 'Why the meeting was held' },
  { name: 'summary', type: 'text', nullable: false, description: 'Summary of the discussion' },
  { name: 'target_date', type: 'date', nullable: true, description: 'Due date for agreed actions (YYYY-MM-DD)' },
  { name: 'future_plan', type: 'text', nullable: true, description: 'Planned next steps' },
  { name: 'decisions', type: 'text', nullable: true, description: 'Decisions taken' },
  {
    name: 'responsible',
    type: 'text',
    nullable: true,
    description: 'People responsible for follow-up, separated by commas',
    list: true,
  },
  { name: 'notes', type: 'text', nullable: true, description: 'Additional notes' },
];

export const MINUTES_COLUMN_NAMES: readonly string[] = MINUTES_COLUMNS.map((c) => c.name);

// =============================================================================
// Record Schema
// =============================================================================

const dateField = z.preprocess(
  (value) => (value instanceof Date ? toIsoDate(value) : value),
  z.string().refine(isIsoDate, 'expected a YYYY-MM-DD date')
);

export const MinutesRecordSchema = z.object({
  id: z.number().int(),
  week_number: z.number().int(),
  meeting_date: dateField,
  details: z.string(),
  attendees: z.string(),
  meeting_topic: z.string(),
  meeting_purpose: z.string(),
  summary: z.string(),
  target_date: dateField.nullable().default(null),
  future_plan: z.string().nullable().default(null),
  decisions: z.string().nullable().default(null),
  responsible: z.string().nullable().default(null),
  notes: z.string().nullable().default(null),
});

export type MinutesRecord = z.output<typeof MinutesRecordSchema>;

// =============================================================================
// Prompt Rendering
// =============================================================================

/**
 * Render the table schema as prompt text
 */
export function describeSchema(table: string): string {
  const lines = MINUTES_COLUMNS.map((column) => {
    const nullability = column.nullable ? 'nullable' : 'not null';
    return `  - ${column.name} (${column.type}, ${nullability}): ${column.description}`;
  });

  return `Table: ${table} (one row per meeting)\nColumns:\n${lines.join('\n')}`;
}
