/**
 * Minutes Insights - Minutes Table Migration
 * Creates the read-only meeting minutes table
 */

export const migrationName = '001-minutes-schema';

export const up = (table: string): string => `
-- =============================================================================
-- Minutes Table
-- One row per meeting, loaded by an external import job
-- =============================================================================
CREATE TABLE IF NOT EXISTS ${table} (
  id INTEGER PRIMARY KEY,
  week_number INTEGER NOT NULL,
  meeting_date DATE NOT NULL,
  details TEXT NOT NULL,
  attendees TEXT NOT NULL,
  meeting_topic TEXT NOT NULL,
  meeting_purpose TEXT NOT NULL,
  summary TEXT NOT NULL,
  target_date DATE,
  future_plan TEXT,
  decisions TEXT,
  responsible TEXT,
  notes TEXT
);

CREATE INDEX IF NOT EXISTS idx_${table}_meeting_date ON ${table} (meeting_date DESC);
CREATE INDEX IF NOT EXISTS idx_${table}_week_number ON ${table} (week_number);
CREATE INDEX IF NOT EXISTS idx_${table}_target_date ON ${table} (target_date) WHERE target_date IS NOT NULL;
`;

export const down = (table: string): string => `
DROP TABLE IF EXISTS ${table};
`;
