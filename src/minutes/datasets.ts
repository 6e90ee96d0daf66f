/**
 * Minutes Insights - Dataset Descriptors
 *
 * Loads the `{"datasets": [...]}` descriptor file that tells the NL2SQL
 * agent which tables it may query and what they hold.
 */

import fs from 'fs';

import { z } from 'zod';

import { formatValidationErrors } from '../config/schema.js';
import logger from '../utils/logger.js';
import { ConfigurationError } from '../utils/types.js';

export const DatasetDescriptorSchema = z.object({
  type: z.string().trim().min(1),
  name: z.string().trim().min(1),
  description: z.string().trim().min(1),
});

export const DatasetFileSchema = z.object({
  datasets: z.array(DatasetDescriptorSchema).min(1),
});

export type DatasetDescriptor = z.infer<typeof DatasetDescriptorSchema>;

export function defaultDatasets(table: string): DatasetDescriptor[] {
  return [
    {
      type: 'table',
      name: table,
      description: 'Meeting minutes, one row per meeting, with attendees, decisions and follow-ups.',
    },
  ];
}

/**
 * Load dataset descriptors from a JSON file
 *
 * A missing file yields the built-in descriptor; a malformed one is a
 * configuration error.
 */
export async function loadDatasets(filePath: string, table: string): Promise<DatasetDescriptor[]> {
  if (!fs.existsSync(filePath)) {
    logger.info('Dataset descriptor file not found, using built-in descriptor', { path: filePath });
    return defaultDatasets(table);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.promises.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Dataset descriptor file ${filePath} is not valid JSON: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
  }

  const parsed = DatasetFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid dataset descriptor file ${filePath}: ${formatValidationErrors(parsed.error).join('; ')}`
    );
  }

  return parsed.data.datasets;
}

export function describeDatasets(datasets: DatasetDescriptor[]): string {
  return datasets.map((d) => `- ${d.name} (${d.type}): ${d.description}`).join('\n');
}
