/**
 * Minutes Insights - Model Output JSON Extraction
 */

import { LlmError } from '../utils/types.js';

/**
 * Parse the JSON payload out of a model reply
 *
 * Strips Markdown fences and any prose before the first `{`/`[` and after
 * the last `}`/`]`.
 */
export function extractJson(text: string): unknown {
  let cleaned = text.trim();

  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(cleaned);
  if (fenced?.[1] !== undefined) {
    cleaned = fenced[1].trim();
  }

  const starts = [cleaned.indexOf('{'), cleaned.indexOf('[')].filter((i) => i >= 0);
  const end = Math.max(cleaned.lastIndexOf('}'), cleaned.lastIndexOf(']'));

  if (starts.length === 0 || end < 0) {
    throw new LlmError('Model reply contained no JSON');
  }

  const start = Math.min(...starts);
  if (end < start) {
    throw new LlmError('Model reply contained no JSON');
  }

  try {
    return JSON.parse(cleaned.slice(start, end + 1));
  } catch (error) {
    throw new LlmError(
      `Model reply was not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
