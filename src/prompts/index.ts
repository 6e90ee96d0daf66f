/**
 * Minutes Insights - Prompts Module
 */

export {
  buildGlobalInstruction,
  buildRootInstruction,
  buildNl2SqlInstruction,
  buildAnalyticsInstruction,
} from './instructions.js';
export type { SqlRules } from './instructions.js';
