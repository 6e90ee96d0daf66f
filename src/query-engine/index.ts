/**
 * Minutes Insights - Query Engine Module
 */

export { SqlSyntaxError, SqlSemanticError, collectValues, countOrNodes, containsAggregate } from './ast.js';
export type {
  SelectQuery,
  SelectItem,
  OrderItem,
  ValueExpr,
  ColumnRef,
  Aggregate,
  Condition,
  SqlValue,
  QueryClause,
} from './ast.js';

export { tokenize } from './tokenizer.js';
export type { Token, TokenType } from './tokenizer.js';

export { parseQuery } from './parser.js';
export { formatQuery, formatCondition, formatValue, formatIdentifier } from './formatter.js';
export { executeQuery, compareValues, outputName, outputNames } from './evaluator.js';
export type { Row, QueryOutput } from './evaluator.js';
