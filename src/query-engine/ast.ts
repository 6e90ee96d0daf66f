/**
 * Minutes Insights - Query AST
 *
 * Syntax tree for the read-only SQL subset the NL2SQL agent may emit.
 */

import { InsightsError } from '../utils/types.js';

// =============================================================================
// Errors
// =============================================================================

export class SqlSyntaxError extends InsightsError {
  public readonly position: number;

  constructor(message: string, position: number) {
    super(`${message} (at position ${position})`, 422, 'SQL_SYNTAX_ERROR', true);
    this.name = 'SqlSyntaxError';
    this.position = position;
  }
}

export class SqlSemanticError extends InsightsError {
  constructor(message: string) {
    super(message, 422, 'SQL_SEMANTIC_ERROR', true);
    this.name = 'SqlSemanticError';
  }
}

// =============================================================================
// Value Expressions
// =============================================================================

export type SqlValue = string | number | boolean | null;

export interface Literal {
  kind: 'literal';
  value: SqlValue;
}

export interface ColumnRef {
  kind: 'column';
  name: string;
  table?: string;
}

export interface ParamRef {
  kind: 'param';
  index: number;
}

export type AggregateFn = 'count' | 'sum' | 'avg' | 'min' | 'max';

export interface Aggregate {
  kind: 'aggregate';
  fn: AggregateFn;
  /** null for COUNT(*) */
  arg: ColumnRef | null;
  distinct: boolean;
}

export type ScalarFn = 'lower' | 'upper';

export interface ScalarCall {
  kind: 'call';
  fn: ScalarFn;
  arg: ValueExpr;
}

export type ValueExpr = Literal | ColumnRef | ParamRef | Aggregate | ScalarCall;

// =============================================================================
// Conditions
// =============================================================================

export type CompareOp = '=' | '!=' | '<' | '<=' | '>' | '>=';

export type Condition =
  | { kind: 'and'; operands: Condition[] }
  | { kind: 'or'; operands: Condition[] }
  | { kind: 'not'; operand: Condition }
  | { kind: 'compare'; op: CompareOp; left: ValueExpr; right: ValueExpr }
  | { kind: 'like'; negated: boolean; caseInsensitive: boolean; value: ValueExpr; pattern: ValueExpr }
  | { kind: 'in'; negated: boolean; value: ValueExpr; list: ValueExpr[] }
  | { kind: 'between'; negated: boolean; value: ValueExpr; low: ValueExpr; high: ValueExpr }
  | { kind: 'isNull'; negated: boolean; value: ValueExpr };

// =============================================================================
// Query
// =============================================================================

export interface SelectItem {
  expr: ValueExpr;
  alias?: string;
}

export interface Ordinal {
  kind: 'ordinal';
  position: number;
}

export interface OrderItem {
  expr: ValueExpr | Ordinal;
  direction: 'asc' | 'desc';
}

export interface SelectQuery {
  distinct: boolean;
  /** '*' selects every column of the table */
  columns: SelectItem[] | '*';
  from: string;
  where?: Condition;
  groupBy: ValueExpr[];
  having?: Condition;
  orderBy: OrderItem[];
  limit?: number;
  offset?: number;
}

// =============================================================================
// Walkers
// =============================================================================

function valueChildren(expr: ValueExpr): ValueExpr[] {
  switch (expr.kind) {
    case 'aggregate':
      return expr.arg ? [expr.arg] : [];
    case 'call':
      return [expr.arg];
    default:
      return [];
  }
}

function conditionValues(condition: Condition): ValueExpr[] {
  switch (condition.kind) {
    case 'and':
    case 'or':
      return condition.operands.flatMap(conditionValues);
    case 'not':
      return conditionValues(condition.operand);
    case 'compare':
      return [condition.left, condition.right];
    case 'like':
      return [condition.value, condition.pattern];
    case 'in':
      return [condition.value, ...condition.list];
    case 'between':
      return [condition.value, condition.low, condition.high];
    case 'isNull':
      return [condition.value];
  }
}

function flattenValues(exprs: ValueExpr[]): ValueExpr[] {
  const out: ValueExpr[] = [];
  const visit = (expr: ValueExpr): void => {
    out.push(expr);
    valueChildren(expr).forEach(visit);
  };
  exprs.forEach(visit);
  return out;
}

export type QueryClause = 'select' | 'where' | 'groupBy' | 'having' | 'orderBy';

/**
 * Every value expression in the query, tagged with the clause it sits in
 */
export function collectValues(query: SelectQuery): { clause: QueryClause; expr: ValueExpr }[] {
  const tagged: { clause: QueryClause; expr: ValueExpr }[] = [];
  const add = (clause: QueryClause, exprs: ValueExpr[]): void => {
    for (const expr of flattenValues(exprs)) {
      tagged.push({ clause, expr });
    }
  };

  if (query.columns !== '*') {
    add('select', query.columns.map((c) => c.expr));
  }
  if (query.where) add('where', conditionValues(query.where));
  add('groupBy', query.groupBy);
  if (query.having) add('having', conditionValues(query.having));
  add(
    'orderBy',
    query.orderBy.flatMap((o) => (o.expr.kind === 'ordinal' ? [] : [o.expr]))
  );

  return tagged;
}

export function countOrNodes(condition: Condition | undefined): number {
  if (!condition) return 0;
  switch (condition.kind) {
    case 'or':
      return 1 + condition.operands.reduce((sum, c) => sum + countOrNodes(c), 0);
    case 'and':
      return condition.operands.reduce((sum, c) => sum + countOrNodes(c), 0);
    case 'not':
      return countOrNodes(condition.operand);
    default:
      return 0;
  }
}

/**
 * Structural equality of two value expressions (qualifiers ignored)
 */
export function sameValue(a: ValueExpr, b: ValueExpr): boolean {
  switch (a.kind) {
    case 'literal':
      return b.kind === 'literal' && a.value === b.value;
    case 'column':
      return b.kind === 'column' && a.name === b.name;
    case 'param':
      return b.kind === 'param' && a.index === b.index;
    case 'aggregate':
      return (
        b.kind === 'aggregate' &&
        a.fn === b.fn &&
        a.distinct === b.distinct &&
        (a.arg === null ? b.arg === null : b.arg !== null && sameValue(a.arg, b.arg))
      );
    case 'call':
      return b.kind === 'call' && a.fn === b.fn && sameValue(a.arg, b.arg);
  }
}

export function containsAggregate(expr: ValueExpr): boolean {
  return flattenValues([expr]).some((e) => e.kind === 'aggregate');
}
