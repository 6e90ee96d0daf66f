/**
 * Minutes Insights - Query Evaluator
 *
 * Runs a parsed SELECT over in-memory rows with PostgreSQL semantics for
 * the supported subset: three-valued logic, grouping, NULL ordering and
 * output naming.
 */

import {
  SqlSemanticError,
  containsAggregate,
  sameValue,
  type Aggregate,
  type ColumnRef,
  type CompareOp,
  type Condition,
  type SelectItem,
  type SelectQuery,
  type SqlValue,
  type ValueExpr,
} from './ast.js';

export type Row = Record<string, unknown>;

export interface QueryOutput {
  columns: string[];
  rows: Row[];
}

type Truth = boolean | null;

type EvalContext = { kind: 'row'; row: Row } | { kind: 'group'; rows: Row[] };

interface Projected {
  output: Row;
  context: EvalContext;
}

// =============================================================================
// Value Helpers
// =============================================================================

function toSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') return Number(value);
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return String(value);
}

function asNumber(value: SqlValue): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Compare two values; null when either side is NULL
 */
export function compareValues(a: SqlValue, b: SqlValue): number | null {
  if (a === null || b === null) return null;

  if (typeof a === 'number' || typeof b === 'number') {
    const left = asNumber(a);
    const right = asNumber(b);
    if (left !== null && right !== null) {
      return Math.sign(left - right);
    }
  }

  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }

  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function not(value: Truth): Truth {
  return value === null ? null : !value;
}

function and(values: Truth[]): Truth {
  if (values.some((v) => v === false)) return false;
  if (values.some((v) => v === null)) return null;
  return true;
}

function or(values: Truth[]): Truth {
  if (values.some((v) => v === true)) return true;
  if (values.some((v) => v === null)) return null;
  return false;
}

function likeToRegExp(pattern: string, caseInsensitive: boolean): RegExp {
  let source = '';
  for (const ch of pattern) {
    if (ch === '%') source += '.*';
    else if (ch === '_') source += '.';
    else source += ch.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  }
  return new RegExp(`^${source}$`, caseInsensitive ? 'is' : 's');
}

function applyCompare(op: CompareOp, cmp: number): boolean {
  switch (op) {
    case '=':
      return cmp === 0;
    case '!=':
      return cmp !== 0;
    case '<':
      return cmp < 0;
    case '<=':
      return cmp <= 0;
    case '>':
      return cmp > 0;
    case '>=':
      return cmp >= 0;
  }
}

function distinctKey(value: SqlValue): string {
  return `${typeof value}:${String(value)}`;
}

// =============================================================================
// Output Naming
// =============================================================================

export function outputName(item: SelectItem): string {
  if (item.alias !== undefined) return item.alias;
  switch (item.expr.kind) {
    case 'column':
      return item.expr.name;
    case 'aggregate':
    case 'call':
      return item.expr.fn;
    default:
      return '?column?';
  }
}

/**
 * Output names for a select list; repeated names get a `_2`, `_3`... suffix
 */
export function outputNames(items: readonly SelectItem[]): string[] {
  const base = items.map(outputName);
  const taken = new Set(base);
  const used = new Set<string>();

  return base.map((name) => {
    if (!used.has(name)) {
      used.add(name);
      return name;
    }
    let n = 2;
    while (taken.has(`${name}_${n}`) || used.has(`${name}_${n}`)) n++;
    const unique = `${name}_${n}`;
    used.add(unique);
    return unique;
  });
}

// =============================================================================
// Evaluator
// =============================================================================

class Evaluator {
  constructor(private readonly params: readonly unknown[]) {}

  value(expr: ValueExpr, ctx: EvalContext): SqlValue {
    switch (expr.kind) {
      case 'literal':
        return expr.value;

      case 'param': {
        if (expr.index > this.params.length) {
          throw new SqlSemanticError(`There is no parameter $${expr.index}`);
        }
        return toSqlValue(this.params[expr.index - 1]);
      }

      case 'column': {
        const row = ctx.kind === 'row' ? ctx.row : ctx.rows[0];
        if (row === undefined) return null;
        if (!Object.prototype.hasOwnProperty.call(row, expr.name)) {
          throw new SqlSemanticError(`column "${expr.name}" does not exist`);
        }
        return toSqlValue(row[expr.name]);
      }

      case 'aggregate':
        if (ctx.kind !== 'group') {
          throw new SqlSemanticError('aggregate functions are not allowed in WHERE');
        }
        return this.aggregate(expr, ctx.rows);

      case 'call': {
        const inner = this.value(expr.arg, ctx);
        if (inner === null) return null;
        const text = String(inner);
        return expr.fn === 'lower' ? text.toLowerCase() : text.toUpperCase();
      }
    }
  }

  private aggregate(expr: Aggregate, rows: Row[]): SqlValue {
    const { arg } = expr;
    if (arg === null) {
      return rows.length;
    }

    let values = rows
      .map((row) => this.value(arg, { kind: 'row', row }))
      .filter((v): v is Exclude<SqlValue, null> => v !== null);

    if (expr.distinct) {
      const seen = new Set<string>();
      values = values.filter((v) => {
        const key = distinctKey(v);
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
      });
    }

    switch (expr.fn) {
      case 'count':
        return values.length;

      case 'sum':
      case 'avg': {
        if (values.length === 0) return null;
        const numbers = values.map((v) => {
          const n = asNumber(v);
          if (n === null || typeof v === 'boolean') {
            throw new SqlSemanticError(`function ${expr.fn}(${typeof v}) does not exist`);
          }
          return n;
        });
        const total = numbers.reduce((sum, n) => sum + n, 0);
        return expr.fn === 'sum' ? total : total / numbers.length;
      }

      case 'min':
      case 'max': {
        let best: SqlValue = null;
        for (const v of values) {
          const cmp = compareValues(v, best);
          if (best === null || (cmp !== null && (expr.fn === 'min' ? cmp < 0 : cmp > 0))) {
            best = v;
          }
        }
        return best;
      }
    }
  }

  condition(condition: Condition, ctx: EvalContext): Truth {
    switch (condition.kind) {
      case 'and':
        return and(condition.operands.map((c) => this.condition(c, ctx)));

      case 'or':
        return or(condition.operands.map((c) => this.condition(c, ctx)));

      case 'not':
        return not(this.condition(condition.operand, ctx));

      case 'compare': {
        const cmp = compareValues(this.value(condition.left, ctx), this.value(condition.right, ctx));
        return cmp === null ? null : applyCompare(condition.op, cmp);
      }

      case 'like': {
        const value = this.value(condition.value, ctx);
        const pattern = this.value(condition.pattern, ctx);
        if (value === null || pattern === null) return null;
        const matched = likeToRegExp(String(pattern), condition.caseInsensitive).test(String(value));
        return condition.negated ? !matched : matched;
      }

      case 'in': {
        const value = this.value(condition.value, ctx);
        if (value === null) return null;
        const results = condition.list.map((item): Truth => {
          const cmp = compareValues(value, this.value(item, ctx));
          return cmp === null ? null : cmp === 0;
        });
        const found = or(results);
        return condition.negated ? not(found) : found;
      }

      case 'between': {
        const value = this.value(condition.value, ctx);
        const low = compareValues(value, this.value(condition.low, ctx));
        const high = compareValues(value, this.value(condition.high, ctx));
        const within = and([low === null ? null : low >= 0, high === null ? null : high <= 0]);
        return condition.negated ? not(within) : within;
      }

      case 'isNull': {
        const isNull = this.value(condition.value, ctx) === null;
        return condition.negated ? !isNull : isNull;
      }
    }
  }
}

// =============================================================================
// Grouping Checks
// =============================================================================

function isGrouped(query: SelectQuery): boolean {
  if (query.groupBy.length > 0 || query.having !== undefined) return true;
  return query.columns !== '*' && query.columns.some((c) => containsAggregate(c.expr));
}

function isCovered(expr: ValueExpr, groupBy: ValueExpr[]): boolean {
  if (groupBy.some((g) => sameValue(g, expr))) return true;
  switch (expr.kind) {
    case 'literal':
    case 'param':
    case 'aggregate':
      return true;
    case 'column':
      return false;
    case 'call':
      return isCovered(expr.arg, groupBy);
  }
}

function assertCovered(expr: ValueExpr, groupBy: ValueExpr[]): void {
  if (!isCovered(expr, groupBy)) {
    const name = expr.kind === 'column' ? expr.name : expr.kind;
    throw new SqlSemanticError(
      `column "${name}" must appear in the GROUP BY clause or be used in an aggregate function`
    );
  }
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Execute a query over in-memory rows
 *
 * `sourceColumns` lists the table's columns so `SELECT *` has a shape
 * even when no rows match.
 */
export function executeQuery(
  query: SelectQuery,
  rows: readonly Row[],
  params: readonly unknown[] = [],
  sourceColumns: readonly string[] = []
): QueryOutput {
  const evaluator = new Evaluator(params);
  const { where } = query;

  if (where !== undefined && collectConditionValues(where).some(containsAggregate)) {
    throw new SqlSemanticError('aggregate functions are not allowed in WHERE');
  }

  const grouped = isGrouped(query);
  if (query.columns === '*' && grouped) {
    throw new SqlSemanticError('SELECT * cannot be used with GROUP BY or aggregates');
  }

  const filtered =
    where !== undefined
      ? rows.filter((row) => evaluator.condition(where, { kind: 'row', row }) === true)
      : [...rows];

  const items: SelectItem[] =
    query.columns === '*'
      ? (sourceColumns.length > 0 ? sourceColumns : Object.keys(rows[0] ?? {})).map(
          (name): SelectItem => ({ expr: { kind: 'column', name } })
        )
      : query.columns;
  const columns = outputNames(items);

  let contexts: EvalContext[];
  if (grouped) {
    for (const item of items) {
      assertCovered(item.expr, query.groupBy);
    }
    for (const order of query.orderBy) {
      if (order.expr.kind !== 'ordinal' && !isOutputReference(order.expr, columns)) {
        assertCovered(order.expr, query.groupBy);
      }
    }
    contexts = buildGroups(filtered, query.groupBy, evaluator);
    const having = query.having;
    if (having !== undefined) {
      for (const value of collectConditionValues(having)) {
        assertCovered(value, query.groupBy);
      }
      contexts = contexts.filter((ctx) => evaluator.condition(having, ctx) === true);
    }
  } else {
    contexts = filtered.map((row) => ({ kind: 'row', row }));
  }

  let projected: Projected[] = contexts.map((context) => {
    const output: Row = {};
    items.forEach((item, index) => {
      const name = columns[index];
      if (name !== undefined) {
        output[name] = evaluator.value(item.expr, context);
      }
    });
    return { output, context };
  });

  if (query.orderBy.length > 0) {
    projected = sortProjected(projected, query, columns, evaluator);
  }

  let outputRows = projected.map((p) => p.output);

  if (query.distinct) {
    const seen = new Set<string>();
    outputRows = outputRows.filter((row) => {
      const key = JSON.stringify(columns.map((c) => row[c]));
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  }

  const start = query.offset ?? 0;
  const end = query.limit !== undefined ? start + query.limit : undefined;
  outputRows = outputRows.slice(start, end);

  return { columns, rows: outputRows };
}

function collectConditionValues(condition: Condition): ValueExpr[] {
  switch (condition.kind) {
    case 'and':
    case 'or':
      return condition.operands.flatMap(collectConditionValues);
    case 'not':
      return collectConditionValues(condition.operand);
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

function isOutputReference(expr: ValueExpr, columns: string[]): expr is ColumnRef {
  return expr.kind === 'column' && expr.table === undefined && columns.includes(expr.name);
}

function buildGroups(rows: Row[], groupBy: ValueExpr[], evaluator: Evaluator): EvalContext[] {
  if (groupBy.length === 0) {
    return [{ kind: 'group', rows }];
  }

  const groups = new Map<string, Row[]>();
  for (const row of rows) {
    const key = JSON.stringify(
      groupBy.map((expr) => {
        const value = evaluator.value(expr, { kind: 'row', row });
        return value === null ? null : distinctKey(value);
      })
    );
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(row);
    } else {
      groups.set(key, [row]);
    }
  }

  return [...groups.values()].map((groupRows) => ({ kind: 'group', rows: groupRows }));
}

function sortProjected(
  projected: Projected[],
  query: SelectQuery,
  columns: string[],
  evaluator: Evaluator
): Projected[] {
  const keyOf = (entry: Projected): SqlValue[] =>
    query.orderBy.map((order) => {
      const { expr } = order;
      if (expr.kind === 'ordinal') {
        const name = columns[expr.position - 1];
        if (name === undefined) {
          throw new SqlSemanticError(`ORDER BY position ${expr.position} is not in select list`);
        }
        return toSqlValue(entry.output[name]);
      }
      if (isOutputReference(expr, columns)) {
        return toSqlValue(entry.output[expr.name]);
      }
      return evaluator.value(expr, entry.context);
    });

  const keyed = projected.map((entry) => ({ entry, key: keyOf(entry) }));

  keyed.sort((a, b) => {
    for (let i = 0; i < query.orderBy.length; i++) {
      const order = query.orderBy[i];
      const left = a.key[i] ?? null;
      const right = b.key[i] ?? null;
      if (order === undefined) continue;
      const descending = order.direction === 'desc';

      if (left === null && right === null) continue;
      // NULL sorts as the largest value: last ascending, first descending
      if (left === null) return descending ? -1 : 1;
      if (right === null) return descending ? 1 : -1;

      const cmp = compareValues(left, right) ?? 0;
      if (cmp !== 0) return descending ? -cmp : cmp;
    }
    return 0;
  });

  return keyed.map((k) => k.entry);
}
