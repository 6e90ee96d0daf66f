/**
 * Minutes Insights - SQL Formatter
 *
 * Serializes a query AST to canonical PostgreSQL text. Compound
 * sub-conditions are always parenthesized so the output re-parses to
 * the same tree.
 */

import type { Condition, OrderItem, SelectItem, SelectQuery, ValueExpr } from './ast.js';
import { KEYWORDS } from './tokenizer.js';

const BARE_IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

export function formatIdentifier(name: string): string {
  if (BARE_IDENTIFIER.test(name) && !KEYWORDS.has(name.toUpperCase())) {
    return name;
  }
  return `"${name}"`;
}

function formatLiteral(value: string | number | boolean | null): string {
  if (value === null) return 'NULL';
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (typeof value === 'number') return String(value);
  return `'${value.replace(/'/g, "''")}'`;
}

export function formatValue(expr: ValueExpr): string {
  switch (expr.kind) {
    case 'literal':
      return formatLiteral(expr.value);
    case 'column':
      return expr.table !== undefined
        ? `${formatIdentifier(expr.table)}.${formatIdentifier(expr.name)}`
        : formatIdentifier(expr.name);
    case 'param':
      return `$${expr.index}`;
    case 'aggregate': {
      const fn = expr.fn.toUpperCase();
      if (expr.arg === null) return `${fn}(*)`;
      return `${fn}(${expr.distinct ? 'DISTINCT ' : ''}${formatValue(expr.arg)})`;
    }
    case 'call':
      return `${expr.fn.toUpperCase()}(${formatValue(expr.arg)})`;
  }
}

function formatOperand(condition: Condition): string {
  const text = formatCondition(condition);
  return condition.kind === 'and' || condition.kind === 'or' || condition.kind === 'not'
    ? `(${text})`
    : text;
}

export function formatCondition(condition: Condition): string {
  switch (condition.kind) {
    case 'and':
      return condition.operands.map(formatOperand).join(' AND ');
    case 'or':
      return condition.operands.map(formatOperand).join(' OR ');
    case 'not':
      return `NOT (${formatCondition(condition.operand)})`;
    case 'compare':
      return `${formatValue(condition.left)} ${condition.op} ${formatValue(condition.right)}`;
    case 'like': {
      const op = condition.caseInsensitive ? 'ILIKE' : 'LIKE';
      const not = condition.negated ? 'NOT ' : '';
      return `${formatValue(condition.value)} ${not}${op} ${formatValue(condition.pattern)}`;
    }
    case 'in': {
      const not = condition.negated ? 'NOT ' : '';
      return `${formatValue(condition.value)} ${not}IN (${condition.list.map(formatValue).join(', ')})`;
    }
    case 'between': {
      const not = condition.negated ? 'NOT ' : '';
      return `${formatValue(condition.value)} ${not}BETWEEN ${formatValue(condition.low)} AND ${formatValue(condition.high)}`;
    }
    case 'isNull':
      return `${formatValue(condition.value)} IS ${condition.negated ? 'NOT ' : ''}NULL`;
  }
}

function formatSelectItem(item: SelectItem): string {
  const value = formatValue(item.expr);
  return item.alias !== undefined ? `${value} AS ${formatIdentifier(item.alias)}` : value;
}

function formatOrderItem(item: OrderItem): string {
  const target = item.expr.kind === 'ordinal' ? String(item.expr.position) : formatValue(item.expr);
  return `${target} ${item.direction.toUpperCase()}`;
}

export function formatQuery(query: SelectQuery): string {
  const parts: string[] = ['SELECT'];
  if (query.distinct) parts.push('DISTINCT');
  parts.push(query.columns === '*' ? '*' : query.columns.map(formatSelectItem).join(', '));
  parts.push('FROM', formatIdentifier(query.from));

  if (query.where) parts.push('WHERE', formatCondition(query.where));
  if (query.groupBy.length > 0) parts.push('GROUP BY', query.groupBy.map(formatValue).join(', '));
  if (query.having) parts.push('HAVING', formatCondition(query.having));
  if (query.orderBy.length > 0) parts.push('ORDER BY', query.orderBy.map(formatOrderItem).join(', '));
  if (query.limit !== undefined) parts.push('LIMIT', String(query.limit));
  if (query.offset !== undefined) parts.push('OFFSET', String(query.offset));

  return parts.join(' ');
}
