/**
 * Minutes Insights - SQL Parser
 *
 * Recursive-descent parser for the read-only SELECT subset. Anything
 * outside the grammar is a syntax error rather than a pass-through.
 */

import {
  SqlSyntaxError,
  type AggregateFn,
  type ColumnRef,
  type CompareOp,
  type Condition,
  type OrderItem,
  type ScalarFn,
  type SelectItem,
  type SelectQuery,
  type ValueExpr,
} from './ast.js';
import { tokenize, type Token, type TokenType } from './tokenizer.js';

const AGGREGATES: ReadonlySet<string> = new Set<AggregateFn>(['count', 'sum', 'avg', 'min', 'max']);
const SCALARS: ReadonlySet<string> = new Set<ScalarFn>(['lower', 'upper']);

function isAggregateFn(name: string): name is AggregateFn {
  return AGGREGATES.has(name);
}

function isScalarFn(name: string): name is ScalarFn {
  return SCALARS.has(name);
}

function toCompareOp(op: string): CompareOp | null {
  switch (op) {
    case '=':
    case '!=':
    case '<':
    case '<=':
    case '>':
    case '>=':
      return op;
    case '<>':
      return '!=';
    default:
      return null;
  }
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  // ---------------------------------------------------------------------------
  // Token helpers
  // ---------------------------------------------------------------------------

  private peek(offset = 0): Token {
    const index = Math.min(this.pos + offset, this.tokens.length - 1);
    const token = this.tokens[index];
    if (token === undefined) {
      throw new SqlSyntaxError('Unexpected end of input', 0);
    }
    return token;
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== 'eof') this.pos++;
    return token;
  }

  private check(type: TokenType, value?: string): boolean {
    const token = this.peek();
    return token.type === type && (value === undefined || token.value === value);
  }

  private match(type: TokenType, value?: string): boolean {
    if (this.check(type, value)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expect(type: TokenType, value?: string): Token {
    if (!this.check(type, value)) {
      const token = this.peek();
      const wanted = value ?? type;
      const found = token.type === 'eof' ? 'end of input' : `'${token.value}'`;
      throw new SqlSyntaxError(`Expected ${wanted} but found ${found}`, token.position);
    }
    return this.advance();
  }

  private fail(message: string): never {
    throw new SqlSyntaxError(message, this.peek().position);
  }

  private expectInteger(clause: string): number {
    const token = this.expect('number');
    if (!/^\d+$/.test(token.value)) {
      throw new SqlSyntaxError(`${clause} requires an integer`, token.position);
    }
    return Number(token.value);
  }

  // ---------------------------------------------------------------------------
  // Query
  // ---------------------------------------------------------------------------

  parseQuery(): SelectQuery {
    this.expect('keyword', 'SELECT');
    const distinct = this.match('keyword', 'DISTINCT');
    const columns = this.parseSelectList();

    this.expect('keyword', 'FROM');
    const from = this.expect('identifier').value;
    if (this.check('punct', '.')) {
      this.fail('Schema-qualified table names are not supported');
    }

    const query: SelectQuery = { distinct, columns, from, groupBy: [], orderBy: [] };

    if (this.match('keyword', 'WHERE')) {
      query.where = this.parseExpr();
    }

    if (this.match('keyword', 'GROUP')) {
      this.expect('keyword', 'BY');
      do {
        query.groupBy.push(this.parseGroupItem(columns));
      } while (this.match('punct', ','));
    }

    if (this.match('keyword', 'HAVING')) {
      query.having = this.parseExpr();
    }

    if (this.match('keyword', 'ORDER')) {
      this.expect('keyword', 'BY');
      do {
        query.orderBy.push(this.parseOrderItem());
      } while (this.match('punct', ','));
    }

    if (this.match('keyword', 'LIMIT')) {
      query.limit = this.expectInteger('LIMIT');
      if (this.match('keyword', 'OFFSET')) {
        query.offset = this.expectInteger('OFFSET');
      }
    } else if (this.match('keyword', 'OFFSET')) {
      query.offset = this.expectInteger('OFFSET');
    }

    if (!this.check('eof')) {
      this.fail(`Unexpected token '${this.peek().value}'`);
    }

    return query;
  }

  private parseSelectList(): SelectItem[] | '*' {
    if (this.match('punct', '*')) {
      return '*';
    }

    const items: SelectItem[] = [];
    do {
      if (this.check('punct', '*')) {
        this.fail("'*' cannot be combined with other select items");
      }
      const expr = this.parseValue();
      const item: SelectItem = { expr };
      if (this.match('keyword', 'AS')) {
        item.alias = this.expect('identifier').value;
      } else if (this.check('identifier')) {
        item.alias = this.advance().value;
      }
      items.push(item);
    } while (this.match('punct', ','));

    return items;
  }

  private parseGroupItem(columns: SelectItem[] | '*'): ValueExpr {
    if (this.check('number')) {
      const token = this.peek();
      const position = this.expectInteger('GROUP BY position');
      const target = columns === '*' ? undefined : columns[position - 1];
      if (target === undefined) {
        throw new SqlSyntaxError(`GROUP BY position ${position} is not in select list`, token.position);
      }
      return target.expr;
    }
    return this.parseValue();
  }

  private parseOrderItem(): OrderItem {
    let expr: OrderItem['expr'];
    if (this.check('number')) {
      const token = this.peek();
      const position = this.expectInteger('ORDER BY position');
      if (position < 1) {
        throw new SqlSyntaxError('ORDER BY position must be positive', token.position);
      }
      expr = { kind: 'ordinal', position };
    } else {
      expr = this.parseValue();
    }

    let direction: OrderItem['direction'] = 'asc';
    if (this.match('keyword', 'DESC')) {
      direction = 'desc';
    } else {
      this.match('keyword', 'ASC');
    }

    return { expr, direction };
  }

  // ---------------------------------------------------------------------------
  // Conditions
  // ---------------------------------------------------------------------------

  private parseExpr(): Condition {
    const operands = [this.parseAnd()];
    while (this.match('keyword', 'OR')) {
      operands.push(this.parseAnd());
    }
    const [first] = operands;
    return operands.length === 1 && first !== undefined ? first : { kind: 'or', operands };
  }

  private parseAnd(): Condition {
    const operands = [this.parseNot()];
    while (this.match('keyword', 'AND')) {
      operands.push(this.parseNot());
    }
    const [first] = operands;
    return operands.length === 1 && first !== undefined ? first : { kind: 'and', operands };
  }

  private parseNot(): Condition {
    if (this.match('keyword', 'NOT')) {
      return { kind: 'not', operand: this.parseNot() };
    }
    return this.parsePredicate();
  }

  private parsePredicate(): Condition {
    if (this.match('punct', '(')) {
      const inner = this.parseExpr();
      this.expect('punct', ')');
      return inner;
    }

    const value = this.parseValue();

    if (this.check('operator')) {
      const token = this.advance();
      const op = toCompareOp(token.value);
      if (op === null) {
        throw new SqlSyntaxError(`Unsupported operator '${token.value}'`, token.position);
      }
      return { kind: 'compare', op, left: value, right: this.parseValue() };
    }

    if (this.match('keyword', 'IS')) {
      const negated = this.match('keyword', 'NOT');
      this.expect('keyword', 'NULL');
      return { kind: 'isNull', negated, value };
    }

    const negated = this.match('keyword', 'NOT');

    if (this.check('keyword', 'LIKE') || this.check('keyword', 'ILIKE')) {
      const caseInsensitive = this.advance().value === 'ILIKE';
      return { kind: 'like', negated, caseInsensitive, value, pattern: this.parseValue() };
    }

    if (this.match('keyword', 'IN')) {
      this.expect('punct', '(');
      const list: ValueExpr[] = [];
      do {
        list.push(this.parseValue());
      } while (this.match('punct', ','));
      this.expect('punct', ')');
      return { kind: 'in', negated, value, list };
    }

    if (this.match('keyword', 'BETWEEN')) {
      const low = this.parseValue();
      this.expect('keyword', 'AND');
      const high = this.parseValue();
      return { kind: 'between', negated, value, low, high };
    }

    return this.fail('Expected a comparison, LIKE, IN, BETWEEN or IS NULL');
  }

  // ---------------------------------------------------------------------------
  // Values
  // ---------------------------------------------------------------------------

  private parseValue(): ValueExpr {
    const token = this.peek();

    switch (token.type) {
      case 'string':
        this.advance();
        return { kind: 'literal', value: token.value };

      case 'number':
        this.advance();
        return { kind: 'literal', value: Number(token.value) };

      case 'param':
        this.advance();
        return { kind: 'param', index: Number(token.value) };

      case 'operator':
        if (token.value === '-' && this.peek(1).type === 'number') {
          this.advance();
          return { kind: 'literal', value: -Number(this.advance().value) };
        }
        return this.fail(`Unexpected operator '${token.value}'`);

      case 'keyword':
        if (token.value === 'NULL') {
          this.advance();
          return { kind: 'literal', value: null };
        }
        if (token.value === 'TRUE' || token.value === 'FALSE') {
          this.advance();
          return { kind: 'literal', value: token.value === 'TRUE' };
        }
        return this.fail(`Unexpected keyword ${token.value}`);

      case 'identifier':
        if (!token.quoted && this.peek(1).type === 'punct' && this.peek(1).value === '(') {
          return this.parseCall();
        }
        return this.parseColumn();

      default:
        return this.fail(token.type === 'eof' ? 'Unexpected end of input' : `Unexpected '${token.value}'`);
    }
  }

  private parseColumn(): ColumnRef {
    const first = this.expect('identifier').value;
    if (this.match('punct', '.')) {
      const name = this.expect('identifier').value;
      return { kind: 'column', name, table: first };
    }
    return { kind: 'column', name: first };
  }

  private parseCall(): ValueExpr {
    const nameToken = this.advance();
    const name = nameToken.value;
    this.expect('punct', '(');

    if (isAggregateFn(name)) {
      if (name === 'count' && this.match('punct', '*')) {
        this.expect('punct', ')');
        return { kind: 'aggregate', fn: 'count', arg: null, distinct: false };
      }
      const distinct = this.check('keyword', 'DISTINCT');
      if (distinct && name !== 'count') {
        this.fail(`DISTINCT is only supported inside COUNT`);
      }
      this.match('keyword', 'DISTINCT');
      if (!this.check('identifier')) {
        this.fail(`${name.toUpperCase()} expects a column`);
      }
      const arg = this.parseColumn();
      this.expect('punct', ')');
      return { kind: 'aggregate', fn: name, arg, distinct };
    }

    if (isScalarFn(name)) {
      const arg = this.parseValue();
      this.expect('punct', ')');
      return { kind: 'call', fn: name, arg };
    }

    throw new SqlSyntaxError(`Function ${name} is not supported`, nameToken.position);
  }
}

/**
 * Parse a SQL string into a query AST
 */
export function parseQuery(sql: string): SelectQuery {
  return new Parser(tokenize(sql)).parseQuery();
}
