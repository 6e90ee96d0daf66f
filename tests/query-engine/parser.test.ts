/**
 * Minutes Insights - SQL Parser Tests
 * Tokenizer, parser and formatter for the constrained SELECT subset
 */

import { describe, it, expect } from '@jest/globals';

import { SqlSyntaxError } from '../../src/query-engine/ast.js';
import { formatIdentifier, formatQuery } from '../../src/query-engine/formatter.js';
import { parseQuery } from '../../src/query-engine/parser.js';
import { tokenize } from '../../src/query-engine/tokenizer.js';

// =============================================================================
// Tokenizer
// =============================================================================

describe('tokenize', () => {
  it('should upper-case keywords and lower-case bare identifiers', () => {
    const tokens = tokenize('select Meeting_Topic from MINUTES');

    expect(tokens.map((t) => [t.type, t.value])).toEqual([
      ['keyword', 'SELECT'],
      ['identifier', 'meeting_topic'],
      ['keyword', 'FROM'],
      ['identifier', 'minutes'],
      ['eof', ''],
    ]);
  });

  it('should record token positions', () => {
    const tokens = tokenize('SELECT id FROM minutes WHERE id = $1');
    expect(tokens.find((t) => t.type === 'param')).toEqual({ type: 'param', value: '1', position: 34 });
  });

  it('should unescape doubled quotes in string literals', () => {
    const [, , literal] = tokenize("id = 'it''s'");
    expect(literal).toEqual({ type: 'string', value: "it's", position: 5 });
  });

  it('should keep the case of quoted identifiers', () => {
    const [token] = tokenize('"Week Number"');
    expect(token).toEqual({ type: 'identifier', value: 'Week Number', position: 0, quoted: true });
  });

  it('should reject a second statement', () => {
    expect(() => tokenize('SELECT id FROM minutes; DROP TABLE minutes')).toThrow(
      'Only a single statement is allowed (at position 22)'
    );
  });

  it('should reject comments', () => {
    expect(() => tokenize('SELECT id FROM minutes -- all of them')).toThrow('Comments are not allowed');
    expect(() => tokenize('SELECT /* x */ id FROM minutes')).toThrow('Comments are not allowed');
  });

  it('should reject unterminated strings', () => {
    expect(() => tokenize("SELECT id FROM minutes WHERE notes = 'open")).toThrow(
      'Unterminated string literal (at position 37)'
    );
  });

  it('should reject $0 placeholders', () => {
    expect(() => tokenize('SELECT $0')).toThrow('Invalid parameter placeholder');
  });
});

// =============================================================================
// Parser
// =============================================================================

describe('parseQuery', () => {
  it('should parse a simple select', () => {
    expect(parseQuery('SELECT id, meeting_date FROM minutes')).toEqual({
      distinct: false,
      columns: [{ expr: { kind: 'column', name: 'id' } }, { expr: { kind: 'column', name: 'meeting_date' } }],
      from: 'minutes',
      groupBy: [],
      orderBy: [],
    });
  });

  it('should parse aliases with and without AS', () => {
    const query = parseQuery('SELECT COUNT(*) AS total, meeting_topic topic FROM minutes GROUP BY meeting_topic');

    expect(query.columns).toEqual([
      { expr: { kind: 'aggregate', fn: 'count', arg: null, distinct: false }, alias: 'total' },
      { expr: { kind: 'column', name: 'meeting_topic' }, alias: 'topic' },
    ]);
    expect(query.groupBy).toEqual([{ kind: 'column', name: 'meeting_topic' }]);
  });

  it('should resolve GROUP BY ordinals to select expressions', () => {
    const query = parseQuery('SELECT LOWER(meeting_topic), COUNT(*) FROM minutes GROUP BY 1');
    expect(query.groupBy).toEqual([{ kind: 'call', fn: 'lower', arg: { kind: 'column', name: 'meeting_topic' } }]);
  });

  it('should keep AND/OR precedence and map <> to !=', () => {
    const query = parseQuery("SELECT id FROM minutes WHERE a = 1 OR b <> 'x' AND NOT c IS NULL");

    expect(query.where).toEqual({
      kind: 'or',
      operands: [
        { kind: 'compare', op: '=', left: { kind: 'column', name: 'a' }, right: { kind: 'literal', value: 1 } },
        {
          kind: 'and',
          operands: [
            { kind: 'compare', op: '!=', left: { kind: 'column', name: 'b' }, right: { kind: 'literal', value: 'x' } },
            { kind: 'not', operand: { kind: 'isNull', negated: false, value: { kind: 'column', name: 'c' } } },
          ],
        },
      ],
    });
  });

  it('should parse LIKE, IN and BETWEEN with negation', () => {
    const query = parseQuery(
      "SELECT id FROM minutes WHERE attendees NOT ILIKE '%ana%' AND id NOT IN (1, 2) AND week_number BETWEEN -1 AND $1"
    );

    expect(query.where).toEqual({
      kind: 'and',
      operands: [
        {
          kind: 'like',
          negated: true,
          caseInsensitive: true,
          value: { kind: 'column', name: 'attendees' },
          pattern: { kind: 'literal', value: '%ana%' },
        },
        {
          kind: 'in',
          negated: true,
          value: { kind: 'column', name: 'id' },
          list: [
            { kind: 'literal', value: 1 },
            { kind: 'literal', value: 2 },
          ],
        },
        {
          kind: 'between',
          negated: false,
          value: { kind: 'column', name: 'week_number' },
          low: { kind: 'literal', value: -1 },
          high: { kind: 'param', index: 1 },
        },
      ],
    });
  });

  it('should parse ORDER BY, LIMIT and OFFSET', () => {
    const query = parseQuery('SELECT id FROM minutes ORDER BY 1 DESC, meeting_date LIMIT 10 OFFSET 5');

    expect(query.orderBy).toEqual([
      { expr: { kind: 'ordinal', position: 1 }, direction: 'desc' },
      { expr: { kind: 'column', name: 'meeting_date' }, direction: 'asc' },
    ]);
    expect(query.limit).toBe(10);
    expect(query.offset).toBe(5);
  });

  it('should reject joins and subqueries', () => {
    expect(() => parseQuery('SELECT id FROM minutes JOIN people')).toThrow("Unexpected token 'join'");
    expect(() => parseQuery('SELECT id FROM (SELECT id FROM minutes)')).toThrow(
      "Expected identifier but found '('"
    );
  });

  it('should reject statements other than SELECT', () => {
    expect(() => parseQuery('DELETE FROM minutes')).toThrow(SqlSyntaxError);
  });

  it('should reject unsupported functions', () => {
    expect(() => parseQuery('SELECT now() FROM minutes')).toThrow('Function now is not supported');
  });

  it('should only allow DISTINCT inside COUNT', () => {
    expect(() => parseQuery('SELECT SUM(DISTINCT week_number) FROM minutes')).toThrow(
      'DISTINCT is only supported inside COUNT'
    );
    expect(parseQuery('SELECT COUNT(DISTINCT meeting_topic) FROM minutes').columns).toEqual([
      { expr: { kind: 'aggregate', fn: 'count', arg: { kind: 'column', name: 'meeting_topic' }, distinct: true } },
    ]);
  });

  it('should reject a non-integer LIMIT', () => {
    expect(() => parseQuery('SELECT id FROM minutes LIMIT 1.5')).toThrow('LIMIT requires an integer');
  });

  it('should carry the position of the offending token', () => {
    try {
      parseQuery('SELECT id FROM minutes WHERE');
      throw new Error('expected a syntax error');
    } catch (error) {
      expect(error).toBeInstanceOf(SqlSyntaxError);
      expect(error instanceof SqlSyntaxError ? error.position : -1).toBe(28);
    }
  });
});

// =============================================================================
// Formatter
// =============================================================================

describe('formatQuery', () => {
  it('should produce canonical SQL', () => {
    const sql = formatQuery(
      parseQuery(
        "select id, count(*) as n from minutes where (a = 1 or b = 'x') and not c is null group by id order by n desc limit 5"
      )
    );

    expect(sql).toBe(
      "SELECT id, COUNT(*) AS n FROM minutes WHERE (a = 1 OR b = 'x') AND (NOT (c IS NULL)) GROUP BY id ORDER BY n DESC LIMIT 5"
    );
  });

  it('should escape quotes in string literals', () => {
    expect(formatQuery(parseQuery("SELECT id FROM minutes WHERE summary = 'it''s'"))).toBe(
      "SELECT id FROM minutes WHERE summary = 'it''s'"
    );
  });

  it('should re-parse to the same tree', () => {
    const original = parseQuery(
      "SELECT DISTINCT LOWER(meeting_topic) AS topic FROM minutes WHERE NOT (attendees ILIKE $1 OR notes IS NOT NULL) AND week_number NOT BETWEEN 2 AND 4 ORDER BY 1 ASC OFFSET 3"
    );
    expect(parseQuery(formatQuery(original))).toEqual(original);
  });

  it('should round-trip numbers printed in exponent form', () => {
    const large = parseQuery('SELECT id FROM minutes WHERE id = 1e+21');
    expect(formatQuery(large)).toBe('SELECT id FROM minutes WHERE id = 1e+21');
    expect(parseQuery(formatQuery(large))).toEqual(large);

    const small = parseQuery('SELECT id FROM minutes WHERE id > 0.00000015');
    expect(formatQuery(small)).toBe('SELECT id FROM minutes WHERE id > 1.5e-7');
    expect(parseQuery(formatQuery(small))).toEqual(small);
  });

  it('should quote identifiers that need it', () => {
    expect(formatIdentifier('week_number')).toBe('week_number');
    expect(formatIdentifier('order')).toBe('"order"');
    expect(formatIdentifier('Week Number')).toBe('"Week Number"');
  });
});
