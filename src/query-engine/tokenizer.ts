/**
 * Minutes Insights - SQL Tokenizer
 */

import { SqlSyntaxError } from './ast.js';

export type TokenType =
  | 'keyword'
  | 'identifier'
  | 'string'
  | 'number'
  | 'param'
  | 'operator'
  | 'punct'
  | 'eof';

export interface Token {
  type: TokenType;
  /** Keywords are upper-cased, bare identifiers lower-cased */
  value: string;
  position: number;
  /** Identifier was written in double quotes */
  quoted?: boolean;
}

export const KEYWORDS = new Set([
  'SELECT',
  'DISTINCT',
  'FROM',
  'WHERE',
  'GROUP',
  'BY',
  'HAVING',
  'ORDER',
  'ASC',
  'DESC',
  'LIMIT',
  'OFFSET',
  'AS',
  'AND',
  'OR',
  'NOT',
  'LIKE',
  'ILIKE',
  'IN',
  'BETWEEN',
  'IS',
  'NULL',
  'TRUE',
  'FALSE',
]);

const OPERATORS = ['<=', '>=', '<>', '!=', '=', '<', '>', '-'];
const PUNCTUATION = new Set(['(', ')', ',', '*', '.']);

function isIdentStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isIdentPart(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function tokenize(sql: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < sql.length) {
    const ch = sql.charAt(pos);

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    if (sql.startsWith('--', pos) || sql.startsWith('/*', pos)) {
      throw new SqlSyntaxError('Comments are not allowed', pos);
    }

    if (ch === ';') {
      throw new SqlSyntaxError('Only a single statement is allowed', pos);
    }

    if (ch === "'") {
      const start = pos;
      let value = '';
      pos++;
      for (;;) {
        if (pos >= sql.length) {
          throw new SqlSyntaxError('Unterminated string literal', start);
        }
        const c = sql.charAt(pos);
        if (c === "'") {
          if (sql.charAt(pos + 1) === "'") {
            value += "'";
            pos += 2;
            continue;
          }
          pos++;
          break;
        }
        value += c;
        pos++;
      }
      tokens.push({ type: 'string', value, position: start });
      continue;
    }

    if (ch === '"') {
      const start = pos;
      const end = sql.indexOf('"', pos + 1);
      if (end === -1) {
        throw new SqlSyntaxError('Unterminated quoted identifier', start);
      }
      const value = sql.slice(pos + 1, end);
      if (value.length === 0) {
        throw new SqlSyntaxError('Empty quoted identifier', start);
      }
      tokens.push({ type: 'identifier', value, position: start, quoted: true });
      pos = end + 1;
      continue;
    }

    if (ch === '$') {
      const start = pos;
      pos++;
      while (pos < sql.length && isDigit(sql.charAt(pos))) pos++;
      const digits = sql.slice(start + 1, pos);
      if (digits.length === 0 || Number(digits) === 0) {
        throw new SqlSyntaxError('Invalid parameter placeholder', start);
      }
      tokens.push({ type: 'param', value: digits, position: start });
      continue;
    }

    if (isDigit(ch)) {
      const start = pos;
      while (pos < sql.length && isDigit(sql.charAt(pos))) pos++;
      if (sql.charAt(pos) === '.' && isDigit(sql.charAt(pos + 1))) {
        pos++;
        while (pos < sql.length && isDigit(sql.charAt(pos))) pos++;
      }
      if (sql.charAt(pos) === 'e' || sql.charAt(pos) === 'E') {
        const sign = sql.charAt(pos + 1) === '+' || sql.charAt(pos + 1) === '-' ? 1 : 0;
        if (isDigit(sql.charAt(pos + 1 + sign))) {
          pos += 1 + sign;
          while (pos < sql.length && isDigit(sql.charAt(pos))) pos++;
        }
      }
      if (pos < sql.length && isIdentStart(sql.charAt(pos))) {
        throw new SqlSyntaxError('Invalid number literal', start);
      }
      tokens.push({ type: 'number', value: sql.slice(start, pos), position: start });
      continue;
    }

    if (isIdentStart(ch)) {
      const start = pos;
      while (pos < sql.length && isIdentPart(sql.charAt(pos))) pos++;
      const word = sql.slice(start, pos);
      const upper = word.toUpperCase();
      if (KEYWORDS.has(upper)) {
        tokens.push({ type: 'keyword', value: upper, position: start });
      } else {
        tokens.push({ type: 'identifier', value: word.toLowerCase(), position: start });
      }
      continue;
    }

    const operator = OPERATORS.find((op) => sql.startsWith(op, pos));
    if (operator !== undefined) {
      tokens.push({ type: 'operator', value: operator, position: pos });
      pos += operator.length;
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      tokens.push({ type: 'punct', value: ch, position: pos });
      pos++;
      continue;
    }

    throw new SqlSyntaxError(`Unexpected character '${ch}'`, pos);
  }

  tokens.push({ type: 'eof', value: '', position: sql.length });
  return tokens;
}
