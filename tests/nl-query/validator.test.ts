/**
 * Minutes Insights - Query Validator Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';

import { MINUTES_COLUMN_NAMES } from '../../src/minutes/schema.js';
import { QueryValidator, containsSQLInjection } from '../../src/nl-query/validator.js';

describe('QueryValidator', () => {
  let validator: QueryValidator;

  beforeEach(() => {
    validator = new QueryValidator({ columns: MINUTES_COLUMN_NAMES });
  });

  it('should add the default LIMIT and return canonical SQL', () => {
    const result = validator.validate('select id from minutes where meeting_topic = $1', ['Budget']);

    expect(result).toEqual({
      valid: true,
      errors: [],
      warnings: ['No LIMIT clause; applied LIMIT 100'],
      complexity: 1,
      sanitizedSQL: 'SELECT id FROM minutes WHERE meeting_topic = $1 LIMIT 100',
    });
  });

  it('should accept a trailing semicolon', () => {
    const result = validator.validate('SELECT id FROM minutes LIMIT 5;');

    expect(result.valid).toBe(true);
    expect(result.sanitizedSQL).toBe('SELECT id FROM minutes LIMIT 5');
  });

  it('should report syntax errors', () => {
    const result = validator.validate('DROP TABLE minutes');

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["Expected SELECT but found 'drop' (at position 0)"]);
    expect(result.sanitizedSQL).toBeUndefined();
  });

  it('should reject stacked statements', () => {
    const result = validator.validate('SELECT id FROM minutes; DELETE FROM minutes');
    expect(result.errors).toEqual(['Only a single statement is allowed (at position 22)']);
  });

  it('should reject other tables', () => {
    const result = validator.validate('SELECT id FROM users LIMIT 5');
    expect(result.errors).toEqual(["Access to table 'users' is not allowed"]);
  });

  it('should reject unknown columns once each', () => {
    const result = validator.validate('SELECT agenda FROM minutes WHERE agenda IS NOT NULL LIMIT 5');
    expect(result.errors).toEqual(["Unknown column 'agenda'"]);
  });

  it('should allow select aliases in ORDER BY', () => {
    const result = validator.validate(
      'SELECT meeting_topic, COUNT(*) AS n FROM minutes GROUP BY meeting_topic ORDER BY n DESC LIMIT 5'
    );

    expect(result.valid).toBe(true);
    expect(result.complexity).toBe(3);
  });

  it('should require every referenced parameter', () => {
    const result = validator.validate('SELECT id FROM minutes WHERE id = $2 LIMIT 5', [1]);
    expect(result.errors).toEqual(['Query references $2 but only 1 parameter(s) were supplied']);
  });

  it('should flag injection attempts in parameters', () => {
    const result = validator.validate('SELECT id FROM minutes WHERE notes = $1 LIMIT 5', ["x' OR 1=1"]);
    expect(result.errors).toEqual(['Potential SQL injection in parameter $1']);
  });

  it('should reject a LIMIT above the maximum', () => {
    const result = validator.validate('SELECT id FROM minutes LIMIT 5000');
    expect(result.errors).toEqual(['LIMIT exceeds maximum of 1000']);
  });

  it('should alias repeated output names', () => {
    const result = validator.validate('SELECT COUNT(*), COUNT(decisions) FROM minutes LIMIT 5');

    expect(result.valid).toBe(true);
    expect(result.sanitizedSQL).toBe('SELECT COUNT(*), COUNT(decisions) AS count_2 FROM minutes LIMIT 5');
  });

  it('should lower a LIMIT above the requested row count', () => {
    const result = validator.validate('SELECT id FROM minutes LIMIT 50', [], { limit: 5 });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['LIMIT 50 lowered to the requested 5']);
    expect(result.sanitizedSQL).toBe('SELECT id FROM minutes LIMIT 5');
  });

  it('should apply the requested row count when no LIMIT is given', () => {
    const result = validator.validate('SELECT id FROM minutes', [], { limit: 5 });

    expect(result.warnings).toEqual(['No LIMIT clause; applied LIMIT 5']);
    expect(result.sanitizedSQL).toBe('SELECT id FROM minutes LIMIT 5');
  });

  it('should warn about complex queries without rejecting them', () => {
    const result = validator.validate(
      'SELECT meeting_topic, COUNT(*), SUM(week_number), AVG(week_number) FROM minutes GROUP BY meeting_topic LIMIT 10'
    );

    expect(result.valid).toBe(true);
    expect(result.complexity).toBe(5);
    expect(result.warnings).toEqual(['Query complexity (5) exceeds recommended maximum (4)']);
  });

  it('should reject queries over the length limit', () => {
    const short = new QueryValidator({ columns: MINUTES_COLUMN_NAMES, maxQueryLength: 10 });
    expect(short.validate('SELECT id FROM minutes').errors).toEqual([
      'Query exceeds maximum length of 10 characters',
    ]);
  });
});

describe('containsSQLInjection', () => {
  it('should pass ordinary text', () => {
    expect(containsSQLInjection('Budget review for Q1')).toBe(false);
  });

  it('should catch statement separators and comments', () => {
    expect(containsSQLInjection("x'; DROP TABLE minutes")).toBe(true);
    expect(containsSQLInjection('admin --')).toBe(true);
  });
});
