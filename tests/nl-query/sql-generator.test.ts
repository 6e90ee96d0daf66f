/**
 * Minutes Insights - SQL Generator Tests
 */

import { describe, it, expect } from '@jest/globals';

import { defaultDatasets } from '../../src/minutes/datasets.js';
import { describeSchema } from '../../src/minutes/schema.js';
import { SQLGenerator } from '../../src/nl-query/sql-generator.js';
import { LlmError } from '../../src/utils/types.js';
import { ScriptedChatModel, queryReply } from '../fixtures/chat-model.js';

const FIXED_NOW = (): Date => new Date('2026-03-02T09:30:00Z');

function createGenerator(model: ScriptedChatModel): SQLGenerator {
  return new SQLGenerator(
    model,
    describeSchema('minutes'),
    defaultDatasets('minutes'),
    { model: 'sql-model' },
    FIXED_NOW
  );
}

describe('SQLGenerator', () => {
  it('should parse a fenced JSON reply', async () => {
    const model = new ScriptedChatModel([
      '```json\n' +
        queryReply('SELECT id FROM minutes LIMIT 10', { explanation: 'All meetings.', confidence: 0.8 }) +
        '\n```',
    ]);

    await expect(createGenerator(model).generate('Show all meetings')).resolves.toEqual({
      sql: 'SELECT id FROM minutes LIMIT 10',
      params: [],
      intent: 'meeting_lookup',
      confidence: 0.8,
      explanation: 'All meetings.',
    });
  });

  it('should fall back on loose fields', async () => {
    const model = new ScriptedChatModel(['{"sql": "SELECT id FROM minutes", "intent": "gossip", "confidence": 7}']);

    await expect(createGenerator(model).generate('Anything')).resolves.toEqual({
      sql: 'SELECT id FROM minutes',
      params: [],
      intent: 'unknown',
      confidence: 0.5,
      explanation: '',
    });
  });

  it('should reject a reply without SQL', async () => {
    const model = new ScriptedChatModel(['{"query": "SELECT 1"}']);
    const generation = createGenerator(model).generate('Anything');

    await expect(generation).rejects.toBeInstanceOf(LlmError);
    await expect(createGenerator(new ScriptedChatModel(['{"query": "SELECT 1"}'])).generate('x')).rejects.toThrow(
      'Model returned an invalid query payload: sql: Required'
    );
  });

  it('should send the schema, date and JSON mode to the model', async () => {
    const model = new ScriptedChatModel([queryReply('SELECT id FROM minutes')]);
    await createGenerator(model).generate('Show all meetings');

    const [call] = model.calls;
    expect(call?.options).toEqual({ model: 'sql-model', temperature: 0.1, maxTokens: 1000, json: true });
    expect(call?.messages[0]?.role).toBe('system');
    expect(call?.messages[0]?.content).toContain("Today's date: 2026-03-02");
    expect(call?.messages[0]?.content).toContain('Table: minutes (one row per meeting)');
    expect(call?.messages[1]).toEqual({ role: 'user', content: 'Question: Show all meetings' });
  });

  it('should include context and the previous failure in the user prompt', async () => {
    const model = new ScriptedChatModel([queryReply('SELECT id FROM minutes')]);
    await createGenerator(model).generate('And for Ben?', {
      previousQuestions: ['Which meetings did Ana attend?'],
      limit: 5,
      correction: { sql: 'SELECT agenda FROM minutes', error: "Unknown column 'agenda'" },
    });

    expect(model.calls[0]?.messages[1]?.content).toBe(
      'Question: And for Ben?\n' +
        'Earlier questions in this conversation:\n' +
        '- Which meetings did Ana attend?\n' +
        'Limit results to: 5\n\n' +
        'Your previous query failed.\n' +
        'Query: SELECT agenda FROM minutes\n' +
        "Error: Unknown column 'agenda'\n" +
        'Return a corrected query.'
    );
  });

  it('should report whether the model is configured', () => {
    expect(createGenerator(new ScriptedChatModel([], false)).isConfigured()).toBe(false);
  });
});
