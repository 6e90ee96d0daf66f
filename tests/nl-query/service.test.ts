/**
 * Minutes Insights - NL2SQL Agent Tests
 */

import { describe, it, expect } from '@jest/globals';

import { defaultDatasets } from '../../src/minutes/datasets.js';
import { MINUTES_COLUMN_NAMES, describeSchema } from '../../src/minutes/schema.js';
import { ResultShaper } from '../../src/nl-query/result-shaper.js';
import { NL2SQLAgent, NOT_CONFIGURED_ANSWER, suggestionsFor } from '../../src/nl-query/service.js';
import { SQLGenerator } from '../../src/nl-query/sql-generator.js';
import { QueryValidator } from '../../src/nl-query/validator.js';
import { InMemoryMinutesStore } from '../../src/storage/minutes-store.js';
import { ScriptedChatModel, queryReply } from '../fixtures/chat-model.js';
import { SAMPLE_MINUTES } from '../fixtures/minutes.js';

function createAgent(model: ScriptedChatModel, maxRows = 500): NL2SQLAgent {
  return new NL2SQLAgent(
    {
      generator: new SQLGenerator(model, describeSchema('minutes'), defaultDatasets('minutes'), {
        model: 'sql-model',
      }),
      validator: new QueryValidator({ columns: MINUTES_COLUMN_NAMES }),
      store: new InMemoryMinutesStore(SAMPLE_MINUTES, 'minutes'),
      shaper: new ResultShaper({ maxRows }),
    },
    { maxCorrectionAttempts: 1 }
  );
}

const BUDGET_QUERY = queryReply('SELECT id, meeting_date FROM minutes WHERE meeting_topic = $1 ORDER BY meeting_date', {
  params: ['Budget'],
  explanation: 'Budget meetings by date.',
});

describe('NL2SQLAgent', () => {
  it('should answer with validated SQL and shaped rows', async () => {
    const agent = createAgent(new ScriptedChatModel([BUDGET_QUERY]));
    const response = await agent.run({ question: 'When did we discuss the budget?' });

    expect(response.success).toBe(true);
    expect(response.executedSql).toBe(
      'SELECT id, meeting_date FROM minutes WHERE meeting_topic = $1 ORDER BY meeting_date ASC LIMIT 100'
    );
    expect(response.result?.rows).toEqual([
      { id: 2, meeting_date: '2026-01-12' },
      { id: 4, meeting_date: '2026-02-02' },
    ]);
    expect(response.answer).toBe('Found 2 meetings. Budget meetings by date.');
    expect(response.visualizationType).toBe('line_chart');
    expect(response.warnings).toEqual(['No LIMIT clause; applied LIMIT 100']);
    expect(response.suggestions).toEqual(suggestionsFor('meeting_lookup'));
    expect(response.attempts).toBe(1);
  });

  it('should feed a rejected query back to the model once', async () => {
    const model = new ScriptedChatModel([queryReply('SELECT agenda FROM minutes LIMIT 5'), BUDGET_QUERY]);
    const response = await createAgent(model).run({ question: 'When did we discuss the budget?' });

    expect(response.success).toBe(true);
    expect(response.attempts).toBe(2);
    expect(response.warnings).toEqual([
      'No LIMIT clause; applied LIMIT 100',
      'Query was corrected after 1 failed attempt(s)',
    ]);
    expect(model.calls[1]?.messages[1]?.content).toContain(
      "Your previous query failed.\nQuery: SELECT agenda FROM minutes LIMIT 5\nError: Unknown column 'agenda'"
    );
  });

  it('should retry when the store rejects a validated query', async () => {
    const model = new ScriptedChatModel([
      queryReply('SELECT meeting_topic, id FROM minutes GROUP BY meeting_topic LIMIT 5'),
      BUDGET_QUERY,
    ]);
    const response = await createAgent(model).run({ question: 'Budget meetings?' });

    expect(response.success).toBe(true);
    expect(model.calls[1]?.messages[1]?.content).toContain(
      'Query: SELECT meeting_topic, id FROM minutes GROUP BY meeting_topic LIMIT 5\n' +
        'Error: column "id" must appear in the GROUP BY clause or be used in an aggregate function'
    );
  });

  it('should give up after the correction budget is spent', async () => {
    const bad = queryReply('SELECT agenda FROM minutes LIMIT 5');
    const response = await createAgent(new ScriptedChatModel([bad, bad])).run({ question: 'Agenda?' });

    expect(response.success).toBe(false);
    expect(response.attempts).toBe(2);
    expect(response.error).toBe("Unknown column 'agenda'");
    expect(response.answer).toBe("I couldn't answer that question with a safe query. Unknown column 'agenda'");
    expect(response.visualizationType).toBe('text');
  });

  it('should not retry when generation itself fails', async () => {
    const model = new ScriptedChatModel([new Error('upstream unavailable'), BUDGET_QUERY]);
    const response = await createAgent(model).run({ question: 'Budget meetings?' });

    expect(response.success).toBe(false);
    expect(response.attempts).toBe(1);
    expect(response.error).toBe('upstream unavailable');
    expect(model.calls).toHaveLength(1);
  });

  it('should warn when the result is truncated', async () => {
    const model = new ScriptedChatModel([queryReply('SELECT id FROM minutes ORDER BY id LIMIT 10')]);
    const response = await createAgent(model, 2).run({ question: 'All meetings' });

    expect(response.result?.rowCount).toBe(2);
    expect(response.warnings).toEqual(['Result truncated to 2 of 5 rows']);
    expect(response.answer).toBe('Found 5 meetings (showing the first 2).');
  });

  it('should pass the requested limit and framing to the generator', async () => {
    const model = new ScriptedChatModel([queryReply('SELECT id FROM minutes LIMIT 3')]);
    await createAgent(model).run({ question: 'Recent meetings', limit: 3, context: { framing: 'analytics' } });

    const prompt = model.calls[0]?.messages[1]?.content ?? '';
    expect(prompt).toContain('Limit results to: 3');
    expect(prompt).toContain('The rows feed a statistical analysis');
  });

  it('should hold the model to the requested limit', async () => {
    const model = new ScriptedChatModel([queryReply('SELECT id FROM minutes LIMIT 100')]);
    const response = await createAgent(model).run({ question: 'Some meetings', limit: 2 });

    expect(response.success).toBe(true);
    expect(response.executedSql).toBe('SELECT id FROM minutes LIMIT 2');
    expect(response.result?.rows).toEqual([{ id: 1 }, { id: 2 }]);
    expect(response.warnings).toEqual(['LIMIT 100 lowered to the requested 2']);
  });

  it('should explain when the model is not configured', async () => {
    const response = await createAgent(new ScriptedChatModel([], false)).run({ question: 'Anything' });

    expect(response).toMatchObject({
      success: false,
      answer: NOT_CONFIGURED_ANSWER,
      attempts: 0,
      error: 'Service not configured',
    });
  });
});
