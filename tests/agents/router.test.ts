/**
 * Minutes Insights - Intent Router Tests
 */

import { describe, it, expect } from '@jest/globals';

import { IntentRouter, buildClarification, heuristicRoute } from '../../src/agents/router.js';
import type { SessionMessage } from '../../src/agents/types.js';
import { ScriptedChatModel } from '../fixtures/chat-model.js';

const DEFAULT_CANDIDATES = [
  'Show the most recent meetings',
  'Who attends meetings most often?',
  'How many meetings were held per month?',
];

function message(role: SessionMessage['role'], content: string, intent?: SessionMessage['intent']): SessionMessage {
  return { role, content, ...(intent !== undefined ? { intent } : {}), timestamp: '2026-03-02T10:00:00.000Z' };
}

describe('buildClarification', () => {
  it('should fall back to generic candidates without a subject', () => {
    expect(buildClarification('')).toEqual({
      question: 'Could you say a little more about what you would like to know?',
      candidates: DEFAULT_CANDIDATES,
    });
  });

  it('should top up a single candidate with subject readings', () => {
    expect(buildClarification('budget', 'Which budget?', ['Only one']).candidates).toEqual([
      'Only one',
      'List the meetings that mention "budget"',
      'Show statistics or a chart about "budget"',
    ]);
  });

  it('should dedupe case-insensitively and keep at most five', () => {
    const clarification = buildClarification('x', 'Which?', ['A', 'a', 'B', 'C', 'D', 'E', 'F']);
    expect(clarification).toEqual({ question: 'Which?', candidates: ['A', 'B', 'C', 'D', 'E'] });
  });
});

describe('heuristicRoute', () => {
  it('should ask back on an empty message', () => {
    expect(heuristicRoute('  ', [])).toEqual({
      intent: 'clarification',
      confidence: 0.9,
      reasoning: 'Empty message',
      source: 'heuristic',
      clarification: {
        question: 'Could you say a little more about what you would like to know?',
        candidates: DEFAULT_CANDIDATES,
      },
    });
  });

  it('should ask back on a greeting', () => {
    const greeting = heuristicRoute('Good morning', []);
    expect(greeting.intent).toBe('clarification');
    expect(greeting.reasoning).toBe('Message is too short to answer');
    expect(greeting.clarification?.candidates).toEqual(DEFAULT_CANDIDATES);
  });

  it('should ask back on a single keyword with subject readings', () => {
    expect(heuristicRoute('budget', []).clarification?.candidates).toEqual([
      'List the meetings that mention "budget"',
      'Show statistics or a chart about "budget"',
    ]);
  });

  it('should route chart requests to analytics', () => {
    expect(heuristicRoute('Show a chart of meetings per month', [])).toEqual({
      intent: 'analytics',
      confidence: 0.7,
      reasoning: 'Asks for an analysis or chart',
      source: 'heuristic',
    });
  });

  it('should route other questions to data retrieval', () => {
    expect(heuristicRoute('What did we decide about travel?', [])).toEqual({
      intent: 'data_retrieval',
      confidence: 0.6,
      reasoning: 'Asks for specific records',
      source: 'heuristic',
    });
  });

  it('should carry the previous intent into a follow-up', () => {
    const history = [
      message('user', 'Chart meetings per month', 'analytics'),
      message('assistant', 'count per month across 2 period(s).', 'analytics'),
    ];

    expect(heuristicRoute('more', history)).toEqual({
      intent: 'analytics',
      confidence: 0.7,
      reasoning: 'Follow-up to the previous question',
      source: 'heuristic',
    });
  });

  it('should not treat a follow-up without history as a question', () => {
    expect(heuristicRoute('yes', []).intent).toBe('clarification');
  });
});

describe('IntentRouter', () => {
  const now = (): Date => new Date('2026-03-02T12:00:00Z');

  it('should accept a confident model decision', async () => {
    const model = new ScriptedChatModel(['{"intent": "analytics", "confidence": 0.92, "reasoning": "Wants a chart"}']);
    const router = new IntentRouter(model, { model: 'root-model' }, now);

    await expect(router.classify('Plot meetings per week')).resolves.toEqual({
      intent: 'analytics',
      confidence: 0.92,
      reasoning: 'Wants a chart',
      source: 'llm',
    });
    expect(model.calls[0]?.options).toEqual({ model: 'root-model', temperature: 0.01, json: true });
  });

  it('should send the recent history between the system and user messages', async () => {
    const model = new ScriptedChatModel(['{"intent": "data_retrieval", "confidence": 0.8}']);
    const router = new IntentRouter(model, { model: 'root-model', historyWindow: 2 }, now);
    const history = [
      message('user', 'first question', 'data_retrieval'),
      message('assistant', 'first answer', 'data_retrieval'),
      message('user', 'second question', 'data_retrieval'),
      message('assistant', 'second answer', 'data_retrieval'),
    ];

    const decision = await router.classify('And the third?', history);

    expect(decision.reasoning).toBe('');
    expect(model.calls[0]?.messages.map((m) => [m.role, m.content]).slice(1)).toEqual([
      ['user', 'second question'],
      ['assistant', 'second answer'],
      ['user', 'And the third?'],
    ]);
    expect(model.calls[0]?.messages[0]?.content).toContain("Today's date: 2026-03-02");
  });

  it('should turn low confidence into a clarification', async () => {
    const model = new ScriptedChatModel(['{"intent": "data_retrieval", "confidence": 0.3, "reasoning": "unsure"}']);
    const decision = await new IntentRouter(model, { model: 'root-model' }, now).classify('budget stuff');

    expect(decision).toEqual({
      intent: 'clarification',
      confidence: 0.3,
      reasoning: 'Low confidence (0.3) for data_retrieval',
      source: 'llm',
      clarification: {
        question: 'Could you say a little more about what you would like to know?',
        candidates: [
          'List the meetings that mention "budget stuff"',
          'Show statistics or a chart about "budget stuff"',
        ],
      },
    });
  });

  it('should keep the clarification the model proposes', async () => {
    const model = new ScriptedChatModel([
      JSON.stringify({
        intent: 'clarification',
        confidence: 0.9,
        reasoning: 'Ambiguous period',
        question: 'Which period do you mean?',
        candidates: ['This month', 'Last month', 'This year'],
      }),
    ]);
    const decision = await new IntentRouter(model, { model: 'root-model' }, now).classify('meetings lately');

    expect(decision.clarification).toEqual({
      question: 'Which period do you mean?',
      candidates: ['This month', 'Last month', 'This year'],
    });
    expect(decision.reasoning).toBe('Ambiguous period');
  });

  it('should fall back to heuristics on an unusable reply', async () => {
    const model = new ScriptedChatModel(['{"intent": "gossip", "confidence": 2}']);
    const decision = await new IntentRouter(model, { model: 'root-model' }, now).classify(
      'Show a chart of meetings per month'
    );

    expect(decision.source).toBe('heuristic');
    expect(decision.intent).toBe('analytics');
  });

  it('should fall back to heuristics when the model fails', async () => {
    const model = new ScriptedChatModel([new Error('timeout')]);
    const decision = await new IntentRouter(model, { model: 'root-model' }, now).classify('What did we decide?');

    expect(decision).toMatchObject({ intent: 'data_retrieval', source: 'heuristic' });
  });

  it('should not call an unconfigured model', async () => {
    const model = new ScriptedChatModel([], false);
    await new IntentRouter(model, { model: 'root-model' }, now).classify('What did we decide?');

    expect(model.calls).toHaveLength(0);
  });
});
