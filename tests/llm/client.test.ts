/**
 * Minutes Insights - Chat Model Client Tests
 */

import { describe, it, expect, afterEach, jest } from '@jest/globals';

import { OpenAIChatModel } from '../../src/llm/client.js';
import type { ChatMessage } from '../../src/llm/client.js';
import { LlmError } from '../../src/utils/types.js';

const MESSAGES: ChatMessage[] = [
  { role: 'system', content: 'You answer in JSON.' },
  { role: 'user', content: 'How many meetings?' },
];

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function completion(content: string | null): Response {
  return jsonResponse({ choices: [{ message: { content } }] });
}

function createModel(overrides: { apiKey?: string; maxRetries?: number } = {}): OpenAIChatModel {
  return new OpenAIChatModel({
    baseUrl: 'http://llm.test/v1/',
    apiKey: overrides.apiKey ?? 'test-secret',
    timeoutMs: 1000,
    maxRetries: overrides.maxRetries ?? 0,
  });
}

describe('OpenAIChatModel', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should post the conversation and return the reply text', async () => {
    const fetchSpy = jest.spyOn(globalThis, 'fetch').mockResolvedValueOnce(completion('{"count": 5}'));

    const reply = await createModel().complete(MESSAGES, {
      model: 'test-model',
      temperature: 0.2,
      maxTokens: 50,
      json: true,
    });

    expect(reply).toBe('{"count": 5}');
    expect(fetchSpy).toHaveBeenCalledTimes(1);

    const [url, init] = fetchSpy.mock.calls[0] ?? [];
    expect(url).toBe('http://llm.test/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : null;
    expect(body).toEqual({
      model: 'test-model',
      messages: MESSAGES,
      temperature: 0.2,
      max_tokens: 50,
      response_format: { type: 'json_object' },
    });
  });

  it('should refuse to call the endpoint without an API key', async () => {
    const fetchSpy = jest.spyOn(globalThis, 'fetch');
    const model = createModel({ apiKey: '  ' });

    expect(model.isConfigured()).toBe(false);
    await expect(model.complete(MESSAGES, { model: 'test-model' })).rejects.toThrow(
      'Language model API key is not configured'
    );
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('should not retry client errors', async () => {
    const fetchSpy = jest
      .spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(jsonResponse({ error: { message: 'unknown model' } }, 400));

    await expect(createModel({ maxRetries: 2 }).complete(MESSAGES, { model: 'nope' })).rejects.toThrow(
      'unknown model'
    );
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('should retry server errors', async () => {
    const fetchSpy = jest
      .spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(jsonResponse({}, 503))
      .mockResolvedValueOnce(completion('ok'));

    await expect(createModel({ maxRetries: 1 }).complete(MESSAGES, { model: 'test-model' })).resolves.toBe('ok');
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('should treat network failures as retryable errors', async () => {
    jest.spyOn(globalThis, 'fetch').mockRejectedValueOnce(new TypeError('fetch failed'));

    const error = await createModel()
      .complete(MESSAGES, { model: 'test-model' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LlmError);
    expect(error instanceof LlmError ? error.retryable : false).toBe(true);
    expect(error instanceof Error ? error.message : '').toBe('Chat completion request failed: fetch failed');
  });

  it('should report a timeout while the body is still arriving', async () => {
    const response = completion('late');
    jest
      .spyOn(response, 'json')
      .mockRejectedValueOnce(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
    jest.spyOn(globalThis, 'fetch').mockResolvedValueOnce(response);

    const error = await createModel()
      .complete(MESSAGES, { model: 'test-model' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LlmError);
    expect(error instanceof LlmError ? [error.retryable, error.statusCode] : []).toEqual([true, 504]);
    expect(error instanceof Error ? error.message : '').toBe('Chat completion timed out after 1000ms');
  });

  it('should reject empty replies', async () => {
    jest.spyOn(globalThis, 'fetch').mockResolvedValueOnce(completion(null));

    await expect(createModel().complete(MESSAGES, { model: 'test-model' })).rejects.toThrow(
      'Chat completion returned no content'
    );
  });
});
