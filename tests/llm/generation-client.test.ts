import { GenerationClient } from '../../src/llm/generation-client';
import { LLMAdapter, LLMCallOptions, LLMProviderError, LLMRawResponse } from '../../src/llm/types';
import { createLogger, LogEntry, LogLevel } from '../../src/logger';

describe('GenerationClient', () => {
  let entries: LogEntry[];

  function createClient(adapter: LLMAdapter): GenerationClient {
    return new GenerationClient({
      adapter,
      provider: 'gemini',
      model: 'test-model',
      apiKey: 'test-key',
      maxOutputTokens: 1024,
      temperature: 0.3,
      logger: createLogger({ handler: (e) => entries.push(e), minLevel: LogLevel.Debug }),
    });
  }

  beforeEach(() => {
    entries = [];
  });

  test('sends the prompt with the configured knobs', async () => {
    const adapter = jest.fn(async (_options: LLMCallOptions): Promise<LLMRawResponse> => ({
      content: 'hello',
      finishReason: 'stop',
      usage: { totalTokens: 5 },
    }));

    const result = await createClient(adapter).generate('Say hello');

    expect(adapter).toHaveBeenCalledTimes(1);
    expect(adapter).toHaveBeenCalledWith({
      provider: 'gemini',
      model: 'test-model',
      messages: [{ role: 'user', content: 'Say hello' }],
      apiKey: 'test-key',
      maxOutputTokens: 1024,
      temperature: 0.3,
    });
    expect(result).toEqual({
      ok: true,
      value: { text: 'hello', finishReason: 'stop', usage: { totalTokens: 5 } },
    });
  });

  test('createRequest carries the prompt and both knobs', () => {
    const client = createClient(jest.fn());
    expect(client.createRequest('p')).toEqual({ prompt: 'p', maxOutputTokens: 1024, temperature: 0.3 });
  });

  test('a provider failure becomes a retryable GENERATION.PROVIDER error for 5xx', async () => {
    const client = createClient(async () => {
      throw new LLMProviderError('upstream unavailable', 503);
    });

    const result = await client.generate('prompt');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('GENERATION.PROVIDER');
      expect(result.error.message).toBe('upstream unavailable');
      expect(result.error.retryable).toBe(true);
      expect(result.error.details).toEqual({ statusCode: 503 });
    }
  });

  test('an authentication failure is not retryable', async () => {
    const client = createClient(async () => {
      throw new LLMProviderError('invalid api key', 401);
    });

    const result = await client.generate('prompt');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.retryable).toBe(false);
  });

  test('any other thrown value becomes GENERATION.UNEXPECTED', async () => {
    const client = createClient(async () => {
      throw new Error('boom');
    });

    const result = await client.generate('prompt');

    expect(result).toEqual({
      ok: false,
      error: expect.objectContaining({
        code: 'GENERATION.UNEXPECTED',
        message: 'Generation call failed: boom',
      }),
    });
  });

  test('logs the failure at error level', async () => {
    const client = createClient(async () => {
      throw new LLMProviderError('quota exceeded', 429);
    });

    await client.generate('prompt');

    const errors = entries.filter((e) => e.level === LogLevel.Error);
    expect(errors).toHaveLength(1);
    expect(errors[0].message).toBe('Generation call failed');
    expect(errors[0].context).toMatchObject({
      provider: 'gemini',
      model: 'test-model',
      code: 'GENERATION.PROVIDER',
      error: 'quota exceeded',
    });
  });

  test('warns when the completion is empty', async () => {
    const client = createClient(async () => ({ content: '  ', finishReason: 'MAX_TOKENS' }));

    const result = await client.generate('prompt');

    expect(result.ok).toBe(true);
    const warnings = entries.filter((e) => e.level === LogLevel.Warn);
    expect(warnings.map((e) => e.message)).toEqual(['Generation returned empty text']);
  });

  test('never puts the api key in a log entry', async () => {
    const client = createClient(async () => ({ content: 'ok' }));
    await client.generate('prompt');
    expect(JSON.stringify(entries)).not.toContain('test-key');
  });
});
