import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

const { createMock, constructorMock } = vi.hoisted(() => ({
  createMock: vi.fn(),
  constructorMock: vi.fn()
}));

vi.mock('openai', () => ({
  default: class OpenAI {
    chat = { completions: { create: createMock } };
    constructor(options: unknown) {
      constructorMock(options);
    }
  }
}));

import type { LLMProfile } from '../configManager.js';
import { AuthError, MalformedResponseError, NetworkError, RateLimitError } from '../errors.js';
import { calculateBackoff, generate, MAX_BACKOFF_MS, resolveApiKey } from '../llm/client.js';

const payload = { systemMessage: 'You write comedy.', userMessage: 'Setting: Rooftop' };
const sampling = { temperature: 0.7, maxTokens: 500, topP: 0.9 };
const profile: LLMProfile = {
  type: 'openai',
  baseURL: 'https://llm.test/v1',
  model: 'test-model',
  apiKey: 'test-secret'
};

function completion(content: string | null) {
  return { choices: [{ message: { role: 'assistant', content } }] };
}

function httpError(status: number, message: string, headers: Record<string, string> = {}) {
  return Object.assign(new Error(message), { status, headers });
}

describe('generate (openai profile)', () => {
  beforeEach(() => {
    createMock.mockReset();
    constructorMock.mockReset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('returns the completion text unmodified', async () => {
    const text = '  YUKARI: Hi.\nEND SCENE  ';
    createMock.mockResolvedValueOnce(completion(text));

    await expect(generate(payload, sampling, profile)).resolves.toBe(text);
    expect(createMock).toHaveBeenCalledWith({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'You write comedy.' },
        { role: 'user', content: 'Setting: Rooftop' }
      ],
      temperature: 0.7,
      max_tokens: 500,
      top_p: 0.9
    });
    expect(constructorMock).toHaveBeenCalledWith(
      expect.objectContaining({ apiKey: 'test-secret', baseURL: 'https://llm.test/v1', maxRetries: 0 })
    );
  });

  it('maps 429 to RateLimitError with the retry-after delay', async () => {
    createMock.mockRejectedValueOnce(httpError(429, 'Too many requests', { 'retry-after': '2' }));

    const error = await generate(payload, sampling, profile).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ status: 429, retryAfterMs: 2000 });
  });

  it('maps 401 and 403 to AuthError', async () => {
    createMock.mockRejectedValueOnce(httpError(401, 'Unauthorized'));
    await expect(generate(payload, sampling, profile)).rejects.toBeInstanceOf(AuthError);

    createMock.mockRejectedValueOnce(httpError(403, 'Forbidden'));
    await expect(generate(payload, sampling, profile)).rejects.toBeInstanceOf(AuthError);
  });

  it('maps other statuses and transport failures to NetworkError', async () => {
    createMock.mockRejectedValueOnce(httpError(500, 'Internal error'));
    const serverError = await generate(payload, sampling, profile).catch((caught: unknown) => caught);
    expect(serverError).toBeInstanceOf(NetworkError);
    expect(serverError).toMatchObject({ status: 500 });

    createMock.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
    await expect(generate(payload, sampling, profile)).rejects.toBeInstanceOf(NetworkError);
  });

  it('fails with MalformedResponseError when there is no text', async () => {
    createMock.mockResolvedValueOnce({ choices: [] });
    await expect(generate(payload, sampling, profile)).rejects.toBeInstanceOf(MalformedResponseError);

    createMock.mockResolvedValueOnce(completion('   '));
    await expect(generate(payload, sampling, profile)).rejects.toBeInstanceOf(MalformedResponseError);

    createMock.mockResolvedValueOnce(completion(null));
    await expect(generate(payload, sampling, profile)).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it('fails with AuthError before calling out when no key is configured', async () => {
    const keyless: LLMProfile = { ...profile, apiKey: undefined, apiKeyEnv: 'PARODY_TEST_UNSET_KEY' };
    vi.stubEnv('PARODY_TEST_UNSET_KEY', '');

    await expect(generate(payload, sampling, keyless)).rejects.toBeInstanceOf(AuthError);
    expect(createMock).not.toHaveBeenCalled();
  });

  it('reads the key from the named environment variable', async () => {
    vi.stubEnv('PARODY_TEST_KEY', 'test-secret-from-env');
    const fromEnv: LLMProfile = { ...profile, apiKey: undefined, apiKeyEnv: 'PARODY_TEST_KEY' };
    expect(resolveApiKey(fromEnv)).toBe('test-secret-from-env');

    createMock.mockResolvedValueOnce(completion('AIGIS: Affirmative.'));
    await generate(payload, sampling, fromEnv);
    expect(constructorMock).toHaveBeenCalledWith(expect.objectContaining({ apiKey: 'test-secret-from-env' }));
  });

  describe('retries', () => {
    it('does not retry by default', async () => {
      createMock.mockRejectedValueOnce(httpError(503, 'Unavailable'));
      await expect(generate(payload, sampling, profile)).rejects.toBeInstanceOf(NetworkError);
      expect(createMock).toHaveBeenCalledTimes(1);
    });

    it('retries network failures when the profile allows it', async () => {
      createMock
        .mockRejectedValueOnce(httpError(502, 'Bad gateway'))
        .mockResolvedValueOnce(completion('JUNPEI: Made it.'));

      const retrying: LLMProfile = { ...profile, maxRetries: 2, retryBackoffMs: 1 };
      await expect(generate(payload, sampling, retrying)).resolves.toBe('JUNPEI: Made it.');
      expect(createMock).toHaveBeenCalledTimes(2);
    });

    it('waits out a rate limit before retrying', async () => {
      createMock
        .mockRejectedValueOnce(httpError(429, 'Slow down', { 'retry-after': '0' }))
        .mockResolvedValueOnce(completion('MITSURU: Execution.'));

      const retrying: LLMProfile = { ...profile, maxRetries: 1, retryBackoffMs: 1 };
      await expect(generate(payload, sampling, retrying)).resolves.toBe('MITSURU: Execution.');
    });

    it('caps the wait, including a long retry-after', () => {
      expect(calculateBackoff(profile, 0, new RateLimitError('Slow down', 3_600_000))).toBe(MAX_BACKOFF_MS);
      expect(calculateBackoff({ ...profile, retryBackoffMs: 1000 }, 10, new NetworkError('down'))).toBe(MAX_BACKOFF_MS);
      expect(calculateBackoff({ ...profile, retryBackoffMs: 100 }, 2, new NetworkError('down'))).toBe(400);
      expect(calculateBackoff(profile, 0, new RateLimitError('Slow down', 2000))).toBe(2000);
    });

    it('gives up once maxRetries is exhausted', async () => {
      createMock.mockRejectedValue(httpError(503, 'Unavailable'));
      const retrying: LLMProfile = { ...profile, maxRetries: 1, retryBackoffMs: 1 };

      await expect(generate(payload, sampling, retrying)).rejects.toBeInstanceOf(NetworkError);
      expect(createMock).toHaveBeenCalledTimes(2);
    });

    it('never retries authentication failures', async () => {
      createMock.mockRejectedValue(httpError(401, 'Unauthorized'));
      const retrying: LLMProfile = { ...profile, maxRetries: 3, retryBackoffMs: 1 };

      await expect(generate(payload, sampling, retrying)).rejects.toBeInstanceOf(AuthError);
      expect(createMock).toHaveBeenCalledTimes(1);
    });
  });
});
