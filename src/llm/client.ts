import OpenAI from 'openai';
import * as nunjucks from 'nunjucks';
import { customTemplateName } from '../configManager.js';
import type { LLMProfile } from '../configManager.js';
import {
  AuthError,
  ConfigError,
  GenerationError,
  MalformedResponseError,
  RateLimitError,
  errMessage
} from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { customLLMRequest, renderCustomPrompt } from './customClient.js';
import { isRetryableError, toGenerationError } from './errorMapping.js';
import { createTemplateEnvironment } from './templateEnv.js';
import type { PromptPayload, SamplingParams } from './types.js';

const log = createLogger(NAMESPACES.llm.client);

const DEFAULT_BACKOFF_MS = 1000; // 1 second
const BACKOFF_MULTIPLIER = 2; // Double each retry
export const MAX_BACKOFF_MS = 30000; // Upper bound, provider retry-after included

export interface GenerateOptions {
  /** Template environment for 'custom' profiles */
  env?: nunjucks.Environment;
}

export function calculateBackoff(profile: LLMProfile, retryCount: number, error: GenerationError): number {
  const backoff = error instanceof RateLimitError && error.retryAfterMs !== undefined
    ? error.retryAfterMs
    : (profile.retryBackoffMs ?? DEFAULT_BACKOFF_MS) * Math.pow(BACKOFF_MULTIPLIER, retryCount);
  return Math.min(backoff, MAX_BACKOFF_MS);
}

async function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** The profile's key, or the value of the environment variable it names. */
export function resolveApiKey(profile: LLMProfile): string | undefined {
  if (profile.apiKey) return profile.apiKey;
  if (profile.apiKeyEnv) return process.env[profile.apiKeyEnv] || undefined;
  return undefined;
}

async function openAIChatRequest(profile: LLMProfile, payload: PromptPayload, sampling: SamplingParams): Promise<string> {
  const apiKey = resolveApiKey(profile);
  if (!apiKey) {
    throw new AuthError(`No API key configured for ${profile.baseURL}`);
  }

  // Retries are ours to decide; the SDK would otherwise retry on its own
  const client = new OpenAI({
    apiKey,
    baseURL: profile.baseURL,
    timeout: profile.timeoutMs,
    maxRetries: 0,
  });

  log('Making non-streaming call to %s at %s', profile.model, profile.baseURL);

  let response: OpenAI.Chat.Completions.ChatCompletion;
  try {
    response = await client.chat.completions.create({
      model: profile.model,
      messages: [
        { role: 'system', content: payload.systemMessage },
        { role: 'user', content: payload.userMessage },
      ],
      temperature: sampling.temperature,
      max_tokens: sampling.maxTokens,
      top_p: sampling.topP,
    });
  } catch (error) {
    throw toGenerationError(error);
  }

  const content = response?.choices?.[0]?.message?.content;
  if (typeof content !== 'string' || !content.trim()) {
    throw new MalformedResponseError('Chat completion response did not contain any text');
  }
  return content;
}

/** Prepares the provider call once; template rendering happens here, outside the retry loop. */
function prepareRequest(
  profile: LLMProfile,
  payload: PromptPayload,
  sampling: SamplingParams,
  options: GenerateOptions
): () => Promise<string> {
  if (profile.type === 'custom') {
    const env = options.env ?? createTemplateEnvironment();
    const template = customTemplateName(profile);
    let prompt: string;
    try {
      prompt = renderCustomPrompt(payload, template, env);
    } catch (error) {
      throw new ConfigError(`Cannot render prompt template ${template}: ${errMessage(error)}`, { template }, { cause: error });
    }
    const apiKey = resolveApiKey(profile);
    return () => customLLMRequest(profile, prompt, sampling, { apiKey });
  }
  return () => openAIChatRequest(profile, payload, sampling);
}

/**
 * Sends one prompt to the profile's endpoint and returns the generated text
 * unmodified. Failures surface as NetworkError, AuthError, RateLimitError or
 * MalformedResponseError. Only a profile with `maxRetries` is retried, and
 * only for network and rate limit failures.
 */
export async function generate(
  payload: PromptPayload,
  sampling: SamplingParams,
  profile: LLMProfile,
  options: GenerateOptions = {}
): Promise<string> {
  const maxRetries = Math.max(0, profile.maxRetries ?? 0);
  const request = prepareRequest(profile, payload, sampling, options);

  for (let retryCount = 0; ; retryCount++) {
    try {
      const text = await request();
      if (retryCount > 0) {
        log('Retry succeeded on attempt %d', retryCount + 1);
      }
      return text;
    } catch (caught) {
      const error = toGenerationError(caught);

      if (!isRetryableError(error) || retryCount >= maxRetries) {
        log('Generation failed (%s): %s', error.name, error.message);
        throw error;
      }

      const backoffMs = calculateBackoff(profile, retryCount, error);
      log('Retryable error, waiting %dms before retry: %s', backoffMs, error.message);
      await sleep(backoffMs);
    }
  }
}
