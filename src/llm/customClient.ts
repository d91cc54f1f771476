import axios from 'axios';
import * as nunjucks from 'nunjucks';
import type { LLMProfile } from '../configManager.js';
import { MalformedResponseError } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { isRecord } from '../utils/schemaValidation.js';
import { toGenerationError } from './errorMapping.js';
import type { PromptPayload, SamplingParams } from './types.js';

const log = createLogger(NAMESPACES.llm.custom);

export interface CustomClientOptions {
  apiKey?: string;
  timeout?: number;
}

/**
 * Renders the payload through a raw prompt template
 * (llm_templates/<name>.njk: ChatML, Alpaca, ...).
 */
export function renderCustomPrompt(payload: PromptPayload, templateName: string, env: nunjucks.Environment): string {
  return env.render(`llm_templates/${templateName}.njk`, {
    system_prompt: payload.systemMessage,
    user_message: payload.userMessage,
    assistant_message: ''
  });
}

/** Pulls the completion text out of the common completion response shapes. */
export function extractCompletionText(data: unknown): string | undefined {
  if (!isRecord(data)) return undefined;

  if (Array.isArray(data.choices) && data.choices.length > 0) {
    const choice: unknown = data.choices[0];
    if (isRecord(choice)) {
      // Support both 'text' (completions API) and 'message.content' (chat format)
      if (typeof choice.text === 'string' && choice.text) return choice.text;
      if (isRecord(choice.message) && typeof choice.message.content === 'string' && choice.message.content) {
        return choice.message.content;
      }
    }
  }

  if (typeof data.result === 'string' && data.result) {
    return data.result;
  }

  return undefined;
}

/**
 * Custom LLM client using axios for non-OpenAI compatible endpoints.
 * Sends the rendered prompt to `{baseURL}/completions`.
 */
export async function customLLMRequest(
  profile: LLMProfile,
  renderedPrompt: string,
  sampling: SamplingParams,
  options: CustomClientOptions = {}
): Promise<string> {
  const { timeout = profile.timeoutMs ?? 120000, apiKey } = options;

  log('Posting to %s with model %s', profile.baseURL, profile.model);

  const requestBody = {
    prompt: renderedPrompt,
    model: profile.model,
    max_tokens: sampling.maxTokens,
    temperature: sampling.temperature,
    top_p: sampling.topP
  };

  let data: unknown;
  try {
    const response = await axios.post<unknown>(`${profile.baseURL.replace(/\/+$/, '')}/completions`, requestBody, {
      timeout,
      headers: {
        'Content-Type': 'application/json',
        ...(apiKey ? { Authorization: `Bearer ${apiKey}` } : {}),
      },
    });
    data = response.data;
  } catch (error) {
    const mapped = toGenerationError(error);
    log('Request failed: %s', mapped.message);
    throw mapped;
  }

  const text = extractCompletionText(data);
  if (text === undefined) {
    log('Unexpected response format: %o', data);
    throw new MalformedResponseError('Completion response did not contain any text');
  }
  return text;
}
