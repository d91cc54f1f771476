import {
  AuthError,
  GenerationError,
  NetworkError,
  RateLimitError,
  errMessage
} from '../errors.js';
import { isRecord } from '../utils/schemaValidation.js';

/** HTTP status from an OpenAI SDK error (`status`) or an axios error (`response.status`). */
export function statusOf(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  if (typeof error.status === 'number') return error.status;
  if (isRecord(error.response) && typeof error.response.status === 'number') return error.response.status;
  return undefined;
}

function headersOf(error: unknown): Record<string, unknown> | undefined {
  if (!isRecord(error)) return undefined;
  if (isRecord(error.headers)) return error.headers;
  if (isRecord(error.response) && isRecord(error.response.headers)) return error.response.headers;
  return undefined;
}

/** `retry-after` in milliseconds, when the provider sent one in seconds. */
export function retryAfterOf(error: unknown): number | undefined {
  const value = headersOf(error)?.['retry-after'];
  const seconds = typeof value === 'string' || typeof value === 'number' ? Number(value) : NaN;
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

/**
 * Maps whatever a provider call threw onto the generation error taxonomy.
 * 401/403 → AuthError, 429 → RateLimitError, any other status or no
 * response at all (refused, reset, timed out) → NetworkError.
 */
export function toGenerationError(error: unknown): GenerationError {
  if (error instanceof GenerationError) return error;

  const status = statusOf(error);
  const message = errMessage(error);

  if (status === 401 || status === 403) {
    return new AuthError(`Authentication failed (${status}): ${message}`, status, { cause: error });
  }
  if (status === 429) {
    return new RateLimitError(`Rate limited by provider: ${message}`, retryAfterOf(error), { cause: error });
  }
  if (status !== undefined) {
    return new NetworkError(`Provider returned HTTP ${status}: ${message}`, status, { cause: error });
  }
  return new NetworkError(`Request failed: ${message}`, undefined, { cause: error });
}

export function isRetryableError(error: GenerationError): boolean {
  return error instanceof NetworkError || error instanceof RateLimitError;
}
