// Error taxonomy shared by every layer

export class ParodyError extends Error {
  code = 'PARODY_ERROR';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }
}

/** The pattern document is malformed. Fatal at startup. */
export class LoadError extends ParodyError {
  code = 'LOAD_ERROR';
}

/** Invalid input to prompt assembly; the caller should re-prompt. */
export class BuildError extends ParodyError {
  code = 'BUILD_ERROR';
}

export class ConfigError extends ParodyError {
  code = 'CONFIG_ERROR';
}

export class SessionStateError extends ParodyError {
  code = 'SESSION_STATE_ERROR';
}

/**
 * Base for every failure of the remote generation call. Callers usually
 * render all of these as "generation failed, try again".
 */
export class GenerationError extends ParodyError {
  code = 'GENERATION_ERROR';
  status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, status !== undefined ? { status } : undefined, options);
    this.status = status;
  }
}

export class NetworkError extends GenerationError {
  code = 'NETWORK_ERROR';
}

export class AuthError extends GenerationError {
  code = 'AUTH_ERROR';
}

export class RateLimitError extends GenerationError {
  code = 'RATE_LIMIT_ERROR';
  retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number, options?: { cause?: unknown }) {
    super(message, 429, options);
    this.retryAfterMs = retryAfterMs;
  }
}

export class MalformedResponseError extends GenerationError {
  code = 'MALFORMED_RESPONSE_ERROR';
}

export const errMessage = (error: unknown): string => {
  if (error instanceof Error && error.message.trim().length > 0) return error.message;
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
};
