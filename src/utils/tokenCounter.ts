import { encode } from 'gpt-tokenizer';
import { createLogger, NAMESPACES } from '../logging.js';

const log = createLogger(NAMESPACES.llm.prompt);

/**
 * Count tokens using the GPT tokenizer.
 * Falls back to character-based estimation if tokenization fails
 */
export function countTokens(text: string): number {
  if (!text) return 0;

  try {
    return encode(text).length;
  } catch (error) {
    log('Tokenization failed, using fallback estimation: %o', error);
    // Fallback: ~4 characters per token (rough approximation)
    return Math.max(1, Math.round(text.length / 4));
  }
}
