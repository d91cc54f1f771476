/**
 * A trigger is stored as data in the pattern document and compiled once at
 * load time. `/body/` is a regular expression, anything else a literal phrase.
 * Both match case-insensitively.
 */
export type Trigger =
  | { kind: 'literal'; source: string; phrase: string; words: readonly string[]; matcher: RegExp }
  | { kind: 'regex'; source: string; matcher: RegExp };

const WORD_SPLIT = /[^\p{L}\p{N}]+/u;

// words only hold letters and digits, nothing to escape
function wholeWords(words: readonly string[]): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}])${words.join('[^\\p{L}\\p{N}]+')}(?![\\p{L}\\p{N}])`, 'u');
}

export function isRegexKey(key: string): boolean {
  return key.length > 2 && key.startsWith('/') && key.endsWith('/');
}

/** Compiles a document pattern. Throws the RegExp SyntaxError for a bad regex body. */
export function compileTrigger(key: string): Trigger {
  if (isRegexKey(key)) {
    return { kind: 'regex', source: key, matcher: new RegExp(key.slice(1, -1), 'i') };
  }
  const phrase = key.trim().toLowerCase();
  const words = phrase.split(WORD_SPLIT).filter(Boolean);
  return { kind: 'literal', source: key, phrase, words, matcher: wholeWords(words) };
}

/**
 * Scores a trigger against already lower-cased text.
 * Regex: 1 or 0. Literal: 1 when the whole phrase occurs on word boundaries
 * (any run of spaces or punctuation between its words), otherwise the
 * fraction of its words found as whole words.
 */
export function scoreTrigger(trigger: Trigger, lowerText: string): number {
  if (trigger.kind === 'regex') {
    return trigger.matcher.test(lowerText) ? 1 : 0;
  }
  if (trigger.words.length === 0) return 0;
  if (trigger.matcher.test(lowerText)) return 1;
  if (trigger.words.length < 2) return 0;
  const found = trigger.words.filter(word => wholeWords([word]).test(lowerText)).length;
  return found / trigger.words.length;
}
