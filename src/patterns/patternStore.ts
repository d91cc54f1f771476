import * as fs from 'fs';
import type { Schema } from 'ajv';
import { LoadError, errMessage } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { createValidator } from '../utils/schemaValidation.js';
import { compileTrigger, scoreTrigger, Trigger } from './triggers.js';

const log = createLogger(NAMESPACES.patterns.store);

export const CHARACTER_BUCKET = 'CHARACTER_SPECIFICS';

export interface PatternEntry {
  readonly trigger: Trigger;
  readonly tags: readonly string[];
  readonly weight: number;
}

export type TagSource = 'character' | 'general';

export interface RankedTag {
  tag: string;
  /** score × entry weight; higher sorts first */
  rank: number;
  score: number;
  source: TagSource;
}

interface PatternDocumentEntry {
  pattern: string;
  tags: string[];
  weight?: number;
}

interface PatternDocument {
  [bucket: string]: PatternDocumentEntry[] | Record<string, PatternDocumentEntry[]> | undefined;
}

const entrySchema = {
  type: 'object',
  required: ['pattern', 'tags'],
  properties: {
    pattern: { type: 'string', minLength: 1 },
    tags: { type: 'array', items: { type: 'string', minLength: 1 } },
    weight: { type: 'number', exclusiveMinimum: 0 }
  }
};

const documentSchema: Schema = {
  type: 'object',
  properties: {
    [CHARACTER_BUCKET]: {
      type: 'object',
      additionalProperties: { type: 'array', items: entrySchema }
    }
  },
  additionalProperties: { type: 'array', items: entrySchema }
};

const validateDocument = createValidator<PatternDocument>(documentSchema);

function compileEntries(entries: PatternDocumentEntry[], location: string): PatternEntry[] {
  return entries.map((entry, index) => {
    let trigger: Trigger;
    try {
      trigger = compileTrigger(entry.pattern);
    } catch (error) {
      throw new LoadError(
        `Invalid pattern at ${location}/${index}: ${errMessage(error)}`,
        { path: `${location}/${index}`, pattern: entry.pattern },
        { cause: error }
      );
    }
    return Object.freeze({ trigger, tags: Object.freeze([...entry.tags]), weight: entry.weight ?? 1 });
  });
}

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

/**
 * Scores every entry against the text and keeps the tags of the qualifying
 * ones. A tag reached by several entries keeps its best rank and its
 * first-match position; the result is sorted by rank, ties in match order.
 */
export function rankEntries(
  entries: readonly PatternEntry[],
  text: string,
  strictness: number,
  source: TagSource
): RankedTag[] {
  const lowerText = text.toLowerCase();
  const threshold = clamp(strictness, 0, 1);
  const best = new Map<string, RankedTag>();

  for (const entry of entries) {
    const score = scoreTrigger(entry.trigger, lowerText);
    if (score <= 0 || score < threshold) continue;
    const rank = score * entry.weight;
    for (const tag of entry.tags) {
      const existing = best.get(tag);
      if (!existing || rank > existing.rank) {
        best.set(tag, { tag, rank, score, source });
      }
    }
  }

  return [...best.values()].sort((a, b) => b.rank - a.rank);
}

/**
 * Read-only mapping from character name (upper-cased) to trigger entries,
 * plus the general buckets (every other top-level list in the document).
 */
export class PatternStore {
  private readonly characters: ReadonlyMap<string, readonly PatternEntry[]>;
  private readonly buckets: ReadonlyMap<string, readonly PatternEntry[]>;

  private constructor(
    characters: Map<string, PatternEntry[]>,
    buckets: Map<string, PatternEntry[]>
  ) {
    this.characters = characters;
    this.buckets = buckets;
  }

  /**
   * Parses and validates a pattern document (JSON text or an already parsed value).
   * Missing buckets are fine; anything malformed fails with LoadError.
   */
  static load(source: unknown): PatternStore {
    let parsed: unknown = source;
    if (typeof source === 'string') {
      try {
        parsed = JSON.parse(source);
      } catch (error) {
        throw new LoadError(`Pattern document is not valid JSON: ${errMessage(error)}`, undefined, { cause: error });
      }
    }

    const result = validateDocument(parsed);
    if (!result.valid || !result.value) {
      throw new LoadError(`Invalid pattern document: ${result.errors.join('; ')}`, { errors: result.errorDetails });
    }

    const characters = new Map<string, PatternEntry[]>();
    const buckets = new Map<string, PatternEntry[]>();

    for (const [bucketName, bucket] of Object.entries(result.value)) {
      if (bucket === undefined) continue;
      if (Array.isArray(bucket)) {
        buckets.set(bucketName, compileEntries(bucket, `/${bucketName}`));
        continue;
      }
      for (const [name, entries] of Object.entries(bucket)) {
        const key = name.trim().toUpperCase();
        const compiled = compileEntries(entries, `/${bucketName}/${name}`);
        characters.set(key, [...(characters.get(key) ?? []), ...compiled]);
      }
    }

    log('Loaded %d characters and %d general buckets', characters.size, buckets.size);
    return new PatternStore(characters, buckets);
  }

  static empty(): PatternStore {
    return new PatternStore(new Map(), new Map());
  }

  characterNames(): string[] {
    return [...this.characters.keys()];
  }

  hasCharacter(name: string): boolean {
    return this.characters.has(name.trim().toUpperCase());
  }

  /** Entries for a character; an unknown character has an empty list. */
  entriesFor(characterName: string): readonly PatternEntry[] {
    return this.characters.get(characterName.trim().toUpperCase()) ?? [];
  }

  bucketNames(): string[] {
    return [...this.buckets.keys()];
  }

  /** All general buckets concatenated in document order. */
  generalEntries(): readonly PatternEntry[] {
    return [...this.buckets.values()].flat();
  }

  /** Leading tags of the first general entry, used as overall vibe hints. */
  vibes(count: number = 3): string[] {
    const first = this.generalEntries()[0];
    return first ? first.tags.slice(0, Math.max(0, count)) : [];
  }

  rankedTagsFor(characterName: string, contextText: string, maxTags: number, strictnessThreshold: number): RankedTag[] {
    const limit = Math.floor(maxTags);
    if (!(limit >= 1)) return [];

    const own = this.entriesFor(characterName);
    const ranked = own.length > 0
      ? rankEntries(own, contextText, strictnessThreshold, 'character')
      : rankEntries(this.generalEntries(), contextText, strictnessThreshold, 'general');

    log('%s -> %o', characterName, ranked.map(r => r.tag));
    return ranked.slice(0, limit);
  }

  /**
   * Tags whose triggers match `contextText`, best first, no duplicates,
   * at most `maxTags`. Characters without entries fall back to the general buckets.
   */
  tagsFor(characterName: string, contextText: string, maxTags: number, strictnessThreshold: number): string[] {
    return this.rankedTagsFor(characterName, contextText, maxTags, strictnessThreshold).map(r => r.tag);
  }

  rankedGeneralTags(contextText: string, maxTags: number, strictnessThreshold: number): RankedTag[] {
    const limit = Math.floor(maxTags);
    if (!(limit >= 1)) return [];
    return rankEntries(this.generalEntries(), contextText, strictnessThreshold, 'general').slice(0, limit);
  }
}

export function loadPatternFile(filePath: string): PatternStore {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new LoadError(`Cannot read pattern document ${filePath}: ${errMessage(error)}`, { path: filePath }, { cause: error });
  }
  return PatternStore.load(raw);
}
