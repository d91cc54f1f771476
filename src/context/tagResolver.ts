import type { GenerationConfig } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { PatternStore, RankedTag } from '../patterns/patternStore.js';

const log = createLogger(NAMESPACES.context.resolver);

export type ResolverConfig = Pick<GenerationConfig, 'maxTags' | 'patternStrictness' | 'tagWeight'>;

/** Triggers see the context plus the names of everyone in the scene. */
function scanText(characters: readonly string[], contextText: string): string {
  return [contextText, ...characters].join('\n');
}

export class TagResolver {
  constructor(private readonly store: PatternStore) {}

  private rankedFor(character: string, text: string, config: ResolverConfig): RankedTag[] {
    return this.store.rankedTagsFor(character, text, config.maxTags, config.patternStrictness);
  }

  /**
   * Merged tag hints for a scene. Character tags are boosted by `tagWeight`,
   * general tags are not; the merged list is sorted by weighted rank (ties in
   * first-match order), deduplicated and cut to `maxTags` overall.
   */
  resolve(characters: readonly string[], contextText: string, config: ResolverConfig): string[] {
    const text = scanText(characters, contextText);
    const candidates: RankedTag[] = [];

    for (const character of characters) {
      candidates.push(...this.rankedFor(character, text, config));
    }
    candidates.push(...this.store.rankedGeneralTags(text, config.maxTags, config.patternStrictness));

    const merged = new Map<string, number>();
    for (const candidate of candidates) {
      const weighted = candidate.source === 'character' ? candidate.rank * config.tagWeight : candidate.rank;
      const existing = merged.get(candidate.tag);
      if (existing === undefined || weighted > existing) {
        merged.set(candidate.tag, weighted);
      }
    }

    const tags = [...merged.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, Math.max(0, Math.floor(config.maxTags)))
      .map(([tag]) => tag);

    log('Resolved %o for %o', tags, characters);
    return tags;
  }

  /** Tag list per character, used for the character profile lines of the prompt. */
  resolveByCharacter(characters: readonly string[], contextText: string, config: ResolverConfig): Record<string, string[]> {
    const text = scanText(characters, contextText);
    const byCharacter: Record<string, string[]> = {};
    for (const character of characters) {
      byCharacter[character] = this.rankedFor(character, text, config).map(r => r.tag);
    }
    return byCharacter;
  }
}
