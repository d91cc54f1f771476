import { describe, it, expect } from 'vitest';
import { TagResolver } from '../context/tagResolver.js';
import { PatternStore } from '../patterns/patternStore.js';

const config = { maxTags: 3, patternStrictness: 0.6, tagWeight: 1 };

describe('TagResolver', () => {
  it('resolves a character tag from the context', () => {
    const store = PatternStore.load({
      CHARACTER_SPECIFICS: { YUKARI: [{ pattern: 'tsundere', tags: ['#tsundere_queen'] }] }
    });
    const tags = new TagResolver(store).resolve(['YUKARI'], 'Yukari is acting all tsundere again', config);
    expect(tags).toContain('#tsundere_queen');
    expect(tags).toEqual(['#tsundere_queen']);
  });

  it('keeps only the best weighted tags across the merged set', () => {
    const store = PatternStore.load({
      CHARACTER_SPECIFICS: {
        HERO: [
          { pattern: 'duel', tags: ['C'], weight: 1 },
          { pattern: 'duel', tags: ['B'], weight: 2 },
          { pattern: 'duel', tags: ['A'], weight: 3 }
        ]
      }
    });
    expect(new TagResolver(store).resolve(['HERO'], 'a duel at dawn', { ...config, maxTags: 2 })).toEqual(['A', 'B']);
  });

  it('boosts character tags over general tags by tagWeight', () => {
    const store = PatternStore.load({
      CHARACTER_SPECIFICS: { HERO: [{ pattern: 'duel', tags: ['#hero_tag'] }] },
      GENERAL: [{ pattern: 'duel', tags: ['#general_tag'], weight: 1.5 }]
    });
    const resolver = new TagResolver(store);
    expect(resolver.resolve(['HERO'], 'duel', config)).toEqual(['#general_tag', '#hero_tag']);
    expect(resolver.resolve(['HERO'], 'duel', { ...config, tagWeight: 2 })).toEqual(['#hero_tag', '#general_tag']);
  });

  it('lets triggers react to who is in the scene', () => {
    const store = PatternStore.load({
      CHARACTER_SPECIFICS: { JUNPEI: [{ pattern: 'yukari', tags: ['#bad_flirt'] }] }
    });
    expect(new TagResolver(store).resolve(['JUNPEI', 'YUKARI'], 'at the beach', config)).toEqual(['#bad_flirt']);
  });

  it('truncates across characters, not per character', () => {
    const store = PatternStore.load({
      CHARACTER_SPECIFICS: {
        ONE: [{ pattern: 'party', tags: ['#one_a', '#one_b'] }],
        TWO: [{ pattern: 'party', tags: ['#two_a', '#two_b'] }]
      }
    });
    const resolver = new TagResolver(store);
    const limited = { ...config, maxTags: 2 };
    expect(resolver.resolve(['ONE', 'TWO'], 'party', limited)).toEqual(['#one_a', '#one_b']);
    expect(resolver.resolveByCharacter(['ONE', 'TWO'], 'party', limited)).toEqual({
      ONE: ['#one_a', '#one_b'],
      TWO: ['#two_a', '#two_b']
    });
  });

  it('deduplicates tags shared by several characters', () => {
    const store = PatternStore.load({
      CHARACTER_SPECIFICS: {
        ONE: [{ pattern: 'rain', tags: ['#umbrella'] }],
        TWO: [{ pattern: 'rain', tags: ['#umbrella'] }]
      }
    });
    expect(new TagResolver(store).resolve(['ONE', 'TWO'], 'rain', config)).toEqual(['#umbrella']);
  });

  it('is deterministic for identical input', () => {
    const store = PatternStore.load({
      CHARACTER_SPECIFICS: { A: [{ pattern: 'x', tags: ['#1', '#2'] }], B: [{ pattern: 'x', tags: ['#3'] }] },
      GENERAL: [{ pattern: 'x', tags: ['#4'] }]
    });
    const resolver = new TagResolver(store);
    const first = resolver.resolve(['A', 'B'], 'x marks the spot', config);
    expect(resolver.resolve(['A', 'B'], 'x marks the spot', config)).toEqual(first);
    expect(first).toEqual(['#1', '#2', '#3']);
  });
});
