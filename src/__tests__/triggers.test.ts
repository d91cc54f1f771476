import { describe, it, expect } from 'vitest';
import { compileTrigger, isRegexKey, scoreTrigger } from '../patterns/triggers.js';

describe('triggers', () => {
  it('recognises /body/ keys as regular expressions', () => {
    expect(isRegexKey('/abc/')).toBe(true);
    expect(isRegexKey('//')).toBe(false);
    expect(isRegexKey('abc')).toBe(false);
    expect(compileTrigger('/\\bmidnight\\b/').kind).toBe('regex');
  });

  it('compiles literals to a lower-cased phrase and its words', () => {
    const trigger = compileTrigger('Archery Practice');
    expect(trigger).toEqual({
      kind: 'literal',
      source: 'Archery Practice',
      phrase: 'archery practice',
      words: ['archery', 'practice'],
      matcher: expect.any(RegExp)
    });
  });

  it('scores a full phrase match as 1', () => {
    expect(scoreTrigger(compileTrigger('Archery Practice'), 'after archery practice we ate')).toBe(1);
  });

  it('matches the phrase only on word boundaries', () => {
    expect(scoreTrigger(compileTrigger('rival'), 'the arrival of the new transfer student')).toBe(0);
    expect(scoreTrigger(compileTrigger('sleep'), 'aigis fell asleep')).toBe(0);
    expect(scoreTrigger(compileTrigger('rival'), 'his rival, again')).toBe(1);
  });

  it('allows any spacing or punctuation between phrase words', () => {
    expect(scoreTrigger(compileTrigger('archery practice'), 'archery   practice')).toBe(1);
    expect(scoreTrigger(compileTrigger('archery practice'), 'archery-practice')).toBe(1);
  });

  it('scores partial literal matches by the share of whole words found', () => {
    const trigger = compileTrigger('dorm kitchen fire');
    expect(scoreTrigger(trigger, 'the kitchen caught fire')).toBeCloseTo(2 / 3);
    expect(scoreTrigger(compileTrigger('dorm kitchen'), 'kitchens in the dorm')).toBe(0.5);
  });

  it('scores a missing single word as 0', () => {
    expect(scoreTrigger(compileTrigger('ramen'), 'udon again')).toBe(0);
  });

  it('scores regex triggers as 1 or 0, ignoring case', () => {
    const trigger = compileTrigger('/\\bMIDNIGHT\\b/');
    expect(scoreTrigger(trigger, 'at midnight')).toBe(1);
    expect(scoreTrigger(trigger, 'midnights')).toBe(0);
  });

  it('throws for a regex body that does not compile', () => {
    expect(() => compileTrigger('/(unclosed/')).toThrow(SyntaxError);
  });
});
