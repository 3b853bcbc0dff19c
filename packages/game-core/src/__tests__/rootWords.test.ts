// packages/game-core/src/__tests__/rootWords.test.ts
//
// Unit tests for parseWordList() and selectRootWord().

import {
  EmptyCandidateListError,
  parseWordList,
  selectRootWord,
} from '../index.js';

describe('parseWordList', () => {
  it('splits lines, lowercases and drops blanks and non-words', () => {
    expect(parseWordList('Silkworm\r\n\nbook case\nbaseball\n')).toEqual([
      'silkworm',
      'baseball',
    ]);
  });

  it('returns an empty list for empty text', () => {
    expect(parseWordList('')).toEqual([]);
    expect(parseWordList('\n\n')).toEqual([]);
  });
});

describe('selectRootWord', () => {
  const list = ['silkworm', 'notebook', 'elephants', 'cat'];

  it('always returns the only candidate of a single-element list', () => {
    for (let i = 0; i < 10; i++) {
      expect(selectRootWord(['silkworm'])).toBe('silkworm');
    }
  });

  it('throws EmptyCandidateListError on an empty list', () => {
    expect(() => selectRootWord([])).toThrow(EmptyCandidateListError);
  });

  it('uses the supplied random source', () => {
    expect(selectRootWord(list, { random: () => 0 })).toBe('silkworm');
    expect(selectRootWord(list, { random: () => 0.5 })).toBe('elephants');
    expect(selectRootWord(list, { random: () => 0.999 })).toBe('cat');
  });

  it('never indexes past the end of the list', () => {
    expect(selectRootWord(list, { random: () => 1 })).toBe('cat');
  });

  it('applies the length and plural filters', () => {
    const opts = { minLength: 4, allowPlurals: false };
    expect(selectRootWord(list, { ...opts, random: () => 0.999 })).toBe(
      'notebook',
    );
    expect(() =>
      selectRootWord(['cat', 'dogs'], { minLength: 4, allowPlurals: false }),
    ).toThrow(EmptyCandidateListError);
  });

  it('picks the same word for the same seed', () => {
    const a = selectRootWord(list, { seed: 'daily-2024-06-15' });
    const b = selectRootWord(list, { seed: 'daily-2024-06-15' });
    expect(a).toBe(b);
    expect(list).toContain(a);
  });
});
