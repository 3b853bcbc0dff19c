// packages/game-core/src/dictionary.ts
//
// Dictionary lookup as an injected capability.
//
// The engine never decides on its own what counts as a real word. Hosts pass
// a DictionaryOracle into the session: a static list, an embedded dictionary
// file or anything else that answers isValid synchronously.

export type Language = 'en';

export interface DictionaryOracle {
  /** True when `word` (already lowercase and trimmed) is a recognized word. */
  isValid(word: string, language: Language): boolean;
}

/**
 * WordListDictionary answers lookups from an in-memory set of English words.
 * Entries are trimmed and lowercased on the way in.
 */
export class WordListDictionary implements DictionaryOracle {
  private readonly words = new Set<string>();

  constructor(words: Iterable<string>) {
    this.add(words);
  }

  get size(): number {
    return this.words.size;
  }

  add(words: Iterable<string>): void {
    for (const w of words) {
      const lo = w.trim().toLowerCase();
      if (lo) this.words.add(lo);
    }
  }

  isValid(word: string, language: Language): boolean {
    return language === 'en' && this.words.has(word);
  }
}
