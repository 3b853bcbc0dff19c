// packages/game-core/src/letters.ts
//
// LetterMultiset: the letters of a root word as a countable bag.
//
// A candidate word is "composable" from the root when every letter it uses,
// counted with multiplicity, is available in the bag. Containment is checked
// by decrementing a transient copy of the counts, so the bag itself never
// changes after construction.

/**
 * Count-per-letter view of a word.
 *
 * Example:
 *   new LetterMultiset('silkworm').contains('works') → true
 *   new LetterMultiset('silkworm').contains('kiss')  → false (one 's' only)
 */
export class LetterMultiset {
  private readonly counts: ReadonlyMap<string, number>;
  readonly size: number;

  constructor(letters: string) {
    const counts = new Map<string, number>();
    for (const ch of letters) {
      counts.set(ch, (counts.get(ch) ?? 0) + 1);
    }
    this.counts = counts;
    this.size = [...letters].length;
  }

  /** Remaining count of a single letter (0 when absent). */
  count(letter: string): number {
    return this.counts.get(letter) ?? 0;
  }

  /**
   * contains reports whether `word` can be drawn from the bag.
   * Stops at the first letter that is absent or already used up.
   */
  contains(word: string): boolean {
    return this.draw(word) !== null;
  }

  /**
   * remove returns a new multiset with the letters of `word` drawn out,
   * or null when `word` is not contained. The receiver is left untouched.
   */
  remove(word: string): LetterMultiset | null {
    const left = this.draw(word);
    if (!left) return null;
    let rest = '';
    for (const [ch, n] of left) rest += ch.repeat(n);
    return new LetterMultiset(rest);
  }

  private draw(word: string): Map<string, number> | null {
    const scratch = new Map(this.counts);
    for (const ch of word) {
      const n = scratch.get(ch) ?? 0;
      if (n === 0) return null;
      scratch.set(ch, n - 1);
    }
    return scratch;
  }
}
