// packages/game-core/src/session.ts
//
// GameSession: one round of play against a single root word.
//
// State is the root word, the accepted words (most recent first) and the
// score. The only way to change it is submit(), which normalizes the input
// and runs the validation pipeline:
//
//   1. tooShort     — fewer than minWordLength letters (default: ≤ 2)
//   2. matchesRoot  — identical to the root word
//   3. alreadyUsed  — accepted earlier in this session
//   4. notPossible  — needs letters the root word does not have
//   5. notARealWord — the dictionary does not know it
//
// The first failing check wins. Cheap checks run before the dictionary
// lookup. Rejections are returned, never thrown, and leave state unchanged.
// Starting a new game means constructing a new session.

import type { DictionaryOracle, Language } from './dictionary.js';
import { InvalidRootWordError } from './errors.js';
import { LetterMultiset } from './letters.js';
import { MIN_ROOT_LENGTH } from './rootWords.js';
import { points, type ScorePolicy } from './scoring.js';

export const MIN_WORD_LENGTH = 3;

export type RejectionReason =
  | 'tooShort'
  | 'matchesRoot'
  | 'alreadyUsed'
  | 'notPossible'
  | 'notARealWord';

export type ValidationOutcome =
  | { kind: 'accepted'; word: string; points: number; score: number }
  | { kind: 'rejected'; word: string; reason: RejectionReason };

export type SessionOptions = {
  dictionary: DictionaryOracle;
  language?: Language;
  minWordLength?: number;
  minRootLength?: number;
  score?: ScorePolicy;
};

export type SessionSnapshot = {
  rootWord: string;
  words: string[];
  score: number;
};

const normalize = (raw: string) => raw.trim().toLowerCase();

export class GameSession {
  readonly rootWord: string;
  private readonly letters: LetterMultiset;
  private readonly accepted: string[] = [];
  private readonly used = new Set<string>();
  private total = 0;

  private readonly dictionary: DictionaryOracle;
  private readonly language: Language;
  private readonly minWordLength: number;
  private readonly scorePolicy: ScorePolicy;

  /**
   * @throws InvalidRootWordError when the root is not purely alphabetic
   *         or is shorter than `minRootLength`
   */
  constructor(rootWord: string, options: SessionOptions) {
    const root = normalize(rootWord);
    const minRootLength = options.minRootLength ?? MIN_ROOT_LENGTH;
    if (!/^[a-z]+$/.test(root)) {
      throw new InvalidRootWordError(rootWord, 'only letters a–z are allowed');
    }
    if (root.length < minRootLength) {
      throw new InvalidRootWordError(
        rootWord,
        `must be at least ${minRootLength} letters`,
      );
    }

    this.rootWord = root;
    this.letters = new LetterMultiset(root);
    this.dictionary = options.dictionary;
    this.language = options.language ?? 'en';
    this.minWordLength = options.minWordLength ?? MIN_WORD_LENGTH;
    this.scorePolicy = options.score ?? points;
  }

  get score(): number {
    return this.total;
  }

  /** Accepted words, most recent first (a fresh copy). */
  get words(): string[] {
    return [...this.accepted];
  }

  /**
   * submit validates one player entry.
   *
   * @returns the outcome, or null for a blank entry (nothing to report)
   *
   * Example (root "silkworm"):
   *   submit(' Works ') → { kind: 'accepted', word: 'works', points: 5, score: 5 }
   *   submit('kiss')    → { kind: 'rejected', word: 'kiss', reason: 'notPossible' }
   */
  submit(rawInput: string): ValidationOutcome | null {
    const word = normalize(rawInput);
    if (word.length === 0) return null;

    const reason = this.check(word);
    if (reason) return { kind: 'rejected', word, reason };

    const awarded = this.scorePolicy(word);
    this.accepted.unshift(word);
    this.used.add(word);
    this.total += awarded;
    return { kind: 'accepted', word, points: awarded, score: this.total };
  }

  snapshot(): SessionSnapshot {
    return {
      rootWord: this.rootWord,
      words: [...this.accepted],
      score: this.total,
    };
  }

  private check(word: string): RejectionReason | null {
    if (word.length < this.minWordLength) return 'tooShort';
    if (word === this.rootWord) return 'matchesRoot';
    if (this.used.has(word)) return 'alreadyUsed';
    if (!this.letters.contains(word)) return 'notPossible';
    if (!this.dictionary.isValid(word, this.language)) return 'notARealWord';
    return null;
  }
}
