// packages/game-core/src/rootWords.ts
//
// Root-word selection.
//
// The host supplies the candidate list (usually read from a newline-delimited
// resource). This module only splits that text and picks one entry, either
// uniformly at random or deterministically from a seed.
//
// Exports:
//   • parseWordList  — newline-delimited text → lowercase alphabetic words
//   • selectRootWord — pick one candidate, optionally filtered

import { EmptyCandidateListError } from './errors.js';

export const MIN_ROOT_LENGTH = 4;

export type SelectOptions = {
  /** Drop candidates shorter than this. */
  minLength?: number;
  /** When false, drop candidates ending in "s". Defaults to true. */
  allowPlurals?: boolean;
  /** Deterministic pick; same seed and list always give the same word. */
  seed?: string;
  /** Source of randomness in [0, 1). Defaults to Math.random. */
  random?: () => number;
};

/**
 * parseWordList splits a newline-delimited word list.
 * Blank lines and lines with anything other than a–z are skipped.
 *
 * Example:
 *   parseWordList('Silkworm\r\n\nbook case\nbaseball\n') → ['silkworm', 'baseball']
 */
export function parseWordList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim().toLowerCase())
    .filter((w) => /^[a-z]+$/.test(w));
}

// FNV-1a, so seeded games are reproducible across processes.
function hashSeed(seed: string): number {
  let h = 2166136261;
  for (const ch of seed) {
    h ^= ch.charCodeAt(0);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

/**
 * selectRootWord picks one word from `candidates`.
 *
 * @throws EmptyCandidateListError when nothing is left after filtering
 */
export function selectRootWord(
  candidates: readonly string[],
  options: SelectOptions = {},
): string {
  const { minLength = 0, allowPlurals = true, seed, random = Math.random } =
    options;

  const pool = candidates.filter(
    (w) => w.length >= minLength && (allowPlurals || !w.endsWith('s')),
  );
  if (pool.length === 0) throw new EmptyCandidateListError();

  const i =
    seed !== undefined
      ? hashSeed(seed) % pool.length
      : Math.min(Math.floor(random() * pool.length), pool.length - 1);
  return pool[i];
}
