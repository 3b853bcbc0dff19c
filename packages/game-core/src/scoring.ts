// packages/game-core/src/scoring.ts
//
// Scoring policy for accepted words.
//
// One point per letter, no multipliers. Kept apart from the validation
// pipeline so a different policy can be handed to a GameSession without
// touching the checks.

/** Maps an accepted word to the number of points it is worth. */
export type ScorePolicy = (word: string) => number;

/**
 * points returns the value of an accepted word: its length.
 *
 * Example:
 *   points('works') → 5
 */
export const points: ScorePolicy = (word) => [...word].length;
