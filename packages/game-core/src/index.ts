// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports the word validation and scoring engine so consumers can import
// from one place.
//
// Includes:
//   • letters.ts    → LetterMultiset (composability checks)
//   • dictionary.ts → DictionaryOracle interface, WordListDictionary
//   • scoring.ts    → points, ScorePolicy
//   • rootWords.ts  → parseWordList, selectRootWord
//   • session.ts    → GameSession and its outcome types
//   • messages.ts   → describeRejection
//   • errors.ts     → EmptyCandidateListError, InvalidRootWordError
//
// Example usage:
//   import { GameSession, selectRootWord } from '@wordfinder/game-core';

export * from './letters.js';
export * from './dictionary.js';
export * from './scoring.js';
export * from './rootWords.js';
export * from './session.js';
export * from './messages.js';
export * from './errors.js';
