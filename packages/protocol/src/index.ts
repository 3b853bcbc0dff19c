// packages/protocol/src/index.ts
//
// Shared protocol definitions for the WordFinder host and its clients.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - RejectionReason: why a submitted word was not accepted.
//   - Request/response shapes for starting a game, submitting words and
//     reading the current game state.
//
// These schemas are consumed on both ends (server validates inputs, client
// infers types and ensures consistent expectations).

import { z } from 'zod';

/**
 * RejectionReason schema:
 *  - "tooShort"     → two letters or fewer
 *  - "matchesRoot"  → the root word itself
 *  - "alreadyUsed"  → accepted earlier in this game
 *  - "notPossible"  → needs letters the root word lacks
 *  - "notARealWord" → not in the dictionary
 */
export const rejectionReasonSchema = z.enum([
  'tooShort',
  'matchesRoot',
  'alreadyUsed',
  'notPossible',
  'notARealWord',
]);

/* -------------------------------------------------------------------------- */
/*                            Shared game state                               */
/* -------------------------------------------------------------------------- */

/**
 * Game state as seen by a client:
 *  - gameId:   unique game identifier
 *  - rootWord: the word every submission is spelled from
 *  - words:    accepted words, most recent first
 *  - score:    running total
 */
export const gameStateRes = z.object({
  gameId: z.string(),
  rootWord: z.string(),
  words: z.array(z.string()),
  score: z.number().int().min(0),
});
export type GameStateRes = z.infer<typeof gameStateRes>;

/* -------------------------------------------------------------------------- */
/*                              /api/new endpoint                             */
/* -------------------------------------------------------------------------- */

/**
 * Request to start a new game.
 *  - seed: optional string for deterministic root-word selection
 */
export const newGameReq = z.object({
  seed: z.string().min(1).optional(),
});

/** Response to /api/new: the freshly created game. */
export const newGameRes = gameStateRes;

/* -------------------------------------------------------------------------- */
/*                            /api/submit endpoint                            */
/* -------------------------------------------------------------------------- */

/**
 * Request to submit a word.
 *  - gameId: game identifier from newGameRes
 *  - word:   raw player input; trimmed and lowercased by the server
 */
export const submitReq = z.object({
  gameId: z.string(),
  word: z.string().max(64),
});

/**
 * Response to /api/submit, keyed by status:
 *  - "accepted" → word scored; new total and word list included
 *  - "rejected" → reason plus a title/message to show the player
 *  - "ignored"  → blank submission, nothing changed
 */
export const submitRes = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('accepted'),
    word: z.string(),
    points: z.number().int().min(0),
    score: z.number().int().min(0),
    words: z.array(z.string()),
  }),
  z.object({
    status: z.literal('rejected'),
    word: z.string(),
    reason: rejectionReasonSchema,
    title: z.string(),
    message: z.string(),
    score: z.number().int().min(0),
  }),
  z.object({
    status: z.literal('ignored'),
    score: z.number().int().min(0),
  }),
]);
export type SubmitRes = z.infer<typeof submitRes>;
