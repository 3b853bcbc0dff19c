// apps/server/src/games.ts
//
// In-memory game registry.
//
// Each game id maps to one GameSession. "Restart" deals a new root word and
// replaces the session under the same id; the old words and score are gone.
// Nothing is persisted, so restarting the process ends every game.
//
// Methods return protocol shapes (see @wordfinder/protocol) so the routes
// only have to validate input and serialize.

import { nanoid } from 'nanoid';
import {
  GameSession,
  MIN_ROOT_LENGTH,
  describeRejection,
  selectRootWord,
  type DictionaryOracle,
} from '@wordfinder/game-core';
import type { GameStateRes, SubmitRes } from '@wordfinder/protocol';

export type RegistryOptions = {
  rootWords: readonly string[];
  dictionary: DictionaryOracle;
  minRootLength?: number;
  random?: () => number;
  newId?: () => string;
};

export class GameRegistry {
  private readonly games = new Map<string, GameSession>();
  private readonly rootWords: readonly string[];
  private readonly dictionary: DictionaryOracle;
  private readonly minRootLength: number;
  private readonly random: () => number;
  private readonly newId: () => string;

  constructor(options: RegistryOptions) {
    this.rootWords = options.rootWords;
    this.dictionary = options.dictionary;
    this.minRootLength = options.minRootLength ?? MIN_ROOT_LENGTH;
    this.random = options.random ?? Math.random;
    this.newId = options.newId ?? (() => nanoid());
  }

  get size(): number {
    return this.games.size;
  }

  /** Start a new game; a seed makes the dealt root word reproducible. */
  create(seed?: string): GameStateRes {
    const id = this.newId();
    const session = this.deal(seed);
    this.games.set(id, session);
    return view(id, session);
  }

  get(id: string): GameStateRes | null {
    const session = this.games.get(id);
    return session ? view(id, session) : null;
  }

  /** Deal a fresh root word for an existing game. */
  restart(id: string): GameStateRes | null {
    if (!this.games.has(id)) return null;
    const session = this.deal();
    this.games.set(id, session);
    return view(id, session);
  }

  /** Run one submission; null when the game does not exist. */
  submit(id: string, word: string): SubmitRes | null {
    const session = this.games.get(id);
    if (!session) return null;

    const outcome = session.submit(word);
    if (!outcome) return { status: 'ignored', score: session.score };
    if (outcome.kind === 'accepted') {
      return {
        status: 'accepted',
        word: outcome.word,
        points: outcome.points,
        score: outcome.score,
        words: session.words,
      };
    }
    return {
      status: 'rejected',
      word: outcome.word,
      reason: outcome.reason,
      ...describeRejection(outcome.reason, session.rootWord),
      score: session.score,
    };
  }

  private deal(seed?: string): GameSession {
    const root = selectRootWord(this.rootWords, {
      minLength: this.minRootLength,
      seed,
      random: this.random,
    });
    return new GameSession(root, {
      dictionary: this.dictionary,
      minRootLength: this.minRootLength,
    });
  }
}

function view(gameId: string, session: GameSession): GameStateRes {
  return { gameId, ...session.snapshot() };
}
