// packages/game-core/src/errors.ts
//
// Exceptions raised by the core. Player mistakes are never thrown; they come
// back as rejected outcomes from GameSession.submit. These errors are for
// hosts that hand the engine unusable input at startup.

/** Raised when there is no root word to choose from. */
export class EmptyCandidateListError extends Error {
  constructor(message = 'Root-word candidate list is empty') {
    super(message);
    this.name = 'EmptyCandidateListError';
  }
}

/** Raised when a session is started with a root word that cannot be played. */
export class InvalidRootWordError extends Error {
  readonly rootWord: string;

  constructor(rootWord: string, reason: string) {
    super(`Invalid root word "${rootWord}": ${reason}`);
    this.name = 'InvalidRootWordError';
    this.rootWord = rootWord;
  }
}
