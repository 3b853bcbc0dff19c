// packages/game-core/src/messages.ts
//
// Player-facing wording for each rejection reason.

import type { RejectionReason } from './session.js';

export type RejectionMessage = { title: string; message: string };

export function describeRejection(
  reason: RejectionReason,
  rootWord: string,
): RejectionMessage {
  switch (reason) {
    case 'tooShort':
      return { title: 'Word is too short', message: 'Make a longer word!' };
    case 'matchesRoot':
      return {
        title: 'Word matches the original',
        message: 'Make a word from letters of the original!',
      };
    case 'alreadyUsed':
      return { title: 'Word used already', message: 'Be more original!' };
    case 'notPossible':
      return {
        title: 'Word not possible',
        message: `You can't spell that word from '${rootWord}'!`,
      };
    case 'notARealWord':
      return {
        title: 'Word not recognized',
        message: "You can't just make them up, you know?",
      };
  }
}
