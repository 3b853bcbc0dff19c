// packages/protocol/src/__tests__/protocol.test.ts
//
// Checks the request/response schemas accept what the server sends and
// refuse malformed input.

import { newGameReq, submitReq, submitRes } from '../index.js';

describe('newGameReq', () => {
  it('accepts an empty body and an optional seed', () => {
    expect(newGameReq.parse({})).toEqual({});
    expect(newGameReq.parse({ seed: 'daily' })).toEqual({ seed: 'daily' });
  });

  it('rejects an empty seed', () => {
    expect(newGameReq.safeParse({ seed: '' }).success).toBe(false);
  });
});

describe('submitReq', () => {
  it('requires a game id and a word', () => {
    expect(submitReq.safeParse({ gameId: 'g1', word: 'works' }).success).toBe(true);
    expect(submitReq.safeParse({ word: 'works' }).success).toBe(false);
  });

  it('caps the length of the raw input', () => {
    expect(submitReq.safeParse({ gameId: 'g1', word: 'a'.repeat(65) }).success).toBe(
      false,
    );
  });
});

describe('submitRes', () => {
  it('requires a known rejection reason', () => {
    const res = {
      status: 'rejected',
      word: 'mork',
      reason: 'notAWord',
      title: 'Word not recognized',
      message: "You can't just make them up, you know?",
      score: 0,
    };
    expect(submitRes.safeParse(res).success).toBe(false);
    expect(submitRes.safeParse({ ...res, reason: 'notARealWord' }).success).toBe(true);
  });

  it('accepts an ignored submission', () => {
    expect(submitRes.parse({ status: 'ignored', score: 3 })).toEqual({
      status: 'ignored',
      score: 3,
    });
  });
});
