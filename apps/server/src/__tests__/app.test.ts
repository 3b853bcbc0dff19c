// apps/server/src/__tests__/app.test.ts
//
// Route tests for the Express app. Each test starts the app on an ephemeral
// loopback port inside the test process and talks to it with fetch.

import type { Server } from 'node:http';
import pino from 'pino';
import { WordListDictionary } from '@wordfinder/game-core';
import { createApp } from '../app.js';
import { GameRegistry } from '../games.js';

let server: Server;
let base: string;

async function post(path: string, body: unknown) {
  const res = await fetch(`${base}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
  return { status: res.status, body: await res.json() };
}

beforeEach(async () => {
  let n = 0;
  const games = new GameRegistry({
    rootWords: ['silkworm'],
    dictionary: new WordListDictionary(['works', 'silk']),
    newId: () => `game-${++n}`,
  });
  const app = createApp({ games, log: pino({ level: 'silent' }) });
  server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  const addr = server.address();
  if (!addr || typeof addr === 'string') throw new Error('no port bound');
  base = `http://127.0.0.1:${addr.port}`;
});

afterEach(async () => {
  await new Promise<void>((resolve, reject) =>
    server.close((err) => (err ? reject(err) : resolve())),
  );
});

describe('POST /api/new', () => {
  it('starts a game', async () => {
    expect(await post('/api/new', {})).toEqual({
      status: 200,
      body: { gameId: 'game-1', rootWord: 'silkworm', words: [], score: 0 },
    });
  });

  it('rejects a malformed body', async () => {
    const res = await post('/api/new', { seed: 5 });
    expect(res.status).toBe(400);
  });
});

describe('POST /api/submit', () => {
  it('scores an accepted word', async () => {
    await post('/api/new', {});
    expect(await post('/api/submit', { gameId: 'game-1', word: 'Works' })).toEqual({
      status: 200,
      body: {
        status: 'accepted',
        word: 'works',
        points: 5,
        score: 5,
        words: ['works'],
      },
    });
  });

  it('reports why a word was rejected', async () => {
    await post('/api/new', {});
    const res = await post('/api/submit', { gameId: 'game-1', word: 'ow' });
    expect(res.body).toEqual({
      status: 'rejected',
      word: 'ow',
      reason: 'tooShort',
      title: 'Word is too short',
      message: 'Make a longer word!',
      score: 0,
    });
  });

  it('answers 404 for an unknown game', async () => {
    expect(await post('/api/submit', { gameId: 'nope', word: 'works' })).toEqual({
      status: 404,
      body: { error: 'Game not found' },
    });
  });

  it('answers 400 for a truncated JSON body', async () => {
    const res = await fetch(`${base}/api/submit`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"gameId":',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Bad request' });
  });

  it('answers 400 without a word', async () => {
    const res = await post('/api/submit', { gameId: 'game-1' });
    expect(res.status).toBe(400);
  });
});

describe('game state routes', () => {
  it('reads and restarts a game', async () => {
    await post('/api/new', {});
    await post('/api/submit', { gameId: 'game-1', word: 'silk' });

    const state = await fetch(`${base}/api/game/game-1`);
    expect(state.status).toBe(200);
    expect(await state.json()).toEqual({
      gameId: 'game-1',
      rootWord: 'silkworm',
      words: ['silk'],
      score: 4,
    });

    expect(await post('/api/game/game-1/restart', {})).toEqual({
      status: 200,
      body: { gameId: 'game-1', rootWord: 'silkworm', words: [], score: 0 },
    });
  });

  it('answers 404 for an unknown game id', async () => {
    const res = await fetch(`${base}/api/game/nope`);
    expect(res.status).toBe(404);
  });
});
