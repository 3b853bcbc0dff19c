// apps/server/src/app.ts
//
// Express application for WordFinder. Kept separate from the boot code in
// index.ts so the registry and logger can be swapped.
//
// Routes:
//   POST /api/new                → start a game            (newGameReq → newGameRes)
//   GET  /api/game/:id           → current state           (gameStateRes)
//   POST /api/game/:id/restart   → deal a new root word    (gameStateRes)
//   POST /api/submit             → submit a word           (submitReq → submitRes)

import express, {
  type ErrorRequestHandler,
  type Express,
} from 'express';
import cors from 'cors';
import type { Logger } from 'pino';
import {
  gameStateRes,
  newGameReq,
  newGameRes,
  submitReq,
  submitRes,
} from '@wordfinder/protocol';
import type { GameRegistry } from './games.js';

export type AppDeps = {
  games: GameRegistry;
  log: Logger;
};

export function createApp({ games, log }: AppDeps): Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.post('/api/new', (req, res) => {
    const parsed = newGameReq.safeParse(req.body ?? {});
    if (!parsed.success) return res.status(400).json(parsed.error.format());

    const game = games.create(parsed.data.seed);
    log.info({ gameId: game.gameId, rootWord: game.rootWord }, 'game created');
    res.json(newGameRes.parse(game));
  });

  app.get('/api/game/:id', (req, res) => {
    const game = games.get(req.params.id);
    if (!game) return res.status(404).json({ error: 'Game not found' });
    res.json(gameStateRes.parse(game));
  });

  app.post('/api/game/:id/restart', (req, res) => {
    const game = games.restart(req.params.id);
    if (!game) return res.status(404).json({ error: 'Game not found' });
    log.info({ gameId: game.gameId, rootWord: game.rootWord }, 'game restarted');
    res.json(gameStateRes.parse(game));
  });

  app.post('/api/submit', (req, res) => {
    const parsed = submitReq.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.format());
    const { gameId, word } = parsed.data;

    const result = games.submit(gameId, word);
    if (!result) return res.status(404).json({ error: 'Game not found' });
    log.debug({ gameId, result }, 'word submitted');
    res.json(submitRes.parse(result));
  });

  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    const status = clientErrorStatus(err);
    if (status) {
      log.warn({ err, status }, 'bad request');
      return res.status(status).json({ error: 'Bad request' });
    }
    log.error({ err }, 'request failed');
    res.status(500).json({ error: 'Internal error' });
  };
  app.use(onError);

  return app;
}

// body-parser and friends tag their errors with a 4xx `status`.
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500
    ? status
    : null;
}
