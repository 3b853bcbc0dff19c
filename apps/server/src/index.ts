// apps/server/src/index.ts
//
// Boot code for the WordFinder server.
//
//   1. Load .env and validate configuration.
//   2. Read the root-word list and build the dictionary.
//   3. Create the in-memory game registry and start Express.
//
// A missing or unusable root-word list stops the process here; there is no
// game to serve without one.

import 'dotenv/config';
import pino from 'pino';

import { createApp } from './app.js';
import { loadConfigOrExit } from './config.js';
import { GameRegistry } from './games.js';
import { loadDictionary, loadRootWords } from './words.js';

const config = loadConfigOrExit();
const log = pino({ level: config.LOG_LEVEL });

let games: GameRegistry;
try {
  const rootWords = loadRootWords(
    config.ROOT_WORDS_FILE,
    config.FALLBACK_ROOT_WORD,
    config.MIN_ROOT_LENGTH,
  );
  const dictionary = loadDictionary(config.DICTIONARY_FILE, rootWords);
  log.info(
    { rootWords: rootWords.length, dictionary: dictionary.size },
    'word lists loaded',
  );
  games = new GameRegistry({
    rootWords,
    dictionary,
    minRootLength: config.MIN_ROOT_LENGTH,
  });
} catch (err) {
  log.fatal({ err }, 'could not load word lists');
  process.exit(1);
}

const app = createApp({ games, log });
app.listen(config.PORT, () => log.info({ port: config.PORT }, 'server up'));
