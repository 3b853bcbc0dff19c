// apps/server/src/config.ts
//
// Environment-driven configuration for the server, validated with Zod.
// `dotenv/config` is imported by the entry point before this is read, so a
// local .env file works the same as real environment variables.
//
//   PORT                HTTP port (default 3001)
//   LOG_LEVEL           pino level (default "info")
//   ROOT_WORDS_FILE     newline-delimited root words (default data/start.txt)
//   DICTIONARY_FILE     newline-delimited dictionary; when unset the
//                       an-array-of-english-words package is used
//   FALLBACK_ROOT_WORD  used when the root-word file has no usable entries;
//                       set it to "" to make that a startup error instead
//   MIN_ROOT_LENGTH     shortest root word the server will deal

import { fileURLToPath } from 'node:url';
import pino, { type Logger } from 'pino';
import { z } from 'zod';
import { MIN_ROOT_LENGTH } from '@wordfinder/game-core';

const DEFAULT_ROOT_WORDS_FILE = fileURLToPath(
  new URL('../data/start.txt', import.meta.url),
);

export const configSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  ROOT_WORDS_FILE: z.string().min(1).default(DEFAULT_ROOT_WORDS_FILE),
  DICTIONARY_FILE: z.string().min(1).optional(),
  FALLBACK_ROOT_WORD: z.string().default('silkworm'),
  MIN_ROOT_LENGTH: z.coerce.number().int().min(1).default(MIN_ROOT_LENGTH),
});

export type Config = z.infer<typeof configSchema>;

/** Parse configuration from `env`; throws a ZodError listing every bad key. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse(env);
}

/**
 * loadConfigOrExit is the boot-time variant: a bad environment is logged
 * as fatal and ends the process.
 */
export function loadConfigOrExit(
  env: NodeJS.ProcessEnv = process.env,
  log: Logger = pino(),
): Config {
  try {
    return loadConfig(env);
  } catch (err) {
    log.fatal({ err }, 'invalid configuration');
    return process.exit(1);
  }
}
