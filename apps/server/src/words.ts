// apps/server/src/words.ts
//
// Word sources for the server: the root-word list players get dealt and the
// English dictionary submissions are checked against.
//
// Root words come from a newline-delimited file. An unreadable file is fatal;
// an empty one falls back to a single configured word.
//
// The dictionary comes from DICTIONARY_FILE when set, otherwise from the
// `an-array-of-english-words` package. Root words are merged in so a dealt
// root is always recognized.

import fs from 'node:fs';
import { createRequire } from 'node:module';
import { z } from 'zod';
import {
  EmptyCandidateListError,
  WordListDictionary,
  parseWordList,
} from '@wordfinder/game-core';

const require = createRequire(import.meta.url);
const wordArray = z.array(z.string());

/**
 * loadRootWords reads the root-word file and keeps entries of at least
 * `minLength` letters.
 *
 * @throws when the file cannot be read
 * @throws EmptyCandidateListError when nothing usable is left and no
 *         fallback word is configured
 */
export function loadRootWords(
  path: string,
  fallback: string,
  minLength: number,
): string[] {
  const words = parseWordList(fs.readFileSync(path, 'utf8')).filter(
    (w) => w.length >= minLength,
  );
  if (words.length > 0) return words;

  const [fb] = parseWordList(fallback).filter((w) => w.length >= minLength);
  if (!fb) throw new EmptyCandidateListError(`No usable root words in ${path}`);
  return [fb];
}

/** loadDictionary builds the English dictionary oracle. */
export function loadDictionary(
  file: string | undefined,
  rootWords: readonly string[],
): WordListDictionary {
  const words = file
    ? parseWordList(fs.readFileSync(file, 'utf8'))
    : wordArray.parse(require('an-array-of-english-words'));
  const dictionary = new WordListDictionary(words);
  dictionary.add(rootWords);
  return dictionary;
}
