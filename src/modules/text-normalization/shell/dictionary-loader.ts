import fs from 'node:fs/promises';

import { err, ok, type Result } from 'neverthrow';

import { describeCause } from '../../../common/types/errors.js';
import { createDictionaryLoadError, type DictionaryLoadError } from '../core/errors.js';
import { parseLongVowelDictionary } from '../core/long-vowel.js';

import type { LongVowelDictionary } from '../core/types.js';

export const loadLongVowelDictionary = async (
  filePath: string
): Promise<Result<LongVowelDictionary, DictionaryLoadError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    return err(
      createDictionaryLoadError(
        filePath,
        `Failed to read long-vowel dictionary at ${filePath}: ${describeCause(error)}`,
        error
      )
    );
  }

  return ok(parseLongVowelDictionary(contents));
};
