import { replaceCircledNumbers } from './circled-numbers.js';
import { convertEraYears } from './era.js';
import { normalizeLexical, removeSpacesBetweenJapanese } from './lexical-normalizer.js';
import {
  applyLongVowelCorrections,
  compileLongVowelCorrections,
  DASH_CHARACTERS,
  type LongVowelCorrection,
} from './long-vowel.js';

import type { TextNormalizer, TextNormalizerOptions } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Steps
// ─────────────────────────────────────────────────────────────────────────────

const DASH_VARIANTS_RE = new RegExp(`[${DASH_CHARACTERS.replace('-', '')}]`, 'gu');
const TRAILING_LONG_VOWEL_RE = /([ァ-ヴ])ー(?=[^ァ-ヴー]|$)/g;
const WHITESPACE_RUN_RE = /\s+/g;
const MAX_PASSES = 16;
const HEADER_CONTROL_RE = /[\r\n\t]/g;

export const unifyDashes = (text: string): string => text.replace(DASH_VARIANTS_RE, '-');

export const removeTrailingLongVowels = (text: string): string =>
  text.replace(TRAILING_LONG_VOWEL_RE, '$1');

export const collapseWhitespace = (text: string): string =>
  text.replace(WHITESPACE_RUN_RE, ' ').trim();

/**
 * Column headers keep their punctuation; classification patterns depend on it.
 */
export const normalizeHeader = (text: string): string =>
  collapseWhitespace(text.replace(HEADER_CONTROL_RE, ' '));

const runPipeline = (text: string, corrections: readonly LongVowelCorrection[]): string => {
  let result = replaceCircledNumbers(text);
  result = normalizeLexical(result);
  result = removeSpacesBetweenJapanese(result.normalize('NFKC'));
  result = convertEraYears(result);
  // Must see the original dash before it is unified
  result = applyLongVowelCorrections(result, corrections);
  result = unifyDashes(result);
  result = removeTrailingLongVowels(result);
  return collapseWhitespace(result);
};

/**
 * Repeats the pipeline until the text stops changing. Trailing long-vowel
 * removal can leave `エネルギ-`, which the dictionary matches on the next pass.
 */
const normalizeToFixedPoint = (
  text: string,
  corrections: readonly LongVowelCorrection[]
): string => {
  let current = runPipeline(text, corrections);
  for (let pass = 1; pass < MAX_PASSES; pass++) {
    const next = runPipeline(current, corrections);
    if (next === current) break;
    current = next;
  }
  return current;
};

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

export const createTextNormalizer = (options: TextNormalizerOptions = {}): TextNormalizer => {
  const corrections = compileLongVowelCorrections(options.longVowelDictionary ?? new Map());

  return {
    normalizeText: (text) => (text.trim() === '' ? '' : normalizeToFixedPoint(text, corrections)),
    normalizeHeader,
  };
};
