/**
 * Text Normalization Module
 *
 * Canonicalizes review-sheet cell values before header classification and
 * table assembly: circled numbers, width folding, NFKC, era years, hyphen
 * typos in loanwords, dash variants and whitespace.
 */

// Core
export type { LongVowelDictionary, TextNormalizer, TextNormalizerOptions } from './core/types.js';
export { createDictionaryLoadError, type DictionaryLoadError } from './core/errors.js';
export { replaceCircledNumbers } from './core/circled-numbers.js';
export { normalizeLexical } from './core/lexical-normalizer.js';
export {
  convertEraYears,
  extractYearFromName,
  toGregorianYear,
  ERA_FIRST_YEARS,
  type EraName,
} from './core/era.js';
export {
  parseLongVowelDictionary,
  compileLongVowelCorrections,
  applyLongVowelCorrections,
  type LongVowelCorrection,
} from './core/long-vowel.js';
export {
  createTextNormalizer,
  normalizeHeader,
  unifyDashes,
  removeTrailingLongVowels,
  collapseWhitespace,
} from './core/normalize.js';

// Shell
export { loadLongVowelDictionary } from './shell/dictionary-loader.js';
