/**
 * General-purpose orthographic cleanup for Japanese text.
 *
 * Folds full-width ASCII to half-width and half-width katakana to full-width,
 * collapses repeated long-vowel marks into one `ー` and drops whitespace that
 * sits between two Japanese characters. Dash variants are left alone; they are
 * handled after the long-vowel dictionary runs.
 */

const FULLWIDTH_ASCII_RE = /[\uFF01-\uFF5E]/g;
const HALFWIDTH_KATAKANA_RE = /[\uFF61-\uFF9F]+/g;
const LONG_VOWEL_RUN_RE = /ー{2,}/g;
const IDEOGRAPHIC_SPACE_RE = /\u3000/g;

// ー (U+30FC) belongs to the Common script, so it is listed explicitly
const JAPANESE_CHAR = '[\\p{sc=Han}\\p{sc=Hiragana}\\p{sc=Katakana}\\u30FC\\u3001\\u3002]';
const SPACE_BETWEEN_JAPANESE_RE = new RegExp(`(${JAPANESE_CHAR})\\s+(?=${JAPANESE_CHAR})`, 'gu');

/** Compatibility glyphs such as `㍿` only become Han after NFKC; run again after folding. */
export const removeSpacesBetweenJapanese = (text: string): string =>
  text.replace(SPACE_BETWEEN_JAPANESE_RE, '$1');

export const normalizeLexical = (text: string): string =>
  text
    .replace(FULLWIDTH_ASCII_RE, (char) => String.fromCharCode(char.charCodeAt(0) - 0xfee0))
    .replace(HALFWIDTH_KATAKANA_RE, (run) => run.normalize('NFKC'))
    .replace(IDEOGRAPHIC_SPACE_RE, ' ')
    .replace(LONG_VOWEL_RUN_RE, 'ー')
    .replace(SPACE_BETWEEN_JAPANESE_RE, '$1');
