import type { LongVowelDictionary } from './types.js';

export interface LongVowelCorrection {
  readonly mistyped: string;
  readonly corrected: string;
  readonly pattern: RegExp;
}

/** Every character the dash unification step folds into `-`, plus `-` itself */
export const DASH_CHARACTERS = '-‐‑‒–—―−─━～〜';

const DASH_RE = new RegExp(`[${DASH_CHARACTERS}]`, 'u');
const DASH_CLASS = `[${DASH_CHARACTERS}]`;
const REGEX_SPECIAL_RE = /[.*+?^${}()|[\]\\]/g;

/**
 * Parses `correct<TAB>mistyped<TAB>comment` lines. Blank lines and lines
 * starting with `#` are ignored, as are rows whose mistyped form has no dash.
 */
export const parseLongVowelDictionary = (contents: string): LongVowelDictionary => {
  const dictionary = new Map<string, string>();

  for (const line of contents.replace(/^\uFEFF/, '').split(/\r?\n/)) {
    if (line.trim() === '' || line.startsWith('#')) continue;

    const [corrected, mistyped] = line.split('\t').map((cell) => cell.trim());
    if (corrected === undefined || mistyped === undefined) continue;
    if (corrected === '' || mistyped === '' || !DASH_RE.test(mistyped)) continue;

    dictionary.set(mistyped, corrected);
  }

  return dictionary;
};

const toPattern = (mistyped: string): RegExp => {
  let source = '';
  for (const char of mistyped) {
    source += DASH_RE.test(char) ? DASH_CLASS : char.replace(REGEX_SPECIAL_RE, '\\$&');
  }
  return new RegExp(source, 'gu');
};

/**
 * Orders entries longest key first so `コミュニケ-ションズ` wins over
 * `コミュニケ-ション` when both are listed.
 */
export const compileLongVowelCorrections = (
  dictionary: LongVowelDictionary
): readonly LongVowelCorrection[] =>
  [...dictionary.entries()]
    .sort(([a], [b]) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0))
    .map(([mistyped, corrected]) => ({ mistyped, corrected, pattern: toPattern(mistyped) }));

export const applyLongVowelCorrections = (
  text: string,
  corrections: readonly LongVowelCorrection[]
): string => {
  if (corrections.length === 0 || !DASH_RE.test(text)) return text;

  let result = text;
  for (const correction of corrections) {
    result = result.replace(correction.pattern, () => correction.corrected);
  }
  return result;
};
