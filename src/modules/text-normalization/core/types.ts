/**
 * Mapping from a hyphen-mistyped loanword to its long-vowel spelling,
 * e.g. `コミュニケ-ション` → `コミュニケーション`.
 */
export type LongVowelDictionary = ReadonlyMap<string, string>;

export interface TextNormalizer {
  /** Full cell pipeline. Total and idempotent. */
  normalizeText(text: string): string;
  /** Whitespace-only cleanup for column headers. */
  normalizeHeader(text: string): string;
}

export interface TextNormalizerOptions {
  longVowelDictionary?: LongVowelDictionary;
}
