import type { DominantEra } from './types.js';

const DIGITS = '[0-9０-９]';
const FISCAL_YEAR_TOKEN_RE = new RegExp(
  `(${DIGITS}{4})年度|令和(${DIGITS}{1,2}|元)年度|平成(${DIGITS}{1,2}|元)年度|-(${DIGITS}{1,2})年度-`
);

const REIWA_OFFSET = 2018;
const HEISEI_OFFSET = 1988;
/** Two-digit tokens at or above this can only be Heisei years */
const HEISEI_ONLY_FROM = 20;

export interface FiscalYearToken {
  readonly fiscalYear: number;
  /** Header text after the token, with leading separators removed */
  readonly tail: string;
}

/** Parses ASCII or full-width digits; `元` is year 1. */
export const parseHeaderNumber = (digits: string): number =>
  digits === '元'
    ? 1
    : Number.parseInt(
        digits.replace(/[０-９]/g, (d) => String(d.charCodeAt(0) - 0xff10)),
        10
      );

/**
 * Resolves a bare `-NN年度-` token. Tokens from 20 up are Heisei; lower ones
 * follow the era that dominates the table's headers.
 */
export const resolveBareYear = (value: number, dominantEra: DominantEra): number => {
  if (value >= HEISEI_ONLY_FROM) return HEISEI_OFFSET + value;
  return dominantEra === 'reiwa' ? REIWA_OFFSET + value : HEISEI_OFFSET + value;
};

export const parseFiscalYearToken = (
  header: string,
  dominantEra: DominantEra
): FiscalYearToken | null => {
  const match = FISCAL_YEAR_TOKEN_RE.exec(header);
  if (match === null) return null;

  const [token, gregorian, reiwa, heisei, bare] = match;
  let fiscalYear: number;
  if (gregorian !== undefined) {
    fiscalYear = parseHeaderNumber(gregorian);
  } else if (reiwa !== undefined) {
    fiscalYear = REIWA_OFFSET + parseHeaderNumber(reiwa);
  } else if (heisei !== undefined) {
    fiscalYear = HEISEI_OFFSET + parseHeaderNumber(heisei);
  } else if (bare !== undefined) {
    fiscalYear = resolveBareYear(parseHeaderNumber(bare), dominantEra);
  } else {
    return null;
  }

  const tail = header
    .slice(match.index + token.length)
    .replace(/^[-・\s)）]+/, '')
    .trim();

  return { fiscalYear, tail };
};

/**
 * Reiwa dominates when at least as many headers mention 令和 as 平成 and at
 * least one does. Tables with neither default to Heisei.
 */
export const detectDominantEra = (headers: readonly string[]): DominantEra => {
  let reiwa = 0;
  let heisei = 0;
  for (const header of headers) {
    if (header.includes('令和')) reiwa += 1;
    if (header.includes('平成')) heisei += 1;
  }
  return reiwa > 0 && reiwa >= heisei ? 'reiwa' : 'heisei';
};
