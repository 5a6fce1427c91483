import { Decimal } from 'decimal.js';

import { SINGLETON_KEY, type HeaderIndex } from './header-index.js';

import type { FieldKind, RepeatKey, SourceRow } from './types.js';

/** Cell contents that stand for "no value" in the source sheets. */
export const PLACEHOLDER_TOKENS: ReadonlySet<string> = new Set(['-', '―', 'N/A', '#N/A', 'n/a']);

const AMOUNT_NOISE_RE = /[,，円¥￥$%％\s]/g;
const NEGATIVE_MARK_RE = /^[▲△]/;
const DECIMAL_RE = /^-?(?:\d+(?:\.\d*)?|\.\d+)$/;
const YEAR_RE = /(\d{4})/;

/** Trimmed text, or null when empty or a placeholder. */
export const meaningfulText = (value: string | null | undefined): string | null => {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  if (trimmed === '' || PLACEHOLDER_TOKENS.has(trimmed)) return null;
  return trimmed;
};

/**
 * Reads a monetary or count cell. `▲1,200` and `△1,200` are negative; text
 * that is not a plain decimal after cleanup yields null.
 */
export const parseAmount = (value: string | null | undefined): Decimal | null => {
  const text = meaningfulText(value);
  if (text === null) return null;

  const cleaned = text.replace(AMOUNT_NOISE_RE, '').replace(NEGATIVE_MARK_RE, '-');
  if (!DECIMAL_RE.test(cleaned)) return null;

  return new Decimal(cleaned);
};

export const isNonZero = (value: Decimal | null): value is Decimal =>
  value !== null && !value.isZero();

/** First four-digit run, e.g. `2013年度` → 2013. */
export const parseYear = (value: string | null | undefined): number | null => {
  const text = meaningfulText(value);
  if (text === null) return null;
  const match = YEAR_RE.exec(text);
  return match?.[1] !== undefined ? Number.parseInt(match[1], 10) : null;
};

/**
 * Typed accessors over one source row through the table's header index.
 */
export interface RowReader {
  text(kind: FieldKind, key?: RepeatKey): string | null;
  amount(kind: FieldKind, key?: RepeatKey): Decimal | null;
}

export const createRowReader = (index: HeaderIndex, row: SourceRow): RowReader => {
  const raw = (kind: FieldKind, key: RepeatKey): string | undefined => {
    const header = index.headerFor(kind, key);
    return header === undefined ? undefined : row[header];
  };

  return {
    text: (kind, key = SINGLETON_KEY) => meaningfulText(raw(kind, key)),
    amount: (kind, key = SINGLETON_KEY) => parseAmount(raw(kind, key)),
  };
};
