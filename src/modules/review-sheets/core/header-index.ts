import { classifyHeader, createHeaderContext } from './header-classifier.js';

import type { ClassifiedColumn, FieldKind, HeaderContext, RepeatKey } from './types.js';

export const SINGLETON_KEY: RepeatKey = { fiscalYear: null, block: null, sequence: null };

/**
 * Lookup from (field kind, repeat key) to the source header that holds it.
 */
export interface HeaderIndex {
  readonly context: HeaderContext;
  readonly columns: readonly ClassifiedColumn[];
  headerFor(kind: FieldKind, key?: RepeatKey): string | undefined;
  /** Distinct repeat keys used by any of the kinds, ordered year, block, sequence. */
  keysFor(kinds: readonly FieldKind[]): RepeatKey[];
}

const repeatKeyString = (key: RepeatKey): string =>
  `${String(key.fiscalYear ?? '')}|${key.block ?? ''}|${String(key.sequence ?? '')}`;

const keyString = (kind: FieldKind, key: RepeatKey): string => `${kind}|${repeatKeyString(key)}`;

const compareNullable = <T extends string | number>(a: T | null, b: T | null): number => {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a < b ? -1 : 1;
};

export const compareRepeatKeys = (a: RepeatKey, b: RepeatKey): number =>
  compareNullable(a.fiscalYear, b.fiscalYear) ||
  compareNullable(a.block, b.block) ||
  compareNullable(a.sequence, b.sequence);

export const buildHeaderIndex = (headers: readonly string[]): HeaderIndex => {
  const context = createHeaderContext(headers);
  const columns: ClassifiedColumn[] = [];
  const byKey = new Map<string, string>();

  for (const header of headers) {
    const column = classifyHeader(header, context);
    if (column === null) continue;

    const lookupKey = keyString(column.fieldKind, column);
    // Leftmost header wins
    if (byKey.has(lookupKey)) continue;

    byKey.set(lookupKey, header);
    columns.push(column);
  }

  return {
    context,
    columns,
    headerFor: (kind, key = SINGLETON_KEY) => byKey.get(keyString(kind, key)),
    keysFor: (kinds) => {
      const wanted = new Set<FieldKind>(kinds);
      const keys = new Map<string, RepeatKey>();
      for (const column of columns) {
        if (!wanted.has(column.fieldKind)) continue;
        const key: RepeatKey = {
          fiscalYear: column.fiscalYear,
          block: column.block,
          sequence: column.sequence,
        };
        keys.set(repeatKeyString(key), key);
      }
      return [...keys.values()].sort(compareRepeatKeys);
    },
  };
};
