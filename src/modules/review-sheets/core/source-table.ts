import type { SourceRow, SourceTable } from './types.js';
import type { TextNormalizer } from '../../text-normalization/index.js';

/**
 * Makes header names unique by suffixing later duplicates with `.1`, `.2`, …
 */
export const dedupeHeaders = (headers: readonly string[]): string[] => {
  const seen = new Map<string, number>();
  const taken = new Set(headers);
  const result: string[] = [];

  for (const header of headers) {
    const count = seen.get(header);
    if (count === undefined) {
      seen.set(header, 0);
      result.push(header);
      continue;
    }

    let suffix = count + 1;
    while (taken.has(`${header}.${String(suffix)}`)) suffix += 1;
    const renamed = `${header}.${String(suffix)}`;
    seen.set(header, suffix);
    taken.add(renamed);
    result.push(renamed);
  }

  return result;
};

/**
 * Normalizes headers and every cell. Headers that collide after
 * normalization are disambiguated again.
 */
export const normalizeSourceTable = (table: SourceTable, normalizer: TextNormalizer): SourceTable => {
  const headers = dedupeHeaders(table.headers.map((header) => normalizer.normalizeHeader(header)));

  const rows = table.rows.map((row): SourceRow => {
    const normalized: Record<string, string> = {};
    table.headers.forEach((original, position) => {
      const header = headers[position];
      if (header === undefined) return;
      normalized[header] = normalizer.normalizeText(row[original] ?? '');
    });
    return normalized;
  });

  return { name: table.name, headers, rows };
};
