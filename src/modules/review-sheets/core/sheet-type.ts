import type { SheetKind, SourceTable } from './types.js';

const REVIEW_INDICATORS = ['事業名', '府省', '事業の目的', '予算', '執行'] as const;
const SEGMENT_INDICATORS = ['セグメント', '達成目標', '測定指標'] as const;

const REVIEW_MIN_HITS = 3;
const SEGMENT_MIN_HITS = 2;

const countHits = (haystack: string, indicators: readonly string[]): number =>
  indicators.filter((indicator) => haystack.includes(indicator)).length;

/**
 * Decides whether a decoded sheet is a review sheet. The file name wins when
 * it names the sheet; otherwise the header vocabulary decides.
 */
export const detectSheetType = (table: SourceTable): SheetKind => {
  const lowerName = table.name.toLowerCase();
  if (table.name.includes('レビューシート') || lowerName.includes('review')) return 'review';
  if (table.name.includes('セグメント') || lowerName.includes('segment')) return 'segment';

  const headerText = table.headers.join(' ');
  if (countHits(headerText, REVIEW_INDICATORS) >= REVIEW_MIN_HITS) return 'review';
  if (countHits(headerText, SEGMENT_INDICATORS) >= SEGMENT_MIN_HITS) return 'segment';

  return 'unknown';
};
