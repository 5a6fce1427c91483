import { detectDominantEra, parseFiscalYearToken, parseHeaderNumber } from './fiscal-year.js';
import { HEADER_RULES, matchField, type HeaderRule, type PatternRule } from './header-rules.js';
import { LEGACY_BLOCK, type ClassifiedColumn, type HeaderContext } from './types.js';

const isLegacyExpenditureHeader = (header: string): boolean =>
  header.includes('支出先上位') && header.includes('グループ');

/**
 * Per-table classification context. Computed once from the full header list
 * so every column of a table is read under the same generation and era.
 */
export const createHeaderContext = (headers: readonly string[]): HeaderContext => ({
  generation: headers.some(isLegacyExpenditureHeader) ? 'legacy' : 'current',
  dominantEra: detectDominantEra(headers),
});

const optionalNumber = (digits: string | undefined): number | null =>
  digits === undefined ? null : parseHeaderNumber(digits);

const applyPatternRule = (rule: PatternRule, header: string): ClassifiedColumn | null => {
  const match = rule.pattern.exec(header);
  if (match === null) return null;

  const groups = match.groups ?? {};
  const fieldKind = matchField(rule.fields, groups['field'] ?? header);
  if (fieldKind === null) return null;

  switch (rule.key) {
    case 'none':
      return { fieldKind, fiscalYear: null, block: null, sequence: null, sourceHeader: header };
    case 'sequence':
      return {
        fieldKind,
        fiscalYear: null,
        block: null,
        sequence: optionalNumber(groups['seq']),
        sourceHeader: header,
      };
    case 'blockSequence':
      return {
        fieldKind,
        fiscalYear: null,
        block: groups['block'] ?? LEGACY_BLOCK,
        sequence: optionalNumber(groups['seq']),
        sourceHeader: header,
      };
    case 'yearSequence':
      return {
        fieldKind,
        fiscalYear: optionalNumber(groups['year']),
        block: null,
        sequence: optionalNumber(groups['seq']),
        sourceHeader: header,
      };
  }
};

const applyRule = (
  rule: HeaderRule,
  header: string,
  context: HeaderContext
): ClassifiedColumn | null => {
  if (rule.key !== 'fiscalYear') {
    if (rule.generation !== undefined && rule.generation !== context.generation) return null;
    return applyPatternRule(rule, header);
  }

  const token = parseFiscalYearToken(header, context.dominantEra);
  if (token === null) return null;

  // The text after the year names the field; bare "2022年度当初予算"-style
  // headers with nothing after the token are matched as a whole
  const fieldKind = matchField(rule.fields, token.tail !== '' ? token.tail : header);
  if (fieldKind === null) return null;

  return {
    fieldKind,
    fiscalYear: token.fiscalYear,
    block: null,
    sequence: null,
    sourceHeader: header,
  };
};

/**
 * Classifies one normalized header. Returns null for columns no assembler
 * reads.
 *
 * @example
 * classifyHeader('支出先上位１０者リスト-A.支払先-3-支出額（百万円）', context)
 * // { fieldKind: 'expenditure.amount', block: 'A', sequence: 3, ... }
 */
export const classifyHeader = (
  header: string,
  context: HeaderContext,
  rules: readonly HeaderRule[] = HEADER_RULES
): ClassifiedColumn | null => {
  for (const rule of rules) {
    const classified = applyRule(rule, header, context);
    if (classified !== null) return classified;
  }
  return null;
};
