import { describe, expect, it } from 'vitest';

import {
  classifyHeader,
  createHeaderContext,
} from '@/modules/review-sheets/core/header-classifier.js';
import { buildHeaderIndex } from '@/modules/review-sheets/core/header-index.js';

import type { HeaderContext } from '@/modules/review-sheets/core/types.js';

const current: HeaderContext = { generation: 'current', dominantEra: 'reiwa' };
const legacy: HeaderContext = { generation: 'legacy', dominantEra: 'heisei' };

describe('createHeaderContext', () => {
  it('detects the legacy expenditure convention', () => {
    expect(createHeaderContext(['事業名', '支出先上位１０者リスト-グループ-支出先-1'])).toEqual({
      generation: 'legacy',
      dominantEra: 'heisei',
    });
  });

  it('defaults to the current convention', () => {
    expect(createHeaderContext(['事業名', '令和5年度当初予算'])).toEqual({
      generation: 'current',
      dominantEra: 'reiwa',
    });
  });
});

describe('classifyHeader', () => {
  it('classifies a current expenditure column', () => {
    expect(
      classifyHeader('支出先上位１０者リスト-A.支払先-3-支出額（百万円）', current)
    ).toEqual({
      fieldKind: 'expenditure.amount',
      fiscalYear: null,
      block: 'A',
      sequence: 3,
      sourceHeader: '支出先上位１０者リスト-A.支払先-3-支出額（百万円）',
    });
  });

  it('classifies a legacy expenditure column into the GROUP block', () => {
    expect(classifyHeader('支出先上位１０者リスト-グループ-支出先-5', legacy)).toMatchObject({
      fieldKind: 'expenditure.recipientName',
      block: 'GROUP',
      sequence: 5,
    });
  });

  it('never reads legacy expenditure headers under the current convention', () => {
    expect(classifyHeader('支出先上位１０者リスト-グループ-支出先-5', current)).toBeNull();
  });

  it('classifies budget columns by the text after the year', () => {
    expect(classifyHeader('予算額・執行額-2022年度-当初予算', current)).toMatchObject({
      fieldKind: 'budget.initial',
      fiscalYear: 2022,
    });
    expect(classifyHeader('予算額・執行額-2022年度-執行額', current)?.fieldKind).toBe(
      'budget.executed'
    );
    expect(classifyHeader('予算額・執行額-2022年度-執行率', current)?.fieldKind).toBe(
      'budget.executionRate'
    );
    expect(classifyHeader('予算額・執行額-2022年度-計', current)?.fieldKind).toBe('budget.total');
  });

  it('resolves bare budget years through the context', () => {
    expect(classifyHeader('-05年度-当初予算', current)?.fiscalYear).toBe(2023);
    expect(classifyHeader('-05年度-当初予算', legacy)?.fiscalYear).toBe(1993);
  });

  it('keeps budget-category year columns out of the budget summary', () => {
    expect(classifyHeader('予算内訳-2024年度要求-03', current)).toMatchObject({
      fieldKind: 'category.request',
      fiscalYear: null,
      sequence: 3,
    });
    expect(
      classifyHeader('予算内訳-歳出予算項・目-歳出予算項（項）-01', current)
    ).toMatchObject({ fieldKind: 'category.item', sequence: 1 });
  });

  it('classifies related project numbers by year and sequence', () => {
    expect(
      classifyHeader('関連する過去のレビューシートの事業番号-2021年度-02', current)
    ).toMatchObject({ fieldKind: 'related.projectNumber', fiscalYear: 2021, sequence: 2 });
  });

  it('classifies contract and expense-usage columns', () => {
    expect(
      classifyHeader('国庫債務負担行為等による契約先上位10者リスト-2-契約先', current)
    ).toMatchObject({ fieldKind: 'contract.contractor', sequence: 2 });
    expect(classifyHeader('費目・使途-B.支払先-金額（百万円）-4', current)).toMatchObject({
      fieldKind: 'expenseUsage.amount',
      block: 'B',
      sequence: 4,
    });
  });

  it.each([
    ['事業番号-3', 'overview.legacyNumber'],
    ['課', 'common.division'],
    ['現状・課題', 'overview.currentIssues'],
    ['事業開始年度', 'overview.startYear'],
    ['開始年度不明', 'overview.startYearUnknown'],
    ['事業終了(予定)年度', 'overview.endYear'],
    ['終了予定なし', 'overview.noPlannedEnd'],
    ['府省庁', 'common.ministry'],
    ['外部有識者の所見--', 'inspection.externalFindings'],
    ['その他の指摘事項', 'remarks.otherFindings'],
    ['備考', 'remarks.remarks'],
    ['会計区分', 'common.accountCategory'],
    ['事業概要URL', 'overview.summaryUrl'],
    ['事業の概要', 'overview.summary'],
    ['補助率等', 'overview.subsidyText'],
  ])('classifies %s as %s', (header, kind) => {
    expect(classifyHeader(header, current)?.fieldKind).toBe(kind);
  });

  it('returns null for columns nothing reads', () => {
    expect(classifyHeader('府省庁の建制順', current)).toBeNull();
    expect(classifyHeader('担当者連絡先', current)).toBeNull();
  });
});

describe('buildHeaderIndex', () => {
  it('keeps the leftmost header for a field', () => {
    const index = buildHeaderIndex(['府省庁', '所管府省庁']);

    expect(index.headerFor('common.ministry')).toBe('府省庁');
    expect(index.columns).toHaveLength(1);
  });

  it('orders repeat keys by block, then sequence numerically', () => {
    const index = buildHeaderIndex([
      '支出先上位１０者リスト-A.支払先-10-支出先',
      '支出先上位１０者リスト-B.支払先-1-支出先',
      '支出先上位１０者リスト-A.支払先-2-支出先',
    ]);

    expect(
      index.keysFor(['expenditure.recipientName']).map((key) => `${String(key.block)}${String(key.sequence)}`)
    ).toEqual(['A2', 'A10', 'B1']);
  });

  it('returns undefined for fields the table lacks', () => {
    expect(buildHeaderIndex(['事業名']).headerFor('common.ministry')).toBeUndefined();
  });
});
