import { describe, expect, it } from 'vitest';

import {
  assembleBudgetCategory,
  assembleBudgetSummary,
  assembleExpenditure,
  assembleExpenseUsage,
  assembleInspectionEvaluation,
  assembleMultiYearContract,
  assembleOrganization,
  assemblePolicyLaw,
  assembleProjectOverview,
  assembleRelatedProjects,
  assembleRemarks,
  assembleSubsidyRate,
} from '@/modules/review-sheets/core/assemblers/index.js';

import { makeAssemblerInput, makeSourceTable } from '../../fixtures/builders.js';

const input = (headers: readonly string[], rows: readonly (readonly string[])[]) =>
  makeAssemblerInput(makeSourceTable('sheet.csv', headers, rows));

describe('assembleOrganization', () => {
  it('emits one record per row, even when the row is empty', () => {
    const records = assembleOrganization(
      input(
        ['事業名', '作成責任者', '担当部局庁', '担当課室'],
        [
          ['A事業', '課長 山田', '研究振興局', '基礎研究課'],
          ['B事業', '', '', ''],
        ]
      )
    );

    expect(records).toHaveLength(2);
    expect(records[0]).toMatchObject({
      responsibleOfficerNo: 1,
      otherBureau: '研究振興局',
      otherDivision: '基礎研究課',
      responsibleOfficer: '課長 山田',
    });
    expect(records[1]).toMatchObject({
      otherBureau: null,
      otherDivision: null,
      responsibleOfficer: null,
    });
    expect(records.map((record) => record.prefix.entityId)).toEqual([1, 2]);
  });
});

describe('assembleProjectOverview', () => {
  it('collects overview fields and joins legacy project numbers', () => {
    const [record] = assembleProjectOverview(
      input(
        [
          '事業の目的',
          '現状・課題',
          '事業の概要',
          '事業概要URL',
          '事業番号-1',
          '事業番号-2',
          '事業開始年度',
          '開始年度不明',
          '事業終了(予定)年度',
          '終了予定なし',
        ],
        [['研究支援', '人材不足', '助成', 'https://example.go.jp/p', '0012', '03', '2013年度', '', '2025年度', '']]
      )
    );

    expect(record).toMatchObject({
      purpose: '研究支援',
      currentIssues: '人材不足',
      summary: '助成',
      summaryUrl: 'https://example.go.jp/p',
      legacyProjectNumber: '0012-03',
      startYear: 2013,
      startYearUnknown: null,
      endYear: 2025,
      noPlannedEnd: null,
    });
  });
});

describe('assemblePolicyLaw', () => {
  const headers = [
    '政策',
    '施策',
    '政策体系・評価書URL',
    '根拠法令（具体的な条項も記載）',
    '関係する計画、通知等',
  ];

  it('emits policy, law and plan sections', () => {
    const records = assemblePolicyLaw(
      input(headers, [
        [
          '科学技術の振興',
          '基礎研究の推進',
          'https://example.go.jp/policy',
          '地方自治法(1947年法律第67号)第2条',
          '第5期基本計画 https://example.go.jp/plan',
        ],
      ])
    );

    expect(records.map((record) => record.detail)).toEqual([
      {
        section: 'policy',
        number: 1,
        policyMinistry: '文部科学省',
        policy: '科学技術の振興',
        measure: '基礎研究の推進',
        url: 'https://example.go.jp/policy',
      },
      {
        section: 'law',
        number: 1,
        name: '地方自治法',
        lawNumber: '1947年法律第67号',
        article: '2',
        paragraph: null,
        item: null,
      },
      { section: 'plan', number: 1, name: '第5期基本計画', url: 'https://example.go.jp/plan' },
    ]);
  });

  it('emits nothing for an empty row', () => {
    expect(assemblePolicyLaw(input(headers, [['', '', '', '', '']]))).toEqual([]);
  });

  it('skips the policy section when only the measure is filled in', () => {
    const records = assemblePolicyLaw(
      input(headers, [['-', '基礎研究の推進', 'https://example.go.jp/policy', '', '']])
    );

    expect(records).toEqual([]);
  });
});

describe('assembleSubsidyRate', () => {
  it('parses subsidy terms and skips placeholders', () => {
    const records = assembleSubsidyRate(input(['補助率等'], [['補助対象:大学 補助率:2/3'], ['-']]));

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      number: 1,
      target: '大学',
      rate: '2/3',
      ceiling: null,
      url: null,
    });
  });
});

describe('assembleRelatedProjects', () => {
  it('emits one record per filled slot in year then sequence order', () => {
    const records = assembleRelatedProjects(
      input(
        [
          '関連する過去のレビューシートの事業番号-2021年度-02',
          '関連する過去のレビューシートの事業番号-2021年度-01',
          '関連する過去のレビューシートの事業番号-2022年度-01',
        ],
        [['0100', '', '0200']]
      )
    );

    expect(
      records.map(({ number, referenceYear, relatedProjectId, relation }) => ({
        number,
        referenceYear,
        relatedProjectId,
        relation,
      }))
    ).toEqual([
      { number: 2, referenceYear: 2021, relatedProjectId: '0100', relation: '2021年度過去事業' },
      { number: 1, referenceYear: 2022, relatedProjectId: '0200', relation: '2022年度過去事業' },
    ]);
  });
});

describe('assembleBudgetSummary', () => {
  const headers = [
    '会計区分',
    '予算額・執行額-2022年度-当初予算',
    '予算額・執行額-2022年度-執行額',
    '予算額・執行額-2023年度-当初予算',
    '予算額・執行額-2023年度-補正予算',
  ];

  it('emits one record per year with a non-zero figure', () => {
    const records = assembleBudgetSummary(input(headers, [['一般会計', '1,200', '1,100', '0', '-']]));

    expect(records).toHaveLength(1);
    const [record] = records;
    expect(record?.budgetYear).toBe(2022);
    expect(record?.accountCategory).toBe('一般会計');
    expect(record?.initial?.toString()).toBe('1200');
    expect(record?.executed?.toString()).toBe('1100');
    expect(record?.supplementary).toBeNull();
  });

  it('emits nothing when every figure is blank or zero', () => {
    expect(assembleBudgetSummary(input(headers, [['一般会計', '', '0', '-', '']]))).toEqual([]);
  });
});

describe('assembleBudgetCategory', () => {
  it('emits filled budget lines numbered from 1', () => {
    const records = assembleBudgetCategory(
      input(
        [
          '会計区分',
          '予算内訳-歳出予算項・目-歳出予算項（項）-01',
          '予算内訳-歳出予算項・目-歳出予算項（目）-01',
          '予算内訳-2023年度当初予算-01',
          '予算内訳-2024年度要求-01',
          '予算内訳-歳出予算項・目-歳出予算項（項）-02',
          '予算内訳-2023年度当初予算-02',
        ],
        [['一般会計', '科学技術振興費', '研究助成金', '500', '520', '', '0']]
      )
    );

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      number: 1,
      accountCategory: '一般会計',
      item: '科学技術振興費',
      subItem: '研究助成金',
    });
    expect(records[0]?.initialBudget?.toString()).toBe('500');
    expect(records[0]?.request?.toString()).toBe('520');
  });
});

describe('assembleInspectionEvaluation', () => {
  it('emits a record only for rows with findings', () => {
    const records = assembleInspectionEvaluation(
      input(
        [
          '事業所管部局による点検・改善-点検結果',
          '行政事業レビュー推進チームの所見に至る過程及び所見-判定',
          '外部有識者の所見--',
        ],
        [
          ['妥当', '現状通り', '特になし'],
          ['', '', ''],
        ]
      )
    );

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      selfCheckResult: '妥当',
      teamJudgement: '現状通り',
      externalFindings: '特になし',
      improvementDirection: null,
    });
  });
});

describe('assembleExpenditure', () => {
  it('emits filled slots and skips placeholders', () => {
    const records = assembleExpenditure(
      input(
        [
          '支出先上位１０者リスト-A.支払先-1-支出先',
          '支出先上位１０者リスト-A.支払先-1-法人番号',
          '支出先上位１０者リスト-A.支払先-1-支出額（百万円）',
          '支出先上位１０者リスト-A.支払先-2-支出先',
          '支出先上位１０者リスト-A.支払先-10-支出先',
          '支出先上位１０者リスト-A.支払先-10-支出額（百万円）',
        ],
        [['株式会社テスト', '1234567890123', '120', '-', '一般社団法人サンプル', '30']]
      )
    );

    expect(records.map((record) => [record.block, record.sequence, record.recipientName])).toEqual([
      ['A', 1, '株式会社テスト'],
      ['A', 10, '一般社団法人サンプル'],
    ]);
    expect(records[0]?.corporateNumber).toBe('1234567890123');
    expect(records[0]?.amount?.toString()).toBe('120');
    expect(records[1]?.amount?.toString()).toBe('30');
  });

  it('reads legacy group columns', () => {
    const records = assembleExpenditure(
      input(
        [
          '支出先上位１０者リスト-グループ-支出先-1',
          '支出先上位１０者リスト-グループ-支出額-1',
          '支出先上位１０者リスト-グループ-支出先-2',
        ],
        [['A社', '15', 'N/A']]
      )
    );

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ block: 'GROUP', sequence: 1, recipientName: 'A社' });
    expect(records[0]?.amount?.toString()).toBe('15');
  });
});

describe('assembleExpenseUsage', () => {
  it('emits slots with an item, usage or non-zero amount', () => {
    const records = assembleExpenseUsage(
      input(
        [
          '費目・使途-A.支払先-費目-1',
          '費目・使途-A.支払先-使途-1',
          '費目・使途-A.支払先-金額（百万円）-1',
          '費目・使途-B.支払先-費目-1',
          '費目・使途-B.支払先-金額（百万円）-1',
        ],
        [['人件費', '研究員雇用', '12.5', '', '0']]
      )
    );

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ number: 1, block: 'A', item: '人件費', usage: '研究員雇用' });
    expect(records[0]?.amount?.toString()).toBe('12.5');
  });
});

describe('assembleMultiYearContract', () => {
  it('emits contracts with a contractor', () => {
    const records = assembleMultiYearContract(
      input(
        [
          '国庫債務負担行為等による契約先上位10者リスト-1-契約先',
          '国庫債務負担行為等による契約先上位10者リスト-1-契約額（百万円）',
          '国庫債務負担行為等による契約先上位10者リスト-2-契約先',
        ],
        [['C社', '800', '-']]
      )
    );

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ number: 1, contractor: 'C社' });
    expect(records[0]?.amount?.toString()).toBe('800');
  });
});

describe('assembleRemarks', () => {
  it('combines remarks and other findings', () => {
    const records = assembleRemarks(
      input(
        ['備考', 'その他の指摘事項'],
        [
          ['予算は概算', '特になし'],
          ['', ''],
          ['メモ', ''],
        ]
      )
    );

    expect(records.map((record) => [record.prefix.entityId, record.remarks])).toEqual([
      [1, '予算は概算\n\n【その他の指摘事項】\n特になし'],
      [3, 'メモ'],
    ]);
  });
});
