import { TABLE_KINDS } from './types.js';

import type {
  CommonPrefix,
  PolicyLawRecord,
  ReviewSheetTables,
  TableKind,
  TableRecordMap,
} from './types.js';
import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type CellValue = string | number | Decimal | null;

export interface ColumnDefinition<R> {
  readonly name: string;
  readonly value: (record: R) => CellValue;
}

export interface TableDefinition<K extends TableKind> {
  readonly kind: K;
  /** RS file number, e.g. `5-1` */
  readonly fileNumber: string;
  readonly title: string;
  readonly columns: readonly ColumnDefinition<TableRecordMap[K]>[];
}

/** A table ready for a sink: file name, header row and cells. */
export interface RenderedTable {
  readonly kind: TableKind;
  readonly fileName: string;
  readonly columns: readonly string[];
  readonly rows: readonly (readonly CellValue[])[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Columns
// ─────────────────────────────────────────────────────────────────────────────

interface PrefixLabels {
  readonly ministryOrder: string;
  readonly policyMinistry: string;
}

const DEFAULT_PREFIX_LABELS: PrefixLabels = {
  ministryOrder: '府省庁の建制順',
  policyMinistry: '政策所管府省庁',
};

const prefixColumns = (
  labels: PrefixLabels = DEFAULT_PREFIX_LABELS
): ColumnDefinition<{ readonly prefix: CommonPrefix }>[] => [
  { name: 'シート種別', value: (r) => r.prefix.sheetKind },
  { name: '事業年度', value: (r) => r.prefix.fiscalYear },
  { name: '予算事業ID', value: (r) => r.prefix.entityId },
  { name: '事業名', value: (r) => r.prefix.projectName },
  { name: labels.ministryOrder, value: (r) => r.prefix.ministryOrder },
  { name: labels.policyMinistry, value: (r) => r.prefix.policyMinistry },
  { name: '府省庁', value: (r) => r.prefix.ministry },
  { name: '局・庁', value: (r) => r.prefix.bureau },
  { name: '部', value: (r) => r.prefix.department },
  { name: '課', value: (r) => r.prefix.division },
  { name: '室', value: (r) => r.prefix.office },
  { name: '班', value: (r) => r.prefix.team },
  { name: '係', value: (r) => r.prefix.unit },
];

/** Columns of the RS layout that review sheets never fill. */
const emptyColumns = (...names: string[]): ColumnDefinition<unknown>[] =>
  names.map((name) => ({ name, value: () => null }));

const numberedNotes = (count: number): ColumnDefinition<unknown>[] =>
  emptyColumns(...Array.from({ length: count }, (_, i) => `備考${String(i + 1)}`));

const sectionNumber = (record: PolicyLawRecord, section: PolicyLawRecord['detail']['section']) =>
  record.detail.section === section ? record.detail.number : null;

// ─────────────────────────────────────────────────────────────────────────────
// Table definitions
// ─────────────────────────────────────────────────────────────────────────────

export const TABLE_DEFINITIONS: { readonly [K in TableKind]: TableDefinition<K> } = {
  organization: {
    kind: 'organization',
    fileNumber: '1-1',
    title: '基本情報_組織情報',
    columns: [
      ...prefixColumns({ ministryOrder: '建制順', policyMinistry: '所管府省庁' }),
      { name: 'その他担当組織_作成責任者_no', value: (r) => r.responsibleOfficerNo },
      ...emptyColumns('府省庁（その他担当組織）'),
      { name: '局・庁（その他担当組織）', value: (r) => r.otherBureau },
      ...emptyColumns('部（その他担当組織）'),
      { name: '課（その他担当組織）', value: (r) => r.otherDivision },
      ...emptyColumns('室（その他担当組織）', '班（その他担当組織）', '係（その他担当組織）'),
      { name: '作成責任者', value: (r) => r.responsibleOfficer },
    ],
  },
  projectOverview: {
    kind: 'projectOverview',
    fileNumber: '1-2',
    title: '基本情報_事業概要',
    columns: [
      ...prefixColumns(),
      { name: '事業の目的', value: (r) => r.purpose },
      { name: '現状・課題', value: (r) => r.currentIssues },
      { name: '事業の概要', value: (r) => r.summary },
      { name: '事業概要URL', value: (r) => r.summaryUrl },
      { name: '事業区分', value: (r) => r.category },
      { name: '主要経費', value: (r) => r.majorExpense },
      { name: '実施方法', value: (r) => r.implementationMethod },
      { name: '補助率等', value: (r) => r.subsidyText },
      { name: '旧事業番号', value: (r) => r.legacyProjectNumber },
      { name: '事業開始年度', value: (r) => r.startYear },
      { name: '開始年度不明', value: (r) => r.startYearUnknown },
      { name: '事業終了(予定)年度', value: (r) => r.endYear },
      { name: '終了予定なし', value: (r) => r.noPlannedEnd },
    ],
  },
  policyLaw: {
    kind: 'policyLaw',
    fileNumber: '1-3',
    title: '基本情報_政策・施策、法令等',
    columns: [
      ...prefixColumns(),
      { name: '番号（政策・施策）', value: (r) => sectionNumber(r, 'policy') },
      {
        name: '政策所管府省庁_P',
        value: (r) => (r.detail.section === 'policy' ? r.detail.policyMinistry : null),
      },
      { name: '政策', value: (r) => (r.detail.section === 'policy' ? r.detail.policy : null) },
      { name: '施策', value: (r) => (r.detail.section === 'policy' ? r.detail.measure : null) },
      { name: '政策・施策URL', value: (r) => (r.detail.section === 'policy' ? r.detail.url : null) },
      { name: '番号（根拠法令）', value: (r) => sectionNumber(r, 'law') },
      { name: '法令名', value: (r) => (r.detail.section === 'law' ? r.detail.name : null) },
      { name: '法令番号', value: (r) => (r.detail.section === 'law' ? r.detail.lawNumber : null) },
      ...emptyColumns('法令ID'),
      { name: '条', value: (r) => (r.detail.section === 'law' ? r.detail.article : null) },
      { name: '項', value: (r) => (r.detail.section === 'law' ? r.detail.paragraph : null) },
      { name: '号・号の細分', value: (r) => (r.detail.section === 'law' ? r.detail.item : null) },
      { name: '番号（関係する計画・通知等）', value: (r) => sectionNumber(r, 'plan') },
      { name: '計画通知名', value: (r) => (r.detail.section === 'plan' ? r.detail.name : null) },
      { name: '計画通知等URL', value: (r) => (r.detail.section === 'plan' ? r.detail.url : null) },
    ],
  },
  subsidyRate: {
    kind: 'subsidyRate',
    fileNumber: '1-4',
    title: '基本情報_補助率等',
    columns: [
      ...prefixColumns(),
      { name: '番号（補助率等）', value: (r) => r.number },
      { name: '補助対象', value: (r) => r.target },
      { name: '補助率', value: (r) => r.rate },
      { name: '補助上限等', value: (r) => r.ceiling },
      { name: '補助率URL', value: (r) => r.url },
    ],
  },
  relatedProjects: {
    kind: 'relatedProjects',
    fileNumber: '1-5',
    title: '基本情報_関連事業',
    columns: [
      ...prefixColumns(),
      { name: '番号（関連事業）', value: (r) => r.number },
      { name: '関連事業の事業ID', value: (r) => r.relatedProjectId },
      { name: '関連事業の事業名', value: (r) => r.relatedProjectName },
      { name: '関連性', value: (r) => r.relation },
    ],
  },
  budgetSummary: {
    kind: 'budgetSummary',
    fileNumber: '2-1',
    title: '予算・執行_サマリ',
    columns: [
      ...prefixColumns(),
      { name: '予算年度', value: (r) => r.budgetYear },
      { name: '会計区分', value: (r) => r.accountCategory },
      { name: '当初予算(合計)', value: (r) => r.initial },
      { name: '補正予算(合計)', value: (r) => r.supplementary },
      { name: '前年度からの繰越し(合計)', value: (r) => r.carriedFromPrevious },
      { name: '翌年度へ繰越し(合計)', value: (r) => r.carriedToNext },
      { name: '予備費等(合計)', value: (r) => r.reserveFund },
      { name: '計(歳出予算現額合計)', value: (r) => r.total },
      { name: '執行額(合計)', value: (r) => r.executed },
      { name: '執行率', value: (r) => r.executionRate },
    ],
  },
  budgetCategory: {
    kind: 'budgetCategory',
    fileNumber: '2-2',
    title: '予算・執行_予算種別・歳出予算項目',
    columns: [
      ...prefixColumns(),
      { name: '番号（予算内訳）', value: (r) => r.number },
      { name: '会計区分', value: (r) => r.accountCategory },
      ...emptyColumns('会計', '勘定'),
      { name: '歳出予算項（項）', value: (r) => r.item },
      { name: '歳出予算項（目）', value: (r) => r.subItem },
      { name: '令和5年度当初予算（百万円）', value: (r) => r.initialBudget },
      { name: '令和6年度要求（百万円）', value: (r) => r.request },
      ...numberedNotes(5),
    ],
  },
  inspectionEvaluation: {
    kind: 'inspectionEvaluation',
    fileNumber: '4-1',
    title: '点検・評価',
    columns: [
      ...prefixColumns(),
      { name: '事業所管部局による点検・改善ー点検結果', value: (r) => r.selfCheckResult },
      { name: '事業所管部局による点検・改善ー改善の方向性', value: (r) => r.improvementDirection },
      {
        name: '事業所管部局による点検・改善－目標年度における効果測定に関する評価',
        value: (r) => r.effectEvaluation,
      },
      ...emptyColumns(
        '外部有識者による点検ー最終実施年度',
        '外部有識者による点検ー点検対象',
        '外部有識者による点検ー対象の理由'
      ),
      { name: '外部有識者による点検ー所見', value: (r) => r.externalFindings },
      { name: '公開プロセス結果概要', value: (r) => r.publicProcessSummary },
      { name: '行政事業レビュー推進チームの所見ー判定', value: (r) => r.teamJudgement },
      { name: '行政事業レビュー推進チームの所見ー所見', value: (r) => r.teamFindings },
      ...emptyColumns(
        '過去に受けた指摘事項（年度）',
        '過去に受けた指摘事項（指摘主体）',
        '過去に受けた指摘事項（指摘事項）',
        '過去に受けた指摘事項（対応状況）'
      ),
      ...numberedNotes(10),
    ],
  },
  expenditure: {
    kind: 'expenditure',
    fileNumber: '5-1',
    title: '支出先_支出情報',
    columns: [
      ...prefixColumns(),
      { name: '支出先ブロック', value: (r) => r.block },
      { name: '支出先番号', value: (r) => r.sequence },
      { name: '支出先名', value: (r) => r.recipientName },
      { name: '法人番号', value: (r) => r.corporateNumber },
      { name: '業務概要', value: (r) => r.workSummary },
      { name: '支出額（百万円）', value: (r) => r.amount },
      { name: '契約方式等', value: (r) => r.contractMethod },
      { name: '入札者数（応募者数）', value: (r) => r.bidderCount },
      { name: '落札率', value: (r) => r.winningBidRate },
      { name: '一者応札理由', value: (r) => r.soleBidReason },
      {
        name: '一者応札・一者応募又は競争性のない随意契約となった理由及び改善策（支出額10億円以上）',
        value: (r) => r.soleBidReasonDetail,
      },
    ],
  },
  expenseUsage: {
    kind: 'expenseUsage',
    fileNumber: '5-3',
    title: '支出先_費目・使途',
    columns: [
      ...prefixColumns(),
      { name: '番号（費目・使途）', value: (r) => r.number },
      { name: '支払先ブロック', value: (r) => r.block },
      { name: '費目', value: (r) => r.item },
      { name: '使途', value: (r) => r.usage },
      { name: '金額（百万円）', value: (r) => r.amount },
      ...numberedNotes(2),
    ],
  },
  multiYearContract: {
    kind: 'multiYearContract',
    fileNumber: '5-4',
    title: '支出先_国庫債務負担行為等による契約',
    columns: [
      ...prefixColumns(),
      { name: '番号（契約）', value: (r) => r.number },
      { name: '支出先ブロック名', value: (r) => r.blockName },
      { name: '契約先', value: (r) => r.contractor },
      { name: '法人番号', value: (r) => r.corporateNumber },
      { name: '業務概要', value: (r) => r.workSummary },
      { name: '契約額（百万円）', value: (r) => r.amount },
      { name: '契約方式', value: (r) => r.method },
      { name: '入札者数（応募者数）', value: (r) => r.bidderCount },
      { name: '落札率', value: (r) => r.winningBidRate },
      {
        name: '一者応札・一者応募又は競争性のない随意契約となった理由及び改善策',
        value: (r) => r.soleBidReason,
      },
      ...numberedNotes(4),
    ],
  },
  remarks: {
    kind: 'remarks',
    fileNumber: '6-1',
    title: 'その他備考',
    columns: [...prefixColumns(), { name: '備考', value: (r) => r.remarks }],
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// Rendering
// ─────────────────────────────────────────────────────────────────────────────

export const tableFileName = (kind: TableKind, fiscalYear: number): string => {
  const definition = TABLE_DEFINITIONS[kind];
  return `${definition.fileNumber}_${String(fiscalYear)}_${definition.title}.csv`;
};

export const renderTable = <K extends TableKind>(
  kind: K,
  records: readonly TableRecordMap[K][],
  fiscalYear: number
): RenderedTable => {
  const definition: TableDefinition<K> = TABLE_DEFINITIONS[kind];
  return {
    kind,
    fileName: tableFileName(kind, fiscalYear),
    columns: definition.columns.map((column) => column.name),
    rows: records.map((record) => definition.columns.map((column) => column.value(record))),
  };
};

/** Renders every table kind that holds at least one record, in RS file order. */
export const renderTables = (tables: ReviewSheetTables, fiscalYear: number): RenderedTable[] => {
  const render = <K extends TableKind>(kind: K): RenderedTable | null => {
    const records = tables[kind];
    return records.length > 0 ? renderTable(kind, records, fiscalYear) : null;
  };

  return TABLE_KINDS.map((kind) => render(kind))
    .filter((table): table is RenderedTable => table !== null);
};
