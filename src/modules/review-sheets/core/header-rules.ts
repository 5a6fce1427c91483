import type {
  BudgetFieldKind,
  FieldKind,
  HeaderGeneration,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface FieldMatcher {
  readonly kind: FieldKind;
  readonly match: RegExp;
  readonly exclude?: RegExp;
}

/**
 * A rule whose pattern extracts the field text and repeat key from named
 * groups: `field`, `block`, `seq`, `year`. Without a `field` group the whole
 * header is the field text.
 */
export interface PatternRule {
  readonly family: string;
  readonly key: 'none' | 'sequence' | 'blockSequence' | 'yearSequence';
  readonly generation?: HeaderGeneration;
  readonly pattern: RegExp;
  readonly fields: readonly FieldMatcher[];
}

/** A rule keyed by a fiscal-year token anywhere in the header. */
export interface FiscalYearRule {
  readonly family: string;
  readonly key: 'fiscalYear';
  readonly fields: readonly FieldMatcher[];
}

export type HeaderRule = PatternRule | FiscalYearRule;

// ─────────────────────────────────────────────────────────────────────────────
// Field matchers
// ─────────────────────────────────────────────────────────────────────────────

const NUM = '[0-9０-９]+';

export const BUDGET_FIELDS: readonly (FieldMatcher & { kind: BudgetFieldKind })[] = [
  { kind: 'budget.initial', match: /当初予算/, exclude: /補正/ },
  { kind: 'budget.supplementary', match: /補正予算/, exclude: /次/ },
  { kind: 'budget.carriedFromPrevious', match: /前年度.*繰越|繰越.*前年度/ },
  { kind: 'budget.carriedToNext', match: /翌年度.*繰越|繰越.*翌年度/ },
  { kind: 'budget.reserveFund', match: /予備費/ },
  { kind: 'budget.executionRate', match: /執行率|執行.*[%％]/ },
  { kind: 'budget.executed', match: /執行額/, exclude: /割合/ },
  { kind: 'budget.total', match: /^計|予算.*計|計.*予算/, exclude: /内訳/ },
];

const BUDGET_CATEGORY_FIELDS: readonly FieldMatcher[] = [
  { kind: 'category.item', match: /[（(]項[）)]/ },
  { kind: 'category.subItem', match: /[（(]目[）)]|^歳出予算目$/ },
  { kind: 'category.initialBudget', match: /当初予算/ },
  { kind: 'category.request', match: /要求/ },
];

const LEGACY_EXPENDITURE_FIELDS: readonly FieldMatcher[] = [
  { kind: 'expenditure.recipientName', match: /^支出先名?$/ },
  { kind: 'expenditure.corporateNumber', match: /^法人番号/ },
  { kind: 'expenditure.workSummary', match: /^業務概要/ },
  { kind: 'expenditure.amount', match: /^支出額/ },
  { kind: 'expenditure.contractMethod', match: /^契約方式/ },
  { kind: 'expenditure.bidderCount', match: /^入札者数/ },
  { kind: 'expenditure.winningBidRate', match: /^落札率/ },
];

const CURRENT_EXPENDITURE_FIELDS: readonly FieldMatcher[] = [
  {
    kind: 'expenditure.soleBidReasonDetail',
    match: /^一者応札・一者応募又は競争性のない随意契約となった理由及び改善策/,
  },
  { kind: 'expenditure.soleBidReason', match: /一者応札.*理由/ },
  { kind: 'expenditure.corporateNumber', match: /^法人番号/ },
  { kind: 'expenditure.recipientName', match: /^支出先/, exclude: /法人/ },
  { kind: 'expenditure.workSummary', match: /^業務概要/ },
  { kind: 'expenditure.amount', match: /^支出額/ },
  { kind: 'expenditure.contractMethod', match: /^契約方式/ },
  { kind: 'expenditure.bidderCount', match: /^入札者数/ },
  { kind: 'expenditure.winningBidRate', match: /^落札率/ },
];

const CONTRACT_FIELDS: readonly FieldMatcher[] = [
  { kind: 'contract.blockName', match: /^ブロック名/ },
  { kind: 'contract.contractor', match: /^契約先/ },
  { kind: 'contract.corporateNumber', match: /^法人番号/ },
  { kind: 'contract.workSummary', match: /^業務概要/ },
  { kind: 'contract.amount', match: /^契約額/ },
  { kind: 'contract.method', match: /^契約方式/ },
  { kind: 'contract.bidderCount', match: /^入札者数/ },
  { kind: 'contract.winningBidRate', match: /^落札率/ },
  { kind: 'contract.soleBidReason', match: /一者応札|競争性のない随意契約/ },
];

const EXPENSE_USAGE_FIELDS: readonly FieldMatcher[] = [
  { kind: 'expenseUsage.item', match: /^費目$/ },
  { kind: 'expenseUsage.usage', match: /^使途$/ },
  { kind: 'expenseUsage.amount', match: /^金額/ },
];

/** Matched against the whole header, first hit wins. */
const SINGLETON_FIELDS: readonly FieldMatcher[] = [
  // Inspection headers are fixed strings in every release that has them
  { kind: 'inspection.selfCheckResult', match: /^事業所管部局による点検・改善-点検結果$/ },
  { kind: 'inspection.improvementDirection', match: /^事業所管部局による点検・改善-改善の方向性$/ },
  {
    kind: 'inspection.effectEvaluation',
    match: /^事業所管部局による点検・改善-目標年度における効果測定に関する評価$/,
  },
  { kind: 'inspection.externalFindings', match: /^外部有識者の所見-*$/ },
  {
    kind: 'inspection.teamJudgement',
    match: /^行政事業レビュー推進チームの所見に至る過程及び所見-判定$/,
  },
  {
    kind: 'inspection.teamFindings',
    match: /^行政事業レビュー推進チームの所見に至る過程及び所見-[初所]見$/,
  },
  { kind: 'inspection.publicProcessSummary', match: /^過去に受けた指摘事項と対応状況-公開プロセス/ },

  { kind: 'overview.summaryUrl', match: /事業概要URL/i },
  { kind: 'overview.purpose', match: /事業の目的|^目的$/ },
  { kind: 'overview.currentIssues', match: /^(?=.*現状)(?=.*課題)/ },
  { kind: 'overview.summary', match: /事業の概要|^事業概要$/ },
  { kind: 'overview.category', match: /事業区分/ },
  { kind: 'overview.majorExpense', match: /主要経費/ },
  { kind: 'overview.implementationMethod', match: /^実施方法$/ },
  { kind: 'overview.subsidyText', match: /補助率等|^補助率$/ },
  { kind: 'overview.startYearUnknown', match: /^(?=.*不明)(?=.*開始)/ },
  { kind: 'overview.startYear', match: /開始年度/ },
  { kind: 'overview.endYear', match: /^(?=.*終了)(?=.*年度)(?=.*予定)/ },
  { kind: 'overview.noPlannedEnd', match: /終了予定なし|継続/ },

  { kind: 'organization.responsibleOfficer', match: /作成責任者/ },
  { kind: 'organization.chargeBureau', match: /担当部局庁/ },
  { kind: 'organization.chargeSection', match: /担当課室/ },

  { kind: 'policy.policy', match: /^政策$/ },
  { kind: 'policy.measure', match: /^施策$/ },
  { kind: 'policy.url', match: /^(?=.*政策体系)(?=.*URL)/i },
  { kind: 'policy.law', match: /根拠法令/ },
  { kind: 'policy.plan', match: /関係する計画|通知/ },

  { kind: 'remarks.remarks', match: /^備考-*$/ },
  { kind: 'remarks.otherFindings', match: /その他の指摘事項/ },

  { kind: 'common.accountCategory', match: /会計区分/ },
  { kind: 'common.projectName', match: /事業名/ },
  { kind: 'common.ministry', match: /府省/, exclude: /建制順/ },
  // Exact names: `課` alone would also hit 課題
  { kind: 'common.bureau', match: /^局・庁$/ },
  { kind: 'common.department', match: /^部$/ },
  { kind: 'common.division', match: /^課$/ },
  { kind: 'common.office', match: /^室$/ },
  { kind: 'common.team', match: /^班$/ },
  { kind: 'common.unit', match: /^係$/ },
];

// ─────────────────────────────────────────────────────────────────────────────
// Rule table
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Ordered header rules. Budget-category and related-project headers carry
 * year tokens of their own, so they are tried before the budget-year rule.
 */
export const HEADER_RULES: readonly HeaderRule[] = [
  {
    family: 'budgetCategory',
    key: 'sequence',
    pattern: new RegExp(`予算内訳.*歳出予算項・目-(?<field>.+)-(?<seq>${NUM})$`),
    fields: BUDGET_CATEGORY_FIELDS,
  },
  {
    family: 'budgetCategory',
    key: 'sequence',
    pattern: new RegExp(
      `予算内訳.*-(?<field>歳出予算目|20[0-9]{2}年度当初予算|20[0-9]{2}年度要求)-(?<seq>${NUM})$`
    ),
    fields: BUDGET_CATEGORY_FIELDS,
  },
  {
    family: 'relatedProjects',
    key: 'yearSequence',
    pattern: new RegExp(
      `関連する過去のレビューシートの事業番号-(?<year>[0-9]{4})年度-(?<seq>${NUM})`
    ),
    fields: [{ kind: 'related.projectNumber', match: /./ }],
  },
  {
    family: 'expenditure',
    key: 'blockSequence',
    generation: 'legacy',
    pattern: new RegExp(`支出先上位.*?-グループ-(?<field>.+)-(?<seq>${NUM})$`),
    fields: LEGACY_EXPENDITURE_FIELDS,
  },
  {
    family: 'expenditure',
    key: 'blockSequence',
    generation: 'current',
    pattern: new RegExp(`支出先上位.*?-(?<block>[A-Z])\\.支払先-(?<seq>${NUM})-(?<field>.+)$`),
    fields: CURRENT_EXPENDITURE_FIELDS,
  },
  {
    family: 'multiYearContract',
    key: 'sequence',
    pattern: new RegExp(`国庫債務負担行為等による契約先上位${NUM}者リスト-(?<seq>${NUM})-(?<field>.+)$`),
    fields: CONTRACT_FIELDS,
  },
  {
    family: 'expenseUsage',
    key: 'blockSequence',
    pattern: new RegExp(
      `費目・使途.*-(?<block>[A-D])\\.支払先-(?<field>費目|使途|金額.*)-(?<seq>${NUM})$`
    ),
    fields: EXPENSE_USAGE_FIELDS,
  },
  {
    family: 'legacyProjectNumber',
    key: 'sequence',
    pattern: /^事業番号-(?<seq>[1-5])$/,
    fields: [{ kind: 'overview.legacyNumber', match: /./ }],
  },
  { family: 'budgetSummary', key: 'fiscalYear', fields: BUDGET_FIELDS },
  { family: 'singleton', key: 'none', pattern: /^.+$/s, fields: SINGLETON_FIELDS },
];

export const matchField = (
  fields: readonly FieldMatcher[],
  fieldText: string
): FieldKind | null => {
  for (const field of fields) {
    if (field.match.test(fieldText) && field.exclude?.test(fieldText) !== true) {
      return field.kind;
    }
  }
  return null;
};
