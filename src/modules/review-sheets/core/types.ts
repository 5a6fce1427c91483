import { Type, type Static } from '@sinclair/typebox';

import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Source tables
// ─────────────────────────────────────────────────────────────────────────────

export type SourceRow = Readonly<Record<string, string>>;

/**
 * One decoded spreadsheet: header names (unique within the table) and rows
 * keyed by header. Cells are strings; a missing cell reads as ''.
 */
export interface SourceTable {
  readonly name: string;
  readonly headers: readonly string[];
  readonly rows: readonly SourceRow[];
}

export type SheetKind = 'review' | 'segment' | 'unknown';

/** `legacy` is the 2014 `支出先上位…-グループ-` convention, `current` everything after */
export type HeaderGeneration = 'legacy' | 'current';

export type DominantEra = 'reiwa' | 'heisei';

export interface HeaderContext {
  readonly generation: HeaderGeneration;
  readonly dominantEra: DominantEra;
}

/** Block assigned to legacy expenditure columns, which have no block letter */
export const LEGACY_BLOCK = 'GROUP';

// ─────────────────────────────────────────────────────────────────────────────
// Field kinds
// ─────────────────────────────────────────────────────────────────────────────

export type CommonFieldKind =
  | 'common.projectName'
  | 'common.ministry'
  | 'common.bureau'
  | 'common.department'
  | 'common.division'
  | 'common.office'
  | 'common.team'
  | 'common.unit'
  | 'common.accountCategory';

export type OverviewFieldKind =
  | 'overview.purpose'
  | 'overview.currentIssues'
  | 'overview.summary'
  | 'overview.summaryUrl'
  | 'overview.category'
  | 'overview.majorExpense'
  | 'overview.implementationMethod'
  | 'overview.subsidyText'
  | 'overview.legacyNumber'
  | 'overview.startYear'
  | 'overview.startYearUnknown'
  | 'overview.endYear'
  | 'overview.noPlannedEnd';

export type OrganizationFieldKind =
  | 'organization.responsibleOfficer'
  | 'organization.chargeBureau'
  | 'organization.chargeSection';

export type PolicyFieldKind =
  | 'policy.policy'
  | 'policy.measure'
  | 'policy.url'
  | 'policy.law'
  | 'policy.plan';

export type InspectionFieldKind =
  | 'inspection.selfCheckResult'
  | 'inspection.improvementDirection'
  | 'inspection.effectEvaluation'
  | 'inspection.externalFindings'
  | 'inspection.teamJudgement'
  | 'inspection.teamFindings'
  | 'inspection.publicProcessSummary';

export type RemarksFieldKind = 'remarks.remarks' | 'remarks.otherFindings';

export type BudgetFieldKind =
  | 'budget.initial'
  | 'budget.supplementary'
  | 'budget.carriedFromPrevious'
  | 'budget.carriedToNext'
  | 'budget.reserveFund'
  | 'budget.total'
  | 'budget.executed'
  | 'budget.executionRate';

export type BudgetCategoryFieldKind =
  | 'category.item'
  | 'category.subItem'
  | 'category.initialBudget'
  | 'category.request';

export type ExpenditureFieldKind =
  | 'expenditure.recipientName'
  | 'expenditure.corporateNumber'
  | 'expenditure.workSummary'
  | 'expenditure.amount'
  | 'expenditure.contractMethod'
  | 'expenditure.bidderCount'
  | 'expenditure.winningBidRate'
  | 'expenditure.soleBidReason'
  | 'expenditure.soleBidReasonDetail';

export type ContractFieldKind =
  | 'contract.blockName'
  | 'contract.contractor'
  | 'contract.corporateNumber'
  | 'contract.workSummary'
  | 'contract.amount'
  | 'contract.method'
  | 'contract.bidderCount'
  | 'contract.winningBidRate'
  | 'contract.soleBidReason';

export type ExpenseUsageFieldKind = 'expenseUsage.item' | 'expenseUsage.usage' | 'expenseUsage.amount';

export type FieldKind =
  | CommonFieldKind
  | OverviewFieldKind
  | OrganizationFieldKind
  | PolicyFieldKind
  | InspectionFieldKind
  | RemarksFieldKind
  | 'related.projectNumber'
  | BudgetFieldKind
  | BudgetCategoryFieldKind
  | ExpenditureFieldKind
  | ContractFieldKind
  | ExpenseUsageFieldKind;

/**
 * Repeat key of a classified column. Singleton fields have every part null.
 */
export interface RepeatKey {
  readonly fiscalYear: number | null;
  readonly block: string | null;
  readonly sequence: number | null;
}

export interface ClassifiedColumn extends RepeatKey {
  readonly fieldKind: FieldKind;
  readonly sourceHeader: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Ministry master
// ─────────────────────────────────────────────────────────────────────────────

export const MinistryMasterSchema = Type.Object(
  {
    ministries: Type.Array(
      Type.Object(
        {
          id: Type.Integer({ minimum: 1 }),
          name: Type.String({ minLength: 1 }),
        },
        { additionalProperties: false }
      ),
      { minItems: 1 }
    ),
    aliases: Type.Record(Type.String(), Type.String({ minLength: 1 })),
  },
  { additionalProperties: false }
);

export type MinistryMaster = Static<typeof MinistryMasterSchema>;

export interface MinistryDirectory {
  /** Canonical spelling for a ministry name; unknown names pass through. */
  canonicalName(name: string): string;
  /** 建制順 of a canonical name, or null when the name is not in the master. */
  orderOf(name: string): number | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Output records
// ─────────────────────────────────────────────────────────────────────────────

export const REVIEW_SHEET_KIND_LABEL = 'レビューシート';

/** Columns every output record starts with. */
export interface CommonPrefix {
  readonly sheetKind: typeof REVIEW_SHEET_KIND_LABEL;
  readonly fiscalYear: number;
  readonly entityId: number;
  readonly projectName: string | null;
  readonly ministryOrder: number | null;
  readonly policyMinistry: string | null;
  readonly ministry: string | null;
  readonly bureau: string | null;
  readonly department: string | null;
  readonly division: string | null;
  readonly office: string | null;
  readonly team: string | null;
  readonly unit: string | null;
}

interface RecordBase<K extends TableKind> {
  readonly table: K;
  readonly prefix: CommonPrefix;
}

export interface OrganizationRecord extends RecordBase<'organization'> {
  readonly responsibleOfficerNo: number;
  readonly otherBureau: string | null;
  readonly otherDivision: string | null;
  readonly responsibleOfficer: string | null;
}

export interface ProjectOverviewRecord extends RecordBase<'projectOverview'> {
  readonly purpose: string | null;
  readonly currentIssues: string | null;
  readonly summary: string | null;
  readonly summaryUrl: string | null;
  readonly category: string | null;
  readonly majorExpense: string | null;
  readonly implementationMethod: string | null;
  readonly subsidyText: string | null;
  readonly legacyProjectNumber: string | null;
  readonly startYear: number | null;
  readonly startYearUnknown: string | null;
  readonly endYear: number | null;
  readonly noPlannedEnd: string | null;
}

export interface PolicySection {
  readonly section: 'policy';
  readonly number: number;
  readonly policyMinistry: string | null;
  readonly policy: string;
  readonly measure: string | null;
  readonly url: string | null;
}

export interface LawSection {
  readonly section: 'law';
  readonly number: number;
  readonly name: string;
  readonly lawNumber: string | null;
  readonly article: string | null;
  readonly paragraph: string | null;
  readonly item: string | null;
}

export interface PlanSection {
  readonly section: 'plan';
  readonly number: number;
  readonly name: string;
  readonly url: string | null;
}

export type PolicyLawRecord = RecordBase<'policyLaw'> & {
  readonly detail: PolicySection | LawSection | PlanSection;
};

export interface SubsidyRateRecord extends RecordBase<'subsidyRate'> {
  readonly number: number;
  readonly target: string | null;
  readonly rate: string | null;
  readonly ceiling: string | null;
  readonly url: string | null;
}

export interface RelatedProjectRecord extends RecordBase<'relatedProjects'> {
  readonly number: number;
  readonly referenceYear: number;
  readonly relatedProjectId: string;
  readonly relatedProjectName: string | null;
  readonly relation: string;
}

export interface InspectionEvaluationRecord extends RecordBase<'inspectionEvaluation'> {
  readonly selfCheckResult: string | null;
  readonly improvementDirection: string | null;
  readonly effectEvaluation: string | null;
  readonly externalFindings: string | null;
  readonly teamJudgement: string | null;
  readonly teamFindings: string | null;
  readonly publicProcessSummary: string | null;
}

export interface BudgetSummaryRecord extends RecordBase<'budgetSummary'> {
  readonly budgetYear: number;
  readonly accountCategory: string | null;
  readonly initial: Decimal | null;
  readonly supplementary: Decimal | null;
  readonly carriedFromPrevious: Decimal | null;
  readonly carriedToNext: Decimal | null;
  readonly reserveFund: Decimal | null;
  readonly total: Decimal | null;
  readonly executed: Decimal | null;
  readonly executionRate: Decimal | null;
}

export interface BudgetCategoryRecord extends RecordBase<'budgetCategory'> {
  readonly number: number;
  readonly accountCategory: string | null;
  readonly item: string | null;
  readonly subItem: string | null;
  readonly initialBudget: Decimal | null;
  readonly request: Decimal | null;
}

export interface ExpenditureRecord extends RecordBase<'expenditure'> {
  readonly block: string;
  readonly sequence: number;
  readonly recipientName: string;
  readonly corporateNumber: string | null;
  readonly workSummary: string | null;
  readonly amount: Decimal | null;
  readonly contractMethod: string | null;
  readonly bidderCount: Decimal | null;
  readonly winningBidRate: Decimal | null;
  readonly soleBidReason: string | null;
  readonly soleBidReasonDetail: string | null;
}

export interface ExpenseUsageRecord extends RecordBase<'expenseUsage'> {
  readonly number: number;
  readonly block: string;
  readonly item: string | null;
  readonly usage: string | null;
  readonly amount: Decimal | null;
}

export interface MultiYearContractRecord extends RecordBase<'multiYearContract'> {
  readonly number: number;
  readonly blockName: string | null;
  readonly contractor: string;
  readonly corporateNumber: string | null;
  readonly workSummary: string | null;
  readonly amount: Decimal | null;
  readonly method: string | null;
  readonly bidderCount: Decimal | null;
  readonly winningBidRate: Decimal | null;
  readonly soleBidReason: string | null;
}

export interface RemarksRecord extends RecordBase<'remarks'> {
  readonly remarks: string;
}

export interface TableRecordMap {
  organization: OrganizationRecord;
  projectOverview: ProjectOverviewRecord;
  policyLaw: PolicyLawRecord;
  subsidyRate: SubsidyRateRecord;
  relatedProjects: RelatedProjectRecord;
  budgetSummary: BudgetSummaryRecord;
  budgetCategory: BudgetCategoryRecord;
  inspectionEvaluation: InspectionEvaluationRecord;
  expenditure: ExpenditureRecord;
  expenseUsage: ExpenseUsageRecord;
  multiYearContract: MultiYearContractRecord;
  remarks: RemarksRecord;
}

export type TableKind = keyof TableRecordMap;

export type OutputRecord = TableRecordMap[TableKind];

/** Records of one or more review sheets, grouped by table kind. */
export type ReviewSheetTables = { [K in TableKind]: TableRecordMap[K][] };

export const TABLE_KINDS = [
  'organization',
  'projectOverview',
  'policyLaw',
  'subsidyRate',
  'relatedProjects',
  'budgetSummary',
  'budgetCategory',
  'inspectionEvaluation',
  'expenditure',
  'expenseUsage',
  'multiYearContract',
  'remarks',
] as const satisfies readonly TableKind[];

export const createEmptyTables = (): ReviewSheetTables => ({
  organization: [],
  projectOverview: [],
  policyLaw: [],
  subsidyRate: [],
  relatedProjects: [],
  budgetSummary: [],
  budgetCategory: [],
  inspectionEvaluation: [],
  expenditure: [],
  expenseUsage: [],
  multiYearContract: [],
  remarks: [],
});
