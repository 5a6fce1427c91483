import { assembleBudgetCategory } from './budget-category.js';
import { assembleBudgetSummary } from './budget-summary.js';
import { assembleExpenditure } from './expenditure.js';
import { assembleExpenseUsage } from './expense-usage.js';
import { assembleInspectionEvaluation } from './inspection-evaluation.js';
import { assembleMultiYearContract } from './multi-year-contract.js';
import { assembleOrganization } from './organization.js';
import { assemblePolicyLaw } from './policy-law.js';
import { assembleProjectOverview } from './project-overview.js';
import { assembleRelatedProjects } from './related-projects.js';
import { assembleRemarks } from './remarks.js';
import { assembleSubsidyRate } from './subsidy-rate.js';

import type { Assembler } from './shared.js';
import type { TableKind } from '../types.js';

export const ASSEMBLERS: { readonly [K in TableKind]: Assembler<K> } = {
  organization: assembleOrganization,
  projectOverview: assembleProjectOverview,
  policyLaw: assemblePolicyLaw,
  subsidyRate: assembleSubsidyRate,
  relatedProjects: assembleRelatedProjects,
  budgetSummary: assembleBudgetSummary,
  budgetCategory: assembleBudgetCategory,
  inspectionEvaluation: assembleInspectionEvaluation,
  expenditure: assembleExpenditure,
  expenseUsage: assembleExpenseUsage,
  multiYearContract: assembleMultiYearContract,
  remarks: assembleRemarks,
};

export {
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
};
export { expandRows, type Assembler, type AssemblerInput, type AssemblerRow } from './shared.js';
export {
  parseLawCitation,
  parsePlanReference,
  parseSubsidyTerms,
  type LawCitation,
  type PlanReference,
  type SubsidyTerms,
} from './free-text.js';
