import { parseLawCitation, parsePlanReference } from './free-text.js';
import { expandRows, type Assembler } from './shared.js';

import type { PolicyLawRecord } from '../types.js';

/**
 * Up to three records per row: the policy/measure section, the legal basis
 * and the related plan or notice. Each section is numbered on its own; a
 * measure without a policy is not recorded.
 */
export const assemblePolicyLaw: Assembler<'policyLaw'> = (input) =>
  expandRows(input, ({ reader, prefix }) => {
    const records: PolicyLawRecord[] = [];

    const policy = reader.text('policy.policy');
    if (policy !== null) {
      records.push({
        table: 'policyLaw',
        prefix,
        detail: {
          section: 'policy',
          number: 1,
          policyMinistry: prefix.policyMinistry,
          policy,
          measure: reader.text('policy.measure'),
          url: reader.text('policy.url'),
        },
      });
    }

    const law = reader.text('policy.law');
    if (law !== null) {
      records.push({
        table: 'policyLaw',
        prefix,
        detail: { section: 'law', number: 1, ...parseLawCitation(law) },
      });
    }

    const plan = reader.text('policy.plan');
    if (plan !== null) {
      records.push({
        table: 'policyLaw',
        prefix,
        detail: { section: 'plan', number: 1, ...parsePlanReference(plan) },
      });
    }

    return records;
  });
