import { expandRows, type Assembler } from './shared.js';

import type { OrganizationRecord } from '../types.js';

export const assembleOrganization: Assembler<'organization'> = (input) =>
  expandRows<OrganizationRecord>(input, ({ reader, prefix }) => [
    {
      table: 'organization',
      prefix,
      responsibleOfficerNo: 1,
      otherBureau: reader.text('organization.chargeBureau'),
      otherDivision: reader.text('organization.chargeSection'),
      responsibleOfficer: reader.text('organization.responsibleOfficer'),
    },
  ]);
