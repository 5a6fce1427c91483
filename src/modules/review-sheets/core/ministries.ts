import type { MinistryDirectory, MinistryMaster } from './types.js';

export const createMinistryDirectory = (master: MinistryMaster): MinistryDirectory => {
  const orders = new Map(master.ministries.map((ministry) => [ministry.name, ministry.id]));
  const aliases = new Map(Object.entries(master.aliases));

  return {
    canonicalName: (name) => aliases.get(name) ?? name,
    orderOf: (name) => orders.get(name) ?? null,
  };
};
