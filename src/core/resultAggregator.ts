import { Lead } from './types';

const freezeLead = (lead: Lead): Readonly<Lead> => {
  const emails = [...lead.emails];
  const phones = [...lead.phones];
  const socialProfiles = { ...lead.socialProfiles };
  Object.freeze(emails);
  Object.freeze(phones);
  Object.freeze(socialProfiles);
  return Object.freeze({ ...lead, emails, phones, socialProfiles });
};

/** Highest score first; ties keep their incoming order. Nothing is dropped. */
export const aggregateLeads = (leads: readonly Lead[]): Readonly<Lead>[] =>
  leads
    .map((lead, index) => ({ lead, index }))
    .sort((a, b) => b.lead.score - a.lead.score || a.index - b.index)
    .map(({ lead }) => freezeLead(lead));
