import { BoundedCache } from '../utils/boundedCache';
import { log } from '../utils/logger';
import { EnrichmentApis } from './enrichmentApis';
import { CancelledError, EnrichmentError, errorMessage } from './errors';
import { Lead } from './types';

const STRICT_EMAIL_REGEX = /^[a-z0-9_+-]+(\.[a-z0-9_+-]+)*@[a-z0-9-]+(\.[a-z0-9-]+)*\.[a-z]{2,}$/i;
const PHONE_REGEX = /(\+?\d[\d\s().-]{7,}\d)/g;
const SENIOR_TITLE_REGEX = /(manager|director|vp|ceo)/i;
const OWNER_TITLE_REGEX = /(founder|owner|principal)/i;

const DIRECTORY_HOSTS = [
  'linkedin.com', 'baidu.com', 'bing.com', 'facebook.com', 'twitter.com', 'x.com', 'instagram.com',
  'youtube.com', 'github.com', 'wikipedia.org', 'crunchbase.com', 'glassdoor.com', 'indeed.com', 'zoominfo.com',
];
const SEARCH_HOST_REGEX = /(^|\.)google\.[a-z.]+$/;

export type StageName =
  | 'domain'
  | 'email_guess'
  | 'email_finder'
  | 'email_verification'
  | 'company'
  | 'social'
  | 'phones'
  | 'scoring'
  | 'normalization';

export type StageStatus = 'applied' | 'skipped' | 'failed';

export type LeadPatch = Partial<Pick<Lead, 'name' | 'company' | 'emails' | 'phones' | 'socialProfiles' | 'score'>> & { domain?: string };

export interface StageOutcome {
  stage: StageName;
  status: StageStatus;
  patch?: LeadPatch;
  reason?: string;
  error?: EnrichmentError;
}

export interface EnrichmentContext {
  lead: Lead;
  domain?: string;
}

export interface EnrichmentReport {
  lead: Lead;
  outcomes: StageOutcome[];
}

export interface EnricherOptions {
  enrichmentEnabled: boolean;
  validateEmails: boolean;
  verdictCache?: BoundedCache<boolean>;
}

interface Stage {
  name: StageName;
  network: boolean;
  run(context: EnrichmentContext, signal?: AbortSignal): Promise<StageOutcome>;
}

const applied = (stage: StageName, patch: LeadPatch, reason?: string): StageOutcome => ({ stage, status: 'applied', patch, reason });
const skipped = (stage: StageName, reason: string): StageOutcome => ({ stage, status: 'skipped', reason });

export const union = (...lists: readonly string[][]): string[] => [...new Set(lists.flat())];

export const nameTokens = (name: string): string[] => name.trim().split(/\s+/).filter(Boolean);

export const validateEmailFormat = (email: string): boolean => STRICT_EMAIL_REGEX.test(email);

export const deriveDomain = (lead: Pick<Lead, 'company' | 'url'>): string | undefined => {
  const companySlug = (lead.company ?? '').toLowerCase().replace(/[^a-z0-9]/g, '');
  if (companySlug) return `${companySlug}.com`;

  let host: string;
  try {
    host = new URL(lead.url).hostname.replace(/^www\./i, '').toLowerCase();
  } catch {
    return undefined;
  }
  if (!host || SEARCH_HOST_REGEX.test(host)) return undefined;
  if (DIRECTORY_HOSTS.some((directory) => host === directory || host.endsWith(`.${directory}`))) return undefined;
  return host;
};

const emailToken = (token: string): string =>
  token.normalize('NFD').replace(/[\u0300-\u036f]/g, '').toLowerCase().replace(/[^a-z0-9]/g, '');

/** Candidate addresses in pattern order: first.last, flast, first_last, firstl, first. */
export const guessEmails = (name: string, domain: string): string[] => {
  const tokens = nameTokens(name).map(emailToken).filter(Boolean);
  if (tokens.length < 2 || !domain) return [];
  const first = tokens[0];
  const last = tokens[tokens.length - 1];
  const candidates = [
    `${first}.${last}@${domain}`,
    `${first[0]}${last}@${domain}`,
    `${first}_${last}@${domain}`,
    `${first}${last[0]}@${domain}`,
    `${first}@${domain}`,
  ];
  return union(candidates.filter(validateEmailFormat));
};

const phoneDigits = (phone: string): string => phone.replace(/\D/g, '');

export const extractPhones = (text: string): string[] => {
  const seen = new Set<string>();
  const phones: string[] = [];
  for (const match of text.match(PHONE_REGEX) ?? []) {
    const phone = match.replace(/\s+/g, ' ').trim();
    const key = phoneDigits(phone);
    if (seen.has(key)) continue;
    seen.add(key);
    phones.push(phone);
  }
  return phones;
};

export const scoreLead = (lead: Pick<Lead, 'name' | 'title'>): number => {
  let score = 0.5;
  if (nameTokens(lead.name).length >= 2) score += 0.2;
  if (SENIOR_TITLE_REGEX.test(lead.title)) score += 0.2;
  else if (OWNER_TITLE_REGEX.test(lead.title)) score += 0.15;
  const clamped = Math.min(1, Math.max(0, score));
  return Math.round(clamped * 100) / 100;
};

export const normalizePhone = (phone: string): string => {
  const digits = phoneDigits(phone);
  if (!digits) return '';
  return phone.trim().startsWith('+') ? `+${digits}` : digits;
};

export const normalizeLead = (lead: Lead): LeadPatch => ({
  name: nameTokens(lead.name).map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase()).join(' '),
  phones: union(lead.phones.map(normalizePhone).filter(Boolean)),
  emails: union(lead.emails.map((email) => email.trim().toLowerCase()).filter(Boolean)),
});

export const applyOutcome = (context: EnrichmentContext, outcome: StageOutcome): EnrichmentContext => {
  if (outcome.status !== 'applied' || !outcome.patch) return context;
  const { domain, ...fields } = outcome.patch;
  return {
    domain: domain ?? context.domain,
    lead: { ...context.lead, ...fields },
  };
};

const cloneLead = (lead: Lead): Lead => ({
  ...lead,
  emails: [...lead.emails],
  phones: [...lead.phones],
  socialProfiles: { ...lead.socialProfiles },
});

/**
 * Runs the enrichment stages for one lead in a fixed order. Each stage yields
 * an outcome that is folded into the context; a failing stage leaves the lead
 * as the previous stage left it.
 */
export class LeadEnricher {
  private readonly stages: Stage[];

  constructor(private readonly apis: EnrichmentApis, private readonly options: EnricherOptions) {
    this.stages = [
      { name: 'domain', network: false, run: async (ctx) => this.domainStage(ctx) },
      { name: 'email_guess', network: false, run: async (ctx) => this.emailGuessStage(ctx) },
      { name: 'email_finder', network: true, run: (ctx, signal) => this.emailFinderStage(ctx, signal) },
      { name: 'email_verification', network: true, run: (ctx, signal) => this.emailVerificationStage(ctx, signal) },
      { name: 'company', network: true, run: (ctx, signal) => this.companyStage(ctx, signal) },
      { name: 'social', network: true, run: (ctx, signal) => this.socialStage(ctx, signal) },
      { name: 'phones', network: Boolean(apis.phoneValidator), run: (ctx, signal) => this.phoneStage(ctx, signal) },
      { name: 'scoring', network: false, run: async (ctx) => applied('scoring', { score: scoreLead(ctx.lead) }) },
      { name: 'normalization', network: false, run: async (ctx) => applied('normalization', normalizeLead(ctx.lead)) },
    ];
  }

  async enrich(lead: Lead, signal?: AbortSignal): Promise<Lead> {
    return (await this.enrichWithReport(lead, signal)).lead;
  }

  async enrichWithReport(lead: Lead, signal?: AbortSignal): Promise<EnrichmentReport> {
    let context: EnrichmentContext = { lead: cloneLead(lead) };
    const outcomes: StageOutcome[] = [];

    for (const stage of this.stages) {
      const outcome = await this.runStage(stage, context, signal);
      outcomes.push(outcome);
      context = applyOutcome(context, outcome);
    }
    return { lead: context.lead, outcomes };
  }

  private async runStage(stage: Stage, context: EnrichmentContext, signal?: AbortSignal): Promise<StageOutcome> {
    const alwaysRuns = stage.name === 'scoring' || stage.name === 'normalization';
    if (!this.options.enrichmentEnabled && !alwaysRuns) return skipped(stage.name, 'disabled');
    if (stage.network && signal?.aborted) return skipped(stage.name, 'cancelled');

    try {
      return await stage.run(context, signal);
    } catch (error) {
      if (error instanceof CancelledError || signal?.aborted) return skipped(stage.name, 'cancelled');
      const failure = error instanceof EnrichmentError ? error : new EnrichmentError('invalid_data', stage.name, errorMessage(error));
      log('WARN', `enrichment stage ${stage.name} failed`, { url: context.lead.url, kind: failure.kind, message: failure.message });
      return { stage: stage.name, status: 'failed', reason: failure.message, error: failure };
    }
  }

  private domainStage({ lead }: EnrichmentContext): StageOutcome {
    const domain = deriveDomain(lead);
    return domain ? applied('domain', { domain }) : skipped('domain', 'no company or website');
  }

  private emailGuessStage({ lead, domain }: EnrichmentContext): StageOutcome {
    if (!domain) return skipped('email_guess', 'no domain');
    const guesses = guessEmails(lead.name, domain);
    if (guesses.length === 0) return skipped('email_guess', 'name needs at least two tokens');
    return applied('email_guess', { emails: union(lead.emails, guesses) });
  }

  private async emailFinderStage({ lead, domain }: EnrichmentContext, signal?: AbortSignal): Promise<StageOutcome> {
    const finder = this.apis.emailFinder;
    if (!finder) return skipped('email_finder', 'not configured');
    if (!domain) return skipped('email_finder', 'no domain');
    const found = await finder.query({ domain }, signal);
    return applied('email_finder', { emails: union(lead.emails, found.map((email) => email.toLowerCase())) });
  }

  private async emailVerificationStage({ lead }: EnrichmentContext, signal?: AbortSignal): Promise<StageOutcome> {
    const verifier = this.apis.emailVerifier;
    if (!this.options.validateEmails) return skipped('email_verification', 'disabled');
    if (!verifier) return skipped('email_verification', 'not configured');
    if (lead.emails.length === 0) return skipped('email_verification', 'no emails');

    const kept: string[] = [];
    let failedOpen = 0;
    for (const email of lead.emails) {
      const cached = this.options.verdictCache?.get(email);
      if (cached !== undefined) {
        if (cached) kept.push(email);
        continue;
      }
      try {
        const valid = await verifier.query({ email }, signal);
        this.options.verdictCache?.set(email, valid);
        if (valid) kept.push(email);
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        failedOpen += 1;
        kept.push(email);
        log('WARN', 'email verification failed open', { email, message: errorMessage(error) });
      }
    }
    return applied('email_verification', { emails: kept }, failedOpen > 0 ? `${failedOpen} kept unverified` : undefined);
  }

  private async companyStage({ lead, domain }: EnrichmentContext, signal?: AbortSignal): Promise<StageOutcome> {
    const companyData = this.apis.companyData;
    if (!companyData) return skipped('company', 'not configured');
    if (lead.company) return skipped('company', 'already known');
    if (!domain) return skipped('company', 'no domain');
    const company = await companyData.query({ domain }, signal);
    return company ? applied('company', { company }) : skipped('company', 'no match');
  }

  private async socialStage({ lead }: EnrichmentContext, signal?: AbortSignal): Promise<StageOutcome> {
    const lookup = this.apis.socialLookup;
    if (!lookup) return skipped('social', 'not configured');
    if (!lead.name.trim()) return skipped('social', 'no name');
    const profiles = await lookup.query({ fullName: lead.name.trim(), company: lead.company }, signal);
    return applied('social', { socialProfiles: { ...lead.socialProfiles, ...profiles } });
  }

  private async phoneStage({ lead }: EnrichmentContext, signal?: AbortSignal): Promise<StageOutcome> {
    const extracted = extractPhones(lead.snippet);
    if (extracted.length === 0) return skipped('phones', 'no phone numbers');
    const validator = this.apis.phoneValidator;
    if (!validator) return applied('phones', { phones: union(lead.phones, extracted) });

    const confirmed: string[] = [];
    for (const phone of extracted) {
      try {
        if (await validator.query({ phone: normalizePhone(phone) }, signal)) confirmed.push(phone);
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        log('WARN', 'phone lookup failed, dropping number', { phone, message: errorMessage(error) });
      }
    }
    return applied('phones', { phones: union(lead.phones, confirmed) });
  }
}
