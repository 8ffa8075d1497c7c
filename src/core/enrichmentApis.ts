import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { isRecord, readStringField } from '../utils/guards';
import { RatePolicy, RateLimiterRegistry } from '../utils/rateLimiter';
import { ApiKeys } from './config';
import { CancelledError, EnrichmentError, errorMessage } from './errors';

export type EnrichmentService = 'hunter' | 'mailboxlayer' | 'clearbit' | 'fullcontact' | 'twilio';

export const ENRICHMENT_SERVICES: readonly EnrichmentService[] = ['hunter', 'mailboxlayer', 'clearbit', 'fullcontact', 'twilio'];

const SERVICE_INTERVALS_MS: Record<EnrichmentService, number> = {
  hunter: 500,
  mailboxlayer: 1000,
  clearbit: 1000,
  fullcontact: 2000,
  twilio: 1000,
};

export const isEnrichmentService = (name: string): name is EnrichmentService =>
  ENRICHMENT_SERVICES.some((service) => service === name);

export const enrichmentPolicy = (service: EnrichmentService): RatePolicy => ({
  minIntervalMs: SERVICE_INTERVALS_MS[service],
  jitterMs: [0, 0],
});

export interface EnrichmentApi<P, R> {
  readonly service: EnrichmentService;
  query(params: P, signal?: AbortSignal): Promise<R>;
}

export type EmailFinderApi = EnrichmentApi<{ domain: string }, string[]>;
export type EmailVerifierApi = EnrichmentApi<{ email: string }, boolean>;
export type CompanyDataApi = EnrichmentApi<{ domain: string }, string | undefined>;
export type SocialLookupApi = EnrichmentApi<{ fullName: string; company?: string }, Record<string, string>>;
export type PhoneValidatorApi = EnrichmentApi<{ phone: string }, boolean>;

export interface EnrichmentApis {
  emailFinder?: EmailFinderApi;
  emailVerifier?: EmailVerifierApi;
  companyData?: CompanyDataApi;
  socialLookup?: SocialLookupApi;
  phoneValidator?: PhoneValidatorApi;
}

export interface EnrichmentApiDeps {
  registry: RateLimiterRegistry;
  timeoutMs: number;
  client?: AxiosInstance;
}

interface ApiResponse {
  status: number;
  data: unknown;
}

export const toEnrichmentError = (service: EnrichmentService, error: unknown): EnrichmentError => {
  if (error instanceof EnrichmentError) return error;
  if (axios.isAxiosError(error) && error.response) {
    const { status } = error.response;
    if (status === 429) return new EnrichmentError('rate_limited', service, `${service} rate limited the request`);
    return new EnrichmentError('api_unavailable', service, `${service} answered HTTP ${status}`);
  }
  return new EnrichmentError('api_unavailable', service, `${service} request failed: ${errorMessage(error)}`);
};

abstract class PacedApi {
  abstract readonly service: EnrichmentService;
  private readonly client: AxiosInstance;

  constructor(protected readonly deps: EnrichmentApiDeps) {
    this.client = deps.client ?? axios.create();
  }

  /** Waits for the service's rate slot, then sends; 404 is returned, not thrown. */
  protected async send(config: AxiosRequestConfig, signal?: AbortSignal): Promise<ApiResponse> {
    await this.deps.registry.forSource(this.service).acquireSlot(signal);
    try {
      const response = await this.client.request<unknown>({
        ...config,
        signal,
        timeout: this.deps.timeoutMs,
        validateStatus: (status) => (status >= 200 && status < 300) || status === 404,
      });
      return { status: response.status, data: response.data };
    } catch (error) {
      if (signal?.aborted) throw new CancelledError();
      throw toEnrichmentError(this.service, error);
    }
  }

  protected invalid(message: string): EnrichmentError {
    return new EnrichmentError('invalid_data', this.service, `${this.service}: ${message}`);
  }
}

export class HunterEmailFinder extends PacedApi implements EmailFinderApi {
  readonly service = 'hunter' as const;

  constructor(private readonly apiKey: string, deps: EnrichmentApiDeps) {
    super(deps);
  }

  async query(params: { domain: string }, signal?: AbortSignal): Promise<string[]> {
    const { status, data } = await this.send({
      method: 'GET',
      url: 'https://api.hunter.io/v2/domain-search',
      params: { domain: params.domain, api_key: this.apiKey },
    }, signal);
    if (status === 404) return [];
    if (!isRecord(data) || !isRecord(data.data)) throw this.invalid('response has no data object');
    const { emails } = data.data;
    if (emails === undefined) return [];
    if (!Array.isArray(emails)) throw this.invalid('data.emails is not a list');
    return emails.flatMap((entry) => {
      const value = isRecord(entry) ? readStringField(entry, 'value') : undefined;
      return value ? [value.toLowerCase()] : [];
    });
  }
}

export class MailboxLayerVerifier extends PacedApi implements EmailVerifierApi {
  readonly service = 'mailboxlayer' as const;

  constructor(private readonly apiKey: string, deps: EnrichmentApiDeps) {
    super(deps);
  }

  async query(params: { email: string }, signal?: AbortSignal): Promise<boolean> {
    const { data } = await this.send({
      method: 'GET',
      url: 'http://apilayer.net/api/check',
      params: { email: params.email, access_key: this.apiKey },
    }, signal);
    if (!isRecord(data)) throw this.invalid('response is not an object');
    if (data.success === false) {
      throw new EnrichmentError('api_unavailable', this.service, `${this.service} rejected the request`);
    }
    if (typeof data.format_valid !== 'boolean' || typeof data.mx_found !== 'boolean') {
      throw this.invalid('format_valid and mx_found must be booleans');
    }
    return data.format_valid && data.mx_found;
  }
}

export class ClearbitCompanyData extends PacedApi implements CompanyDataApi {
  readonly service = 'clearbit' as const;

  constructor(private readonly apiKey: string, deps: EnrichmentApiDeps) {
    super(deps);
  }

  async query(params: { domain: string }, signal?: AbortSignal): Promise<string | undefined> {
    const { status, data } = await this.send({
      method: 'GET',
      url: 'https://company.clearbit.com/v2/companies/find',
      params: { domain: params.domain },
      headers: { Authorization: `Bearer ${this.apiKey}` },
    }, signal);
    if (status === 404) return undefined;
    if (!isRecord(data)) throw this.invalid('response is not an object');
    return readStringField(data, 'name');
  }
}

export class FullContactSocialLookup extends PacedApi implements SocialLookupApi {
  readonly service = 'fullcontact' as const;

  constructor(private readonly apiKey: string, deps: EnrichmentApiDeps) {
    super(deps);
  }

  async query(params: { fullName: string; company?: string }, signal?: AbortSignal): Promise<Record<string, string>> {
    const { status, data } = await this.send({
      method: 'POST',
      url: 'https://api.fullcontact.com/v3/person.enrich',
      data: params.company ? { fullName: params.fullName, company: params.company } : { fullName: params.fullName },
      headers: { Authorization: `Bearer ${this.apiKey}` },
    }, signal);
    if (status === 404) return {};
    if (!isRecord(data)) throw this.invalid('response is not an object');
    const { socialProfiles } = data;
    if (socialProfiles === undefined) return {};
    if (!Array.isArray(socialProfiles)) throw this.invalid('socialProfiles is not a list');

    const profiles: Record<string, string> = {};
    for (const profile of socialProfiles) {
      if (!isRecord(profile)) continue;
      const type = readStringField(profile, 'type');
      const url = readStringField(profile, 'url');
      if (type && url) profiles[type.toLowerCase()] = url;
    }
    return profiles;
  }
}

export class TwilioPhoneValidator extends PacedApi implements PhoneValidatorApi {
  readonly service = 'twilio' as const;

  constructor(private readonly accountSid: string, private readonly authToken: string, deps: EnrichmentApiDeps) {
    super(deps);
  }

  async query(params: { phone: string }, signal?: AbortSignal): Promise<boolean> {
    const { status } = await this.send({
      method: 'GET',
      url: `https://lookups.twilio.com/v1/PhoneNumbers/${encodeURIComponent(params.phone)}`,
      auth: { username: this.accountSid, password: this.authToken },
    }, signal);
    return status !== 404;
  }
}

/** One client per configured key; services without a key are left out. */
export const createEnrichmentApis = (keys: ApiKeys, deps: EnrichmentApiDeps): EnrichmentApis => ({
  emailFinder: keys.hunter ? new HunterEmailFinder(keys.hunter, deps) : undefined,
  emailVerifier: keys.mailboxLayer ? new MailboxLayerVerifier(keys.mailboxLayer, deps) : undefined,
  companyData: keys.clearbit ? new ClearbitCompanyData(keys.clearbit, deps) : undefined,
  socialLookup: keys.fullContact ? new FullContactSocialLookup(keys.fullContact, deps) : undefined,
  phoneValidator: keys.twilioSid && keys.twilioToken ? new TwilioPhoneValidator(keys.twilioSid, keys.twilioToken, deps) : undefined,
});
