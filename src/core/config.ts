import { existsSync, readFileSync } from 'node:fs';
import { ConfigError } from './errors';
import { LoginCredentials, SOURCE_NAMES, SourceName } from './types';

export interface ApiKeys {
  scrapingBee?: string;
  hunter?: string;
  clearbit?: string;
  fullContact?: string;
  mailboxLayer?: string;
  twilioSid?: string;
  twilioToken?: string;
}

export interface PipelineConfig {
  maxResults: number;
  delayRangeMs: [number, number];
  requestTimeoutMs: number;
  maxAttempts: number; // total acquisition attempts per source, first try included
  retryDelayMs: number;
  expansionDepth: number;
  queryVariantsPerSource: number;
  professionalNetworkRpm: number;
  proxyEnabled: boolean;
  proxies: string[];
  headless: boolean;
  enrichmentEnabled: boolean;
  validateEmails: boolean;
  maxBrowserSessions: number;
  enrichmentConcurrency: number;
  cacheTtlMs: number;
  cacheMaxEntries: number;
  sources: SourceName[];
  apiKeys: ApiKeys;
  linkedinLogin?: LoginCredentials;
}

export interface ServiceConfig {
  port: number;
  apiKey?: string;
  requestTimeoutMs: number;
  outputDir: string;
}

export interface AppConfig {
  pipeline: PipelineConfig;
  service: ServiceConfig;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  maxResults: 500,
  delayRangeMs: [500, 2500],
  requestTimeoutMs: 30_000,
  maxAttempts: 3,
  retryDelayMs: 5_000,
  expansionDepth: 3,
  queryVariantsPerSource: 2,
  professionalNetworkRpm: 5,
  proxyEnabled: false,
  proxies: [],
  headless: true,
  enrichmentEnabled: true,
  validateEmails: true,
  maxBrowserSessions: 2,
  enrichmentConcurrency: 5,
  cacheTtlMs: 900_000,
  cacheMaxEntries: 200,
  sources: [...SOURCE_NAMES],
  apiKeys: {},
  linkedinLogin: undefined,
};

const readString = (env: Env, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

const readNumber = (env: Env, key: string, fallback: number): number => {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError('invalid_range', `${key} must be a number, got "${raw}"`);
  }
  return value;
};

const readPositiveInt = (env: Env, key: string, fallback: number, max?: number): number => {
  const value = readNumber(env, key, fallback);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError('invalid_range', `${key} must be a positive integer`);
  }
  if (max !== undefined && value > max) {
    throw new ConfigError('invalid_range', `${key} must be <= ${max}`);
  }
  return value;
};

const readBoolean = (env: Env, key: string, fallback: boolean): boolean => {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  return raw.toLowerCase() === 'true';
};

const readDelayRange = (env: Env): [number, number] => {
  const raw = readString(env, 'DELAY_RANGE');
  if (raw === undefined) return DEFAULT_PIPELINE_CONFIG.delayRangeMs;
  const parts = raw.split(',').map((part) => Number(part.trim()));
  if (parts.length !== 2 || parts.some((part) => !Number.isFinite(part))) {
    throw new ConfigError('invalid_range', 'DELAY_RANGE must look like "min,max" in seconds');
  }
  const [min, max] = parts;
  if (min < 0.3 || max < min) {
    throw new ConfigError('invalid_range', `DELAY_RANGE ${raw} is invalid: min must be >= 0.3 and max >= min`);
  }
  return [Math.round(min * 1000), Math.round(max * 1000)];
};

const readProxies = (env: Env): string[] => {
  const source = readString(env, 'PROXY_LIST');
  if (!source) return [];
  const lines = existsSync(source) ? readFileSync(source, 'utf8').split(/\r?\n/) : source.split(',');
  return lines.map((line) => line.trim()).filter((line) => line && !line.startsWith('#'));
};

const readSources = (env: Env): SourceName[] => {
  const raw = readString(env, 'SOURCES');
  if (!raw) return [...SOURCE_NAMES];
  const names = raw.split(',').map((name) => name.trim().toLowerCase()).filter(Boolean);
  const sources: SourceName[] = [];
  for (const name of names) {
    const known = SOURCE_NAMES.find((candidate) => candidate === name);
    if (!known) throw new ConfigError('invalid_range', `SOURCES contains unsupported source "${name}"`);
    if (!sources.includes(known)) sources.push(known);
  }
  if (sources.length === 0) throw new ConfigError('invalid_range', 'SOURCES must name at least one source');
  return sources;
};

const readLogin = (env: Env): LoginCredentials | undefined => {
  const email = readString(env, 'LINKEDIN_EMAIL');
  const password = readString(env, 'LINKEDIN_PASSWORD');
  if (!email && !password) return undefined;
  if (!email || !password) {
    throw new ConfigError('invalid_range', 'LINKEDIN_EMAIL and LINKEDIN_PASSWORD must be set together');
  }
  return { email, password };
};

export const loadPipelineConfig = (env: Env = process.env): PipelineConfig => {
  const proxyEnabled = readBoolean(env, 'PROXY_ENABLED', false);
  const proxies = proxyEnabled ? readProxies(env) : [];
  if (proxyEnabled && proxies.length === 0) {
    throw new ConfigError('missing_required_proxy', 'PROXY_ENABLED is true but PROXY_LIST provided no proxies');
  }
  const retryDelaySeconds = readNumber(env, 'RETRY_DELAY_SECONDS', 5);
  if (retryDelaySeconds < 0) throw new ConfigError('invalid_range', 'RETRY_DELAY_SECONDS must be >= 0');

  return {
    maxResults: readPositiveInt(env, 'MAX_RESULTS', DEFAULT_PIPELINE_CONFIG.maxResults, 1000),
    delayRangeMs: readDelayRange(env),
    requestTimeoutMs: readPositiveInt(env, 'REQUEST_TIMEOUT', 30) * 1000,
    maxAttempts: readPositiveInt(env, 'MAX_RETRIES', DEFAULT_PIPELINE_CONFIG.maxAttempts),
    retryDelayMs: Math.round(retryDelaySeconds * 1000),
    expansionDepth: readPositiveInt(env, 'AI_EXPANSION_DEPTH', DEFAULT_PIPELINE_CONFIG.expansionDepth),
    queryVariantsPerSource: readPositiveInt(env, 'QUERY_VARIANTS_PER_SOURCE', DEFAULT_PIPELINE_CONFIG.queryVariantsPerSource),
    professionalNetworkRpm: readPositiveInt(env, 'LINKEDIN_RPM', DEFAULT_PIPELINE_CONFIG.professionalNetworkRpm, 60),
    proxyEnabled,
    proxies,
    headless: readBoolean(env, 'HEADLESS', true),
    enrichmentEnabled: readBoolean(env, 'AI_ENRICHMENT', true),
    validateEmails: readBoolean(env, 'VALIDATE_EMAILS', true),
    maxBrowserSessions: readPositiveInt(env, 'MAX_BROWSER_SESSIONS', DEFAULT_PIPELINE_CONFIG.maxBrowserSessions),
    enrichmentConcurrency: readPositiveInt(env, 'ENRICHMENT_CONCURRENCY', DEFAULT_PIPELINE_CONFIG.enrichmentConcurrency),
    cacheTtlMs: readPositiveInt(env, 'CACHE_TTL_SECONDS', 900) * 1000,
    cacheMaxEntries: readPositiveInt(env, 'CACHE_MAX_ENTRIES', DEFAULT_PIPELINE_CONFIG.cacheMaxEntries),
    sources: readSources(env),
    apiKeys: {
      scrapingBee: readString(env, 'SCRAPINGBEE_API_KEY'),
      hunter: readString(env, 'HUNTER_API_KEY'),
      clearbit: readString(env, 'CLEARBIT_API_KEY'),
      fullContact: readString(env, 'FULLCONTACT_API_KEY'),
      mailboxLayer: readString(env, 'MAILBOXLAYER_API_KEY'),
      twilioSid: readString(env, 'TWILIO_ACCOUNT_SID'),
      twilioToken: readString(env, 'TWILIO_AUTH_TOKEN'),
    },
    linkedinLogin: readLogin(env),
  };
};

export const loadConfig = (env: Env = process.env): AppConfig => ({
  pipeline: loadPipelineConfig(env),
  service: {
    port: readPositiveInt(env, 'PORT', 3000, 65535),
    apiKey: readString(env, 'API_KEY'),
    requestTimeoutMs: readPositiveInt(env, 'REQUEST_TIMEOUT_MS', 600_000),
    outputDir: readString(env, 'OUTPUT_DIR') || '.',
  },
});
