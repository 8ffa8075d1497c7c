export type SourceName = 'linkedin' | 'google' | 'baidu';

export const SOURCE_NAMES: readonly SourceName[] = ['linkedin', 'google', 'baidu'];

export interface LoginCredentials {
  email: string;
  password: string;
}

export interface LeadRequest {
  jobTitle: string;
  industry: string;
  location: string;
  language?: string; // language code, defaults to "en"
  region?: string; // continent name or "Global"
  regions?: string[]; // explicit ISO country codes, wins over region
}

export interface Query {
  readonly jobTitle: string;
  readonly industry: string;
  readonly location: string;
  readonly languageCode: string;
}

export interface ExpandedQuery {
  readonly query: Query;
  readonly region?: string;
  readonly titles: readonly string[];
  readonly industries: readonly string[];
  readonly locations: readonly string[];
}

export interface RawHit {
  source: SourceName;
  url: string;
  title: string;
  snippet: string;
  name?: string;
  company?: string;
  location?: string;
  discoveredAt: string;
}

export interface ProxyEntry {
  readonly address: string;
  failed: boolean;
}

export interface Lead {
  name: string;
  url: string;
  title: string;
  company?: string;
  location?: string;
  snippet: string;
  emails: string[];
  phones: string[];
  socialProfiles: Record<string, string>; // { twitter: "...", github: "..." }
  score: number; // 0-1
  source: SourceName;
  discoveredAt: string;
}

export interface SourceStats {
  attempts: number;
  hits: number;
  failures: number;
  lastError?: string;
}

export interface RunSummary {
  regions: string[];
  expandedQueries: number;
  sources: Partial<Record<SourceName, SourceStats>>;
  mergedCount: number;
  enrichedCount: number;
  cancelled: boolean;
  allSourcesFailed: boolean;
  durationMs: number;
}

export interface PipelineResult {
  leads: readonly Readonly<Lead>[];
  summary: RunSummary;
}
