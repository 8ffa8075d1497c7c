import pLimit from 'p-limit';
import { cheerioParser } from '../adapters/parserSupport';
import { SourceAcquirer } from '../adapters/sourceBase';
import { BoundedCache } from '../utils/boundedCache';
import { PlaywrightBrowserPool } from '../utils/browserPool';
import { BypassApiFetcher, HttpFetcher } from '../utils/httpClient';
import { log } from '../utils/logger';
import { ProxyPool } from '../utils/proxyPool';
import { RatePolicy, RateLimiterRegistry, policyFromDelayRange, policyFromRpm } from '../utils/rateLimiter';
import { Clock, RandomSource, systemClock } from '../utils/timing';
import { BrowserFactory, DEFAULT_PACING, FetchCollaborator, HumanPacingProfile, ParserCollaborator } from './collaborators';
import { PipelineConfig } from './config';
import { EnrichmentApis, createEnrichmentApis, enrichmentPolicy, isEnrichmentService } from './enrichmentApis';
import { EnrichmentReport, LeadEnricher } from './leadEnricher';
import { Orchestrator } from './orchestrator';
import { aggregateLeads } from './resultAggregator';
import { createSourceAcquirers } from './sourceFactory';
import { PipelineResult, Query, RawHit, RunSummary } from './types';

const ENRICHING_STAGES = new Set(['domain', 'email_guess', 'email_finder', 'email_verification', 'company', 'social', 'phones']);

/** Collaborators a caller may swap out; everything left undefined is built from the config. */
export interface PipelineDeps {
  clock?: Clock;
  random?: RandomSource;
  parser?: ParserCollaborator;
  browsers?: BrowserFactory;
  httpFetcher?: FetchCollaborator;
  apiFetcher?: FetchCollaborator;
  enrichmentApis?: EnrichmentApis;
  acquirers?: (pipeline: PipelineResources) => SourceAcquirer[];
  pacing?: HumanPacingProfile;
}

export interface PipelineResources {
  registry: RateLimiterRegistry;
  proxies: ProxyPool;
  hitCache: BoundedCache<RawHit[]>;
  verdictCache: BoundedCache<boolean>;
}

export const resolveRatePolicy = (config: PipelineConfig) => (name: string): RatePolicy => {
  if (name === 'linkedin') return policyFromRpm(config.professionalNetworkRpm);
  if (isEnrichmentService(name)) return enrichmentPolicy(name);
  return policyFromDelayRange(config.delayRangeMs);
};

const wasEnriched = (report: EnrichmentReport): boolean =>
  report.outcomes.some((outcome) => outcome.status === 'applied' && ENRICHING_STAGES.has(outcome.stage));

/**
 * One pipeline per process. Limiters, proxies, caches and the browser are
 * shared by every run, so concurrent runs still respect per-source pacing.
 */
export class LeadPipeline {
  readonly resources: PipelineResources;
  private readonly acquirers: SourceAcquirer[];
  private readonly enricher: LeadEnricher;
  private readonly browsers: BrowserFactory;
  private readonly clock: Clock;

  constructor(private readonly config: PipelineConfig, deps: PipelineDeps = {}) {
    this.clock = deps.clock ?? systemClock;
    const random = deps.random ?? Math.random;

    this.resources = {
      registry: new RateLimiterRegistry(resolveRatePolicy(config), this.clock, random),
      proxies: new ProxyPool(config.proxies, config.proxyEnabled),
      hitCache: new BoundedCache<RawHit[]>({ maxEntries: config.cacheMaxEntries, ttlMs: config.cacheTtlMs }, this.clock),
      verdictCache: new BoundedCache<boolean>({ maxEntries: config.cacheMaxEntries, ttlMs: config.cacheTtlMs }, this.clock),
    };
    this.browsers = deps.browsers ?? new PlaywrightBrowserPool({
      headless: config.headless,
      maxSessions: config.maxBrowserSessions,
      random,
    });

    const { scrapingBee } = config.apiKeys;
    this.acquirers = deps.acquirers
      ? deps.acquirers(this.resources)
      : createSourceAcquirers(config.sources, {
        settings: {
          queryVariantsPerSource: config.queryVariantsPerSource,
          requestTimeoutMs: config.requestTimeoutMs,
          proxyEnabled: config.proxyEnabled,
          maxResults: config.maxResults,
          linkedinLogin: config.linkedinLogin,
        },
        registry: this.resources.registry,
        proxies: this.resources.proxies,
        parser: deps.parser ?? cheerioParser,
        browsers: this.browsers,
        httpFetcher: deps.httpFetcher ?? new HttpFetcher(),
        apiFetcher: deps.apiFetcher ?? (scrapingBee ? new BypassApiFetcher(scrapingBee) : undefined),
        cache: this.resources.hitCache,
        clock: this.clock,
        random,
        pacing: deps.pacing ?? DEFAULT_PACING,
      });

    const apis = deps.enrichmentApis ?? createEnrichmentApis(config.apiKeys, {
      registry: this.resources.registry,
      timeoutMs: config.requestTimeoutMs,
    });
    this.enricher = new LeadEnricher(apis, {
      enrichmentEnabled: config.enrichmentEnabled,
      validateEmails: config.validateEmails,
      verdictCache: this.resources.verdictCache,
    });
  }

  get sourceNames(): string[] {
    return this.acquirers.map((acquirer) => acquirer.name);
  }

  async run(query: Query, regions: readonly string[] = [], signal?: AbortSignal): Promise<PipelineResult> {
    const startedAt = this.clock.now();
    const orchestrator = new Orchestrator(this.acquirers, {
      expansionDepth: this.config.expansionDepth,
      maxAttempts: this.config.maxAttempts,
      retryDelayMs: this.config.retryDelayMs,
      maxResults: this.config.maxResults,
      clock: this.clock,
    });
    const acquired = await orchestrator.run(query, regions, signal);
    log('INFO', `merged ${acquired.leads.length} unique leads`, { regions: acquired.regions.length || 'global' });

    const limit = pLimit(this.config.enrichmentConcurrency);
    const reports = await Promise.all(acquired.leads.map((lead) => limit(() => this.enricher.enrichWithReport(lead, signal))));
    const leads = aggregateLeads(reports.map((report) => report.lead));
    const cancelled = acquired.cancelled || signal?.aborted === true;

    const summary: RunSummary = {
      regions: acquired.regions,
      expandedQueries: acquired.expandedQueries,
      sources: acquired.stats,
      mergedCount: acquired.leads.length,
      enrichedCount: reports.filter(wasEnriched).length,
      cancelled,
      allSourcesFailed: acquired.allSourcesFailed,
      durationMs: this.clock.now() - startedAt,
    };
    log(cancelled ? 'WARN' : 'INFO', `${cancelled ? 'cancelled run' : 'run'} finished with ${leads.length} leads`, {
      enriched: summary.enrichedCount,
      durationMs: summary.durationMs,
    });
    return { leads, summary };
  }

  async close(): Promise<void> {
    await this.browsers.close();
  }
}
