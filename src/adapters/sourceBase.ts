import { BrowserCollaborator, BrowserFactory, FetchCollaborator, HumanPacingProfile, ParsedRecord, ParserCollaborator, SourceSchema } from '../core/collaborators';
import { AcquisitionError, CancelledError, FetchError, errorMessage } from '../core/errors';
import { LanguageProfile, getLanguage } from '../core/localization';
import { ExpandedQuery, LoginCredentials, RawHit, SourceName } from '../core/types';
import { BoundedCache } from '../utils/boundedCache';
import { log } from '../utils/logger';
import { ProxyPool, toProxyUrl } from '../utils/proxyPool';
import { RateLimiter } from '../utils/rateLimiter';
import { Clock, RandomSource, randomBetween } from '../utils/timing';
import { findBlockingPhrase, hasCaptchaMarker } from './common';

export interface SourceAcquirer {
  readonly name: SourceName;
  acquire(expanded: ExpandedQuery, signal?: AbortSignal): Promise<RawHit[]>;
}

export interface AcquirerSettings {
  queryVariantsPerSource: number;
  requestTimeoutMs: number;
  proxyEnabled: boolean;
  maxResults: number;
  linkedinLogin?: LoginCredentials;
}

export interface AcquirerDeps {
  settings: AcquirerSettings;
  limiter: RateLimiter;
  proxies: ProxyPool;
  parser: ParserCollaborator;
  browsers: BrowserFactory;
  httpFetcher: FetchCollaborator;
  /** Present only when a bypass API key is configured. */
  apiFetcher?: FetchCollaborator;
  cache: BoundedCache<RawHit[]>;
  clock: Clock;
  random: RandomSource;
  pacing: HumanPacingProfile;
}

export interface SearchTerm {
  title: string;
  industry: string;
  location: string;
}

export type FetchStrategy = 'api' | 'direct' | 'browser';

/**
 * Pairs the i-th title with the i-th industry and location, cycling the
 * shorter lists. Falls back to the original query when a list is empty.
 */
export const buildSearchTerms = (expanded: ExpandedQuery, limit: number): SearchTerm[] => {
  const { query } = expanded;
  const titles = expanded.titles.length > 0 ? expanded.titles : [query.jobTitle];
  const industries = expanded.industries.length > 0 ? expanded.industries : [query.industry];
  const locations = expanded.locations.length > 0 ? expanded.locations : [query.location];
  const count = Math.max(1, Math.min(limit, titles.length));

  const terms: SearchTerm[] = [];
  const seen = new Set<string>();
  for (let i = 0; i < count; i += 1) {
    const term = {
      title: titles[i % titles.length],
      industry: industries[i % industries.length],
      location: locations[i % locations.length],
    };
    const key = `${term.title}\u0000${term.industry}\u0000${term.location}`.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    terms.push(term);
  }
  return terms;
};

const throwIfCancelled = (signal?: AbortSignal): void => {
  if (signal?.aborted) throw new CancelledError();
};

export abstract class BaseSourceAcquirer implements SourceAcquirer {
  abstract readonly name: SourceName;
  protected abstract readonly schema: SourceSchema;
  protected abstract readonly blockingPhrases: readonly string[];
  protected readonly captchaSelector?: string;

  constructor(protected readonly deps: AcquirerDeps) {}

  protected abstract buildUrl(term: SearchTerm, language: LanguageProfile): string;

  /** Maps one parsed result to a hit; `null` drops it. */
  protected abstract toHit(record: ParsedRecord, discoveredAt: string): RawHit | null;

  /** Runs at the start of every browser session, before the search page is opened. */
  protected async prepareSession(_session: BrowserCollaborator, _signal?: AbortSignal): Promise<void> {}

  protected strategies(): FetchStrategy[] {
    return this.deps.apiFetcher ? ['api'] : ['browser'];
  }

  async acquire(expanded: ExpandedQuery, signal?: AbortSignal): Promise<RawHit[]> {
    const language = getLanguage(expanded.query.languageCode);
    const urls = [...new Set(buildSearchTerms(expanded, this.deps.settings.queryVariantsPerSource).map((term) => this.buildUrl(term, language)))];

    const hits: RawHit[] = [];
    const seen = new Set<string>();
    for (const url of urls) {
      throwIfCancelled(signal);
      for (const hit of await this.acquireUrl(url, language, signal)) {
        if (seen.has(hit.url)) continue;
        seen.add(hit.url);
        hits.push(hit);
      }
    }
    log('INFO', `[${this.name}] acquired ${hits.length} hits`, { location: expanded.query.location, pages: urls.length });
    return hits;
  }

  /** Pages that produced a result list, empty or not, are cached; failures are not. */
  private acquireUrl(url: string, language: LanguageProfile, signal?: AbortSignal): Promise<RawHit[]> {
    return this.deps.cache.getOrSet(url, () => this.fetchPage(url, language, signal));
  }

  private async fetchPage(url: string, language: LanguageProfile, signal?: AbortSignal): Promise<RawHit[]> {
    let failure: AcquisitionError | undefined;
    let emptyPage = false;
    for (const strategy of this.strategies()) {
      try {
        const hits = await this.fetchWith(strategy, url, language, signal);
        if (hits.length > 0) return hits;
        emptyPage = true;
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        failure = error instanceof AcquisitionError ? error : new AcquisitionError('transport', this.name, errorMessage(error));
        log('WARN', `[${this.name}] ${strategy} strategy failed`, `${failure.kind}: ${failure.message}`);
      }
    }

    if (emptyPage) return [];
    throw failure ?? new AcquisitionError('parse_empty', this.name, `no strategy produced a page for ${url}`);
  }

  private async fetchWith(strategy: FetchStrategy, url: string, language: LanguageProfile, signal?: AbortSignal): Promise<RawHit[]> {
    await this.deps.limiter.acquireSlot(signal);
    const proxy = strategy === 'api' ? undefined : this.deps.proxies.next();
    const proxyUrl = proxy ? toProxyUrl(proxy.address) : undefined;
    const { settings } = this.deps;

    try {
      let markup: string;
      if (strategy === 'browser') {
        markup = await this.fetchWithBrowser(url, language, proxyUrl, signal);
      } else {
        const fetcher = strategy === 'api' ? this.deps.apiFetcher : this.deps.httpFetcher;
        if (!fetcher) throw new AcquisitionError('transport', this.name, `${strategy} fetcher is not configured`);
        markup = await fetcher.fetch(url, {
          proxy: proxyUrl,
          renderJs: strategy === 'api',
          waitSelector: this.schema.container,
          premiumProxy: settings.proxyEnabled,
          languageCode: language.code,
          timeoutMs: settings.requestTimeoutMs,
          signal,
        });
      }
      return this.parseMarkup(markup);
    } catch (error) {
      if (signal?.aborted) throw new CancelledError();
      if (error instanceof FetchError) {
        if (proxy) this.deps.proxies.markFailed(proxy);
        throw new AcquisitionError('transport', this.name, error.message);
      }
      throw error;
    }
  }

  private fetchWithBrowser(url: string, language: LanguageProfile, proxy: string | undefined, signal?: AbortSignal): Promise<string> {
    const { clock, random, pacing, settings } = this.deps;
    return this.deps.browsers.withSession({ proxy, languageCode: language.code, signal }, async (session) => {
      await this.prepareSession(session, signal);
      await clock.sleep(randomBetween(pacing.navigationDelayMs, random), signal);
      await session.navigate(url, settings.requestTimeoutMs);
      await session.simulateHumanActivity(pacing);
      await session.waitFor(this.schema.container, settings.requestTimeoutMs);
      if (this.captchaSelector && await session.detectMarker(this.captchaSelector)) {
        throw new AcquisitionError('blocked', this.name, `captcha marker ${this.captchaSelector} present`);
      }
      await clock.sleep(randomBetween(pacing.settleDelayMs, random), signal);
      return session.pageSource();
    });
  }

  protected parseMarkup(markup: string): RawHit[] {
    if (this.captchaSelector && hasCaptchaMarker(markup, this.captchaSelector)) {
      throw new AcquisitionError('blocked', this.name, `captcha marker ${this.captchaSelector} present`);
    }

    const result = this.deps.parser.parse(markup, this.schema);
    if (!result.containerFound) {
      const phrase = findBlockingPhrase(markup, this.blockingPhrases);
      if (phrase) throw new AcquisitionError('blocked', this.name, `blocking page detected: "${phrase}"`);
      throw new AcquisitionError('parse_empty', this.name, `result container ${this.schema.container} not found`);
    }

    const discoveredAt = new Date(this.deps.clock.now()).toISOString();
    const hits: RawHit[] = [];
    for (const record of result.hits) {
      const hit = this.toHit(record, discoveredAt);
      if (hit) hits.push(hit);
    }
    return hits;
  }
}
