import { SourceAcquirer } from '../adapters/sourceBase';
import { log } from '../utils/logger';
import { Clock, systemClock } from '../utils/timing';
import { AcquisitionError, CancelledError, errorMessage } from './errors';
import { expandQuery } from './queryExpander';
import { ExpandedQuery, Lead, Query, RawHit, SourceName, SourceStats } from './types';

export type OrchestratorState = 'idle' | 'expanding' | 'dispatching' | 'merging' | 'done';

const TRANSITIONS: Record<OrchestratorState, OrchestratorState[]> = {
  idle: ['expanding'],
  expanding: ['dispatching'],
  dispatching: ['merging'],
  merging: ['done'],
  done: [],
};

export class InvalidTransitionError extends Error {
  constructor(from: OrchestratorState, to: OrchestratorState) {
    super(`Invalid orchestrator transition: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export interface OrchestratorOptions {
  expansionDepth: number;
  maxAttempts: number;
  retryDelayMs: number;
  maxResults: number;
  clock?: Clock;
}

export interface OrchestrationResult {
  leads: Lead[];
  regions: string[];
  expandedQueries: number;
  stats: Partial<Record<SourceName, SourceStats>>;
  cancelled: boolean;
  allSourcesFailed: boolean;
}

/** Location searched for one country: "<location>, <CC>" for city-style input, else the bare code. */
export const regionalLocation = (location: string, countryCode: string): string =>
  (location.includes(',') ? `${location}, ${countryCode}` : countryCode);

export const seedLead = (hit: RawHit): Lead => ({
  name: hit.name ?? '',
  url: hit.url,
  title: hit.title,
  company: hit.company,
  location: hit.location,
  snippet: hit.snippet,
  emails: [],
  phones: [],
  socialProfiles: {},
  score: 0,
  source: hit.source,
  discoveredAt: hit.discoveredAt,
});

/** Concatenates batches in order and keeps the first lead seen for every url. */
export const mergeHits = (batches: readonly RawHit[][]): Lead[] => {
  const seen = new Set<string>();
  const leads: Lead[] = [];
  for (const batch of batches) {
    for (const hit of batch) {
      if (!hit.url || seen.has(hit.url)) continue;
      seen.add(hit.url);
      leads.push(seedLead(hit));
    }
  }
  return leads;
};

/**
 * Drives one acquisition run: expand the query per region, fan out every
 * acquirer for a region in parallel, then merge. A failing source never
 * aborts the others; the run always ends with a (possibly empty) list.
 */
export class Orchestrator {
  private current: OrchestratorState = 'idle';
  private readonly stats = new Map<SourceName, SourceStats>();
  private readonly succeeded = new Set<SourceName>();
  private readonly clock: Clock;

  constructor(private readonly acquirers: readonly SourceAcquirer[], private readonly options: OrchestratorOptions) {
    this.clock = options.clock ?? systemClock;
    for (const acquirer of acquirers) {
      this.stats.set(acquirer.name, { attempts: 0, hits: 0, failures: 0 });
    }
  }

  get state(): OrchestratorState {
    return this.current;
  }

  private transition(next: OrchestratorState): void {
    if (!TRANSITIONS[this.current].includes(next)) throw new InvalidTransitionError(this.current, next);
    log('DEBUG', `orchestrator ${this.current} -> ${next}`);
    this.current = next;
  }

  expand(query: Query, regions: readonly string[]): ExpandedQuery[] {
    const triples = regions.length > 0
      ? regions.map((region) => ({ region, query: { ...query, location: regionalLocation(query.location, region) } }))
      : [{ region: undefined, query }];

    return triples.map(({ region, query: triple }) => ({
      query: Object.freeze(triple),
      region,
      ...expandQuery(triple.jobTitle, triple.industry, triple.location, this.options.expansionDepth),
    }));
  }

  async run(query: Query, regions: readonly string[] = [], signal?: AbortSignal): Promise<OrchestrationResult> {
    this.transition('expanding');
    const expanded = this.expand(query, regions);
    log('INFO', `expanded query into ${expanded.length} regional quer${expanded.length === 1 ? 'y' : 'ies'}`, {
      titles: expanded[0]?.titles,
      industries: expanded[0]?.industries,
    });

    this.transition('dispatching');
    const batches: RawHit[][] = [];
    for (const regional of expanded) {
      if (signal?.aborted) break;
      const results = await Promise.all(this.acquirers.map((acquirer) => this.acquireWithRetry(acquirer, regional, signal)));
      batches.push(...results);
    }

    this.transition('merging');
    const leads = mergeHits(batches).slice(0, this.options.maxResults);
    const cancelled = signal?.aborted === true;
    const allSourcesFailed = !cancelled && this.acquirers.length > 0 && this.succeeded.size === 0;
    if (allSourcesFailed) log('WARN', 'all sources failed; returning an empty lead list');

    const stats: Partial<Record<SourceName, SourceStats>> = {};
    for (const [name, sourceStats] of this.stats) stats[name] = { ...sourceStats };

    this.transition('done');
    return {
      leads,
      regions: [...regions],
      expandedQueries: expanded.length,
      stats,
      cancelled,
      allSourcesFailed,
    };
  }

  private async acquireWithRetry(acquirer: SourceAcquirer, expanded: ExpandedQuery, signal?: AbortSignal): Promise<RawHit[]> {
    const stats = this.stats.get(acquirer.name) ?? { attempts: 0, hits: 0, failures: 0 };
    this.stats.set(acquirer.name, stats);

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt += 1) {
      if (signal?.aborted) return [];
      stats.attempts += 1;
      try {
        const hits = await acquirer.acquire(expanded, signal);
        stats.hits += hits.length;
        this.succeeded.add(acquirer.name);
        return hits;
      } catch (error) {
        if (error instanceof CancelledError || signal?.aborted) return [];
        const failure = error instanceof AcquisitionError ? error : new AcquisitionError('transport', acquirer.name, errorMessage(error));
        stats.failures += 1;
        stats.lastError = `${failure.kind}: ${failure.message}`;
        const willRetry = failure.retryable && attempt < this.options.maxAttempts;
        log('WARN', `[${acquirer.name}] attempt ${attempt}/${this.options.maxAttempts} failed`, {
          kind: failure.kind,
          message: failure.message,
          region: expanded.region,
          willRetry,
        });
        if (!willRetry) return [];
        if (!(await this.pauseBeforeRetry(signal))) return [];
      }
    }
    return [];
  }

  private async pauseBeforeRetry(signal?: AbortSignal): Promise<boolean> {
    try {
      await this.clock.sleep(this.options.retryDelayMs, signal);
      return true;
    } catch (error) {
      if (error instanceof CancelledError) return false;
      throw error;
    }
  }
}
