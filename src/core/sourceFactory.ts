import { BaiduAcquirer } from '../adapters/baidu';
import { GoogleAcquirer } from '../adapters/google';
import { LinkedInAcquirer } from '../adapters/linkedin';
import { AcquirerDeps, SourceAcquirer } from '../adapters/sourceBase';
import { RateLimiterRegistry } from '../utils/rateLimiter';
import { SourceName } from './types';

export type SharedAcquirerDeps = Omit<AcquirerDeps, 'limiter'> & { registry: RateLimiterRegistry };

const constructors: Record<SourceName, new (deps: AcquirerDeps) => SourceAcquirer> = {
  linkedin: LinkedInAcquirer,
  google: GoogleAcquirer,
  baidu: BaiduAcquirer,
};

/** Builds acquirers in the given order; each gets the registry's limiter for its own name. */
export const createSourceAcquirers = (names: readonly SourceName[], shared: SharedAcquirerDeps): SourceAcquirer[] => {
  const { registry, ...deps } = shared;
  return names.map((name) => new constructors[name]({ ...deps, limiter: registry.forSource(name) }));
};
