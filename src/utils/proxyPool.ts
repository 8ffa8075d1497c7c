import { ProxyEntry } from '../core/types';
import { log } from './logger';

export const toProxyUrl = (address: string): string => (/^[a-z][a-z0-9+.-]*:\/\//i.test(address) ? address : `http://${address}`);

/**
 * Round-robin proxy rotation with monotonic failure marking. Both operations
 * are synchronous, so concurrent acquirers see each other's cursor moves.
 */
export class ProxyPool {
  private readonly entries: ProxyEntry[];
  private cursor = 0;

  constructor(addresses: readonly string[] = [], readonly enabled = addresses.length > 0) {
    const unique = [...new Set(addresses.map((a) => a.trim()).filter(Boolean))];
    this.entries = unique.map((address) => ({ address, failed: false }));
  }

  get size(): number {
    return this.entries.length;
  }

  get failedCount(): number {
    return this.entries.filter((entry) => entry.failed).length;
  }

  next(): Readonly<ProxyEntry> | undefined {
    if (!this.enabled || this.entries.length === 0) return undefined;
    for (let step = 0; step < this.entries.length; step += 1) {
      const index = (this.cursor + step) % this.entries.length;
      const entry = this.entries[index];
      if (!entry.failed) {
        this.cursor = (index + 1) % this.entries.length;
        return entry;
      }
    }
    return undefined;
  }

  markFailed(proxy: Readonly<ProxyEntry> | string): void {
    const address = typeof proxy === 'string' ? proxy : proxy.address;
    const entry = this.entries.find((candidate) => candidate.address === address);
    if (!entry || entry.failed) return;
    entry.failed = true;
    log('WARN', `proxy marked failed ${address}`, { remaining: this.entries.length - this.failedCount });
  }
}
