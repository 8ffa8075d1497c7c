import { BrowserCollaborator, BrowserFactory, BrowserSessionOptions, FetchCollaborator, FetchOptions } from '../collaborators';
import { CancelledError } from '../errors';
import { Lead, RawHit } from '../types';
import { Clock } from '../../utils/timing';

export const START_TIME = Date.UTC(2024, 0, 15, 9, 30, 0);

/** Clock whose sleeps resolve at once and move time forward. */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(public current = START_TIME) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new CancelledError();
    this.sleeps.push(ms);
    this.current += Math.max(0, ms);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export const fixedRandom = (value: number) => (): number => value;

export const makeHit = (url: string, overrides: Partial<RawHit> = {}): RawHit => ({
  source: 'linkedin',
  url,
  title: 'Engineer',
  snippet: '',
  discoveredAt: new Date(START_TIME).toISOString(),
  ...overrides,
});

export const makeLead = (overrides: Partial<Lead> = {}): Lead => ({
  name: 'jane doe',
  url: 'https://www.linkedin.com/in/jane-doe',
  title: 'Engineer',
  snippet: '',
  emails: [],
  phones: [],
  socialProfiles: {},
  score: 0,
  source: 'linkedin',
  discoveredAt: new Date(START_TIME).toISOString(),
  ...overrides,
});

type PageScript = (url: string) => string;

export class FakeSession implements BrowserCollaborator {
  readonly visited: string[] = [];
  readonly filled: Record<string, string> = {};
  closed = false;
  private current = '';

  constructor(
    private readonly page: PageScript,
    private readonly markers: readonly string[],
    private readonly absent: readonly string[],
  ) {}

  async navigate(url: string): Promise<void> {
    this.visited.push(url);
    this.current = url;
  }

  async waitFor(selector: string): Promise<boolean> {
    return !this.absent.includes(selector);
  }

  async pageSource(): Promise<string> {
    return this.page(this.current);
  }

  async detectMarker(selectorOrText: string): Promise<boolean> {
    return this.markers.includes(selectorOrText);
  }

  async fill(selector: string, value: string): Promise<void> {
    this.visited.push(`fill ${selector}`);
    this.filled[selector] = value;
  }

  async click(selector: string): Promise<void> {
    this.visited.push(`click ${selector}`);
  }

  async simulateHumanActivity(): Promise<void> {
    this.visited.push('scroll');
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Browser stand-in serving canned markup. `markers` lists selectors reported as present,
 * `absent` lists selectors that never appear when waited for.
 */
export class FakeBrowserFactory implements BrowserFactory {
  readonly sessions: FakeSession[] = [];
  readonly options: BrowserSessionOptions[] = [];
  closeCalls = 0;

  constructor(
    private readonly page: PageScript = () => '',
    private readonly markers: readonly string[] = [],
    private readonly absent: readonly string[] = [],
  ) {}

  async withSession<T>(options: BrowserSessionOptions, fn: (session: BrowserCollaborator) => Promise<T>): Promise<T> {
    this.options.push(options);
    const session = new FakeSession(this.page, this.markers, this.absent);
    this.sessions.push(session);
    try {
      return await fn(session);
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
  }
}

export class FakeFetcher implements FetchCollaborator {
  readonly calls: { url: string; options: FetchOptions }[] = [];

  constructor(private readonly respond: (url: string) => string | Error = () => '') {}

  async fetch(url: string, options: FetchOptions): Promise<string> {
    this.calls.push({ url, options });
    const reply = this.respond(url);
    if (reply instanceof Error) throw reply;
    return reply;
  }
}
