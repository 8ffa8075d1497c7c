import pLimit from 'p-limit';
import { Browser, BrowserContext, BrowserContextOptions, LaunchOptions, Page, chromium, errors } from 'playwright';
import { BrowserCollaborator, BrowserFactory, BrowserSessionOptions, HumanPacingProfile } from '../core/collaborators';
import { CancelledError, FetchError, errorMessage } from '../core/errors';
import { log } from './logger';
import { prepareStealthContext } from './stealth';
import { RandomSource, randomBetween, randomInt } from './timing';

const SHARED_LAUNCH_ARGS = ['--disable-dev-shm-usage', '--no-sandbox', '--disable-gpu', '--disable-blink-features=AutomationControlled'];
const SCROLL_BACK_CHANCE = 0.4;
const KEY_DELAY_MS: readonly [number, number] = [60, 180];

export const getBrowserLaunchOptions = (headless = true): LaunchOptions => ({
  headless,
  args: [...SHARED_LAUNCH_ARGS],
});

export const getBrowserContextOptions = (proxy?: string, languageCode = 'en'): BrowserContextOptions => {
  if (!proxy) return { locale: languageCode };
  const parsed = new URL(proxy);
  return {
    locale: languageCode,
    proxy: {
      server: `${parsed.protocol}//${parsed.host}`,
      username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
      password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    },
  };
};

const toNavigationError = (error: unknown): FetchError => {
  if (error instanceof FetchError) return error;
  if (error instanceof errors.TimeoutError) return new FetchError('timeout', error.message);
  return new FetchError('network', errorMessage(error));
};

const looksLikeSelector = (value: string): boolean => /^[#.[]/.test(value) || /^[a-z]+[#.[]/i.test(value);

export class PlaywrightSession implements BrowserCollaborator {
  private closed = false;

  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly random: RandomSource = Math.random,
  ) {}

  async navigate(url: string, timeoutMs: number): Promise<void> {
    try {
      const response = await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
      if (response && response.status() >= 400) {
        throw new FetchError('http_status', `HTTP ${response.status()} for ${url}`, response.status());
      }
    } catch (error) {
      throw toNavigationError(error);
    }
  }

  async waitFor(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { state: 'attached', timeout: timeoutMs });
      return true;
    } catch (error) {
      if (error instanceof errors.TimeoutError) return false;
      throw toNavigationError(error);
    }
  }

  pageSource(): Promise<string> {
    return this.page.content();
  }

  async detectMarker(selectorOrText: string): Promise<boolean> {
    const locator = looksLikeSelector(selectorOrText)
      ? this.page.locator(selectorOrText)
      : this.page.getByText(selectorOrText, { exact: false });
    return (await locator.count()) > 0;
  }

  async fill(selector: string, value: string): Promise<void> {
    try {
      const field = this.page.locator(selector).first();
      await field.click();
      await field.pressSequentially(value, { delay: randomInt(KEY_DELAY_MS, this.random) });
    } catch (error) {
      throw toNavigationError(error);
    }
  }

  async click(selector: string, timeoutMs: number): Promise<void> {
    try {
      await this.page.locator(selector).first().click({ timeout: timeoutMs });
    } catch (error) {
      throw toNavigationError(error);
    }
  }

  async simulateHumanActivity(profile: HumanPacingProfile): Promise<void> {
    const rounds = randomInt(profile.scrollRounds, this.random);
    const distance = randomInt(profile.scrollDistancePx, this.random);
    const pause = randomBetween(profile.scrollPauseMs, this.random);
    for (let i = 0; i < rounds; i += 1) {
      await this.page.mouse.wheel(0, distance);
      await this.page.waitForTimeout(pause);
    }
    if (this.random() < SCROLL_BACK_CHANCE) {
      await this.page.mouse.wheel(0, -Math.floor(distance / 2));
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.context.close();
  }
}

export interface BrowserPoolOptions {
  headless: boolean;
  maxSessions: number;
  random?: RandomSource;
}

/**
 * One shared Chromium per pipeline. Each session gets its own context, so
 * proxies and fingerprints never leak between sessions.
 */
export class PlaywrightBrowserPool implements BrowserFactory {
  private browser: Promise<Browser> | null = null;
  private readonly limit: pLimit.Limit;

  constructor(private readonly options: BrowserPoolOptions) {
    this.limit = pLimit(options.maxSessions);
  }

  private getBrowser(): Promise<Browser> {
    if (!this.browser) {
      this.browser = chromium.launch(getBrowserLaunchOptions(this.options.headless)).catch((error: unknown) => {
        this.browser = null;
        throw error;
      });
    }
    return this.browser;
  }

  withSession<T>(options: BrowserSessionOptions, fn: (session: BrowserCollaborator) => Promise<T>): Promise<T> {
    return this.limit(async () => {
      if (options.signal?.aborted) throw new CancelledError();
      const browser = await this.getBrowser();
      const context = await browser.newContext(getBrowserContextOptions(options.proxy, options.languageCode));
      let session: PlaywrightSession | undefined;
      let closing: Promise<void> | undefined;
      const closeOnce = (): Promise<void> => {
        closing ??= session ? session.close() : context.close();
        return closing;
      };
      const onAbort = (): void => {
        closeOnce().catch((error: unknown) => log('WARN', 'browser session close failed', errorMessage(error)));
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });

      try {
        await prepareStealthContext(context, options.languageCode);
        session = new PlaywrightSession(context, await context.newPage(), this.options.random);
        return await fn(session);
      } finally {
        options.signal?.removeEventListener('abort', onAbort);
        await closeOnce();
      }
    });
  }

  async close(): Promise<void> {
    if (!this.browser) return;
    const pending = this.browser;
    this.browser = null;
    const browser = await pending;
    await browser.close();
  }
}
