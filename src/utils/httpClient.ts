import axios, { AxiosInstance } from 'axios';
import { FetchCollaborator, FetchOptions } from '../core/collaborators';
import { FetchError, errorMessage } from '../core/errors';
import { getStealthHeaders } from './stealth';

export const SCRAPINGBEE_ENDPOINT = 'https://app.scrapingbee.com/api/v1';
const API_RENDER_WAIT_MS = 5000;

export type HttpClientFactory = (proxy?: string, timeoutMs?: number, languageCode?: string) => AxiosInstance;

export const createHttpClient: HttpClientFactory = (proxy, timeoutMs = 25000, languageCode = 'en') => {
  const instance = axios.create({ timeout: timeoutMs, headers: getStealthHeaders(languageCode) });
  if (proxy) {
    const p = new URL(proxy);
    instance.defaults.proxy = {
      protocol: p.protocol.replace(':', ''),
      host: p.hostname,
      port: Number(p.port || 80),
      auth: p.username ? { username: decodeURIComponent(p.username), password: decodeURIComponent(p.password) } : undefined,
    };
  }
  return instance;
};

export const toFetchError = (error: unknown): FetchError => {
  if (error instanceof FetchError) return error;
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return new FetchError('http_status', `HTTP ${error.response.status} for ${error.config?.url ?? 'request'}`, error.response.status);
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new FetchError('timeout', error.message);
    }
    return new FetchError('network', error.message);
  }
  return new FetchError('network', errorMessage(error));
};

/** Plain GET of the target page, optionally through a proxy. */
export class HttpFetcher implements FetchCollaborator {
  constructor(private readonly clientFactory: HttpClientFactory = createHttpClient) {}

  async fetch(url: string, options: FetchOptions): Promise<string> {
    const client = this.clientFactory(options.proxy, options.timeoutMs, options.languageCode);
    try {
      const { data } = await client.get<unknown>(url, { signal: options.signal, responseType: 'text' });
      return String(data);
    } catch (error) {
      throw toFetchError(error);
    }
  }
}

/** Fetches through the ScrapingBee rendering API, which handles proxies and JS itself. */
export class BypassApiFetcher implements FetchCollaborator {
  constructor(
    private readonly apiKey: string,
    private readonly clientFactory: HttpClientFactory = createHttpClient,
  ) {}

  async fetch(url: string, options: FetchOptions): Promise<string> {
    const client = this.clientFactory(undefined, options.timeoutMs, options.languageCode);
    const params: Record<string, string> = {
      api_key: this.apiKey,
      url,
      render_js: String(options.renderJs),
      wait: String(API_RENDER_WAIT_MS),
      premium_proxy: String(options.premiumProxy === true),
    };
    if (options.waitSelector) params.wait_for = options.waitSelector;

    try {
      const { data } = await client.get<unknown>(SCRAPINGBEE_ENDPOINT, { params, signal: options.signal, responseType: 'text' });
      return String(data);
    } catch (error) {
      throw toFetchError(error);
    }
  }
}
