import { FingerprintGenerator } from 'fingerprint-generator';
import { FingerprintInjector } from 'fingerprint-injector';
import { BrowserContext } from 'playwright';

const FALLBACK_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const generator = new FingerprintGenerator({
  browsers: [{ name: 'chrome', minVersion: 120 }],
  devices: ['desktop'],
  operatingSystems: ['windows', 'linux', 'macos'],
});

const injector = new FingerprintInjector();

export const acceptLanguage = (languageCode = 'en'): string =>
  (languageCode === 'en' ? 'en-US,en;q=0.9' : `${languageCode},en;q=0.8`);

export const getStealthHeaders = (languageCode = 'en'): Record<string, string> => {
  const fingerprint = generator.getFingerprint();
  return {
    'accept': 'text/html,application/xhtml+xml',
    'accept-language': acceptLanguage(languageCode),
    'sec-ch-ua': fingerprint.headers['sec-ch-ua'] ?? '"Chromium";v="120"',
    'sec-ch-ua-mobile': '?0',
    'sec-ch-ua-platform': fingerprint.headers['sec-ch-ua-platform'] ?? '"Windows"',
    'upgrade-insecure-requests': '1',
    'user-agent': fingerprint.headers['user-agent'] ?? FALLBACK_USER_AGENT,
  };
};

export const applyStealthToContext = async (context: BrowserContext, languageCode = 'en'): Promise<void> => {
  const fingerprint = generator.getFingerprint();
  await injector.attachFingerprintToPlaywright(context, fingerprint);
  await context.setExtraHTTPHeaders({ 'accept-language': acceptLanguage(languageCode) });
  await context.route('**/*', (route) => {
    const type = route.request().resourceType();
    if (['image', 'font', 'media'].includes(type)) {
      return route.abort();
    }
    return route.continue();
  });
};

const preparedContexts = new WeakSet<BrowserContext>();

export const prepareStealthContext = async (context: BrowserContext, languageCode = 'en'): Promise<void> => {
  if (preparedContexts.has(context)) return;
  await applyStealthToContext(context, languageCode);
  preparedContexts.add(context);
};
