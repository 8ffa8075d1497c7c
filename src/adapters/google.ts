import { ParsedRecord, SourceSchema } from '../core/collaborators';
import { LanguageProfile } from '../core/localization';
import { RawHit } from '../core/types';
import { cleanResultUrl, searchResultHit } from './common';
import { BaseSourceAcquirer, FetchStrategy, SearchTerm } from './sourceBase';

const RESULTS_SCHEMA: SourceSchema = {
  container: '#search, #rso',
  item: '.tF2Cxc, .g',
  fields: {
    url: [{ selector: 'a', attribute: 'href' }],
    title: [{ selector: 'h3' }],
    snippet: [{ selector: '.VwiC3b, .IsZvec, .st, .s' }],
  },
  required: ['url', 'title'],
};

export const buildGoogleSearchUrl = (term: SearchTerm, language: LanguageProfile): string => {
  const params = new URLSearchParams({
    q: `${term.title} ${term.industry} ${term.location}`,
    hl: language.code,
    num: '100',
  });
  return `https://${language.googleDomain}/search?${params.toString()}`;
};

export class GoogleAcquirer extends BaseSourceAcquirer {
  readonly name = 'google' as const;
  protected readonly schema = RESULTS_SCHEMA;
  protected readonly blockingPhrases = ['unusual traffic', 'not a robot', 'captcha'];
  protected readonly captchaSelector = '#captcha-form, form#captcha';

  protected strategies(): FetchStrategy[] {
    return this.deps.apiFetcher ? ['api', 'direct', 'browser'] : ['direct', 'browser'];
  }

  protected buildUrl(term: SearchTerm, language: LanguageProfile): string {
    return buildGoogleSearchUrl(term, language);
  }

  protected toHit(record: ParsedRecord, discoveredAt: string): RawHit | null {
    if (!record.url) return null;
    const url = cleanResultUrl(record.url);
    if (!/^https?:\/\//i.test(url)) return null;
    return searchResultHit(this.name, record, url, discoveredAt);
  }
}
