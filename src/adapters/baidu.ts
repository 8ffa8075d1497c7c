import { ParsedRecord, SourceSchema } from '../core/collaborators';
import { RawHit } from '../core/types';
import { isProfileUrl, searchResultHit } from './common';
import { BaseSourceAcquirer, SearchTerm } from './sourceBase';

const MAX_PAGE_SIZE = 50;

const RESULTS_SCHEMA: SourceSchema = {
  container: '#content_left',
  item: '.result.c-container',
  fields: {
    url: [{ attribute: 'mu' }, { selector: 'h3 a', attribute: 'href' }],
    title: [{ selector: 'h3 a' }, { selector: 'h3' }],
    snippet: [{ selector: '.c-abstract' }, { selector: '.content-right_8Zs40' }],
  },
  required: ['url', 'title'],
};

export const buildBaiduSearchUrl = (term: SearchTerm, pageSize: number): string => {
  const query = `site:linkedin.com/in/ intitle:"${term.title}" "${term.industry}" "${term.location}"`;
  const params = new URLSearchParams({
    wd: query,
    rn: String(Math.min(pageSize, MAX_PAGE_SIZE)),
    ie: 'utf-8',
    oe: 'utf-8',
    cl: '3',
    tn: 'baidutop10',
  });
  return `https://www.baidu.com/s?${params.toString()}`;
};

/** Regional search engine restricted to professional-network profile pages. */
export class BaiduAcquirer extends BaseSourceAcquirer {
  readonly name = 'baidu' as const;
  protected readonly schema = RESULTS_SCHEMA;
  protected readonly blockingPhrases = ['安全验证', '百度安全', 'captcha'];
  protected readonly captchaSelector = '#captcha';

  protected buildUrl(term: SearchTerm): string {
    return buildBaiduSearchUrl(term, this.deps.settings.maxResults);
  }

  protected toHit(record: ParsedRecord, discoveredAt: string): RawHit | null {
    if (!record.url || !isProfileUrl(record.url)) return null;
    return searchResultHit(this.name, record, record.url.split('?')[0], discoveredAt);
  }
}
