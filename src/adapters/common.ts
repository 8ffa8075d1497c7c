import { load } from 'cheerio';
import { ParsedRecord } from '../core/collaborators';
import { RawHit, SourceName } from '../core/types';

export interface ProfileTitle {
  name: string;
  headline?: string;
  company?: string;
}

const PROFILE_SUFFIX = /\s*[|\-–]\s*linkedin\s*$/i;
const TITLE_SEPARATOR = /\s+[-–|]\s+/;

/** Splits "Name - Headline - Company | LinkedIn" page titles. */
export const splitProfileTitle = (pageTitle: string): ProfileTitle | undefined => {
  if (!PROFILE_SUFFIX.test(pageTitle)) return undefined;
  const parts = pageTitle.replace(PROFILE_SUFFIX, '').split(TITLE_SEPARATOR).map((part) => part.trim()).filter(Boolean);
  if (parts.length === 0) return undefined;
  const [name, ...rest] = parts;
  if (rest.length === 0) return { name };
  if (rest.length === 1) return { name, headline: rest[0] };
  return { name, headline: rest.slice(0, -1).join(' - '), company: rest[rest.length - 1] };
};

export const isProfileUrl = (url: string): boolean => /linkedin\.com\/in\//i.test(url);

const safeDecode = (value: string): string => {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
};

/** Unwraps search-engine redirect links and drops tracking parameters. */
export const cleanResultUrl = (url: string): string => {
  let cleaned = url.trim();
  if (cleaned.startsWith('/url?q=')) cleaned = safeDecode(cleaned.slice(7).split('&')[0]);
  return cleaned.split('&')[0].split('?')[0].split('#')[0];
};

export const absoluteUrl = (href: string, origin: string): string => {
  try {
    return new URL(href, origin).toString();
  } catch {
    return href;
  }
};

export const hasCaptchaMarker = (markup: string, selector: string): boolean => load(markup)(selector).length > 0;

/** First blocking phrase found in the page's visible text. */
export const findBlockingPhrase = (markup: string, phrases: readonly string[]): string | undefined => {
  const $ = load(markup);
  $('script, style, noscript').remove();
  const text = $('body').text().toLowerCase();
  return phrases.find((phrase) => text.includes(phrase.toLowerCase()));
};

export const defaultHit = (source: SourceName, record: ParsedRecord, url: string, discoveredAt: string): RawHit => ({
  source,
  url,
  title: record.title ?? '',
  snippet: record.snippet ?? '',
  name: record.name,
  location: record.location,
  discoveredAt,
});

/** Hit for a search-engine result, filling name/headline/company from a profile-shaped page title. */
export const searchResultHit = (source: SourceName, record: ParsedRecord, url: string, discoveredAt: string): RawHit => {
  const hit = defaultHit(source, record, url, discoveredAt);
  const profile = splitProfileTitle(hit.title);
  if (!profile) return hit;
  return {
    ...hit,
    name: profile.name,
    title: profile.headline ?? hit.title,
    company: profile.company,
  };
};
