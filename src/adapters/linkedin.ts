import { BrowserCollaborator, ParsedRecord, SourceSchema } from '../core/collaborators';
import { AcquisitionError } from '../core/errors';
import { LanguageProfile } from '../core/localization';
import { RawHit } from '../core/types';
import { log } from '../utils/logger';
import { randomBetween } from '../utils/timing';
import { absoluteUrl, defaultHit } from './common';
import { BaseSourceAcquirer, SearchTerm } from './sourceBase';

const PEOPLE_SEARCH_SCHEMA: SourceSchema = {
  container: '.search-results-container',
  item: '.entity-result',
  fields: {
    url: [{ selector: '.entity-result__title-text a', attribute: 'href' }],
    name: [{ selector: '.entity-result__title-text a span[aria-hidden="true"]' }, { selector: '.entity-result__title-text a' }],
    title: [{ selector: '.entity-result__primary-subtitle' }],
    location: [{ selector: '.entity-result__secondary-subtitle' }],
    snippet: [{ selector: '.entity-result__summary' }],
  },
  required: ['url', 'name', 'title', 'location'],
};

export const LOGIN_URL = 'https://www.linkedin.com/login';

const LOGIN_FORM = {
  username: '#username',
  password: '#password',
  submit: 'button[type=submit]',
  signedIn: '#global-nav',
};

export const buildPeopleSearchUrl = (term: SearchTerm, language: LanguageProfile): string => {
  const params = new URLSearchParams({
    keywords: `${term.title} ${term.location}`,
    origin: 'GLOBAL_SEARCH_HEADER',
  });
  return `https://${language.linkedinDomain}/search/results/people/?${params.toString()}`;
};

export const profileUrl = (href: string): string => absoluteUrl(href.split('?')[0], 'https://www.linkedin.com');

export class LinkedInAcquirer extends BaseSourceAcquirer {
  readonly name = 'linkedin' as const;
  protected readonly schema = PEOPLE_SEARCH_SCHEMA;
  protected readonly blockingPhrases = ['security check', 'captcha', 'verification', 'too many requests', 'restricted', 'blocked'];

  /** Signs in on the fresh browser context so the people search is not met by the sign-in wall. */
  protected async prepareSession(session: BrowserCollaborator, signal?: AbortSignal): Promise<void> {
    const { settings, clock, random, pacing } = this.deps;
    const credentials = settings.linkedinLogin;
    if (!credentials) return;

    await clock.sleep(randomBetween(pacing.navigationDelayMs, random), signal);
    await session.navigate(LOGIN_URL, settings.requestTimeoutMs);
    if (!await session.waitFor(LOGIN_FORM.username, settings.requestTimeoutMs)) {
      throw new AcquisitionError('blocked', this.name, 'login form did not load');
    }
    await session.fill(LOGIN_FORM.username, credentials.email);
    await session.fill(LOGIN_FORM.password, credentials.password);
    await clock.sleep(randomBetween(pacing.scrollPauseMs, random), signal);
    await session.click(LOGIN_FORM.submit, settings.requestTimeoutMs);
    if (!await session.waitFor(LOGIN_FORM.signedIn, settings.requestTimeoutMs)) {
      throw new AcquisitionError('blocked', this.name, 'login was not accepted');
    }
    log('DEBUG', `[${this.name}] signed in`);
  }

  protected buildUrl(term: SearchTerm, language: LanguageProfile): string {
    return buildPeopleSearchUrl(term, language);
  }

  protected toHit(record: ParsedRecord, discoveredAt: string): RawHit | null {
    if (!record.url) return null;
    return defaultHit(this.name, record, profileUrl(record.url), discoveredAt);
  }
}
