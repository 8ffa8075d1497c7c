import test from 'node:test';
import assert from 'node:assert/strict';
import axios, { AxiosError, AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { RateLimiterRegistry } from '../../utils/rateLimiter';
import {
  ClearbitCompanyData,
  EnrichmentApiDeps,
  FullContactSocialLookup,
  HunterEmailFinder,
  MailboxLayerVerifier,
  TwilioPhoneValidator,
  createEnrichmentApis,
  enrichmentPolicy,
  isEnrichmentService,
} from '../enrichmentApis';
import { CancelledError, EnrichmentError } from '../errors';
import { FakeClock } from './helpers';

interface StubReply {
  status: number;
  data?: unknown;
}

/** Axios instance answered in process; it settles statuses the way the http adapter does. */
const stubClient = (reply: (config: InternalAxiosRequestConfig) => StubReply, seen: InternalAxiosRequestConfig[] = []): AxiosInstance =>
  axios.create({
    adapter: async (config) => {
      seen.push(config);
      const { status, data } = reply(config);
      const response = { data, status, statusText: String(status), headers: {}, config };
      if (config.validateStatus && !config.validateStatus(status)) {
        throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
      }
      return response;
    },
  });

const deps = (client: AxiosInstance, clock = new FakeClock()): EnrichmentApiDeps => ({
  registry: new RateLimiterRegistry((name) => (isEnrichmentService(name) ? enrichmentPolicy(name) : { minIntervalMs: 0, jitterMs: [0, 0] }), clock),
  timeoutMs: 5000,
  client,
});

const kindOf = (kind: EnrichmentError['kind']) => (error: unknown): boolean => error instanceof EnrichmentError && error.kind === kind;

test('hunter returns lowercased addresses from a domain search', async () => {
  const seen: InternalAxiosRequestConfig[] = [];
  const client = stubClient(() => ({
    status: 200,
    data: { data: { emails: [{ value: 'Jane@Acme.com' }, { value: ' ' }, { type: 'generic' }, { value: 'sales@acme.com' }] } },
  }), seen);

  const emails = await new HunterEmailFinder('test-secret', deps(client)).query({ domain: 'acme.com' });

  assert.deepEqual(emails, ['jane@acme.com', 'sales@acme.com']);
  assert.equal(seen[0].url, 'https://api.hunter.io/v2/domain-search');
  assert.deepEqual(seen[0].params, { domain: 'acme.com', api_key: 'test-secret' });
  assert.equal(seen[0].timeout, 5000);
});

test('hunter treats 404 as no addresses', async () => {
  const finder = new HunterEmailFinder('test-secret', deps(stubClient(() => ({ status: 404 }))));
  assert.deepEqual(await finder.query({ domain: 'unknown.example' }), []);
});

test('maps HTTP failures and bad payloads to enrichment error kinds', async () => {
  const limited = new HunterEmailFinder('test-secret', deps(stubClient(() => ({ status: 429 }))));
  await assert.rejects(limited.query({ domain: 'acme.com' }), kindOf('rate_limited'));

  const down = new HunterEmailFinder('test-secret', deps(stubClient(() => ({ status: 503 }))));
  await assert.rejects(down.query({ domain: 'acme.com' }), kindOf('api_unavailable'));

  const garbled = new HunterEmailFinder('test-secret', deps(stubClient(() => ({ status: 200, data: 'not json' }))));
  await assert.rejects(garbled.query({ domain: 'acme.com' }), kindOf('invalid_data'));
});

test('mailboxlayer requires a valid format and an MX record', async () => {
  const replies = [
    { format_valid: true, mx_found: true },
    { format_valid: true, mx_found: false },
    { success: false, error: { code: 101 } },
  ];
  let call = 0;
  const verifier = new MailboxLayerVerifier('test-secret', deps(stubClient(() => ({ status: 200, data: replies[call++] }))));

  assert.equal(await verifier.query({ email: 'jane@acme.com' }), true);
  assert.equal(await verifier.query({ email: 'jane@acme.com' }), false);
  await assert.rejects(verifier.query({ email: 'jane@acme.com' }), kindOf('api_unavailable'));
});

test('clearbit sends a bearer token and reads the company name', async () => {
  const seen: InternalAxiosRequestConfig[] = [];
  const found = new ClearbitCompanyData('test-secret', deps(stubClient(() => ({ status: 200, data: { name: 'Acme Corp' } }), seen)));
  assert.equal(await found.query({ domain: 'acme.com' }), 'Acme Corp');
  assert.equal(seen[0].headers.Authorization, 'Bearer test-secret');

  const missing = new ClearbitCompanyData('test-secret', deps(stubClient(() => ({ status: 404 }))));
  assert.equal(await missing.query({ domain: 'acme.com' }), undefined);
});

test('fullcontact maps social profiles by lowercased type', async () => {
  const seen: InternalAxiosRequestConfig[] = [];
  const lookup = new FullContactSocialLookup('test-secret', deps(stubClient(() => ({
    status: 200,
    data: { socialProfiles: [{ type: 'Twitter', url: 'https://twitter.com/janedoe' }, { type: 'github' }, 'bad'] },
  }), seen)));

  assert.deepEqual(await lookup.query({ fullName: 'Jane Doe', company: 'Acme' }), { twitter: 'https://twitter.com/janedoe' });
  assert.equal(seen[0].method, 'post');
  assert.equal(seen[0].data, JSON.stringify({ fullName: 'Jane Doe', company: 'Acme' }));
});

test('twilio confirms numbers unless the lookup answers 404', async () => {
  const seen: InternalAxiosRequestConfig[] = [];
  let status = 200;
  const validator = new TwilioPhoneValidator('AC-test', 'test-secret', deps(stubClient(() => ({ status, data: {} }), seen)));

  assert.equal(await validator.query({ phone: '+15550102000' }), true);
  status = 404;
  assert.equal(await validator.query({ phone: '+15550102001' }), false);
  assert.equal(seen[0].url, 'https://lookups.twilio.com/v1/PhoneNumbers/%2B15550102000');
  assert.deepEqual(seen[0].auth, { username: 'AC-test', password: 'test-secret' });
});

test('calls to one service are paced by its interval', async () => {
  const clock = new FakeClock();
  const finder = new HunterEmailFinder('test-secret', deps(stubClient(() => ({ status: 404 })), clock));

  await finder.query({ domain: 'a.example' });
  await finder.query({ domain: 'b.example' });

  assert.deepEqual(clock.sleeps, [500]);
});

test('an aborted signal cancels before any request', async () => {
  const seen: InternalAxiosRequestConfig[] = [];
  const finder = new HunterEmailFinder('test-secret', deps(stubClient(() => ({ status: 200 }), seen)));
  const controller = new AbortController();
  controller.abort();

  await assert.rejects(finder.query({ domain: 'acme.com' }, controller.signal), CancelledError);
  assert.equal(seen.length, 0);
});

test('only services with credentials are built', () => {
  const apis = createEnrichmentApis({ hunter: 'test-secret', twilioSid: 'AC-test' }, deps(stubClient(() => ({ status: 404 }))));
  assert.ok(apis.emailFinder instanceof HunterEmailFinder);
  assert.equal(apis.emailVerifier, undefined);
  assert.equal(apis.companyData, undefined);
  assert.equal(apis.socialLookup, undefined);
  assert.equal(apis.phoneValidator, undefined);
});
