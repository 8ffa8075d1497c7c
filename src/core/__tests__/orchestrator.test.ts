import test from 'node:test';
import assert from 'node:assert/strict';
import { SourceAcquirer } from '../../adapters/sourceBase';
import { AcquisitionError } from '../errors';
import { InvalidTransitionError, Orchestrator, OrchestratorOptions, mergeHits, regionalLocation } from '../orchestrator';
import { ExpandedQuery, Query, RawHit, SourceName } from '../types';
import { FakeClock, makeHit } from './helpers';

type Step = RawHit[] | Error;

class ScriptedAcquirer implements SourceAcquirer {
  readonly calls: ExpandedQuery[] = [];

  constructor(
    readonly name: SourceName,
    private readonly script: Step[],
    private readonly onCall?: () => void,
  ) {}

  async acquire(expanded: ExpandedQuery): Promise<RawHit[]> {
    this.calls.push(expanded);
    this.onCall?.();
    const step = this.script[Math.min(this.calls.length - 1, this.script.length - 1)];
    if (step instanceof Error) throw step;
    return step;
  }
}

const query: Query = { jobTitle: 'CTO', industry: 'technology', location: 'Berlin, Germany', languageCode: 'en' };

const options = (clock: FakeClock, overrides: Partial<OrchestratorOptions> = {}): OrchestratorOptions => ({
  expansionDepth: 3,
  maxAttempts: 3,
  retryDelayMs: 5000,
  maxResults: 500,
  clock,
  ...overrides,
});

test('merges in dispatch order and keeps the first hit per url', async () => {
  const linkedin = new ScriptedAcquirer('linkedin', [[makeHit('https://a.example'), makeHit('https://b.example', { name: 'Bea' })]]);
  const google = new ScriptedAcquirer('google', [[
    makeHit('https://b.example', { source: 'google', name: 'Other' }),
    makeHit('https://c.example', { source: 'google' }),
  ]]);
  const orchestrator = new Orchestrator([linkedin, google], options(new FakeClock()));

  const result = await orchestrator.run(query);

  assert.deepEqual(result.leads.map((lead) => lead.url), ['https://a.example', 'https://b.example', 'https://c.example']);
  assert.equal(result.leads[1].source, 'linkedin');
  assert.equal(result.leads[1].name, 'Bea');
  assert.equal(result.leads[0].name, '');
  assert.deepEqual(result.leads[2].emails, []);
  assert.equal(result.leads[2].score, 0);
  assert.equal(orchestrator.state, 'done');
  assert.equal(result.allSourcesFailed, false);
  assert.equal(result.expandedQueries, 1);
});

test('retries a retryable failure after the fixed delay', async () => {
  const clock = new FakeClock();
  const google = new ScriptedAcquirer('google', [
    new AcquisitionError('transport', 'google', 'socket hang up'),
    [makeHit('https://a.example', { source: 'google' })],
  ]);

  const result = await new Orchestrator([google], options(clock)).run(query);

  assert.equal(result.leads.length, 1);
  assert.deepEqual(clock.sleeps, [5000]);
  assert.deepEqual(result.stats.google, { attempts: 2, hits: 1, failures: 1, lastError: 'transport: socket hang up' });
});

test('does not retry an empty parse', async () => {
  const clock = new FakeClock();
  const baidu = new ScriptedAcquirer('baidu', [new AcquisitionError('parse_empty', 'baidu', 'no container')]);

  const result = await new Orchestrator([baidu], options(clock)).run(query);

  assert.equal(baidu.calls.length, 1);
  assert.deepEqual(clock.sleeps, []);
  assert.equal(result.stats.baidu?.failures, 1);
});

test('a source that keeps failing never aborts the others', async () => {
  const clock = new FakeClock();
  const linkedin = new ScriptedAcquirer('linkedin', [new AcquisitionError('blocked', 'linkedin', 'security check')]);
  const google = new ScriptedAcquirer('google', [[makeHit('https://a.example', { source: 'google' })]]);

  const result = await new Orchestrator([linkedin, google], options(clock)).run(query);

  assert.equal(linkedin.calls.length, 3);
  assert.deepEqual(clock.sleeps, [5000, 5000]);
  assert.deepEqual(result.leads.map((lead) => lead.source), ['google']);
  assert.equal(result.allSourcesFailed, false);
  assert.equal(result.stats.linkedin?.lastError, 'blocked: security check');
});

test('unexpected errors count as transport failures', async () => {
  const google = new ScriptedAcquirer('google', [new Error('boom'), []]);

  const result = await new Orchestrator([google], options(new FakeClock())).run(query);

  assert.equal(google.calls.length, 2);
  assert.equal(result.stats.google?.lastError, 'transport: boom');
});

test('reports total failure with an empty list', async () => {
  const linkedin = new ScriptedAcquirer('linkedin', [new AcquisitionError('parse_empty', 'linkedin', 'empty')]);
  const google = new ScriptedAcquirer('google', [new AcquisitionError('parse_empty', 'google', 'empty')]);

  const result = await new Orchestrator([linkedin, google], options(new FakeClock())).run(query);

  assert.deepEqual(result.leads, []);
  assert.equal(result.allSourcesFailed, true);
});

test('runs one expanded query per region, in order', async () => {
  const google = new ScriptedAcquirer('google', [[]]);

  const result = await new Orchestrator([google], options(new FakeClock())).run(query, ['DE', 'AT']);

  assert.deepEqual(google.calls.map((call) => call.region), ['DE', 'AT']);
  assert.deepEqual(google.calls.map((call) => call.query.location), ['Berlin, Germany, DE', 'Berlin, Germany, AT']);
  assert.equal(result.expandedQueries, 2);
  assert.deepEqual(result.regions, ['DE', 'AT']);
});

test('a location without a comma becomes the country code', () => {
  assert.equal(regionalLocation('Germany', 'DE'), 'DE');
  assert.equal(regionalLocation('Munich, Bavaria', 'DE'), 'Munich, Bavaria, DE');
});

test('cancellation stops dispatching and keeps finished results', async () => {
  const controller = new AbortController();
  const linkedin = new ScriptedAcquirer('linkedin', [[makeHit('https://a.example')]], () => controller.abort());
  const google = new ScriptedAcquirer('google', [[makeHit('https://b.example', { source: 'google' })]]);

  const result = await new Orchestrator([linkedin, google], options(new FakeClock())).run(query, ['DE', 'FR'], controller.signal);

  assert.deepEqual(result.leads.map((lead) => lead.url), ['https://a.example']);
  assert.equal(google.calls.length, 0);
  assert.equal(linkedin.calls.length, 1);
  assert.equal(result.cancelled, true);
  assert.equal(result.allSourcesFailed, false);
});

test('caps the merged list at maxResults', async () => {
  const hits = ['https://a.example', 'https://b.example', 'https://c.example'].map((url) => makeHit(url));
  const linkedin = new ScriptedAcquirer('linkedin', [hits]);

  const result = await new Orchestrator([linkedin], options(new FakeClock(), { maxResults: 2 })).run(query);

  assert.deepEqual(result.leads.map((lead) => lead.url), ['https://a.example', 'https://b.example']);
});

test('an orchestrator runs once', async () => {
  const orchestrator = new Orchestrator([], options(new FakeClock()));
  await orchestrator.run(query);
  await assert.rejects(orchestrator.run(query), InvalidTransitionError);
});

test('mergeHits skips hits without a url', () => {
  assert.deepEqual(mergeHits([[makeHit('')], [makeHit('https://a.example')]]).map((lead) => lead.url), ['https://a.example']);
});
