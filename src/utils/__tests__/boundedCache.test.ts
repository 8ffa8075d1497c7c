import test from 'node:test';
import assert from 'node:assert/strict';
import { FakeClock } from '../../core/__tests__/helpers';
import { BoundedCache } from '../boundedCache';

test('evicts the oldest entry when full', () => {
  const cache = new BoundedCache<number>({ maxEntries: 2, ttlMs: 60_000 }, new FakeClock());
  cache.set('a', 1);
  cache.set('b', 2);
  assert.equal(cache.get('a'), 1);
  cache.set('c', 3);

  assert.equal(cache.get('a'), undefined);
  assert.equal(cache.get('b'), 2);
  assert.equal(cache.get('c'), 3);
  assert.equal(cache.size, 2);
});

test('rewriting a key moves it to the back of the eviction order', () => {
  const cache = new BoundedCache<number>({ maxEntries: 2, ttlMs: 60_000 }, new FakeClock());
  cache.set('a', 1);
  cache.set('b', 2);
  cache.set('a', 10);
  cache.set('c', 3);

  assert.equal(cache.get('a'), 10);
  assert.equal(cache.get('b'), undefined);
});

test('entries expire after the ttl', () => {
  const clock = new FakeClock();
  const cache = new BoundedCache<string[]>({ maxEntries: 5, ttlMs: 1000 }, clock);
  cache.set('page', []);

  clock.advance(999);
  assert.deepEqual(cache.get('page'), []);
  clock.advance(1);
  assert.equal(cache.get('page'), undefined);
  assert.equal(cache.size, 0);
});

test('getOrSet loads once and caches falsy values', async () => {
  const cache = new BoundedCache<boolean>({ maxEntries: 5, ttlMs: 1000 }, new FakeClock());
  let loads = 0;
  const load = async (): Promise<boolean> => {
    loads += 1;
    return false;
  };

  assert.equal(await cache.getOrSet('jane@acme.com', load), false);
  assert.equal(await cache.getOrSet('jane@acme.com', load), false);
  assert.equal(loads, 1);
});

test('a failed load caches nothing', async () => {
  const cache = new BoundedCache<number>({ maxEntries: 5, ttlMs: 1000 }, new FakeClock());
  await assert.rejects(cache.getOrSet('k', async () => {
    throw new Error('down');
  }), /down/);
  assert.equal(cache.size, 0);
});

test('invalidate and clear remove entries', () => {
  const cache = new BoundedCache<number>({ maxEntries: 5, ttlMs: 1000 }, new FakeClock());
  cache.set('a', 1);
  cache.set('b', 2);
  assert.equal(cache.invalidate('a'), true);
  assert.equal(cache.invalidate('a'), false);
  cache.clear();
  assert.equal(cache.size, 0);
});
