import test from 'node:test';
import assert from 'node:assert/strict';
import { aggregateLeads } from '../resultAggregator';
import { makeLead } from './helpers';

test('sorts by score descending and keeps ties in input order', () => {
  const leads = [
    makeLead({ url: 'https://a.example', score: 0.5 }),
    makeLead({ url: 'https://b.example', score: 0.9 }),
    makeLead({ url: 'https://c.example', score: 0.5 }),
    makeLead({ url: 'https://d.example', score: 0.9 }),
    makeLead({ url: 'https://e.example', score: 0.7 }),
  ];

  const sorted = aggregateLeads(leads);

  assert.deepEqual(sorted.map((lead) => lead.url), [
    'https://b.example',
    'https://d.example',
    'https://e.example',
    'https://a.example',
    'https://c.example',
  ]);
});

test('returns frozen copies and drops nothing', () => {
  const original = makeLead({ emails: ['jane@acme.com'], socialProfiles: { github: 'https://github.com/jane' } });
  const [lead] = aggregateLeads([original]);

  assert.ok(Object.isFrozen(lead));
  assert.ok(Object.isFrozen(lead.emails));
  assert.ok(Object.isFrozen(lead.socialProfiles));
  assert.notEqual(lead, original);
  assert.equal(Object.isFrozen(original.emails), false);
  assert.deepEqual(aggregateLeads([]), []);
});
