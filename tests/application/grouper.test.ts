import { describe, it, expect } from 'vitest';
import { group } from '../../src/application/grouper.js';
import { makeItem } from '../helpers.js';

describe('group', () => {
  it('returns no groups for no items', () => {
    expect(group([])).toEqual([]);
  });

  it('buckets items by origin in first-seen order', () => {
    const a1 = makeItem({ origin: 'acme/web', url: 'https://github.com/acme/web/pull/1' });
    const b1 = makeItem({ origin: 'acme/api', url: 'https://github.com/acme/api/pull/1' });
    const a2 = makeItem({ origin: 'acme/web', url: 'https://github.com/acme/web/pull/2' });

    expect(group([a1, b1, a2])).toEqual([
      { origin: 'acme/web', items: [a1, a2] },
      { origin: 'acme/api', items: [b1] },
    ]);
  });

  it('puts every meeting into one leading meetings group', () => {
    const pr = makeItem();
    const standup = makeItem({ origin: 'meetings', kind: 'Meeting', url: null, title: 'Daily sync', actions: ['attended'] });
    const retro = makeItem({ origin: 'team@example.com', kind: 'Meeting', url: null, title: 'Retro', actions: ['attended'] });

    const groups = group([pr, standup, retro]);

    expect(groups.map((g) => g.origin)).toEqual(['meetings', 'acme/api']);
    expect(groups[0]?.items).toEqual([standup, retro]);
  });

  it('omits the meetings group when there are no meetings', () => {
    expect(group([makeItem()]).map((g) => g.origin)).toEqual(['acme/api']);
  });
});
