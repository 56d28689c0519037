import { describe, it, expect } from 'vitest';
import { sort } from '../../src/application/sorter.js';
import { makeItem } from '../helpers.js';

describe('sort', () => {
  it('orders items oldest first', () => {
    const late = makeItem({ url: 'https://github.com/acme/api/pull/1', timestamp: new Date('2026-10-16T12:00:00Z') });
    const early = makeItem({ url: 'https://github.com/acme/api/pull/2', timestamp: new Date('2026-10-16T08:00:00Z') });

    expect(sort({ origin: 'acme/api', items: [late, early] }).items).toEqual([early, late]);
  });

  it('breaks timestamp ties by url', () => {
    const b = makeItem({ url: 'https://github.com/acme/api/pull/20' });
    const a = makeItem({ url: 'https://github.com/acme/api/pull/100' });

    // Code-unit order: "1" < "2"
    expect(sort({ origin: 'acme/api', items: [b, a] }).items).toEqual([a, b]);
  });

  it('breaks timestamp ties by title when there is no url', () => {
    const retro = makeItem({ kind: 'Meeting', url: null, title: 'Retro' });
    const planning = makeItem({ kind: 'Meeting', url: null, title: 'Planning' });

    expect(sort({ origin: 'meetings', items: [retro, planning] }).items.map((i) => i.title))
      .toEqual(['Planning', 'Retro']);
  });

  it('does not mutate the input group', () => {
    const items = [
      makeItem({ url: 'https://github.com/acme/api/pull/2' }),
      makeItem({ url: 'https://github.com/acme/api/pull/1' }),
    ];
    const input = { origin: 'acme/api', items };

    sort(input);

    expect(input.items.map((i) => i.url)).toEqual([
      'https://github.com/acme/api/pull/2',
      'https://github.com/acme/api/pull/1',
    ]);
  });
});
