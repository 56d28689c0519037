import { describe, it, expect } from 'vitest';
import { resolveDay, resolveWindow } from '../../src/application/date-shortcuts.js';
import { ValidationError } from '../../src/domain/index.js';

/** Monday morning. */
const now = new Date('2026-10-19T07:30:00Z');
const utc = { now, zone: 'UTC' };

describe('resolveDay', () => {
  it('resolves today and yesterday to midnight', () => {
    expect(resolveDay('today', utc).toISOString()).toBe('2026-10-19T00:00:00.000Z');
    expect(resolveDay('yesterday', utc).toISOString()).toBe('2026-10-18T00:00:00.000Z');
  });

  it('resolves a weekday to its most recent past occurrence', () => {
    expect(resolveDay('friday', utc).toISOString()).toBe('2026-10-16T00:00:00.000Z');
    expect(resolveDay('Fri', utc).toISOString()).toBe('2026-10-16T00:00:00.000Z');
    expect(resolveDay('wednesday', utc).toISOString()).toBe('2026-10-14T00:00:00.000Z');
  });

  it('resolves the current weekday to one week ago', () => {
    expect(resolveDay('monday', utc).toISOString()).toBe('2026-10-12T00:00:00.000Z');
  });

  it('resolves an ISO date', () => {
    expect(resolveDay('2026-10-01', utc).toISOString()).toBe('2026-10-01T00:00:00.000Z');
  });

  it('computes day boundaries in the given zone', () => {
    // 09:30 in Berlin (CEST, UTC+2)
    expect(resolveDay('yesterday', { now, zone: 'Europe/Berlin' }).toISOString())
      .toBe('2026-10-17T22:00:00.000Z');
  });

  it('rejects unknown shortcuts and impossible dates', () => {
    expect(() => resolveDay('soon', utc)).toThrow(ValidationError);
    expect(() => resolveDay('2026-13-01', utc)).toThrow(ValidationError);
  });

  it('rejects an unknown zone', () => {
    expect(() => resolveDay('today', { now, zone: 'Mars/Olympus' })).toThrow('Invalid time zone "Mars/Olympus"');
  });
});

describe('resolveWindow', () => {
  it('defaults to yesterday until now', () => {
    expect(resolveWindow({}, utc)).toEqual({
      since: new Date('2026-10-18T00:00:00Z'),
      until: now,
    });
  });

  it('resolves both ends', () => {
    expect(resolveWindow({ since: 'friday', until: 'today' }, utc)).toEqual({
      since: new Date('2026-10-16T00:00:00Z'),
      until: new Date('2026-10-19T00:00:00Z'),
    });
  });
});
