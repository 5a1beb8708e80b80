import { describe, expect, it } from 'vitest';
import type { SystemEvent } from '../../entities/WorkEntry';
import { PROVIDERS } from './classifyEvent';
import { ReconstructSessions } from './ReconstructSessions';

const t = (day: number, hour: number, minute = 0) => new Date(2026, 9, day, hour, minute);

const boot = (day: number, hour: number, minute = 0): SystemEvent =>
  ({ provider: PROVIDERS.KERNEL_GENERAL, id: 12, timestamp: t(day, hour, minute) });
const shutdown = (day: number, hour: number, minute = 0): SystemEvent =>
  ({ provider: PROVIDERS.KERNEL_GENERAL, id: 13, timestamp: t(day, hour, minute) });
const winlogon = (day: number, hour: number, minute: number, code: number): SystemEvent => ({
  provider: PROVIDERS.WINLOGON,
  id: 811,
  timestamp: t(day, hour, minute),
  payload: `The winlogon notification subscriber <SessionEnv> began handling the notification event (${code}).`,
});

function reconstruct(events: SystemEvent[], now: Date, options: { mergeGap?: number; showLogoff?: boolean } = {}) {
  return new ReconstructSessions({
    mergeGapThresholdMinutes: options.mergeGap ?? 5,
    showLogoff: options.showLogoff ?? false,
  }).execute(events, now);
}

describe('ReconstructSessions', () => {
  it('builds one day with two intervals around a lunch shutdown', () => {
    const result = reconstruct([boot(19, 8), shutdown(19, 12), boot(19, 13), shutdown(19, 17)], t(19, 17));

    expect(result.truncated).toBe(false);
    expect(result.entries).toEqual([
      {
        date: '2026-10-19',
        intervals: [
          { start: t(19, 8), end: t(19, 12) },
          { start: t(19, 13), end: t(19, 17) },
        ],
      },
    ]);
  });

  it('closes the newest session at the current time', () => {
    const result = reconstruct([boot(19, 8)], t(19, 11));
    expect(result.entries).toEqual([]);

    const withHistory = reconstruct([shutdown(18, 18), boot(19, 8)], t(19, 11, 30));
    expect(withHistory.entries).toEqual([
      { date: '2026-10-19', intervals: [{ start: t(19, 8), end: t(19, 11, 30) }] },
    ]);
  });

  it('keeps the most recent of consecutive start events', () => {
    const result = reconstruct([boot(19, 8), boot(19, 9), shutdown(19, 17)], t(19, 17));

    expect(result.entries).toEqual([
      { date: '2026-10-19', intervals: [{ start: t(19, 9), end: t(19, 17) }] },
    ]);
  });

  it('keeps the most recent of consecutive stop events', () => {
    const result = reconstruct([boot(18, 8), shutdown(18, 16), shutdown(18, 17), boot(19, 8)], t(19, 12));

    expect(result.entries).toEqual([
      { date: '2026-10-18', intervals: [{ start: t(18, 8), end: t(18, 17) }] },
      { date: '2026-10-19', intervals: [{ start: t(19, 8), end: t(19, 12) }] },
    ]);
  });

  it('returns no entries for empty and single-event logs', () => {
    expect(reconstruct([], t(19, 12))).toEqual({ entries: [], truncated: false });
    expect(reconstruct([boot(19, 8)], t(19, 12))).toEqual({ entries: [], truncated: false });
  });

  it('stops early and keeps finished days when no stop can be paired', () => {
    const result = reconstruct([boot(18, 9), boot(18, 10), boot(19, 8)], t(19, 12));

    expect(result.truncated).toBe(true);
    expect(result.entries).toEqual([
      { date: '2026-10-19', intervals: [{ start: t(19, 8), end: t(19, 12) }] },
    ]);
  });

  it('stops early when no start can be paired', () => {
    const result = reconstruct([shutdown(18, 7), shutdown(18, 8), boot(19, 8)], t(19, 12));

    expect(result.truncated).toBe(true);
    expect(result.entries).toHaveLength(1);
    expect(result.entries[0].date).toBe('2026-10-19');
  });

  it('closes gaps shorter than the merge threshold', () => {
    const result = reconstruct([boot(19, 8), shutdown(19, 12), boot(19, 12, 3)], t(19, 17));

    expect(result.entries).toEqual([
      { date: '2026-10-19', intervals: [{ start: t(19, 8), end: t(19, 17) }] },
    ]);
  });

  it('keeps a short gap as a separate interval when the threshold is zero', () => {
    const result = reconstruct([boot(19, 8), shutdown(19, 12), boot(19, 12, 3)], t(19, 17), { mergeGap: 0 });

    expect(result.entries[0].intervals).toEqual([
      { start: t(19, 8), end: t(19, 12) },
      { start: t(19, 12, 3), end: t(19, 17) },
    ]);
  });

  it('continues a day past midnight when the gap is below the threshold', () => {
    const result = reconstruct([boot(18, 20), shutdown(18, 23, 58), boot(19, 0, 1)], t(19, 1, 30));

    expect(result.entries).toEqual([
      { date: '2026-10-18', intervals: [{ start: t(18, 20), end: t(19, 1, 30) }] },
    ]);
  });

  it('pairs lock and unlock events only when showLogoff is set', () => {
    const events = [boot(19, 8), winlogon(19, 12, 0, 7), winlogon(19, 12, 45, 8)];

    expect(reconstruct(events, t(19, 17), { showLogoff: true }).entries[0].intervals).toEqual([
      { start: t(19, 8), end: t(19, 12) },
      { start: t(19, 12, 45), end: t(19, 17) },
    ]);
    expect(reconstruct(events, t(19, 17)).entries[0].intervals).toEqual([
      { start: t(19, 8), end: t(19, 17) },
    ]);
  });

  it('accepts an interval whose end precedes its start', () => {
    const result = reconstruct([shutdown(18, 20), boot(19, 10)], t(19, 9));

    expect(result.entries).toEqual([
      { date: '2026-10-19', intervals: [{ start: t(19, 10), end: t(19, 9) }] },
    ]);
  });

  it('is deterministic for the same input', () => {
    const events = [boot(17, 7, 45), shutdown(17, 16, 10), boot(18, 8), shutdown(18, 12), boot(18, 12, 40), shutdown(18, 18), boot(19, 8, 5)];
    const now = t(19, 15);

    expect(reconstruct(events, now)).toEqual(reconstruct(events, now));
  });
});
