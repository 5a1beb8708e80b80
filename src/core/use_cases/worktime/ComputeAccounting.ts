import type { DerivedAttributes, FlexSign, Interval, WorkEntry } from '../../entities/WorkEntry';
import type { WorkTimeConfig } from '../../entities/WorkTimeConfig';

export type AccountingConfig = Pick<
  WorkTimeConfig,
  | 'workingHours'
  | 'breakfastBreak'
  | 'lunchBreak'
  | 'breakDeductionThreshold1'
  | 'breakDeductionThreshold2'
  | 'roundingPrecision'
  | 'joinIntervals'
>;

const HOUR_MS = 3_600_000;

export const toHours = (ms: number) => ms / HOUR_MS;

export const formatClock = (date: Date) =>
  `${String(date.getHours()).padStart(2, '0')}:${String(date.getMinutes()).padStart(2, '0')}`;

const isAnomalous = (interval: Interval) => interval.end.getTime() < interval.start.getTime();

/** Round half away from zero to the nearest 1/precision */
export function roundToPrecision(value: number, precision: number): number {
  return (Math.sign(value) * Math.round(Math.abs(value) * precision)) / precision;
}

/**
 * Clock anomalies (end before start) count as zero, never as negative time.
 */
export function totalUptimeMs(entry: WorkEntry, joinIntervals: boolean): number {
  const { intervals } = entry;
  if (intervals.length === 0) return 0;

  if (joinIntervals) {
    const span = intervals[intervals.length - 1].end.getTime() - intervals[0].start.getTime();
    return Math.max(0, span);
  }

  return intervals.reduce(
    (total, interval) => total + Math.max(0, interval.end.getTime() - interval.start.getTime()),
    0,
  );
}

export function intervalSummary(entry: WorkEntry, joinIntervals: boolean): string {
  const { intervals } = entry;
  if (intervals.length === 0) return '';

  if (joinIntervals) {
    return `${formatClock(intervals[0].start)}-${formatClock(intervals[intervals.length - 1].end)}`;
  }
  return intervals.map((i) => `${formatClock(i.start)}-${formatClock(i.end)}`).join(', ');
}

/** Break hours deducted for a given uptime; each threshold applies on its own */
export function breakDeduction(uptimeHours: number, config: AccountingConfig): number {
  let deduction = 0;
  if (uptimeHours >= config.breakDeductionThreshold1) deduction += config.breakfastBreak;
  if (uptimeHours >= config.breakDeductionThreshold2) deduction += config.lunchBreak;
  return deduction;
}

export function bookingHours(uptimeHours: number, config: AccountingConfig): number {
  return roundToPrecision(uptimeHours - breakDeduction(uptimeHours, config), config.roundingPrecision);
}

/**
 * Booking minus target on the hundredths grid. A non-zero difference never
 * rounds to zero; it keeps its sign as ±0.01.
 */
export function flexTimeDelta(booking: number, workingHours: number): number {
  const raw = booking - workingHours;
  if (raw === 0) return 0;
  const rounded = roundToPrecision(raw, 100);
  return rounded !== 0 ? rounded : Math.sign(raw) / 100;
}

export function flexSign(delta: number): FlexSign {
  if (delta > 0) return 'positive';
  if (delta < 0) return 'negative';
  return 'zero';
}

export function computeAccounting(entry: WorkEntry, config: AccountingConfig): DerivedAttributes {
  const uptimeMs = totalUptimeMs(entry, config.joinIntervals);
  const booking = bookingHours(toHours(uptimeMs), config);
  const delta = flexTimeDelta(booking, config.workingHours);

  return {
    totalUptimeMs: uptimeMs,
    intervalSummary: intervalSummary(entry, config.joinIntervals),
    bookingHours: booking,
    flexTimeDelta: delta,
    flexSign: flexSign(booking - config.workingHours),
    clockAnomalies: entry.intervals.filter(isAnomalous).length,
  };
}
