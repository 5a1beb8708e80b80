import type { WorkEntry } from '../../entities/WorkEntry';
import { HOURS_TOLERANCE, NORMAL_REACHED_WINDOW_HOURS } from '../../entities/WorkTimeConfig';
import type { WorkTimeConfig } from '../../entities/WorkTimeConfig';
import type { Severity, ThresholdNotification, ThresholdState } from '../../ports/Notifier';
import { breakDeduction, computeAccounting, formatClock, toHours } from './ComputeAccounting';
import type { AccountingConfig } from './ComputeAccounting';

export type ThresholdConfig = AccountingConfig & Pick<WorkTimeConfig, 'maxWorkingHours'>;

export const MAX_PREWARNING_HOURS = 0.25;

const SEVERITY: Record<Exclude<ThresholdState, 'none'>, Severity> = {
  normal_reached: 'info',
  max_approaching: 'warning',
  max_reached: 'critical',
};

export interface ThresholdCheck {
  state: ThresholdState;
  bookingHours: number;
  minutesToMax: number;
  leaveBy: Date;
  notification: ThresholdNotification | null;
}

/**
 * Bookings sit on the 1/precision grid while bounds such as `max - 0.25`
 * may carry float noise, so bounds are compared with a small tolerance.
 */
const reached = (hours: number, bound: number) => hours >= bound - HOURS_TOLERANCE;

/** First match wins: a booking exactly at the maximum is MaxReached, not MaxApproaching */
export function classifyThreshold(bookingHours: number, config: ThresholdConfig): ThresholdState {
  if (reached(bookingHours, config.workingHours)
    && !reached(bookingHours, config.workingHours + NORMAL_REACHED_WINDOW_HOURS)) {
    return 'normal_reached';
  }
  if (reached(bookingHours, config.maxWorkingHours)) return 'max_reached';
  if (reached(bookingHours, config.maxWorkingHours - MAX_PREWARNING_HOURS)) return 'max_approaching';
  return 'none';
}

/**
 * Uptime hours at which the booking reaches the maximum. Breaks whose
 * threshold is only crossed on the way there are added back as well.
 */
export function uptimeHoursAtMax(config: ThresholdConfig): number {
  let target = config.maxWorkingHours;
  for (let i = 0; i < 3; i++) {
    const next = config.maxWorkingHours + breakDeduction(target, config);
    if (next === target) break;
    target = next;
  }
  return target;
}

export function minutesToMax(uptimeMs: number, config: ThresholdConfig): number {
  return Math.round((uptimeHoursAtMax(config) - toHours(uptimeMs)) * 60);
}

function describe(state: Exclude<ThresholdState, 'none'>, minutes: number, leaveBy: Date): { title: string; message: string } {
  switch (state) {
    case 'normal_reached':
      return {
        title: 'Normal working time reached',
        message: `Normal working time reached. Leave by ${formatClock(leaveBy)} to stay within the maximum (${minutes} minutes left).`,
      };
    case 'max_approaching':
      return {
        title: 'Maximum working time approaching',
        message: `Maximum working time reached in ${minutes} minutes (at ${formatClock(leaveBy)}).`,
      };
    case 'max_reached':
      return {
        title: 'Maximum working time exceeded',
        message: `Maximum working time exceeded by ${Math.max(0, -minutes)} minutes.`,
      };
  }
}

/**
 * Evaluates the most recent work entry against the configured thresholds.
 */
export function checkThresholds(entry: WorkEntry, config: ThresholdConfig, now: Date): ThresholdCheck {
  const attributes = computeAccounting(entry, config);
  const remaining = minutesToMax(attributes.totalUptimeMs, config);
  const leaveBy = new Date(now.getTime() + remaining * 60_000);
  const state = classifyThreshold(attributes.bookingHours, config);

  if (state === 'none') {
    return { state, bookingHours: attributes.bookingHours, minutesToMax: remaining, leaveBy, notification: null };
  }

  return {
    state,
    bookingHours: attributes.bookingHours,
    minutesToMax: remaining,
    leaveBy,
    notification: {
      state,
      severity: SEVERITY[state],
      ...describe(state, remaining, leaveBy),
      minutesToMax: remaining,
      leaveBy,
    },
  };
}
