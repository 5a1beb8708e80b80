import { InvalidConfigurationError } from './errors';

export type DateFormat = 'iso' | 'short' | 'long';

export const DATE_FORMATS: readonly DateFormat[] = ['iso', 'short', 'long'];

export interface WorkTimeConfig {
  /** Look-back window in days */
  historyLength: number;
  /** Target booking hours per day */
  workingHours: number;
  breakfastBreak: number;
  lunchBreak: number;
  /** Uptime hours after which the breakfast break is deducted */
  breakDeductionThreshold1: number;
  /** Uptime hours after which the lunch break is deducted */
  breakDeductionThreshold2: number;
  /** Booking hours are rounded to 1/roundingPrecision hours */
  roundingPrecision: number;
  joinIntervals: boolean;
  maxWorkingHours: number;
  showLogoff: boolean;
  mergeGapThresholdMinutes: number;

  // ─── Presentation ──────────────────────────────────────────────
  dateFormat: DateFormat;
  culture: string;

  // ─── Event log ─────────────────────────────────────────────────
  logName: string;
  archivedLogPaths: string[];
  queryTimeoutSeconds: number;

  // ─── Scheduling ────────────────────────────────────────────────
  checkSchedule: string;
}

/** Matches the polling interval of the periodic check */
export const NORMAL_REACHED_WINDOW_HOURS = 5 / 60;

/** Hour values closer than this are equal; absorbs float noise in sums like max - 0.25 */
export const HOURS_TOLERANCE = 1e-9;

export const DEFAULT_CONFIG: WorkTimeConfig = {
  historyLength: 30,
  workingHours: 8,
  breakfastBreak: 0.25,
  lunchBreak: 0.5,
  breakDeductionThreshold1: 3,
  breakDeductionThreshold2: 6,
  roundingPrecision: 60,
  joinIntervals: true,
  maxWorkingHours: 10,
  showLogoff: false,
  mergeGapThresholdMinutes: 5,
  dateFormat: 'iso',
  culture: 'en-GB',
  logName: 'System',
  archivedLogPaths: [],
  queryTimeoutSeconds: 30,
  checkSchedule: '*/5 * * * *',
};

// ─── Validation ─────────────────────────────────────────────────────

const isFiniteNumber = (value: number) => Number.isFinite(value);

function checkRange(issues: string[], key: keyof WorkTimeConfig, value: number, min: number, max: number, integer = false): void {
  if (!isFiniteNumber(value)) {
    issues.push(`${key} must be a number (got ${value})`);
  } else if (integer && !Number.isInteger(value)) {
    issues.push(`${key} must be a whole number (got ${value})`);
  } else if (value < min || value > max) {
    issues.push(`${key} must be between ${min} and ${max} (got ${value})`);
  }
}

export function collectConfigIssues(config: WorkTimeConfig): string[] {
  const issues: string[] = [];

  checkRange(issues, 'historyLength', config.historyLength, 1, 3650, true);
  checkRange(issues, 'workingHours', config.workingHours, Number.MIN_VALUE, 24);
  checkRange(issues, 'breakfastBreak', config.breakfastBreak, 0, 24);
  checkRange(issues, 'lunchBreak', config.lunchBreak, 0, 24);
  checkRange(issues, 'breakDeductionThreshold1', config.breakDeductionThreshold1, 0, 24);
  checkRange(issues, 'breakDeductionThreshold2', config.breakDeductionThreshold2, 0, 24);
  checkRange(issues, 'roundingPrecision', config.roundingPrecision, 1, 100, true);
  checkRange(issues, 'maxWorkingHours', config.maxWorkingHours, Number.MIN_VALUE, 24);
  checkRange(issues, 'mergeGapThresholdMinutes', config.mergeGapThresholdMinutes, 0, 24 * 60);
  checkRange(issues, 'queryTimeoutSeconds', config.queryTimeoutSeconds, 1, 3600);

  if (isFiniteNumber(config.maxWorkingHours) && isFiniteNumber(config.workingHours)
    && config.maxWorkingHours < config.workingHours + NORMAL_REACHED_WINDOW_HOURS - HOURS_TOLERANCE) {
    issues.push(`maxWorkingHours (${config.maxWorkingHours}) must be at least 5 minutes above workingHours (${config.workingHours})`);
  }

  if (!DATE_FORMATS.includes(config.dateFormat)) {
    issues.push(`dateFormat must be one of ${DATE_FORMATS.join(', ')} (got ${config.dateFormat})`);
  }

  try {
    new Intl.DateTimeFormat(config.culture);
  } catch {
    issues.push(`culture is not a valid locale tag (got ${config.culture})`);
  }

  if (config.logName.trim() === '') issues.push('logName must not be empty');
  if (config.checkSchedule.trim().split(/\s+/).length < 5) {
    issues.push(`checkSchedule must be a cron expression (got ${config.checkSchedule})`);
  }

  return issues;
}

/**
 * Returns a frozen copy of the config, or throws with every issue found.
 */
export function validateConfig(config: WorkTimeConfig): Readonly<WorkTimeConfig> {
  const issues = collectConfigIssues(config);
  if (issues.length > 0) throw new InvalidConfigurationError(issues);
  return Object.freeze({ ...config, archivedLogPaths: [...config.archivedLogPaths] });
}
