export interface SystemEvent {
  /** Provider-specific event code */
  id: number;
  provider: string;
  timestamp: Date;
  /** Rendered message text; only consulted for session-lock rules */
  payload?: string;
}

export type EventCategory =
  | 'boot_wake'
  | 'suspend_shutdown'
  | 'session_lock'
  | 'session_unlock'
  | 'ignored';

export type EventKind = 'start' | 'stop' | 'unclassified';

export interface Interval {
  readonly start: Date;
  readonly end: Date;
}

export interface WorkEntry {
  /** Local calendar date (YYYY-MM-DD) of the first interval's start */
  readonly date: string;
  /** Chronological, oldest first */
  readonly intervals: readonly Interval[];
}

export type FlexSign = 'positive' | 'negative' | 'zero';

export interface DerivedAttributes {
  totalUptimeMs: number;
  intervalSummary: string;
  bookingHours: number;
  flexTimeDelta: number;
  flexSign: FlexSign;
  /** Intervals whose end precedes their start */
  clockAnomalies: number;
}

export interface ReportRow {
  entry: WorkEntry;
  attributes: DerivedAttributes;
}

export function localDateKey(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}
