export type ThresholdState = 'normal_reached' | 'max_approaching' | 'max_reached' | 'none';

export type Severity = 'info' | 'warning' | 'critical';

export interface ThresholdNotification {
  state: Exclude<ThresholdState, 'none'>;
  severity: Severity;
  title: string;
  message: string;
  /** Minutes until the maximum is reached; negative once exceeded */
  minutesToMax: number;
  leaveBy: Date;
}

export interface Notifier {
  notify(notification: ThresholdNotification): Promise<void>;
}
