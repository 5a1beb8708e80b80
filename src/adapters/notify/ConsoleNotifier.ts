import type { Notifier, Severity, ThresholdNotification } from '../../core/ports/Notifier';

const SEVERITY_COLOR: Record<Severity, string> = {
  info: '\x1b[32m',
  warning: '\x1b[33m',
  critical: '\x1b[31m',
};

export interface ConsoleNotifierOptions {
  color: boolean;
  write?: (line: string) => void;
}

export class ConsoleNotifier implements Notifier {
  private readonly write: (line: string) => void;

  constructor(private readonly options: ConsoleNotifierOptions) {
    this.write = options.write ?? ((line) => process.stdout.write(`${line}\n`));
  }

  async notify(notification: ThresholdNotification): Promise<void> {
    const label = `[${notification.severity.toUpperCase()}]`;
    const tag = this.options.color ? `${SEVERITY_COLOR[notification.severity]}${label}\x1b[0m` : label;
    this.write(`${tag} ${notification.title}: ${notification.message}`);
  }
}
