import { describe, expect, it } from 'vitest';
import type { ThresholdNotification } from '../../core/ports/Notifier';
import { ConsoleNotifier } from './ConsoleNotifier';

const notification: ThresholdNotification = {
  state: 'max_approaching',
  severity: 'warning',
  title: 'Maximum working time approaching',
  message: 'Maximum working time reached in 15 minutes (at 18:00).',
  minutesToMax: 15,
  leaveBy: new Date(2026, 9, 19, 18, 0),
};

describe('ConsoleNotifier', () => {
  it('prints the severity, title and message on one line', async () => {
    const lines: string[] = [];
    await new ConsoleNotifier({ color: false, write: (line) => lines.push(line) }).notify(notification);

    expect(lines).toEqual([
      '[WARNING] Maximum working time approaching: Maximum working time reached in 15 minutes (at 18:00).',
    ]);
  });

  it('colours the severity tag', async () => {
    const lines: string[] = [];
    await new ConsoleNotifier({ color: true, write: (line) => lines.push(line) }).notify(notification);

    expect(lines[0].startsWith('\x1b[33m[WARNING]\x1b[0m ')).toBe(true);
  });
});
