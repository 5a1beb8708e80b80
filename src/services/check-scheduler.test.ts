import { describe, expect, it, vi } from 'vitest';
import type { SystemEvent } from '../core/entities/WorkEntry';
import { DEFAULT_CONFIG } from '../core/entities/WorkTimeConfig';
import type { EventSource } from '../core/ports/EventSource';
import type { Notifier, ThresholdNotification } from '../core/ports/Notifier';
import { PROVIDERS } from '../core/use_cases/worktime/classifyEvent';
import { CheckScheduler } from './check-scheduler';
import { WorkTimeService } from './worktime-service';

const t = (day: number, hour: number, minute = 0) => new Date(2026, 9, day, hour, minute);
const events: SystemEvent[] = [
  { provider: PROVIDERS.KERNEL_GENERAL, id: 13, timestamp: t(18, 18) },
  { provider: PROVIDERS.KERNEL_GENERAL, id: 12, timestamp: t(19, 8) },
];

function setup(fetchEvents: EventSource['fetchEvents'] = async () => events) {
  let now = t(19, 18, 30);
  const sent: ThresholdNotification[] = [];
  const notifier: Notifier = {
    notify: async (notification) => {
      sent.push(notification);
    },
  };
  const service = new WorkTimeService(DEFAULT_CONFIG, { fetchEvents }, () => now);
  const scheduler = new CheckScheduler(service, notifier, DEFAULT_CONFIG.checkSchedule);
  return {
    scheduler,
    sent,
    setNow: (value: Date) => {
      now = value;
    },
  };
}

describe('CheckScheduler', () => {
  it('notifies each threshold state once per day', async () => {
    const { scheduler, sent, setNow } = setup();

    await scheduler.tick();
    await scheduler.tick();
    setNow(t(19, 18, 45));
    await scheduler.tick();
    await scheduler.tick();

    expect(sent.map((n) => n.state)).toEqual(['max_approaching', 'max_reached']);
  });

  it('skips a tick while the previous check is running', async () => {
    const { scheduler, sent } = setup();

    const first = scheduler.tick();
    const second = await scheduler.tick();
    await first;

    expect(second).toBeNull();
    expect(sent).toHaveLength(1);
  });

  it('reports a failed check without throwing', async () => {
    const { scheduler } = setup(async () => {
      throw new Error('log locked');
    });
    const failed = vi.fn();
    scheduler.on('check-failed', failed);

    expect(await scheduler.tick()).toBeNull();
    expect(failed).toHaveBeenCalledWith(new Error('log locked'));
  });

  it('starts and stops the cron job', () => {
    const { scheduler } = setup();

    scheduler.start();
    expect(scheduler.isRunning()).toBe(true);
    scheduler.stop();
    expect(scheduler.isRunning()).toBe(false);
  });
});
