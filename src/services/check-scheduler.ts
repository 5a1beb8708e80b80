/**
 * CheckScheduler: runs the threshold check on a cron schedule and forwards
 * each (day, state) notification to the notifier once. A tick that fires
 * while the previous check is still running is skipped.
 */
import { EventEmitter } from 'node:events';
import { CronJob } from 'cron';
import type { Notifier } from '../core/ports/Notifier';
import { createLogger } from '../lib/logger';
import type { LatestCheck, WorkTimeService } from './worktime-service';

const log = createLogger('CheckScheduler');

export class CheckScheduler extends EventEmitter {
  private cronJob: CronJob | null = null;
  private checking = false;
  private notifiedDate = '';
  private notifiedStates = new Set<string>();

  constructor(
    private readonly service: WorkTimeService,
    private readonly notifier: Notifier,
    private readonly schedule: string,
  ) {
    super();
  }

  // ─── Start / Stop ──────────────────────────────────────────────

  start(): void {
    if (this.cronJob) return;
    this.cronJob = new CronJob(this.schedule, () => {
      void this.tick();
    }, null, true);
    log.info({ schedule: this.schedule }, 'Periodic check started');
  }

  stop(): void {
    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
      log.info('Periodic check stopped');
    }
  }

  isRunning(): boolean {
    return this.cronJob !== null;
  }

  // ─── Tick ──────────────────────────────────────────────────────

  async tick(): Promise<LatestCheck | null> {
    if (this.checking) {
      log.warn('Previous check still running; skipping this tick');
      return null;
    }

    this.checking = true;
    try {
      const result = await this.service.check();
      if (result) await this.deliver(result);
      return result;
    } catch (err) {
      log.error({ err }, 'Check failed');
      this.emit('check-failed', err);
      return null;
    } finally {
      this.checking = false;
    }
  }

  private async deliver({ entry, check }: LatestCheck): Promise<void> {
    if (entry.date !== this.notifiedDate) {
      this.notifiedDate = entry.date;
      this.notifiedStates.clear();
    }

    const { notification } = check;
    if (!notification || this.notifiedStates.has(notification.state)) return;

    await this.notifier.notify(notification);
    this.notifiedStates.add(notification.state);
    this.emit('notification-sent', notification);
  }
}
