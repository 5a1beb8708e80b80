import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { SystemEvent } from './core/entities/WorkEntry';
import { LogUnavailableError } from './core/entities/errors';
import type { EventSource } from './core/ports/EventSource';
import type { Notifier, ThresholdNotification } from './core/ports/Notifier';
import type { ScheduledTask, TaskScheduler } from './core/ports/TaskScheduler';
import { PROVIDERS } from './core/use_cases/worktime/classifyEvent';
import { EXIT, HELP, TASK_NAME, runCli } from './cli';
import type { CliContext } from './cli';

const t = (day: number, hour: number, minute = 0) => new Date(2026, 9, day, hour, minute);
const boot = (day: number, hour: number): SystemEvent =>
  ({ provider: PROVIDERS.KERNEL_GENERAL, id: 12, timestamp: t(day, hour) });
const shutdown = (day: number, hour: number): SystemEvent =>
  ({ provider: PROVIDERS.KERNEL_GENERAL, id: 13, timestamp: t(day, hour) });

const week = [boot(16, 8), shutdown(16, 17), boot(19, 8), shutdown(19, 12), boot(19, 13)];

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'worktime-cli-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function harness(overrides: Partial<CliContext> = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const notified: ThresholdNotification[] = [];
  const installed: ScheduledTask[] = [];
  const removed: string[] = [];

  const eventSource: EventSource = { fetchEvents: async () => week };
  const notifier: Notifier = {
    notify: async (n) => {
      notified.push(n);
    },
  };
  const taskScheduler: TaskScheduler = {
    install: async (task) => {
      installed.push(task);
    },
    uninstall: async (name) => {
      removed.push(name);
    },
  };

  const context: CliContext = {
    env: {},
    cwd: dir,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    color: false,
    selfCommand: ['node', 'worktime.js'],
    clock: () => t(19, 17),
    eventSource,
    notifier,
    taskScheduler,
    untilShutdown: async () => {},
    ...overrides,
  };
  return { context, out, err, notified, installed, removed };
}

describe('runCli', () => {
  it('prints the report table by default', async () => {
    const { context, out } = harness();

    expect(await runCli([], context)).toBe(EXIT.OK);

    const lines = out.join('\n').split('\n');
    expect(lines[0]).toBe('Date        Booking   Flex  Uptime  Intervals');
    expect(lines[2]).toBe('2026-10-16     8.25  +0.25    9:00  08:00-17:00');
    expect(lines[4]).toBe('2026-10-19     8.25  +0.25    9:00  08:00-17:00');
    expect(lines[lines.length - 1]).toBe('Total flex-time: +0.50');
  });

  it('applies command-line settings to the report', async () => {
    const { context, out } = harness();

    await runCli(['report', '--join-intervals', '0', '--format', 'json'], context);

    const report: unknown = JSON.parse(out.join(''));
    expect(report).toMatchObject({
      entries: [
        { date: '2026-10-16', bookingHours: 8.25 },
        { date: '2026-10-19', bookingHours: 7.25, intervalSummary: '08:00-12:00, 13:00-17:00' },
      ],
      totalFlexTime: -0.5,
    });
  });

  it('summarises the check when no threshold is hit', async () => {
    const { context, out, notified } = harness();

    expect(await runCli(['check'], context)).toBe(EXIT.OK);

    expect(out).toEqual(['Booked 8.25h of 8h; maximum reached in 105 minutes.']);
    expect(notified).toEqual([]);
  });

  it('hands threshold notifications to the notifier', async () => {
    const { context, notified } = harness({ clock: () => t(19, 19) });

    await runCli(['check', '--max-working-hours', '9'], context);

    expect(notified.map((n) => n.state)).toEqual(['max_reached']);
  });

  it('notifies once from watch mode and stops on shutdown', async () => {
    const { context, notified } = harness({ clock: () => t(19, 19) });

    expect(await runCli(['watch'], context)).toBe(EXIT.OK);
    expect(notified).toHaveLength(1);
  });

  it('installs a task that runs the check with the same options', async () => {
    const { context, installed, out } = harness();

    expect(await runCli(['install', '--working-hours', '7'], context)).toBe(EXIT.OK);

    expect(installed).toEqual([
      { name: TASK_NAME, command: ['node', 'worktime.js', 'check', '--working-hours', '7'], intervalMinutes: 5 },
    ]);
    expect(out).toEqual([`Scheduled task "${TASK_NAME}" installed (every 5 minutes).`]);
  });

  it('uninstalls the task', async () => {
    const { context, removed } = harness();

    expect(await runCli(['uninstall'], context)).toBe(EXIT.OK);
    expect(removed).toEqual([TASK_NAME]);
  });

  it('prints help', async () => {
    const { context, out } = harness();

    expect(await runCli(['--help'], context)).toBe(EXIT.OK);
    expect(out).toEqual([HELP]);
  });

  it('rejects unknown and widget modes', async () => {
    const { context, err } = harness();

    expect(await runCli(['fly'], context)).toBe(EXIT.USAGE);
    expect(await runCli(['widget'], context)).toBe(EXIT.USAGE);
    expect(err[1]).toBe('Mode "widget" needs the desktop widget, which this command-line tool does not include.');
  });

  it('exits with the usage code on invalid settings', async () => {
    const { context, err } = harness();

    expect(await runCli(['--precision', '0'], context)).toBe(EXIT.USAGE);
    expect(err).toEqual(['Invalid configuration:\n  - roundingPrecision must be between 1 and 100 (got 0)']);
  });

  it('exits with the log code when no event source opens', async () => {
    const fetchEvents = vi.fn<EventSource['fetchEvents']>().mockRejectedValue(new LogUnavailableError(['System']));
    const { context, err } = harness({ eventSource: { fetchEvents } });

    expect(await runCli(['report'], context)).toBe(EXIT.LOG_UNAVAILABLE);
    expect(err).toEqual(['No event log source could be opened (System)']);
  });

  it('exits with the unexpected code on other failures', async () => {
    const { context, err } = harness({ eventSource: { fetchEvents: async () => { throw new Error('boom'); } } });

    expect(await runCli(['report'], context)).toBe(EXIT.UNEXPECTED);
    expect(err).toEqual(['Unexpected error: boom']);
  });
});
