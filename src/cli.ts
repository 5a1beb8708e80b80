/**
 * Command surface: report (default), check, watch, install, uninstall.
 */
import { parseArgs } from 'node:util';
import type { WorkTimeConfig } from './core/entities/WorkTimeConfig';
import { WorkTimeError } from './core/entities/errors';
import type { EventSource } from './core/ports/EventSource';
import type { Notifier } from './core/ports/Notifier';
import type { TaskScheduler } from './core/ports/TaskScheduler';
import { loadWorkTimeConfig } from './config';
import { WinEventLogSource } from './adapters/event_log/WinEventLogSource';
import { JsonEventSource } from './adapters/event_log/JsonEventSource';
import { renderReport, renderReportJson } from './adapters/report/ConsoleReportRenderer';
import { ConsoleNotifier } from './adapters/notify/ConsoleNotifier';
import { SchtasksScheduler } from './adapters/scheduler/SchtasksScheduler';
import { WorkTimeService } from './services/worktime-service';
import { CheckScheduler } from './services/check-scheduler';
import { createLogger } from './lib/logger';

const log = createLogger('CLI');

export const TASK_NAME = 'WorkTime Check';
export const TASK_INTERVAL_MINUTES = 5;

export const EXIT = {
  OK: 0,
  LOG_UNAVAILABLE: 1,
  USAGE: 2,
  UNEXPECTED: 3,
} as const;

const MODES = ['report', 'check', 'watch', 'install', 'uninstall'] as const;
type Mode = (typeof MODES)[number];

const GRAPHICAL_MODES = ['install_widget', 'uninstall_widget', 'widget'];

const isMode = (value: string): value is Mode => MODES.some((mode) => mode === value);

export const HELP = `Usage: worktime [report|check|watch|install|uninstall] [options]

Modes:
  report (default)      table of booking hours and flex-time per day
  check                 compare today's booking hours with the thresholds
  watch                 run the check on a schedule until interrupted
  install / uninstall   register or remove a scheduled check (Windows)

Options:
  --history <days>             look-back window
  --working-hours <h>          target hours per day
  --breakfast-break <h>        break deducted after the first threshold
  --lunch-break <h>            break deducted after the second threshold
  --precision <n>              round booking hours to 1/n hours
  --date-format <iso|short|long>
  --culture <locale>
  --join-intervals <0|1>       count breaks between sessions as worked time
  --max-working-hours <h>
  --show-logoff <0|1>          treat logon/logoff and lock/unlock as start/stop
  --merge-gap <minutes>        gaps shorter than this are closed
  --schedule <cron>            schedule for watch mode
  --archive <path.evtx>        additional archived log (repeatable)
  --events-file <path.json>    read exported events instead of the event log
  --config <path>              JSON config file
  --format <table|json>
  --no-color
  -h, --help`;

export interface CliContext {
  env: NodeJS.ProcessEnv;
  cwd: string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  color: boolean;
  /** Executable and arguments that start this CLI, used by install */
  selfCommand: string[];
  clock?: () => Date;
  eventSource?: EventSource;
  notifier?: Notifier;
  taskScheduler?: TaskScheduler;
  /** Resolves when watch mode should stop */
  untilShutdown?: () => Promise<void>;
}

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      history: { type: 'string' },
      'working-hours': { type: 'string' },
      'breakfast-break': { type: 'string' },
      'lunch-break': { type: 'string' },
      precision: { type: 'string' },
      'date-format': { type: 'string' },
      culture: { type: 'string' },
      'join-intervals': { type: 'string' },
      'max-working-hours': { type: 'string' },
      'show-logoff': { type: 'string' },
      'merge-gap': { type: 'string' },
      schedule: { type: 'string' },
      archive: { type: 'string', multiple: true },
      'events-file': { type: 'string' },
      config: { type: 'string' },
      format: { type: 'string' },
      'no-color': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

type ParsedArgs = ReturnType<typeof parse>;

function configOverrides(values: ParsedArgs['values']): Partial<Record<keyof WorkTimeConfig, string>> {
  const pairs: [keyof WorkTimeConfig, string | undefined][] = [
    ['historyLength', values.history],
    ['workingHours', values['working-hours']],
    ['breakfastBreak', values['breakfast-break']],
    ['lunchBreak', values['lunch-break']],
    ['roundingPrecision', values.precision],
    ['dateFormat', values['date-format']],
    ['culture', values.culture],
    ['joinIntervals', values['join-intervals']],
    ['maxWorkingHours', values['max-working-hours']],
    ['showLogoff', values['show-logoff']],
    ['mergeGapThresholdMinutes', values['merge-gap']],
    ['checkSchedule', values.schedule],
    ['archivedLogPaths', values.archive && values.archive.length > 0 ? values.archive.join(';') : undefined],
  ];

  const overrides: Partial<Record<keyof WorkTimeConfig, string>> = {};
  for (const [key, value] of pairs) {
    if (value !== undefined) overrides[key] = value;
  }
  return overrides;
}

export async function runCli(argv: string[], context: CliContext): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parse(argv);
  } catch (err) {
    context.stderr(`${err instanceof Error ? err.message : String(err)}\n\n${HELP}`);
    return EXIT.USAGE;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    context.stdout(HELP);
    return EXIT.OK;
  }

  const requested = positionals[0] ?? 'report';
  if (GRAPHICAL_MODES.includes(requested)) {
    context.stderr(`Mode "${requested}" needs the desktop widget, which this command-line tool does not include.`);
    return EXIT.USAGE;
  }
  if (!isMode(requested) || positionals.length > 1) {
    context.stderr(`Unknown mode: ${positionals.join(' ')}\n\n${HELP}`);
    return EXIT.USAGE;
  }

  const format = values.format ?? 'table';
  if (format !== 'table' && format !== 'json') {
    context.stderr(`Unknown format: ${format}`);
    return EXIT.USAGE;
  }

  try {
    const config = loadWorkTimeConfig({
      cwd: context.cwd,
      configPath: values.config,
      env: context.env,
      overrides: configOverrides(values),
    });
    const color = context.color && !values['no-color'] && !context.env.NO_COLOR;

    const eventSource = context.eventSource ?? (values['events-file']
      ? new JsonEventSource(values['events-file'])
      : new WinEventLogSource({ timeoutSeconds: config.queryTimeoutSeconds }));
    const service = new WorkTimeService(config, eventSource, context.clock);
    const notifier = context.notifier ?? new ConsoleNotifier({ color, write: context.stdout });

    switch (requested) {
      case 'report': {
        const rows = await service.report();
        context.stdout(format === 'json'
          ? renderReportJson(rows)
          : renderReport(rows, { dateFormat: config.dateFormat, culture: config.culture, color }));
        return EXIT.OK;
      }

      case 'check': {
        const result = await service.check();
        if (!result) {
          context.stdout('No work entries found in the event log.');
        } else if (result.check.notification) {
          await notifier.notify(result.check.notification);
        } else {
          context.stdout(
            `Booked ${result.check.bookingHours.toFixed(2)}h of ${config.workingHours}h; maximum reached in ${result.check.minutesToMax} minutes.`,
          );
        }
        return EXIT.OK;
      }

      case 'watch': {
        const scheduler = new CheckScheduler(service, notifier, config.checkSchedule);
        scheduler.start();
        await scheduler.tick();
        await (context.untilShutdown ?? waitForSignal)();
        scheduler.stop();
        return EXIT.OK;
      }

      case 'install': {
        const taskScheduler = context.taskScheduler ?? new SchtasksScheduler();
        const forwarded = argv.filter((arg) => arg !== 'install');
        await taskScheduler.install({
          name: TASK_NAME,
          command: [...context.selfCommand, 'check', ...forwarded],
          intervalMinutes: TASK_INTERVAL_MINUTES,
        });
        context.stdout(`Scheduled task "${TASK_NAME}" installed (every ${TASK_INTERVAL_MINUTES} minutes).`);
        return EXIT.OK;
      }

      case 'uninstall': {
        const taskScheduler = context.taskScheduler ?? new SchtasksScheduler();
        await taskScheduler.uninstall(TASK_NAME);
        context.stdout(`Scheduled task "${TASK_NAME}" removed.`);
        return EXIT.OK;
      }
    }
  } catch (err) {
    if (err instanceof WorkTimeError) {
      context.stderr(err.message);
      return err.kind === 'LogUnavailable' ? EXIT.LOG_UNAVAILABLE : EXIT.USAGE;
    }
    log.error({ err }, 'Unexpected failure');
    context.stderr(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
    return EXIT.UNEXPECTED;
  }
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
}
