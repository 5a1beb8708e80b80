/**
 * SchtasksScheduler: registers the periodic check with the Windows Task Scheduler.
 */
import { exec } from 'node:child_process';
import { promisify } from 'node:util';
import type { ScheduledTask, TaskScheduler } from '../../core/ports/TaskScheduler';
import { createLogger } from '../../lib/logger';
import type { ExecFn } from '../event_log/WinEventLogSource';

const execAsync = promisify(exec);
const log = createLogger('TaskScheduler');

const quoteArg = (arg: string) => (/[\s"]/.test(arg) ? `\\"${arg.replace(/"/g, '')}\\"` : arg);

export function buildCreateCommand(task: ScheduledTask): string {
  const action = task.command.map(quoteArg).join(' ');
  return `schtasks /Create /F /SC MINUTE /MO ${task.intervalMinutes} /TN "${task.name}" /TR "${action}"`;
}

export function buildDeleteCommand(name: string): string {
  return `schtasks /Delete /F /TN "${name}"`;
}

export class SchtasksScheduler implements TaskScheduler {
  private readonly exec: ExecFn;

  constructor(exec?: ExecFn) {
    this.exec = exec ?? ((command, options) => execAsync(command, options));
  }

  async install(task: ScheduledTask): Promise<void> {
    await this.run(buildCreateCommand(task));
    log.info({ task: task.name, every: task.intervalMinutes }, 'Scheduled task installed');
  }

  async uninstall(name: string): Promise<void> {
    await this.run(buildDeleteCommand(name));
    log.info({ task: name }, 'Scheduled task removed');
  }

  private async run(command: string): Promise<void> {
    try {
      await this.exec(command, { timeout: 15_000, maxBuffer: 1024 * 1024, windowsHide: true });
    } catch (err) {
      throw new Error(`Task Scheduler command failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
  }
}
