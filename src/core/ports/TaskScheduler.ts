export interface ScheduledTask {
  name: string;
  /** Executable followed by its arguments */
  command: string[];
  intervalMinutes: number;
}

export interface TaskScheduler {
  install(task: ScheduledTask): Promise<void>;
  uninstall(name: string): Promise<void>;
}
