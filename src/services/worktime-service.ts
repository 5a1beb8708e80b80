/**
 * WorkTimeService: runs one pass of the pipeline (fetch events, rebuild
 * the day entries, account for them). Every call works on a fresh event
 * snapshot; the service keeps no state between calls.
 */
import { EventEmitter } from 'node:events';
import type { ReportRow, WorkEntry } from '../core/entities/WorkEntry';
import { validateConfig } from '../core/entities/WorkTimeConfig';
import type { WorkTimeConfig } from '../core/entities/WorkTimeConfig';
import type { EventSource, LogLocation } from '../core/ports/EventSource';
import { buildProviderFilters } from '../core/use_cases/worktime/classifyEvent';
import { ReconstructSessions } from '../core/use_cases/worktime/ReconstructSessions';
import type { Reconstruction } from '../core/use_cases/worktime/ReconstructSessions';
import { computeAccounting } from '../core/use_cases/worktime/ComputeAccounting';
import { checkThresholds } from '../core/use_cases/worktime/CheckThresholds';
import type { ThresholdCheck } from '../core/use_cases/worktime/CheckThresholds';
import { createLogger } from '../lib/logger';

const log = createLogger('WorkTimeService');

export interface LatestCheck {
  entry: WorkEntry;
  check: ThresholdCheck;
}

export class WorkTimeService extends EventEmitter {
  private readonly config: Readonly<WorkTimeConfig>;
  private readonly reconstructor: ReconstructSessions;

  constructor(
    config: WorkTimeConfig,
    private readonly eventSource: EventSource,
    private readonly clock: () => Date = () => new Date(),
  ) {
    super();
    this.config = validateConfig(config);
    this.reconstructor = new ReconstructSessions(this.config);
  }

  /** Local midnight, historyLength days back */
  historyStart(now: Date): Date {
    return new Date(now.getFullYear(), now.getMonth(), now.getDate() - this.config.historyLength);
  }

  logLocations(): LogLocation[] {
    return [
      { kind: 'live', logName: this.config.logName },
      ...this.config.archivedLogPaths.map((path): LogLocation => ({ kind: 'archive', path })),
    ];
  }

  async reconstruct(): Promise<Reconstruction> {
    const now = this.clock();
    const filters = buildProviderFilters(this.config.showLogoff, this.historyStart(now));
    const events = await this.eventSource.fetchEvents(filters, this.logLocations());

    const result = this.reconstructor.execute(events, now);
    log.debug({ events: events.length, entries: result.entries.length, truncated: result.truncated }, 'Reconstructed sessions');

    if (result.truncated) {
      this.emit('truncated', { entries: result.entries.length });
    }
    return result;
  }

  async report(): Promise<ReportRow[]> {
    const { entries } = await this.reconstruct();

    const rows = entries.map((entry) => ({ entry, attributes: computeAccounting(entry, this.config) }));
    for (const row of rows) {
      if (row.attributes.clockAnomalies > 0) {
        log.warn({ date: row.entry.date, anomalies: row.attributes.clockAnomalies }, 'Interval ends before it starts; counted as zero');
      }
    }

    this.emit('report', rows);
    return rows;
  }

  /** Threshold check of the most recent entry, or null when the log holds none */
  async check(): Promise<LatestCheck | null> {
    const { entries } = await this.reconstruct();
    const entry = entries.length > 0 ? entries[entries.length - 1] : undefined;
    if (!entry) {
      log.info('No work entry to check');
      return null;
    }

    const check = checkThresholds(entry, this.config, this.clock());
    if (check.notification) {
      this.emit('threshold', check.notification);
    }
    return { entry, check };
  }
}
