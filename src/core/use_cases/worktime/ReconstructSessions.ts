import { localDateKey } from '../../entities/WorkEntry';
import type { EventKind, Interval, SystemEvent, WorkEntry } from '../../entities/WorkEntry';
import type { WorkTimeConfig } from '../../entities/WorkTimeConfig';
import { classifyEvent } from './classifyEvent';

export type ReconstructionOptions = Pick<WorkTimeConfig, 'showLogoff' | 'mergeGapThresholdMinutes'>;

export interface Reconstruction {
  /** Oldest first */
  entries: WorkEntry[];
  /** A Start or Stop could not be paired before the log ran out */
  truncated: boolean;
}

/**
 * Rebuilds day entries from a chronologically ascending event list.
 *
 * The walk runs from the newest event backwards with a single read cursor:
 * the newest session is closed by a virtual stop at `now`, every later pair
 * looks for the nearest Stop, then the nearest Start before it. Events of the
 * wrong kind are skipped, so repeated Starts (crash, no shutdown logged) keep
 * the most recent one and repeated Stops keep the most recent one as well.
 */
export class ReconstructSessions {
  private readonly mergeGapMs: number;

  constructor(private readonly options: ReconstructionOptions) {
    this.mergeGapMs = options.mergeGapThresholdMinutes * 60_000;
  }

  execute(events: readonly SystemEvent[], now: Date): Reconstruction {
    const kinds: EventKind[] = events.map((e) => classifyEvent(e, this.options.showLogoff));

    // Days newest first; each day's intervals newest first.
    const days: Interval[][] = [];
    let cursor = events.length - 1;
    let truncated = false;

    const seek = (kind: EventKind): SystemEvent | null => {
      while (cursor >= 0 && kinds[cursor] !== kind) cursor--;
      if (cursor < 0) return null;
      const found = events[cursor];
      cursor--;
      return found;
    };

    while (cursor + 1 >= 2) {
      let end: Date;
      if (days.length === 0) {
        end = now;
      } else {
        const stop = seek('stop');
        if (!stop) {
          truncated = true;
          break;
        }
        end = stop.timestamp;
      }

      const start = seek('start');
      if (!start) {
        truncated = true;
        break;
      }

      this.place(days, { start: start.timestamp, end });
    }

    const entries = days
      .map((intervals) => [...intervals].reverse())
      .reverse()
      .map((intervals): WorkEntry => ({
        date: localDateKey(intervals[0].start),
        intervals,
      }));

    return { entries, truncated };
  }

  /**
   * Intervals closer than the merge gap to the day's earliest interval extend
   * it backwards. Further away on the same date they are kept as a separate
   * interval; on an earlier date they open a new day.
   */
  private place(days: Interval[][], interval: Interval): void {
    const current = days.length > 0 ? days[days.length - 1] : undefined;
    if (!current) {
      days.push([interval]);
      return;
    }

    const earliestIndex = current.length - 1;
    const earliest = current[earliestIndex];
    const gap = earliest.start.getTime() - interval.end.getTime();

    if (gap < this.mergeGapMs) {
      current[earliestIndex] = { start: interval.start, end: earliest.end };
    } else if (localDateKey(interval.start) === localDateKey(earliest.start)) {
      current.push(interval);
    } else {
      days.push([interval]);
    }
  }
}
