import type { SystemEvent } from '../../core/entities/WorkEntry';
import type { ProviderFilter } from '../../core/ports/EventSource';

const eventKey = (e: SystemEvent) => `${e.timestamp.getTime()}|${e.provider}|${e.id}`;

/**
 * K-way merge of ascending event streams. Events present in more than one
 * stream (live log and an archive overlapping) are kept once.
 */
export function mergeEventStreams(streams: readonly (readonly SystemEvent[])[]): SystemEvent[] {
  const positions = streams.map(() => 0);
  const merged: SystemEvent[] = [];
  const seen = new Set<string>();

  for (;;) {
    let pick = -1;
    for (let s = 0; s < streams.length; s++) {
      if (positions[s] >= streams[s].length) continue;
      if (pick < 0 || streams[s][positions[s]].timestamp.getTime() < streams[pick][positions[pick]].timestamp.getTime()) {
        pick = s;
      }
    }
    if (pick < 0) break;

    const event = streams[pick][positions[pick]];
    positions[pick]++;

    const key = eventKey(event);
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(event);
  }

  return merged;
}

export function sortByTimestamp(events: readonly SystemEvent[]): SystemEvent[] {
  return [...events].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

export function matchesFilters(event: SystemEvent, filters: readonly ProviderFilter[]): boolean {
  return filters.some(
    (f) => f.provider === event.provider && f.ids.includes(event.id) && event.timestamp.getTime() >= f.since.getTime(),
  );
}
