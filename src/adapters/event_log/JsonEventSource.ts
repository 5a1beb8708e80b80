/**
 * JsonEventSource: serves events from exported JSON files
 * (`[{ "id": 12, "provider": "...", "timestamp": "2026-10-19T06:00:00Z", "payload": "..." }]`).
 * The live log maps to the export file given at construction, archives to their own paths.
 */
import fs from 'node:fs/promises';
import type { SystemEvent } from '../../core/entities/WorkEntry';
import { LogUnavailableError } from '../../core/entities/errors';
import { describeLocation } from '../../core/ports/EventSource';
import type { EventSource, LogLocation, ProviderFilter } from '../../core/ports/EventSource';
import { createLogger } from '../../lib/logger';
import { matchesFilters, mergeEventStreams, sortByTimestamp } from './mergeEventStreams';

const log = createLogger('JsonEventSource');

function toSystemEvent(value: unknown): SystemEvent | null {
  if (typeof value !== 'object' || value === null) return null;
  if (!('id' in value) || typeof value.id !== 'number') return null;
  if (!('provider' in value) || typeof value.provider !== 'string') return null;
  if (!('timestamp' in value) || typeof value.timestamp !== 'string') return null;

  const timestamp = new Date(value.timestamp);
  if (Number.isNaN(timestamp.getTime())) return null;

  const payload = 'payload' in value && typeof value.payload === 'string' ? value.payload : undefined;
  return { id: value.id, provider: value.provider, timestamp, payload };
}

export function parseEventExport(text: string): SystemEvent[] {
  const data: unknown = JSON.parse(text);
  if (!Array.isArray(data)) throw new Error('event export must be a JSON array');

  const events: SystemEvent[] = [];
  for (const item of data) {
    const event = toSystemEvent(item);
    if (event) events.push(event);
    else log.warn({ item }, 'Skipping malformed exported event');
  }
  return events;
}

export class JsonEventSource implements EventSource {
  constructor(private readonly exportPath: string) {}

  async fetchEvents(filters: ProviderFilter[], sources: LogLocation[]): Promise<SystemEvent[]> {
    const streams: SystemEvent[][] = [];
    const failed: string[] = [];
    let lastError: unknown;

    for (const location of sources) {
      const filePath = location.kind === 'live' ? this.exportPath : location.path;
      try {
        const events = parseEventExport(await fs.readFile(filePath, 'utf-8'));
        streams.push(sortByTimestamp(events.filter((e) => matchesFilters(e, filters))));
      } catch (err) {
        lastError = err;
        failed.push(describeLocation(location));
        log.warn({ file: filePath, err }, 'Event export could not be read');
      }
    }

    if (streams.length === 0) {
      throw new LogUnavailableError(failed.length > 0 ? failed : ['no sources configured'], lastError);
    }
    return mergeEventStreams(streams);
  }
}
