import type { SystemEvent } from '../entities/WorkEntry';

export interface ProviderFilter {
  provider: string;
  ids: number[];
  since: Date;
}

export type LogLocation =
  | { kind: 'live'; logName: string }
  | { kind: 'archive'; path: string };

export interface EventSource {
  /**
   * Returns matching events from every readable source, ascending by timestamp.
   * Rejects with LogUnavailableError when no source can be opened.
   */
  fetchEvents(filters: ProviderFilter[], sources: LogLocation[]): Promise<SystemEvent[]>;
}

export function describeLocation(location: LogLocation): string {
  return location.kind === 'live' ? location.logName : location.path;
}
