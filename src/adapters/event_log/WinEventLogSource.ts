/**
 * WinEventLogSource: reads power and session events from the Windows event
 * log through PowerShell's Get-WinEvent, for the live log and any archived
 * .evtx files. Sources that fail are skipped; only when every source fails
 * does the fetch reject.
 */
import { exec } from 'node:child_process';
import { promisify } from 'node:util';
import type { SystemEvent } from '../../core/entities/WorkEntry';
import { LogUnavailableError } from '../../core/entities/errors';
import { describeLocation } from '../../core/ports/EventSource';
import type { EventSource, LogLocation, ProviderFilter } from '../../core/ports/EventSource';
import { createLogger } from '../../lib/logger';
import { mergeEventStreams, sortByTimestamp } from './mergeEventStreams';

const execAsync = promisify(exec);
const log = createLogger('EventLog');

export interface ExecOptions {
  timeout: number;
  maxBuffer: number;
  windowsHide: boolean;
}

export type ExecFn = (command: string, options: ExecOptions) => Promise<{ stdout: string; stderr: string }>;

const defaultExec: ExecFn = (command, options) => execAsync(command, options);

// ─── PowerShell query ───────────────────────────────────────────────

interface WinEventRow {
  Id: number;
  ProviderName: string;
  TimeCreated: string;
  Message?: string | null;
}

const psQuote = (value: string) => value.replace(/'/g, "''");

export function buildQueryScript(location: LogLocation, filter: ProviderFilter): string {
  const target = location.kind === 'live'
    ? `LogName = '${psQuote(location.logName)}'`
    : `Path = '${psQuote(location.path)}'`;

  return [
    "$ErrorActionPreference = 'Stop'",
    `$filter = @{ ${target}; ProviderName = '${psQuote(filter.provider)}'; Id = ${filter.ids.join(',')}; StartTime = [DateTimeOffset]::Parse('${filter.since.toISOString()}').LocalDateTime }`,
    'try { $events = @(Get-WinEvent -FilterHashtable $filter -ErrorAction Stop) }',
    "catch { if ($_.FullyQualifiedErrorId -like 'NoMatchingEventsFound*') { $events = @() } else { throw } }",
    "$rows = @($events | ForEach-Object { [pscustomobject]@{ Id = $_.Id; ProviderName = $_.ProviderName; TimeCreated = $_.TimeCreated.ToUniversalTime().ToString('o'); Message = $_.Message } })",
    'ConvertTo-Json -InputObject $rows -Compress',
  ].join('\n');
}

export function buildPowerShellCommand(script: string): string {
  const encoded = Buffer.from(script, 'utf16le').toString('base64');
  return `powershell -NoProfile -NonInteractive -EncodedCommand ${encoded}`;
}

function isWinEventRow(value: unknown): value is WinEventRow {
  return typeof value === 'object' && value !== null
    && 'Id' in value && typeof value.Id === 'number'
    && 'ProviderName' in value && typeof value.ProviderName === 'string'
    && 'TimeCreated' in value && typeof value.TimeCreated === 'string';
}

export function parseQueryOutput(stdout: string): SystemEvent[] {
  const text = stdout.trim();
  if (text === '') return [];

  const parsed: unknown = JSON.parse(text);
  const rows: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
  const events: SystemEvent[] = [];

  for (const row of rows) {
    if (!isWinEventRow(row)) {
      log.warn({ row }, 'Skipping malformed event row');
      continue;
    }
    const timestamp = new Date(row.TimeCreated);
    if (Number.isNaN(timestamp.getTime())) {
      log.warn({ row }, 'Skipping event with unreadable timestamp');
      continue;
    }
    events.push({
      id: row.Id,
      provider: row.ProviderName,
      timestamp,
      payload: row.Message ?? undefined,
    });
  }
  return events;
}

// ─── Source ─────────────────────────────────────────────────────────

export interface WinEventLogSourceOptions {
  timeoutSeconds: number;
  exec?: ExecFn;
}

export class WinEventLogSource implements EventSource {
  private readonly exec: ExecFn;
  private readonly timeoutMs: number;

  constructor(options: WinEventLogSourceOptions) {
    this.exec = options.exec ?? defaultExec;
    this.timeoutMs = options.timeoutSeconds * 1000;
  }

  async fetchEvents(filters: ProviderFilter[], sources: LogLocation[]): Promise<SystemEvent[]> {
    const streams: SystemEvent[][] = [];
    const failed: string[] = [];
    let lastError: unknown;

    for (const location of sources) {
      try {
        streams.push(await this.querySource(location, filters));
      } catch (err) {
        lastError = err;
        failed.push(describeLocation(location));
        log.warn({ source: describeLocation(location), err }, 'Event log source could not be read');
      }
    }

    if (streams.length === 0) {
      throw new LogUnavailableError(failed.length > 0 ? failed : ['no sources configured'], lastError);
    }

    const merged = mergeEventStreams(streams);
    log.debug({ sources: streams.length, events: merged.length }, 'Fetched events');
    return merged;
  }

  private async querySource(location: LogLocation, filters: ProviderFilter[]): Promise<SystemEvent[]> {
    const events: SystemEvent[] = [];
    for (const filter of filters) {
      const command = buildPowerShellCommand(buildQueryScript(location, filter));
      const { stdout } = await this.exec(command, {
        timeout: this.timeoutMs,
        maxBuffer: 32 * 1024 * 1024,
        windowsHide: true,
      });
      events.push(...parseQueryOutput(stdout));
    }
    return sortByTimestamp(events);
  }
}
