/**
 * ConsoleReportRenderer: formats reconstructed work entries as a terminal table.
 * A separator line marks each new week; weekends are highlighted.
 */
import type { FlexSign, ReportRow } from '../../core/entities/WorkEntry';
import { localDateKey } from '../../core/entities/WorkEntry';
import type { DateFormat } from '../../core/entities/WorkTimeConfig';
import { flexSign, roundToPrecision } from '../../core/use_cases/worktime/ComputeAccounting';

export interface RenderOptions {
  dateFormat: DateFormat;
  culture: string;
  color: boolean;
}

const ANSI = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  dim: '\x1b[2m',
};

const HEADERS = ['Date', 'Booking', 'Flex', 'Uptime', 'Intervals'];
const RIGHT_ALIGNED = new Set([1, 2, 3]);
const GAP = '  ';

// ─── Formatting helpers ─────────────────────────────────────────────

export function parseDateKey(key: string): Date {
  const [y, m, d] = key.split('-').map(Number);
  return new Date(y, m - 1, d);
}

/** Monday = 1 … Sunday = 7 */
export function isoWeekday(date: Date): number {
  const day = date.getDay();
  return day === 0 ? 7 : day;
}

export const isWeekend = (date: Date) => isoWeekday(date) >= 6;

export function formatEntryDate(date: Date, format: DateFormat, culture: string): string {
  switch (format) {
    case 'iso':
      return localDateKey(date);
    case 'short':
      return new Intl.DateTimeFormat(culture, { weekday: 'short', day: '2-digit', month: '2-digit', year: 'numeric' }).format(date);
    case 'long':
      return new Intl.DateTimeFormat(culture, { dateStyle: 'full' }).format(date);
  }
}

/** H:MM */
export function formatDuration(ms: number): string {
  const totalMinutes = Math.round(ms / 60_000);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${hours}:${String(minutes).padStart(2, '0')}`;
}

export function formatSigned(value: number): string {
  const text = Math.abs(value).toFixed(2);
  if (value > 0) return `+${text}`;
  if (value < 0) return `-${text}`;
  return text;
}

const FLEX_COLOR: Record<FlexSign, string | null> = {
  positive: ANSI.green,
  negative: ANSI.red,
  zero: null,
};

// ─── Table ──────────────────────────────────────────────────────────

interface TableLine {
  cells: string[];
  colors: (string | null)[];
  weekBreakBefore: boolean;
}

function toLines(rows: readonly ReportRow[], options: RenderOptions): TableLine[] {
  let previousWeekday: number | null = null;

  return rows.map(({ entry, attributes }) => {
    const date = parseDateKey(entry.date);
    const weekday = isoWeekday(date);
    const weekBreakBefore = previousWeekday !== null && weekday < previousWeekday;
    previousWeekday = weekday;

    const uptime = formatDuration(attributes.totalUptimeMs) + (attributes.clockAnomalies > 0 ? ' !' : '');

    return {
      cells: [
        formatEntryDate(date, options.dateFormat, options.culture),
        attributes.bookingHours.toFixed(2),
        formatSigned(attributes.flexTimeDelta),
        uptime,
        attributes.intervalSummary,
      ],
      colors: [isWeekend(date) ? ANSI.yellow : null, null, FLEX_COLOR[attributes.flexSign], null, null],
      weekBreakBefore,
    };
  });
}

export function totalFlexTime(rows: readonly ReportRow[]): number {
  return roundToPrecision(rows.reduce((sum, row) => sum + row.attributes.flexTimeDelta, 0), 100);
}

export function renderReport(rows: readonly ReportRow[], options: RenderOptions): string {
  if (rows.length === 0) return 'No work entries found in the event log.';

  const lines = toLines(rows, options);
  const widths = HEADERS.map((header, i) => Math.max(header.length, ...lines.map((l) => l.cells[i].length)));
  const tableWidth = widths.reduce((sum, w) => sum + w, 0) + GAP.length * (widths.length - 1);

  const paint = (text: string, color: string | null) =>
    options.color && color ? `${color}${text}${ANSI.reset}` : text;

  const layout = (cells: string[], colors: (string | null)[]) =>
    cells
      .map((cell, i) => paint(RIGHT_ALIGNED.has(i) ? cell.padStart(widths[i]) : cell.padEnd(widths[i]), colors[i]))
      .join(GAP)
      .trimEnd();

  const output: string[] = [layout(HEADERS, HEADERS.map(() => null)), '='.repeat(tableWidth)];

  for (const line of lines) {
    if (line.weekBreakBefore) output.push(paint('-'.repeat(tableWidth), ANSI.dim));
    output.push(layout(line.cells, line.colors));
  }

  const total = totalFlexTime(rows);
  output.push('='.repeat(tableWidth));
  output.push(`Total flex-time: ${paint(formatSigned(total), FLEX_COLOR[flexSign(total)])}`);

  return output.join('\n');
}

export function renderReportJson(rows: readonly ReportRow[]): string {
  return JSON.stringify(
    {
      entries: rows.map(({ entry, attributes }) => ({
        date: entry.date,
        bookingHours: attributes.bookingHours,
        flexTimeDelta: attributes.flexTimeDelta,
        totalUptimeMinutes: Math.round(attributes.totalUptimeMs / 60_000),
        intervalSummary: attributes.intervalSummary,
        clockAnomalies: attributes.clockAnomalies,
        intervals: entry.intervals.map((i) => ({ start: i.start.toISOString(), end: i.end.toISOString() })),
      })),
      totalFlexTime: totalFlexTime(rows),
    },
    null,
    2,
  );
}
