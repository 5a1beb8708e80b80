/**
 * Configuration loading: layers built-in defaults, the JSON config file,
 * WORKTIME_* environment variables and command-line values, in that order.
 * The result is validated once and frozen; nothing mutates it afterwards.
 */
import fs from 'node:fs';
import path from 'node:path';
import { DATE_FORMATS, DEFAULT_CONFIG, collectConfigIssues, validateConfig } from './core/entities/WorkTimeConfig';
import type { DateFormat, WorkTimeConfig } from './core/entities/WorkTimeConfig';
import { InvalidConfigurationError } from './core/entities/errors';

export const CONFIG_FILENAME = 'worktime.config.json';

type ConfigKey = keyof WorkTimeConfig;

// ─── Readers ────────────────────────────────────────────────────────

interface SettingReader {
  number(key: ConfigKey): number | undefined;
  boolean(key: ConfigKey): boolean | undefined;
  string(key: ConfigKey): string | undefined;
  list(key: ConfigKey): string[] | undefined;
  dateFormat(key: ConfigKey): DateFormat | undefined;
}

const isDateFormat = (value: string): value is DateFormat =>
  DATE_FORMATS.some((format) => format === value);

const TRUE_WORDS = ['1', 'true', 'yes', 'on'];
const FALSE_WORDS = ['0', 'false', 'no', 'off'];

export function envName(key: ConfigKey): string {
  return `WORKTIME_${key.replace(/([A-Z])/g, '_$1').toUpperCase()}`;
}

/** Reads string values, as found in the environment or on the command line */
function textReader(lookup: (key: ConfigKey) => string | undefined, origin: string, issues: string[]): SettingReader {
  const raw = (key: ConfigKey) => {
    const value = lookup(key);
    return value === undefined ? undefined : value.trim();
  };

  return {
    number(key) {
      const value = raw(key);
      if (value === undefined) return undefined;
      const parsed = value === '' ? NaN : Number(value);
      if (Number.isNaN(parsed)) {
        issues.push(`${key} from ${origin} is not a number (got "${value}")`);
        return undefined;
      }
      return parsed;
    },
    boolean(key) {
      const value = raw(key)?.toLowerCase();
      if (value === undefined) return undefined;
      if (TRUE_WORDS.includes(value)) return true;
      if (FALSE_WORDS.includes(value)) return false;
      issues.push(`${key} from ${origin} is not a flag (got "${value}")`);
      return undefined;
    },
    string: (key) => raw(key),
    list(key) {
      const value = raw(key);
      if (value === undefined) return undefined;
      return value.split(';').map((part) => part.trim()).filter((part) => part !== '');
    },
    dateFormat(key) {
      const value = raw(key);
      if (value === undefined) return undefined;
      if (isDateFormat(value)) return value;
      issues.push(`${key} from ${origin} must be one of ${DATE_FORMATS.join(', ')} (got "${value}")`);
      return undefined;
    },
  };
}

/** Reads typed values out of a parsed JSON object */
function jsonReader(data: Record<string, unknown>, origin: string, issues: string[]): SettingReader {
  const wrongType = (key: ConfigKey, expected: string) => {
    issues.push(`${key} in ${origin} must be ${expected} (got ${JSON.stringify(data[key])})`);
    return undefined;
  };

  return {
    number(key) {
      const value = data[key];
      if (value === undefined) return undefined;
      return typeof value === 'number' ? value : wrongType(key, 'a number');
    },
    boolean(key) {
      const value = data[key];
      if (value === undefined) return undefined;
      if (typeof value === 'boolean') return value;
      if (value === 0 || value === 1) return value === 1;
      return wrongType(key, 'true/false');
    },
    string(key) {
      const value = data[key];
      if (value === undefined) return undefined;
      return typeof value === 'string' ? value : wrongType(key, 'a string');
    },
    list(key) {
      const value = data[key];
      if (value === undefined) return undefined;
      if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) return value;
      return wrongType(key, 'a list of strings');
    },
    dateFormat(key) {
      const value = data[key];
      if (value === undefined) return undefined;
      if (typeof value === 'string' && isDateFormat(value)) return value;
      return wrongType(key, `one of ${DATE_FORMATS.join(', ')}`);
    },
  };
}

function applyLayer(base: WorkTimeConfig, read: SettingReader): WorkTimeConfig {
  return {
    historyLength: read.number('historyLength') ?? base.historyLength,
    workingHours: read.number('workingHours') ?? base.workingHours,
    breakfastBreak: read.number('breakfastBreak') ?? base.breakfastBreak,
    lunchBreak: read.number('lunchBreak') ?? base.lunchBreak,
    breakDeductionThreshold1: read.number('breakDeductionThreshold1') ?? base.breakDeductionThreshold1,
    breakDeductionThreshold2: read.number('breakDeductionThreshold2') ?? base.breakDeductionThreshold2,
    roundingPrecision: read.number('roundingPrecision') ?? base.roundingPrecision,
    joinIntervals: read.boolean('joinIntervals') ?? base.joinIntervals,
    maxWorkingHours: read.number('maxWorkingHours') ?? base.maxWorkingHours,
    showLogoff: read.boolean('showLogoff') ?? base.showLogoff,
    mergeGapThresholdMinutes: read.number('mergeGapThresholdMinutes') ?? base.mergeGapThresholdMinutes,
    dateFormat: read.dateFormat('dateFormat') ?? base.dateFormat,
    culture: read.string('culture') ?? base.culture,
    logName: read.string('logName') ?? base.logName,
    archivedLogPaths: read.list('archivedLogPaths') ?? base.archivedLogPaths,
    queryTimeoutSeconds: read.number('queryTimeoutSeconds') ?? base.queryTimeoutSeconds,
    checkSchedule: read.string('checkSchedule') ?? base.checkSchedule,
  };
}

// ─── Config file ────────────────────────────────────────────────────

function readConfigFile(filePath: string, required: boolean, issues: string[]): Record<string, unknown> | null {
  if (!fs.existsSync(filePath)) {
    if (required) issues.push(`config file not found: ${filePath}`);
    return null;
  }
  try {
    const data: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      issues.push(`config file ${filePath} must contain a JSON object`);
      return null;
    }
    return Object.fromEntries(Object.entries(data));
  } catch (err) {
    issues.push(`config file ${filePath} could not be read: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

// ─── Public API ─────────────────────────────────────────────────────

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit config file; must exist when given */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Command-line values keyed by config key */
  overrides?: Partial<Record<ConfigKey, string>>;
}

export function loadWorkTimeConfig(options: LoadConfigOptions = {}): Readonly<WorkTimeConfig> {
  const env = options.env ?? process.env;
  const issues: string[] = [];

  const explicitPath = options.configPath ?? env.WORKTIME_CONFIG;
  const filePath = explicitPath
    ? path.resolve(options.cwd ?? process.cwd(), explicitPath)
    : path.join(options.cwd ?? process.cwd(), CONFIG_FILENAME);

  let config: WorkTimeConfig = { ...DEFAULT_CONFIG };

  const fileData = readConfigFile(filePath, Boolean(explicitPath), issues);
  if (fileData) config = applyLayer(config, jsonReader(fileData, filePath, issues));

  config = applyLayer(config, textReader((key) => env[envName(key)], 'environment', issues));

  const overrides = options.overrides ?? {};
  config = applyLayer(config, textReader((key) => overrides[key], 'command line', issues));

  issues.push(...collectConfigIssues(config));
  if (issues.length > 0) throw new InvalidConfigurationError(issues);

  return validateConfig(config);
}
