export type WorkTimeErrorKind = 'LogUnavailable' | 'InvalidConfiguration';

export class WorkTimeError extends Error {
  readonly kind: WorkTimeErrorKind;

  constructor(kind: WorkTimeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WorkTimeError';
    this.kind = kind;
  }
}

export class LogUnavailableError extends WorkTimeError {
  readonly sources: string[];

  constructor(sources: string[], cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super('LogUnavailable', `No event log source could be opened (${sources.join(', ')})${detail}`, { cause });
    this.name = 'LogUnavailableError';
    this.sources = sources;
  }
}

export class InvalidConfigurationError extends WorkTimeError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('InvalidConfiguration', `Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}
