export class ScholarsyncError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ScholarsyncError';
  }
}

export class ConfigError extends ScholarsyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends ScholarsyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class StorageError extends ScholarsyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STORAGE_ERROR', details);
    this.name = 'StorageError';
  }
}

export class SourceError extends ScholarsyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_ERROR', details);
    this.name = 'SourceError';
  }
}

export class RecordError extends ScholarsyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RECORD_ERROR', details);
    this.name = 'RecordError';
  }
}

export class LlmError extends ScholarsyncError {
  constructor(message: string, details?: Record<string, unknown>, code = 'LLM_ERROR') {
    super(message, code, details);
    this.name = 'LlmError';
  }
}

/**
 * The oracle stayed unreachable through its whole timeout budget.
 * Nothing downstream can make progress without it, so callers abort the run.
 */
export class LlmUnavailableError extends LlmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, 'LLM_UNAVAILABLE');
    this.name = 'LlmUnavailableError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
