export type ErrorContext = Record<string, string | number | boolean | null>;

export type EngineErrorCode = 'LOAD_ERROR' | 'INVALID_QUERY' | 'UNKNOWN_TREATMENT';

/**
 * Base class for every failure the reasoning core reports. `context` names the
 * offending identifier, relation or record so the message can be surfaced as is.
 */
export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly context: ErrorContext;

  constructor(code: EngineErrorCode, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

/** Malformed or inconsistent fact source. Fatal at startup; nothing is partially loaded. */
export class LoadError extends EngineError {
  constructor(message: string, context: ErrorContext = {}) {
    super('LOAD_ERROR', message, context);
  }
}

/** Caller passed an empty, malformed or unknown identifier. */
export class InvalidQueryError extends EngineError {
  constructor(message: string, context: ErrorContext = {}) {
    super('INVALID_QUERY', message, context);
  }
}

export class UnknownTreatmentError extends EngineError {
  constructor(treatmentId: string) {
    super('UNKNOWN_TREATMENT', `Unknown treatment "${treatmentId}"`, { treatmentId });
  }
}

export function describeError(err: unknown): string {
  if (err instanceof EngineError) {
    const ctx = Object.entries(err.context).map(([k, v]) => `${k}=${String(v)}`).join(' ');
    return ctx ? `${err.code}: ${err.message} (${ctx})` : `${err.code}: ${err.message}`;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}
