/**
 * Error taxonomy for the relay.
 *
 * Components at the edge of the pipeline (history, inference, dispatch) turn
 * these into result values; only the I/O clients and the config provider throw.
 */

export class DeskwireError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DeskwireError';
  }
}

/** Required settings are missing or the config store cannot be read. */
export class ConfigError extends DeskwireError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** Malformed input: a webhook body or an administrative update. */
export class ValidationError extends DeskwireError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ValidationError';
  }
}

export class NetworkError extends DeskwireError {
  readonly status?: number;
  readonly timedOut: boolean;

  constructor(message: string, opts: { status?: number; timedOut?: boolean; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'NetworkError';
    this.status = opts.status;
    this.timedOut = opts.timedOut ?? false;
  }
}

/** A remote service answered with a body we cannot interpret. */
export class SchemaError extends DeskwireError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SchemaError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** fetch() rejects with a TimeoutError (AbortSignal.timeout) or AbortError. */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}
