/**
 * core/errors.ts
 *
 * Typed error hierarchy. Every throw site uses one of these.
 * The `code` property is stable and safe to branch on; `details`
 * carries the offending values for logs.
 */

export class SchedulerError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // fix instanceof in TS
  }
}

// ---------------------------------------------------------------------------
// Validation errors
// ---------------------------------------------------------------------------

/** A command, interval, id or metadata value was rejected at the API boundary. */
export class ValidationError extends SchedulerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
  }
}

// ---------------------------------------------------------------------------
// Lookup errors
// ---------------------------------------------------------------------------

export class NotFoundError extends SchedulerError {
  constructor(id: string) {
    super(`No scheduled entry with id "${id}"`, 'NOT_FOUND', { id });
  }
}

// ---------------------------------------------------------------------------
// Native store errors
// ---------------------------------------------------------------------------

/** The native store content cannot be trusted at all (Windows XML only). */
export class FormatError extends SchedulerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FORMAT_ERROR', details);
  }
}

/** The native store could not be read or written. */
export class StoreIOError extends SchedulerError {
  constructor(store: string, operation: 'read' | 'write', message: string, details?: Record<string, unknown>) {
    super(
      `${store} ${operation} failed: ${message}`,
      'STORE_IO_ERROR',
      { store, operation, ...details }
    );
  }
}

/** Pull a readable message out of whatever a child process threw. */
export function describeFailure(e: unknown): string {
  if (e instanceof Error) {
    if ('stderr' in e && (typeof e.stderr === 'string' || Buffer.isBuffer(e.stderr))) {
      const text = e.stderr.toString().trim();
      if (text) return text;
    }
    return e.message;
  }
  return String(e);
}
