// src/errors.ts
// Error type raised by tierlog for invalid input and unrecoverable sink failures.

export type LoggingErrorCode =
    | 'FILE_CREATE_FAILED'     // no candidate directory accepted a new log file
    | 'INVALID_TRACE_LOCATION' // traceLocation is not `file:line`
    | 'WRITE_FAILED'           // a buffered drain or fsync failed
    | 'LOGGER_CLOSED';         // a write reached a closed sink

/**
 * Error with a machine-readable code and a small context bag.
 * `toJSON()` keeps it printable through any JSON encoder.
 */
export class LoggingError extends Error {
    public readonly code: LoggingErrorCode;
    public readonly context: Record<string, unknown>;
    public override readonly cause?: Error;

    constructor(message: string, code: LoggingErrorCode, context: Record<string, unknown> = {}, cause?: Error) {
        super(message);
        this.name = 'LoggingError';
        this.code = code;
        this.context = context;
        this.cause = cause;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, LoggingError);
        }
    }

    toJSON(): { name: string; message: string; code: LoggingErrorCode; context: Record<string, unknown>; cause?: string } {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            context: this.context,
            cause: this.cause?.message,
        };
    }
}

export function isLoggingError(e: unknown): e is LoggingError {
    return e instanceof LoggingError;
}

/** Coerce anything thrown into an Error without losing its text. */
export function toError(e: unknown): Error {
    if (e instanceof Error) return e;
    return new Error(typeof e === 'string' ? e : String(e));
}
