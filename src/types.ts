/* -------------------------------- Severity --------------------------------- */

/**
 * Severity tiers in order. Each tier owns one output file; a record at tier S
 * is copied into the files of S and of every tier below it.
 */
export enum Severity {
    INFO = 0,
    WARNING = 1,
    ERROR = 2,
    FATAL = 3,
}

/** All tiers, lowest first. */
export const SEVERITIES: readonly Severity[] = [Severity.INFO, Severity.WARNING, Severity.ERROR, Severity.FATAL];

export type SeverityName = 'INFO' | 'WARNING' | 'ERROR' | 'FATAL';
export type LowerSeverityName = 'info' | 'warning' | 'error' | 'fatal';

export const SEVERITY_NAMES: Readonly<Record<Severity, SeverityName>> = {
    [Severity.INFO]: 'INFO',
    [Severity.WARNING]: 'WARNING',
    [Severity.ERROR]: 'ERROR',
    [Severity.FATAL]: 'FATAL',
};

export const LOWER_SEVERITY_NAMES: Readonly<Record<Severity, LowerSeverityName>> = {
    [Severity.INFO]: 'info',
    [Severity.WARNING]: 'warning',
    [Severity.ERROR]: 'error',
    [Severity.FATAL]: 'fatal',
};

/** Verbosity level. Higher is chattier; a V(n) statement is active when n <= threshold. */
export type Level = number;

/* --------------------------------- Seams ----------------------------------- */

/** Byte writer for standard error (or a stand-in in tests). Must be synchronous. */
export type Writer = (chunk: Uint8Array) => void;

/** Exit hook. The default is `process.exit`; tests pass a recorder. */
export type ExitFn = (code: number) => void;

/** Location of a logging statement. `key` is the cache identity of the call site. */
export interface CallSite {
    readonly key: string;
    /** Full path of the source file (file URLs are converted to paths). */
    readonly path: string;
    /** Base name of the source file. */
    readonly file: string;
    readonly line: number;
}

export interface VModuleRule {
    pattern: string;
    level: Level;
    /** True when the pattern has no glob metacharacters and is compared directly. */
    literal: boolean;
}

/** vmodule rules as text (`"gc*=2,server=1"`) or as pattern/level pairs. */
export type VModuleSpec = string | ReadonlyArray<Pick<VModuleRule, 'pattern' | 'level'>>;

export interface SeverityStats {
    lines: number;
    bytes: number;
}

export type Stats = Record<LowerSeverityName, SeverityStats>;

/* -------------------------------- Records ---------------------------------- */

/**
 * Fluent JSON record. Methods append a field and return the record so calls
 * chain; `msg()` terminates the record and hands it to the sink.
 * A filtered-out record is a shared no-op handle: every call is accepted and ignored.
 */
export interface JsonRecord {
    /** False for the disabled handle. */
    readonly enabled: boolean;
    str(name: string, value: string): JsonRecord;
    strs(name: string, values: readonly string[]): JsonRecord;
    /** Integer field; fractional parts are truncated. */
    int(name: string, value: number): JsonRecord;
    num(name: string, value: number): JsonRecord;
    bigint(name: string, value: bigint): JsonRecord;
    bool(name: string, value: boolean): JsonRecord;
    /** Adds an `error` field holding the error's message. */
    err(error: unknown): JsonRecord;
    /** Raw bytes decoded as UTF-8; invalid sequences become U+FFFD. */
    bytes(name: string, value: Uint8Array): JsonRecord;
    msg(message?: string): void;
    msgf(format: string, ...args: unknown[]): void;
}

/** Result of a V(level) check, bound to the call site that made it. */
export interface Verbose {
    readonly enabled: boolean;
    info(...args: unknown[]): void;
    infof(format: string, ...args: unknown[]): void;
    /** JSON record at INFO, or the disabled handle. */
    json(): JsonRecord;
}

/* --------------------------------- Logger ---------------------------------- */

export interface ILogger {
    info(...args: unknown[]): void;
    infof(format: string, ...args: unknown[]): void;
    /** Like `info`, attributing the record to the caller `depth` frames further up. */
    infoDepth(depth: number, ...args: unknown[]): void;

    warning(...args: unknown[]): void;
    warningf(format: string, ...args: unknown[]): void;
    warningDepth(depth: number, ...args: unknown[]): void;

    error(...args: unknown[]): void;
    errorf(format: string, ...args: unknown[]): void;
    errorDepth(depth: number, ...args: unknown[]): void;

    /** Logs at FATAL, dumps stacks to every open file and exits with status 255. */
    fatal(...args: unknown[]): void;
    fatalf(format: string, ...args: unknown[]): void;
    fatalDepth(depth: number, ...args: unknown[]): void;

    /** Logs at FATAL without stacks and exits with status 1. */
    exit(...args: unknown[]): void;
    exitf(format: string, ...args: unknown[]): void;
    exitDepth(depth: number, ...args: unknown[]): void;

    /** Verbosity gate for the calling statement. */
    v(level: Level): Verbose;
    vDepth(depth: number, level: Level): Verbose;

    /** JSON record at INFO gated by verbosity `level`. */
    j(level: Level): JsonRecord;
    jDepth(depth: number, severity: Severity, level?: Level): JsonRecord;
    jInfo(): JsonRecord;
    jWarning(): JsonRecord;
    jError(): JsonRecord;
    jFatal(): JsonRecord;

    setVerbosity(level: Level): void;
    getVerbosity(): Level;
    /** Replace the vmodule rules. Returns the entries that were rejected. */
    setVModule(spec: VModuleSpec): string[];
    getVModule(): string;
    /** `file:line`, or '' to clear. Throws LoggingError on a malformed value. */
    setTraceLocation(location: string): void;
    setStderrThreshold(severity: Severity): void;
    setToStderr(on: boolean): void;
    setAlsoToStderr(on: boolean): void;

    /** Drain every buffer to disk. */
    flush(): void;
    stats(): Stats;
    /** Stop the flush daemon, flush and close every file. */
    close(): void;
}

/* ---------------------------------- Options -------------------------------- */

export interface JsonOptions {
    /** Written as `"version"` after `"level"` when set. */
    version?: string;
    /** Prepended to every caller-supplied field name. */
    fieldPrefix?: string;
    /** Escape `<`, `>` and `&` in field values. Default: false. */
    escapeHTML?: boolean;
}

export type CreateLoggerOptions = {
    /**
     * Directory (or candidate directories, tried in order) for log files.
     * Falls back to `LOG_DIR`, then the OS temp directory.
     */
    logDir?: string | readonly string[];

    /** File name prefix. Default: base name of the entry script, or 'node'. */
    program?: string;

    /** Write to standard error only. Env: `LOG_TO_STDERR`. */
    toStderr?: boolean;

    /** Mirror every record to standard error as well as files. Env: `ALSO_LOG_TO_STDERR`. */
    alsoToStderr?: boolean;

    /** Records at or above this tier are mirrored to standard error. Default: ERROR. Env: `LOG_STDERR_THRESHOLD`. */
    stderrThreshold?: Severity;

    /** Global default verbosity. Default: 0. Env: `LOG_V`. */
    verbosity?: Level;

    /** Per-file verbosity, e.g. `"gc*=2,server=1"`. Env: `LOG_VMODULE`. */
    vmodule?: VModuleSpec;

    /** `file:line` at which a stack is attached to any record. Env: `LOG_BACKTRACE_AT`. */
    traceLocation?: string;

    /** Strip the extension from source file names before vmodule matching. Default: true. */
    stripExtension?: boolean;

    /** Rotate a file once it would reach this many bytes. Default: 1800 MiB. Env: `LOG_MAX_SIZE`. */
    maxSize?: number;

    /** Rotate a file once it is this many milliseconds old. Default: 0 (off). */
    maxAge?: number;

    /** Per-file write buffer in bytes. Default: 256 KiB. */
    bufferSize?: number;

    /** Flush daemon interval in milliseconds; 0 disables the daemon. Default: 30 000. */
    flushInterval?: number;

    json?: JsonOptions;

    /** Host name written into file names and headers. Default: `os.hostname()`. */
    host?: string;

    /** Process id written into records and file names. Default: `process.pid`. */
    pid?: number;

    /** Environment bag used to resolve unset options. Default: `process.env`. */
    env?: Record<string, string | undefined>;

    /** Clock in epoch milliseconds (fractions give microseconds). */
    now?: () => number;

    /** Standard error writer. */
    stderr?: Writer;

    /** Exit hook. */
    exit?: ExitFn;
};
