// src/config.ts
// Option defaults and environment resolution.

import { tmpdir } from 'node:os';
import { basename } from 'node:path';
import { LoggingError } from './errors';
import { shortHostname, userName } from './file';
import { type CreateLoggerOptions, type ExitFn, type JsonOptions, type Level, Severity, type VModuleRule, type Writer } from './types';
import { compileVModule } from './vmodule';

/* --------------------------------- Defaults -------------------------------- */

/** Rotate after this many bytes (1800 MiB). */
export const DEFAULT_MAX_SIZE = 1024 * 1024 * 1800;
export const DEFAULT_BUFFER_SIZE = 256 * 1024;
export const DEFAULT_FLUSH_INTERVAL = 30_000;

/* --------------------------------- Parsers --------------------------------- */

/**
 * Resolve a string into a `Severity`.
 * Accepts names (`INFO|WARNING|WARN|ERROR|FATAL`), initials (`I|W|E|F`) or `0..3`.
 * Returns `undefined` if unparsable; callers decide fallback behavior.
 */
export function parseSeverity(s?: string): Severity | undefined {
    if (!s) return undefined;
    switch (s.trim().toUpperCase()) {
        case 'I': case 'INFO': case '0': return Severity.INFO;
        case 'W': case 'WARN': case 'WARNING': case '1': return Severity.WARNING;
        case 'E': case 'ERROR': case '2': return Severity.ERROR;
        case 'F': case 'FATAL': case '3': return Severity.FATAL;
    }
    return undefined;
}

function parseBool(s?: string): boolean | undefined {
    const v = s?.trim().toLowerCase();
    if (v === '1' || v === 'true' || v === 'yes' || v === 'on') return true;
    if (v === '0' || v === 'false' || v === 'no' || v === 'off') return false;
    return undefined;
}

function parseInteger(s?: string): number | undefined {
    const v = s?.trim();
    return v && /^-?\d+$/.test(v) ? Number(v) : undefined;
}

/** A `file:line` trace location; `file` is matched against the source base name. */
export interface TraceLocation {
    file: string;
    line: number;
}

/** Parse `"file.ts:123"`. '' clears. Throws LoggingError('INVALID_TRACE_LOCATION'). */
export function parseTraceLocation(s: string): TraceLocation | undefined {
    const v = s.trim();
    if (!v) return undefined;
    const colon = v.lastIndexOf(':');
    const file = colon > 0 ? v.slice(0, colon) : '';
    const line = colon > 0 ? parseInteger(v.slice(colon + 1)) : undefined;
    if (!file || line === undefined || line <= 0) {
        throw new LoggingError(`log: trace location must be file:line, got ${JSON.stringify(s)}`, 'INVALID_TRACE_LOCATION', { value: s });
    }
    return { file: basename(file), line };
}

/* -------------------------------- Resolution ------------------------------- */

export interface ResolvedOptions {
    dirs: string[];
    program: string;
    host: string;
    user: string;
    pid: number;
    argv: string[];
    toStderr: boolean;
    alsoToStderr: boolean;
    stderrThreshold: Severity;
    verbosity: Level;
    vmodule: VModuleRule[];
    /** vmodule entries that failed to parse. */
    rejected: string[];
    traceLocation: TraceLocation | undefined;
    stripExtension: boolean;
    maxSize: number;
    maxAge: number;
    bufferSize: number;
    flushInterval: number;
    json: Required<Pick<JsonOptions, 'fieldPrefix' | 'escapeHTML'>> & Pick<JsonOptions, 'version'>;
    now: () => number;
    stderr: Writer;
    exit: ExitFn;
}

const defaultNow = () => performance.timeOrigin + performance.now();
// Records come from pooled buffers; a pipe may hold the chunk past the call.
const defaultStderr: Writer = chunk => { process.stderr.write(Buffer.from(chunk)); };
const defaultExit: ExitFn = code => { process.exit(code); };

function defaultProgram(): string {
    const script = process.argv[1];
    if (!script) return 'node';
    const base = basename(script);
    const dot = base.lastIndexOf('.');
    return (dot > 0 ? base.slice(0, dot) : base) || 'node';
}

/** Bad trace locations from the environment are ignored; explicit ones throw. */
function resolveTrace(value: string | undefined, env: string | undefined): TraceLocation | undefined {
    if (value !== undefined) return parseTraceLocation(value);
    try {
        return env ? parseTraceLocation(env) : undefined;
    } catch {
        return undefined;
    }
}

/**
 * Resolve every option: explicit value, then the environment bag, then the default.
 * Env keys: LOG_DIR, LOG_TO_STDERR, ALSO_LOG_TO_STDERR, LOG_STDERR_THRESHOLD,
 * LOG_V, LOG_VMODULE, LOG_BACKTRACE_AT, LOG_MAX_SIZE.
 */
export function resolveOptions(options?: CreateLoggerOptions): ResolvedOptions {
    const opts: CreateLoggerOptions = options ?? {};
    const env = opts.env ?? process.env;

    const dirsOpt = opts.logDir ?? env.LOG_DIR;
    const dirs = dirsOpt === undefined ? [tmpdir()] : typeof dirsOpt === 'string' ? dirsOpt.split(',').filter(Boolean) : [...dirsOpt];
    const vm = compileVModule(opts.vmodule ?? env.LOG_VMODULE ?? '');

    return {
        dirs: dirs.length > 0 ? dirs : [tmpdir()],
        program: opts.program ?? defaultProgram(),
        host: opts.host ?? shortHostname(),
        user: userName(),
        pid: opts.pid ?? process.pid,
        argv: process.argv,
        toStderr: opts.toStderr ?? parseBool(env.LOG_TO_STDERR) ?? false,
        alsoToStderr: opts.alsoToStderr ?? parseBool(env.ALSO_LOG_TO_STDERR) ?? false,
        stderrThreshold: opts.stderrThreshold ?? parseSeverity(env.LOG_STDERR_THRESHOLD) ?? Severity.ERROR,
        verbosity: Math.trunc(opts.verbosity ?? parseInteger(env.LOG_V) ?? 0),
        vmodule: vm.rules,
        rejected: vm.rejected,
        traceLocation: resolveTrace(opts.traceLocation, env.LOG_BACKTRACE_AT),
        stripExtension: opts.stripExtension ?? true,
        maxSize: opts.maxSize ?? parseInteger(env.LOG_MAX_SIZE) ?? DEFAULT_MAX_SIZE,
        maxAge: opts.maxAge ?? 0,
        bufferSize: opts.bufferSize ?? DEFAULT_BUFFER_SIZE,
        flushInterval: opts.flushInterval ?? DEFAULT_FLUSH_INTERVAL,
        json: {
            version: opts.json?.version,
            fieldPrefix: opts.json?.fieldPrefix ?? '',
            escapeHTML: opts.json?.escapeHTML ?? false,
        },
        now: opts.now ?? defaultNow,
        stderr: opts.stderr ?? defaultStderr,
        exit: opts.exit ?? defaultExit,
    };
}
