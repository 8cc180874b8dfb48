// src/core.ts
// tierlog: severity-leveled logging with per-call-site verbosity.
// - Severity tiers INFO < WARNING < ERROR < FATAL, one file per tier, cascading copies.
// - V(level) gates resolved once per call site through vmodule rules.
// - Text records in fixed columns, or JSON records built field by field.
// - Synchronous writes: a record is on disk (or in the file buffer) before the call returns.

import { BufferPool } from './buffer';
import { captureCallSite, stackText } from './callsite';
import { parseTraceLocation, resolveOptions, type ResolvedOptions, type TraceLocation } from './config';
import { writeQuietly } from './crash';
import { formatArgs, formatf, timeParts, writeTextBody, writeTextHeader } from './format';
import { ActiveJsonRecord, DISABLED_RECORD, type JsonEmit, writeJsonHeader } from './json';
import { SeveritySink, type WriteOptions } from './sinks';
import {
    type CallSite,
    type CreateLoggerOptions,
    type ILogger,
    type JsonRecord,
    type Level,
    Severity,
    type Verbose,
} from './types';
import { VerbosityCache } from './vcache';
import { compileVModule, formatVModule, VModuleFilter } from './vmodule';

/* --------------------------------- Verbose --------------------------------- */

/** Returned by V(level) when the statement is filtered out. */
export const DISABLED_VERBOSE: Verbose = Object.freeze({
    enabled: false,
    info: () => {},
    infof: () => {},
    json: () => DISABLED_RECORD,
});

/* --------------------------------- Factory --------------------------------- */

/**
 * Create a logger.
 * - Options resolve explicit value → environment bag → default (see `resolveOptions`).
 * - Files are created on the first record of each tier, not here.
 * - Call `close()` (or at least `flush()`) before the process exits.
 */
export function createLogger(options?: CreateLoggerOptions): ILogger {
    return buildLogger(resolveOptions(options), true);
}

/**
 * Build a logger from resolved options.
 * `initialized = false` gives the stand-in used before `initLogging()`: every record
 * goes to stderr behind a warning prefix.
 */
export function buildLogger(o: ResolvedOptions, initialized: boolean): ILogger {
    const sink = new SeveritySink({ ...o, initialized });
    const pool = new BufferPool();
    const cache = new VerbosityCache(new VModuleFilter(o.vmodule, o.stripExtension), o.verbosity);
    let trace: TraceLocation | undefined = o.traceLocation;

    const reportRejected = (rejected: readonly string[]) => {
        for (const r of rejected) writeQuietly(o.stderr, `log: ignoring malformed vmodule entry ${JSON.stringify(r)}\n`);
    };
    reportRejected(o.rejected);

    const traced = (site: CallSite) => trace !== undefined && site.line === trace.line && site.file === trace.file;

    /* ------------------------------ Text records ----------------------------- */

    const emitText = (s: Severity, site: CallSite, message: string, boundary: Function, wo: WriteOptions = {}) => {
        const buf = pool.acquire();
        try {
            writeTextHeader(buf, s, timeParts(o.now()), o.pid, site.file, site.line);
            writeTextBody(buf, message);
            if (traced(site)) buf.append(`${stackText(boundary)}\n`);
            sink.write(s, buf.bytes(), { ...wo, boundary });
        } finally {
            pool.release(buf);
        }
    };

    const textAt = (s: Severity, depth: number, boundary: Function, message: string, wo?: WriteOptions) =>
        emitText(s, captureCallSite(boundary, depth), message, boundary, wo);

    /* ------------------------------ JSON records ----------------------------- */

    const emitJson: JsonEmit = (s, buf) => sink.write(s, buf.bytes(), { boundary: ActiveJsonRecord.prototype.msg });

    const openJson = (s: Severity, site: CallSite): JsonRecord => {
        const buf = pool.acquire();
        writeJsonHeader(buf, s, timeParts(o.now()), { version: o.json.version, host: o.host, pid: o.pid }, site.file, site.line);
        return new ActiveJsonRecord(s, site, buf, o.json, emitJson, pool, traced(site));
    };

    /* ------------------------------ V-gating --------------------------------- */

    /**
     * Site of an active V(level) statement, `null` if filtered out, or `undefined`
     * when the global verbosity alone enables it (site not needed yet).
     */
    const gate = (depth: number, boundary: Function, level: Level): CallSite | null | undefined => {
        if (cache.verbosity >= level) return undefined;
        if (cache.filter.length === 0) return null;
        const site = captureCallSite(boundary, depth);
        return cache.resolve(site) >= level ? site : null;
    };

    const makeVerbose = (site: CallSite | undefined): Verbose => {
        const v: Verbose = {
            enabled: true,
            info(...args: unknown[]) {
                emitText(Severity.INFO, site ?? captureCallSite(v.info), formatArgs(args), v.info);
            },
            infof(fmt: string, ...args: unknown[]) {
                emitText(Severity.INFO, site ?? captureCallSite(v.infof), formatf(fmt, args), v.infof);
            },
            json() {
                return openJson(Severity.INFO, site ?? captureCallSite(v.json));
            },
        };
        return v;
    };

    const vAt = (depth: number, boundary: Function, level: Level): Verbose => {
        const site = gate(depth, boundary, level);
        return site === null ? DISABLED_VERBOSE : makeVerbose(site);
    };

    const jAt = (depth: number, boundary: Function, s: Severity, level?: Level): JsonRecord => {
        let site: CallSite | undefined;
        if (level !== undefined) {
            const g = gate(depth, boundary, level);
            if (g === null) return DISABLED_RECORD;
            site = g;
        }
        return openJson(s, site ?? captureCallSite(boundary, depth));
    };

    /* ------------------------------ Logger API ------------------------------- */

    const api: ILogger = {
        info(...args) { textAt(Severity.INFO, 0, api.info, formatArgs(args)); },
        infof(fmt, ...args) { textAt(Severity.INFO, 0, api.infof, formatf(fmt, args)); },
        infoDepth(depth, ...args) { textAt(Severity.INFO, depth, api.infoDepth, formatArgs(args)); },

        warning(...args) { textAt(Severity.WARNING, 0, api.warning, formatArgs(args)); },
        warningf(fmt, ...args) { textAt(Severity.WARNING, 0, api.warningf, formatf(fmt, args)); },
        warningDepth(depth, ...args) { textAt(Severity.WARNING, depth, api.warningDepth, formatArgs(args)); },

        error(...args) { textAt(Severity.ERROR, 0, api.error, formatArgs(args)); },
        errorf(fmt, ...args) { textAt(Severity.ERROR, 0, api.errorf, formatf(fmt, args)); },
        errorDepth(depth, ...args) { textAt(Severity.ERROR, depth, api.errorDepth, formatArgs(args)); },

        fatal(...args) { textAt(Severity.FATAL, 0, api.fatal, formatArgs(args)); },
        fatalf(fmt, ...args) { textAt(Severity.FATAL, 0, api.fatalf, formatf(fmt, args)); },
        fatalDepth(depth, ...args) { textAt(Severity.FATAL, depth, api.fatalDepth, formatArgs(args)); },

        exit(...args) { textAt(Severity.FATAL, 0, api.exit, formatArgs(args), { noStacks: true }); },
        exitf(fmt, ...args) { textAt(Severity.FATAL, 0, api.exitf, formatf(fmt, args), { noStacks: true }); },
        exitDepth(depth, ...args) { textAt(Severity.FATAL, depth, api.exitDepth, formatArgs(args), { noStacks: true }); },

        v(level) { return vAt(0, api.v, level); },
        vDepth(depth, level) { return vAt(depth, api.vDepth, level); },

        j(level) { return jAt(0, api.j, Severity.INFO, level); },
        jDepth(depth, s, level) { return jAt(depth, api.jDepth, s, level); },
        jInfo() { return jAt(0, api.jInfo, Severity.INFO); },
        jWarning() { return jAt(0, api.jWarning, Severity.WARNING); },
        jError() { return jAt(0, api.jError, Severity.ERROR); },
        jFatal() { return jAt(0, api.jFatal, Severity.FATAL); },

        setVerbosity(level) { cache.setVerbosity(Math.trunc(level)); },
        getVerbosity() { return cache.verbosity; },
        setVModule(spec) {
            const parsed = compileVModule(spec);
            cache.setFilter(new VModuleFilter(parsed.rules, o.stripExtension));
            reportRejected(parsed.rejected);
            return parsed.rejected;
        },
        getVModule() { return formatVModule(cache.filter.rules); },
        setTraceLocation(location) { trace = parseTraceLocation(location); },
        setStderrThreshold(s) { sink.stderrThreshold = s; },
        setToStderr(on) { sink.toStderr = on; },
        setAlsoToStderr(on) { sink.alsoToStderr = on; },

        flush() { sink.flush(); },
        stats() { return sink.stats(); },
        close() { sink.close(); },
    };

    return api;
}
