// src/global.ts
// Process-wide logger: initLogging() once at startup, then the module-level functions.

import { writeQuietly } from './crash';
import { buildLogger, createLogger } from './core';
import { resolveOptions } from './config';
import { toError } from './errors';
import { formatf } from './format';
import { type CreateLoggerOptions, type ILogger, type JsonRecord, type Level, Severity, type Stats, type Verbose, type VModuleSpec } from './types';

let current: ILogger | undefined;
let preInit: ILogger | undefined;
let exitHooked = false;

/** Records logged before `initLogging()` go to stderr with a warning prefix. */
function active(): ILogger {
    if (current) return current;
    preInit ??= buildLogger(resolveOptions({ flushInterval: 0 }), false);
    return preInit;
}

function flushOnExit(): void {
    try {
        current?.flush();
    } catch (e) {
        writeQuietly(chunk => { process.stderr.write(Buffer.from(chunk)); }, `log: flush at exit failed: ${toError(e).message}\n`);
    }
}

/**
 * Configure the process-wide logger. Calling it again closes the previous
 * logger's files and starts over with the new options.
 */
export function initLogging(options?: CreateLoggerOptions): ILogger {
    const next = createLogger(options);
    const prev = current;
    current = next;
    prev?.close();
    if (!exitHooked) {
        process.on('exit', flushOnExit);
        exitHooked = true;
    }
    return next;
}

/** The process-wide logger (the pre-init stand-in until `initLogging()`). */
export function getLogger(): ILogger {
    return active();
}

/** Close the process-wide logger and return to the uninitialized state. */
export function shutdownLogging(): void {
    const prev = current;
    current = undefined;
    prev?.close();
}

/* ------------------------------ Entry points ------------------------------- */
// Each forwards through the Depth variant so records name the caller of these functions.
// The `f` variants format here and pass one string, which the Depth variant keeps verbatim.

export function info(...args: unknown[]): void { active().infoDepth(1, ...args); }
export function infof(fmt: string, ...args: unknown[]): void { active().infoDepth(1, formatf(fmt, args)); }
export function warning(...args: unknown[]): void { active().warningDepth(1, ...args); }
export function warningf(fmt: string, ...args: unknown[]): void { active().warningDepth(1, formatf(fmt, args)); }
export function error(...args: unknown[]): void { active().errorDepth(1, ...args); }
export function errorf(fmt: string, ...args: unknown[]): void { active().errorDepth(1, formatf(fmt, args)); }
export function fatal(...args: unknown[]): void { active().fatalDepth(1, ...args); }
export function fatalf(fmt: string, ...args: unknown[]): void { active().fatalDepth(1, formatf(fmt, args)); }
export function exit(...args: unknown[]): void { active().exitDepth(1, ...args); }
export function exitf(fmt: string, ...args: unknown[]): void { active().exitDepth(1, formatf(fmt, args)); }

export function v(level: Level): Verbose { return active().vDepth(1, level); }
export function j(level: Level): JsonRecord { return active().jDepth(1, Severity.INFO, level); }
export function jInfo(): JsonRecord { return active().jDepth(1, Severity.INFO); }
export function jWarning(): JsonRecord { return active().jDepth(1, Severity.WARNING); }
export function jError(): JsonRecord { return active().jDepth(1, Severity.ERROR); }
export function jFatal(): JsonRecord { return active().jDepth(1, Severity.FATAL); }

export function setVerbosity(level: Level): void { active().setVerbosity(level); }
export function setVModule(spec: VModuleSpec): string[] { return active().setVModule(spec); }
export function setTraceLocation(location: string): void { active().setTraceLocation(location); }
export function flush(): void { active().flush(); }
export function stats(): Stats { return active().stats(); }
