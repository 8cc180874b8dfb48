// src/sinks.ts
// Severity-routed sink: stderr policy, lazily created per-tier files, cascading fan-out, stats, flush daemon.

import { dumpStacks, EXIT_FATAL, EXIT_NO_STACKS, EXIT_SINK_FAILURE, FATAL_FLUSH_TIMEOUT, timeoutFlush, writeQuietly } from './crash';
import { LoggingError, toError } from './errors';
import { LogFile, type LogFileOptions } from './file';
import {
    type ExitFn,
    Severity,
    SEVERITIES,
    type SeverityStats,
    type Stats,
    type Writer,
} from './types';

/* ---------------------------------- Types ---------------------------------- */

export type SinkOptions = Omit<LogFileOptions, 'severity'> & {
    /** False for the stand-in used before `initLogging()`. */
    initialized: boolean;
    toStderr: boolean;
    alsoToStderr: boolean;
    stderrThreshold: Severity;
    /** 0 disables the flush daemon. */
    flushInterval: number;
    stderr: Writer;
    exit: ExitFn;
};

export interface WriteOptions {
    /** Mirror this record to stderr regardless of the threshold. */
    alsoToStderr?: boolean;
    /** FATAL records only: exit with status 1 and skip the stack dump. */
    noStacks?: boolean;
    /** Function the user called; stack dumps start at its caller. Must be on the current stack. */
    boundary?: Function;
}

export const BEFORE_INIT_PREFIX = 'ERROR: logging before initLogging: ';

const encoder = new TextEncoder();

/* --------------------------------- Sink ------------------------------------ */

/**
 * Owns one LogFile per tier. A record at tier S goes to the files for S, S-1, …, INFO,
 * so the INFO file holds everything and the FATAL file only fatal records.
 * All operations are synchronous: a record is fully written before the next one starts.
 */
export class SeveritySink {
    private readonly files: Array<LogFile | undefined> = SEVERITIES.map(() => undefined);
    private readonly counters: SeverityStats[] = SEVERITIES.map(() => ({ lines: 0, bytes: 0 }));
    private timer: ReturnType<typeof setInterval> | undefined;
    private inWrite = false;
    private exiting = false;
    private closed = false;

    private _toStderr: boolean;
    private _alsoToStderr: boolean;
    private _stderrThreshold: Severity;

    constructor(private readonly opts: SinkOptions) {
        this._toStderr = opts.toStderr;
        this._alsoToStderr = opts.alsoToStderr;
        this._stderrThreshold = opts.stderrThreshold;
    }

    /* -------------------------------- Settings ------------------------------- */

    get toStderr(): boolean { return this._toStderr; }
    set toStderr(on: boolean) { this._toStderr = on; }

    get alsoToStderr(): boolean { return this._alsoToStderr; }
    set alsoToStderr(on: boolean) { this._alsoToStderr = on; }

    get stderrThreshold(): Severity { return this._stderrThreshold; }
    set stderrThreshold(s: Severity) { this._stderrThreshold = s; }

    /** Path of the current file for a tier, if one is open. */
    filePath(s: Severity): string | undefined {
        return this.files[s]?.path;
    }

    /** Bytes in the current file for a tier (header included), if one is open. */
    fileBytes(s: Severity): number | undefined {
        return this.files[s]?.bytes;
    }

    /* --------------------------------- Write --------------------------------- */

    write(s: Severity, data: Uint8Array, wo: WriteOptions = {}): void {
        const boundary = wo.boundary ?? SeveritySink.prototype.write;

        if (this.inWrite || this.exiting) {
            // Reentered from inside a write or during the exit sequence: files may be
            // mid-update, so go straight to stderr and let a fatal record finish the exit.
            writeQuietly(this.opts.stderr, data);
            if (s === Severity.FATAL && !this.exiting) this.terminate(wo.noStacks ? EXIT_NO_STACKS : EXIT_FATAL);
            return;
        }

        this.inWrite = true;
        let failure: Error | undefined;
        try {
            failure = this.route(s, data, wo.alsoToStderr ?? false);
        } finally {
            this.inWrite = false;
        }

        const c = this.counters[s];
        c.lines++;
        c.bytes += data.length;

        if (failure) {
            this.die(failure);
            return;
        }
        if (s === Severity.FATAL) this.fatal(wo.noStacks ?? false, boundary);
    }

    /** Returns the error that makes the process unrecoverable, if any. */
    private route(s: Severity, data: Uint8Array, alsoToStderr: boolean): Error | undefined {
        const stderr = this.opts.stderr;
        if (!this.opts.initialized) {
            writeQuietly(stderr, BEFORE_INIT_PREFIX);
            writeQuietly(stderr, data);
            return undefined;
        }
        if (this._toStderr || this.closed) {
            writeQuietly(stderr, data);
            return undefined;
        }
        if (alsoToStderr || this._alsoToStderr || s >= this._stderrThreshold) {
            writeQuietly(stderr, data);
        }

        try {
            this.createFiles(s);
            for (let t: Severity = s; t >= Severity.INFO; t--) this.files[t]?.write(data);
        } catch (e) {
            // Make sure the record appears somewhere before giving up.
            writeQuietly(stderr, data);
            return toError(e);
        }
        return undefined;
    }

    /** Open files for `s` and every lower tier that has none yet. */
    private createFiles(s: Severity): void {
        for (let t: Severity = s; t >= Severity.INFO && !this.files[t]; t--) {
            this.files[t] = LogFile.create({ ...this.opts, severity: t });
        }
        this.startDaemon();
    }

    /* --------------------------------- Flush --------------------------------- */

    /** Drain and fsync every open file. Throws the first failure after trying them all. */
    flush(): void {
        let first: Error | undefined;
        for (let t: Severity = Severity.FATAL; t >= Severity.INFO; t--) {
            try {
                this.files[t]?.flush(true);
            } catch (e) {
                first ??= toError(e);
            }
        }
        if (first) throw first;
    }

    private startDaemon(): void {
        if (this.timer || this.opts.flushInterval <= 0) return;
        this.timer = setInterval(() => {
            try {
                this.flush();
            } catch (e) {
                writeQuietly(this.opts.stderr, `log: periodic flush failed: ${toError(e).message}\n`);
            }
        }, this.opts.flushInterval);
        this.timer.unref();
    }

    close(): void {
        if (this.timer) clearInterval(this.timer);
        this.timer = undefined;
        this.closed = true;
        let first: Error | undefined;
        for (let t: Severity = Severity.FATAL; t >= Severity.INFO; t--) {
            try {
                this.files[t]?.close();
            } catch (e) {
                first ??= toError(e);
            }
            this.files[t] = undefined;
        }
        if (first) throw new LoggingError(`log: close failed: ${first.message}`, 'WRITE_FAILED', {}, first);
    }

    /* --------------------------------- Stats --------------------------------- */

    stats(): Stats {
        const snap = (s: Severity): SeverityStats => ({ ...this.counters[s] });
        return {
            info: snap(Severity.INFO),
            warning: snap(Severity.WARNING),
            error: snap(Severity.ERROR),
            fatal: snap(Severity.FATAL),
        };
    }

    /* ------------------------------- Exit paths ------------------------------ */

    /** The sink cannot persist: report, flush what is left and exit with status 2. */
    private die(err: Error): void {
        writeQuietly(this.opts.stderr, `log: exiting because of error: ${err.message}\n`);
        this.terminate(EXIT_SINK_FAILURE);
    }

    private fatal(noStacks: boolean, boundary: Function): void {
        if (noStacks) {
            this.terminate(EXIT_NO_STACKS);
            return;
        }
        this.exiting = true;
        const trace = encoder.encode(dumpStacks(boundary));
        // The stack always reaches stderr; in toStderr mode no file is open, so this is the only copy.
        writeQuietly(this.opts.stderr, trace);
        for (let t: Severity = Severity.FATAL; t >= Severity.INFO; t--) {
            try {
                this.files[t]?.write(trace);
            } catch (e) {
                writeQuietly(this.opts.stderr, `log: stack dump failed: ${toError(e).message}\n`);
            }
        }
        this.terminate(EXIT_FATAL);
    }

    private terminate(code: number): void {
        this.exiting = true;
        if (this.timer) clearInterval(this.timer);
        this.timer = undefined;
        timeoutFlush(() => this.flush(), FATAL_FLUSH_TIMEOUT, this.opts.stderr);
        this.opts.exit(code);
    }
}
