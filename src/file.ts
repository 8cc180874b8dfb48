// src/file.ts
// One buffered output file per severity tier, replaced on size or age rotation.

import { closeSync, fsyncSync, mkdirSync, openSync, symlinkSync, unlinkSync, writeSync } from 'node:fs';
import { hostname, userInfo } from 'node:os';
import { basename, join } from 'node:path';
import { LoggingError, toError } from './errors';
import { fileHeader, fileStamp, timeParts } from './format';
import { Severity, SEVERITY_NAMES } from './types';

/* ---------------------------------- Types ---------------------------------- */

export interface LogFileOptions {
    /** Candidate directories, tried in order. */
    dirs: readonly string[];
    program: string;
    host: string;
    user: string;
    pid: number;
    severity: Severity;
    maxSize: number;
    /** 0 disables age rotation. */
    maxAge: number;
    bufferSize: number;
    argv: readonly string[];
    now: () => number;
}

/* ------------------------------- Name helpers ------------------------------ */

/** Host name up to the first dot; 'unknownhost' when the OS will not say. */
export function shortHostname(): string {
    let h: string;
    try {
        h = hostname();
    } catch {
        return 'unknownhost';
    }
    const dot = h.indexOf('.');
    return (dot > 0 ? h.slice(0, dot) : h) || 'unknownhost';
}

/** Login name with path separators replaced; 'unknownuser' when unavailable. */
export function userName(): string {
    try {
        return userInfo().username.replace(/[\\/]/g, '_') || 'unknownuser';
    } catch {
        return 'unknownuser';
    }
}

/** `<program>.<host>.<user>.log.<SEVERITY>.<YYYYMMDD-hhmmss>.<pid>` */
export function logName(o: Pick<LogFileOptions, 'program' | 'host' | 'user' | 'pid' | 'severity'>, ms: number): string {
    return `${o.program}.${o.host}.${o.user}.log.${SEVERITY_NAMES[o.severity]}.${fileStamp(timeParts(ms))}.${o.pid}`;
}

/** Suffixes tried when a file of the same name already exists (same-second rotation). */
const MAX_NAME_ATTEMPTS = 1000;

/* --------------------------------- LogFile --------------------------------- */

export class LogFile {
    private fd = -1;
    private _path = '';
    private readonly buf: Buffer;
    private pending = 0;
    private _bytes = 0;
    private createdAt = 0;
    private _rotations = 0;

    private constructor(private readonly opts: LogFileOptions) {
        this.buf = Buffer.allocUnsafe(Math.max(opts.bufferSize, 1));
    }

    /** Create and open the first file for a tier. Throws LoggingError('FILE_CREATE_FAILED'). */
    static create(opts: LogFileOptions): LogFile {
        const f = new LogFile(opts);
        f.open();
        return f;
    }

    get path(): string {
        return this._path;
    }

    /** Bytes in the current file, header included; restarts on rotation. */
    get bytes(): number {
        return this._bytes;
    }

    get rotations(): number {
        return this._rotations;
    }

    get isOpen(): boolean {
        return this.fd >= 0;
    }

    write(data: Uint8Array): void {
        if (this.fd < 0) throw new LoggingError('log file is closed', 'LOGGER_CLOSED', { severity: SEVERITY_NAMES[this.opts.severity] });
        if (this.shouldRotate(data.length)) this.rotate();
        this.buffer(data);
        this._bytes += data.length;
    }

    private shouldRotate(n: number): boolean {
        if (this._bytes + n >= this.opts.maxSize) return true;
        return this.opts.maxAge > 0 && this.opts.now() - this.createdAt >= this.opts.maxAge;
    }

    /** Flush and close the current file, then start a fresh one with a new header. */
    rotate(): void {
        this.flush();
        closeSync(this.fd);
        this.fd = -1;
        this.open();
        this._rotations++;
    }

    /** Drain the buffer; with `sync`, also fsync. A flush with nothing pending writes nothing. */
    flush(sync = false): void {
        if (this.fd < 0) return;
        if (this.pending > 0) {
            const n = this.pending;
            this.pending = 0;
            this.writeAll(this.buf.subarray(0, n));
        }
        if (sync) {
            try {
                fsyncSync(this.fd);
            } catch (e) {
                throw new LoggingError(`log: fsync ${this._path}: ${toError(e).message}`, 'WRITE_FAILED', { path: this._path }, toError(e));
            }
        }
    }

    close(): void {
        if (this.fd < 0) return;
        try {
            this.flush(true);
        } finally {
            closeSync(this.fd);
            this.fd = -1;
        }
    }

    private buffer(data: Uint8Array): void {
        if (data.length > this.buf.length - this.pending) this.flush();
        if (data.length >= this.buf.length) {
            this.writeAll(data);
            return;
        }
        this.buf.set(data, this.pending);
        this.pending += data.length;
    }

    private writeAll(data: Uint8Array): void {
        let off = 0;
        try {
            while (off < data.length) off += writeSync(this.fd, data, off, data.length - off);
        } catch (e) {
            throw new LoggingError(`log: write ${this._path}: ${toError(e).message}`, 'WRITE_FAILED', { path: this._path }, toError(e));
        }
    }

    private open(): void {
        const o = this.opts;
        const now = o.now();
        const name = logName(o, now);
        let lastErr: Error | undefined;

        for (const dir of o.dirs) {
            try {
                mkdirSync(dir, { recursive: true });
            } catch (e) {
                lastErr = toError(e);
                continue;
            }
            const opened = openUnique(dir, name);
            if (opened instanceof Error) {
                lastErr = opened;
                continue;
            }
            this.fd = opened.fd;
            this._path = opened.path;
            this.createdAt = now;
            this.pending = 0;
            this._bytes = 0;
            linkLatest(dir, `${o.program}.${SEVERITY_NAMES[o.severity]}`, opened.path);

            const header = Buffer.from(fileHeader(timeParts(now), o.host, o.argv), 'utf8');
            this.buffer(header);
            this._bytes = header.length;
            return;
        }

        throw new LoggingError(
            `log: cannot create log: ${lastErr?.message ?? 'no log directories'}`,
            'FILE_CREATE_FAILED',
            { dirs: [...o.dirs], name },
            lastErr,
        );
    }
}

function errnoCode(e: unknown): string | undefined {
    return typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string' ? e.code : undefined;
}

function openUnique(dir: string, name: string): { fd: number; path: string } | Error {
    for (let i = 0; i < MAX_NAME_ATTEMPTS; i++) {
        const path = join(dir, i === 0 ? name : `${name}.${i}`);
        try {
            return { fd: openSync(path, 'wx', 0o644), path };
        } catch (e) {
            if (errnoCode(e) !== 'EEXIST') return toError(e);
        }
    }
    return new Error(`too many files named ${name} in ${dir}`);
}

/** Point `<dir>/<link>` at the newest file. Best effort: a failure leaves the old link. */
function linkLatest(dir: string, link: string, target: string): void {
    const at = join(dir, link);
    try {
        unlinkSync(at);
    } catch {
        // no previous link
    }
    try {
        symlinkSync(basename(target), at);
    } catch {
        // links are a convenience; the log file itself is open
    }
}
