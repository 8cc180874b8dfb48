// src/format.ts
// Fixed-column text records and the time fields shared with JSON records.

import { format } from 'node:util';
import type { RecordBuffer } from './buffer';
import { Severity, SEVERITY_NAMES } from './types';

/* ---------------------------------- Types ---------------------------------- */

/** Broken-down local time with microseconds. */
export interface TimeParts {
    year: number;
    month: number;
    day: number;
    hour: number;
    minute: number;
    second: number;
    micros: number;
    /** Offset from UTC in minutes, east positive. */
    offset: number;
    /** Whole seconds since the Unix epoch. */
    unix: number;
}

/* ------------------------------- Time helpers ------------------------------ */

/** Split an epoch-milliseconds reading (fractions carry microseconds) into local fields. */
export function timeParts(ms: number): TimeParts {
    const whole = Math.floor(ms);
    const d = new Date(whole);
    const sub = Math.floor((ms - whole) * 1000);
    return {
        year: d.getFullYear(),
        month: d.getMonth() + 1,
        day: d.getDate(),
        hour: d.getHours(),
        minute: d.getMinutes(),
        second: d.getSeconds(),
        micros: d.getMilliseconds() * 1000 + sub,
        offset: -d.getTimezoneOffset(),
        unix: Math.floor(whole / 1000),
    };
}

const pad = (n: number, width = 2, fill = '0') => String(n).padStart(width, fill);

/** `YYYYMMDD-hhmmss`, used in file names. */
export function fileStamp(t: TimeParts): string {
    return `${t.year}${pad(t.month)}${pad(t.day)}-${pad(t.hour)}${pad(t.minute)}${pad(t.second)}`;
}

/** `YYYY-MM-DDThh:mm:ss+HH:MM`. Zero offset renders as `+00:00`. */
export function isoTime(t: TimeParts): string {
    const sign = t.offset < 0 ? '-' : '+';
    const off = Math.abs(t.offset);
    return `${t.year}-${pad(t.month)}-${pad(t.day)}T${pad(t.hour)}:${pad(t.minute)}:${pad(t.second)}`
        + `${sign}${pad(Math.floor(off / 60))}:${pad(off % 60)}`;
}

/** Unix seconds with a six-digit fraction, e.g. `1700000000.000250`. */
export function unixStamp(t: TimeParts): string {
    return `${t.unix}.${pad(t.micros, 6)}`;
}

/* ------------------------------- Formatters -------------------------------- */

/** Join arguments the way console.* does (printf-style placeholders in the first). A lone string is kept verbatim. */
export function formatArgs(args: readonly unknown[]): string {
    if (args.length === 0) return '';
    const first = args[0];
    return args.length === 1 && typeof first === 'string' ? first : format(first, ...args.slice(1));
}

/** printf-style formatting for the `f` entry points; `%%` collapses even with no arguments. */
export function formatf(fmt: string, args: readonly unknown[]): string {
    return format(fmt, ...args);
}

/**
 * Write the fixed-column text header:
 * `Lmmdd hh:mm:ss.uuuuuu ppppppp file:line] `
 * Columns are fixed so lines sort by time and parse by position.
 */
export function writeTextHeader(buf: RecordBuffer, s: Severity, t: TimeParts, pid: number, file: string, line: number): void {
    buf.append(
        `${SEVERITY_NAMES[s][0]}${pad(t.month)}${pad(t.day)} `
        + `${pad(t.hour)}:${pad(t.minute)}:${pad(t.second)}.${pad(t.micros, 6)} `
        + `${pad(pid, 7, ' ')} ${file}:${line}] `
    );
}

/** Append a message body, adding the record's trailing newline when missing. */
export function writeTextBody(buf: RecordBuffer, message: string): void {
    buf.append(message);
    if (buf.lastByte() !== 0x0a) buf.appendByte(0x0a);
}

/** Header block written at the top of every log file. */
export function fileHeader(t: TimeParts, host: string, argv: readonly string[]): string {
    return `Log file created at: ${t.year}/${pad(t.month)}/${pad(t.day)} ${pad(t.hour)}:${pad(t.minute)}:${pad(t.second)}\n`
        + `Running on machine: ${host}\n`
        + `Binary: Node.js ${process.version} for ${process.platform}/${process.arch}\n`
        + `Arguments: ${argv.join(' ')}\n`
        + 'Log line format: [IWEF]mmdd hh:mm:ss.uuuuuu threadid file:line] msg\n';
}
