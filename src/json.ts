// src/json.ts
// JSON records: one object per line, header fields first, caller fields in call order, message last.

import { format } from 'node:util';
import type { BufferPool, RecordBuffer } from './buffer';
import { stackText } from './callsite';
import { isoTime, unixStamp, type TimeParts } from './format';
import { type CallSite, type JsonRecord, LOWER_SEVERITY_NAMES, Severity } from './types';

/* -------------------------------- Escaping --------------------------------- */

const HEX = '0123456789abcdef';

/**
 * Quote `s` as a JSON string.
 * - `"` and `\` are backslash-escaped; `\n` `\r` `\t` use short forms; other controls use `\u00XX`.
 * - With `escapeHTML`, `<` `>` `&` become `\u003c` `\u003e` `\u0026`.
 * - U+2028 / U+2029 are always escaped (they end a statement in JavaScript).
 * - Lone surrogates become `\ufffd`.
 */
export function quoteJson(s: string, escapeHTML = false): string {
    let out = '"';
    let start = 0;
    for (let i = 0; i < s.length; i++) {
        const c = s.charCodeAt(i);
        let rep: string;
        if (c < 0x80) {
            if (c >= 0x20 && c !== 0x22 && c !== 0x5c && !(escapeHTML && (c === 0x3c || c === 0x3e || c === 0x26))) continue;
            switch (c) {
                case 0x22: rep = '\\"'; break;
                case 0x5c: rep = '\\\\'; break;
                case 0x0a: rep = '\\n'; break;
                case 0x0d: rep = '\\r'; break;
                case 0x09: rep = '\\t'; break;
                default: rep = `\\u00${HEX[c >> 4]}${HEX[c & 0xf]}`;
            }
        } else if (c === 0x2028 || c === 0x2029) {
            rep = c === 0x2028 ? '\\u2028' : '\\u2029';
        } else if (c >= 0xd800 && c <= 0xdbff) {
            const next = s.charCodeAt(i + 1);
            if (next >= 0xdc00 && next <= 0xdfff) {
                i++;
                continue;
            }
            rep = '\\ufffd';
        } else if (c >= 0xdc00 && c <= 0xdfff) {
            rep = '\\ufffd';
        } else {
            continue;
        }
        if (start < i) out += s.slice(start, i);
        out += rep;
        start = i + 1;
    }
    if (start < s.length) out += s.slice(start);
    return out + '"';
}

const utf8 = new TextDecoder('utf-8', { fatal: false });

/* --------------------------------- Header ---------------------------------- */

export interface JsonHeaderFields {
    version?: string;
    host: string;
    pid: number;
}

/** `{"time":…,"timestamp":…,"level":…[,"version":…],"host":…,"pid":…,"file":…,"line":…` (object left open). */
export function writeJsonHeader(buf: RecordBuffer, s: Severity, t: TimeParts, h: JsonHeaderFields, file: string, line: number): void {
    buf.append(`{"time":"${isoTime(t)}","timestamp":${unixStamp(t)},"level":"${LOWER_SEVERITY_NAMES[s]}"`);
    if (h.version) buf.append(`,"version":${quoteJson(h.version)}`);
    buf.append(`,"host":${quoteJson(h.host)},"pid":${h.pid},"file":${quoteJson(file)},"line":${line}`);
}

/* --------------------------------- Records --------------------------------- */

/** Shared handle for filtered-out records: accepts every call, writes nothing. */
export const DISABLED_RECORD: JsonRecord = Object.freeze({
    enabled: false,
    str: () => DISABLED_RECORD,
    strs: () => DISABLED_RECORD,
    int: () => DISABLED_RECORD,
    num: () => DISABLED_RECORD,
    bigint: () => DISABLED_RECORD,
    bool: () => DISABLED_RECORD,
    err: () => DISABLED_RECORD,
    bytes: () => DISABLED_RECORD,
    msg: () => {},
    msgf: () => {},
});

export type JsonEmit = (s: Severity, buf: RecordBuffer, site: CallSite) => void;

export interface JsonRecordOptions {
    fieldPrefix: string;
    escapeHTML: boolean;
}

function numberLiteral(n: number): string {
    // NaN/Infinity have no JSON literal; keep them readable as strings.
    return Number.isFinite(n) ? String(n) : `"${n}"`;
}

/**
 * Live record with its header already written. Fields append in call order;
 * `msg()` closes the object and hands the buffer to the sink exactly once.
 */
export class ActiveJsonRecord implements JsonRecord {
    public readonly enabled = true;
    private buf: RecordBuffer | null;

    constructor(
        private readonly severity: Severity,
        private readonly site: CallSite,
        buf: RecordBuffer,
        private readonly opts: JsonRecordOptions,
        private readonly emit: JsonEmit,
        private readonly pool: BufferPool,
        /** Attach the caller's stack as a `"stack"` field (trace location hit). */
        private readonly withStack = false,
    ) {
        this.buf = buf;
    }

    private field(name: string, literal: string): this {
        this.buf?.append(`,${quoteJson(this.opts.fieldPrefix + name)}:${literal}`);
        return this;
    }

    str(name: string, value: string): this {
        return this.field(name, quoteJson(value, this.opts.escapeHTML));
    }

    strs(name: string, values: readonly string[]): this {
        return this.field(name, `[${values.map(v => quoteJson(v, this.opts.escapeHTML)).join(',')}]`);
    }

    int(name: string, value: number): this {
        return this.field(name, numberLiteral(Number.isFinite(value) ? Math.trunc(value) : value));
    }

    num(name: string, value: number): this {
        return this.field(name, numberLiteral(value));
    }

    bigint(name: string, value: bigint): this {
        return this.field(name, value.toString());
    }

    bool(name: string, value: boolean): this {
        return this.field(name, value ? 'true' : 'false');
    }

    err(error: unknown): this {
        const text = error instanceof Error ? error.message : String(error);
        this.buf?.append(`,"error":${quoteJson(text, this.opts.escapeHTML)}`);
        return this;
    }

    bytes(name: string, value: Uint8Array): this {
        return this.str(name, utf8.decode(value));
    }

    msg(message = ''): void {
        const buf = this.buf;
        if (!buf) return;
        this.buf = null;
        if (this.withStack) buf.append(`,"stack":${quoteJson(stackText(ActiveJsonRecord.prototype.msg))}`);
        if (message) buf.append(`,"message":${quoteJson(message)}`);
        buf.append('}\n');
        try {
            this.emit(this.severity, buf, this.site);
        } finally {
            this.pool.release(buf);
        }
    }

    msgf(fmt: string, ...args: unknown[]): void {
        this.msg(format(fmt, ...args));
    }
}
