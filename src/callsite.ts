// src/callsite.ts
// Call-site capture from V8 structured stack traces.

import { fileURLToPath } from 'node:url';
import type { CallSite } from './types';

const UNKNOWN: CallSite = Object.freeze({ key: '???:1:0', path: '???', file: '???', line: 1 });

function toPath(name: string): string {
    if (!name.startsWith('file://')) return name;
    try {
        return fileURLToPath(name);
    } catch {
        return name;
    }
}

/**
 * Locate the statement that called `boundary`, `depth` frames further up.
 * `boundary` is the public entry point the user called; frames above it are dropped
 * by V8 so the result does not depend on how deep the logger's internals are.
 */
export function captureCallSite(boundary: Function, depth = 0): CallSite {
    let frames: NodeJS.CallSite[] = [];
    const savedPrepare = Error.prepareStackTrace;
    const savedLimit = Error.stackTraceLimit;
    Error.prepareStackTrace = (_err, cs) => {
        frames = cs;
        return '';
    };
    Error.stackTraceLimit = depth + 8;
    try {
        const holder: { stack?: string } = {};
        Error.captureStackTrace(holder, boundary);
        // Reading `stack` runs prepareStackTrace.
        if (holder.stack === undefined) return UNKNOWN;
    } finally {
        Error.prepareStackTrace = savedPrepare;
        Error.stackTraceLimit = savedLimit;
    }

    const frame = frames[depth];
    if (!frame) return UNKNOWN;
    const raw = frame.getFileName() ?? frame.getScriptNameOrSourceURL();
    if (!raw) return UNKNOWN;
    const path = toPath(raw);
    const slash = Math.max(path.lastIndexOf('/'), path.lastIndexOf('\\'));
    const line = Math.max(frame.getLineNumber() ?? 0, 0);
    const column = frame.getColumnNumber() ?? 0;
    return {
        key: `${path}:${line}:${column}`,
        path,
        file: slash >= 0 ? path.slice(slash + 1) : path,
        line,
    };
}

/**
 * Current stack as text, starting at the caller of `boundary`.
 * Used for fatal dumps and trace-location records.
 */
export function stackText(boundary: Function): string {
    const holder: { stack?: string } = {};
    const savedLimit = Error.stackTraceLimit;
    Error.stackTraceLimit = 100;
    try {
        Error.captureStackTrace(holder, boundary);
    } finally {
        Error.stackTraceLimit = savedLimit;
    }
    const text = holder.stack ?? '';
    // Drop the "Error" headline V8 puts first.
    const nl = text.indexOf('\n');
    return nl >= 0 ? text.slice(nl + 1) : '';
}
