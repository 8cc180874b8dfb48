// src/crash.ts
// Fatal path helpers: stack dumps, bounded flush, exit statuses.

import { threadId } from 'node:worker_threads';
import { stackText } from './callsite';
import { toError } from './errors';
import type { Writer } from './types';

/** A FATAL record: stacks dumped, then exit. */
export const EXIT_FATAL = 255;
/** `exit()`: FATAL record without stacks. */
export const EXIT_NO_STACKS = 1;
/** The sink could not create or write a file. */
export const EXIT_SINK_FAILURE = 2;

/**
 * Upper bound for the flush before a fatal exit. The flush is synchronous, so an
 * overrun is reported once it returns; a flush that never returns is not interrupted.
 */
export const FATAL_FLUSH_TIMEOUT = 10_000;

/**
 * Stack dump for a fatal record, starting at the caller of `boundary`.
 * JavaScript runs on one thread per isolate, so the dump is this thread's stack;
 * worker threads log through their own logger instances.
 */
export function dumpStacks(boundary: Function): string {
    return `\nthread ${threadId} [running]:\n${stackText(boundary)}\n\n`;
}

const encoder = new TextEncoder();

/**
 * Run `flush` and report (to stderr) a failure or an overrun of `timeoutMs`.
 * Never throws: the caller is about to exit and must get there.
 * The flush is synchronous, so the bound is checked after it returns.
 */
export function timeoutFlush(flush: () => void, timeoutMs: number, stderr: Writer): void {
    const start = Date.now();
    try {
        flush();
    } catch (e) {
        writeQuietly(stderr, `log: flush failed: ${toError(e).message}\n`);
        return;
    }
    const took = Date.now() - start;
    if (took > timeoutMs) writeQuietly(stderr, `log: flush took longer than ${timeoutMs}ms (${took}ms)\n`);
}

/** Write to stderr, ignoring failures: used only on the way out. */
export function writeQuietly(stderr: Writer, text: string | Uint8Array): void {
    try {
        stderr(typeof text === 'string' ? encoder.encode(text) : text);
    } catch {
        // stderr itself is gone; nothing left to report to
    }
}
