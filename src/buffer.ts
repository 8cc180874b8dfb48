// src/buffer.ts
// Growable byte buffer for one record, and the pool that recycles them.

const INITIAL_SIZE = 1024;
/** Buffers that grew past this are dropped on release instead of being kept. */
const MAX_RETAINED_SIZE = 64 * 1024;

export class RecordBuffer {
    private buf: Buffer = Buffer.allocUnsafe(INITIAL_SIZE);
    private len = 0;

    get length(): number {
        return this.len;
    }

    get capacity(): number {
        return this.buf.length;
    }

    private ensure(extra: number): void {
        const need = this.len + extra;
        if (need <= this.buf.length) return;
        let size = this.buf.length * 2;
        while (size < need) size *= 2;
        const next = Buffer.allocUnsafe(size);
        this.buf.copy(next, 0, 0, this.len);
        this.buf = next;
    }

    /** Append UTF-8 text. Lone surrogates encode as U+FFFD. */
    append(s: string): this {
        this.ensure(Buffer.byteLength(s, 'utf8'));
        this.len += this.buf.write(s, this.len, 'utf8');
        return this;
    }

    appendBytes(b: Uint8Array): this {
        this.ensure(b.length);
        this.buf.set(b, this.len);
        this.len += b.length;
        return this;
    }

    appendByte(c: number): this {
        this.ensure(1);
        this.buf[this.len++] = c;
        return this;
    }

    lastByte(): number | undefined {
        return this.len > 0 ? this.buf[this.len - 1] : undefined;
    }

    /** View of the written bytes. Valid until the next append or reset. */
    bytes(): Buffer {
        return this.buf.subarray(0, this.len);
    }

    toString(): string {
        return this.buf.toString('utf8', 0, this.len);
    }

    reset(): void {
        this.len = 0;
    }
}

/**
 * Bounded free list of record buffers. Acquire/release keep allocation per log
 * call flat; at most `maxAvailable` idle buffers are retained.
 */
export class BufferPool {
    private available: RecordBuffer[] = [];

    constructor(private readonly maxAvailable: number = 32) {}

    acquire(): RecordBuffer {
        return this.available.pop() ?? new RecordBuffer();
    }

    release(item: RecordBuffer): void {
        if (this.available.length >= this.maxAvailable) return;
        if (item.capacity > MAX_RETAINED_SIZE) return;
        item.reset();
        this.available.push(item);
    }

    /** Number of idle buffers ready for reuse. */
    get availableCount(): number {
        return this.available.length;
    }
}
