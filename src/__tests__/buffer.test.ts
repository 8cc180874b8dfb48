import { describe, expect, it } from 'vitest';

import { BufferPool, RecordBuffer } from '../buffer';
import { writeTextBody } from '../format';

describe('RecordBuffer', () => {
  it('appends text, bytes and single bytes', () => {
    const buf = new RecordBuffer();
    expect(buf.lastByte()).toBeUndefined();
    buf.append('héllo').appendBytes(new Uint8Array([0x20, 0x21])).appendByte(0x0a);
    expect(buf.toString()).toBe('héllo !\n');
    expect(buf.length).toBe(9);
    expect(buf.lastByte()).toBe(0x0a);
  });

  it('doubles its capacity to fit large records', () => {
    const buf = new RecordBuffer();
    expect(buf.capacity).toBe(1024);
    buf.append('a'.repeat(3000));
    expect(buf.capacity).toBe(4096);
    expect(buf.bytes().length).toBe(3000);
  });

  it('adds the trailing newline only when missing', () => {
    const a = new RecordBuffer();
    writeTextBody(a, 'one');
    const b = new RecordBuffer();
    writeTextBody(b, 'two\n');
    expect(a.toString()).toBe('one\n');
    expect(b.toString()).toBe('two\n');
  });
});

describe('BufferPool', () => {
  it('hands back released buffers empty', () => {
    const pool = new BufferPool();
    const buf = pool.acquire();
    buf.append('data');
    pool.release(buf);
    expect(pool.availableCount).toBe(1);
    const again = pool.acquire();
    expect(again).toBe(buf);
    expect(again.length).toBe(0);
  });

  it('keeps at most maxAvailable buffers', () => {
    const pool = new BufferPool(1);
    pool.release(new RecordBuffer());
    pool.release(new RecordBuffer());
    expect(pool.availableCount).toBe(1);
  });

  it('drops buffers that grew too large', () => {
    const pool = new BufferPool();
    const buf = pool.acquire();
    buf.append('x'.repeat(70_000));
    pool.release(buf);
    expect(pool.availableCount).toBe(0);
  });
});
