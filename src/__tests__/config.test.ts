import { tmpdir } from 'node:os';
import { describe, expect, it } from 'vitest';

import { DEFAULT_MAX_SIZE, parseSeverity, parseTraceLocation, resolveOptions } from '../config';
import { isLoggingError, LoggingError } from '../errors';
import { Severity } from '../types';

describe('parseSeverity', () => {
  it('accepts names, initials and numbers', () => {
    expect(parseSeverity('info')).toBe(Severity.INFO);
    expect(parseSeverity(' WARN ')).toBe(Severity.WARNING);
    expect(parseSeverity('w')).toBe(Severity.WARNING);
    expect(parseSeverity('2')).toBe(Severity.ERROR);
    expect(parseSeverity('Fatal')).toBe(Severity.FATAL);
  });

  it('returns undefined for anything else', () => {
    expect(parseSeverity(undefined)).toBeUndefined();
    expect(parseSeverity('')).toBeUndefined();
    expect(parseSeverity('debug')).toBeUndefined();
    expect(parseSeverity('4')).toBeUndefined();
  });
});

describe('parseTraceLocation', () => {
  it('keeps the base name and the line', () => {
    expect(parseTraceLocation('src/a.ts:12')).toEqual({ file: 'a.ts', line: 12 });
  });

  it('clears on an empty value', () => {
    expect(parseTraceLocation('  ')).toBeUndefined();
  });

  it.each(['a.ts', 'a.ts:0', ':3', 'a.ts:x'])('rejects %s', value => {
    let caught: unknown;
    try {
      parseTraceLocation(value);
    } catch (e) {
      caught = e;
    }
    expect(isLoggingError(caught)).toBe(true);
    expect(caught instanceof LoggingError && caught.code).toBe('INVALID_TRACE_LOCATION');
  });
});

describe('resolveOptions', () => {
  it('reads unset options from the environment bag', () => {
    const o = resolveOptions({
      env: {
        LOG_DIR: '/a,/b',
        LOG_V: '3',
        LOG_VMODULE: 'x=1,broken',
        LOG_TO_STDERR: 'true',
        ALSO_LOG_TO_STDERR: '1',
        LOG_STDERR_THRESHOLD: 'WARNING',
        LOG_BACKTRACE_AT: 'main.ts:9',
        LOG_MAX_SIZE: '1000',
      },
    });
    expect(o.dirs).toEqual(['/a', '/b']);
    expect(o.verbosity).toBe(3);
    expect(o.vmodule).toEqual([{ pattern: 'x', level: 1, literal: true }]);
    expect(o.rejected).toEqual(['broken']);
    expect(o.toStderr).toBe(true);
    expect(o.alsoToStderr).toBe(true);
    expect(o.stderrThreshold).toBe(Severity.WARNING);
    expect(o.traceLocation).toEqual({ file: 'main.ts', line: 9 });
    expect(o.maxSize).toBe(1000);
  });

  it('prefers explicit options over the environment', () => {
    const o = resolveOptions({
      verbosity: 1,
      logDir: ['/x'],
      toStderr: false,
      vmodule: [{ pattern: 'y', level: 4 }],
      env: { LOG_V: '3', LOG_DIR: '/a', LOG_TO_STDERR: 'true', LOG_VMODULE: 'x=1' },
    });
    expect(o.verbosity).toBe(1);
    expect(o.dirs).toEqual(['/x']);
    expect(o.toStderr).toBe(false);
    expect(o.vmodule).toEqual([{ pattern: 'y', level: 4, literal: true }]);
  });

  it('falls back to defaults', () => {
    const o = resolveOptions({ env: {} });
    expect(o.dirs).toEqual([tmpdir()]);
    expect(o.verbosity).toBe(0);
    expect(o.stderrThreshold).toBe(Severity.ERROR);
    expect(o.maxSize).toBe(DEFAULT_MAX_SIZE);
    expect(o.traceLocation).toBeUndefined();
    expect(o.json).toEqual({ version: undefined, fieldPrefix: '', escapeHTML: false });
  });

  it('ignores unparsable environment values', () => {
    const o = resolveOptions({ env: { LOG_V: 'lots', LOG_STDERR_THRESHOLD: 'loud', LOG_BACKTRACE_AT: 'nowhere', LOG_TO_STDERR: 'maybe' } });
    expect(o.verbosity).toBe(0);
    expect(o.stderrThreshold).toBe(Severity.ERROR);
    expect(o.traceLocation).toBeUndefined();
    expect(o.toStderr).toBe(false);
  });

  it('throws on an explicit malformed trace location', () => {
    expect(() => resolveOptions({ env: {}, traceLocation: 'nowhere' })).toThrow(LoggingError);
  });
});

describe('LoggingError', () => {
  it('serialises code, context and cause', () => {
    const err = new LoggingError('log: write failed', 'WRITE_FAILED', { path: '/tmp/x' }, new Error('disk full'));
    expect(err.name).toBe('LoggingError');
    expect(err.toJSON()).toEqual({
      name: 'LoggingError',
      message: 'log: write failed',
      code: 'WRITE_FAILED',
      context: { path: '/tmp/x' },
      cause: 'disk full',
    });
  });
});
