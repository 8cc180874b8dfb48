import { describe, expect, it } from 'vitest';

import { compileGlob, compileVModule, formatVModule, matchGlob, moduleName, parseVModule, VModuleFilter } from '../vmodule';

describe('matchGlob', () => {
  it('matches stars and single characters', () => {
    expect(matchGlob('gc*', 'gcwork')).toBe(true);
    expect(matchGlob('gc*', 'gc')).toBe(true);
    expect(matchGlob('gc*', 'xgc')).toBe(false);
    expect(matchGlob('?at', 'cat')).toBe(true);
    expect(matchGlob('?at', 'at')).toBe(false);
    expect(matchGlob('*_test', 'server_test')).toBe(true);
    expect(matchGlob('a*b*c', 'axxbyyc')).toBe(true);
    expect(matchGlob('a*b*c', 'axxbyy')).toBe(false);
  });

  it('matches character classes and negation', () => {
    expect(matchGlob('[a-c]at', 'bat')).toBe(true);
    expect(matchGlob('[a-c]at', 'dat')).toBe(false);
    expect(matchGlob('[^a]x', 'bx')).toBe(true);
    expect(matchGlob('[^a]x', 'ax')).toBe(false);
    expect(matchGlob('[!a]x', 'ax')).toBe(false);
  });

  it('treats escaped metacharacters literally', () => {
    expect(matchGlob('a\\*b', 'a*b')).toBe(true);
    expect(matchGlob('a\\*b', 'axb')).toBe(false);
  });

  it('never matches malformed patterns', () => {
    expect(compileGlob('[abc')).toBeNull();
    expect(compileGlob('[]')).toBeNull();
    expect(compileGlob('[z-a]')).toBeNull();
    expect(compileGlob('abc\\')).toBeNull();
    expect(matchGlob('[abc', '[abc')).toBe(false);
  });
});

describe('parseVModule', () => {
  it('parses entries and reports the rejected ones', () => {
    const { rules, rejected } = parseVModule('gc*=2, server=1,bad,=3,x=y');
    expect(rules).toEqual([
      { pattern: 'gc*', level: 2, literal: false },
      { pattern: 'server', level: 1, literal: true },
    ]);
    expect(rejected).toEqual(['bad', '=3', 'x=y']);
  });

  it('splits on the last equals sign', () => {
    expect(parseVModule('a=b=3').rules).toEqual([{ pattern: 'a=b', level: 3, literal: true }]);
  });

  it('accepts rule objects and truncates their levels', () => {
    expect(compileVModule([{ pattern: 'a', level: 2.7 }])).toEqual({
      rules: [{ pattern: 'a', level: 2, literal: true }],
      rejected: [],
    });
  });

  it('formats rules back to text', () => {
    expect(formatVModule(parseVModule('gc*=2,server=1').rules)).toBe('gc*=2,server=1');
  });
});

describe('moduleName', () => {
  it('strips the directory and the last extension', () => {
    expect(moduleName('/src/app/server.ts')).toBe('server');
    expect(moduleName('/src/app/a.test.ts')).toBe('a.test');
    expect(moduleName('C:\\app\\main.ts')).toBe('main');
    expect(moduleName('/src/app/server.ts', false)).toBe('server.ts');
    expect(moduleName('/src/.env')).toBe('.env');
  });
});

describe('VModuleFilter', () => {
  it('uses the first matching rule', () => {
    const filter = new VModuleFilter(parseVModule('server=1,serv*=3').rules);
    expect(filter.length).toBe(2);
    expect(filter.match('/x/server.ts')).toEqual({ level: 1, matched: true });
    expect(filter.match('/x/service.ts')).toEqual({ level: 3, matched: true });
    expect(filter.match('/x/other.ts')).toEqual({ level: 0, matched: false });
  });

  it('can match full file names', () => {
    const filter = new VModuleFilter(parseVModule('server.ts=2').rules, false);
    expect(filter.match('/x/server.ts')).toEqual({ level: 2, matched: true });
    expect(filter.toString()).toBe('server.ts=2');
  });
});
