import { describe, expect, it } from 'vitest';

import type { CallSite } from '../types';
import { VerbosityCache } from '../vcache';
import { parseVModule, VModuleFilter } from '../vmodule';

function site(path: string, line: number, column = 1): CallSite {
  const file = path.slice(path.lastIndexOf('/') + 1);
  return { key: `${path}:${line}:${column}`, path, file, line };
}

describe('VerbosityCache', () => {
  it('resolves a matching rule and memoises it per site', () => {
    const cache = new VerbosityCache(new VModuleFilter(parseVModule('server=3').rules), 0);
    expect(cache.resolve(site('/x/server.ts', 10))).toBe(3);
    expect(cache.resolve(site('/x/server.ts', 10))).toBe(3);
    expect(cache.resolve(site('/x/server.ts', 20))).toBe(3);
    expect(cache.size).toBe(2);
  });

  it('falls back to the default verbosity when no rule matches', () => {
    const cache = new VerbosityCache(new VModuleFilter(parseVModule('server=3').rules), 1);
    expect(cache.resolve(site('/x/client.ts', 5))).toBe(1);
  });

  it('drops every entry when the verbosity changes', () => {
    const cache = new VerbosityCache(new VModuleFilter([]), 1);
    cache.resolve(site('/x/client.ts', 5));
    cache.setVerbosity(4);
    expect(cache.generation).toBe(1);
    expect(cache.size).toBe(0);
    expect(cache.resolve(site('/x/client.ts', 5))).toBe(4);
  });

  it('drops every entry when the rules change', () => {
    const cache = new VerbosityCache(new VModuleFilter(parseVModule('client=2').rules), 0);
    expect(cache.resolve(site('/x/client.ts', 5))).toBe(2);
    cache.setFilter(new VModuleFilter(parseVModule('client=5').rules));
    expect(cache.generation).toBe(1);
    expect(cache.resolve(site('/x/client.ts', 5))).toBe(5);
  });
});
