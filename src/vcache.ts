// src/vcache.ts
// Resolved verbosity per call site, memoised until the rules or the default change.

import type { CallSite, Level } from './types';
import { VModuleFilter } from './vmodule';

export class VerbosityCache {
    private readonly sites = new Map<string, Level>();
    private _generation = 0;
    private _filter: VModuleFilter;
    private _verbosity: Level;

    constructor(filter: VModuleFilter, verbosity: Level) {
        this._filter = filter;
        this._verbosity = verbosity;
    }

    /** Bumped on every invalidation; entries never outlive the generation that made them. */
    get generation(): number {
        return this._generation;
    }

    get size(): number {
        return this.sites.size;
    }

    get filter(): VModuleFilter {
        return this._filter;
    }

    get verbosity(): Level {
        return this._verbosity;
    }

    /** Threshold for `site`: the first matching rule's level, else the default verbosity. */
    resolve(site: CallSite): Level {
        const hit = this.sites.get(site.key);
        if (hit !== undefined) return hit;
        const m = this._filter.match(site.path);
        const level = m.matched ? m.level : this._verbosity;
        this.sites.set(site.key, level);
        return level;
    }

    setFilter(filter: VModuleFilter): void {
        this._filter = filter;
        this.invalidate();
    }

    setVerbosity(level: Level): void {
        this._verbosity = level;
        this.invalidate();
    }

    invalidate(): void {
        this.sites.clear();
        this._generation++;
    }
}
