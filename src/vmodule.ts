// src/vmodule.ts
// Per-file verbosity rules ("vmodule"): `pattern=level` pairs, first match wins.

import type { Level, VModuleRule, VModuleSpec } from './types';

/* ---------------------------------- Glob ----------------------------------- */

type Token =
    | { t: 'lit'; c: string }
    | { t: 'any' }
    | { t: 'star' }
    | { t: 'class'; negate: boolean; ranges: Array<[string, string]> };

const META = /[*?[\\]/;

/**
 * Compile a glob into tokens. Supports `*`, `?`, `[abc]`, `[a-z]`, `[^a]` / `[!a]`
 * and `\` escapes. Returns null for a malformed pattern (unterminated class,
 * empty class, reversed range, trailing escape).
 */
export function compileGlob(pattern: string): Token[] | null {
    const chars = Array.from(pattern);
    const out: Token[] = [];
    let i = 0;
    while (i < chars.length) {
        const c = chars[i];
        if (c === '*') {
            // Runs of stars behave like one.
            if (out.length === 0 || out[out.length - 1].t !== 'star') out.push({ t: 'star' });
            i++;
        } else if (c === '?') {
            out.push({ t: 'any' });
            i++;
        } else if (c === '\\') {
            if (i + 1 >= chars.length) return null;
            out.push({ t: 'lit', c: chars[i + 1] });
            i += 2;
        } else if (c === '[') {
            const parsed = compileClass(chars, i + 1);
            if (!parsed) return null;
            out.push(parsed.token);
            i = parsed.next;
        } else {
            out.push({ t: 'lit', c });
            i++;
        }
    }
    return out;
}

function compileClass(chars: string[], start: number): { token: Token; next: number } | null {
    let j = start;
    let negate = false;
    if (chars[j] === '^' || chars[j] === '!') {
        negate = true;
        j++;
    }
    const ranges: Array<[string, string]> = [];
    for (;;) {
        if (j >= chars.length) return null;
        if (chars[j] === ']') {
            if (ranges.length === 0) return null;
            return { token: { t: 'class', negate, ranges }, next: j + 1 };
        }
        const lo = classChar(chars, j);
        if (!lo) return null;
        j = lo.next;
        let hi = lo.c;
        if (chars[j] === '-' && j + 1 < chars.length && chars[j + 1] !== ']') {
            const h = classChar(chars, j + 1);
            if (!h) return null;
            hi = h.c;
            j = h.next;
            if (hi < lo.c) return null;
        }
        ranges.push([lo.c, hi]);
    }
}

function classChar(chars: string[], j: number): { c: string; next: number } | null {
    const c = chars[j];
    if (c === undefined || c === '-') return null;
    if (c === '\\') {
        const e = chars[j + 1];
        return e === undefined ? null : { c: e, next: j + 2 };
    }
    return { c, next: j + 1 };
}

function matchOne(tok: Token, c: string): boolean {
    switch (tok.t) {
        case 'lit': return tok.c === c;
        case 'any': return true;
        case 'star': return false;
        case 'class': {
            let hit = false;
            for (const [lo, hi] of tok.ranges) {
                if (lo <= c && c <= hi) { hit = true; break; }
            }
            return hit !== tok.negate;
        }
    }
}

/** Star-backtracking matcher; O(tokens x name) in the worst case. */
function matchTokens(tokens: Token[], name: string[]): boolean {
    let t = 0;
    let n = 0;
    let starT = -1;
    let starN = 0;
    while (n < name.length) {
        const tok = t < tokens.length ? tokens[t] : undefined;
        if (tok?.t === 'star') {
            starT = t++;
            starN = n;
        } else if (tok && matchOne(tok, name[n])) {
            t++;
            n++;
        } else if (starT >= 0) {
            t = starT + 1;
            n = ++starN;
        } else {
            return false;
        }
    }
    while (t < tokens.length && tokens[t].t === 'star') t++;
    return t === tokens.length;
}

/** True when `name` matches `pattern` as a whole. Malformed patterns never match. */
export function matchGlob(pattern: string, name: string): boolean {
    const tokens = compileGlob(pattern);
    return tokens !== null && matchTokens(tokens, Array.from(name));
}

/* --------------------------------- Parsing --------------------------------- */

/**
 * Parse `"pattern=level,pattern=level"`.
 * Bad entries (no `=`, empty pattern, non-integer level) are returned in `rejected`
 * rather than thrown so that one typo does not disable the rest.
 */
export function parseVModule(spec: string): { rules: VModuleRule[]; rejected: string[] } {
    const rules: VModuleRule[] = [];
    const rejected: string[] = [];
    for (const raw of spec.split(',')) {
        const entry = raw.trim();
        if (!entry) continue;
        const eq = entry.lastIndexOf('=');
        const pattern = eq > 0 ? entry.slice(0, eq).trim() : '';
        const levelText = eq > 0 ? entry.slice(eq + 1).trim() : '';
        if (!pattern || !/^-?\d+$/.test(levelText)) {
            rejected.push(entry);
            continue;
        }
        rules.push(makeRule(pattern, Number(levelText)));
    }
    return { rules, rejected };
}

export function makeRule(pattern: string, level: Level): VModuleRule {
    return { pattern, level: Math.trunc(level), literal: !META.test(pattern) };
}

/** Rules from either spelling of a vmodule setting. Only text can have rejected entries. */
export function compileVModule(spec: VModuleSpec): { rules: VModuleRule[]; rejected: string[] } {
    if (typeof spec === 'string') return parseVModule(spec);
    return { rules: spec.map(r => makeRule(r.pattern, r.level)), rejected: [] };
}

export function formatVModule(rules: readonly VModuleRule[]): string {
    return rules.map(r => `${r.pattern}=${r.level}`).join(',');
}

/* --------------------------------- Filter ---------------------------------- */

/** Directory-stripped (and optionally extension-stripped) name used for matching. */
export function moduleName(path: string, stripExtension = true): string {
    const slash = Math.max(path.lastIndexOf('/'), path.lastIndexOf('\\'));
    const base = slash >= 0 ? path.slice(slash + 1) : path;
    if (!stripExtension) return base;
    const dot = base.lastIndexOf('.');
    return dot > 0 ? base.slice(0, dot) : base;
}

/**
 * Ordered, precompiled vmodule rules. Matching is pure; a rule whose pattern is
 * malformed is kept (it still shows in `toString()`) but never matches.
 */
export class VModuleFilter {
    private readonly compiled: ReadonlyArray<{ rule: VModuleRule; tokens: Token[] | null }>;

    constructor(rules: readonly VModuleRule[], private readonly stripExtension = true) {
        this.compiled = rules.map(rule => ({ rule, tokens: rule.literal ? null : compileGlob(rule.pattern) }));
    }

    get length(): number {
        return this.compiled.length;
    }

    get rules(): readonly VModuleRule[] {
        return this.compiled.map(c => c.rule);
    }

    match(path: string): { level: Level; matched: boolean } {
        const name = moduleName(path, this.stripExtension);
        let chars: string[] | undefined;
        for (const { rule, tokens } of this.compiled) {
            if (rule.literal) {
                if (rule.pattern === name) return { level: rule.level, matched: true };
                continue;
            }
            if (!tokens) continue;
            chars ??= Array.from(name);
            if (matchTokens(tokens, chars)) return { level: rule.level, matched: true };
        }
        return { level: 0, matched: false };
    }

    toString(): string {
        return formatVModule(this.rules);
    }
}
