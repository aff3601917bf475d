// liblayer/src/routes.ts
// Route compositor: same last-wins algebra as config, keyed by request path.
//
// The reserved PATTERN_ROUTE_KEY holds an ordered list of pattern routes.
// A layer that declares it replaces the whole list; there is no per-pattern
// merging. Adding one pattern means redeclaring the full list.

import { assignEntry, cloneValue, deepMerge, ownEntry } from './config.js';
import type { ConfigNode, PatternRoute, RouteEntry, RouteTable } from './types.js';

/** Reserved top-level key for pattern routes. Never a valid request path. */
export const PATTERN_ROUTE_KEY = 'regex';

/**
 * Fold an ordered list of route layers into one table.
 *
 * Path keys deep-merge field by field, so a later layer may override only
 * `controller` and keep `methods` from an earlier one.
 */
export function mergeRoutes(layers: readonly ConfigNode[]): ConfigNode {
    let result: ConfigNode = {};
    for (const layer of layers) {
        const paths: ConfigNode = {};
        for (const [key, value] of Object.entries(layer)) {
            if (key !== PATTERN_ROUTE_KEY) assignEntry(paths, key, value);
        }
        result = deepMerge(result, paths);

        const patterns = ownEntry(layer, PATTERN_ROUTE_KEY);
        if (patterns !== undefined) {
            assignEntry(result, PATTERN_ROUTE_KEY, cloneValue(patterns));
        }
    }
    return result;
}

// ─── Read Access ────────────────────────────────────────────────────

/** Literal-path entries of a validated table, in table order. */
export function routeEntries(table: RouteTable): Array<[string, RouteEntry]> {
    const entries: Array<[string, RouteEntry]> = [];
    for (const [path, entry] of Object.entries(table)) {
        if (path === PATTERN_ROUTE_KEY || Array.isArray(entry)) continue;
        entries.push([path, entry]);
    }
    return entries;
}

/** Pattern routes of a validated table, in evaluation order. */
export function patternRoutes(table: RouteTable): PatternRoute[] {
    if (!Object.prototype.hasOwnProperty.call(table, PATTERN_ROUTE_KEY)) return [];
    const patterns = table[PATTERN_ROUTE_KEY];
    return Array.isArray(patterns) ? patterns : [];
}
