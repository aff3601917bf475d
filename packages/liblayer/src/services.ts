// liblayer/src/services.ts
// Service compositor: left-wins union chained over the provider list.
//
//   acc = baseline
//   for p in providers (listed order):  acc = p ∪ acc
//   acc = app ∪ acc
//
// `∪` keeps the left operand's definition on collision. Net effect: the
// last-listed provider beats earlier providers and the baseline; the app
// beats everything. Definitions are replaced whole, `options` included;
// two definitions of the same identifier are never merged together.

import { assignEntry, cloneValue, ownEntry } from './config.js';
import { isMapping } from './guards.js';
import type { ConfigNode, ServiceDefinition } from './types.js';

/**
 * Identifier-keyed union that keeps `left`'s value whenever an id exists
 * in both maps. Left entries come first, then right-only entries.
 */
export function leftUnion(left: ConfigNode, right: ConfigNode): ConfigNode {
    const result: ConfigNode = {};
    for (const [id, definition] of Object.entries(left)) {
        assignEntry(result, id, cloneValue(definition));
    }
    for (const [id, definition] of Object.entries(right)) {
        if (ownEntry(result, id) !== undefined) continue;
        assignEntry(result, id, cloneValue(definition));
    }
    return result;
}

/**
 * Compose a service registry from the baseline, the providers in listed
 * order, and the application map.
 */
export function mergeServices(
    baseline: ConfigNode,
    providers: readonly ConfigNode[],
    app: ConfigNode,
): ConfigNode {
    let acc = leftUnion(baseline, {});
    for (const provider of providers) {
        acc = leftUnion(provider, acc);
    }
    return leftUnion(app, acc);
}

// ─── Read Access ────────────────────────────────────────────────────

/** Class reference of a validated definition. */
export function serviceClass(definition: ServiceDefinition): string {
    return typeof definition === 'string' ? definition : definition.class;
}

/** Options of a validated definition; bare references have none. */
export function serviceOptions(definition: ServiceDefinition): ConfigNode {
    if (typeof definition === 'string') return {};
    const options = ownEntry(definition, 'options');
    return isMapping(options) ? options : {};
}
