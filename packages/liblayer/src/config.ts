// liblayer/src/config.ts
// Configuration compositor: last-wins deep merge over an ordered stack.
//
//   - mapping ⊕ mapping  → recurse
//   - anything else       → incoming value replaces existing value wholesale
//   - lists are never concatenated
//   - an explicit empty mapping is an override that clears the subtree

import { isMapping } from './guards.js';
import type { ConfigNode, ConfigValue } from './types.js';

// ─── Helpers ────────────────────────────────────────────────────────

/**
 * Set `key` as an own enumerable data property. Keys such as `__proto__`
 * become ordinary entries instead of touching the prototype chain.
 */
export function assignEntry<T>(target: { [key: string]: T }, key: string, value: T): void {
    Object.defineProperty(target, key, {
        value,
        enumerable: true,
        writable: true,
        configurable: true,
    });
}

/** Read an own entry; inherited properties never count as present. */
export function ownEntry(node: ConfigNode, key: string): ConfigValue | undefined {
    return Object.prototype.hasOwnProperty.call(node, key) ? node[key] : undefined;
}

/** Deep copy of a data value, so results never alias layer payloads. */
export function cloneValue(value: ConfigValue): ConfigValue {
    if (Array.isArray(value)) return value.map(cloneValue);
    if (isMapping(value)) {
        const copy: ConfigNode = {};
        for (const [key, item] of Object.entries(value)) {
            assignEntry(copy, key, cloneValue(item));
        }
        return copy;
    }
    return value;
}

// ─── Merge ──────────────────────────────────────────────────────────

/**
 * Merge `source` over `target`, returning a new mapping. Neither input is
 * modified. Every decision is per key, so sibling order never matters.
 */
export function deepMerge(target: ConfigNode, source: ConfigNode): ConfigNode {
    const result: ConfigNode = {};
    for (const [key, value] of Object.entries(target)) {
        assignEntry(result, key, cloneValue(value));
    }

    for (const [key, incoming] of Object.entries(source)) {
        const existing = ownEntry(result, key);
        if (isMapping(existing) && isMapping(incoming) && Object.keys(incoming).length > 0) {
            assignEntry(result, key, deepMerge(existing, incoming));
        } else {
            assignEntry(result, key, cloneValue(incoming));
        }
    }
    return result;
}

/**
 * Fold an ordered list of configuration layers into one tree.
 * Layer order is the only tie-break.
 */
export function mergeConfig(layers: readonly ConfigNode[]): ConfigNode {
    let result: ConfigNode = {};
    for (const layer of layers) {
        result = deepMerge(result, layer);
    }
    return result;
}
