// liblayer/src/guards.ts
// Type guards for declarative layer data.
//
// Layers are inert data literals. Anything that is not a scalar, a plain
// array or a plain object (functions, symbols, class instances, ...) is an
// opaque value and must never reach a composed result.

import type { ConfigNode, ConfigValue, Scalar } from './types.js';

/** Check if a value is a plain object (object literal or null-prototype). */
export function isPlainObject(val: unknown): val is Record<string, unknown> {
    if (val === null || typeof val !== 'object' || Array.isArray(val)) return false;
    const proto: unknown = Object.getPrototypeOf(val);
    return proto === Object.prototype || proto === null;
}

/** Check if a value is a JSON-compatible scalar. */
export function isScalar(val: unknown): val is Scalar {
    switch (typeof val) {
        case 'string':
        case 'boolean':
            return true;
        case 'number':
            return Number.isFinite(val);
        default:
            return val === null;
    }
}

/** Narrow a ConfigValue to its mapping form. */
export function isMapping(val: ConfigValue | undefined): val is ConfigNode {
    return typeof val === 'object' && val !== null && !Array.isArray(val);
}

export interface OpaqueValue {
    /** Key path from the inspected root; array positions appear as decimal strings. */
    path: string[];
    /** Human-readable description of what was found. */
    found: string;
}

/**
 * Walk a value and report every position holding something that is not
 * declarative data. Returns an empty list for clean data.
 */
export function findOpaqueValues(value: unknown, path: string[] = []): OpaqueValue[] {
    const found: OpaqueValue[] = [];
    walk(value, path, new WeakSet(), found);
    return found;
}

/** Check if a value is a mapping made only of declarative data. */
export function isConfigNode(val: unknown): val is ConfigNode {
    return isPlainObject(val) && findOpaqueValues(val).length === 0;
}

/** Short description of a value's type for error messages. */
export function describeValue(val: unknown): string {
    if (val === null) return 'null';
    if (Array.isArray(val)) return 'list';
    if (typeof val === 'number' && !Number.isFinite(val)) return String(val);
    if (typeof val === 'object') {
        if (isPlainObject(val)) return 'mapping';
        const ctor: unknown = Object.getPrototypeOf(val)?.constructor;
        const name = typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
        return `instance of ${name}`;
    }
    return typeof val;
}

/** Own properties of a mapping, split into readable data slots and opaque ones. */
export interface PropertyScan {
    entries: Array<[string, unknown]>;
    opaque: OpaqueValue[];
}

/**
 * Read a mapping's own enumerable properties through their descriptors.
 * Getters and setters are reported and never invoked; symbol keys are
 * reported because no serialization can carry them.
 */
export function scanProperties(value: object, path: string[] = []): PropertyScan {
    const scan: PropertyScan = { entries: [], opaque: [] };
    for (const symbol of Object.getOwnPropertySymbols(value)) {
        scan.opaque.push({ path: [...path, String(symbol)], found: 'symbol-keyed property' });
    }
    for (const key of Object.keys(value)) {
        const descriptor = Object.getOwnPropertyDescriptor(value, key);
        if (!descriptor) continue;
        const accessor = describeAccessor(descriptor);
        if (accessor) {
            scan.opaque.push({ path: [...path, key], found: accessor });
            continue;
        }
        scan.entries.push([key, descriptor.value]);
    }
    return scan;
}

function describeAccessor(descriptor: PropertyDescriptor): string | undefined {
    if (descriptor.get && descriptor.set) return 'getter and setter';
    if (descriptor.get) return 'getter';
    if (descriptor.set) return 'setter';
    return undefined;
}

function walk(value: unknown, path: string[], seen: WeakSet<object>, out: OpaqueValue[]): void {
    if (isScalar(value)) return;

    if (Array.isArray(value) || isPlainObject(value)) {
        if (seen.has(value)) {
            out.push({ path, found: 'circular reference' });
            return;
        }
        seen.add(value);
        if (Array.isArray(value)) {
            walkList(value, path, seen, out);
        } else {
            const { entries, opaque } = scanProperties(value, path);
            out.push(...opaque);
            for (const [key, item] of entries) {
                walk(item, [...path, key], seen, out);
            }
        }
        seen.delete(value);
        return;
    }

    out.push({ path, found: describeValue(value) });
}

// Holes in a sparse list read as undefined.
function walkList(list: unknown[], path: string[], seen: WeakSet<object>, out: OpaqueValue[]): void {
    for (let i = 0; i < list.length; i++) {
        const itemPath = [...path, String(i)];
        const descriptor = Object.getOwnPropertyDescriptor(list, i);
        if (!descriptor) {
            out.push({ path: itemPath, found: 'undefined' });
            continue;
        }
        const accessor = describeAccessor(descriptor);
        if (accessor) {
            out.push({ path: itemPath, found: accessor });
            continue;
        }
        walk(descriptor.value, itemPath, seen, out);
    }
}
