// liblayer/src/serialize.ts
// Stable serialization for composed results.
//
// Object keys are sorted, so the output depends only on content and never
// on the order in which layers happened to declare their keys.

import { createHash } from 'node:crypto';

import type { ConfigValue } from './types.js';

/** Serialize a data value to JSON with sorted object keys and no whitespace. */
export function stableSerialize(value: ConfigValue): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) {
        return `[${value.map(stableSerialize).join(',')}]`;
    }
    if (typeof value === 'object') {
        const parts = Object.keys(value)
            .sort()
            .map(key => `${JSON.stringify(key)}:${stableSerialize(value[key])}`);
        return `{${parts.join(',')}}`;
    }
    if (typeof value === 'number' && !Number.isFinite(value)) {
        throw new TypeError(`Cannot serialize non-finite number ${value}`);
    }
    return JSON.stringify(value);
}

/** SHA-256 (hex) of the stable serialization. */
export function stableHash(value: ConfigValue): string {
    return createHash('sha256').update(stableSerialize(value)).digest('hex');
}
