// liblayer/src/freeze.ts
// Composition results are read-only for their whole lifetime.

/** Recursively freeze arrays and objects. Returns the same reference. */
export function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const item of Object.values(value)) {
            deepFreeze(item);
        }
    }
    return value;
}
