// liblayer/src/layers.ts
// Layer ordering contract.
//
// The stack is always baseline → providers (in the order the application
// lists them) → app_base → app_env. Positions are assigned here and never
// inferred from names. Absent slots are dropped, not replaced by empty
// placeholders.

import type { Layer, LayerKind, LayerRef, LayerSlot } from './types.js';

const KIND_RANK: Record<LayerKind, number> = {
    baseline: 0,
    provider: 1,
    app_base: 2,
    app_env: 3,
};

export interface LayerStackInput<P> {
    baseline?: LayerSlot<P>;
    providers?: ReadonlyArray<LayerSlot<P>>;
    appBase?: LayerSlot<P>;
    appEnv?: LayerSlot<P>;
}

/**
 * Place slots in the fixed sequence, assigning consecutive positions.
 */
export function stackLayers<P>(input: LayerStackInput<P>): Array<Layer<P>> {
    const slots: Array<[LayerKind, LayerSlot<P> | undefined]> = [
        ['baseline', input.baseline],
        ...(input.providers ?? []).map((slot): [LayerKind, LayerSlot<P>] => ['provider', slot]),
        ['app_base', input.appBase],
        ['app_env', input.appEnv],
    ];

    const layers: Array<Layer<P>> = [];
    for (const [kind, slot] of slots) {
        if (slot === undefined || slot.payload === undefined) continue;
        layers.push({ kind, order: layers.length, identity: slot.identity, payload: slot.payload });
    }
    return layers;
}

/**
 * List every way a stack breaks the ordering contract. Empty when valid.
 */
export function checkLayerOrder(layers: ReadonlyArray<Layer>): string[] {
    const problems: string[] = [];
    const seenOrders = new Set<number>();
    const singletons = new Set<LayerKind>();

    layers.forEach((layer, i) => {
        if (!Number.isInteger(layer.order) || layer.order < 0) {
            problems.push(`layer ${i} (${layer.identity}) has invalid order ${layer.order}`);
        }
        if (seenOrders.has(layer.order)) {
            problems.push(`layer ${i} (${layer.identity}) claims order ${layer.order} already taken`);
        }
        seenOrders.add(layer.order);

        if (layer.kind !== 'provider') {
            if (singletons.has(layer.kind)) {
                problems.push(`layer ${i} (${layer.identity}) is a second ${layer.kind} layer`);
            }
            singletons.add(layer.kind);
        }

        if (i === 0) return;
        const prev = layers[i - 1];
        if (layer.order < prev.order) {
            problems.push(`layer ${i} (${layer.identity}) order ${layer.order} precedes order ${prev.order}`);
        }
        if (KIND_RANK[layer.kind] < KIND_RANK[prev.kind]) {
            problems.push(`layer ${i} (${layer.identity}) is ${layer.kind} but follows ${prev.kind}`);
        }
    });
    return problems;
}

/**
 * Split a stack into the operands of the service algebra.
 */
export function partitionLayers<P>(layers: ReadonlyArray<Layer<P>>): {
    baseline: P | undefined;
    providers: P[];
    appBase: P | undefined;
    appEnv: P | undefined;
} {
    const find = (kind: LayerKind): P | undefined => layers.find(l => l.kind === kind)?.payload;
    return {
        baseline: find('baseline'),
        providers: layers.filter(l => l.kind === 'provider').map(l => l.payload),
        appBase: find('app_base'),
        appEnv: find('app_env'),
    };
}

/**
 * For each top-level key, the last layer that declared it. Under every
 * algebra in this package that layer's value is the one that survives.
 */
export function traceOrigins(layers: ReadonlyArray<Layer<Record<string, unknown>>>): Map<string, LayerRef> {
    const origins = new Map<string, LayerRef>();
    layers.forEach((layer, index) => {
        for (const key of Object.keys(layer.payload)) {
            origins.set(key, { index, identity: layer.identity, kind: layer.kind });
        }
    });
    return origins;
}
