// liblayer/src/types.ts
// Core type definitions for ordered layer composition.

// ─── Data Values ────────────────────────────────────────────────────

/** Leaf value allowed anywhere in a layer payload. */
export type Scalar = string | number | boolean | null;

/** Any inert, declarative value: scalar, ordered list or mapping. */
export type ConfigValue = Scalar | ConfigValue[] | ConfigNode;

/**
 * Recursive string-keyed mapping. Used both for a single layer's payload
 * and for the merged result of a stack of layers.
 */
export interface ConfigNode {
    [key: string]: ConfigValue;
}

// ─── Layers ─────────────────────────────────────────────────────────

/**
 * Where a layer sits in the stack. The sequence is fixed:
 * baseline → providers (listed order) → app_base → app_env.
 */
export type LayerKind = 'baseline' | 'provider' | 'app_base' | 'app_env';

/** One ordered, independently authored payload. */
export interface Layer<P = unknown> {
    readonly kind: LayerKind;
    /** 0-based position in the stack. Unique per stack. */
    readonly order: number;
    /** Stable handle for error reports (slot name, provider id, file path). */
    readonly identity: string;
    readonly payload: P;
}

/** A slot before it is placed in the stack. `payload: undefined` means absent. */
export interface LayerSlot<P> {
    identity: string;
    payload: P | undefined;
}

/** Pointer back to the layer that contributed a value. */
export interface LayerRef {
    index: number;
    identity: string;
    kind: LayerKind;
}

// ─── Routes ─────────────────────────────────────────────────────────

/** A fully resolved route. Extra fields (e.g. `metadata`) are carried as data. */
export interface RouteEntry {
    controller: string;
    action: string;
    methods: string[];
    [field: string]: ConfigValue;
}

/** Pattern-based route, evaluated in list order at dispatch time. */
export interface PatternRoute extends RouteEntry {
    pattern: string;
}

/** Validated routing table: literal paths plus the reserved pattern-route list. */
export interface RouteTable {
    [key: string]: RouteEntry | PatternRoute[];
}

// ─── Services ───────────────────────────────────────────────────────

/**
 * Service with constructor options. `options`, when present, is a mapping
 * of data values; read it through `serviceOptions()`.
 */
export interface ServiceShape extends ConfigNode {
    class: string;
}

/** Either a bare class reference or a class reference with data-only options. */
export type ServiceDefinition = string | ServiceShape;

export interface ServiceRegistry {
    [id: string]: ServiceDefinition;
}
