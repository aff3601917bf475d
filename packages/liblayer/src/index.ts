// liblayer/src/index.ts
// Public API: re-exports all composition primitives.

// Types
export type {
    Scalar,
    ConfigValue,
    ConfigNode,
    LayerKind,
    Layer,
    LayerSlot,
    LayerRef,
    RouteEntry,
    PatternRoute,
    RouteTable,
    ServiceShape,
    ServiceDefinition,
    ServiceRegistry,
} from './types.js';

export type { OpaqueValue, PropertyScan } from './guards.js';
export type { LayerStackInput } from './layers.js';

// Data guards
export {
    isPlainObject,
    isScalar,
    isMapping,
    isConfigNode,
    findOpaqueValues,
    describeValue,
    scanProperties,
} from './guards.js';

// Configuration compositor (last-wins, deep for mappings, replace for lists)
export {
    mergeConfig,
    deepMerge,
    cloneValue,
    assignEntry,
    ownEntry,
} from './config.js';

// Route compositor
export {
    PATTERN_ROUTE_KEY,
    mergeRoutes,
    routeEntries,
    patternRoutes,
} from './routes.js';

// Service compositor (left-wins union chaining)
export {
    leftUnion,
    mergeServices,
    serviceClass,
    serviceOptions,
} from './services.js';

// Layer ordering
export {
    stackLayers,
    checkLayerOrder,
    partitionLayers,
    traceOrigins,
} from './layers.js';

// Snapshots
export { deepFreeze } from './freeze.js';
export { stableSerialize, stableHash } from './serialize.js';
