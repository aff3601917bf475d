// layerstack/src/lib/model.ts
// Execution modes, artifact kinds and the shapes built for each.

import type { ConfigNode, RouteTable, ServiceRegistry } from 'liblayer';

/** Independent universes. Layers of one mode never merge with another's. */
export const MODES = ['http', 'cli'] as const;
export type Mode = (typeof MODES)[number];

export const ARTIFACT_KINDS = ['config', 'routes', 'services'] as const;
export type ArtifactKind = (typeof ARTIFACT_KINDS)[number];

/** Composition result per artifact kind. */
export interface ArtifactMap {
    config: ConfigNode;
    routes: RouteTable;
    services: ServiceRegistry;
}

export type CompositionResult = ArtifactMap[ArtifactKind];

/** What a successful persist reports back. */
export interface CacheArtifact {
    kind: ArtifactKind;
    mode: Mode;
    /** Canonical file path; the key external caches are invalidated by. */
    identity: string;
    /** SHA-256 of `payload`. */
    digest: string;
    /** Stable serialization of the composition result. */
    payload: string;
    writtenAt: string;
}

export function isMode(value: unknown): value is Mode {
    return typeof value === 'string' && (MODES as readonly string[]).includes(value);
}

export function isArtifactKind(value: unknown): value is ArtifactKind {
    return typeof value === 'string' && (ARTIFACT_KINDS as readonly string[]).includes(value);
}
