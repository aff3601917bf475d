// layerstack/src/lib/compose.ts
// Build entry points: collect layers, apply the kind's merge algebra,
// validate, and (for warm) persist.

import {
    deepFreeze,
    describeValue,
    findOpaqueValues,
    isConfigNode,
    isPlainObject,
    leftUnion,
    mergeConfig,
    mergeRoutes,
    mergeServices,
    partitionLayers,
    traceOrigins,
    type ConfigNode,
    type Layer,
} from 'liblayer';

import { CacheWriteError, LayerstackError, MalformedPayloadError, ValidationError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { ARTIFACT_KINDS, MODES, type ArtifactKind, type ArtifactMap, type CacheArtifact, type Mode } from './model.js';
import { collectLayers, type ApplicationSources } from './sources.js';
import { opaqueValueError, validate } from './validate.js';
import type { CacheWriter } from './cache.js';

// ─── Merge Algebras ─────────────────────────────────────────────────

type Compositor = (layers: ReadonlyArray<Layer<ConfigNode>>) => ConfigNode;

const COMPOSITORS: Record<ArtifactKind, Compositor> = {
    config: layers => mergeConfig(layers.map(layer => layer.payload)),
    routes: layers => mergeRoutes(layers.map(layer => layer.payload)),
    services: layers => {
        const { baseline, providers, appBase, appEnv } = partitionLayers(layers);
        // The env overlay beats the app base; together they form the app operand.
        const app = leftUnion(appEnv ?? {}, appBase ?? {});
        return mergeServices(baseline ?? {}, providers, app);
    },
};

/**
 * Every layer must be a mapping of plain data before it takes part in a
 * merge. All offending layers are reported together.
 */
export function requireMappings(
    layers: ReadonlyArray<Layer<unknown>>,
    kind: ArtifactKind,
    mode?: Mode,
): Array<Layer<ConfigNode>> {
    const accepted: Array<Layer<ConfigNode>> = [];
    const violations: LayerstackError[] = [];

    layers.forEach((layer, index) => {
        const payload = layer.payload;
        if (isConfigNode(payload)) {
            accepted.push({ ...layer, payload });
            return;
        }
        const details = { kind, mode, layerIndex: index, layerIdentity: layer.identity };
        if (!isPlainObject(payload)) {
            violations.push(new MalformedPayloadError(
                `layer ${index} (${layer.identity}) must be a mapping, found ${describeValue(payload)}`,
                details,
            ));
            return;
        }
        for (const opaque of findOpaqueValues(payload)) {
            violations.push(opaqueValueError(kind, opaque, details));
        }
    });

    if (violations.length > 0) throw new ValidationError(kind, mode, violations);
    return accepted;
}

// ─── Composer ───────────────────────────────────────────────────────

export interface ComposerOptions {
    sources: ApplicationSources;
    /** Required for warm(); build() never writes. */
    writer?: CacheWriter;
    logger?: Logger;
}

export interface WarmOptions {
    /** Replace artifacts that already exist. Default true. */
    overwrite?: boolean;
    /** Signal compiled caches after each swap. Default true. */
    invalidateExternalCache?: boolean;
}

export class Composer {
    private readonly sources: ApplicationSources;
    private readonly writer?: CacheWriter;
    private readonly logger: Logger;

    constructor(options: ComposerOptions) {
        this.sources = options.sources;
        this.writer = options.writer;
        this.logger = options.logger ?? silentLogger;
    }

    /** Compose and validate one artifact, returned deep-frozen. Nothing is written. */
    build<K extends ArtifactKind>(mode: Mode, kind: K): ArtifactMap[K] {
        this.logger.log({ type: 'build.start', level: 'debug', payload: { kind, mode } });
        try {
            const layers = requireMappings(collectLayers(this.sources, mode, kind), kind, mode);
            const candidate = COMPOSITORS[kind](layers);
            const result = validate(kind, candidate, { mode, origins: traceOrigins(layers) });
            if (!result.ok) throw result.error;

            this.logger.log({
                type: 'build.complete',
                payload: { kind, mode, layers: layers.length, keys: Object.keys(result.value).length },
            });
            return deepFreeze(result.value);
        } catch (err) {
            if (err instanceof LayerstackError) {
                this.logger.log({ type: 'build.failed', level: 'error', payload: { kind, mode, code: err.code } });
            }
            throw err;
        }
    }

    /** All three artifacts of a mode; the first failing kind aborts. */
    buildAll(mode: Mode): ArtifactMap {
        return {
            config: this.build(mode, 'config'),
            routes: this.build(mode, 'routes'),
            services: this.build(mode, 'services'),
        };
    }

    /**
     * Build then persist every artifact of `mode`. Nothing is written unless
     * every build that needs writing succeeds.
     */
    warm(mode: Mode, options: WarmOptions = {}): CacheArtifact[] {
        return this.runWarm([mode], options);
    }

    /** warm() for both modes, with every build finished before the first write. */
    warmAll(options: WarmOptions = {}): CacheArtifact[] {
        return this.runWarm(MODES, options);
    }

    private runWarm(modes: readonly Mode[], options: WarmOptions): CacheArtifact[] {
        const writer = this.writer;
        if (!writer) {
            throw new CacheWriteError('No cache writer configured; warm needs one', 'write');
        }
        const overwrite = options.overwrite ?? true;
        const invalidate = options.invalidateExternalCache ?? true;

        const pending: Array<() => CacheArtifact> = [];
        for (const mode of modes) {
            for (const kind of ARTIFACT_KINDS) {
                if (!overwrite && writer.exists(kind, mode)) {
                    this.logger.log({ type: 'warm.skip', payload: { kind, mode, identity: writer.identityOf(kind, mode) } });
                    continue;
                }
                pending.push(this.prepare(writer, mode, kind, invalidate));
            }
        }

        const written = pending.map(write => write());
        this.logger.log({ type: 'warm.complete', payload: { modes: [...modes], written: written.length } });
        return written;
    }

    private prepare<K extends ArtifactKind>(
        writer: CacheWriter,
        mode: Mode,
        kind: K,
        invalidate: boolean,
    ): () => CacheArtifact {
        const result = this.build(mode, kind);
        return () => writer.persist(kind, mode, result, { invalidate });
    }
}
