// layerstack/src/lib/loader.ts
// Runtime Loader: reads persisted artifacts with no recomputation.
//
// A missing or untrustworthy artifact is fatal. There is no fallback to an
// empty or baseline-only structure, and a load never triggers a build.

import { deepFreeze } from 'liblayer';

import { ArtifactNotFoundError, CorruptArtifactError } from './errors.js';
import { errorCode, formatErrorMessage } from './helpers.js';
import { silentLogger, type Logger } from './logger.js';
import { ARTIFACT_KINDS, type ArtifactKind, type ArtifactMap, type Mode } from './model.js';
import {
    artifactPath,
    decodeArtifact,
    nodeArtifactFs,
    type ArtifactFileSystem,
    type CompiledArtifactCache,
} from './cache.js';

// ─── Memo ───────────────────────────────────────────────────────────

/**
 * Loaded snapshots by artifact identity. Registered with a CacheWriter so
 * a swap evicts the stale snapshot.
 */
export class ArtifactMemo implements CompiledArtifactCache {
    private readonly entries: { [K in ArtifactKind]: Map<string, ArtifactMap[K]> } = {
        config: new Map(),
        routes: new Map(),
        services: new Map(),
    };

    get<K extends ArtifactKind>(kind: K, identity: string): ArtifactMap[K] | undefined {
        return this.entries[kind].get(identity);
    }

    set<K extends ArtifactKind>(kind: K, identity: string, value: ArtifactMap[K]): void {
        this.entries[kind].set(identity, value);
    }

    invalidate(identity: string): void {
        for (const kind of ARTIFACT_KINDS) {
            this.entries[kind].delete(identity);
        }
    }

    get size(): number {
        return ARTIFACT_KINDS.reduce((total, kind) => total + this.entries[kind].size, 0);
    }
}

// ─── Loader ─────────────────────────────────────────────────────────

export interface RuntimeLoaderOptions {
    cacheDir: string;
    fs?: ArtifactFileSystem;
    memo?: ArtifactMemo;
    logger?: Logger;
}

export class RuntimeLoader {
    public readonly cacheDir: string;
    public readonly memo: ArtifactMemo;
    private readonly fs: ArtifactFileSystem;
    private readonly logger: Logger;

    constructor(options: RuntimeLoaderOptions) {
        this.cacheDir = options.cacheDir;
        this.fs = options.fs ?? nodeArtifactFs;
        this.memo = options.memo ?? new ArtifactMemo();
        this.logger = options.logger ?? silentLogger;
    }

    /** The persisted result for `kind` and `mode`, deep-frozen. */
    load<K extends ArtifactKind>(kind: K, mode: Mode): ArtifactMap[K] {
        const identity = artifactPath(this.cacheDir, kind, mode);
        const cached = this.memo.get(kind, identity);
        if (cached !== undefined) {
            this.logger.log({ type: 'load.hit', level: 'debug', payload: { kind, mode, identity } });
            return cached;
        }

        const text = this.read(kind, mode, identity);
        const value = deepFreeze(decodeArtifact(kind, mode, text, identity));
        this.memo.set(kind, identity, value);
        this.logger.log({ type: 'load.read', level: 'debug', payload: { kind, mode, identity } });
        return value;
    }

    /** All three artifacts of a mode. Fails if any one is missing. */
    loadAll(mode: Mode): ArtifactMap {
        return {
            config: this.load('config', mode),
            routes: this.load('routes', mode),
            services: this.load('services', mode),
        };
    }

    private read(kind: ArtifactKind, mode: Mode, identity: string): string {
        if (!this.fs.exists(identity)) {
            this.logger.log({ type: 'load.missing', level: 'error', payload: { kind, mode, identity } });
            throw new ArtifactNotFoundError(kind, mode, identity);
        }
        try {
            return this.fs.readFile(identity);
        } catch (err) {
            if (errorCode(err) === 'ENOENT') throw new ArtifactNotFoundError(kind, mode, identity);
            throw new CorruptArtifactError(
                `Cannot read ${identity}: ${formatErrorMessage(err)}`,
                { kind, mode, identity },
                err,
            );
        }
    }
}
