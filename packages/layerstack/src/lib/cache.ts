// layerstack/src/lib/cache.ts
// Cache Writer: atomic persistence of composition results.
//
//   1. write <canonical>.<pid>.<random>.tmp (exclusive create, fsync)
//   2. rename it over <canonical>
//   3. fsync the directory
//   4. invalidate compiled caches keyed to <canonical>
//
// Readers see either the previous file or the new one, never a partial
// write. Invalidation strictly follows the swap.

import { randomBytes } from 'node:crypto';
import path from 'node:path';

import fse from 'fs-extra';
import { stableHash, stableSerialize } from 'liblayer';

import { CacheWriteError, CorruptArtifactError, type CacheWritePhase, type FailureDetails } from './errors.js';
import { formatErrorMessage } from './helpers.js';
import { silentLogger, type Logger } from './logger.js';
import type { ArtifactKind, ArtifactMap, CacheArtifact, Mode } from './model.js';
import { ARTIFACT_FORMAT, ArtifactEnvelopeSchema, formatSchemaIssues } from './schema.js';
import { validate } from './validate.js';

// ─── File System Port ───────────────────────────────────────────────

/** The file operations the writer and loader need. */
export interface ArtifactFileSystem {
    ensureDir(dir: string): void;
    exists(file: string): boolean;
    /** Create a new file for writing; fails if it already exists. */
    openExclusive(file: string): number;
    write(fd: number, data: string): void;
    fsync(fd: number): void;
    close(fd: number): void;
    rename(from: string, to: string): void;
    remove(file: string): void;
    syncDirectory(dir: string): void;
    readFile(file: string): string;
}

export const nodeArtifactFs: ArtifactFileSystem = {
    ensureDir: dir => fse.ensureDirSync(dir),
    exists: file => fse.pathExistsSync(file),
    openExclusive: file => fse.openSync(file, 'wx', 0o644),
    write(fd, data) {
        const buffer = Buffer.from(data, 'utf8');
        let offset = 0;
        while (offset < buffer.length) {
            offset += fse.writeSync(fd, buffer, offset, buffer.length - offset);
        }
    },
    fsync: fd => fse.fsyncSync(fd),
    close: fd => fse.closeSync(fd),
    // Plain rename: fs-extra's move() deletes the destination first.
    rename: (from, to) => fse.renameSync(from, to),
    remove: file => fse.removeSync(file),
    syncDirectory(dir) {
        const fd = fse.openSync(dir, 'r');
        try {
            fse.fsyncSync(fd);
        } finally {
            fse.closeSync(fd);
        }
    },
    readFile: file => fse.readFileSync(file, 'utf8'),
};

/** A compiled-output cache keyed by artifact identity. */
export interface CompiledArtifactCache {
    invalidate(identity: string): void;
}

// ─── Encoding ───────────────────────────────────────────────────────

export function artifactPath(cacheDir: string, kind: ArtifactKind, mode: Mode): string {
    return path.join(cacheDir, `${kind}.${mode}.json`);
}

export interface EncodedArtifact {
    /** Full file content. */
    text: string;
    digest: string;
    /** Stable serialization of the result alone. */
    payload: string;
}

/**
 * Serialize a result into its envelope. Keys are sorted at every level, so
 * identical inputs give identical `payload` and `digest`.
 */
export function encodeArtifact<K extends ArtifactKind>(
    kind: K,
    mode: Mode,
    result: ArtifactMap[K],
    writtenAt: string,
): EncodedArtifact {
    const payload = stableSerialize(result);
    const digest = stableHash(result);
    const text = stableSerialize({ format: ARTIFACT_FORMAT, kind, mode, digest, writtenAt, payload: result });
    return { text: `${text}\n`, digest, payload };
}

/**
 * Parse and verify an artifact file's content. Anything short of a
 * well-formed envelope for this kind and mode with a matching digest
 * raises CorruptArtifactError.
 */
export function decodeArtifact<K extends ArtifactKind>(
    kind: K,
    mode: Mode,
    text: string,
    identity: string,
): ArtifactMap[K] {
    const details: FailureDetails = { kind, mode, identity };

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        throw new CorruptArtifactError(`${identity} is not valid JSON: ${formatErrorMessage(err)}`, details, err);
    }

    const envelope = ArtifactEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
        throw new CorruptArtifactError(
            `${identity} has an invalid envelope: ${formatSchemaIssues(envelope.error.issues).join('; ')}`,
            details,
        );
    }
    if (envelope.data.kind !== kind || envelope.data.mode !== mode) {
        throw new CorruptArtifactError(
            `${identity} holds ${envelope.data.kind}/${envelope.data.mode}, expected ${kind}/${mode}`,
            details,
        );
    }

    const checked = validate(kind, envelope.data.payload, { mode });
    if (!checked.ok) {
        throw new CorruptArtifactError(`${identity} payload is malformed: ${checked.error.message}`, details, checked.error);
    }
    if (stableHash(checked.value) !== envelope.data.digest) {
        throw new CorruptArtifactError(`${identity} payload does not match its digest`, details);
    }
    return checked.value;
}

// ─── Writer ─────────────────────────────────────────────────────────

export interface CacheWriterOptions {
    cacheDir: string;
    fs?: ArtifactFileSystem;
    /** Caches invalidated after every swap. More can be added with register(). */
    caches?: CompiledArtifactCache[];
    logger?: Logger;
    clock?: () => Date;
}

export interface PersistOptions {
    /** Signal registered caches after the swap. Default true. */
    invalidate?: boolean;
}

export class CacheWriter {
    public readonly cacheDir: string;
    private readonly fs: ArtifactFileSystem;
    private readonly caches: CompiledArtifactCache[];
    private readonly logger: Logger;
    private readonly clock: () => Date;

    constructor(options: CacheWriterOptions) {
        this.cacheDir = options.cacheDir;
        this.fs = options.fs ?? nodeArtifactFs;
        this.caches = [...(options.caches ?? [])];
        this.logger = options.logger ?? silentLogger;
        this.clock = options.clock ?? (() => new Date());
    }

    register(cache: CompiledArtifactCache): void {
        this.caches.push(cache);
    }

    identityOf(kind: ArtifactKind, mode: Mode): string {
        return artifactPath(this.cacheDir, kind, mode);
    }

    exists(kind: ArtifactKind, mode: Mode): boolean {
        return this.fs.exists(this.identityOf(kind, mode));
    }

    /**
     * Write `result` atomically over the canonical artifact. The caller is
     * responsible for passing a validated result.
     */
    persist<K extends ArtifactKind>(
        kind: K,
        mode: Mode,
        result: ArtifactMap[K],
        options: PersistOptions = {},
    ): CacheArtifact {
        const identity = this.identityOf(kind, mode);
        const details: FailureDetails = { kind, mode, identity };
        const writtenAt = this.clock().toISOString();
        const encoded = encodeArtifact(kind, mode, result, writtenAt);
        const dir = path.dirname(identity);
        const temp = `${identity}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`;

        let created = false;
        try {
            this.fs.ensureDir(dir);
            const fd = this.fs.openExclusive(temp);
            created = true;
            try {
                this.fs.write(fd, encoded.text);
                this.fs.fsync(fd);
            } finally {
                this.fs.close(fd);
            }
        } catch (err) {
            if (created) this.discard(temp);
            throw this.failure('write', `Cannot write ${temp}`, details, err);
        }
        this.logger.log({ type: 'cache.write', level: 'debug', payload: { kind, mode, temp } });

        try {
            this.fs.rename(temp, identity);
        } catch (err) {
            this.discard(temp);
            throw this.failure('swap', `Cannot move ${temp} over ${identity}`, details, err);
        }
        this.logger.log({ type: 'cache.swap', payload: { kind, mode, identity, digest: encoded.digest } });

        try {
            this.fs.syncDirectory(dir);
        } catch (err) {
            // The rename has happened; durability of the directory entry is best effort.
            this.logger.log({
                type: 'cache.dir_sync_failed',
                level: 'warn',
                payload: { dir, error: formatErrorMessage(err) },
            });
        }

        if (options.invalidate ?? true) this.invalidate(identity, details);

        return { kind, mode, identity, digest: encoded.digest, payload: encoded.payload, writtenAt };
    }

    /** Signal every registered cache; the first failure is raised after all have run. */
    private invalidate(identity: string, details: FailureDetails): void {
        let firstError: unknown;
        let failed = 0;
        for (const cache of this.caches) {
            try {
                cache.invalidate(identity);
            } catch (err) {
                failed++;
                firstError ??= err;
            }
        }
        if (failed > 0) {
            throw this.failure(
                'invalidate',
                `${failed} of ${this.caches.length} caches could not be invalidated for ${identity}`,
                details,
                firstError,
            );
        }
        this.logger.log({ type: 'cache.invalidate', payload: { identity, caches: this.caches.length } });
    }

    private discard(temp: string): void {
        try {
            this.fs.remove(temp);
        } catch (err) {
            this.logger.log({
                type: 'cache.cleanup_failed',
                level: 'warn',
                payload: { temp, error: formatErrorMessage(err) },
            });
        }
    }

    private failure(phase: CacheWritePhase, message: string, details: FailureDetails, cause: unknown): CacheWriteError {
        this.logger.log({
            type: 'cache.failed',
            level: 'error',
            payload: { phase, identity: details.identity ?? null, error: formatErrorMessage(cause) },
        });
        return new CacheWriteError(`${message}: ${formatErrorMessage(cause)}`, phase, details, cause);
    }
}
