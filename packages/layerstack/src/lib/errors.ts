// layerstack/src/lib/errors.ts
// Error taxonomy. Every error is fatal to the operation that raised it and
// carries a structured failure object for build/warm tooling.

import type { ArtifactKind, Mode } from './model.js';

// ─── Failure Objects ────────────────────────────────────────────────

export const ERROR_CODES = {
    layerResolution: 'LAYER_RESOLUTION',
    layerOrder: 'LAYER_ORDER',
    malformedPayload: 'MALFORMED_PAYLOAD',
    missingRouteField: 'MISSING_ROUTE_FIELD',
    unresolvableService: 'UNRESOLVABLE_SERVICE_DEFINITION',
    validation: 'VALIDATION_FAILED',
    cacheWrite: 'CACHE_WRITE',
    artifactNotFound: 'ARTIFACT_NOT_FOUND',
    corruptArtifact: 'CORRUPT_ARTIFACT',
    configKey: 'CONFIG_KEY',
    settings: 'SETTINGS',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Where a failure happened. Every field is optional; set what is known. */
export interface FailureDetails {
    kind?: ArtifactKind;
    mode?: Mode;
    /** Position of the offending layer in the ordered stack. */
    layerIndex?: number;
    layerIdentity?: string;
    /** Position in the application's provider list. */
    providerPosition?: number;
    /** Offending key, path or identifier. */
    key?: string;
    /** Canonical artifact identity. */
    identity?: string;
}

export interface Failure extends FailureDetails {
    code: ErrorCode;
    message: string;
    violations?: Failure[];
}

// ─── Base ───────────────────────────────────────────────────────────

export class LayerstackError extends Error {
    public readonly code: ErrorCode;
    public readonly details: FailureDetails;

    constructor(code: ErrorCode, message: string, details: FailureDetails = {}, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'LayerstackError';
        this.code = code;
        this.details = details;
    }

    toFailure(): Failure {
        return { code: this.code, message: this.message, ...this.details };
    }
}

// ─── Layer Errors ───────────────────────────────────────────────────

/** A listed layer cannot be located or read. */
export class LayerResolutionError extends LayerstackError {
    constructor(message: string, details: FailureDetails = {}, cause?: unknown) {
        super(ERROR_CODES.layerResolution, message, details, cause);
        this.name = 'LayerResolutionError';
    }
}

/** A stack breaks the fixed baseline → providers → app → env sequence. */
export class LayerOrderError extends LayerstackError {
    public readonly problems: string[];

    constructor(problems: string[], details: FailureDetails = {}) {
        super(ERROR_CODES.layerOrder, `Layer order is invalid: ${problems.join('; ')}`, details);
        this.name = 'LayerOrderError';
        this.problems = problems;
    }
}

/** A payload is not a mapping where one is required, or holds non-data values. */
export class MalformedPayloadError extends LayerstackError {
    constructor(message: string, details: FailureDetails = {}) {
        super(ERROR_CODES.malformedPayload, message, details);
        this.name = 'MalformedPayloadError';
    }
}

/** A route entry lacks a usable controller, action or methods list. */
export class MissingRouteFieldError extends LayerstackError {
    public readonly fields: string[];

    constructor(message: string, fields: string[], details: FailureDetails = {}) {
        super(ERROR_CODES.missingRouteField, message, details);
        this.name = 'MissingRouteFieldError';
        this.fields = fields;
    }
}

/** A service definition has no usable class reference or a disallowed option. */
export class UnresolvableServiceDefinitionError extends LayerstackError {
    constructor(message: string, details: FailureDetails = {}) {
        super(ERROR_CODES.unresolvableService, message, details);
        this.name = 'UnresolvableServiceDefinitionError';
    }
}

/** Every structural violation found in one build, reported together. */
export class ValidationError extends LayerstackError {
    public readonly violations: LayerstackError[];

    constructor(kind: ArtifactKind, mode: Mode | undefined, violations: LayerstackError[]) {
        const count = violations.length;
        const where = mode ? `${kind}/${mode}` : kind;
        super(
            ERROR_CODES.validation,
            `${where} build failed with ${count} violation${count === 1 ? '' : 's'}`,
            { kind, mode },
        );
        this.name = 'ValidationError';
        this.violations = violations;
    }

    override toFailure(): Failure {
        return { ...super.toFailure(), violations: this.violations.map(v => v.toFailure()) };
    }
}

// ─── Cache Errors ───────────────────────────────────────────────────

export type CacheWritePhase = 'write' | 'swap' | 'invalidate';

/** The write-then-swap sequence (or the invalidation after it) did not complete. */
export class CacheWriteError extends LayerstackError {
    public readonly phase: CacheWritePhase;

    constructor(message: string, phase: CacheWritePhase, details: FailureDetails = {}, cause?: unknown) {
        super(ERROR_CODES.cacheWrite, message, details, cause);
        this.name = 'CacheWriteError';
        this.phase = phase;
    }
}

/** Runtime load found no canonical artifact. Fatal at boot. */
export class ArtifactNotFoundError extends LayerstackError {
    constructor(kind: ArtifactKind, mode: Mode, identity: string) {
        super(
            ERROR_CODES.artifactNotFound,
            `No ${kind} artifact for mode "${mode}" at ${identity}; run warm before booting`,
            { kind, mode, identity },
        );
        this.name = 'ArtifactNotFoundError';
    }
}

/** The canonical artifact exists but cannot be trusted. Fatal at boot. */
export class CorruptArtifactError extends LayerstackError {
    constructor(message: string, details: FailureDetails = {}, cause?: unknown) {
        super(ERROR_CODES.corruptArtifact, message, details, cause);
        this.name = 'CorruptArtifactError';
    }
}

// ─── Runtime / Settings ─────────────────────────────────────────────

export class ConfigKeyError extends LayerstackError {
    constructor(key: string, reason = 'is not set') {
        super(ERROR_CODES.configKey, `Config key "${key}" ${reason}`, { kind: 'config', key });
        this.name = 'ConfigKeyError';
    }
}

export class SettingsError extends LayerstackError {
    constructor(message: string, details: FailureDetails = {}, cause?: unknown) {
        super(ERROR_CODES.settings, message, details, cause);
        this.name = 'SettingsError';
    }
}
