// layerstack/src/index.ts
// Public API: build, cache and load layered application snapshots.

export type { ArtifactKind, ArtifactMap, CacheArtifact, CompositionResult, Mode } from './lib/model.js';
export { ARTIFACT_KINDS, MODES, isArtifactKind, isMode } from './lib/model.js';

// Errors
export type { CacheWritePhase, ErrorCode, Failure, FailureDetails } from './lib/errors.js';
export {
    ERROR_CODES,
    LayerstackError,
    LayerResolutionError,
    LayerOrderError,
    MalformedPayloadError,
    MissingRouteFieldError,
    UnresolvableServiceDefinitionError,
    ValidationError,
    CacheWriteError,
    ArtifactNotFoundError,
    CorruptArtifactError,
    ConfigKeyError,
    SettingsError,
} from './lib/errors.js';
export { describeLocation, formatFailureLines } from './lib/format.js';

// Layer sources
export type { ApplicationSources, LayerSource, SlotTable } from './lib/sources.js';
export {
    PROVIDER_LIST_FILE,
    assertLayerOrder,
    collectLayers,
    directorySource,
    loadApplicationSources,
    memorySource,
    readProviderList,
    slotFileName,
} from './lib/sources.js';

// Validation
export type { Validated, ValidateOptions } from './lib/validate.js';
export { validate } from './lib/validate.js';

// Build
export type { ComposerOptions, WarmOptions } from './lib/compose.js';
export { Composer, requireMappings } from './lib/compose.js';

// Cache
export type {
    ArtifactFileSystem,
    CacheWriterOptions,
    CompiledArtifactCache,
    EncodedArtifact,
    PersistOptions,
} from './lib/cache.js';
export { CacheWriter, artifactPath, decodeArtifact, encodeArtifact, nodeArtifactFs } from './lib/cache.js';

// Runtime
export type { RuntimeLoaderOptions } from './lib/loader.js';
export { ArtifactMemo, RuntimeLoader } from './lib/loader.js';
export { ConfigView } from './lib/config-view.js';

// Settings and logging
export type { LoadSettingsOptions, Settings } from './lib/settings.js';
export { SETTINGS_FILE, loadSettings } from './lib/settings.js';
export type { LogEvent, LogLevel, LogSink, Logger, JsonlLoggerOptions } from './lib/logger.js';
export { JsonlLogger, LOG_LEVELS, createLogger, fileSink, silentLogger } from './lib/logger.js';

// CLI
export type { CliIO } from './cli.js';
export { createProgram, main, runCli } from './cli.js';
