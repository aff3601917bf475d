// layerstack/src/lib/sources.ts
// Layer Source Reader: retrieves the ordered layer payloads for one
// mode and artifact kind. Performs no merging.

import path from 'node:path';

import fse from 'fs-extra';
import { checkLayerOrder, stackLayers, type Layer, type LayerSlot } from 'liblayer';

import { LayerOrderError, LayerResolutionError, type FailureDetails } from './errors.js';
import { formatErrorMessage } from './helpers.js';
import type { ArtifactKind, Mode } from './model.js';
import { ProviderListSchema, formatSchemaIssues } from './schema.js';
import type { Settings } from './settings.js';

// ─── Sources ────────────────────────────────────────────────────────

/**
 * One independently authored layer. `readSlot` returns `undefined` when the
 * layer has nothing for that mode and kind.
 */
export interface LayerSource {
    readonly identity: string;
    readSlot(mode: Mode, kind: ArtifactKind): unknown;
}

export type SlotTable = Partial<Record<Mode, Partial<Record<ArtifactKind, unknown>>>>;

/** In-process layer backed by literal payloads. */
export function memorySource(identity: string, slots: SlotTable): LayerSource {
    return {
        identity,
        readSlot: (mode, kind) => slots[mode]?.[kind],
    };
}

/** `http.routes.json`, or `http.routes.prod.json` with a variant. */
export function slotFileName(mode: Mode, kind: ArtifactKind, variant?: string): string {
    return variant ? `${mode}.${kind}.${variant}.json` : `${mode}.${kind}.json`;
}

/** Layer backed by one JSON file per slot in `dir`. A missing file is an absent slot. */
export function directorySource(identity: string, dir: string, options: { variant?: string } = {}): LayerSource {
    return {
        identity,
        readSlot(mode, kind) {
            const file = path.join(dir, slotFileName(mode, kind, options.variant));
            if (!fse.pathExistsSync(file)) return undefined;
            try {
                const payload: unknown = fse.readJsonSync(file);
                return payload;
            } catch (err) {
                throw new LayerResolutionError(
                    `Cannot read layer file ${file}: ${formatErrorMessage(err)}`,
                    { kind, mode, layerIdentity: identity },
                    err,
                );
            }
        },
    };
}

// ─── Application ────────────────────────────────────────────────────

export interface ApplicationSources {
    baseline: LayerSource;
    /** Provider ids, in the order the application lists them. */
    providers: readonly string[];
    resolveProvider(id: string): LayerSource | undefined;
    app: LayerSource;
    /** Environment overlay; absent when no environment is selected. */
    env?: LayerSource;
}

/**
 * Ordered layers for one mode and kind:
 * baseline → providers (listed order) → app base → app env.
 * Absent slots are omitted.
 */
export function collectLayers(sources: ApplicationSources, mode: Mode, kind: ArtifactKind): Array<Layer<unknown>> {
    const slot = (source: LayerSource, details: FailureDetails = {}): LayerSlot<unknown> => ({
        identity: source.identity,
        payload: readSlot(source, mode, kind, details),
    });

    const baseline = slot(sources.baseline);
    let present = baseline.payload === undefined ? 0 : 1;

    const providers = sources.providers.map((id, position) => {
        const source = sources.resolveProvider(id);
        if (!source) {
            throw new LayerResolutionError(
                `Provider "${id}" (position ${position} in the provider list) cannot be resolved`,
                { kind, mode, providerPosition: position, layerIndex: present, layerIdentity: `provider:${id}` },
            );
        }
        const providerSlot = slot(source, { providerPosition: position, layerIndex: present });
        if (providerSlot.payload !== undefined) present++;
        return providerSlot;
    });

    const layers = stackLayers({
        baseline,
        providers,
        appBase: slot(sources.app),
        appEnv: sources.env ? slot(sources.env) : undefined,
    });
    assertLayerOrder(layers, { kind, mode });
    return layers;
}

/** Throw LayerOrderError listing every ordering problem in the stack. */
export function assertLayerOrder(layers: ReadonlyArray<Layer>, details: FailureDetails = {}): void {
    const problems = checkLayerOrder(layers);
    if (problems.length > 0) throw new LayerOrderError(problems, details);
}

function readSlot(source: LayerSource, mode: Mode, kind: ArtifactKind, details: FailureDetails): unknown {
    try {
        return source.readSlot(mode, kind);
    } catch (err) {
        const located = { ...details, kind, mode, layerIdentity: source.identity };
        if (err instanceof LayerResolutionError) {
            throw new LayerResolutionError(err.message, { ...err.details, ...located }, err.cause);
        }
        throw new LayerResolutionError(
            `Layer ${source.identity} cannot be read for ${kind}/${mode}: ${formatErrorMessage(err)}`,
            located,
            err,
        );
    }
}

// ─── Directory Layout ───────────────────────────────────────────────

/** Provider list file inside the application's config directory. */
export const PROVIDER_LIST_FILE = 'providers.json';

/** Provider ids from `<configDir>/providers.json`; none when the file is absent. */
export function readProviderList(configDir: string): string[] {
    const file = path.join(configDir, PROVIDER_LIST_FILE);
    if (!fse.pathExistsSync(file)) return [];

    let raw: unknown;
    try {
        raw = fse.readJsonSync(file);
    } catch (err) {
        throw new LayerResolutionError(`Cannot read provider list ${file}: ${formatErrorMessage(err)}`, {}, err);
    }
    const parsed = ProviderListSchema.safeParse(raw);
    if (!parsed.success) {
        throw new LayerResolutionError(
            `Invalid provider list ${file}: ${formatSchemaIssues(parsed.error.issues).join('; ')}`,
        );
    }
    return parsed.data;
}

/**
 * Sources for an application on disk:
 *
 *   <baselineDir>/<mode>.<kind>.json           baseline
 *   <providers[id]>/<mode>.<kind>.json         each listed provider
 *   <configDir>/<mode>.<kind>.json             app base
 *   <configDir>/<mode>.<kind>.<env>.json       app env (when an environment is set)
 */
export function loadApplicationSources(settings: Settings): ApplicationSources {
    const providers = readProviderList(settings.configDir);
    return {
        baseline: directorySource('baseline', settings.baselineDir),
        providers,
        resolveProvider(id) {
            if (!Object.prototype.hasOwnProperty.call(settings.providers, id)) return undefined;
            const dir = settings.providers[id];
            if (!fse.pathExistsSync(dir)) return undefined;
            return directorySource(`provider:${id}`, dir);
        },
        app: directorySource('app', settings.configDir),
        env: settings.environment
            ? directorySource(`app:${settings.environment}`, settings.configDir, { variant: settings.environment })
            : undefined,
    };
}
