// layerstack/src/lib/validate.ts
// Structural validation of composed results.
//
// Validation is exhaustive: every violation in a candidate is collected
// and returned in one ValidationError. Only shape is checked; the meaning
// of configuration values is the application's business.

import {
    PATTERN_ROUTE_KEY,
    assignEntry,
    cloneValue,
    describeValue,
    findOpaqueValues,
    isMapping,
    isPlainObject,
    isScalar,
    ownEntry,
    scanProperties,
    type ConfigNode,
    type ConfigValue,
    type LayerRef,
    type OpaqueValue,
    type PatternRoute,
    type RouteEntry,
    type RouteTable,
    type ServiceRegistry,
    type ServiceShape,
} from 'liblayer';

import type { ZodIssue } from 'zod';

import {
    MalformedPayloadError,
    MissingRouteFieldError,
    UnresolvableServiceDefinitionError,
    ValidationError,
    type FailureDetails,
    type LayerstackError,
} from './errors.js';
import { formatKeyPath } from './helpers.js';
import type { ArtifactKind, ArtifactMap, Mode } from './model.js';
import {
    ClassReferenceSchema,
    PatternRouteFieldsSchema,
    RouteFieldsSchema,
    ServiceShapeSchema,
    formatSchemaIssues,
} from './schema.js';

// ─── Types ──────────────────────────────────────────────────────────

export interface ValidateOptions {
    mode?: Mode;
    /** Top-level key → layer that last declared it. */
    origins?: ReadonlyMap<string, LayerRef>;
}

export type Validated<K extends ArtifactKind> =
    | { ok: true; value: ArtifactMap[K] }
    | { ok: false; error: ValidationError };

interface Context {
    kind: ArtifactKind;
    mode?: Mode;
    origins?: ReadonlyMap<string, LayerRef>;
    violations: LayerstackError[];
}

type Checker<K extends ArtifactKind> = (candidate: Record<string, unknown>, ctx: Context) => ArtifactMap[K];

// ─── Entry Point ────────────────────────────────────────────────────

const CHECKERS: { [K in ArtifactKind]: Checker<K> } = {
    config: checkConfig,
    routes: checkRoutes,
    services: checkServices,
};

/**
 * Check a candidate composition result. On success `value` is the typed,
 * normalized result (route methods upper-cased and de-duplicated).
 */
export function validate<K extends ArtifactKind>(
    kind: K,
    candidate: unknown,
    options: ValidateOptions = {},
): Validated<K> {
    const ctx: Context = { kind, mode: options.mode, origins: options.origins, violations: [] };

    if (!isPlainObject(candidate)) {
        ctx.violations.push(new MalformedPayloadError(
            `${kind} must be a mapping at the top level, found ${describeValue(candidate)}`,
            { kind, mode: options.mode },
        ));
        return { ok: false, error: new ValidationError(kind, options.mode, ctx.violations) };
    }

    const value = CHECKERS[kind](candidate, ctx);
    if (ctx.violations.length > 0) {
        return { ok: false, error: new ValidationError(kind, options.mode, ctx.violations) };
    }
    return { ok: true, value };
}

/**
 * The error an opaque (non-data) value raises for the given kind: services
 * get UnresolvableServiceDefinitionError, everything else MalformedPayloadError.
 */
export function opaqueValueError(kind: ArtifactKind, opaque: OpaqueValue, details: FailureDetails): LayerstackError {
    const key = formatKeyPath(opaque.path);
    const message = `${key} holds ${opaque.found}; only scalars, lists and mappings are allowed`;
    return kind === 'services'
        ? new UnresolvableServiceDefinitionError(message, { ...details, key })
        : new MalformedPayloadError(message, { ...details, key });
}

// ─── Shared ─────────────────────────────────────────────────────────

function locate(ctx: Context, topKey: string, key: string): FailureDetails {
    const origin = ctx.origins?.get(topKey);
    return {
        kind: ctx.kind,
        mode: ctx.mode,
        layerIndex: origin?.index,
        layerIdentity: origin?.identity,
        key,
    };
}

/**
 * Narrow one top-level entry to data. Opaque positions are reported and
 * the entry is skipped for further checks.
 */
function dataEntry(ctx: Context, key: string, raw: unknown): ConfigValue | undefined {
    if (isScalar(raw)) return raw;
    const opaque = findOpaqueValues(raw, [key]);
    if (opaque.length === 0 && (Array.isArray(raw) || isPlainObject(raw))) {
        return reread(raw);
    }
    for (const found of opaque) {
        ctx.violations.push(opaqueValueError(ctx.kind, found, locate(ctx, key, '')));
    }
    return undefined;
}

/** Top-level data entries; accessor and symbol-keyed properties are reported unread. */
function topLevelEntries(ctx: Context, candidate: Record<string, unknown>): Array<[string, unknown]> {
    const { entries, opaque } = scanProperties(candidate);
    for (const found of opaque) {
        ctx.violations.push(opaqueValueError(ctx.kind, found, locate(ctx, found.path[0] ?? '', '')));
    }
    return entries;
}

/** Rebuild a value already proven clean, so it carries the data type. */
function reread(raw: unknown): ConfigValue {
    if (isScalar(raw)) return raw;
    if (Array.isArray(raw)) return raw.map(reread);
    const node: ConfigNode = {};
    if (isPlainObject(raw)) {
        for (const [key, item] of Object.entries(raw)) {
            assignEntry(node, key, reread(item));
        }
    }
    return node;
}

// ─── Config ─────────────────────────────────────────────────────────

function checkConfig(candidate: Record<string, unknown>, ctx: Context): ConfigNode {
    const tree: ConfigNode = {};
    for (const [key, raw] of topLevelEntries(ctx, candidate)) {
        const value = dataEntry(ctx, key, raw);
        if (value !== undefined) assignEntry(tree, key, value);
    }
    return tree;
}

// ─── Routes ─────────────────────────────────────────────────────────

function checkRoutes(candidate: Record<string, unknown>, ctx: Context): RouteTable {
    const table: RouteTable = {};
    for (const [key, raw] of topLevelEntries(ctx, candidate)) {
        const value = dataEntry(ctx, key, raw);
        if (value === undefined) continue;

        if (key === PATTERN_ROUTE_KEY) {
            const patterns = checkPatternList(ctx, value);
            if (patterns) assignEntry(table, key, patterns);
            continue;
        }

        if (!isMapping(value)) {
            ctx.violations.push(new MalformedPayloadError(
                `route "${key}" must be a mapping, found ${describeValue(value)}`,
                locate(ctx, key, key),
            ));
            continue;
        }
        const entry = checkRouteEntry(ctx, key, key, value);
        if (entry) assignEntry(table, key, entry);
    }
    return table;
}

function checkPatternList(ctx: Context, value: ConfigValue): PatternRoute[] | undefined {
    if (!Array.isArray(value)) {
        ctx.violations.push(new MalformedPayloadError(
            `"${PATTERN_ROUTE_KEY}" must hold a list of pattern routes, found ${describeValue(value)}`,
            locate(ctx, PATTERN_ROUTE_KEY, PATTERN_ROUTE_KEY),
        ));
        return undefined;
    }

    const patterns: PatternRoute[] = [];
    value.forEach((item, index) => {
        const key = `${PATTERN_ROUTE_KEY}[${index}]`;
        if (!isMapping(item)) {
            ctx.violations.push(new MalformedPayloadError(
                `pattern route ${key} must be a mapping, found ${describeValue(item)}`,
                locate(ctx, PATTERN_ROUTE_KEY, key),
            ));
            return;
        }
        const parsed = PatternRouteFieldsSchema.safeParse(item);
        if (!parsed.success) {
            ctx.violations.push(missingFields(ctx, PATTERN_ROUTE_KEY, key, parsed.error.issues));
            return;
        }
        const entry: PatternRoute = {
            ...routeFields(item),
            controller: parsed.data.controller,
            action: parsed.data.action,
            methods: normalizeMethods(parsed.data.methods),
            pattern: parsed.data.pattern,
        };
        patterns.push(entry);
    });
    return patterns;
}

function checkRouteEntry(ctx: Context, topKey: string, key: string, item: ConfigNode): RouteEntry | undefined {
    const parsed = RouteFieldsSchema.safeParse(item);
    if (!parsed.success) {
        ctx.violations.push(missingFields(ctx, topKey, key, parsed.error.issues));
        return undefined;
    }
    return {
        ...routeFields(item),
        controller: parsed.data.controller,
        action: parsed.data.action,
        methods: normalizeMethods(parsed.data.methods),
    };
}

/** Every field except the required ones, copied. */
function routeFields(item: ConfigNode): ConfigNode {
    const extra: ConfigNode = {};
    for (const [field, value] of Object.entries(item)) {
        if (field === 'controller' || field === 'action' || field === 'methods' || field === 'pattern') continue;
        assignEntry(extra, field, cloneValue(value));
    }
    return extra;
}

function missingFields(
    ctx: Context,
    topKey: string,
    key: string,
    issues: ZodIssue[],
): MissingRouteFieldError {
    const fields = [...new Set(issues.map(issue => String(issue.path[0] ?? '<root>')))];
    const detail = formatSchemaIssues(issues).join('; ');
    return new MissingRouteFieldError(
        `route "${key}" lacks a usable ${fields.join(', ')} (${detail})`,
        fields,
        locate(ctx, topKey, key),
    );
}

/** Upper-case, keep first occurrence. */
function normalizeMethods(methods: readonly string[]): string[] {
    const out: string[] = [];
    for (const method of methods) {
        const upper = method.trim().toUpperCase();
        if (!out.includes(upper)) out.push(upper);
    }
    return out;
}

// ─── Services ───────────────────────────────────────────────────────

function checkServices(candidate: Record<string, unknown>, ctx: Context): ServiceRegistry {
    const registry: ServiceRegistry = {};
    for (const [id, raw] of topLevelEntries(ctx, candidate)) {
        const value = dataEntry(ctx, id, raw);
        if (value === undefined) continue;

        if (typeof value === 'string') {
            const parsed = ClassReferenceSchema.safeParse(value);
            if (parsed.success) {
                assignEntry(registry, id, parsed.data);
            } else {
                ctx.violations.push(new UnresolvableServiceDefinitionError(
                    `service "${id}" class reference ${parsed.error.issues.map(issue => issue.message).join('; ')}`,
                    locate(ctx, id, id),
                ));
            }
            continue;
        }

        if (!isMapping(value)) {
            ctx.violations.push(new UnresolvableServiceDefinitionError(
                `service "${id}" must be a class reference or { class, options }, found ${describeValue(value)}`,
                locate(ctx, id, id),
            ));
            continue;
        }

        const parsed = ServiceShapeSchema.safeParse(value);
        if (!parsed.success) {
            ctx.violations.push(new UnresolvableServiceDefinitionError(
                `service "${id}" is not a usable definition (${formatSchemaIssues(parsed.error.issues).join('; ')})`,
                locate(ctx, id, id),
            ));
            continue;
        }

        const shape: ServiceShape = { class: parsed.data.class };
        const options = ownEntry(value, 'options');
        if (options !== undefined) assignEntry(shape, 'options', cloneValue(options));
        assignEntry(registry, id, shape);
    }
    return registry;
}
