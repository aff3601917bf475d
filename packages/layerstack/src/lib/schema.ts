// layerstack/src/lib/schema.ts
// zod schemas for route entries, service shapes, artifact envelopes,
// the provider list and the settings file.

import { z, type ZodIssue } from 'zod';

import { LOG_LEVELS } from './logger.js';
import { ARTIFACT_KINDS, MODES } from './model.js';

// ─── Primitives ─────────────────────────────────────────────────────

export const NonBlankString = z.string().regex(/\S/, 'must not be blank');

/** A symbol reference: non-empty, no whitespace. */
export const ClassReferenceSchema = z.string().regex(/^\S+$/, 'must be a non-empty name without whitespace');

/** Environment names end up in file names. */
export const EnvironmentNameSchema = z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, 'must contain only letters, digits, "-" and "_"');

// ─── Layer Payload Shapes ───────────────────────────────────────────

/** Fields every route needs. Extra fields are not inspected here. */
export const RouteFieldsSchema = z.object({
    controller: NonBlankString,
    action: NonBlankString,
    methods: z.array(NonBlankString).nonempty('must list at least one method'),
});

export const PatternRouteFieldsSchema = RouteFieldsSchema.extend({
    pattern: NonBlankString,
});

/** Shaped service definition; nothing but `class` and `options`. */
export const ServiceShapeSchema = z
    .object({
        class: ClassReferenceSchema,
        options: z.record(z.unknown()).optional(),
    })
    .strict();

// ─── Cache Artifact Envelope ────────────────────────────────────────

export const ARTIFACT_FORMAT = 1;

export const ArtifactEnvelopeSchema = z
    .object({
        format: z.literal(ARTIFACT_FORMAT),
        kind: z.enum(ARTIFACT_KINDS),
        mode: z.enum(MODES),
        digest: z.string().regex(/^[0-9a-f]{64}$/, 'must be a SHA-256 hex digest'),
        writtenAt: z.string().datetime(),
        payload: z.unknown(),
    })
    .strict();

export type ArtifactEnvelope = z.infer<typeof ArtifactEnvelopeSchema>;

// ─── Application Files ──────────────────────────────────────────────

/** `<configDir>/providers.json`: provider ids in composition order. */
export const ProviderListSchema = z.array(NonBlankString).superRefine((ids, ctx) => {
    const seen = new Set<string>();
    ids.forEach((id, index) => {
        if (seen.has(id)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [index],
                message: `provider "${id}" is listed more than once`,
            });
        }
        seen.add(id);
    });
});

export const SettingsFileSchema = z
    .object({
        baselineDir: NonBlankString.default('vendor/baseline'),
        configDir: NonBlankString.default('config'),
        cacheDir: NonBlankString.default('var/cache'),
        providers: z.record(NonBlankString).default({}),
        environment: EnvironmentNameSchema.optional(),
        logLevel: z.enum(LOG_LEVELS).default('info'),
        logFile: NonBlankString.optional(),
    })
    .strict();

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

// ─── Issue Formatting ───────────────────────────────────────────────

export function formatSchemaIssues(issues: ZodIssue[]): string[] {
    return issues.map(issue => {
        const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';

        if (issue.code === 'invalid_type') {
            return `${location}: expected ${issue.expected}, received ${issue.received}`;
        }
        if (issue.code === 'unrecognized_keys') {
            return `${location}: unrecognized keys: ${issue.keys.join(', ')}`;
        }
        return `${location}: ${issue.message}`;
    });
}
