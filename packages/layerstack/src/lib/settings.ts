// layerstack/src/lib/settings.ts
// Application settings: `layerstack.json` at the application root,
// overridden by LAYERSTACK_* environment variables.

import path from 'node:path';

import fse from 'fs-extra';

import { SettingsError } from './errors.js';
import { formatErrorMessage } from './helpers.js';
import { isLogLevel, type LogLevel } from './logger.js';
import { EnvironmentNameSchema, SettingsFileSchema, formatSchemaIssues } from './schema.js';

export const SETTINGS_FILE = 'layerstack.json';

/** Resolved settings. Every directory is absolute. */
export interface Settings {
    root: string;
    baselineDir: string;
    configDir: string;
    cacheDir: string;
    /** Provider id → directory holding its slot files. */
    providers: Record<string, string>;
    environment?: string;
    logLevel: LogLevel;
    logFile?: string;
}

export interface LoadSettingsOptions {
    root: string;
    env?: NodeJS.ProcessEnv;
}

export function loadSettings(options: LoadSettingsOptions): Settings {
    const root = path.resolve(options.root);
    const env = options.env ?? process.env;
    const file = path.join(root, SETTINGS_FILE);

    let raw: unknown = {};
    if (fse.pathExistsSync(file)) {
        try {
            raw = fse.readJsonSync(file);
        } catch (err) {
            throw new SettingsError(`Cannot read ${file}: ${formatErrorMessage(err)}`, {}, err);
        }
    }

    const parsed = SettingsFileSchema.safeParse(raw);
    if (!parsed.success) {
        throw new SettingsError(`Invalid ${file}: ${formatSchemaIssues(parsed.error.issues).join('; ')}`);
    }
    const data = parsed.data;

    const resolve = (p: string) => path.resolve(root, p);
    const providers: Record<string, string> = {};
    for (const [id, dir] of Object.entries(data.providers)) {
        providers[id] = resolve(dir);
    }

    return {
        root,
        baselineDir: resolve(data.baselineDir),
        configDir: resolve(data.configDir),
        cacheDir: resolve(envOverride(env, 'LAYERSTACK_CACHE_DIR') ?? data.cacheDir),
        providers,
        environment: environmentOverride(env) ?? data.environment,
        logLevel: logLevelOverride(env) ?? data.logLevel,
        logFile: data.logFile ? resolve(data.logFile) : undefined,
    };
}

// ─── Environment Overrides ──────────────────────────────────────────

/** A set, non-blank variable; blank counts as unset. */
function envOverride(env: NodeJS.ProcessEnv, name: string): string | undefined {
    const value = env[name]?.trim();
    return value ? value : undefined;
}

function environmentOverride(env: NodeJS.ProcessEnv): string | undefined {
    const value = envOverride(env, 'LAYERSTACK_ENV');
    if (value === undefined) return undefined;
    const parsed = EnvironmentNameSchema.safeParse(value);
    if (!parsed.success) {
        throw new SettingsError(`LAYERSTACK_ENV ${parsed.error.issues.map(issue => issue.message).join('; ')}`);
    }
    return parsed.data;
}

function logLevelOverride(env: NodeJS.ProcessEnv): LogLevel | undefined {
    const value = envOverride(env, 'LAYERSTACK_LOG_LEVEL');
    if (value === undefined) return undefined;
    if (!isLogLevel(value)) {
        throw new SettingsError(`LAYERSTACK_LOG_LEVEL must be one of debug, info, warn, error; got "${value}"`);
    }
    return value;
}
