// tests/compose.test.ts: Tests for build, buildAll and warm
import fs from 'node:fs';
import path from 'node:path';

import { describe, it, expect } from 'vitest';

import {
    CacheWriteError,
    CacheWriter,
    Composer,
    JsonlLogger,
    MalformedPayloadError,
    MissingRouteFieldError,
    UnresolvableServiceDefinitionError,
    ValidationError,
    memorySource,
    type ApplicationSources,
    type SlotTable,
} from '../src/index.js';
import { useTempDirs } from './temp-dirs.js';

interface StackInput {
    baseline?: SlotTable;
    providers?: Array<[string, SlotTable]>;
    app?: SlotTable;
    env?: SlotTable;
}

function sourcesOf(stack: StackInput): ApplicationSources {
    const providers = new Map((stack.providers ?? []).map(([id, slots]) => [id, memorySource(`provider:${id}`, slots)] as const));
    return {
        baseline: memorySource('baseline', stack.baseline ?? {}),
        providers: [...providers.keys()],
        resolveProvider: id => providers.get(id),
        app: memorySource('app', stack.app ?? {}),
        env: stack.env ? memorySource('app:prod', stack.env) : undefined,
    };
}

function validationError(fn: () => unknown): ValidationError {
    try {
        fn();
    } catch (err) {
        if (err instanceof ValidationError) return err;
        throw err;
    }
    throw new Error('expected a ValidationError');
}

const CLOCK = () => new Date('2026-01-01T00:00:00.000Z');

// ─── build ──────────────────────────────────────────────────────────

describe('Composer.build', () => {
    it('deep-merges config with the env overlay last', () => {
        const composer = new Composer({
            sources: sourcesOf({
                baseline: { http: { config: { db: { host: 'localhost', port: 5432 }, debug: true } } },
                app: { http: { config: { db: { port: 6432 } } } },
                env: { http: { config: { db: { host: 'db.internal' }, debug: false } } },
            }),
        });
        expect(composer.build('http', 'config')).toEqual({
            db: { host: 'db.internal', port: 6432 },
            debug: false,
        });
    });

    it('lets a later layer override one route field', () => {
        const composer = new Composer({
            sources: sourcesOf({
                providers: [['p', { http: { routes: { '/x': { controller: 'A', action: 'f', methods: ['GET'] } } } }]],
                app: { http: { routes: { '/x': { action: 'g' } } } },
            }),
        });
        expect(composer.build('http', 'routes')).toEqual({
            '/x': { controller: 'A', action: 'g', methods: ['GET'] },
        });
    });

    it('replaces the pattern-route list wholesale', () => {
        const pattern = (name: string) => ({ pattern: `^/${name}$`, controller: 'C', action: name, methods: ['GET'] });
        const composer = new Composer({
            sources: sourcesOf({
                providers: [['p', { http: { routes: { regex: [pattern('p1'), pattern('p2')] } } }]],
                app: { http: { routes: { regex: [pattern('p3')] } } },
            }),
        });
        expect(composer.build('http', 'routes').regex).toEqual([pattern('p3')]);
    });

    it('resolves services left-wins per step', () => {
        const stack: StackInput = {
            baseline: { http: { services: { svc: 'Base' } } },
            providers: [
                ['provider1', { http: { services: { svc: 'P1' } } }],
                ['provider2', { http: { services: { svc: 'P2' } } }],
            ],
        };
        expect(new Composer({ sources: sourcesOf(stack) }).build('http', 'services')).toEqual({ svc: 'P2' });

        const withApp = sourcesOf({ ...stack, app: { http: { services: { svc: 'AppImpl' } } } });
        expect(new Composer({ sources: withApp }).build('http', 'services')).toEqual({ svc: 'AppImpl' });
    });

    it('lets the env overlay beat the app base for services', () => {
        const composer = new Composer({
            sources: sourcesOf({
                baseline: { http: { services: { svc: 'Base', log: 'FileLog' } } },
                app: { http: { services: { svc: 'AppImpl' } } },
                env: { http: { services: { svc: 'EnvImpl' } } },
            }),
        });
        expect(composer.build('http', 'services')).toEqual({ svc: 'EnvImpl', log: 'FileLog' });
    });

    it('rejects a layer that is not a mapping, naming its position', () => {
        const composer = new Composer({
            sources: sourcesOf({
                baseline: { http: { config: ['not', 'a', 'mapping'] } },
                app: { http: { config: { ok: true } } },
            }),
        });
        const error = validationError(() => composer.build('http', 'config'));
        expect(error.violations).toHaveLength(1);
        expect(error.violations[0]).toBeInstanceOf(MalformedPayloadError);
        expect(error.violations[0].details).toMatchObject({ layerIndex: 0, layerIdentity: 'baseline' });
    });

    it('rejects executable service options in any layer, even when overridden later', () => {
        const composer = new Composer({
            sources: sourcesOf({
                providers: [['p', { http: { services: { cache: { class: 'C', options: { make: () => 1 } } } } }]],
                app: { http: { services: { cache: 'AppCache' } } },
            }),
        });
        const error = validationError(() => composer.build('http', 'services'));
        expect(error.violations[0]).toBeInstanceOf(UnresolvableServiceDefinitionError);
        expect(error.violations[0].details).toMatchObject({
            layerIndex: 0,
            layerIdentity: 'provider:p',
            key: 'cache.options.make',
        });
    });

    it('names the layer that declared a broken route', () => {
        const composer = new Composer({
            sources: sourcesOf({
                baseline: { http: { routes: { '/': { controller: 'Home', action: 'index', methods: ['GET'] } } } },
                providers: [
                    ['p1', { http: { routes: { '/a': { controller: 'A', action: 'a', methods: ['GET'] } } } }],
                    ['p2', { http: { routes: { '/b': { controller: 'B', action: 'b' } } } }],
                ],
            }),
        });
        const error = validationError(() => composer.build('http', 'routes'));
        expect(error.violations).toHaveLength(1);
        expect(error.violations[0]).toBeInstanceOf(MissingRouteFieldError);
        expect(error.violations[0].details).toEqual({
            kind: 'routes',
            mode: 'http',
            layerIndex: 2,
            layerIdentity: 'provider:p2',
            key: '/b',
        });
    });

    it('builds each mode from its own layers', () => {
        const composer = new Composer({
            sources: sourcesOf({ baseline: { http: { config: { m: 'http' } }, cli: { config: { m: 'cli' } } } }),
        });
        expect(composer.build('cli', 'config')).toEqual({ m: 'cli' });
    });

    it('buildAll returns all three results', () => {
        const composer = new Composer({
            sources: sourcesOf({
                baseline: {
                    http: {
                        config: { a: 1 },
                        routes: { '/': { controller: 'H', action: 'i', methods: ['GET'] } },
                        services: { log: 'Logger' },
                    },
                },
            }),
        });
        expect(composer.buildAll('http')).toEqual({
            config: { a: 1 },
            routes: { '/': { controller: 'H', action: 'i', methods: ['GET'] } },
            services: { log: 'Logger' },
        });
    });

    it('returns a deeply frozen result', () => {
        const composer = new Composer({ sources: sourcesOf({ baseline: { http: { config: { db: { hosts: ['a'] } } } } }) });
        const config = composer.build('http', 'config');
        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.db)).toBe(true);
        expect(() => {
            config.extra = 1;
        }).toThrow(TypeError);
    });

    it('rejects a getter in a layer without running it', () => {
        let reads = 0;
        const layer = {
            get port() {
                reads++;
                return 80;
            },
        };
        const composer = new Composer({ sources: sourcesOf({ app: { http: { config: layer } } }) });
        const error = validationError(() => composer.build('http', 'config'));
        expect(error.violations[0].details).toMatchObject({ layerIndex: 0, layerIdentity: 'app', key: 'port' });
        expect(reads).toBe(0);
    });

    it('logs build events', () => {
        const lines: string[] = [];
        const logger = new JsonlLogger({ level: 'debug', sink: line => lines.push(line), clock: CLOCK });
        new Composer({ sources: sourcesOf({ baseline: { http: { config: { a: 1 } } } }), logger }).build('http', 'config');
        expect(lines.map(line => JSON.parse(line).type)).toEqual(['build.start', 'build.complete']);
        expect(JSON.parse(lines[1])).toEqual({
            ts: '2026-01-01T00:00:00.000Z',
            level: 'info',
            type: 'build.complete',
            payload: { kind: 'config', mode: 'http', layers: 1, keys: 1 },
        });
    });
});

// ─── warm ───────────────────────────────────────────────────────────

describe('Composer.warm', () => {
    const temp = useTempDirs();

    const goodApp = (): Required<Pick<StackInput, 'baseline' | 'app'>> => ({
        baseline: {
            http: {
                config: { name: 'base' },
                routes: { '/': { controller: 'Home', action: 'index', methods: ['GET'] } },
                services: { log: 'FileLogger' },
            },
            cli: { config: { name: 'cli' } },
        },
        app: { http: { config: { name: 'app' } } },
    });

    it('writes the three artifacts of a mode', () => {
        const cacheDir = temp.make();
        const writer = new CacheWriter({ cacheDir, clock: CLOCK });
        const composer = new Composer({ sources: sourcesOf(goodApp()), writer });

        const written = composer.warm('http');
        expect(written.map(a => `${a.kind}.${a.mode}`)).toEqual(['config.http', 'routes.http', 'services.http']);
        expect(fs.readdirSync(cacheDir).sort()).toEqual(['config.http.json', 'routes.http.json', 'services.http.json']);
    });

    it('warmAll writes both modes', () => {
        const cacheDir = temp.make();
        const composer = new Composer({ sources: sourcesOf(goodApp()), writer: new CacheWriter({ cacheDir }) });
        expect(composer.warmAll()).toHaveLength(6);
        expect(fs.readdirSync(cacheDir)).toHaveLength(6);
    });

    it('writes nothing when any build of the mode fails', () => {
        const cacheDir = temp.make();
        const app = goodApp();
        const composer = new Composer({ sources: sourcesOf(app), writer: new CacheWriter({ cacheDir }) });
        composer.warm('http');
        const before = fs.readdirSync(cacheDir).map(name => fs.readFileSync(path.join(cacheDir, name), 'utf8'));

        // Config changes and routes break in the same edit.
        app.app.http = {
            config: { name: 'changed' },
            routes: { '/broken': { controller: 'X', action: 'y' } },
        };
        expect(() => composer.warm('http')).toThrow(ValidationError);

        const after = fs.readdirSync(cacheDir).map(name => fs.readFileSync(path.join(cacheDir, name), 'utf8'));
        expect(after).toEqual(before);
    });

    it('refuses to persist a sparse list', () => {
        const cacheDir = temp.make();
        const composer = new Composer({
            sources: sourcesOf({ baseline: { http: { config: { list: [1, , 3] } } } }),
            writer: new CacheWriter({ cacheDir }),
        });
        expect(() => composer.warm('http')).toThrow(ValidationError);
        expect(fs.readdirSync(cacheDir)).toEqual([]);
    });

    it('leaves existing artifacts alone without overwrite', () => {
        const cacheDir = temp.make();
        const composer = new Composer({ sources: sourcesOf(goodApp()), writer: new CacheWriter({ cacheDir }) });
        composer.warm('http');
        fs.rmSync(path.join(cacheDir, 'routes.http.json'));

        const written = composer.warm('http', { overwrite: false });
        expect(written.map(a => a.kind)).toEqual(['routes']);
        expect(composer.warm('http', { overwrite: false })).toEqual([]);
    });

    it('invalidates registered caches unless told not to', () => {
        const cacheDir = temp.make();
        const invalidated: string[] = [];
        const writer = new CacheWriter({ cacheDir, caches: [{ invalidate: id => invalidated.push(id) }] });
        const composer = new Composer({ sources: sourcesOf(goodApp()), writer });

        composer.warm('cli', { invalidateExternalCache: false });
        expect(invalidated).toEqual([]);

        composer.warm('cli');
        expect(invalidated).toEqual([
            path.join(cacheDir, 'config.cli.json'),
            path.join(cacheDir, 'routes.cli.json'),
            path.join(cacheDir, 'services.cli.json'),
        ]);
    });

    it('needs a writer', () => {
        const composer = new Composer({ sources: sourcesOf(goodApp()) });
        expect(() => composer.warm('http')).toThrow(CacheWriteError);
    });
});
