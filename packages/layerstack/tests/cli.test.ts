// tests/cli.test.ts: Tests for the layerstack command against the fixture application
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import fse from 'fs-extra';
import { describe, it, expect } from 'vitest';

import { runCli, type CliIO } from '../src/index.js';
import { useTempDirs } from './temp-dirs.js';

interface Captured extends CliIO {
    stdout: string[];
    stderr: string[];
}

function capture(env: NodeJS.ProcessEnv = {}): Captured {
    const stdout: string[] = [];
    const stderr: string[] = [];
    return {
        stdout,
        stderr,
        env,
        out: line => stdout.push(line),
        err: line => stderr.push(line),
    };
}

describe('layerstack CLI', () => {
    const temp = useTempDirs();

    it('warms every artifact of both modes', () => {
        const root = temp.fixtureApp();
        const io = capture();

        expect(runCli(['--root', root, 'warm'], io)).toBe(0);
        expect(io.stderr).toEqual([]);
        expect(io.stdout.map(line => line.split(' ')[1])).toEqual([
            'config/http',
            'routes/http',
            'services/http',
            'config/cli',
            'routes/cli',
            'services/cli',
        ]);
        expect(io.stdout[0]).toMatch(
            new RegExp(`^wrote config/http ${escapeRegExp(path.join(root, 'var', 'cache', 'config.http.json'))} sha256:[0-9a-f]{12}$`),
        );
        expect(fs.readdirSync(path.join(root, 'var', 'cache'))).toHaveLength(6);
    });

    it('records the swaps in the configured log file', () => {
        const root = temp.fixtureApp();
        runCli(['--root', root, 'warm', '--mode', 'cli'], capture());

        const events = fs.readFileSync(path.join(root, 'var', 'log', 'layerstack.jsonl'), 'utf8')
            .trimEnd()
            .split('\n')
            .map(line => JSON.parse(line).type);
        expect(events.filter(type => type === 'cache.swap')).toHaveLength(3);
        expect(events.at(-1)).toBe('warm.complete');
    });

    it('reports nothing to write when every artifact exists', () => {
        const root = temp.fixtureApp();
        runCli(['--root', root, 'warm', '--mode', 'http'], capture());

        const io = capture();
        expect(runCli(['--root', root, 'warm', '--mode', 'http', '--no-overwrite'], io)).toBe(0);
        expect(io.stdout).toEqual(['nothing to write']);
    });

    it('prints a composed artifact as stable JSON without writing it', () => {
        const root = temp.fixtureApp();
        const io = capture();

        expect(runCli(['--root', root, 'build', 'config'], io)).toBe(0);
        expect(io.stdout).toEqual([
            '{"app":{"debug":true,"locales":["en"],"name":"Acme Shop"},'
            + '"auth":{"session":"cookie","ttl":3600},'
            + '"db":{"host":"localhost","port":6432}}',
        ]);
        expect(fs.existsSync(path.join(root, 'var', 'cache'))).toBe(false);
    });

    it('applies the environment overlay named in LAYERSTACK_ENV', () => {
        const root = temp.fixtureApp();
        const io = capture({ LAYERSTACK_ENV: 'prod' });

        expect(runCli(['--root', root, 'build', 'services'], io)).toBe(0);
        expect(JSON.parse(io.stdout[0])).toEqual({
            auth: 'SessionAuth',
            cache: { class: 'RedisCache', options: { host: 'localhost' } },
            logger: 'FileLogger',
            mailer: 'SesMailer',
        });
    });

    it('shows a warmed artifact', () => {
        const root = temp.fixtureApp();
        runCli(['--root', root, 'warm'], capture());

        const io = capture();
        expect(runCli(['--root', root, 'show', 'services', '--mode', 'cli'], io)).toBe(0);
        expect(io.stdout).toEqual(['{"logger":"JsonLogger"}']);
    });

    it('fails show before warm instead of building on the fly', () => {
        const root = temp.fixtureApp();
        const io = capture();

        expect(runCli(['--root', root, 'show', 'config'], io)).toBe(1);
        expect(io.stdout).toEqual([]);
        expect(io.stderr).toEqual([
            `error ARTIFACT_NOT_FOUND [config/http]: No config artifact for mode "http" at ${path.join(root, 'var', 'cache', 'config.http.json')}; run warm before booting`,
        ]);
    });

    it('prints every violation with its layer when a build fails', () => {
        const root = temp.fixtureApp();
        fs.writeFileSync(path.join(root, 'config', 'http.routes.json'), '{"/broken": {"controller": "X"}}');
        const io = capture();

        expect(runCli(['--root', root, 'warm'], io)).toBe(1);
        expect(io.stdout).toEqual([]);
        expect(io.stderr[0]).toBe('error VALIDATION_FAILED [routes/http]: routes/http build failed with 1 violation');
        expect(io.stderr[1]).toMatch(/^ {2}- MISSING_ROUTE_FIELD \[routes\/http, layer 3 app, key \/broken\]: route "\/broken" lacks a usable action, methods/);
        expect(fs.existsSync(path.join(root, 'var', 'cache'))).toBe(false);
    });

    it('says in warm --help that the command registers no compiled caches', () => {
        const io = capture();
        expect(runCli(['warm', '--help'], io)).toBe(0);
        expect(io.stdout.join('\n').replace(/\s+/g, ' ')).toContain(
            'only caches registered in the writing process are signalled, and this command registers none',
        );
    });

    it('rejects an unknown artifact kind with a usage error', () => {
        const root = temp.fixtureApp();
        const io = capture();

        expect(runCli(['--root', root, 'build', 'widgets'], io)).toBe(1);
        expect(io.stdout).toEqual([]);
        expect(io.stderr.join('\n')).toContain('widgets');
    });
});

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

describe('layerstack executable', () => {
    const packageDir = (name: string) => fileURLToPath(new URL(`../../${name}/`, import.meta.url));

    it('runs from build output rather than TypeScript sources', () => {
        for (const name of ['liblayer', 'layerstack']) {
            const manifest: unknown = fse.readJsonSync(path.join(packageDir(name), 'package.json'));
            expect(manifest).toMatchObject({
                exports: { '.': { types: './src/index.ts', default: './dist/index.js' } },
            });
        }
    });

    it('starts main from a dedicated entry file', () => {
        const manifest: unknown = fse.readJsonSync(path.join(packageDir('layerstack'), 'package.json'));
        expect(manifest).toMatchObject({ bin: { layerstack: './dist/bin.js' } });

        const entry = fs.readFileSync(path.join(packageDir('layerstack'), 'src', 'bin.ts'), 'utf8');
        expect(entry.startsWith('#!/usr/bin/env node\n')).toBe(true);
        expect(entry).toContain('main(process.argv);');
    });
});
