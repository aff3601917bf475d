// layerstack/src/cli.ts
// `layerstack` command: warm, build and show artifacts of an application.

import { Argument, Command, CommanderError, Option } from 'commander';
import { stableSerialize } from 'liblayer';

import { CacheWriter } from './lib/cache.js';
import { Composer } from './lib/compose.js';
import { SettingsError } from './lib/errors.js';
import { formatFailureLines } from './lib/format.js';
import { RuntimeLoader } from './lib/loader.js';
import { createLogger } from './lib/logger.js';
import { ARTIFACT_KINDS, MODES, isArtifactKind, isMode, type ArtifactKind, type Mode } from './lib/model.js';
import { loadApplicationSources } from './lib/sources.js';
import { loadSettings, type Settings } from './lib/settings.js';

export interface CliIO {
    out(line: string): void;
    err(line: string): void;
    env?: NodeJS.ProcessEnv;
    cwd?: string;
}

const processIO: CliIO = {
    out: line => process.stdout.write(`${line}\n`),
    err: line => process.stderr.write(`${line}\n`),
};

// ─── Program ────────────────────────────────────────────────────────

export function createProgram(io: CliIO, status: { exitCode: number }): Command {
    const program = new Command('layerstack')
        .description('Compose, cache and inspect layered configuration, routes and services')
        .option('--root <dir>', 'application root', io.cwd ?? process.cwd())
        .exitOverride()
        .configureOutput({
            writeOut: text => io.out(text.trimEnd()),
            writeErr: text => io.err(text.trimEnd()),
        });

    program
        .command('warm')
        .description('Build every artifact and write it to the cache')
        .addOption(new Option('--mode <mode>', 'mode to warm').choices([...MODES, 'all']).default('all'))
        .option('--no-overwrite', 'keep artifacts that already exist')
        .option(
            '--no-invalidate',
            'skip signalling compiled caches after each write; only caches registered in the writing process are signalled, and this command registers none',
        )
        .action((_opts, command: Command) => {
            guarded(io, status, () => {
                const opts = command.optsWithGlobals();
                const settings = settingsFor(io, opts.root);
                const logger = createLogger(settings, io.err);
                const writer = new CacheWriter({ cacheDir: settings.cacheDir, logger });
                const composer = new Composer({ sources: loadApplicationSources(settings), writer, logger });
                const warmOptions = {
                    overwrite: opts.overwrite !== false,
                    invalidateExternalCache: opts.invalidate !== false,
                };

                const mode: unknown = opts.mode;
                const artifacts = isMode(mode) ? composer.warm(mode, warmOptions) : composer.warmAll(warmOptions);
                if (artifacts.length === 0) {
                    io.out('nothing to write');
                }
                for (const artifact of artifacts) {
                    io.out(`wrote ${artifact.kind}/${artifact.mode} ${artifact.identity} sha256:${artifact.digest.slice(0, 12)}`);
                }
            });
        });

    program
        .command('build')
        .description('Compose one artifact and print it without writing')
        .addArgument(kindArgument())
        .addOption(modeOption())
        .action((kind: unknown, _opts, command: Command) => {
            guarded(io, status, () => {
                const opts = command.optsWithGlobals();
                const settings = settingsFor(io, opts.root);
                const composer = new Composer({
                    sources: loadApplicationSources(settings),
                    logger: createLogger(settings, io.err),
                });
                io.out(stableSerialize(composer.build(requireMode(opts.mode), requireKind(kind))));
            });
        });

    program
        .command('show')
        .description('Print a cached artifact')
        .addArgument(kindArgument())
        .addOption(modeOption())
        .action((kind: unknown, _opts, command: Command) => {
            guarded(io, status, () => {
                const opts = command.optsWithGlobals();
                const settings = settingsFor(io, opts.root);
                const loader = new RuntimeLoader({ cacheDir: settings.cacheDir, logger: createLogger(settings, io.err) });
                io.out(stableSerialize(loader.load(requireKind(kind), requireMode(opts.mode))));
            });
        });

    return program;
}

/** Run with user arguments (no `node` / script path). Returns the exit code. */
export function runCli(args: readonly string[], io: CliIO = processIO): number {
    const status = { exitCode: 0 };
    const program = createProgram(io, status);
    try {
        program.parse([...args], { from: 'user' });
    } catch (err) {
        if (err instanceof CommanderError) return err.exitCode;
        throw err;
    }
    return status.exitCode;
}

export function main(argv: readonly string[] = process.argv): void {
    process.exitCode = runCli(argv.slice(2));
}

// ─── Helpers ────────────────────────────────────────────────────────

function kindArgument(): Argument {
    return new Argument('<kind>', 'artifact kind').choices([...ARTIFACT_KINDS]);
}

function modeOption(): Option {
    return new Option('--mode <mode>', 'execution mode').choices([...MODES]).default('http');
}

function requireKind(value: unknown): ArtifactKind {
    if (!isArtifactKind(value)) throw new SettingsError(`Unknown artifact kind "${String(value)}"`);
    return value;
}

function requireMode(value: unknown): Mode {
    if (!isMode(value)) throw new SettingsError(`Unknown mode "${String(value)}"`);
    return value;
}

function settingsFor(io: CliIO, root: unknown): Settings {
    if (typeof root !== 'string') throw new SettingsError('--root must be a directory path');
    return loadSettings({ root, env: io.env ?? process.env });
}

/** Report a failure on stderr and mark the run as failed. */
function guarded(io: CliIO, status: { exitCode: number }, action: () => void): void {
    try {
        action();
    } catch (err) {
        for (const line of formatFailureLines(err)) io.err(line);
        status.exitCode = 1;
    }
}
