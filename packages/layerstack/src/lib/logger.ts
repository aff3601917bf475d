// layerstack/src/lib/logger.ts
// Structured JSON-lines event log.
//
// One event per line: {"ts":"…","level":"info","type":"cache.swap","payload":{…}}

import path from 'node:path';

import fse from 'fs-extra';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export interface LogEvent {
    /** Dotted event type, e.g. `build.complete`. */
    type: string;
    level?: LogLevel;
    payload?: JsonObject;
}

export interface Logger {
    log(event: LogEvent): void;
}

/** Where finished lines go. */
export type LogSink = (line: string) => void;

export interface JsonlLoggerOptions {
    /** Events below this level are dropped. */
    level?: LogLevel;
    sink?: LogSink;
    clock?: () => Date;
}

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

export class JsonlLogger implements Logger {
    public readonly level: LogLevel;
    private readonly sink: LogSink;
    private readonly clock: () => Date;

    constructor(options: JsonlLoggerOptions = {}) {
        this.level = options.level ?? 'info';
        this.sink = options.sink ?? stderrSink;
        this.clock = options.clock ?? (() => new Date());
    }

    log(event: LogEvent): void {
        const level = event.level ?? 'info';
        if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) return;

        const record: JsonObject = {
            ts: this.clock().toISOString(),
            level,
            type: event.type,
        };
        if (event.payload) record.payload = event.payload;
        this.sink(JSON.stringify(record));
    }
}

export const silentLogger: Logger = {
    log(): void {},
};

function stderrSink(line: string): void {
    process.stderr.write(`${line}\n`);
}

/** Append lines to a file, creating it (and its directory) on first use. */
export function fileSink(filePath: string): LogSink {
    let ready = false;
    return (line: string) => {
        if (!ready) {
            fse.ensureDirSync(path.dirname(filePath));
            ready = true;
        }
        fse.appendFileSync(filePath, `${line}\n`, 'utf8');
    };
}

/** Logger at `logLevel`, appending to `logFile` when set and to `sink` otherwise. */
export function createLogger(
    options: { logLevel: LogLevel; logFile?: string },
    sink: LogSink = stderrSink,
): JsonlLogger {
    return new JsonlLogger({
        level: options.logLevel,
        sink: options.logFile ? fileSink(options.logFile) : sink,
    });
}
