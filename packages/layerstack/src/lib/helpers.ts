// layerstack/src/lib/helpers.ts
// Small shared utilities.

/** Render a key path for humans: `db.hosts[0].port`. */
export function formatKeyPath(path: readonly string[]): string {
    let out = '';
    for (const segment of path) {
        if (/^\d+$/.test(segment)) {
            out += `[${segment}]`;
        } else {
            out += out === '' ? segment : `.${segment}`;
        }
    }
    return out === '' ? '(root)' : out;
}

/** Best-effort message for anything that was thrown. */
export function formatErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        const message = error.message.trim();
        return message !== '' ? message : error.name;
    }
    if (typeof error === 'string') return error;
    return String(error);
}

/** `code` of a Node.js system error (`ENOENT`, `EEXIST`, ...), if any. */
export function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}
