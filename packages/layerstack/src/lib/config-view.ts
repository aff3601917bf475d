// layerstack/src/lib/config-view.ts
// Read access to a loaded configuration tree by dotted path.

import { isMapping, ownEntry, type ConfigNode, type ConfigValue } from 'liblayer';

import { ConfigKeyError } from './errors.js';

export class ConfigView {
    constructor(private readonly tree: ConfigNode) {}

    /** Value at `path` (`db.primary.host`), or undefined. An empty path is the whole tree. */
    get(path: string): ConfigValue | undefined {
        let current: ConfigValue | undefined = this.tree;
        for (const segment of splitPath(path)) {
            if (!isMapping(current)) return undefined;
            current = ownEntry(current, segment);
        }
        return current;
    }

    has(path: string): boolean {
        return this.get(path) !== undefined;
    }

    /** Like get(), but a missing key is an error rather than a default. */
    require(path: string): ConfigValue {
        const value = this.get(path);
        if (value === undefined) throw new ConfigKeyError(path);
        return value;
    }

    /** Sub-view rooted at a mapping. */
    section(path: string): ConfigView {
        const value = this.require(path);
        if (!isMapping(value)) throw new ConfigKeyError(path, 'is not a mapping');
        return new ConfigView(value);
    }

    toJSON(): ConfigNode {
        return this.tree;
    }
}

function splitPath(path: string): string[] {
    return path === '' ? [] : path.split('.');
}
