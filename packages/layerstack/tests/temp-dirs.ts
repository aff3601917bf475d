// tests/temp-dirs.ts: Temporary directories and fixture-app copies for file-system tests
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import fse from 'fs-extra';
import { afterEach } from 'vitest';

const FIXTURE_APP = fileURLToPath(new URL('./fixtures/app', import.meta.url));

export interface TempDirs {
    /** Fresh empty directory, removed after each test. */
    make(): string;
    /** Fresh copy of tests/fixtures/app, removed after each test. */
    fixtureApp(): string;
}

/** Call inside a describe block. */
export function useTempDirs(): TempDirs {
    const dirs: string[] = [];
    afterEach(() => {
        for (const dir of dirs.splice(0)) fse.removeSync(dir);
    });

    const make = (): string => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'layerstack-'));
        dirs.push(dir);
        return dir;
    };

    return {
        make,
        fixtureApp() {
            const dir = make();
            fse.copySync(FIXTURE_APP, dir);
            return dir;
        },
    };
}
