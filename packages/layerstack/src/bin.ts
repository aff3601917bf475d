#!/usr/bin/env node
// layerstack/src/bin.ts
// Executable entry for the `layerstack` command.

import { main } from './cli.js';

main(process.argv);
