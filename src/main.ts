#!/usr/bin/env node

/**
 * buildsense CLI entry point
 */

import { createCli } from './interface/cli/index.js';

const program = createCli();
await program.parseAsync(process.argv);
