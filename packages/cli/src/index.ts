#!/usr/bin/env node
/**
 * Budget Workbench CLI entry point.
 *
 * The CLI owns all file I/O and console output; the core stays headless.
 */

import { errorMessage } from '@budget-workbench/core';
import { runCli } from './cli.js';
import { error } from './utils/console.js';

async function main(): Promise<void> {
    const code = await runCli(process.argv.slice(2));
    if (code !== 0) {
        process.exitCode = code;
    }
}

main().catch((err: unknown) => {
    error(errorMessage(err));
    process.exit(1);
});
