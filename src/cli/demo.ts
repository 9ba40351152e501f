#!/usr/bin/env node
/**
 * @file Demo Entry Point
 *
 * Usage:
 *   npx tsx src/cli/demo.ts --help
 *   npx tsx src/cli/demo.ts --xml
 *   npx tsx src/cli/demo.ts -b --special-slider 0.5 input.nrrd --ctk-save-ini demo.ini
 *
 * @module
 */

import type { Application } from '../app/Application.js';
import { demoApplication_create } from '../app/demoApplication.js';
import type { CommandLineResult } from './commandLine.js';
import { errorMessage_get } from '../shared/errors.js';

try {
    const app: Application = demoApplication_create();
    const argv: string[] = process.argv.slice(2);
    const result: CommandLineResult = app.commandLine_parse(argv);
    if (result.argc > 0) {
        app.sink.stdout_write(`Unhandled arguments: ${argv.join(' ')}\n`);
    }
} catch (e: unknown) {
    console.error(`Fatal error: ${errorMessage_get(e)}`);
    process.exitCode = 1;
}
