#!/usr/bin/env node

/**
 * Meal Battle Smoke Runner - CLI Entry Point
 */

import chalk from 'chalk';
import { runCli } from './main.js';

runCli(process.argv.slice(2))
    .then(code => {
        process.exit(code);
    })
    .catch((error: unknown) => {
        console.error(chalk.red(`\n✗ Fatal error: ${error}\n`));
        process.exit(1);
    });
