#!/usr/bin/env node
/**
 * Pocket Ledger CLI
 *
 * The CLI owns all I/O: it reads settings and the transaction file,
 * hands data to the headless core and prints what comes back.
 */

import { run } from './cli.js';

run(process.argv.slice(2)).catch((err: unknown) => {
    console.error('Unexpected error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
});
