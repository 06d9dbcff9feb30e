import {
    describeParseError,
    ingestUtterance,
    parse,
    summarizeParse,
    type ParseSummary,
    type ParserOptions,
} from '@pocket-ledger/core';
import { openStore } from '../store/open.js';
import { openWorkspace } from '../workspace/open.js';
import { arrow, debug, fail, log, success, warn } from '../utils/console.js';
import { formatRecord } from '../utils/format.js';
import type { AddOptions } from '../types.js';

export async function addTransactions(text: string, options: AddOptions): Promise<void> {
    if (text.trim() === '') {
        fail('Nothing to add. Pass the transaction text in quotes, e.g. add "paid 20 rupees for panipuris".');
    }

    const { workspace, settings } = openWorkspace(options.workspace);
    const parserOptions: ParserOptions = { defaultCurrency: settings.currency };

    const entries = parse(text, parserOptions);
    for (const entry of entries) {
        if (entry.kind === 'transaction') {
            debug(`"${entry.clause}" -> ${entry.record.type} ${entry.record.amount} ${entry.record.mainCategory}/${entry.record.subCategory}`);
        } else {
            debug(describeParseError(entry.error));
        }
    }

    let summary: ParseSummary;
    if (options.dryRun) {
        summary = summarizeParse(entries);
    } else {
        const store = await openStore(workspace, settings);
        summary = await ingestUtterance(text, store, parserOptions);
    }

    for (const record of summary.transactions) {
        arrow(formatRecord(record));
    }
    for (const message of summary.errors) {
        warn(message);
    }

    if (summary.status === 'error') {
        fail(summary.message);
    }

    const count = summary.transactions.length;
    if (options.dryRun) {
        log(`\n[DRY RUN] ${count} transaction(s) parsed, nothing saved.`);
    } else if (summary.status === 'partial') {
        success(`${summary.message}: ${count} saved, ${summary.errors.length} skipped.`);
    } else {
        success(`${summary.message}: ${count} saved.`);
    }
}
