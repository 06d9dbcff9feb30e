import { openStore } from '../store/open.js';
import { openWorkspace } from '../workspace/open.js';
import { arrow, fail, info, log } from '../utils/console.js';
import { formatAmount, formatRecord } from '../utils/format.js';
import type { HistoryOptions } from '../types.js';

export async function showHistory(options: HistoryOptions): Promise<void> {
    const { workspace, settings } = openWorkspace(options.workspace);
    const daysBack = options.days ?? settings.forecast.daysBack;
    const store = await openStore(workspace, settings);

    const rows = await store
        .fetchTransactions({ daysBack, type: options.type })
        .catch((err: unknown) => fail(err instanceof Error ? err.message : String(err)));

    const scope = options.type ? `${options.type} transactions` : 'transactions';
    if (rows.length === 0) {
        info(`No ${scope} in the last ${daysBack} days.`);
        return;
    }

    log(`\n${rows.length} ${scope} in the last ${daysBack} days:\n`);
    for (const row of rows) {
        log(formatRecord(row));
    }

    const totals = new Map<string, number>();
    for (const row of rows) {
        const key = `${row.type} ${row.currency}`;
        totals.set(key, (totals.get(key) ?? 0) + row.amount);
    }
    log('');
    for (const [key, total] of totals) {
        const [type, currency] = key.split(' ');
        arrow(`Total ${type}: ${formatAmount(total, currency)}`);
    }
}
