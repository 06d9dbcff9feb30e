import { forecast, formatIsoDate, localToday, monthKey, summarizeSpending } from '@pocket-ledger/core';
import { openStore } from '../store/open.js';
import { openWorkspace } from '../workspace/open.js';
import { arrow, fail, info, log, success, warn } from '../utils/console.js';
import { formatAmount, formatRecord } from '../utils/format.js';
import type { OverviewOptions } from '../types.js';

const RECENT_DAYS = 30;
const RECENT_LIMIT = 5;

/**
 * Recent transactions, one month's spending by category and the
 * next-month forecast on a single screen.
 */
export async function showOverview(options: OverviewOptions): Promise<void> {
    const { workspace, settings } = openWorkspace(options.workspace);
    const store = await openStore(workspace, settings);
    const month = options.month ?? monthKey(formatIsoDate(localToday()));
    const toMessage = (err: unknown) => fail(err instanceof Error ? err.message : String(err));

    const history = await store
        .fetchTransactions({ daysBack: settings.forecast.daysBack })
        .catch(toMessage);
    const recent = await store
        .fetchTransactions({ daysBack: RECENT_DAYS })
        .catch(toMessage);

    const summary = summarizeSpending(history, month);
    if (!summary.ok) {
        fail(summary.error);
    }

    log('\nFinancial overview');

    log(`\nRecent transactions (last ${RECENT_DAYS} days):`);
    if (recent.length === 0) {
        info(`No transactions in the last ${RECENT_DAYS} days.`);
    }
    for (const row of recent.slice(0, RECENT_LIMIT)) {
        log(formatRecord(row));
    }

    log(`\nSpending for ${month}:`);
    const { categories, total } = summary.report;
    if (categories.length === 0) {
        info(`No expenses recorded for ${month}.`);
    } else {
        for (const { mainCategory, total: categoryTotal } of categories) {
            arrow(`${mainCategory}: ${formatAmount(categoryTotal, settings.currency)}`);
        }
        arrow(`Total: ${formatAmount(total, settings.currency)}`);
    }

    const expenses = history.filter((row) => row.type === 'expense');
    const outlook = forecast(expenses, {
        windowSize: settings.forecast.windowSize,
        confidenceLevel: settings.forecast.confidenceLevel,
    });
    log('');
    if (!outlook.ok) {
        warn(`Forecast unavailable: ${outlook.error}`);
        return;
    }
    success(`Next month forecast: ${formatAmount(outlook.report.prediction, settings.currency)}`);
    if (outlook.report.confidenceInterval) {
        const [low, high] = outlook.report.confidenceInterval;
        arrow(`Expected range: ${formatAmount(low, settings.currency)} to ${formatAmount(high, settings.currency)}`);
    }
}
