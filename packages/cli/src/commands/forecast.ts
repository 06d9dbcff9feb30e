import { forecast } from '@pocket-ledger/core';
import { openStore } from '../store/open.js';
import { openWorkspace } from '../workspace/open.js';
import { arrow, debug, fail, log, success, warn } from '../utils/console.js';
import { formatAmount } from '../utils/format.js';
import type { ForecastCommandOptions } from '../types.js';

export async function forecastExpenses(options: ForecastCommandOptions): Promise<void> {
    const { workspace, settings } = openWorkspace(options.workspace);
    const daysBack = options.days ?? settings.forecast.daysBack;
    const store = await openStore(workspace, settings);

    const expenses = await store
        .fetchTransactions({ daysBack, type: 'expense' })
        .catch((err: unknown) => fail(err instanceof Error ? err.message : String(err)));
    debug(`${expenses.length} expense records in the last ${daysBack} days`);

    const result = forecast(expenses, {
        windowSize: options.window ?? settings.forecast.windowSize,
        confidenceLevel: options.confidence ?? settings.forecast.confidenceLevel,
    });
    if (!result.ok) {
        fail(result.error);
    }

    const { report } = result;
    log(`\nExpense forecast for next month (${report.method})`);
    success(`Prediction: ${formatAmount(report.prediction, settings.currency)}`);
    if (report.confidenceInterval) {
        const [low, high] = report.confidenceInterval;
        arrow(`${Math.round(report.confidenceLevel * 100)}% interval: ${formatAmount(low, settings.currency)} to ${formatAmount(high, settings.currency)}`);
    } else {
        warn(`Only ${report.months} month(s) of history; no interval available.`);
    }
}
