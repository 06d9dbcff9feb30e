import { EmergencyFundAdvisor } from '@pocket-ledger/core';
import { openStore } from '../store/open.js';
import { openWorkspace } from '../workspace/open.js';
import { arrow, debug, fail, log, success } from '../utils/console.js';
import { formatAmount, formatPercent } from '../utils/format.js';
import type { EmergencyOptions } from '../types.js';

export async function adviseEmergencyFund(options: EmergencyOptions): Promise<void> {
    const { workspace, settings } = openWorkspace(options.workspace);
    const daysBack = options.days ?? settings.forecast.daysBack;

    let advisor: EmergencyFundAdvisor;
    try {
        advisor = new EmergencyFundAdvisor(settings.emergencyFund);
    } catch (err) {
        fail(`Invalid emergencyFund settings. ${err instanceof Error ? err.message : String(err)}`);
    }

    const store = await openStore(workspace, settings);
    const expenses = await store
        .fetchTransactions({ daysBack, type: 'expense' })
        .catch((err: unknown) => fail(err instanceof Error ? err.message : String(err)));
    debug(`${expenses.length} expense records in the last ${daysBack} days`);

    const result = advisor.recommend(expenses, {
        incomeStability: options.stability,
        dependents: options.dependents,
    });
    if (!result.ok) fail(result.error);

    const { report } = result;
    const [low, high] = report.recommendedRange;
    log(`\nEmergency fund (${report.factors.incomeStability} income, ${report.factors.dependents} dependent(s))`);
    arrow(`Average monthly expense: ${formatAmount(report.avgMonthlyExpense, settings.currency)}`);
    success(`Recommended fund: ${formatAmount(low, settings.currency)} to ${formatAmount(high, settings.currency)}`);
    arrow(`Chance the upper end covers a 3-month shock: ${formatPercent(report.probabilitySufficient)}`);
}
