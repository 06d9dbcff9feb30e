import { calculateSavingsPlan, mulberry32 } from '@pocket-ledger/core';
import { settingsOrDefaults } from '../workspace/open.js';
import { arrow, fail, log, success, warn } from '../utils/console.js';
import { formatAmount, formatPercent } from '../utils/format.js';
import type { SavingsCommandOptions } from '../types.js';

export async function planSavings(options: SavingsCommandOptions): Promise<void> {
    const settings = settingsOrDefaults(options.workspace);

    const result = calculateSavingsPlan(
        {
            currentSavings: options.current,
            goalAmount: options.goal,
            timeframeMonths: options.months,
            monthlyIncome: options.income,
        },
        {
            annualReturn: settings.savings.annualReturn,
            annualVolatility: settings.savings.annualVolatility,
            random: options.seed === undefined ? undefined : mulberry32(options.seed),
        }
    );
    if (!result.ok) fail(result.error);

    const plan = result.report;
    log(`\nSavings plan: ${formatAmount(options.goal, settings.currency)} in ${options.months} month(s)`);
    arrow(`Required per month:    ${formatAmount(plan.requiredMonthly, settings.currency)}`);
    arrow(`Recommended per month: ${formatAmount(plan.recommendedMonthly, settings.currency)}`);
    success(`Chance of reaching the goal: ${formatPercent(plan.successProbability)}`);
    if (plan.reconsiderPlan) {
        warn('Low chance of success. Consider a longer timeframe or a smaller goal.');
    }
}
