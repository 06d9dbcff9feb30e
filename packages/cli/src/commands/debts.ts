import { compareMethods, optimizeDebts, type DebtPlan } from '@pocket-ledger/core';
import { loadDebts } from '../workspace/config.js';
import { arrow, fail, log, success } from '../utils/console.js';
import type { DebtsOptions } from '../types.js';

function printPlan(plan: DebtPlan): void {
    success(plan.methodName);
    arrow(`Months to debt-free: ${plan.totalMonths}`);
    arrow(`Total interest:      ${plan.totalInterest.toFixed(2)}`);
}

export async function planDebts(file: string, options: DebtsOptions): Promise<void> {
    let debts: unknown[];
    try {
        debts = loadDebts(file);
    } catch (err) {
        fail(err instanceof Error ? err.message : String(err));
    }

    log(`\nDebt payoff plan for ${debts.length} debt(s)`);

    if (options.method === 'compare') {
        const result = compareMethods(debts);
        if (!result.ok) fail(result.error);

        const { avalanche, snowball } = result.report;
        printPlan(avalanche);
        printPlan(snowball);
        const saving = snowball.totalInterest - avalanche.totalInterest;
        if (saving > 0) {
            log(`\nAvalanche saves ${saving.toFixed(2)} in interest.`);
        } else if (saving < 0) {
            log(`\nSnowball saves ${(-saving).toFixed(2)} in interest.`);
        } else {
            log('\nBoth methods cost the same interest.');
        }
        return;
    }

    const result = optimizeDebts(debts, options.method);
    if (!result.ok) fail(result.error);
    printPlan(result.report);
}
