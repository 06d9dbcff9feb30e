import { getStrategy } from '@pocket-ledger/core';
import { arrow, fail, log, success } from '../utils/console.js';
import type { InvestOptions } from '../types.js';

export async function suggestAllocation(options: InvestOptions): Promise<void> {
    const result = getStrategy(options.risk, options.horizon);
    if (!result.ok) fail(result.error);

    const strategy = result.report;
    log(`\nAllocation for a ${options.risk.toLowerCase()} investor over ${options.horizon} year(s)`);
    success(`Stocks ${strategy.stocks}% | Bonds ${strategy.bonds}% | Gold ${strategy.gold}% | Cash ${strategy.cash}%`);
    for (const rule of strategy.rules) {
        arrow(rule);
    }
}
