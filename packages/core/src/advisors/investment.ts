/**
 * Risk-profile based asset allocation.
 */

import { RiskProfileSchema } from '../types/index.js';
import type { InvestmentStrategy, RiskProfile } from '../types/index.js';
import { advisoryError } from './types.js';
import type { AdvisoryResult } from './types.js';

const BASE_STRATEGIES: Record<RiskProfile, InvestmentStrategy> = {
    conservative: {
        stocks: 30, bonds: 50, gold: 15, cash: 5,
        rules: ['Focus on capital preservation', 'Recommend: Index funds + government bonds'],
    },
    moderate: {
        stocks: 50, bonds: 35, gold: 10, cash: 5,
        rules: ['Balance growth and stability', 'Recommend: Balanced mutual funds'],
    },
    aggressive: {
        stocks: 70, bonds: 20, gold: 5, cash: 5,
        rules: ['Long-term growth focus', 'Recommend: Growth stocks + sector ETFs'],
    },
};

const LONG_HORIZON_YEARS = 10;
const SHORT_HORIZON_YEARS = 3;

function clampPercent(value: number): number {
    return Math.min(100, Math.max(0, value));
}

/**
 * Allocation for a risk profile, tilted by horizon.
 *
 * Over 10 years: +10 stocks, -10 bonds. Under 3 years: -20 stocks, +20 cash.
 *
 * @param riskProfile - conservative | moderate | aggressive (any case)
 * @param horizonYears - Investment horizon, must be positive
 */
export function getStrategy(
    riskProfile: string,
    horizonYears: number
): AdvisoryResult<InvestmentStrategy> {
    try {
        if (!(horizonYears > 0)) {
            throw new Error('Investment horizon must be positive');
        }
        const profile = RiskProfileSchema.safeParse(riskProfile.toLowerCase());
        if (!profile.success) {
            throw new Error("Risk profile must be 'conservative', 'moderate', or 'aggressive'");
        }

        const base = BASE_STRATEGIES[profile.data];
        const strategy: InvestmentStrategy = { ...base, rules: [...base.rules] };

        if (horizonYears > LONG_HORIZON_YEARS) {
            strategy.stocks = clampPercent(strategy.stocks + 10);
            strategy.bonds = clampPercent(strategy.bonds - 10);
        } else if (horizonYears < SHORT_HORIZON_YEARS) {
            strategy.stocks = clampPercent(strategy.stocks - 20);
            strategy.cash = clampPercent(strategy.cash + 20);
        }

        return { ok: true, report: strategy };
    } catch (e) {
        return advisoryError(e);
    }
}
