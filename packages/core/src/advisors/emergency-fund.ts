/**
 * Emergency fund sizing from monthly expense history.
 */

import { EMERGENCY_FUND_CONFIG, IncomeStabilitySchema } from '../types/index.js';
import type { EmergencyFundReport, IncomeStability } from '../types/index.js';
import { monthlyTotals } from './monthly.js';
import { mean, normalCdf, round2, sampleStdDev } from './stats.js';
import { advisoryError } from './types.js';
import type { AdvisoryResult } from './types.js';

export interface EmergencyFundConfig {
    minMonths: number;
    maxMonths: number;
}

export interface HouseholdProfile {
    incomeStability?: IncomeStability;
    dependents?: number;
}

/**
 * Multiplier on the baseline range: +20% for variable income, +10% per dependent.
 */
export function adjustmentFactor(incomeStability: IncomeStability, dependents: number): number {
    let factor = 1;
    if (incomeStability === 'variable') factor += EMERGENCY_FUND_CONFIG.VARIABLE_INCOME_UPLIFT;
    return factor + EMERGENCY_FUND_CONFIG.PER_DEPENDENT_UPLIFT * dependents;
}

export class EmergencyFundAdvisor {
    private readonly config: EmergencyFundConfig;

    /**
     * @throws Error when the month bounds are not 0 < min <= max
     */
    constructor(config: Partial<EmergencyFundConfig> = {}) {
        this.config = {
            minMonths: config.minMonths ?? EMERGENCY_FUND_CONFIG.MIN_MONTHS,
            maxMonths: config.maxMonths ?? EMERGENCY_FUND_CONFIG.MAX_MONTHS,
        };
        if (!(this.config.minMonths > 0 && this.config.minMonths <= this.config.maxMonths)) {
            throw new Error(
                `Invalid month range: ${this.config.minMonths}..${this.config.maxMonths}`
            );
        }
    }

    /**
     * Recommend an emergency fund range.
     *
     * Sufficiency is the chance, under a normal approximation, that the
     * upper end covers three months of a buffer of mean + 2 standard
     * deviations.
     */
    recommend(
        expenseHistory: readonly unknown[],
        profile: HouseholdProfile = {}
    ): AdvisoryResult<EmergencyFundReport> {
        try {
            const stability = IncomeStabilitySchema.safeParse(profile.incomeStability ?? 'stable');
            if (!stability.success) {
                throw new Error(`Income stability must be 'stable' or 'variable'`);
            }
            const dependents = profile.dependents ?? 0;
            if (!Number.isInteger(dependents) || dependents < 0) {
                throw new Error(`Dependents must be a non-negative integer (got ${dependents})`);
            }

            const months = monthlyTotals(expenseHistory, 'No valid expense data available');
            const avg = mean(months);
            let spread = sampleStdDev(months);
            // Single month or no variation
            if (!Number.isFinite(spread) || spread === 0) {
                spread = avg * EMERGENCY_FUND_CONFIG.FALLBACK_STDDEV_SHARE;
            }

            const factor = adjustmentFactor(stability.data, dependents);
            const low = avg * this.config.minMonths * factor;
            const high = avg * this.config.maxMonths * factor;

            const bufferMonths = EMERGENCY_FUND_CONFIG.BUFFER_MONTHS;
            const buffer = avg + 2 * spread;
            const probability = normalCdf(
                (high - buffer * bufferMonths) / (spread * Math.sqrt(bufferMonths))
            );

            return {
                ok: true,
                report: {
                    recommendedRange: [round2(low), round2(high)],
                    avgMonthlyExpense: round2(avg),
                    probabilitySufficient: Number.isFinite(probability) ? round2(probability) : 0.5,
                    factors: { incomeStability: stability.data, dependents },
                },
            };
        } catch (e) {
            return advisoryError(e);
        }
    }
}
