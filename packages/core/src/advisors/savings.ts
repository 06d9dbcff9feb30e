/**
 * Savings goal planner with a Monte-Carlo success estimate.
 */

import { SAVINGS_CONFIG } from '../types/index.js';
import type { SavingsPlan } from '../types/index.js';
import { normalSampler, round2 } from './stats.js';
import type { RandomSource } from './stats.js';
import { advisoryError } from './types.js';
import type { AdvisoryResult } from './types.js';

export interface SavingsGoal {
    currentSavings: number;
    goalAmount: number;
    timeframeMonths: number;
    monthlyIncome: number;
}

export interface SavingsOptions {
    /** Annualised mean return (0.07 = 7%). */
    annualReturn?: number;
    /** Annualised volatility of returns. */
    annualVolatility?: number;
    /** Uniform source for the simulation; defaults to Math.random. */
    random?: RandomSource;
}

function validateGoal(goal: SavingsGoal): void {
    const { currentSavings, goalAmount, timeframeMonths, monthlyIncome } = goal;
    for (const value of [currentSavings, goalAmount, monthlyIncome]) {
        if (!Number.isFinite(value) || value < 0) {
            throw new Error('Savings, goal, and income must be non-negative');
        }
    }
    if (!Number.isInteger(timeframeMonths) || timeframeMonths <= 0) {
        throw new Error('Timeframe must be a positive whole number of months');
    }
}

/**
 * Fraction of simulated trials whose ending balance reaches the goal.
 *
 * Each trial compounds the current balance month by month and adds the
 * contribution at the end of every month.
 */
export function simulateSuccess(
    goal: SavingsGoal,
    monthlyContribution: number,
    options: SavingsOptions = {}
): number {
    const annualReturn = options.annualReturn ?? SAVINGS_CONFIG.ANNUAL_RETURN;
    const annualVolatility = options.annualVolatility ?? SAVINGS_CONFIG.ANNUAL_VOLATILITY;
    const draw = normalSampler(
        options.random ?? Math.random,
        annualReturn / 12,
        annualVolatility / Math.sqrt(12)
    );

    let successes = 0;
    for (let trial = 0; trial < SAVINGS_CONFIG.TRIALS; trial++) {
        let balance = goal.currentSavings;
        for (let month = 0; month < goal.timeframeMonths; month++) {
            balance = balance * (1 + draw()) + monthlyContribution;
        }
        if (balance >= goal.goalAmount) successes++;
    }
    return successes / SAVINGS_CONFIG.TRIALS;
}

/**
 * Monthly contribution plan for a savings goal.
 *
 * requiredMonthly closes the gap linearly; recommendedMonthly is capped at
 * 30% of income. A goal already met needs no simulation.
 */
export function calculateSavingsPlan(
    goal: SavingsGoal,
    options: SavingsOptions = {}
): AdvisoryResult<SavingsPlan> {
    try {
        validateGoal(goal);

        const required = Math.max(0, (goal.goalAmount - goal.currentSavings) / goal.timeframeMonths);
        const recommended = Math.min(required, goal.monthlyIncome * SAVINGS_CONFIG.MAX_INCOME_SHARE);

        const successRate = goal.currentSavings >= goal.goalAmount
            ? 1
            : simulateSuccess(goal, recommended, options);

        // The verdict uses the unrounded rate; 0.696 reports as 0.7 but still falls short
        return {
            ok: true,
            report: {
                requiredMonthly: round2(required),
                recommendedMonthly: round2(recommended),
                successProbability: round2(successRate),
                reconsiderPlan: successRate < SAVINGS_CONFIG.RECONSIDER_BELOW,
            },
        };
    } catch (e) {
        return advisoryError(e);
    }
}
