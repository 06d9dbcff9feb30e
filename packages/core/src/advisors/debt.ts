/**
 * Debt payoff simulation (avalanche / snowball).
 *
 * Money is carried as Decimal throughout; only the final interest total
 * is converted back to a number.
 */

import { Decimal } from 'decimal.js';
import { DEBT_CONFIG, DebtSchema, PayoffMethodSchema, formatIssues } from '../types/index.js';
import type { Debt, DebtPlan, PayoffMethod } from '../types/index.js';
import { advisoryError } from './types.js';
import type { AdvisoryResult } from './types.js';

const METHOD_NAMES: Record<PayoffMethod, string> = {
    avalanche: 'Avalanche (Highest Interest First)',
    snowball: 'Snowball (Lowest Balance First)',
};

interface DebtState {
    balance: Decimal;
    monthlyRate: Decimal;
    minPayment: Decimal;
}

/**
 * Priority order: avalanche by descending rate, snowball by ascending balance.
 * Ties keep input order.
 */
export function orderDebts(debts: readonly Debt[], method: PayoffMethod): Debt[] {
    const sorted = [...debts];
    if (method === 'snowball') {
        sorted.sort((a, b) => a.balance - b.balance);
    } else {
        sorted.sort((a, b) => b.annualRate - a.annualRate);
    }
    return sorted;
}

/**
 * Validate raw debt input.
 *
 * @throws Error naming the first offending debt
 */
function validateDebts(debts: readonly unknown[]): Debt[] {
    return debts.map((debt, index) => {
        const parsed = DebtSchema.safeParse(debt);
        if (!parsed.success) {
            throw new Error(`Invalid debt at index ${index}: ${formatIssues(parsed.error)}`);
        }
        return parsed.data;
    });
}

/**
 * Simulate month-by-month repayment.
 *
 * Each month: accrue balance*rate/12 on every open debt, pay each debt's
 * minimum out of a pool equal to the sum of minimums, then put whatever is
 * left of the pool on the first open debt in priority order.
 *
 * @throws Error when debts remain after the month limit
 */
function simulate(ordered: readonly Debt[]): { months: number; interest: Decimal } {
    const states: DebtState[] = ordered.map((debt) => ({
        balance: new Decimal(debt.balance),
        monthlyRate: new Decimal(debt.annualRate).div(12),
        minPayment: new Decimal(debt.minPayment),
    }));
    const pool = states.reduce((sum, s) => sum.plus(s.minPayment), new Decimal(0));

    let months = 0;
    let interest = new Decimal(0);

    while (states.some((s) => s.balance.gt(0))) {
        months++;
        if (months > DEBT_CONFIG.MAX_MONTHS) {
            throw new Error(`Debt payoff exceeds ${DEBT_CONFIG.MAX_MONTHS} months`);
        }

        let available = pool;

        for (const s of states) {
            if (s.balance.gt(0)) {
                const charge = s.balance.times(s.monthlyRate);
                s.balance = s.balance.plus(charge);
                interest = interest.plus(charge);
            }
        }

        for (const s of states) {
            if (s.balance.gt(0)) {
                const payment = Decimal.min(s.minPayment, available, s.balance);
                s.balance = s.balance.minus(payment);
                available = available.minus(payment);
            }
        }

        const target = states.find((s) => s.balance.gt(0));
        if (target && available.gt(0)) {
            const payment = Decimal.min(target.balance, available);
            target.balance = target.balance.minus(payment);
        }
    }

    return { months, interest };
}

/**
 * Plan repayment of a set of debts.
 *
 * @param debts - Each with balance, annualRate (0.12 = 12%) and minPayment
 * @param method - avalanche (default) or snowball
 */
export function optimizeDebts(
    debts: readonly unknown[],
    method: PayoffMethod = 'avalanche'
): AdvisoryResult<DebtPlan> {
    try {
        const parsedMethod = PayoffMethodSchema.safeParse(method);
        if (!parsedMethod.success) {
            throw new Error(`Method must be 'avalanche' or 'snowball' (got ${String(method)})`);
        }
        const payoff = parsedMethod.data;
        if (debts.length === 0) {
            return {
                ok: true,
                report: { totalMonths: 0, totalInterest: 0, methodName: DEBT_CONFIG.EMPTY_METHOD_NAME },
            };
        }

        const { months, interest } = simulate(orderDebts(validateDebts(debts), payoff));
        return {
            ok: true,
            report: {
                totalMonths: months,
                totalInterest: interest.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber(),
                methodName: METHOD_NAMES[payoff],
            },
        };
    } catch (e) {
        return advisoryError(e);
    }
}

/**
 * Both orderings side by side, for a quick comparison.
 */
export function compareMethods(
    debts: readonly unknown[]
): AdvisoryResult<Record<PayoffMethod, DebtPlan>> {
    const avalanche = optimizeDebts(debts, 'avalanche');
    if (!avalanche.ok) return avalanche;
    const snowball = optimizeDebts(debts, 'snowball');
    if (!snowball.ok) return snowball;
    return { ok: true, report: { avalanche: avalanche.report, snowball: snowball.report } };
}
