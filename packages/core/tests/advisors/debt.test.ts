import { describe, it, expect } from 'vitest';
import { optimizeDebts, compareMethods, orderDebts } from '../../src/advisors/debt.js';
import type { Debt } from '../../src/types/index.js';
import { DebtPlanSchema } from '../../src/types/index.js';

const mixed: Debt[] = [
    { name: 'card', balance: 1000, annualRate: 0.24, minPayment: 100 },
    { name: 'car', balance: 500, annualRate: 0.06, minPayment: 100 },
    { name: 'friend', balance: 200, annualRate: 0, minPayment: 100 },
];

describe('optimizeDebts', () => {
    it('should return zero months and interest for no debts', () => {
        for (const method of ['avalanche', 'snowball'] as const) {
            expect(optimizeDebts([], method)).toEqual({
                ok: true,
                report: { totalMonths: 0, totalInterest: 0, methodName: 'No debts provided' },
            });
        }
    });

    it('should pay off an interest-free debt covered by one payment in one month', () => {
        expect(optimizeDebts([{ balance: 1000, annualRate: 0, minPayment: 1000 }])).toEqual({
            ok: true,
            report: { totalMonths: 1, totalInterest: 0, methodName: 'Avalanche (Highest Interest First)' },
        });
    });

    it('should accrue a month of interest before the payment', () => {
        const result = optimizeDebts([{ balance: 1200, annualRate: 0.12, minPayment: 1212 }]);
        expect(result.ok && result.report.totalMonths).toBe(1);
        expect(result.ok && result.report.totalInterest).toBe(12);
    });

    it('should give identical results for both methods on a single debt', () => {
        const debts = [{ balance: 5000, annualRate: 0.18, minPayment: 200 }];
        const avalanche = optimizeDebts(debts, 'avalanche');
        const snowball = optimizeDebts(debts, 'snowball');

        expect(avalanche.ok && avalanche.report.totalMonths).toBe(32);
        expect(avalanche.ok && avalanche.report.totalInterest).toBe(1313.96);
        expect(snowball.ok && [snowball.report.totalMonths, snowball.report.totalInterest]).toEqual([32, 1313.96]);
    });

    it('should roll freed minimums into the priority debt', () => {
        // Pool of 100: the small debt closes in month 2, then all 100 goes to the other
        const result = optimizeDebts([
            { balance: 100, annualRate: 0, minPayment: 50 },
            { balance: 300, annualRate: 0, minPayment: 50 },
        ], 'snowball');
        expect(result.ok && result.report.totalMonths).toBe(4);
        expect(result.ok && result.report.totalInterest).toBe(0);
    });

    it('should cost less interest with avalanche when rates differ', () => {
        expect(optimizeDebts(mixed, 'avalanche')).toEqual({
            ok: true,
            report: { totalMonths: 6, totalInterest: 90.83, methodName: 'Avalanche (Highest Interest First)' },
        });
        expect(optimizeDebts(mixed, 'snowball')).toEqual({
            ok: true,
            report: { totalMonths: 7, totalInterest: 99.74, methodName: 'Snowball (Lowest Balance First)' },
        });
    });

    it('should report an unpayable configuration as an error', () => {
        expect(optimizeDebts([{ balance: 1000, annualRate: 0.1, minPayment: 0 }])).toEqual({
            ok: false,
            error: 'Debt payoff exceeds 1000 months',
        });
    });

    it('should reject negative or missing fields', () => {
        const negative = optimizeDebts([{ balance: -1, annualRate: 0.1, minPayment: 10 }]);
        expect(!negative.ok && negative.error).toContain('Invalid debt at index 0: balance');

        const missing = optimizeDebts([mixed[0], { balance: 100, annualRate: 0.1 }]);
        expect(!missing.ok && missing.error).toContain('Invalid debt at index 1: minPayment');
    });
});

describe('orderDebts', () => {
    it('should order by rate for avalanche and by balance for snowball', () => {
        expect(orderDebts(mixed, 'avalanche').map((d) => d.name)).toEqual(['card', 'car', 'friend']);
        expect(orderDebts(mixed, 'snowball').map((d) => d.name)).toEqual(['friend', 'car', 'card']);
    });

    it('should keep input order on ties', () => {
        const tied: Debt[] = [
            { name: 'first', balance: 100, annualRate: 0.1, minPayment: 10 },
            { name: 'second', balance: 100, annualRate: 0.1, minPayment: 10 },
        ];
        expect(orderDebts(tied, 'avalanche').map((d) => d.name)).toEqual(['first', 'second']);
        expect(orderDebts(tied, 'snowball').map((d) => d.name)).toEqual(['first', 'second']);
    });
});

describe('compareMethods', () => {
    it('should return both plans', () => {
        const result = compareMethods(mixed);
        expect(result.ok && result.report.avalanche.totalInterest).toBe(90.83);
        expect(result.ok && result.report.snowball.totalInterest).toBe(99.74);
    });
});

describe('debt plan shape', () => {
    it('should satisfy the plan schema for both methods', () => {
        for (const method of ['avalanche', 'snowball'] as const) {
            const result = optimizeDebts(mixed, method);
            expect(result.ok).toBe(true);
            if (result.ok) expect(DebtPlanSchema.safeParse(result.report).success).toBe(true);
        }
    });
});
