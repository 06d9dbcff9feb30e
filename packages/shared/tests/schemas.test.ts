import { describe, it, expect } from 'vitest';
import {
    TransactionRecordSchema,
    StoredTransactionSchema,
    DebtSchema,
    SettingsSchema,
    InvestmentStrategySchema,
    formatIssues,
} from '../src/schemas.js';

describe('TransactionRecordSchema', () => {
    const validRecord = {
        date: '2026-03-14',
        description: 'Lunch with Ravi',
        amount: 250,
        mainCategory: 'Food',
        subCategory: 'restaurants',
        type: 'expense',
        person: 'Ravi',
    };

    it('validates a record and fills defaults', () => {
        const result = TransactionRecordSchema.safeParse(validRecord);
        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.data.currency).toBe('INR');
            expect(result.data.splitRatio).toBe(1);
            expect(result.data.group).toBeUndefined();
        }
    });

    it('rejects a zero amount', () => {
        const result = TransactionRecordSchema.safeParse({ ...validRecord, amount: 0 });
        expect(result.success).toBe(false);
    });

    it('rejects invalid date format', () => {
        const result = TransactionRecordSchema.safeParse({ ...validRecord, date: '14/03/2026' });
        expect(result.success).toBe(false);
    });

    it('rejects lower-case currency', () => {
        const result = TransactionRecordSchema.safeParse({ ...validRecord, currency: 'inr' });
        expect(result.success).toBe(false);
    });

    it('rejects a split ratio above 1', () => {
        const result = TransactionRecordSchema.safeParse({ ...validRecord, splitRatio: 1.5 });
        expect(result.success).toBe(false);
    });

    it('rejects unknown transaction type', () => {
        const result = TransactionRecordSchema.safeParse({ ...validRecord, type: 'transfer' });
        expect(result.success).toBe(false);
    });
});

describe('StoredTransactionSchema', () => {
    const stored = {
        id: 'a1b2c3d4e5f67890',
        date: '2026-03-14',
        description: 'salary',
        amount: 50000,
        mainCategory: 'Employment',
        subCategory: 'salary',
        type: 'income',
    };

    it('accepts an id with collision suffix', () => {
        const result = StoredTransactionSchema.safeParse({ ...stored, id: 'a1b2c3d4e5f67890-02' });
        expect(result.success).toBe(true);
    });

    it('rejects a short id', () => {
        const result = StoredTransactionSchema.safeParse({ ...stored, id: 'tooshort' });
        expect(result.success).toBe(false);
    });
});

describe('DebtSchema', () => {
    it('accepts a zero rate', () => {
        expect(DebtSchema.safeParse({ balance: 100, annualRate: 0, minPayment: 10 }).success).toBe(true);
    });

    it('rejects a negative balance', () => {
        expect(DebtSchema.safeParse({ balance: -1, annualRate: 0.1, minPayment: 10 }).success).toBe(false);
    });
});

describe('InvestmentStrategySchema', () => {
    it('rejects a share above 100', () => {
        const result = InvestmentStrategySchema.safeParse({ stocks: 110, bonds: 0, gold: 0, cash: 0, rules: [] });
        expect(result.success).toBe(false);
    });
});

describe('SettingsSchema', () => {
    it('defaults every field from an empty object', () => {
        expect(SettingsSchema.parse({})).toEqual({
            currency: 'INR',
            storage: { transactionsFile: 'data/transactions.json' },
            forecast: { windowSize: 3, confidenceLevel: 0.95, daysBack: 365 },
            emergencyFund: { minMonths: 3, maxMonths: 6 },
            savings: { annualReturn: 0.07, annualVolatility: 0.15 },
        });
    });

    it('keeps sibling defaults when one nested field is set', () => {
        const settings = SettingsSchema.parse({ forecast: { windowSize: 6 } });
        expect(settings.forecast).toEqual({ windowSize: 6, confidenceLevel: 0.95, daysBack: 365 });
    });

    it('rejects a confidence level of 1', () => {
        expect(SettingsSchema.safeParse({ forecast: { confidenceLevel: 1 } }).success).toBe(false);
    });
});

describe('formatIssues', () => {
    it('prefixes each message with its path', () => {
        const result = TransactionRecordSchema.safeParse({
            date: '2026-03-14',
            description: 'x',
            amount: -5,
            mainCategory: 'Food',
            subCategory: 'groceries',
            type: 'expense',
        });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(formatIssues(result.error)).toBe('amount: Amount must be a positive number');
        }
    });

    it('joins several issues with semicolons', () => {
        const result = DebtSchema.safeParse({ balance: -1, annualRate: -1, minPayment: 0 });
        if (result.success) throw new Error('expected failure');
        expect(formatIssues(result.error)).toBe(
            'balance: Number must be greater than or equal to 0; annualRate: Number must be greater than or equal to 0'
        );
    });
});
