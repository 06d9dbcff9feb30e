import { describe, it, expect } from 'vitest';
import { parse, segmentClauses, summarizeParse, describeParseError } from '../../src/parser/parse.js';
import { ParseErrorSchema, ParseStatusSchema, ParseSummarySchema } from '../../src/types/index.js';
import type { ParseEntry } from '../../src/parser/types.js';
import type { TransactionRecord } from '../../src/types/index.js';

const today = new Date(Date.UTC(2026, 2, 15));

function records(entries: ParseEntry[]): TransactionRecord[] {
    return entries.flatMap((e) => (e.kind === 'transaction' ? [e.record] : []));
}

describe('segmentClauses', () => {
    it('should lowercase and split on "and"', () => {
        expect(segmentClauses('  Paid 20 for tea AND 30 for coffee ')).toEqual([
            'paid 20 for tea',
            '30 for coffee',
        ]);
    });

    it('should not split inside words', () => {
        expect(segmentClauses('paid 20 for candles')).toEqual(['paid 20 for candles']);
    });
});

describe('parse', () => {
    it('should parse two expense clauses sharing a verb', () => {
        const entries = parse('paid 20 rupees for panipuris and 50 rupees for a movie ticket', { today });

        expect(entries).toHaveLength(2);
        expect(records(entries)).toEqual([
            {
                date: '2026-03-15',
                description: 'panipuris',
                amount: 20,
                currency: 'INR',
                mainCategory: 'Food',
                subCategory: 'panipuris',
                type: 'expense',
                splitRatio: 1,
            },
            {
                date: '2026-03-15',
                description: 'a movie ticket',
                amount: 50,
                currency: 'INR',
                mainCategory: 'Personal',
                subCategory: 'movie ticket',
                type: 'expense',
                splitRatio: 1,
            },
        ]);
    });

    it('should parse income with a counterparty', () => {
        const entries = parse('received 200 from deepak', { today });

        expect(records(entries)).toEqual([
            {
                date: '2026-03-15',
                description: 'deepak',
                amount: 200,
                currency: 'INR',
                mainCategory: 'Other',
                subCategory: 'reimbursement',
                type: 'income',
                person: 'Deepak',
                splitRatio: 1,
            },
        ]);
    });

    it('should use an absolute date over the reference day', () => {
        const [entry] = parse('paid 500 on 15-11-2023 for rent', { today });

        expect(entry.kind).toBe('transaction');
        if (entry.kind === 'transaction') {
            expect(entry.record.date).toBe('2023-11-15');
            expect(entry.record.amount).toBe(500);
            expect(entry.record.mainCategory).toBe('Housing');
            expect(entry.record.subCategory).toBe('rent');
        }
    });

    it('should resolve relative dates', () => {
        const [entry] = parse('yesterday paid 30 for tea', { today });
        expect(entry.kind === 'transaction' && entry.record.date).toBe('2026-03-14');
    });

    it('should split shared expenses', () => {
        const [entry] = parse('paid 900 for dinner with friends', { today });
        expect(entry.kind === 'transaction' && entry.record).toMatchObject({
            amount: 900,
            description: 'dinner',
            group: 'friends',
            splitRatio: 0.25,
        });
    });

    it('should take the currency from the text, else the default', () => {
        const [usd] = parse('spent $15 on coffee', { today });
        expect(usd.kind === 'transaction' && usd.record.currency).toBe('USD');

        const [eur] = parse('paid 15 for coffee', { today, defaultCurrency: 'EUR' });
        expect(eur.kind === 'transaction' && eur.record.currency).toBe('EUR');
    });

    it('should classify an item wrapped in other words', () => {
        const [bill] = parse('paid 2000 for the credit card bill', { today });
        expect(bill.kind === 'transaction' && bill.record).toMatchObject({
            description: 'the credit card bill',
            mainCategory: 'Debt',
            subCategory: 'credit card',
        });

        const [refund] = parse('received 5000 of my tax refund', { today });
        expect(refund.kind === 'transaction' && refund.record).toMatchObject({
            description: 'my tax refund',
            mainCategory: 'Government',
            subCategory: 'tax refund',
        });
    });

    it('should not invent a counterparty for a clause opening with a preposition', () => {
        const entries = parse('paid 20 for tea and for coffee 30', { today });
        expect(entries).toHaveLength(2);
        const [, second] = entries;
        expect(second.kind).toBe('transaction');
        if (second.kind === 'transaction') {
            expect(second.record.amount).toBe(30);
            expect(second.record.person).toBeUndefined();
        }
    });

    it('should give the type fallback when there is no item', () => {
        const [entry] = parse('paid 300 rupees to ramesh', { today });
        expect(entry.kind === 'transaction' && entry.record).toMatchObject({
            description: '300 rupees to ramesh',
            mainCategory: 'Miscellaneous',
            subCategory: 'unexpected',
        });
    });

    it('should report a clause without an amount', () => {
        expect(parse('paid for tea', { today })).toEqual([
            { kind: 'error', error: { clause: 'paid for tea', reason: 'No amount found' } },
        ]);
    });

    it('should report a clause without a verb', () => {
        expect(parse('hello there', { today })).toEqual([
            { kind: 'error', error: { clause: 'hello there', reason: 'No action found' } },
        ]);
    });

    it('should reject a zero amount through record validation', () => {
        expect(parse('paid 0 for tea', { today })).toEqual([
            { kind: 'error', error: { clause: 'paid 0 for tea', reason: 'amount: Amount must be a positive number' } },
        ]);
    });

    it('should turn an extractor failure into an error entry', () => {
        const [entry] = parse('paid 900 for dinner with family 0 people', { today });
        expect(entry.kind).toBe('error');
        if (entry.kind === 'error') {
            expect(entry.error.reason).toBe('Group split needs at least 1 person (got 0)');
        }
    });

    it('should keep one entry per clause', () => {
        const entries = parse('paid 10 for tea and paid 20 for coffee and nothing more', { today });
        expect(entries.map((e) => e.kind)).toEqual(['transaction', 'transaction', 'error']);
    });

    it('should never return an empty list', () => {
        expect(parse('', { today })).toHaveLength(1);
    });

    it('should return frozen records', () => {
        const [entry] = parse('paid 10 for tea', { today });
        expect(entry.kind === 'transaction' && Object.isFrozen(entry.record)).toBe(true);
    });
});

describe('summarizeParse', () => {
    it('should report success when every clause parsed', () => {
        const summary = summarizeParse(parse('paid 10 for tea', { today }));
        expect(summary.status).toBe('success');
        expect(summary.errors).toEqual([]);
        expect(summary.message).toBe('Transactions processed');
    });

    it('should report partial when records and errors mix', () => {
        const summary = summarizeParse(parse('paid 100 for sabji and for tea', { today }));
        expect(summary.status).toBe('partial');
        expect(summary.transactions).toHaveLength(1);
        expect(summary.errors).toEqual(['No amount found in clause: "for tea"']);
    });

    it('should report error when nothing parsed', () => {
        const summary = summarizeParse(parse('hello there', { today }));
        expect(summary.status).toBe('error');
        expect(summary.transactions).toEqual([]);
        expect(summary.message).toBe('No transactions processed');
    });
});

describe('describeParseError', () => {
    it('should name the reason and the clause', () => {
        expect(describeParseError({ clause: 'for tea', reason: 'No amount found' }))
            .toBe('No amount found in clause: "for tea"');
    });
});

describe('parse summary shape', () => {
    it('should satisfy the summary schema for every status', () => {
        const utterances = ['paid 10 for tea', 'paid 100 for sabji and for tea', 'hello there'];
        const statuses = utterances.map((utterance) => {
            const summary = summarizeParse(parse(utterance, { today }));
            expect(ParseSummarySchema.safeParse(summary).success).toBe(true);
            expect(ParseStatusSchema.safeParse(summary.status).success).toBe(true);
            return summary.status;
        });
        expect(statuses).toEqual(['success', 'partial', 'error']);
    });

    it('should produce error entries that satisfy the error schema', () => {
        const entries = parse('paid for tea and hello there and paid 0 for tea', { today });
        const errors = entries.flatMap((entry) => (entry.kind === 'error' ? [entry.error] : []));
        expect(errors).toHaveLength(3);
        for (const error of errors) {
            expect(ParseErrorSchema.safeParse(error).success).toBe(true);
        }
    });
});
