/**
 * Fixed word tables the transaction parser matches against.
 * All entries are lower-case; matching is on word boundaries.
 */

import type { TransactionType } from '../types/index.js';

export interface Verb {
    word: string;
    type: TransactionType;
}

/**
 * Action verbs, checked in this order.
 */
export const VERBS: readonly Verb[] = [
    { word: 'paid', type: 'expense' },
    { word: 'bought', type: 'expense' },
    { word: 'spent', type: 'expense' },
    { word: 'received', type: 'income' },
    { word: 'earned', type: 'income' },
    { word: 'got', type: 'income' },
];

/**
 * Relative-time phrases and their day offsets, checked in this order.
 */
export const TIME_PHRASES: readonly { phrase: string; offsetDays: number }[] = [
    { phrase: 'today', offsetDays: 0 },
    { phrase: 'yesterday', offsetDays: -1 },
    { phrase: 'tomorrow', offsetDays: 1 },
    { phrase: 'last week', offsetDays: -7 },
    { phrase: 'next week', offsetDays: 7 },
];

/**
 * Shared-expense group labels and their default head count.
 */
export const GROUP_LABELS: readonly { label: string; defaultSplit: number }[] = [
    { label: 'common', defaultSplit: 2 },
    { label: 'family', defaultSplit: 3 },
    { label: 'friends', defaultSplit: 4 },
];

/**
 * Currency words and symbols -> currency code.
 */
export const CURRENCY_TOKENS: Readonly<Record<string, string>> = {
    '₹': 'INR',
    rupee: 'INR',
    rupees: 'INR',
    rs: 'INR',
    inr: 'INR',
    '$': 'USD',
    dollar: 'USD',
    dollars: 'USD',
    usd: 'USD',
    euro: 'EUR',
    euros: 'EUR',
    eur: 'EUR',
};

// Prepositions that open an item or counterparty phrase
const PREPOSITIONS = ['for', 'on', 'of', 'from', 'worth', 'by', 'with', 'to'];

/**
 * Words never taken as an implied counterparty name.
 */
export const RESERVED_WORDS: ReadonlySet<string> = new Set([
    ...PREPOSITIONS,
    ...VERBS.map((v) => v.word),
    ...TIME_PHRASES.flatMap((t) => t.phrase.split(' ')),
    ...GROUP_LABELS.map((g) => g.label),
]);

/**
 * Build a whole-word, case-sensitive matcher for a lower-case phrase.
 */
export function wordPattern(phrase: string): RegExp {
    const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&').replace(/ /g, '\\s+');
    return new RegExp(`\\b${escaped}\\b`);
}
