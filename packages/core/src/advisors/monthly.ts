import { HistoryEntrySchema, formatIssues } from '../types/index.js';
import { monthKey, monthRange } from '../utils/date-parse.js';

/**
 * Validate history rows and bucket amounts into calendar months.
 *
 * Buckets run contiguously from the earliest to the latest month present;
 * months without rows total 0.
 *
 * @throws Error when history is empty or a row lacks a valid date or amount
 */
export function monthlyTotals(history: readonly unknown[], emptyMessage: string): number[] {
    if (history.length === 0) {
        throw new Error(emptyMessage);
    }

    const parsed = HistoryEntrySchema.array().safeParse(history);
    if (!parsed.success) {
        throw new Error(`${emptyMessage}: ${formatIssues(parsed.error)}`);
    }

    const totals = new Map<string, number>();
    for (const entry of parsed.data) {
        const key = monthKey(entry.date);
        totals.set(key, (totals.get(key) ?? 0) + entry.amount);
    }

    const keys = [...totals.keys()].sort();
    return monthRange(keys[0], keys[keys.length - 1]).map((key) => totals.get(key) ?? 0);
}
