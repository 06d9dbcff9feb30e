/**
 * Monthly spending breakdown by main category.
 */

import type { CategoryTotal, SpendingSummary, TransactionRecord } from '../types/index.js';
import { monthKey } from '../utils/date-parse.js';
import { round2 } from './stats.js';
import { advisoryError } from './types.js';
import type { AdvisoryResult } from './types.js';

const MONTH_KEY = /^\d{4}-(0[1-9]|1[0-2])$/;

export type SpendingRow = Pick<TransactionRecord, 'date' | 'amount' | 'type' | 'mainCategory'>;

/**
 * Expense totals per main category for one calendar month (YYYY-MM).
 *
 * Income rows and rows dated outside the month are ignored. Categories
 * are ordered by total, largest first, then by name.
 */
export function summarizeSpending(
    rows: readonly SpendingRow[],
    month: string
): AdvisoryResult<SpendingSummary> {
    try {
        if (!MONTH_KEY.test(month)) {
            throw new Error(`Month must be YYYY-MM (got "${month}")`);
        }

        const totals = new Map<string, number>();
        for (const row of rows) {
            if (row.type !== 'expense' || monthKey(row.date) !== month) continue;
            totals.set(row.mainCategory, (totals.get(row.mainCategory) ?? 0) + row.amount);
        }

        const categories: CategoryTotal[] = [...totals]
            .map(([mainCategory, total]) => ({ mainCategory, total: round2(total) }))
            .sort((a, b) => b.total - a.total || a.mainCategory.localeCompare(b.mainCategory));

        const total = round2([...totals.values()].reduce((sum, value) => sum + value, 0));
        return { ok: true, report: { month, categories, total } };
    } catch (e) {
        return advisoryError(e);
    }
}
