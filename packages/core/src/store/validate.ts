import { TransactionRecordSchema, formatIssues } from '../types/index.js';
import type { TransactionRecord } from '../types/index.js';

export type RecordValidation =
    | { ok: true; record: TransactionRecord }
    | { ok: false; reason: string };

/**
 * Check a record before it is stored: required fields present,
 * amount positive, type income or expense.
 */
export function validateRecord(input: unknown): RecordValidation {
    const parsed = TransactionRecordSchema.safeParse(input);
    if (!parsed.success) {
        return { ok: false, reason: formatIssues(parsed.error) };
    }
    return { ok: true, record: parsed.data };
}
