import type { StoredTransaction, TransactionRecord } from '@pocket-ledger/core';

export function formatAmount(amount: number, currency: string): string {
    return `${amount.toFixed(2)} ${currency}`;
}

export function formatPercent(fraction: number): string {
    return `${Math.round(fraction * 100)}%`;
}

/**
 * One line per record: date | type | amount | category | description.
 */
export function formatRecord(record: TransactionRecord | StoredTransaction): string {
    const amount = formatAmount(record.amount, record.currency).padStart(14);
    const type = record.type.padEnd(7);
    const category = `${record.mainCategory}/${record.subCategory}`.padEnd(30);
    let line = `${record.date} | ${type} | ${amount} | ${category} | ${record.description}`;
    if (record.person) line += ` (${record.person})`;
    if (record.group && record.splitRatio < 1) {
        line += ` [${record.group}, share ${formatPercent(record.splitRatio)}]`;
    }
    return line;
}
