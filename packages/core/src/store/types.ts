/**
 * Storage contract consumed by the engine.
 *
 * The engine never knows how records are kept; it hands finished records
 * to addTransaction and reads history back through fetchTransactions.
 */

import type { StoredTransaction, TransactionRecord, TransactionType } from '../types/index.js';

export interface TransactionFilter {
    /** Only records dated within this many days before today. */
    daysBack: number;
    type?: TransactionType;
}

/**
 * Outcome of a single write. Validation failures and storage faults
 * share the same failure channel.
 */
export type StoreWriteResult =
    | { ok: true; id: string }
    | { ok: false; reason: string };

/**
 * Outcome of a bulk write.
 */
export interface BulkWriteResult {
    added: string[];
    /** Records already present (same date, description, amount and type). */
    skipped: number;
    failures: string[];
}

export interface TransactionStore {
    addTransaction(record: TransactionRecord): Promise<StoreWriteResult>;
    /** Most recent first. */
    fetchTransactions(filter: TransactionFilter): Promise<StoredTransaction[]>;
}
