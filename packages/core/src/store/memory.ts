/**
 * In-memory transaction store.
 *
 * Reference implementation of the storage contract. Used directly in tests
 * and as the engine behind the CLI's JSON file store.
 */

import { StoredTransactionSchema, formatIssues } from '../types/index.js';
import type { StoredTransaction, TransactionRecord } from '../types/index.js';
import { addDays, formatIsoDate, localToday } from '../utils/date-parse.js';
import { baseRecordId, generateRecordId, nextAvailableId } from '../utils/record-id.js';
import type {
    BulkWriteResult,
    StoreWriteResult,
    TransactionFilter,
    TransactionStore,
} from './types.js';
import { validateRecord } from './validate.js';

export interface MemoryStoreOptions {
    /** Source of "now" for daysBack filtering. */
    clock?: () => Date;
    /** Rows to start with, e.g. loaded from disk. */
    initial?: readonly unknown[];
}

export class MemoryTransactionStore implements TransactionStore {
    private readonly rows: StoredTransaction[] = [];
    private readonly ids = new Set<string>();
    private readonly clock: () => Date;

    /**
     * @throws Error when an initial row is not a valid stored transaction
     */
    constructor(options: MemoryStoreOptions = {}) {
        this.clock = options.clock ?? (() => new Date());
        for (const [index, row] of (options.initial ?? []).entries()) {
            const parsed = StoredTransactionSchema.safeParse(row);
            if (!parsed.success) {
                throw new Error(`Invalid stored transaction at index ${index}: ${formatIssues(parsed.error)}`);
            }
            this.rows.push(parsed.data);
            this.ids.add(parsed.data.id);
        }
    }

    async addTransaction(record: TransactionRecord): Promise<StoreWriteResult> {
        return this.insert(record);
    }

    /**
     * Add many records, skipping any whose date, description, amount and
     * type already exist in the store.
     */
    async addTransactions(records: readonly TransactionRecord[]): Promise<BulkWriteResult> {
        const result: BulkWriteResult = { added: [], skipped: 0, failures: [] };
        const existing = new Set(this.rows.map((row) => baseRecordId(row.id)));

        for (const record of records) {
            const validation = validateRecord(record);
            if (!validation.ok) {
                result.failures.push(validation.reason);
                continue;
            }
            if (existing.has(generateRecordId(validation.record))) {
                result.skipped++;
                continue;
            }
            const write = this.insert(validation.record);
            if (write.ok) {
                result.added.push(write.id);
            } else {
                result.failures.push(write.reason);
            }
        }

        return result;
    }

    /**
     * @throws RangeError when daysBack is not a non-negative integer
     */
    async fetchTransactions(filter: TransactionFilter): Promise<StoredTransaction[]> {
        if (!Number.isInteger(filter.daysBack) || filter.daysBack < 0) {
            throw new RangeError(`daysBack must be a non-negative integer (got ${filter.daysBack})`);
        }
        const cutoff = formatIsoDate(addDays(localToday(this.clock()), -filter.daysBack));

        // Reverse first so that, within a day, later inserts come first after the stable sort
        return [...this.rows]
            .reverse()
            .filter((row) => row.date >= cutoff)
            .filter((row) => !filter.type || row.type === filter.type)
            .sort((a, b) => b.date.localeCompare(a.date))
            .map((row) => ({ ...row }));
    }

    /**
     * All stored rows in insertion order.
     */
    snapshot(): StoredTransaction[] {
        return this.rows.map((row) => ({ ...row }));
    }

    private insert(record: TransactionRecord): StoreWriteResult {
        const validation = validateRecord(record);
        if (!validation.ok) {
            return { ok: false, reason: validation.reason };
        }

        try {
            const id = nextAvailableId(generateRecordId(validation.record), this.ids);
            this.rows.push({ ...validation.record, id });
            this.ids.add(id);
            return { ok: true, id };
        } catch (e) {
            return { ok: false, reason: `Storage error: ${e instanceof Error ? e.message : String(e)}` };
        }
    }
}
