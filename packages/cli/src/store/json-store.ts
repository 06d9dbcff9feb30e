import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
    MemoryTransactionStore,
    type StoredTransaction,
    type StoreWriteResult,
    type TransactionFilter,
    type TransactionRecord,
    type TransactionStore,
} from '@pocket-ledger/core';

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Transaction store kept as a JSON array on disk.
 *
 * Rows are held in a MemoryTransactionStore and the whole file is rewritten
 * after every successful add.
 */
export class JsonFileTransactionStore implements TransactionStore {
    private constructor(
        private readonly filePath: string,
        private readonly memory: MemoryTransactionStore
    ) {}

    /**
     * Opens the store; a missing file is an empty store.
     *
     * @throws Error when the file is not a JSON array of stored transactions
     */
    static async open(filePath: string, clock?: () => Date): Promise<JsonFileTransactionStore> {
        let initial: unknown = [];
        try {
            initial = JSON.parse(await readFile(filePath, 'utf8'));
        } catch (err) {
            if (!isMissingFile(err)) {
                throw new Error(`Could not read ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
            }
        }
        if (!Array.isArray(initial)) {
            throw new Error(`Invalid transactions file ${filePath}: expected a JSON array.`);
        }
        return new JsonFileTransactionStore(filePath, new MemoryTransactionStore({ initial, clock }));
    }

    async addTransaction(record: TransactionRecord): Promise<StoreWriteResult> {
        const result = await this.memory.addTransaction(record);
        if (!result.ok) return result;

        try {
            await this.flush();
        } catch (err) {
            return { ok: false, reason: `Storage error: ${err instanceof Error ? err.message : String(err)}` };
        }
        return result;
    }

    async fetchTransactions(filter: TransactionFilter): Promise<StoredTransaction[]> {
        return this.memory.fetchTransactions(filter);
    }

    /**
     * Writes the current rows (creating the data directory if needed).
     */
    async flush(): Promise<void> {
        await mkdir(dirname(this.filePath), { recursive: true });
        await writeFile(this.filePath, `${JSON.stringify(this.memory.snapshot(), null, 2)}\n`);
    }
}
