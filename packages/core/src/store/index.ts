/**
 * Storage contract and the in-memory reference store.
 */

export { MemoryTransactionStore } from './memory.js';
export type { MemoryStoreOptions } from './memory.js';
export { validateRecord } from './validate.js';
export type { RecordValidation } from './validate.js';
export type {
    TransactionStore,
    TransactionFilter,
    StoreWriteResult,
    BulkWriteResult,
} from './types.js';
