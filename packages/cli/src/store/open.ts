import type { TransactionStore } from '@pocket-ledger/core';
import type { Settings } from '@pocket-ledger/shared';
import { fail } from '../utils/console.js';
import { getTransactionsPath } from '../workspace/paths.js';
import type { Workspace } from '../types.js';
import { JsonFileTransactionStore } from './json-store.js';

export async function openStore(workspace: Workspace, settings: Settings): Promise<TransactionStore> {
    try {
        return await JsonFileTransactionStore.open(getTransactionsPath(workspace, settings));
    } catch (err) {
        fail(`Failed to open transactions. ${err instanceof Error ? err.message : String(err)}`);
    }
}
