import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MemoryTransactionStore } from '@pocket-ledger/core';
import { SettingsSchema } from '@pocket-ledger/shared';
import { addTransactions } from '../src/commands/add.js';
import * as open from '../src/workspace/open.js';
import * as storeOpen from '../src/store/open.js';
import { resolveWorkspace } from '../src/workspace/paths.js';

vi.mock('../src/workspace/open.js');
vi.mock('../src/store/open.js');

describe('add command', () => {
    let store: MemoryTransactionStore;

    beforeEach(() => {
        vi.clearAllMocks();
        store = new MemoryTransactionStore();

        vi.mocked(open.openWorkspace).mockReturnValue({
            workspace: resolveWorkspace('/mock/root'),
            settings: SettingsSchema.parse({}),
        });
        vi.mocked(storeOpen.openStore).mockResolvedValue(store);
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
        vi.spyOn(process, 'exit').mockImplementation(() => { throw new Error('exit'); });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should save parsed transactions', async () => {
        await addTransactions('paid 20 rupees for panipuris', { dryRun: false });

        const rows = store.snapshot();
        expect(rows).toHaveLength(1);
        expect(rows[0]).toMatchObject({ amount: 20, type: 'expense', mainCategory: 'Food' });
        expect(console.log).toHaveBeenCalledWith('✓ Transactions processed: 1 saved.');
    });

    it('should not open the store on a dry run', async () => {
        await addTransactions('paid 20 rupees for panipuris', { dryRun: true });

        expect(storeOpen.openStore).not.toHaveBeenCalled();
        expect(console.log).toHaveBeenCalledWith('\n[DRY RUN] 1 transaction(s) parsed, nothing saved.');
    });

    it('should warn about skipped clauses', async () => {
        await addTransactions('paid 100 for sabji and for tea', { dryRun: false });

        expect(store.snapshot()).toHaveLength(1);
        expect(console.warn).toHaveBeenCalledWith('⚠️  No amount found in clause: "for tea"');
        expect(console.log).toHaveBeenCalledWith('✓ Transactions processed: 1 saved, 1 skipped.');
    });

    it('should exit when nothing parses', async () => {
        await expect(addTransactions('hello there', { dryRun: false })).rejects.toThrow('exit');

        expect(store.snapshot()).toEqual([]);
        expect(console.error).toHaveBeenCalledWith('\n✖ Error: No transactions processed');
    });

    it('should exit on empty text before opening the workspace', async () => {
        await expect(addTransactions('   ', { dryRun: false })).rejects.toThrow('exit');

        expect(open.openWorkspace).not.toHaveBeenCalled();
    });
});
