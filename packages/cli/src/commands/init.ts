import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { JsonFileTransactionStore } from '../store/json-store.js';
import { writeDefaultSettings } from '../yaml/settings.js';
import { loadSettings } from '../workspace/config.js';
import { getTransactionsPath, resolveWorkspace } from '../workspace/paths.js';
import { arrow, fail, log, success } from '../utils/console.js';
import type { CommonOptions } from '../types.js';

export async function initWorkspace(options: CommonOptions): Promise<void> {
    const workspace = resolveWorkspace(resolve(options.workspace ?? process.cwd()));
    log(`\nInitializing workspace in ${workspace.root}`);

    try {
        const written = await writeDefaultSettings(workspace.config.settingsPath);
        if (written.created) {
            success(`Created ${workspace.config.settingsPath}`);
        } else if (written.added.length > 0) {
            success(`Updated ${workspace.config.settingsPath}`);
            for (const field of written.added) arrow(`Added ${field}`);
        } else {
            arrow(`Settings already complete: ${workspace.config.settingsPath}`);
        }

        const transactionsPath = getTransactionsPath(workspace, loadSettings(workspace));
        if (existsSync(transactionsPath)) {
            arrow(`Transactions file exists: ${transactionsPath}`);
        } else {
            const store = await JsonFileTransactionStore.open(transactionsPath);
            await store.flush();
            success(`Created ${transactionsPath}`);
        }
    } catch (err) {
        fail(`Failed to initialize workspace. ${err instanceof Error ? err.message : String(err)}`);
    }
}
