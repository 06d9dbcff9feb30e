import { isAbsolute, join } from 'node:path';
import type { Settings } from '@pocket-ledger/shared';
import type { Workspace } from '../types.js';
import { SETTINGS_FILE } from './detect.js';

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        data: join(root, 'data'),
        config: {
            settingsPath: join(root, ...SETTINGS_FILE),
        },
    };
}

/**
 * Transactions file from settings; relative paths are taken from the workspace root.
 */
export function getTransactionsPath(workspace: Workspace, settings: Settings): string {
    const file = settings.storage.transactionsFile;
    return isAbsolute(file) ? file : join(workspace.root, file);
}
