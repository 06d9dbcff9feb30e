import { SettingsSchema, type Settings } from '@pocket-ledger/shared';
import { fail } from '../utils/console.js';
import type { Workspace } from '../types.js';
import { loadSettings } from './config.js';
import { SETTINGS_FILE, detectWorkspaceRoot } from './detect.js';
import { resolveWorkspace } from './paths.js';

export interface OpenedWorkspace {
    workspace: Workspace;
    settings: Settings;
}

/**
 * Locates the workspace and loads its settings, exiting when either fails.
 */
export function openWorkspace(explicitRoot?: string): OpenedWorkspace {
    const root = explicitRoot || detectWorkspaceRoot();
    if (!root) {
        fail(`Workspace not found. Run "pocket-ledger init" first.\nExpected "${SETTINGS_FILE.join('/')}" in the workspace root.`);
    }
    const workspace = resolveWorkspace(root);
    try {
        return { workspace, settings: loadSettings(workspace) };
    } catch (err) {
        fail(err instanceof Error ? err.message : String(err));
    }
}

/**
 * Settings of the current workspace, or the defaults outside one.
 */
export function settingsOrDefaults(explicitRoot?: string): Settings {
    const root = explicitRoot || detectWorkspaceRoot();
    return root ? openWorkspace(root).settings : SettingsSchema.parse({});
}
