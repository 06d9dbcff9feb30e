import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { SettingsSchema, formatIssues, type Settings } from '@pocket-ledger/shared';
import type { Workspace } from '../types.js';

/**
 * Loads config/settings.yaml. A missing or empty file yields the defaults.
 */
export function loadSettings(workspace: Workspace): Settings {
    const path = workspace.config.settingsPath;
    const data: unknown = existsSync(path) ? parse(readFileSync(path, 'utf-8')) : null;

    const result = SettingsSchema.safeParse(data ?? {});
    if (!result.success) {
        throw new Error(`Invalid settings in ${path}: ${formatIssues(result.error)}`);
    }
    return result.data;
}

/**
 * Loads a debt list from YAML, either a top-level list or { debts: [...] }.
 * Entries are validated by the debt optimizer.
 */
export function loadDebts(path: string): unknown[] {
    if (!existsSync(path)) {
        throw new Error(`Debts file not found: ${path}`);
    }
    const data: unknown = parse(readFileSync(path, 'utf-8'));
    if (data === null || data === undefined) return [];

    if (Array.isArray(data)) {
        return data;
    }
    if (typeof data === 'object' && 'debts' in data && Array.isArray(data.debts)) {
        return data.debts;
    }
    throw new Error(`Invalid YAML structure in ${path}: expected a list of debts.`);
}
