import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

/** Settings file that marks a directory as a workspace root. */
export const SETTINGS_FILE = ['config', 'settings.yaml'] as const;

/**
 * Nearest directory at or above startPath that holds config/settings.yaml.
 */
export function detectWorkspaceRoot(startPath: string = process.cwd()): string | null {
    let current = resolve(startPath);
    for (;;) {
        if (existsSync(join(current, ...SETTINGS_FILE))) {
            return current;
        }
        const parent = dirname(current);
        if (parent === current) return null;
        current = parent;
    }
}
