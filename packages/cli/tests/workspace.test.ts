import { describe, it, expect, vi, afterEach } from 'vitest';
import { detectWorkspaceRoot } from '../src/workspace/detect.js';
import { resolveWorkspace, getTransactionsPath } from '../src/workspace/paths.js';
import { SettingsSchema } from '@pocket-ledger/shared';
import * as fs from 'node:fs';
import * as path from 'node:path';

// Mocking fs to avoid actual disk I/O in simple unit tests
vi.mock('node:fs');

describe('Workspace Detection', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should detect workspace root when config/settings.yaml exists', () => {
        const mockCwd = '/home/test/ledger';
        vi.spyOn(process, 'cwd').mockReturnValue(mockCwd);
        vi.mocked(fs.existsSync).mockImplementation((p) =>
            String(p) === path.join(mockCwd, 'config', 'settings.yaml')
        );

        expect(detectWorkspaceRoot()).toBe(mockCwd);
    });

    it('should bubble up to a parent workspace', () => {
        vi.mocked(fs.existsSync).mockImplementation((p) =>
            String(p) === path.join('/home/test', 'config', 'settings.yaml')
        );

        expect(detectWorkspaceRoot('/home/test/ledger/data')).toBe('/home/test');
    });

    it('should return null if no workspace is found in parents', () => {
        vi.spyOn(process, 'cwd').mockReturnValue('/');
        vi.mocked(fs.existsSync).mockReturnValue(false);

        expect(detectWorkspaceRoot()).toBeNull();
    });
});

describe('Path Resolution', () => {
    const root = '/work';
    const workspace = resolveWorkspace(root);

    it('should resolve standard paths correctly', () => {
        expect(workspace.root).toBe(root);
        expect(workspace.data).toBe(path.join(root, 'data'));
        expect(workspace.config.settingsPath).toBe(path.join(root, 'config', 'settings.yaml'));
    });

    it('should resolve the transactions file against the root', () => {
        const settings = SettingsSchema.parse({});
        expect(getTransactionsPath(workspace, settings)).toBe(path.join(root, 'data/transactions.json'));
    });

    it('should keep an absolute transactions file as is', () => {
        const settings = SettingsSchema.parse({ storage: { transactionsFile: '/srv/ledger.json' } });
        expect(getTransactionsPath(workspace, settings)).toBe('/srv/ledger.json');
    });
});
