import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { run } from '../src/cli.js';
import * as add from '../src/commands/add.js';
import * as debts from '../src/commands/debts.js';
import * as emergency from '../src/commands/emergency.js';
import * as history from '../src/commands/history.js';
import * as invest from '../src/commands/invest.js';
import * as overview from '../src/commands/overview.js';
import * as savings from '../src/commands/savings.js';

vi.mock('../src/commands/add.js');
vi.mock('../src/commands/debts.js');
vi.mock('../src/commands/emergency.js');
vi.mock('../src/commands/forecast.js');
vi.mock('../src/commands/history.js');
vi.mock('../src/commands/init.js');
vi.mock('../src/commands/invest.js');
vi.mock('../src/commands/overview.js');
vi.mock('../src/commands/savings.js');

describe('run', () => {
    beforeEach(() => {
        vi.clearAllMocks();
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
        vi.spyOn(process, 'exit').mockImplementation(() => { throw new Error('exit'); });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should print usage without a command', async () => {
        await run([]);
        expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Usage: pocket-ledger <command> [options]'));
    });

    it('should join the add text and pass --dry-run', async () => {
        await run(['add', 'paid', '20', 'rupees', 'for', 'tea', '--dry-run']);
        expect(add.addTransactions).toHaveBeenCalledWith('paid 20 rupees for tea', {
            workspace: undefined,
            verbose: false,
            dryRun: true,
        });
    });

    it('should parse numeric history flags', async () => {
        await run(['history', '--days', '30', '--type', 'income', '-w', '/ledger']);
        expect(history.showHistory).toHaveBeenCalledWith({
            workspace: '/ledger',
            verbose: false,
            days: 30,
            type: 'income',
        });
    });

    it('should pass the overview month', async () => {
        await run(['overview', '--month', '2026-03']);
        expect(overview.showOverview).toHaveBeenCalledWith({
            workspace: undefined,
            verbose: false,
            month: '2026-03',
        });
    });

    it('should default the debt method to avalanche', async () => {
        await run(['debts', 'debts.yaml']);
        expect(debts.planDebts).toHaveBeenCalledWith('debts.yaml', {
            workspace: undefined,
            verbose: false,
            method: 'avalanche',
        });
    });

    it('should pass savings amounts as numbers', async () => {
        await run(['savings', '--current', '1000', '--goal', '7000', '--months', '12', '--income', '5000', '--seed', '7']);
        expect(savings.planSavings).toHaveBeenCalledWith({
            workspace: undefined,
            verbose: false,
            current: 1000,
            goal: 7000,
            months: 12,
            income: 5000,
            seed: 7,
        });
    });

    it('should default emergency stability and dependents', async () => {
        await run(['emergency']);
        expect(emergency.adviseEmergencyFund).toHaveBeenCalledWith({
            workspace: undefined,
            verbose: false,
            stability: 'stable',
            dependents: 0,
            days: undefined,
        });
    });

    it('should pass the invest profile through', async () => {
        await run(['invest', '--risk', 'moderate', '--horizon', '5']);
        expect(invest.suggestAllocation).toHaveBeenCalledWith({
            workspace: undefined,
            verbose: false,
            risk: 'moderate',
            horizon: 5,
        });
    });

    it('should exit on a missing required flag', async () => {
        await expect(run(['savings', '--current', '1000'])).rejects.toThrow('exit');
        expect(console.error).toHaveBeenCalledWith('\n✖ Error: --goal is required.');
    });

    it('should exit on a non-numeric flag', async () => {
        await expect(run(['history', '--days', 'ten'])).rejects.toThrow('exit');
        expect(console.error).toHaveBeenCalledWith('\n✖ Error: --days must be a number (got "ten").');
    });

    it('should exit on an invalid method', async () => {
        await expect(run(['debts', 'debts.yaml', '--method', 'random'])).rejects.toThrow('exit');
        expect(debts.planDebts).not.toHaveBeenCalled();
    });

    it('should exit on an unknown command', async () => {
        await expect(run(['frobnicate'])).rejects.toThrow('exit');
        expect(console.error).toHaveBeenCalledWith('\n✖ Error: Unknown command "frobnicate". Run with --help for usage.');
    });
});
