import { parseArgs } from 'node:util';
import {
    IncomeStabilitySchema,
    PayoffMethodSchema,
    TransactionTypeSchema,
    type IncomeStability,
    type PayoffMethod,
    type TransactionType,
} from '@pocket-ledger/shared';
import { addTransactions } from './commands/add.js';
import { planDebts } from './commands/debts.js';
import { adviseEmergencyFund } from './commands/emergency.js';
import { forecastExpenses } from './commands/forecast.js';
import { showHistory } from './commands/history.js';
import { initWorkspace } from './commands/init.js';
import { suggestAllocation } from './commands/invest.js';
import { showOverview } from './commands/overview.js';
import { planSavings } from './commands/savings.js';
import { fail, log, setVerbose } from './utils/console.js';

const USAGE = `Pocket Ledger - natural-language expense tracking and money advice

Usage: pocket-ledger <command> [options]

Commands:
  init                                   Create config/settings.yaml and an empty store
  add "<text>" [--dry-run]               Record transactions, e.g. add "paid 20 rupees for panipuris"
  history [--days N] [--type T]          List stored transactions (T: income | expense)
  overview [--month YYYY-MM]             Recent transactions, spending by category, forecast
  forecast [--window N] [--confidence C] [--days N]
                                         Forecast next month's expenses
  debts <file.yaml> [--method M]         Debt payoff plan (M: avalanche | snowball | compare)
  savings --current X --goal Y --months N --income Z [--seed S]
                                         Monthly savings plan for a goal
  emergency [--stability S] [--dependents N] [--days N]
                                         Emergency fund range (S: stable | variable)
  invest --risk P --horizon YEARS        Asset allocation (P: conservative | moderate | aggressive)

Options:
  -w, --workspace <dir>                  Workspace root (default: search upward from cwd)
  -v, --verbose                          Print debug output
  -h, --help                             Show this help`;

function numberFlag(raw: string | undefined, name: string): number | undefined {
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(value)) {
        fail(`--${name} must be a number (got "${raw}").`);
    }
    return value;
}

function integerFlag(raw: string | undefined, name: string): number | undefined {
    const value = numberFlag(raw, name);
    if (value !== undefined && !Number.isInteger(value)) {
        fail(`--${name} must be a whole number (got "${raw}").`);
    }
    return value;
}

function required<T>(value: T | undefined, name: string): T {
    if (value === undefined) {
        fail(`--${name} is required.`);
    }
    return value;
}

function transactionTypeFlag(raw: string | undefined): TransactionType | undefined {
    if (raw === undefined) return undefined;
    const parsed = TransactionTypeSchema.safeParse(raw);
    if (!parsed.success) fail(`--type must be "income" or "expense" (got "${raw}").`);
    return parsed.data;
}

function methodFlag(raw: string | undefined): PayoffMethod | 'compare' {
    if (raw === undefined || raw === 'compare') return raw ?? 'avalanche';
    const parsed = PayoffMethodSchema.safeParse(raw);
    if (!parsed.success) fail(`--method must be "avalanche", "snowball" or "compare" (got "${raw}").`);
    return parsed.data;
}

function stabilityFlag(raw: string | undefined): IncomeStability {
    const parsed = IncomeStabilitySchema.safeParse(raw ?? 'stable');
    if (!parsed.success) fail(`--stability must be "stable" or "variable" (got "${raw}").`);
    return parsed.data;
}

function parseCommandLine(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            allowPositionals: true,
            options: {
                'dry-run': { type: 'boolean', default: false },
                days: { type: 'string' },
                month: { type: 'string' },
                type: { type: 'string' },
                window: { type: 'string' },
                confidence: { type: 'string' },
                method: { type: 'string' },
                current: { type: 'string' },
                goal: { type: 'string' },
                months: { type: 'string' },
                income: { type: 'string' },
                seed: { type: 'string' },
                stability: { type: 'string' },
                dependents: { type: 'string' },
                risk: { type: 'string' },
                horizon: { type: 'string' },
                workspace: { type: 'string', short: 'w' },
                verbose: { type: 'boolean', short: 'v', default: false },
                help: { type: 'boolean', short: 'h', default: false },
            },
        });
    } catch (err) {
        fail(err instanceof Error ? err.message : String(err));
    }
}

/**
 * Parses argv (without the node and script entries) and runs one command.
 */
export async function run(argv: string[]): Promise<void> {
    const { values, positionals } = parseCommandLine(argv);
    const [command, ...rest] = positionals;
    const common = { workspace: values.workspace, verbose: values.verbose };
    setVerbose(values.verbose ?? false);

    if (values.help || !command) {
        log(USAGE);
        return;
    }

    switch (command) {
        case 'init':
            return initWorkspace(common);
        case 'add':
            return addTransactions(rest.join(' '), { ...common, dryRun: values['dry-run'] ?? false });
        case 'history':
            return showHistory({
                ...common,
                days: integerFlag(values.days, 'days'),
                type: transactionTypeFlag(values.type),
            });
        case 'overview':
            return showOverview({ ...common, month: values.month });
        case 'forecast':
            return forecastExpenses({
                ...common,
                window: integerFlag(values.window, 'window'),
                confidence: numberFlag(values.confidence, 'confidence'),
                days: integerFlag(values.days, 'days'),
            });
        case 'debts': {
            const file = rest[0];
            if (!file) fail('debts needs a YAML file, e.g. debts debts.yaml');
            return planDebts(file, { ...common, method: methodFlag(values.method) });
        }
        case 'savings':
            return planSavings({
                ...common,
                current: required(numberFlag(values.current, 'current'), 'current'),
                goal: required(numberFlag(values.goal, 'goal'), 'goal'),
                months: required(integerFlag(values.months, 'months'), 'months'),
                income: required(numberFlag(values.income, 'income'), 'income'),
                seed: integerFlag(values.seed, 'seed'),
            });
        case 'emergency':
            return adviseEmergencyFund({
                ...common,
                stability: stabilityFlag(values.stability),
                dependents: integerFlag(values.dependents, 'dependents') ?? 0,
                days: integerFlag(values.days, 'days'),
            });
        case 'invest':
            return suggestAllocation({
                ...common,
                risk: required(values.risk, 'risk'),
                horizon: required(numberFlag(values.horizon, 'horizon'), 'horizon'),
            });
        default:
            fail(`Unknown command "${command}". Run with --help for usage.`);
    }
}
