/**
 * Pocket Ledger CLI - Core Types
 */

import type { IncomeStability, PayoffMethod, TransactionType } from '@pocket-ledger/shared';

export interface CommonOptions {
    workspace?: string;
    verbose?: boolean;
}

export interface AddOptions extends CommonOptions {
    dryRun: boolean;
}

export interface HistoryOptions extends CommonOptions {
    days?: number;
    type?: TransactionType;
}

export interface OverviewOptions extends CommonOptions {
    /** Calendar month to break down, YYYY-MM. Defaults to the current month. */
    month?: string;
}

export interface ForecastCommandOptions extends CommonOptions {
    window?: number;
    confidence?: number;
    days?: number;
}

export interface DebtsOptions extends CommonOptions {
    method: PayoffMethod | 'compare';
}

export interface SavingsCommandOptions extends CommonOptions {
    current: number;
    goal: number;
    months: number;
    income: number;
    seed?: number;
}

export interface EmergencyOptions extends CommonOptions {
    stability: IncomeStability;
    dependents: number;
    days?: number;
}

export interface InvestOptions extends CommonOptions {
    risk: string;
    horizon: number;
}

export interface WorkspaceConfig {
    settingsPath: string;
}

export interface Workspace {
    root: string;
    data: string;
    config: WorkspaceConfig;
}
