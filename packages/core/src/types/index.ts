/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
// Schemas
export {
    TransactionTypeSchema,
    TransactionRecordSchema,
    StoredTransactionSchema,
    HistoryEntrySchema,
    ParseErrorSchema,
    ParseStatusSchema,
    ParseSummarySchema,
    CategoryPairSchema,
    CategoryTableSchema,
    TaxonomyTablesSchema,
    ForecastReportSchema,
    CategoryTotalSchema,
    SpendingSummarySchema,
    DebtSchema,
    PayoffMethodSchema,
    DebtPlanSchema,
    SavingsPlanSchema,
    IncomeStabilitySchema,
    EmergencyFundReportSchema,
    RiskProfileSchema,
    InvestmentStrategySchema,
    SettingsSchema,
    formatIssues,
} from '@pocket-ledger/shared';

// Types
export type {
    TransactionType,
    TransactionRecord,
    StoredTransaction,
    HistoryEntry,
    ParseError,
    ParseStatus,
    ParseSummary,
    CategoryPair,
    CategoryTable,
    TaxonomyTables,
    ForecastReport,
    CategoryTotal,
    SpendingSummary,
    Debt,
    PayoffMethod,
    DebtPlan,
    SavingsPlan,
    IncomeStability,
    EmergencyFundReport,
    RiskProfile,
    InvestmentStrategy,
    Settings,
} from '@pocket-ledger/shared';

// Constants
export {
    DEFAULT_CURRENCY,
    FALLBACK_CATEGORY,
    CLASSIFIER_THRESHOLDS,
    FORECAST_DEFAULTS,
    DEBT_CONFIG,
    SAVINGS_CONFIG,
    EMERGENCY_FUND_CONFIG,
    RECORD_ID,
} from '@pocket-ledger/shared';
