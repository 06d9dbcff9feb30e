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
} from './schemas.js';

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
} from './schemas.js';

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
} from './constants.js';
