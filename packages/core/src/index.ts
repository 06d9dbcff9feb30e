// Types (re-exported from shared)
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
} from './types/index.js';

export {
    TransactionRecordSchema,
    StoredTransactionSchema,
    HistoryEntrySchema,
    ParseSummarySchema,
    ForecastReportSchema,
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
    DEFAULT_CURRENCY,
    FALLBACK_CATEGORY,
    CLASSIFIER_THRESHOLDS,
    FORECAST_DEFAULTS,
    DEBT_CONFIG,
    SAVINGS_CONFIG,
    EMERGENCY_FUND_CONFIG,
    RECORD_ID,
} from './types/index.js';

// Utils
export { normalizeText, tokenSort } from './utils/index.js';
export { formatIsoDate, localToday, monthKey, monthRange } from './utils/index.js';
export { generateRecordId } from './utils/index.js';

// Taxonomy
export { createTaxonomy, getCategoryHierarchy, loadDefaultTaxonomy, loadTaxonomyFile } from './taxonomy/index.js';
export type { Taxonomy, KeywordShortcut } from './taxonomy/index.js';

// Classifier
export { classify, similarity } from './classifier/index.js';
export type { Classification, ClassificationSource } from './classifier/index.js';

// Parser
export { parse, segmentClauses, summarizeParse, describeParseError } from './parser/index.js';
export type { ParseEntry, ParserOptions } from './parser/index.js';

// Storage
export { MemoryTransactionStore, validateRecord } from './store/index.js';
export type {
    TransactionStore,
    TransactionFilter,
    StoreWriteResult,
    BulkWriteResult,
    MemoryStoreOptions,
} from './store/index.js';

// Ingestion
export { ingestUtterance } from './ingest/index.js';
export type { IngestSummary } from './ingest/index.js';

// Advisors
export {
    forecast,
    summarizeSpending,
    optimizeDebts,
    compareMethods,
    calculateSavingsPlan,
    EmergencyFundAdvisor,
    getStrategy,
    mulberry32,
} from './advisors/index.js';
export type {
    AdvisoryResult,
    ForecastOptions,
    SavingsGoal,
    SavingsOptions,
    EmergencyFundConfig,
    HouseholdProfile,
    RandomSource,
} from './advisors/index.js';
