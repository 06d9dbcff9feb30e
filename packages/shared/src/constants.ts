/**
 * Constants for Pocket Ledger.
 */

/**
 * Currency assigned to a transaction when the text names none.
 */
export const DEFAULT_CURRENCY = 'INR';

/**
 * Category pairs used when nothing in the description matches the taxonomy.
 */
export const FALLBACK_CATEGORY = {
    expense: { mainCategory: 'Miscellaneous', subCategory: 'unexpected' },
    income: { mainCategory: 'Other', subCategory: 'reimbursement' },
} as const;

/**
 * Similarity thresholds (0-100) for approximate category matching.
 * Phrase-level compares the whole description, word-level each token.
 */
export const CLASSIFIER_THRESHOLDS = {
    PHRASE: 80,
    WORD: 85,
} as const;

/**
 * Budget forecaster defaults.
 */
export const FORECAST_DEFAULTS = {
    WINDOW_SIZE: 3,
    CONFIDENCE_LEVEL: 0.95,
} as const;

/**
 * Debt payoff simulation configuration.
 */
export const DEBT_CONFIG = {
    MAX_MONTHS: 1000,
    EMPTY_METHOD_NAME: 'No debts provided',
} as const;

/**
 * Savings plan simulation configuration.
 * Returns are annualised; the simulation works on monthly draws.
 */
export const SAVINGS_CONFIG = {
    TRIALS: 1000,
    ANNUAL_RETURN: 0.07,
    ANNUAL_VOLATILITY: 0.15,
    MAX_INCOME_SHARE: 0.3,
    RECONSIDER_BELOW: 0.7,
} as const;

/**
 * Emergency fund sizing configuration.
 */
export const EMERGENCY_FUND_CONFIG = {
    MIN_MONTHS: 3,
    MAX_MONTHS: 6,
    VARIABLE_INCOME_UPLIFT: 0.2,
    PER_DEPENDENT_UPLIFT: 0.1,
    FALLBACK_STDDEV_SHARE: 0.1,
    BUFFER_MONTHS: 3,
} as const;

/**
 * Stored transaction ID configuration.
 */
export const RECORD_ID = {
    LENGTH: 16,
    COLLISION_SUFFIX_START: 2,
    MAX_COLLISIONS: 99,
} as const;
