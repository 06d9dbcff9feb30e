/**
 * Zod schemas for Pocket Ledger data structures.
 *
 * Amounts are plain numbers here: the engine records what the user typed.
 * Money arithmetic that accumulates (debt simulation) converts to Decimal
 * internally and back to a rounded number at the report boundary.
 */

import { z } from 'zod';
import { DEFAULT_CURRENCY, RECORD_ID } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * ISO-like currency code (INR, USD, EUR).
 */
const currencyCode = z.string().regex(/^[A-Z]{3}$/, 'Must be a 3-letter currency code');

const nonNegative = z.number().finite().min(0);

/**
 * Stored record ID: 16-char hex, optionally with collision suffix.
 */
const recordId = z.string().regex(
    new RegExp(`^[0-9a-f]{${RECORD_ID.LENGTH}}(-\\d{2})?$`),
    `Must be ${RECORD_ID.LENGTH}-char hex, optionally with -NN suffix`
);

// ============================================================================
// Transaction Schemas
// ============================================================================

export const TransactionTypeSchema = z.enum(['income', 'expense']);

export type TransactionType = z.infer<typeof TransactionTypeSchema>;

/**
 * A single financial event, as produced by the parser or entered directly.
 * Category validity depends on the taxonomy and is checked outside the schema.
 */
export const TransactionRecordSchema = z.object({
    date: isoDateString,
    description: z.string(),
    amount: z.number().finite().positive('Amount must be a positive number'),
    currency: currencyCode.default(DEFAULT_CURRENCY),
    mainCategory: z.string().min(1),
    subCategory: z.string().min(1),
    type: TransactionTypeSchema,
    person: z.string().min(1).optional(),
    group: z.string().min(1).optional(),
    splitRatio: z.number().positive().max(1).default(1),
});

export type TransactionRecord = z.infer<typeof TransactionRecordSchema>;

/**
 * Transaction as held by a store, with its deterministic ID.
 */
export const StoredTransactionSchema = TransactionRecordSchema.extend({
    id: recordId,
});

export type StoredTransaction = z.infer<typeof StoredTransactionSchema>;

/**
 * Minimal history row the advisors need. Full records satisfy it.
 */
export const HistoryEntrySchema = z.object({
    date: isoDateString,
    amount: z.number().finite(),
});

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

// ============================================================================
// Parser Schemas
// ============================================================================

/**
 * A clause the parser could not turn into a transaction.
 * Diagnostic only, never persisted.
 */
export const ParseErrorSchema = z.object({
    clause: z.string(),
    reason: z.string(),
});

export type ParseError = z.infer<typeof ParseErrorSchema>;

export const ParseStatusSchema = z.enum(['success', 'partial', 'error']);

export type ParseStatus = z.infer<typeof ParseStatusSchema>;

/**
 * Aggregate view of one utterance: accepted records and error messages.
 */
export const ParseSummarySchema = z.object({
    transactions: z.array(TransactionRecordSchema),
    errors: z.array(z.string()),
    status: ParseStatusSchema,
    message: z.string(),
});

export type ParseSummary = z.infer<typeof ParseSummarySchema>;

// ============================================================================
// Taxonomy Schemas
// ============================================================================

export const CategoryPairSchema = z.object({
    mainCategory: z.string().min(1),
    subCategory: z.string().min(1),
});

export type CategoryPair = z.infer<typeof CategoryPairSchema>;

/**
 * Main category -> subcategories, for one transaction type.
 */
export const CategoryTableSchema = z.record(z.string().min(1), z.array(z.string().min(1)).min(1));

export type CategoryTable = z.infer<typeof CategoryTableSchema>;

/**
 * Raw taxonomy tables as stored in taxonomy.json.
 * Keywords are literal substrings mapped straight to a category pair.
 */
export const TaxonomyTablesSchema = z.object({
    expense: CategoryTableSchema,
    income: CategoryTableSchema,
    keywords: z.record(z.string().min(1), CategoryPairSchema),
});

export type TaxonomyTables = z.infer<typeof TaxonomyTablesSchema>;

// ============================================================================
// Advisor Schemas
// ============================================================================

/**
 * Budget forecast. confidenceInterval is null for a degraded forecast.
 */
export const ForecastReportSchema = z.object({
    prediction: z.number(),
    confidenceInterval: z.tuple([z.number(), z.number()]).nullable(),
    method: z.string(),
    confidenceLevel: z.number().gt(0).lt(1),
    degraded: z.boolean(),
    months: z.number().int().min(0),
});

export type ForecastReport = z.infer<typeof ForecastReportSchema>;

/**
 * Expense total for one main category.
 */
export const CategoryTotalSchema = z.object({
    mainCategory: z.string().min(1),
    total: nonNegative,
});

export type CategoryTotal = z.infer<typeof CategoryTotalSchema>;

/**
 * Expenses of one calendar month by main category, largest first.
 */
export const SpendingSummarySchema = z.object({
    month: z.string().regex(/^\d{4}-(0[1-9]|1[0-2])$/, 'Must be YYYY-MM format'),
    categories: z.array(CategoryTotalSchema),
    total: nonNegative,
});

export type SpendingSummary = z.infer<typeof SpendingSummarySchema>;

export const DebtSchema = z.object({
    balance: nonNegative,
    annualRate: nonNegative,
    minPayment: nonNegative,
    name: z.string().optional(),
});

export type Debt = z.infer<typeof DebtSchema>;

export const PayoffMethodSchema = z.enum(['avalanche', 'snowball']);

export type PayoffMethod = z.infer<typeof PayoffMethodSchema>;

export const DebtPlanSchema = z.object({
    totalMonths: z.number().int().min(0),
    totalInterest: z.number().min(0),
    methodName: z.string(),
});

export type DebtPlan = z.infer<typeof DebtPlanSchema>;

export const SavingsPlanSchema = z.object({
    requiredMonthly: z.number().min(0),
    recommendedMonthly: z.number().min(0),
    successProbability: z.number().min(0).max(1),
    reconsiderPlan: z.boolean(),
});

export type SavingsPlan = z.infer<typeof SavingsPlanSchema>;

export const IncomeStabilitySchema = z.enum(['stable', 'variable']);

export type IncomeStability = z.infer<typeof IncomeStabilitySchema>;

export const EmergencyFundReportSchema = z.object({
    recommendedRange: z.tuple([z.number(), z.number()]),
    avgMonthlyExpense: z.number(),
    probabilitySufficient: z.number().min(0).max(1),
    factors: z.object({
        incomeStability: IncomeStabilitySchema,
        dependents: z.number().int().min(0),
    }),
});

export type EmergencyFundReport = z.infer<typeof EmergencyFundReportSchema>;

export const RiskProfileSchema = z.enum(['conservative', 'moderate', 'aggressive']);

export type RiskProfile = z.infer<typeof RiskProfileSchema>;

/**
 * Portfolio allocation in whole percentage points plus guidance lines.
 */
export const InvestmentStrategySchema = z.object({
    stocks: z.number().min(0).max(100),
    bonds: z.number().min(0).max(100),
    gold: z.number().min(0).max(100),
    cash: z.number().min(0).max(100),
    rules: z.array(z.string()),
});

export type InvestmentStrategy = z.infer<typeof InvestmentStrategySchema>;

// ============================================================================
// Settings Schema
// ============================================================================

/**
 * Workspace settings (config/settings.yaml). Every field has a default,
 * so an empty file is a valid configuration.
 */
export const SettingsSchema = z.object({
    currency: currencyCode.default(DEFAULT_CURRENCY),
    storage: z.object({
        transactionsFile: z.string().min(1).default('data/transactions.json'),
    }).default({}),
    forecast: z.object({
        windowSize: z.number().int().min(1).default(3),
        confidenceLevel: z.number().gt(0).lt(1).default(0.95),
        daysBack: z.number().int().min(1).default(365),
    }).default({}),
    emergencyFund: z.object({
        minMonths: z.number().int().min(1).default(3),
        maxMonths: z.number().int().min(1).default(6),
    }).default({}),
    savings: z.object({
        annualReturn: z.number().finite().default(0.07),
        annualVolatility: z.number().finite().min(0).default(0.15),
    }).default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Render zod issues as one readable line, e.g. "amount: Amount must be a positive number".
 */
export function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => {
            const path = issue.path.join('.');
            return path ? `${path}: ${issue.message}` : issue.message;
        })
        .join('; ');
}
