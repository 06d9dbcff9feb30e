/**
 * Category taxonomy construction and lookups.
 *
 * Two parallel tables (expense, income) map a main category to its
 * subcategories. A subcategory may appear in both tables but only once
 * within a table, so the reverse index is kept per transaction type.
 */

import { FALLBACK_CATEGORY, TaxonomyTablesSchema, formatIssues } from '../types/index.js';
import type {
    CategoryPair,
    CategoryTable,
    TaxonomyTables,
    TransactionType,
} from '../types/index.js';
import type { KeywordShortcut, Taxonomy } from './types.js';

const TRANSACTION_TYPES: readonly TransactionType[] = ['expense', 'income'];

/**
 * Build the reverse index (lower-cased subcategory -> canonical pair) for one table.
 * Throws when a subcategory is listed under two main categories.
 */
function buildReverseIndex(table: CategoryTable, type: TransactionType): Map<string, CategoryPair> {
    const index = new Map<string, CategoryPair>();
    for (const [mainCategory, subs] of Object.entries(table)) {
        for (const subCategory of subs) {
            const key = subCategory.toLowerCase();
            const existing = index.get(key);
            if (existing) {
                throw new Error(
                    `Subcategory "${subCategory}" is listed under both "${existing.mainCategory}" ` +
                    `and "${mainCategory}" in the ${type} table`
                );
            }
            index.set(key, { mainCategory, subCategory });
        }
    }
    return index;
}

/**
 * Create an immutable taxonomy from raw tables.
 *
 * @param input - Tables as loaded from JSON (validated here)
 * @returns Frozen taxonomy shared by classifier and parser
 * @throws Error when the tables are malformed, a subcategory is duplicated
 *   within one type, or a keyword or fallback pair is not in any table
 */
export function createTaxonomy(input: unknown): Taxonomy {
    const parsed = TaxonomyTablesSchema.safeParse(input);
    if (!parsed.success) {
        throw new Error(`Invalid taxonomy tables: ${formatIssues(parsed.error)}`);
    }
    const tables: TaxonomyTables = parsed.data;
    for (const table of [tables.expense, tables.income]) {
        for (const subs of Object.values(table)) {
            Object.freeze(subs);
        }
        Object.freeze(table);
    }

    const reverse: Record<TransactionType, Map<string, CategoryPair>> = {
        expense: buildReverseIndex(tables.expense, 'expense'),
        income: buildReverseIndex(tables.income, 'income'),
    };

    const mainByType: Record<TransactionType, Map<string, string>> = {
        expense: new Map(Object.keys(tables.expense).map((m) => [m.toLowerCase(), m])),
        income: new Map(Object.keys(tables.income).map((m) => [m.toLowerCase(), m])),
    };

    const subsByType: Record<TransactionType, readonly string[]> = {
        expense: Object.freeze(Object.values(tables.expense).flat()),
        income: Object.freeze(Object.values(tables.income).flat()),
    };

    function isValidPair(type: TransactionType, mainCategory: string, subCategory: string): boolean {
        const main = mainByType[type].get(mainCategory.toLowerCase());
        if (!main) return false;
        const wanted = subCategory.toLowerCase();
        return tables[type][main].some((sub) => sub.toLowerCase() === wanted);
    }

    function isValidAnywhere(pair: CategoryPair): boolean {
        return TRANSACTION_TYPES.some((t) => isValidPair(t, pair.mainCategory, pair.subCategory));
    }

    // Stable sort keeps file order among keywords of equal length
    const keywords: KeywordShortcut[] = Object.entries(tables.keywords)
        .map(([keyword, pair]) => ({ keyword: keyword.toLowerCase(), pair: Object.freeze({ ...pair }) }))
        .sort((a, b) => b.keyword.length - a.keyword.length);

    for (const { keyword, pair } of keywords) {
        if (!isValidAnywhere(pair)) {
            throw new Error(
                `Keyword "${keyword}" maps to unknown category ${pair.mainCategory}/${pair.subCategory}`
            );
        }
    }

    for (const type of TRANSACTION_TYPES) {
        const { mainCategory, subCategory } = FALLBACK_CATEGORY[type];
        if (!isValidPair(type, mainCategory, subCategory)) {
            throw new Error(`Fallback category ${mainCategory}/${subCategory} missing from the ${type} table`);
        }
    }

    const taxonomy: Taxonomy = {
        tables: Object.freeze({ expense: tables.expense, income: tables.income }),
        keywords: Object.freeze(keywords.map((k) => Object.freeze(k))),
        mainCategories: (type) => Object.keys(tables[type]),
        subcategories: (type) => subsByType[type],
        resolveSubcategory: (subCategory, type) => {
            const pair = reverse[type].get(subCategory.toLowerCase());
            return pair ? { ...pair } : null;
        },
        isValidPair,
        fallback: (type) => ({ ...FALLBACK_CATEGORY[type] }),
    };

    return Object.freeze(taxonomy);
}

/**
 * Category tables for one transaction type, or both merged when no type is given.
 * Where a main category exists in both tables the income entry wins.
 */
export function getCategoryHierarchy(taxonomy: Taxonomy, type?: TransactionType): CategoryTable {
    if (type) {
        return { ...taxonomy.tables[type] };
    }
    return { ...taxonomy.tables.expense, ...taxonomy.tables.income };
}
