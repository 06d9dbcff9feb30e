import type { CategoryPair, CategoryTable, TransactionType } from '../types/index.js';

/**
 * Literal substring that maps straight to a category pair.
 */
export interface KeywordShortcut {
    keyword: string;
    pair: CategoryPair;
}

/**
 * Immutable two-level category taxonomy with a per-type reverse index.
 * Built once by createTaxonomy() and shared by reference.
 */
export interface Taxonomy {
    readonly tables: Readonly<Record<TransactionType, CategoryTable>>;
    /** Keyword shortcuts, longest keyword first. */
    readonly keywords: readonly KeywordShortcut[];
    mainCategories(type: TransactionType): readonly string[];
    subcategories(type: TransactionType): readonly string[];
    /** Canonical pair for a subcategory label (case-insensitive), or null. */
    resolveSubcategory(subCategory: string, type: TransactionType): CategoryPair | null;
    isValidPair(type: TransactionType, mainCategory: string, subCategory: string): boolean;
    fallback(type: TransactionType): CategoryPair;
}
