/**
 * Description → (main, sub) category classification.
 *
 * Layer priority (first match wins):
 * 1. keyword shortcut (literal substring)
 * 2. phrase-level similarity, whole description (>= 80)
 * 3. word-level similarity, each token in order (>= 85)
 * 4. fixed fallback pair for the transaction type
 *
 * Every candidate pair must validate against the taxonomy for the
 * requested type before it is returned.
 */

import { CLASSIFIER_THRESHOLDS } from '../types/index.js';
import type { TransactionType } from '../types/index.js';
import { loadDefaultTaxonomy } from '../taxonomy/load.js';
import type { Taxonomy } from '../taxonomy/types.js';
import { extractBest } from './similarity.js';
import type { Classification, ClassificationSource } from './types.js';

/**
 * Approximate-match a fragment against the type's subcategories.
 * Returns a classification when the best label clears the threshold and validates.
 */
function fuzzyMatch(
    fragment: string,
    type: TransactionType,
    taxonomy: Taxonomy,
    threshold: number,
    source: ClassificationSource
): Classification | null {
    const best = extractBest(fragment, taxonomy.subcategories(type));
    if (!best || best.score < threshold) return null;

    const pair = taxonomy.resolveSubcategory(best.choice, type);
    if (!pair || !taxonomy.isValidPair(type, pair.mainCategory, pair.subCategory)) {
        return null;
    }
    return { ...pair, source };
}

/**
 * Classify a free-text description.
 *
 * Never fails: an unmatched description gets the fallback pair for its type.
 *
 * @param description - Item phrase or label, any case
 * @param type - Transaction type whose table the pair must belong to
 * @param taxonomy - Category taxonomy (defaults to the bundled one)
 */
export function classify(
    description: string,
    type: TransactionType,
    taxonomy: Taxonomy = loadDefaultTaxonomy()
): Classification {
    const text = description.toLowerCase().trim();

    // Layer 1: keyword shortcuts
    for (const { keyword, pair } of taxonomy.keywords) {
        if (text.includes(keyword) && taxonomy.isValidPair(type, pair.mainCategory, pair.subCategory)) {
            return { ...pair, source: 'keyword' };
        }
    }

    // Layer 2: whole phrase
    const phrase = fuzzyMatch(text, type, taxonomy, CLASSIFIER_THRESHOLDS.PHRASE, 'phrase');
    if (phrase) return phrase;

    // Layer 3: individual words, in original order
    for (const word of text.split(/\s+/).filter(Boolean)) {
        const match = fuzzyMatch(word, type, taxonomy, CLASSIFIER_THRESHOLDS.WORD, 'word');
        if (match) return match;
    }

    return { ...taxonomy.fallback(type), source: 'fallback' };
}
