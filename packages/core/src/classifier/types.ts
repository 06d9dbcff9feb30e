/**
 * Internal types for classifier module.
 */

import type { CategoryPair } from '../types/index.js';

/**
 * A candidate label with its similarity score (0-100).
 */
export interface ScoredChoice {
    choice: string;
    score: number;
}

/**
 * Which classification layer produced the pair.
 */
export type ClassificationSource = 'keyword' | 'phrase' | 'word' | 'fallback';

/**
 * Classification result: always a valid pair for the requested type.
 */
export interface Classification extends CategoryPair {
    source: ClassificationSource;
}
