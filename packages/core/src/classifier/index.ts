/**
 * Classifier module: free text → category pair.
 */

export { classify } from './classify.js';
export {
    similarity,
    levenshteinDistance,
    ratio,
    partialRatio,
    tokenSortRatio,
    tokenSetRatio,
    extractBest,
} from './similarity.js';
export type { Classification, ClassificationSource, ScoredChoice } from './types.js';
