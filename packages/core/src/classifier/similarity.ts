/**
 * Approximate string similarity on a 0-100 scale.
 *
 * Both sides are normalized first, so case, punctuation and spacing do
 * not count as differences. The final score is a weighted blend of a
 * plain edit ratio, a token-sorted ratio, a token-set ratio and a
 * best-substring ratio, so a short category name still scores well
 * against a longer sentence that contains it.
 */

import { normalizeText, tokenSort } from '../utils/normalize.js';
import type { ScoredChoice } from './types.js';

// Length ratio at which substring matching takes over
const PARTIAL_FROM_LENGTH_RATIO = 1.5;
const PARTIAL_SCALE = 0.9;
const LONG_PARTIAL_SCALE = 0.6;
const LONG_LENGTH_RATIO = 8;
const UNORDERED_SCALE = 0.95;

/**
 * Minimum number of single-character insertions, deletions and
 * substitutions turning one string into the other.
 */
export function levenshteinDistance(a: string, b: string): number {
    if (a.length === 0) return b.length;
    if (b.length === 0) return a.length;

    // Two rolling rows of the edit-distance matrix
    let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
    let current = new Array<number>(b.length + 1).fill(0);

    for (let i = 1; i <= a.length; i++) {
        current[0] = i;
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current[j] = Math.min(
                previous[j] + 1,
                current[j - 1] + 1,
                previous[j - 1] + cost
            );
        }
        [previous, current] = [current, previous];
    }

    return previous[b.length];
}

/**
 * Edit ratio of two strings as given: round(100 * (1 - distance / maxLength)).
 * Empty input on either side scores 0.
 */
export function ratio(a: string, b: string): number {
    if (a === '' || b === '') return 0;
    if (a === b) return 100;
    const distance = levenshteinDistance(a, b);
    return Math.round(100 * (1 - distance / Math.max(a.length, b.length)));
}

/**
 * Best ratio of the shorter string against every window of the same
 * length in the longer one.
 */
export function partialRatio(a: string, b: string): number {
    const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
    if (shorter === '') return 0;

    let best = 0;
    for (let start = 0; start + shorter.length <= longer.length; start++) {
        best = Math.max(best, ratio(shorter, longer.slice(start, start + shorter.length)));
        if (best === 100) break;
    }
    return best;
}

/** Ratio after normalizing and sorting the tokens of both sides. */
export function tokenSortRatio(a: string, b: string): number {
    return ratio(tokenSort(a), tokenSort(b));
}

/**
 * Ratio that ignores words repeated on one side and rewards a shared
 * token core: compares the sorted intersection against each side's
 * intersection-plus-remainder.
 */
export function tokenSetRatio(a: string, b: string): number {
    const left = new Set(splitTokens(normalizeText(a)));
    const right = new Set(splitTokens(normalizeText(b)));

    const shared = [...left].filter((t) => right.has(t)).sort().join(' ');
    const onlyLeft = [...left].filter((t) => !right.has(t)).sort().join(' ');
    const onlyRight = [...right].filter((t) => !left.has(t)).sort().join(' ');

    const withLeft = [shared, onlyLeft].filter((part) => part !== '').join(' ');
    const withRight = [shared, onlyRight].filter((part) => part !== '').join(' ');

    return Math.max(
        ratio(shared, withLeft),
        ratio(shared, withRight),
        ratio(withLeft, withRight)
    );
}

/**
 * Similarity between two strings, 0 (nothing alike) to 100 (same words
 * after normalization). Empty input on either side scores 0.
 */
export function similarity(a: string, b: string): number {
    const left = normalizeText(a);
    const right = normalizeText(b);
    if (left === '' || right === '') return 0;

    const sortedLeft = tokenSort(left);
    const sortedRight = tokenSort(right);
    if (sortedLeft === sortedRight) return 100;

    const base = ratio(left, right);
    const lengthRatio =
        Math.max(left.length, right.length) / Math.min(left.length, right.length);

    if (lengthRatio < PARTIAL_FROM_LENGTH_RATIO) {
        return Math.round(Math.max(
            base,
            ratio(sortedLeft, sortedRight) * UNORDERED_SCALE,
            tokenSetRatio(left, right) * UNORDERED_SCALE
        ));
    }

    const scale = lengthRatio > LONG_LENGTH_RATIO ? LONG_PARTIAL_SCALE : PARTIAL_SCALE;
    return Math.round(Math.max(
        base,
        partialRatio(left, right) * scale,
        partialRatio(sortedLeft, sortedRight) * UNORDERED_SCALE * scale
    ));
}

/**
 * Best-scoring choice for a query. An equal score goes to the choice
 * closer in token-sorted ratio, then to the earlier choice.
 *
 * @returns The best choice with its score, or null when there are no choices
 */
export function extractBest(query: string, choices: readonly string[]): ScoredChoice | null {
    let best: (ScoredChoice & { tieBreak: number }) | null = null;
    for (const choice of choices) {
        const score = similarity(query, choice);
        if (best && score < best.score) continue;
        const tieBreak = tokenSortRatio(query, choice);
        if (!best || score > best.score || tieBreak > best.tieBreak) {
            best = { choice, score, tieBreak };
        }
    }
    return best ? { choice: best.choice, score: best.score } : null;
}

function splitTokens(normalized: string): string[] {
    return normalized === '' ? [] : normalized.split(' ');
}
