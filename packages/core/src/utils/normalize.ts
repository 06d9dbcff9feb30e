/**
 * Text normalization for category matching.
 *
 * NOTE: This is for comparison only. Descriptions are stored as the
 * parser extracted them.
 */

/**
 * Normalize free text for consistent matching.
 *
 * Transformations:
 * - Convert to lowercase
 * - Replace punctuation and symbols with space ("self-employment" -> "self employment")
 * - Collapse multiple whitespace to single space
 * - Trim leading/trailing whitespace
 *
 * @param raw - Raw text
 * @returns Normalized text for matching
 */
export function normalizeText(raw: string): string {
    return raw
        .toLowerCase()
        .replace(/[^\p{L}\p{N}\s]/gu, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Normalize, then sort the tokens so word order does not affect comparison.
 * "ticket movie" and "movie ticket" both become "movie ticket".
 */
export function tokenSort(raw: string): string {
    const normalized = normalizeText(raw);
    if (normalized === '') return '';
    return normalized.split(' ').sort().join(' ');
}
