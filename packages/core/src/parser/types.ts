/**
 * Types for the natural-language transaction parser.
 */

import type { ParseError, TransactionRecord } from '../types/index.js';
import type { Taxonomy } from '../taxonomy/types.js';
import type { Verb } from './lexicon.js';

/**
 * One result per clause: a record or the reason the clause was rejected.
 */
export type ParseEntry =
    | { kind: 'transaction'; clause: string; record: Readonly<TransactionRecord> }
    | { kind: 'error'; error: ParseError };

/**
 * Options for parse().
 */
export interface ParserOptions {
    /** Category taxonomy (defaults to the bundled one). */
    taxonomy?: Taxonomy;
    /** Reference day for relative dates; its UTC calendar day is used. */
    today?: Date;
    /** Currency when the text names none. */
    defaultCurrency?: string;
}

/**
 * State carried from clause to clause within one utterance.
 * The last verb seen applies to later clauses that name none.
 */
export interface ClauseAccumulator {
    verb: Verb | null;
    entries: ParseEntry[];
}
