/**
 * Rule-based natural-language transaction parser.
 *
 * "paid 20 rupees for panipuris and 50 rupees for a movie ticket"
 *   -> two expense records (20 / Food:panipuris, 50 / Personal:movie ticket)
 *
 * ARCHITECTURAL NOTE: Never throws. Each clause yields a record or a
 * ParseError; a bad clause does not stop its siblings.
 */

import {
    DEFAULT_CURRENCY,
    TransactionRecordSchema,
    formatIssues,
} from '../types/index.js';
import type { ParseError, ParseSummary, TransactionRecord } from '../types/index.js';
import { classify } from '../classifier/classify.js';
import { loadDefaultTaxonomy } from '../taxonomy/load.js';
import type { Taxonomy } from '../taxonomy/types.js';
import { localToday } from '../utils/date-parse.js';
import {
    extractAbsoluteDate,
    extractAmount,
    extractGroup,
    extractHeadCount,
    extractItem,
    extractPerson,
    findVerb,
    remainderAfterVerb,
    resolveRelativeDate,
} from './extract.js';
import type { Verb } from './lexicon.js';
import type { ClauseAccumulator, ParseEntry, ParserOptions } from './types.js';

interface ClauseContext {
    taxonomy: Taxonomy;
    today: Date;
    defaultCurrency: string;
}

function errorEntry(clause: string, reason: string): ParseEntry {
    return { kind: 'error', error: { clause, reason } };
}

/**
 * Lower-case, trim and split an utterance on the conjunction "and".
 */
export function segmentClauses(utterance: string): string[] {
    return utterance.toLowerCase().trim().split(/\s+and\s+/);
}

/**
 * Turn one clause into a record, given the verb in force for it.
 */
function parseClause(clause: string, verb: Verb, ctx: ClauseContext): ParseEntry {
    const { date: absoluteDate, rest: withoutDate } = extractAbsoluteDate(clause);
    const { headCount, rest: text } = extractHeadCount(withoutDate);

    const amount = extractAmount(text);
    if (!amount) {
        return errorEntry(clause, 'No amount found');
    }

    const item = extractItem(text);
    const category = item
        ? classify(item, verb.type, ctx.taxonomy)
        : ctx.taxonomy.fallback(verb.type);

    const person = extractPerson(text, verb);
    const group = extractGroup(text, headCount);

    const candidate = {
        date: absoluteDate ?? resolveRelativeDate(text, ctx.today),
        description: item ?? remainderAfterVerb(text, verb),
        amount: amount.amount,
        currency: amount.currency ?? ctx.defaultCurrency,
        mainCategory: category.mainCategory,
        subCategory: category.subCategory,
        type: verb.type,
        ...(person ? { person } : {}),
        ...(group ? { group: group.group, splitRatio: group.splitRatio } : { splitRatio: 1 }),
    };

    const parsed = TransactionRecordSchema.safeParse(candidate);
    if (!parsed.success) {
        return errorEntry(clause, formatIssues(parsed.error));
    }

    const record: TransactionRecord = parsed.data;
    if (!ctx.taxonomy.isValidPair(record.type, record.mainCategory, record.subCategory)) {
        return errorEntry(
            clause,
            `Category ${record.mainCategory}/${record.subCategory} is not valid for ${record.type}`
        );
    }

    return { kind: 'transaction', clause, record: Object.freeze(record) };
}

/**
 * Resolve parser options. Returns the failure message when the
 * default taxonomy cannot be loaded.
 */
function buildContext(options: ParserOptions): ClauseContext | string {
    const today = options.today
        ? new Date(Date.UTC(
            options.today.getUTCFullYear(),
            options.today.getUTCMonth(),
            options.today.getUTCDate()
        ))
        : localToday();
    try {
        return {
            taxonomy: options.taxonomy ?? loadDefaultTaxonomy(),
            today,
            defaultCurrency: options.defaultCurrency ?? DEFAULT_CURRENCY,
        };
    } catch (e) {
        return e instanceof Error ? e.message : String(e);
    }
}

/**
 * Parse an utterance into one entry per clause.
 *
 * A clause without a verb inherits the last verb seen in an earlier clause.
 * Always returns at least one entry.
 *
 * @param utterance - Free-form text, any case
 * @param options - Taxonomy, reference day and default currency
 */
export function parse(utterance: string, options: ParserOptions = {}): ParseEntry[] {
    const ctx = buildContext(options);
    if (typeof ctx === 'string') {
        return [errorEntry(utterance, `Parser unavailable: ${ctx}`)];
    }

    const initial: ClauseAccumulator = { verb: null, entries: [] };
    const { entries } = segmentClauses(utterance).reduce<ClauseAccumulator>((acc, clause) => {
        const verb = findVerb(clause) ?? acc.verb;
        if (!verb) {
            return { verb, entries: [...acc.entries, errorEntry(clause, 'No action found')] };
        }

        let entry: ParseEntry;
        try {
            entry = parseClause(clause, verb, ctx);
        } catch (e) {
            entry = errorEntry(clause, e instanceof Error ? e.message : String(e));
        }
        return { verb, entries: [...acc.entries, entry] };
    }, initial);

    return entries.length > 0 ? entries : [errorEntry(utterance, 'No valid transactions found')];
}

/**
 * One-line message for a rejected clause.
 */
export function describeParseError(error: ParseError): string {
    return `${error.reason} in clause: "${error.clause}"`;
}

/**
 * Aggregate parse entries into records, error messages and an overall status.
 *
 * status: success (no errors), partial (records and errors), error (no records)
 */
export function summarizeParse(entries: readonly ParseEntry[]): ParseSummary {
    const transactions: TransactionRecord[] = [];
    const errors: string[] = [];

    for (const entry of entries) {
        if (entry.kind === 'transaction') {
            transactions.push(entry.record);
        } else {
            errors.push(describeParseError(entry.error));
        }
    }

    const status = errors.length === 0
        ? 'success'
        : transactions.length > 0 ? 'partial' : 'error';

    return {
        transactions,
        errors,
        status,
        message: transactions.length > 0 ? 'Transactions processed' : 'No transactions processed',
    };
}
