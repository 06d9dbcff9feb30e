/**
 * Field extractors for a single lower-cased clause.
 *
 * Each extractor is a pure function over clause text. Extractors that
 * consume a token (absolute dates, head counts) return the text with the
 * token removed, so later extractors do not mistake it for the amount.
 */

import { addDays, formatIsoDate, parseDmyDate, parseIsoDate, parseMdyDate } from '../utils/date-parse.js';
import {
    CURRENCY_TOKENS,
    GROUP_LABELS,
    RESERVED_WORDS,
    TIME_PHRASES,
    VERBS,
    wordPattern,
} from './lexicon.js';
import type { Verb } from './lexicon.js';

const ABSOLUTE_DATE = /(?:\bon\s+)?\b(\d{4}-\d{2}-\d{2}|\d{1,2}-\d{1,2}-\d{4}|\d{1,2}\/\d{1,2}\/(?:\d{4}|\d{2}))\b/;
const HEAD_COUNT = /\b(\d+)\s*(?:people|persons|members)\b/;
const AMOUNT = /(?:(₹|\$)\s*)?(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?)(?:\s*(rupees?|rs|inr|dollars?|usd|euros?|eur)\b)?/;
const ITEM = /\b(?:worth of|for|on|from|of)\s+(.+?)(?=\s+(?:by|for|with|from|and)\b|\s*$)/;
const COUNTERPARTY = /\b(?:by|from)\s+([a-z]+)/;

/**
 * Text with a matched token removed and whitespace tidied.
 */
function without(text: string, match: RegExpMatchArray): string {
    const start = match.index ?? 0;
    return `${text.slice(0, start)} ${text.slice(start + match[0].length)}`
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * First verb of the fixed table present in the clause, in table order.
 */
export function findVerb(clause: string): Verb | null {
    return VERBS.find((verb) => wordPattern(verb.word).test(clause)) ?? null;
}

/**
 * Absolute date token (DD-MM-YYYY, YYYY-MM-DD, MM/DD/YY[YY]), with a leading "on".
 * Tokens that are not real calendar dates are left in place.
 */
export function extractAbsoluteDate(text: string): { date: string | null; rest: string } {
    const match = text.match(ABSOLUTE_DATE);
    if (!match) return { date: null, rest: text };

    const token = match[1];
    const parsed = token.includes('/')
        ? parseMdyDate(token)
        : /^\d{4}-/.test(token) ? parseIsoDate(token) : parseDmyDate(token);

    if (!parsed) return { date: null, rest: text };
    return { date: formatIsoDate(parsed), rest: without(text, match) };
}

/**
 * Date from the first relative-time phrase present, else the reference day itself.
 */
export function resolveRelativeDate(text: string, today: Date): string {
    for (const { phrase, offsetDays } of TIME_PHRASES) {
        if (wordPattern(phrase).test(text)) {
            return formatIsoDate(addDays(today, offsetDays));
        }
    }
    return formatIsoDate(today);
}

/**
 * Explicit "<N> people|persons|members" head count.
 */
export function extractHeadCount(text: string): { headCount: number | null; rest: string } {
    const match = text.match(HEAD_COUNT);
    if (!match) return { headCount: null, rest: text };
    return { headCount: parseInt(match[1], 10), rest: without(text, match) };
}

/**
 * First numeric token, with the currency it names (if any).
 */
export function extractAmount(text: string): { amount: number; currency: string | null } | null {
    const match = text.match(AMOUNT);
    if (!match) return null;

    const amount = parseFloat(match[2].replace(/,/g, ''));
    const currencyToken = match[1] ?? match[3];
    const currency = currencyToken ? CURRENCY_TOKENS[currencyToken] ?? null : null;
    return { amount, currency };
}

/**
 * Item phrase after a preposition, up to the next boundary word or clause end.
 */
export function extractItem(text: string): string | null {
    const match = text.match(ITEM);
    if (!match) return null;
    const item = match[1].trim();
    return item === '' ? null : item;
}

/**
 * Text following the verb, or the whole clause when the verb is not in it.
 */
export function remainderAfterVerb(text: string, verb: Verb): string {
    const match = text.match(wordPattern(verb.word));
    if (!match) return text;
    const rest = text.slice((match.index ?? 0) + match[0].length).trim();
    return rest === '' ? text : rest;
}

function capitalize(name: string): string {
    return name.charAt(0).toUpperCase() + name.slice(1);
}

/**
 * Counterparty name: the word after "by"/"from", else an implied leading name.
 *
 * The leading token counts as a name only when the clause does not start
 * with "i", the token is purely alphabetic and is not a verb, time word
 * or group label. This is a heuristic and can misfire on ordinary words.
 */
export function extractPerson(text: string, verb: Verb): string | null {
    const match = text.match(COUNTERPARTY);
    if (match) return capitalize(match[1]);

    const first = text.split(/\s+/)[0] ?? '';
    if (first === 'i' || first === verb.word) return null;
    if (!/^[a-z]+$/.test(first) || RESERVED_WORDS.has(first)) return null;
    return capitalize(first);
}

/**
 * Shared-expense group and this party's share.
 *
 * @throws Error when an explicit head count is zero
 */
export function extractGroup(
    text: string,
    headCount: number | null
): { group: string; splitRatio: number } | null {
    for (const { label, defaultSplit } of GROUP_LABELS) {
        if (wordPattern(label).test(text)) {
            const people = headCount ?? defaultSplit;
            if (people < 1) {
                throw new Error(`Group split needs at least 1 person (got ${people})`);
            }
            return { group: label, splitRatio: 1 / people };
        }
    }
    return null;
}
