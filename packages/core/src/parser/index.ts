/**
 * Parser module: natural-language text → transaction records.
 */

export { parse, segmentClauses, summarizeParse, describeParseError } from './parse.js';
export {
    findVerb,
    extractAbsoluteDate,
    resolveRelativeDate,
    extractHeadCount,
    extractAmount,
    extractItem,
    extractPerson,
    extractGroup,
} from './extract.js';
export { VERBS, TIME_PHRASES, GROUP_LABELS, CURRENCY_TOKENS } from './lexicon.js';
export type { Verb } from './lexicon.js';
export type { ParseEntry, ParserOptions, ClauseAccumulator } from './types.js';
