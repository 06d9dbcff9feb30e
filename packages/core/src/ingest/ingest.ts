/**
 * Parse an utterance and persist the resulting records.
 *
 * Records are written one at a time in clause order. A store rejection
 * turns that clause into an error entry; the other clauses still go through.
 */

import type { ParseSummary } from '../types/index.js';
import { parse, summarizeParse } from '../parser/parse.js';
import type { ParseEntry, ParserOptions } from '../parser/types.js';
import type { TransactionStore } from '../store/types.js';

export interface IngestSummary extends ParseSummary {
    /** IDs assigned by the store, in the order the records were saved. */
    ids: string[];
}

async function persist(
    entry: ParseEntry,
    store: TransactionStore
): Promise<{ entry: ParseEntry; id: string | null }> {
    if (entry.kind === 'error') return { entry, id: null };

    let reason: string;
    try {
        const write = await store.addTransaction({ ...entry.record });
        if (write.ok) return { entry, id: write.id };
        reason = write.reason;
    } catch (e) {
        reason = e instanceof Error ? e.message : String(e);
    }

    return {
        entry: { kind: 'error', error: { clause: entry.clause, reason: `Could not save transaction (${reason})` } },
        id: null,
    };
}

export async function ingestUtterance(
    utterance: string,
    store: TransactionStore,
    options: ParserOptions = {}
): Promise<IngestSummary> {
    const entries: ParseEntry[] = [];
    const ids: string[] = [];

    for (const parsed of parse(utterance, options)) {
        const { entry, id } = await persist(parsed, store);
        entries.push(entry);
        if (id) ids.push(id);
    }

    return { ...summarizeParse(entries), ids };
}
