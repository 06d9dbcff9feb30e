/**
 * Stored transaction ID generation and collision handling.
 *
 * ARCHITECTURAL NOTE: Uses js-sha256 rather than node:crypto so the
 * engine has no dependency on Node built-ins for hashing.
 */

import { sha256 } from 'js-sha256';
import { Decimal } from 'decimal.js';
import { RECORD_ID } from '../types/index.js';
import type { TransactionRecord } from '../types/index.js';

/**
 * Generate deterministic record ID via SHA-256 hash.
 *
 * Payload format: "{date}|{description}|{amount}|{type}"
 * - amount: plain decimal string, no trailing zeros (20.50 -> "20.5")
 *
 * @returns 16-character hex record ID
 */
export function generateRecordId(
    record: Pick<TransactionRecord, 'date' | 'description' | 'amount' | 'type'>
): string {
    const amountStr = new Decimal(record.amount).toFixed();
    const payload = `${record.date}|${record.description}|${amountStr}|${record.type}`;
    return sha256(payload).slice(0, RECORD_ID.LENGTH);
}

/**
 * Strip a collision suffix: "a1b2c3d4e5f67890-02" -> "a1b2c3d4e5f67890".
 */
export function baseRecordId(id: string): string {
    return id.substring(0, RECORD_ID.LENGTH);
}

/**
 * Next free ID for a base ID, given the IDs already taken.
 *
 * The first occurrence keeps the bare ID; repeats get -02, -03, ... up to -99.
 *
 * @throws Error when the base ID has used up all 99 suffixes
 */
export function nextAvailableId(baseId: string, taken: ReadonlySet<string>): string {
    if (!taken.has(baseId)) return baseId;

    for (let n = RECORD_ID.COLLISION_SUFFIX_START; n <= RECORD_ID.MAX_COLLISIONS; n++) {
        const candidate = `${baseId}-${String(n).padStart(2, '0')}`;
        if (!taken.has(candidate)) return candidate;
    }

    throw new Error(
        `Collision overflow: ${baseId} has reached max limit of ${RECORD_ID.MAX_COLLISIONS} duplicates`
    );
}
