/**
 * Advisor result type.
 *
 * Advisors never throw: invalid input and unsafe configurations come back
 * as { ok: false, error }.
 */
export type AdvisoryResult<T> =
    | { ok: true; report: T }
    | { ok: false; error: string };

export function advisoryError<T>(e: unknown): AdvisoryResult<T> {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
}
