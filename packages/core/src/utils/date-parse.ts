/**
 * Date parsing utilities for the transaction parser and advisors.
 * All dates are handled as UTC (00:00:00Z) calendar days.
 */

const MS_PER_DAY = 86400 * 1000;

/**
 * Build a UTC date, rejecting rollovers such as 31/02.
 */
function utcDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

/**
 * Expand a two-digit year into 2000-2099.
 */
function expandYear(year: string): number {
    const value = parseInt(year, 10);
    return year.length === 2 ? 2000 + value : value;
}

/**
 * Parse MM/DD/YYYY or MM/DD/YY date string to Date (UTC).
 */
export function parseMdyDate(value: string): Date | null {
    const match = value.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4}|\d{2})$/);
    if (!match) return null;

    return utcDate(expandYear(match[3]), parseInt(match[1], 10), parseInt(match[2], 10));
}

/**
 * Parse DD-MM-YYYY date string to Date (UTC).
 */
export function parseDmyDate(value: string): Date | null {
    const match = value.match(/^(\d{1,2})-(\d{1,2})-(\d{4})$/);
    if (!match) return null;

    return utcDate(parseInt(match[3], 10), parseInt(match[2], 10), parseInt(match[1], 10));
}

/**
 * Parse YYYY-MM-DD date string to Date (UTC).
 */
export function parseIsoDate(value: string): Date | null {
    const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (!match) return null;

    return utcDate(parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10));
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Shift a date by whole days (negative goes back).
 */
export function addDays(date: Date, days: number): Date {
    return new Date(date.getTime() + days * MS_PER_DAY);
}

/**
 * Calendar month key (YYYY-MM) of an ISO date string.
 */
export function monthKey(isoDate: string): string {
    return isoDate.slice(0, 7);
}

/**
 * Every month key from `first` to `last` inclusive, e.g. 2026-11 .. 2027-01.
 */
export function monthRange(first: string, last: string): string[] {
    const keys: string[] = [];
    let year = parseInt(first.slice(0, 4), 10);
    let month = parseInt(first.slice(5, 7), 10);
    const endYear = parseInt(last.slice(0, 4), 10);
    const endMonth = parseInt(last.slice(5, 7), 10);

    while (year < endYear || (year === endYear && month <= endMonth)) {
        keys.push(`${year}-${String(month).padStart(2, '0')}`);
        month++;
        if (month > 12) {
            month = 1;
            year++;
        }
    }
    return keys;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}

/**
 * Today's local calendar day as a UTC midnight Date.
 */
export function localToday(now: Date = new Date()): Date {
    return new Date(Date.UTC(now.getFullYear(), now.getMonth(), now.getDate()));
}
