/**
 * Daily Weather Archive — Calendar Date Utilities
 *
 * Dates are "YYYY-MM-DD" strings; arithmetic runs on UTC midnights so no local
 * timezone or DST shift can move a day.
 */

import { InvalidInputError } from './errors';
import type { CalendarDate, DateRange } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

// Open-Meteo daily keys are bare dates; a trailing time part is tolerated and dropped.
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d{1,3})?)?Z?)?$/;

function pad2(value: number): string {
    return String(value).padStart(2, '0');
}

function formatUtcDate(date: Date): CalendarDate {
    return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
}

function toUtcMs(date: CalendarDate): number {
    const [year, month, day] = date.split('-').map(Number);
    return Date.UTC(year, month - 1, day);
}

/**
 * Parse a provider date string into a calendar date.
 * Returns null for anything that is not a real day (e.g. "2024-02-30").
 */
export function parseCalendarDate(value: unknown): CalendarDate | null {
    if (typeof value !== 'string') return null;
    const match = DATE_RE.exec(value.trim());
    if (!match) return null;

    const [year, month, day] = match.slice(1, 4).map(Number);
    if (month < 1 || month > 12 || day < 1 || day > 31) return null;

    const utc = new Date(Date.UTC(year, month - 1, day));
    if (utc.getUTCFullYear() !== year || utc.getUTCMonth() !== month - 1 || utc.getUTCDate() !== day) {
        return null;
    }
    return formatUtcDate(utc);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
    return formatUtcDate(new Date(toUtcMs(date) + days * DAY_MS));
}

/**
 * Every calendar day from `range.start` to `range.end`, both included.
 */
export function enumerateDates(range: DateRange): CalendarDate[] {
    const out: CalendarDate[] = [];
    const endMs = toUtcMs(range.end);
    for (let ms = toUtcMs(range.start); ms <= endMs; ms += DAY_MS) {
        out.push(formatUtcDate(new Date(ms)));
    }
    return out;
}

/**
 * Validate and canonicalize a range. Throws InvalidInputError on unparseable
 * dates or `start > end`.
 */
export function assertDateRange(range: { start: unknown; end: unknown }): DateRange {
    const start = parseCalendarDate(range.start);
    const end = parseCalendarDate(range.end);
    if (!start) throw new InvalidInputError(`Invalid start date: ${String(range.start)}`);
    if (!end) throw new InvalidInputError(`Invalid end date: ${String(range.end)}`);
    if (start > end) {
        throw new InvalidInputError(`Invalid date range: start ${start} is after end ${end}`);
    }
    return { start, end };
}

/**
 * Today's calendar date as seen in `timeZone`.
 */
export function todayIn(timeZone: string, now: Date = new Date()): CalendarDate {
    let parts: Intl.DateTimeFormatPart[];
    try {
        parts = new Intl.DateTimeFormat('en-CA', {
            timeZone,
            year: 'numeric',
            month: '2-digit',
            day: '2-digit'
        }).formatToParts(now);
    } catch {
        throw new InvalidInputError(`Unknown timezone: ${timeZone}`);
    }

    const values: Record<string, string> = {};
    for (const part of parts) {
        if (part.type !== 'literal') values[part.type] = part.value;
    }
    return `${values.year}-${values.month}-${values.day}`;
}

/**
 * The trailing window `[today - days, today]`.
 */
export function defaultRange(today: CalendarDate, days = 14): DateRange {
    return { start: addDays(today, -days), end: today };
}
