/**
 * Daily Weather Archive — Completeness Check
 */

import { enumerateDates } from './time';
import type { CompletenessReport, DateRange, WeatherResult } from './types';

/**
 * Report the days of `range` (inclusive) that have no record, in calendar order.
 * An empty result is valid input: every expected day is then missing.
 */
export function checkCompleteness(result: WeatherResult, range: DateRange): CompletenessReport {
    const present = new Set(result.records.map((record) => record.date));
    const missingDates = enumerateDates(range).filter((date) => !present.has(date));
    return { missingDates, isComplete: missingDates.length === 0 };
}
