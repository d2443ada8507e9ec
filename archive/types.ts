/**
 * Daily Weather Archive — Core Type Definitions
 *
 * Everything here is transient: built per query, discarded after the response.
 */

// =============================================================================
// Locations
// =============================================================================

export interface Coordinate {
    readonly latitude: number;
    readonly longitude: number;
}

/**
 * A named point from a static catalog, used only to label a queried coordinate.
 */
export interface ReferenceSite {
    readonly name: string;
    readonly coordinate: Coordinate;
}

export interface NearestSiteResult {
    site: ReferenceSite;
    distanceKm: number;
}

// =============================================================================
// Dates
// =============================================================================

/** Timezone-naive calendar day, always formatted "YYYY-MM-DD". */
export type CalendarDate = string;

/** Inclusive on both ends; `start <= end`. */
export interface DateRange {
    start: CalendarDate;
    end: CalendarDate;
}

// =============================================================================
// Weather Records
// =============================================================================

/**
 * One row per calendar day. A value is absent when the provider had none for that day.
 */
export interface DailyRecord {
    date: CalendarDate;
    tempMaxC?: number;
    tempMinC?: number;
    rainMm?: number;
}

/**
 * What the provider actually resolved the query to (it may snap to a grid cell).
 * Informational only: records are never re-keyed by it.
 */
export interface ResultMeta {
    resolvedLatitude: number;
    resolvedLongitude: number;
    elevationM: number;
}

export interface WeatherResult {
    /** Chronological, at most one record per date. */
    records: DailyRecord[];
    meta?: ResultMeta;
}

export interface CompletenessReport {
    /** Chronological. */
    missingDates: CalendarDate[];
    isComplete: boolean;
}
