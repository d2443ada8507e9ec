/**
 * Daily Weather Archive — Presentation Models
 *
 * Shapes the record set for a table, the two daily charts and the download name.
 * Rendering itself happens elsewhere.
 */

import type { CalendarDate, CompletenessReport, DailyRecord, DateRange } from './types';

export const TABLE_COLUMNS = ['date', 'temp_max_C', 'temp_min_C', 'rain_mm'] as const;

export type TableRow = {
    date: CalendarDate;
    temp_max_C: number | null;
    temp_min_C: number | null;
    rain_mm: number | null;
};

export interface ChartPoint {
    date: CalendarDate;
    value: number | null;
}

export interface ChartSeries {
    kind: 'line' | 'bar';
    title: string;
    unit: string;
    points: ChartPoint[];
}

export interface DailyCharts {
    /** Null when no day has a max temperature. */
    tempMax: ChartSeries | null;
    /** Null when no day has a rain value. */
    rain: ChartSeries | null;
}

export const NO_DATA_MESSAGE = 'No weather data returned for this date range.';

export function toTableRows(records: readonly DailyRecord[]): TableRow[] {
    return records.map((record) => ({
        date: record.date,
        temp_max_C: record.tempMaxC ?? null,
        temp_min_C: record.tempMinC ?? null,
        rain_mm: record.rainMm ?? null
    }));
}

function buildSeries(
    records: readonly DailyRecord[],
    pick: (record: DailyRecord) => number | undefined,
    series: Omit<ChartSeries, 'points'>
): ChartSeries | null {
    const points = records.map((record) => ({ date: record.date, value: pick(record) ?? null }));
    if (points.every((point) => point.value === null)) return null;
    return { ...series, points };
}

export function buildChartSeries(records: readonly DailyRecord[]): DailyCharts {
    return {
        tempMax: buildSeries(records, (r) => r.tempMaxC, {
            kind: 'line',
            title: 'Daily maximum temperature (°C)',
            unit: '°C'
        }),
        rain: buildSeries(records, (r) => r.rainMm, {
            kind: 'bar',
            title: 'Daily cumulative rain (mm)',
            unit: 'mm / day'
        })
    };
}

export function describeCompleteness(report: CompletenessReport): string {
    if (report.isComplete) {
        return 'All dates between start and end are present.';
    }
    return `Some dates have no weather row: ${report.missingDates.join(', ')}`;
}

function slugify(value: string): string {
    const slug = value
        .normalize('NFD')
        .replace(/[\u0300-\u036f]/g, '')
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
    return slug || 'site';
}

/**
 * e.g. `meteo_saint-brieuc_2024-01-01_to_2024-01-14.xlsx`
 */
export function exportFileName(siteName: string, range: DateRange, extension: 'xlsx' | 'csv' = 'xlsx'): string {
    return `meteo_${slugify(siteName)}_${range.start}_to_${range.end}.${extension}`;
}
