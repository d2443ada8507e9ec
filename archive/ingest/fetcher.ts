/**
 * Daily Weather Archive — Ingest Fetcher
 *
 * Fetches daily aggregates from the Open-Meteo archive and normalizes the parallel
 * arrays of the `daily` block into one record per calendar day.
 */

import { InvalidInputError, MalformedResponseError, UpstreamError } from '../errors';
import { assertCoordinate } from '../location';
import { assertDateRange, parseCalendarDate } from '../time';
import type { Coordinate, DailyRecord, DateRange, ResultMeta, WeatherResult } from '../types';

// =============================================================================
// Configuration
// =============================================================================

export const ARCHIVE_ENDPOINT = 'https://archive-api.open-meteo.com/v1/archive';

/** Day boundaries follow this civil timezone unless the caller overrides it. */
export const DEFAULT_TIMEZONE = 'Europe/Paris';

export const DEFAULT_TIMEOUT_MS = 30_000;

const BODY_EXCERPT_LENGTH = 500;

export const DAILY_VARIABLES = [
    'temperature_2m_max',
    'temperature_2m_min',
    'precipitation_sum'
] as const;

export type DailyVariable = (typeof DAILY_VARIABLES)[number];

type DailyField = Exclude<keyof DailyRecord, 'date'>;

const FIELD_BY_VARIABLE = {
    temperature_2m_max: 'tempMaxC',
    temperature_2m_min: 'tempMinC',
    precipitation_sum: 'rainMm'
} as const satisfies Record<DailyVariable, DailyField>;

// =============================================================================
// HTTP seam
// =============================================================================

/** The slice of a fetch Response the fetcher reads. */
export interface HttpResponse {
    ok: boolean;
    status: number;
    text(): Promise<string>;
}

export type HttpClient = (url: string, init: { signal: AbortSignal }) => Promise<HttpResponse>;

export interface FetchDailyOptions {
    /** Defaults to the global fetch. */
    fetch?: HttpClient;
    endpoint?: string;
    timezone?: string;
    timeoutMs?: number;
    /** Called once before the request is sent. */
    onRequest?: (event: { url: string }) => void;
    /** Called once a status line came back, before the body is interpreted. */
    onResponse?: (event: { url: string; status: number }) => void;
}

/**
 * Build the archive request URL. `daily` is sent as a repeated parameter.
 */
export function buildArchiveUrl(
    coordinate: Coordinate,
    range: DateRange,
    options: Pick<FetchDailyOptions, 'endpoint' | 'timezone'> = {}
): string {
    const url = new URL(options.endpoint ?? ARCHIVE_ENDPOINT);
    url.searchParams.set('latitude', coordinate.latitude.toString());
    url.searchParams.set('longitude', coordinate.longitude.toString());
    url.searchParams.set('start_date', range.start);
    url.searchParams.set('end_date', range.end);
    for (const variable of DAILY_VARIABLES) {
        url.searchParams.append('daily', variable);
    }
    url.searchParams.set('timezone', options.timezone ?? DEFAULT_TIMEZONE);
    return url.toString();
}

// =============================================================================
// Fetching
// =============================================================================

/**
 * Fetch daily max/min temperature and precipitation for one point.
 *
 * Exactly one request per call, no retries. Throws UpstreamError on non-2xx or
 * transport failure and MalformedResponseError on an uninterpretable body. A body
 * without a `daily` block resolves to an empty result.
 */
export async function fetchDaily(
    coordinate: Coordinate,
    range: DateRange,
    options: FetchDailyOptions = {}
): Promise<WeatherResult> {
    const point = assertCoordinate(coordinate);
    const dates = assertDateRange(range);
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
        throw new InvalidInputError(`Invalid timeout: ${timeoutMs}`);
    }

    const client: HttpClient = options.fetch ?? fetch;
    const url = buildArchiveUrl(point, dates, options);
    options.onRequest?.({ url });

    let response: HttpResponse;
    try {
        response = await client(url, { signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
        throw transportError(error, timeoutMs);
    }
    options.onResponse?.({ url, status: response.status });

    if (!response.ok) {
        // The status is known even when the error body cannot be read.
        const excerpt = await response.text().then(
            (text) => Array.from(text).slice(0, BODY_EXCERPT_LENGTH).join(''),
            () => ''
        );
        throw new UpstreamError(response.status, excerpt);
    }

    let body: string;
    try {
        body = await response.text();
    } catch (error) {
        throw transportError(error, timeoutMs);
    }

    let payload: unknown;
    try {
        payload = JSON.parse(body);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new MalformedResponseError(`body is not JSON (${reason})`);
    }

    return normalizeArchiveResponse(payload);
}

/**
 * Fetch several points concurrently. Results come back in input order; the first
 * failure rejects the whole batch.
 */
export async function fetchDailyForPoints(
    points: readonly Coordinate[],
    range: DateRange,
    options: FetchDailyOptions = {}
): Promise<WeatherResult[]> {
    return Promise.all(points.map((point) => fetchDaily(point, range, options)));
}

function transportError(error: unknown, timeoutMs: number): UpstreamError {
    const name = typeof error === 'object' && error !== null && 'name' in error ? error.name : undefined;
    if (name === 'TimeoutError') {
        return new UpstreamError(null, '', `Archive request timed out after ${timeoutMs}ms`);
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new UpstreamError(null, '', `Archive request failed: ${reason}`);
}

// =============================================================================
// Normalization
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function finiteOrNull(value: unknown): number | null {
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function extractMeta(payload: Record<string, unknown>): ResultMeta | undefined {
    const latitude = finiteOrNull(payload.latitude);
    const longitude = finiteOrNull(payload.longitude);
    const elevation = finiteOrNull(payload.elevation);
    if (latitude === null || longitude === null || elevation === null) return undefined;
    return { resolvedLatitude: latitude, resolvedLongitude: longitude, elevationM: elevation };
}

/**
 * Turn a parsed archive payload into a WeatherResult.
 *
 * - Rows whose date does not parse are dropped, never shifted onto a neighbour;
 *   a block with no `time` column yields no rows.
 * - A repeated date keeps its first row.
 * - Output is sorted by date.
 */
export function normalizeArchiveResponse(payload: unknown): WeatherResult {
    if (!isRecord(payload)) {
        throw new MalformedResponseError('expected a JSON object at the top level');
    }

    const daily = payload.daily;
    if (daily === undefined || daily === null) {
        return { records: [] };
    }
    if (!isRecord(daily)) {
        throw new MalformedResponseError('"daily" is not an object');
    }

    const times = daily.time;
    if (times === undefined || times === null) {
        // No date column: no row can be keyed.
        return { records: [] };
    }
    if (!Array.isArray(times)) {
        throw new MalformedResponseError('"daily.time" is not an array');
    }

    const columns: Partial<Record<DailyVariable, unknown[]>> = {};
    for (const variable of DAILY_VARIABLES) {
        const values = daily[variable];
        if (values === undefined || values === null) continue;
        if (!Array.isArray(values)) {
            throw new MalformedResponseError(`"daily.${variable}" is not an array`);
        }
        columns[variable] = values;
    }

    const byDate = new Map<string, DailyRecord>();
    times.forEach((raw, index) => {
        const date = parseCalendarDate(raw);
        if (!date || byDate.has(date)) return;

        const record: DailyRecord = { date };
        for (const variable of DAILY_VARIABLES) {
            const value = finiteOrNull(columns[variable]?.[index]);
            if (value !== null) record[FIELD_BY_VARIABLE[variable]] = value;
        }
        byDate.set(date, record);
    });

    const records = [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
    const meta = extractMeta(payload);
    return meta ? { records, meta } : { records };
}
