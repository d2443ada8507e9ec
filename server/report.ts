import {
  InvalidInputError,
  NO_DATA_MESSAGE,
  assertCoordinate,
  assertDateRange,
  buildChartSeries,
  checkCompleteness,
  describeCompleteness,
  exportFileName,
  fetchDaily,
  nearestSite,
  toTableRows,
  todayIn,
  type CompletenessReport,
  type Coordinate,
  type DailyCharts,
  type DateRange,
  type FetchDailyOptions,
  type NearestSiteResult,
  type ReferenceSite,
  type TableRow,
  type WeatherResult
} from "@archive";

export interface DailyReportRequest {
  coordinate: Coordinate;
  range: { start: unknown; end: unknown };
}

export interface DailyReportContext {
  sites: readonly ReferenceSite[];
  /** Civil timezone for the archive query and for "today". */
  timezone: string;
  fetchOptions?: Omit<FetchDailyOptions, "timezone">;
  now?: Date;
}

export interface DailyReport {
  coordinate: Coordinate;
  range: DateRange;
  /** Display label only. */
  nearest: NearestSiteResult;
  status: "ok" | "no_data";
  message: string;
  result: WeatherResult;
  rows: TableRow[];
  completeness: CompletenessReport;
  charts: DailyCharts;
  fileName: string;
}

/**
 * Validate inputs, fetch the archive once, then check completeness and shape the
 * outputs for display and export.
 */
export async function buildDailyReport(
  request: DailyReportRequest,
  context: DailyReportContext
): Promise<DailyReport> {
  const coordinate = assertCoordinate(request.coordinate);
  const range = assertDateRange(request.range);
  const today = todayIn(context.timezone, context.now);
  if (range.end > today) {
    throw new InvalidInputError(`End date ${range.end} is after today (${today})`);
  }

  const nearest = nearestSite(coordinate, context.sites);
  const result = await fetchDaily(coordinate, range, {
    ...context.fetchOptions,
    timezone: context.timezone
  });
  const completeness = checkCompleteness(result, range);
  const hasData = result.records.length > 0;

  return {
    coordinate,
    range,
    nearest,
    status: hasData ? "ok" : "no_data",
    message: hasData ? describeCompleteness(completeness) : NO_DATA_MESSAGE,
    result,
    rows: toTableRows(result.records),
    completeness,
    charts: buildChartSeries(result.records),
    fileName: exportFileName(nearest.site.name, range)
  };
}
