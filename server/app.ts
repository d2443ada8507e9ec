/* eslint-disable no-console */

import express, { type NextFunction, type Request, type Response } from "express";
import {
  InvalidInputError,
  MalformedResponseError,
  UpstreamError,
  XLSX_CONTENT_TYPE,
  assertCoordinate,
  defaultRange,
  exportFileName,
  nearestSite,
  toCsv,
  toWorkbookBuffer,
  todayIn,
  type Coordinate,
  type HttpClient,
  type ReferenceSite
} from "@archive";
import type { AppConfig } from "./config";
import { archiveDebugHooks } from "./log";
import { buildDailyReport, type DailyReportContext, type DailyReportRequest } from "./report";

export interface AppDeps {
  config: AppConfig;
  sites: readonly ReferenceSite[];
  /** Archive HTTP client; defaults to the global fetch. */
  fetch?: HttpClient;
  clock?: () => Date;
}

function queryString(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function queryCoordinate(req: Request, fallback: Coordinate): Coordinate {
  const lat = queryString(req, "lat");
  const lon = queryString(req, "lon");
  if (lat === undefined && lon === undefined) return fallback;
  // Number(undefined) is NaN, which assertCoordinate rejects downstream.
  return { latitude: Number(lat), longitude: Number(lon) };
}

export function createApp(deps: AppDeps) {
  const { config, sites } = deps;
  const clock = deps.clock ?? (() => new Date());
  const app = express();

  function reportRequest(req: Request, now: Date): DailyReportRequest {
    const fallback = defaultRange(todayIn(config.timezone, now), config.defaultRangeDays);
    return {
      coordinate: queryCoordinate(req, config.defaultPoint),
      range: {
        start: queryString(req, "start") ?? fallback.start,
        end: queryString(req, "end") ?? fallback.end
      }
    };
  }

  function reportContext(now: Date): DailyReportContext {
    return {
      sites,
      timezone: config.timezone,
      now,
      fetchOptions: {
        fetch: deps.fetch,
        endpoint: config.archiveUrl,
        timeoutMs: config.timeoutMs,
        ...archiveDebugHooks(config.debug)
      }
    };
  }

  app.get("/api/sites", (_req, res) => {
    res.json({
      sites: sites.map((site) => ({
        name: site.name,
        latitude: site.coordinate.latitude,
        longitude: site.coordinate.longitude
      }))
    });
  });

  app.get("/api/nearest", (req, res, next) => {
    try {
      const coordinate = queryCoordinate(req, config.defaultPoint);
      const { site, distanceKm } = nearestSite(assertCoordinate(coordinate), sites);
      res.json({ site: site.name, distanceKm });
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/daily", async (req, res, next) => {
    try {
      const now = clock();
      const report = await buildDailyReport(reportRequest(req, now), reportContext(now));
      res.json(report);
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/daily.xlsx", async (req, res, next) => {
    try {
      const now = clock();
      const report = await buildDailyReport(reportRequest(req, now), reportContext(now));
      if (report.status === "no_data") {
        res.status(404).json({ error: report.message });
        return;
      }
      res
        .status(200)
        .type(XLSX_CONTENT_TYPE)
        .attachment(report.fileName)
        .send(toWorkbookBuffer(report.result.records));
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/daily.csv", async (req, res, next) => {
    try {
      const now = clock();
      const report = await buildDailyReport(reportRequest(req, now), reportContext(now));
      if (report.status === "no_data") {
        res.status(404).json({ error: report.message });
        return;
      }
      res
        .status(200)
        .type("text/csv")
        .attachment(exportFileName(report.nearest.site.name, report.range, "csv"))
        .send(toCsv(report.result.records));
    } catch (error) {
      next(error);
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof InvalidInputError) {
      res.status(400).json({ error: error.message });
      return;
    }
    if (error instanceof UpstreamError) {
      res.status(502).json({
        error: error.message,
        upstreamStatus: error.status,
        body: error.bodyExcerpt
      });
      return;
    }
    if (error instanceof MalformedResponseError) {
      res.status(502).json({ error: error.message, detail: error.detail });
      return;
    }
    console.error("[server] Unhandled error:", error);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
