/* eslint-disable no-console */

import type { FetchDailyOptions } from "@archive";

export type ArchiveHooks = Pick<FetchDailyOptions, "onRequest" | "onResponse">;

/**
 * Console hooks for the archive fetcher; empty when debug logging is off.
 */
export function archiveDebugHooks(enabled: boolean): ArchiveHooks {
  if (!enabled) return {};
  return {
    onRequest: ({ url }) => console.log(`[daily] GET ${url}`),
    onResponse: ({ url, status }) => console.log(`[daily] ${status} ${url}`)
  };
}
