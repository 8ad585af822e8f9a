/**
 * Parsers for the Takeout "My Activity" JSON files.
 */
import { toIsoTimestamp } from "../../core/timestamps.js";
import type { Row } from "../../core/types.js";
import {
  TakeoutActivitySchema,
  TakeoutHistorySchema,
  type TakeoutActivity,
} from "./schemas.js";

const AD_MARKERS = ["Google Ads", "Google Adverteren"];
const WATCH_PREFIXES = ["Watched ", "Bekeken "];
const SEARCH_PREFIXES = ["Searched for ", "Gezocht naar "];

function stripPrefix(text: string, prefixes: readonly string[]): string {
  const prefix = prefixes.find((p) => text.startsWith(p));
  return prefix ? text.slice(prefix.length) : text;
}

function parseActivities(json: string): TakeoutActivity[] {
  const items = TakeoutHistorySchema.parse(JSON.parse(json));
  const out: TakeoutActivity[] = [];
  for (const item of items) {
    const parsed = TakeoutActivitySchema.safeParse(item);
    if (parsed.success) out.push(parsed.data);
  }
  return out;
}

function isAd(activity: TakeoutActivity): boolean {
  return (activity.details ?? []).some((d) =>
    AD_MARKERS.some((marker) => d.name.includes(marker)),
  );
}

/** `watch-history.json` → the same columns as the HTML variant. */
export function watchHistoryFromJson(json: string): Row[] {
  return parseActivities(json).map((a) => ({
    Title: stripPrefix(a.title, WATCH_PREFIXES),
    Url: a.titleUrl ?? null,
    Advertisement: isAd(a) ? "Yes" : "No",
    Channel: a.subtitles?.[0]?.name ?? null,
    Date: a.time,
    "Date standard format": toIsoTimestamp(a.time),
  }));
}

/** `search-history.json` → rows, ads left out. */
export function searchHistoryFromJson(json: string): Row[] {
  return parseActivities(json)
    .filter((a) => !isAd(a))
    .map((a) => ({
      "Search Terms": stripPrefix(a.title, SEARCH_PREFIXES),
      Url: a.titleUrl ?? null,
      Date: a.time,
      "Date standard format": toIsoTimestamp(a.time),
    }));
}
