/**
 * Scrapers for the Takeout "My Activity" HTML pages.
 */
import * as cheerio from "cheerio";
import type { AnyNode, Element } from "domhandler";

import { ExtractionFailedException } from "../../core/exceptions.js";
import { stripNonAscii, toIsoTimestamp } from "../../core/timestamps.js";
import type { Row } from "../../core/types.js";

const OUTER_CLASS = "outer-cell mdl-cell mdl-cell--12-col mdl-shadow--2dp";
const CONTENT_CLASS = "content-cell mdl-cell mdl-cell--6-col mdl-typography--body-1";
const CAPTION_CLASS = "content-cell mdl-cell mdl-cell--12-col mdl-typography--caption";

const AD_MARKERS = ["Google Ads", "Google Adverteren"];

interface ActivityEntry {
  title: string | null;
  url: string | null;
  channel: string | null;
  isAd: boolean;
  date: string;
}

function ownText($: cheerio.CheerioAPI, selection: cheerio.Cheerio<Element>): string[] {
  return selection
    .contents()
    .toArray()
    .filter((node: AnyNode) => node.nodeType === 3)
    .map((node: AnyNode) => $(node).text());
}

function parseActivity(html: string): ActivityEntry[] {
  const $ = cheerio.load(html);
  const entries: ActivityEntry[] = [];

  $(`div[class="${OUTER_CLASS}"]`).each((_index: number, outer: Element) => {
    const cells = $(outer).children("div").children("div");

    const caption = cells.filter(`[class="${CAPTION_CLASS}"]`).first();
    if (caption.length === 0) {
      throw new ExtractionFailedException("activity entry without caption cell");
    }
    const captionText = ownText($, caption).join("");
    const isAd = AD_MARKERS.some((marker) => captionText.includes(marker));

    const content = cells.filter(`[class="${CONTENT_CLASS}"]`).first();
    if (content.length === 0) {
      throw new ExtractionFailedException("activity entry without content cell");
    }

    const texts = ownText($, content);
    const date = stripNonAscii(texts.pop() ?? "");
    const anchors = content.children("a");

    let title: string | null;
    let url: string | null;
    if (anchors.length > 0) {
      title = anchors.eq(0).text();
      url = anchors.eq(0).attr("href") ?? null;
    } else {
      title = texts[0] ?? null;
      url = null;
    }
    const channel = anchors.length > 1 ? anchors.eq(1).text() : null;

    entries.push({ title, url, channel, isAd, date });
  });

  return entries;
}

/** `watch-history.html` / `kijkgeschiedenis.html` → rows. */
export function watchHistoryFromHtml(html: string): Row[] {
  return parseActivity(html).map((e) => ({
    Title: e.title,
    Url: e.url,
    Advertisement: e.isAd ? "Yes" : "No",
    Channel: e.channel,
    Date: e.date,
    "Date standard format": toIsoTimestamp(e.date),
  }));
}

/** `search-history.html` / `zoekgeschiedenis.html` → rows, ads left out. */
export function searchHistoryFromHtml(html: string): Row[] {
  return parseActivity(html)
    .filter((e) => !e.isAd)
    .map((e) => ({
      "Search Terms": e.title,
      Url: e.url,
      Date: e.date,
      "Date standard format": toIsoTimestamp(e.date),
    }));
}
