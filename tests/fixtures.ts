/**
 * Shared test fixtures: mini export files, zip builder, flow helpers.
 */
import { mkdtempSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { zipSync, strToU8 } from "fflate";

import type { Command, Payload } from "../src/core/commands.js";
import { createLogger, EventSink } from "../src/core/logger.js";
import { DonationFlow, type DonationFlowOptions } from "../src/core/workflow.js";
import { PLATFORM_REGISTRY, Platform } from "../src/providers/registry.js";

export const silentLogger = createLogger({ level: "silent" });

// ---------------------------------------------------------------------------
// YouTube Takeout fixtures
// ---------------------------------------------------------------------------

const OUTER = "outer-cell mdl-cell mdl-cell--12-col mdl-shadow--2dp";
const CONTENT = "content-cell mdl-cell mdl-cell--6-col mdl-typography--body-1";
const CAPTION = "content-cell mdl-cell mdl-cell--12-col mdl-typography--caption";

function activityEntry(content: string, caption: string): string {
  return `<div class="${OUTER}"><div class="mdl-grid">
<div class="header-cell mdl-cell mdl-cell--12-col"><p class="mdl-typography--title">YouTube<br></p></div>
<div class="${CONTENT}">${content}</div>
<div class="${CONTENT} mdl-typography--text-right"></div>
<div class="${CAPTION}"><b>Products:</b><br>&emsp;YouTube<br>${caption}</div>
</div></div>`;
}

function activityPage(entries: string[]): string {
  return `<html><head><title>Activity</title></head><body><div class="mdl-grid">${entries.join("\n")}</div></body></html>`;
}

export const WATCH_HISTORY_HTML = activityPage([
  activityEntry(
    'Watched&nbsp;<a href="https://www.youtube.com/watch?v=vid1">Learning to bake</a><br><a href="https://www.youtube.com/channel/ch1">Baking Channel</a><br>Jan 5, 2023, 9:15:00 PM CET',
    "",
  ),
  activityEntry(
    'Watched&nbsp;<a href="https://www.youtube.com/watch?v=vid2">Buy this phone</a><br>Feb 1, 2023, 8:00:00 AM CET',
    "<b>Details:</b><br>&emsp;From Google Ads<br>",
  ),
]);

export const SEARCH_HISTORY_HTML = activityPage([
  activityEntry(
    'Searched for&nbsp;<a href="https://www.youtube.com/results?search_query=sourdough">sourdough</a><br>Mar 3, 2023, 12:30:00 PM CET',
    "",
  ),
  activityEntry(
    'Searched for&nbsp;<a href="https://www.youtube.com/results?search_query=phones">phones</a><br>Mar 4, 2023, 1:00:00 PM CET',
    "<b>Details:</b><br>&emsp;From Google Ads<br>",
  ),
]);

export const KIJKGESCHIEDENIS_HTML = activityPage([
  activityEntry(
    'Bekeken&nbsp;<a href="https://www.youtube.com/watch?v=vid3">Moestuin beginnen</a><br><a href="https://www.youtube.com/channel/ch3">Tuinkanaal</a><br>5 jan 2023, 21:15:00 CET',
    "",
  ),
  activityEntry(
    'Bekeken&nbsp;<a href="https://www.youtube.com/watch?v=vid4">Koop deze fiets</a><br>12 mrt 2023, 09:05:00 CET',
    "<b>Details:</b><br>&emsp;Van Google Adverteren<br>",
  ),
]);

export const ZOEKGESCHIEDENIS_HTML = activityPage([
  activityEntry(
    'Gezocht naar&nbsp;<a href="https://www.youtube.com/results?search_query=moestuin">moestuin</a><br>6 jan 2023, 10:00:00 CET',
    "",
  ),
  activityEntry(
    'Gezocht naar&nbsp;<a href="https://www.youtube.com/results?search_query=fietsen">fietsen</a><br>7 jan 2023, 11:00:00 CET',
    "<b>Details:</b><br>&emsp;Van Google Adverteren<br>",
  ),
]);

export const ABONNEMENTEN_CSV =
  "Kanaal-ID,Kanaal-URL,Kanaaltitel\n" +
  "ch3,http://www.youtube.com/channel/ch3,Tuinkanaal\n";

export const REACTIES_CSV =
  "Reactie-ID,Video-ID,Reactietekst\n" +
  'r1,vid3,"Mooi, dank je!"\n' +
  "r2,vid5,Wat een goed idee\n";

export const WATCH_HISTORY_JSON = [
  {
    header: "YouTube",
    title: "Watched Learning to bake",
    titleUrl: "https://www.youtube.com/watch?v=vid1",
    subtitles: [{ name: "Baking Channel", url: "https://www.youtube.com/channel/ch1" }],
    time: "2023-01-05T20:15:00.000Z",
  },
  {
    header: "YouTube",
    title: "Watched Buy this phone",
    titleUrl: "https://www.youtube.com/watch?v=vid2",
    details: [{ name: "From Google Ads" }],
    time: "2023-02-01T07:00:00.000Z",
  },
  { header: "YouTube", title: "Watched a video that has been removed" },
];

export const SEARCH_HISTORY_JSON = [
  {
    title: "Searched for sourdough",
    titleUrl: "https://www.youtube.com/results?search_query=sourdough",
    time: "2023-03-03T11:30:00.000Z",
  },
];

export const SUBSCRIPTIONS_CSV =
  "Channel Id,Channel Url,Channel Title\n" +
  "ch1,http://www.youtube.com/channel/ch1,Baking Channel\n" +
  "ch2,http://www.youtube.com/channel/ch2,Garden Channel\n";

export const WATCH_LATER_CSV =
  "Playlist Id,Channel Id,Time Created,Time Updated,Title,Title Description,Visibility\n" +
  "WL,ch0,2022-01-01 00:00:00 UTC,2023-01-01 00:00:00 UTC,Watch later,,Private\n" +
  "\n" +
  "Video-ID,Playlist Video Creation Timestamp\n" +
  "vid9,2023-01-02T10:00:00+00:00\n";

export const TAKEOUT_DIR = "Takeout/YouTube and YouTube Music";

// ---------------------------------------------------------------------------
// TikTok fixtures
// ---------------------------------------------------------------------------

export const TIKTOK_USER_DATA = {
  Activity: {
    "Video Browsing History": {
      VideoList: [
        { Date: "2023-01-01 10:00:00", Link: "https://www.tiktokv.com/share/video/1/" },
        { Date: "2023-01-02 11:00:00", Link: "https://www.tiktokv.com/share/video/2/" },
        { Date: "2023-01-03 12:00:00", Link: "https://www.tiktokv.com/share/video/3/" },
      ],
    },
    "Like List": {
      ItemFavoriteList: [
        { date: "2023-02-01 09:00:00", link: "https://www.tiktokv.com/share/video/4/" },
      ],
    },
    "Search History": {
      SearchList: [{ Date: "2023-03-01 08:00:00", SearchTerm: "plants" }],
    },
    "Share History": {
      ShareHistoryList: [
        {
          Date: "2023-04-01 07:00:00",
          SharedContent: "video",
          Link: "https://www.tiktokv.com/share/video/5/",
          Method: "chat_head",
        },
      ],
    },
    "Following List": {
      Following: [{ Date: "2023-05-01 06:00:00", UserName: "creator_one" }],
    },
  },
  "App Settings": {
    "Block List": { BlockList: [] },
  },
};

export const TIKTOK_BROWSING_TXT =
  "Date: 2023-01-01 10:00:00\nLink: https://www.tiktokv.com/share/video/1/\n\n" +
  "Date: 2023-01-02 11:00:00\nLink: https://www.tiktokv.com/share/video/2/\n";

export const TIKTOK_FOLLOWER_TXT = "Date: 2023-06-01 05:00:00\nUsername: fan_one\n";

// ---------------------------------------------------------------------------
// Zip builder helper
// ---------------------------------------------------------------------------

export function buildZip(files: Record<string, string | Uint8Array>): Uint8Array {
  const zipFiles: Record<string, Uint8Array> = {};
  for (const [name, data] of Object.entries(files)) {
    zipFiles[name] =
      typeof data === "string" ? strToU8(data) : data;
  }
  return zipSync(zipFiles);
}

export function youtubeHtmlZip(): Uint8Array {
  return buildZip({
    [`${TAKEOUT_DIR}/history/watch-history.html`]: WATCH_HISTORY_HTML,
    [`${TAKEOUT_DIR}/history/search-history.html`]: SEARCH_HISTORY_HTML,
    [`${TAKEOUT_DIR}/subscriptions/subscriptions.csv`]: SUBSCRIPTIONS_CSV,
    [`${TAKEOUT_DIR}/playlists/Watch later.csv`]: WATCH_LATER_CSV,
  });
}

export const TAKEOUT_DIR_NL = "Takeout/YouTube en YouTube Music";

export function youtubeDutchHtmlZip(): Uint8Array {
  return buildZip({
    [`${TAKEOUT_DIR_NL}/geschiedenis/kijkgeschiedenis.html`]: KIJKGESCHIEDENIS_HTML,
    [`${TAKEOUT_DIR_NL}/geschiedenis/zoekgeschiedenis.html`]: ZOEKGESCHIEDENIS_HTML,
    [`${TAKEOUT_DIR_NL}/abonnementen/abonnementen.csv`]: ABONNEMENTEN_CSV,
    [`${TAKEOUT_DIR_NL}/reacties/reacties.csv`]: REACTIES_CSV,
  });
}

export function tiktokJson(): Uint8Array {
  return strToU8(JSON.stringify(TIKTOK_USER_DATA));
}

// ---------------------------------------------------------------------------
// Temp dir helpers
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "ddp-donate-test-"));
}

export function writeFixture(dir: string, name: string, data: Uint8Array | string): string {
  const p = join(dir, name);
  writeFileSync(p, data);
  return p;
}

// ---------------------------------------------------------------------------
// Flow helpers
// ---------------------------------------------------------------------------

/** A flow whose file references are keys into `files`. */
export function makeFlow(
  files: Record<string, Uint8Array>,
  opts: Partial<DonationFlowOptions> = {},
): DonationFlow {
  return new DonationFlow({
    sessionId: "s1",
    platforms: [PLATFORM_REGISTRY[Platform.YouTube], PLATFORM_REGISTRY[Platform.TikTok]],
    logger: opts.sink ? undefined : silentLogger,
    logLevel: "info",
    loadFile: async (ref) => {
      const data = files[ref];
      if (!data) throw new Error(`no such file: ${ref}`);
      return data;
    },
    ...opts,
  });
}

export const SKIP: Payload = { kind: "void" };
export const YES: Payload = { kind: "true" };
export const NO: Payload = { kind: "false" };

export function file(ref: string): Payload {
  return { kind: "string", value: ref };
}

/** Command kinds in order, with status messages and donate keys spelled out. */
export function describeCommands(commands: Command[]): string[] {
  return commands.map((c) => {
    switch (c.kind) {
      case "render":
        return c.page.kind === "end" ? "render:end" : `render:${c.page.body.kind}`;
      case "donate":
        return `donate:${c.key}`;
      case "status":
        return `status:${c.message}`;
      case "exit":
        return `exit:${c.code}`;
    }
  });
}

export { EventSink };
