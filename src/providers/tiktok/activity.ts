/**
 * The TikTok tables and where their records live in each export flavour.
 */
import { findFirst, flatten } from "../../core/flatten.js";
import type { Row, Translatable, VizSpec } from "../../core/types.js";

export interface ColumnSpec {
  column: string;
  /** Substrings tried in order against the flattened record. */
  fields: readonly string[];
}

export interface TikTokTableSpec {
  name: string;
  title: Translatable;
  description: Translatable;
  /** Key of the record list in the JSON export. */
  listKey: string;
  /** File holding the same records in the TXT export. */
  txtFile: string;
  columns: readonly ColumnSpec[];
  visualizations?: VizSpec[];
  /** Split into `rowCap` sized chunks; only the first is shown. */
  chunked?: boolean;
}

const DATE: ColumnSpec = { column: "Date", fields: ["Date", "date"] };
const VIDEO: ColumnSpec = { column: "Video", fields: ["Link", "link"] };
const USERNAME: ColumnSpec = { column: "Username", fields: ["UserName", "Username"] };

export const TIKTOK_TABLES: readonly TikTokTableSpec[] = [
  {
    name: "tiktok_video_browsing_history",
    title: { en: "Watch history", nl: "Kijkgeschiedenis" },
    description: {
      en: "The table below shows which TikTok videos you watched and when. The chart shows how many videos you watched each month. If the table is cut off, the rest of your history is still part of the donation.",
      nl: "De tabel hieronder laat zien welke TikTok video's je hebt bekeken en wanneer. De grafiek laat zien hoeveel video's je elke maand hebt bekeken. Is de tabel afgekapt, dan hoort de rest van je geschiedenis nog steeds bij de donatie.",
    },
    listKey: "VideoList",
    txtFile: "Browsing History.txt",
    columns: [DATE, VIDEO],
    visualizations: [
      {
        type: "area",
        title: {
          en: "Total number of videos watched per month",
          nl: "Totaal aantal video's gekeken per maand",
        },
        group: { column: "Date", dateFormat: "month" },
        values: [{ label: "Aantal" }],
      },
    ],
    chunked: true,
  },
  {
    name: "tiktok_favorite_videos",
    title: { en: "Favorite videos", nl: "Favoriete video's" },
    description: {
      en: "In the table below you will find the videos that are among your favorites.",
      nl: "In de tabel hieronder vind je de video's die tot je favorieten behoren.",
    },
    listKey: "FavoriteVideoList",
    txtFile: "Favorite Videos.txt",
    columns: [DATE, VIDEO],
  },
  {
    name: "tiktok_favorite_hashtags",
    title: { en: "Favorite hashtags", nl: "Favoriete hashtags" },
    description: {
      en: "The table below lists the hashtags that are among your favorites.",
      nl: "In de tabel hieronder vind je de hashtags die tot je favorieten behoren.",
    },
    listKey: "FavoriteHashtagList",
    txtFile: "Favorite Hashtags.txt",
    columns: [DATE, { column: "Hashtag", fields: ["Link", "link"] }],
  },
  {
    name: "tiktok_like_list",
    title: { en: "Videos you have liked", nl: "Video's die je hebt geliket" },
    description: {
      en: "The table below shows the videos you've liked and when that was.",
      nl: "In de tabel hieronder vind je de video's die je hebt geliket en wanneer dat was.",
    },
    listKey: "ItemFavoriteList",
    txtFile: "Like List.txt",
    columns: [DATE, VIDEO],
  },
  {
    name: "tiktok_searches",
    title: { en: "Search terms", nl: "Zoektermen" },
    description: {
      en: "The table below shows what you searched for and when that was.",
      nl: "De tabel hieronder laat zien wat je hebt gezocht en wanneer dat was.",
    },
    listKey: "SearchList",
    txtFile: "Searches.txt",
    columns: [DATE, { column: "Search Term", fields: ["SearchTerm", "Search Term"] }],
    visualizations: [
      {
        type: "wordcloud",
        title: { en: "", nl: "" },
        textColumn: "Search Term",
      },
    ],
  },
  {
    name: "tiktok_share_history",
    title: { en: "Shared videos", nl: "Gedeelde video's" },
    description: {
      en: "The table below shows what you shared, at what time and how.",
      nl: "In de tabel hieronder vind je wat je hebt gedeeld, op welk tijdstip en de manier waarop.",
    },
    listKey: "ShareHistoryList",
    txtFile: "Share History.txt",
    columns: [
      DATE,
      { column: "Shared Content", fields: ["SharedContent", "Shared Content"] },
      VIDEO,
      { column: "Method", fields: ["Method"] },
    ],
  },
  {
    name: "tiktok_followers",
    title: { en: "Followers", nl: "Followers" },
    description: {
      en: "The table below shows your followers and when they started following you.",
      nl: "In de tabel hieronder vind je je followers en het tijdstip waarop ze je gingen followen.",
    },
    listKey: "FansList",
    txtFile: "Follower.txt",
    columns: [DATE, USERNAME],
  },
  {
    name: "tiktok_following",
    title: { en: "Following", nl: "Following" },
    description: {
      en: "The table below shows users you follow and the time you started following them.",
      nl: "In de tabel hieronder vind je gebruikers die je volgt en het tijdstip waarop je ze bent gaan volgen.",
    },
    listKey: "Following",
    txtFile: "Following.txt",
    columns: [DATE, USERNAME],
  },
  {
    name: "tiktok_block_list",
    title: { en: "Blocked accounts on TikTok", nl: "Geblokkeerde accounts op TikTok" },
    description: {
      en: "Below are users you block.",
      nl: "Hieronder vind je gebruikers die je blokkeert.",
    },
    listKey: "BlockList",
    txtFile: "Block List.txt",
    columns: [DATE, USERNAME],
  },
];

/** Resolve every column of a record, whatever its nesting. */
export function recordToRow(record: unknown, columns: readonly ColumnSpec[]): Row {
  const table = flatten(record);
  const row: Row = {};
  for (const { column, fields } of columns) {
    let value = "";
    for (const field of fields) {
      value = findFirst(table, field);
      if (value) break;
    }
    row[column] = value;
  }
  return row;
}
