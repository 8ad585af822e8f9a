/**
 * YouTube extraction strategy: assembles the tables shown for review.
 */
import { readText, type Archive } from "../../core/archive.js";
import { assertNever, extractRows, type ExtractionStrategy } from "../../core/etl.js";
import type { Logger } from "../../core/logger.js";
import { fillNull, makeTable } from "../../core/table.js";
import {
  ContainerType,
  type DDPCategory,
  type ExtractionOptions,
  type ExtractionResult,
  type Row,
  type Table,
  type VizSpec,
} from "../../core/types.js";
import { YOUTUBE_FILES } from "./categories.js";
import { rowsFromCsv, rowsFromPlaylistCsv } from "./csv.js";
import { searchHistoryFromHtml, watchHistoryFromHtml } from "./html.js";
import { searchHistoryFromJson, watchHistoryFromJson } from "./takeout.js";

const NOT_IMPLEMENTED: Row[] = [
  {
    "Extraction not implemented":
      "Er zit wel data in jouw data package, maar we hebben het er niet uitgehaald",
  },
];

const WATCH_HISTORY_VIZ: VizSpec[] = [
  {
    type: "area",
    title: {
      en: "The total number of YouTube videos you have watched per month",
      nl: "Het totale aantal YouTube-video's dat je per maand hebt bekeken",
    },
    group: { column: "Date standard format", dateFormat: "month" },
    values: [{ aggregate: "count", label: { en: "number of views", nl: "aantal keer gekeken" } }],
  },
  {
    type: "wordcloud",
    title: {
      en: "The most frequently watched YouTube channels",
      nl: "De meest bekeken YouTube-kanalen",
    },
    textColumn: "Channel",
    tokenize: false,
  },
  {
    type: "bar",
    title: {
      en: "The total number of YouTube videos you have watched per hour of the day",
      nl: "Het totale aantal YouTube-video's dat je hebt bekeken per uur van de dag",
    },
    group: { column: "Date standard format", dateFormat: "hour_cycle" },
    values: [{}],
  },
];

const SEARCH_HISTORY_VIZ: VizSpec[] = [
  {
    type: "wordcloud",
    title: {
      en: "Words you most searched for",
      nl: "Woorden waarop je het meest hebt gezocht",
    },
    textColumn: "Search Terms",
    tokenize: true,
  },
];

export class YouTubeExtractionStrategy implements ExtractionStrategy {
  async extract(
    archive: Archive,
    category: DDPCategory,
    _opts: ExtractionOptions,
    log: Logger,
  ): Promise<ExtractionResult> {
    const tables: Table[] = [];

    // Empty channels become "" so the wordcloud does not show "null"
    const watched = fillNull(
      await extractRows("youtube_watch_history", log, () =>
        this.watchHistory(archive, category),
      ),
      "Channel",
      "",
    );
    if (watched.length > 0) {
      tables.push(
        makeTable({
          name: "youtube_watch_history",
          title: { en: "Your YouTube watch history", nl: "Je YouTube kijkgeschiedenis" },
          rows: watched,
          description: {
            en: "In this table you find the videos you watched on YouTube sorted over time. Below, you find a timeline of the number of videos you watched per month, a wordcloud of the channels you viewed, and a histogram of the videos you watched per hour of the day.",
            nl: "In deze tabel vind je de video's die je hebt bekeken op YouTube, gesorteerd op tijd. Hieronder vind je een tijdlijn met het aantal video's per maand, een wordcloud van de kanalen die je hebt bekeken, en een histogram van het aantal video's per uur van de dag.",
          },
          visualizations: WATCH_HISTORY_VIZ,
        }),
      );
    }

    const searched = await extractRows("youtube_search_history", log, () =>
      this.searchHistory(archive, category),
    );
    if (searched.length > 0) {
      tables.push(
        makeTable({
          name: "youtube_search_history",
          title: { en: "Your YouTube search history", nl: "Je YouTube-zoekgeschiedenis" },
          rows: searched,
          description: {
            en: "In this table you find the search terms you have used on YouTube sorted over time. Below, you find a wordcloud of the search terms you used.",
            nl: "In deze tabel vind je de zoektermen die je hebt gebruikt op YouTube, gesorteerd op tijd. Hieronder vind je een wordcloud van de zoektermen die je hebt gebruikt.",
          },
          visualizations: SEARCH_HISTORY_VIZ,
        }),
      );
    }

    const subscriptions = await extractRows("youtube_subscriptions", log, () =>
      rowsFromCsv(readText(archive, YOUTUBE_FILES.subscriptions[category.language]), log),
    );
    if (subscriptions.length > 0) {
      tables.push(
        makeTable({
          name: "youtube_subscriptions",
          title: { en: "Your YouTube channel subscriptions", nl: "Je YouTube-kanaal abonnementen" },
          rows: subscriptions,
          description: {
            en: "In this table, you find the YouTube channels you are subscribed to.",
            nl: "In deze tabel vind je de YouTube-kanalen waarop je geabonneerd bent.",
          },
        }),
      );
    }

    const comments = await extractRows("youtube_comments", log, () =>
      rowsFromCsv(readText(archive, YOUTUBE_FILES.comments[category.language]), log),
    );
    if (comments.length > 0) {
      tables.push(
        makeTable({
          name: "youtube_comments",
          title: { en: "Your YouTube comments", nl: "Je YouTube-reacties" },
          rows: comments,
          description: {
            en: "In this table, you find the comments you placed on YouTube.",
            nl: "In deze tabel vind je de reacties die je op YouTube hebt geplaatst.",
          },
        }),
      );
    }

    const watchLater = await extractRows("youtube_watch_later", log, () =>
      this.watchLater(archive, log),
    );
    if (watchLater.length > 0) {
      tables.push(
        makeTable({
          name: "youtube_watch_later",
          title: { en: "Your YouTube watch later list", nl: "Je YouTube later bekijken lijst" },
          rows: watchLater,
        }),
      );
    }

    return { tables, cappedDonations: null };
  }

  private watchHistory(archive: Archive, category: DDPCategory): Row[] {
    const base = YOUTUBE_FILES.watchHistory[category.language];
    switch (category.containerType) {
      case ContainerType.HTML:
        return watchHistoryFromHtml(readText(archive, `${base}.html`));
      case ContainerType.JSON:
        return watchHistoryFromJson(readText(archive, `${base}.json`));
      case ContainerType.CSV:
      case ContainerType.TXT:
        return NOT_IMPLEMENTED;
      default:
        return assertNever(category.containerType);
    }
  }

  private searchHistory(archive: Archive, category: DDPCategory): Row[] {
    const base = YOUTUBE_FILES.searchHistory[category.language];
    switch (category.containerType) {
      case ContainerType.HTML:
        return searchHistoryFromHtml(readText(archive, `${base}.html`));
      case ContainerType.JSON:
        return searchHistoryFromJson(readText(archive, `${base}.json`));
      case ContainerType.CSV:
      case ContainerType.TXT:
        return NOT_IMPLEMENTED;
      default:
        return assertNever(category.containerType);
    }
  }

  /** `Watch later.csv` has the same name in every language. */
  private watchLater(archive: Archive, log: Logger): Row[] {
    return rowsFromPlaylistCsv(readText(archive, "Watch later.csv"), log).map((row) => {
      const id = row["Video-ID"];
      return typeof id === "string" && id
        ? { ...row, "Video-ID": `https://www.youtube.com/watch?v=${id}` }
        : row;
    });
  }
}
