/**
 * Known YouTube (Google Takeout) export shapes and status codes.
 */
import {
  ContainerType,
  Language,
  type DDPCategory,
  type StatusCode,
} from "../../core/types.js";

// Listed most likely first: the first overlapping category wins.
export const YOUTUBE_CATEGORIES: readonly DDPCategory[] = [
  {
    id: "html_en",
    containerType: ContainerType.HTML,
    language: Language.EN,
    knownFiles: [
      "watch-history.html",
      "search-history.html",
      "my-comments.html",
      "my-live-chat-messages.html",
      "subscriptions.csv",
      "comments.csv",
    ],
  },
  {
    id: "html_nl",
    containerType: ContainerType.HTML,
    language: Language.NL,
    knownFiles: [
      "kijkgeschiedenis.html",
      "zoekgeschiedenis.html",
      "mijn-reacties.html",
      "abonnementen.csv",
      "reacties.csv",
    ],
  },
  {
    id: "json_en",
    containerType: ContainerType.JSON,
    language: Language.EN,
    knownFiles: ["watch-history.json", "search-history.json"],
  },
  {
    id: "json_nl",
    containerType: ContainerType.JSON,
    language: Language.NL,
    knownFiles: ["kijkgeschiedenis.json", "zoekgeschiedenis.json"],
  },
];

export const YOUTUBE_STATUS_CODES: readonly StatusCode[] = [
  { id: 0, description: "Valid DDP", message: "" },
  { id: 1, description: "Valid DDP unhandled format", message: "" },
  { id: 2, description: "Not a valid DDP", message: "" },
  { id: 3, description: "Bad zipfile", message: "" },
];

/** Member names per table, by language. */
export const YOUTUBE_FILES = {
  watchHistory: { [Language.EN]: "watch-history", [Language.NL]: "kijkgeschiedenis" },
  searchHistory: { [Language.EN]: "search-history", [Language.NL]: "zoekgeschiedenis" },
  subscriptions: { [Language.EN]: "subscriptions.csv", [Language.NL]: "abonnementen.csv" },
  comments: { [Language.EN]: "comments.csv", [Language.NL]: "reacties.csv" },
} as const;
