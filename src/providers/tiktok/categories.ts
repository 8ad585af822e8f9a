/**
 * Known TikTok export shapes and status codes.
 */
import type { BareFile } from "../../core/archive.js";
import {
  ContainerType,
  Language,
  type DDPCategory,
  type StatusCode,
} from "../../core/types.js";

export const TIKTOK_CATEGORIES: readonly DDPCategory[] = [
  {
    id: "json_en",
    containerType: ContainerType.JSON,
    language: Language.EN,
    knownFiles: ["user_data_tiktok.json", "user_data.json"],
  },
  {
    id: "txt_en",
    containerType: ContainerType.TXT,
    language: Language.EN,
    knownFiles: [
      "Browsing History.txt",
      "Like List.txt",
      "Favorite Videos.txt",
      "Favorite Hashtags.txt",
      "Searches.txt",
      "Share History.txt",
      "Follower.txt",
      "Following.txt",
      "Block List.txt",
    ],
  },
];

export const TIKTOK_STATUS_CODES: readonly StatusCode[] = [
  { id: 0, description: "Valid DDP", message: "" },
  { id: 1, description: "Valid DDP unhandled format", message: "" },
  { id: 2, description: "Not a valid DDP", message: "" },
  { id: 3, description: "Bad zipfile", message: "" },
];

/** TikTok also hands out the JSON export as a bare file. */
export const TIKTOK_BARE_FILE: BareFile = {
  name: "user_data_tiktok.json",
  sections: ["Activity", "Ads and data", "App Settings", "Direct Messages", "Profile"],
};
