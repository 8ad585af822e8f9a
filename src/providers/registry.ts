/**
 * Platform registry: maps Platform enum values to their categories, status
 * codes and extraction strategy.
 */
import type { PlatformDefinition } from "../core/etl.js";
import { UnsupportedPlatformError } from "../core/exceptions.js";
import {
  TIKTOK_BARE_FILE,
  TIKTOK_CATEGORIES,
  TIKTOK_STATUS_CODES,
} from "./tiktok/categories.js";
import { TikTokExtractionStrategy } from "./tiktok/extraction.js";
import { YOUTUBE_CATEGORIES, YOUTUBE_STATUS_CODES } from "./youtube/categories.js";
import { YouTubeExtractionStrategy } from "./youtube/extraction.js";

// ---------------------------------------------------------------------------
// Platform enum
// ---------------------------------------------------------------------------

export enum Platform {
  YouTube = "youtube",
  TikTok = "tiktok",
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export const PLATFORM_REGISTRY: Record<Platform, PlatformDefinition> = {
  [Platform.YouTube]: {
    name: "YouTube",
    acceptedTypes: "application/zip, text/plain, application/json",
    statusCodes: YOUTUBE_STATUS_CODES,
    categories: YOUTUBE_CATEGORIES,
    memberExtensions: [".json", ".csv", ".html"],
    extraction: YouTubeExtractionStrategy,
  },
  [Platform.TikTok]: {
    name: "TikTok",
    acceptedTypes: "application/zip, text/plain, application/json",
    statusCodes: TIKTOK_STATUS_CODES,
    categories: TIKTOK_CATEGORIES,
    memberExtensions: [".json", ".txt"],
    bareFile: TIKTOK_BARE_FILE,
    extraction: TikTokExtractionStrategy,
  },
};

export type { PlatformDefinition };

function isPlatform(value: string): value is Platform {
  return Object.values(Platform).some((p) => p === value);
}

export function getPlatformDefinition(platform: string): PlatformDefinition {
  if (!isPlatform(platform)) throw new UnsupportedPlatformError(platform);
  return PLATFORM_REGISTRY[platform];
}
