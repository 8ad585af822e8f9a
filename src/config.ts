/**
 * Configuration validation and backend factory.
 */
import { z } from "zod";
import { DEFAULT_ROW_CAP } from "./core/workflow.js";
import { Platform } from "./providers/registry.js";
import type { StorageBackend } from "./storage/backend.js";
import { DiskStorage } from "./storage/disk.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const DiskStorageConfigSchema = z.object({
  provider: z.literal("disk").default("disk"),
  config: z
    .object({
      basePath: z.string().min(1).default("./donations"),
    })
    .default({}),
});

export const ConfigSchema = z.object({
  /** Platforms offered to the participant, in order. */
  platforms: z
    .array(z.nativeEnum(Platform))
    .min(1)
    .default([Platform.YouTube, Platform.TikTok]),
  matchRule: z.enum(["any", "majority"]).default("any"),
  tableRowCap: z.number().int().positive().default(DEFAULT_ROW_CAP),
  donateLogs: z.boolean().default(false),
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  storage: DiskStorageConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

// ---------------------------------------------------------------------------
// Storage factory
// ---------------------------------------------------------------------------

function buildStorage(storage: Config["storage"]): StorageBackend {
  switch (storage.provider) {
    case "disk":
      return new DiskStorage(storage.config.basePath);
  }
}

// ---------------------------------------------------------------------------
// Top-level config → backends
// ---------------------------------------------------------------------------

export function parseConfig(raw: unknown): { config: Config; storage: StorageBackend } {
  const config = ConfigSchema.parse(raw);
  return { config, storage: buildStorage(config.storage) };
}
