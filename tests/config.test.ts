/**
 * Unit tests for configuration parsing.
 */
import { describe, test, expect } from "vitest";
import { ZodError } from "zod";

import { ConfigSchema, parseConfig } from "../src/config.js";
import { DiskStorage } from "../src/storage/disk.js";

describe("ConfigSchema", () => {
  test("defaults", () => {
    expect(ConfigSchema.parse({})).toEqual({
      platforms: ["youtube", "tiktok"],
      matchRule: "any",
      tableRowCap: 250000,
      donateLogs: false,
      logLevel: "info",
      storage: { provider: "disk", config: { basePath: "./donations" } },
    });
  });

  test("unknown platform is rejected", () => {
    expect(() => ConfigSchema.parse({ platforms: ["myspace"] })).toThrow(ZodError);
  });

  test("row cap must be positive", () => {
    expect(() => ConfigSchema.parse({ tableRowCap: 0 })).toThrow(ZodError);
  });

  test("unknown storage provider is rejected", () => {
    expect(() => ConfigSchema.parse({ storage: { provider: "s3" } })).toThrow(ZodError);
  });
});

describe("parseConfig", () => {
  test("builds disk storage", () => {
    const { config, storage } = parseConfig({
      matchRule: "majority",
      storage: { config: { basePath: "/tmp/ddp-out" } },
    });
    expect(config.matchRule).toBe("majority");
    expect(storage).toBeInstanceOf(DiskStorage);
  });
});
