/**
 * Unit tests for export timestamp normalisation.
 */
import { describe, test, expect } from "vitest";
import { stripNonAscii, toIsoTimestamp } from "../src/core/timestamps.js";

describe("toIsoTimestamp", () => {
  test("english takeout format", () => {
    expect(toIsoTimestamp("Jan 5, 2023, 9:15:00 PM CET")).toBe("2023-01-05T21:15:00");
    expect(toIsoTimestamp("Dec 31, 2022, 12:05:09 AM CET")).toBe("2022-12-31T00:05:09");
  });

  test("dutch takeout format", () => {
    expect(toIsoTimestamp("3 mrt 2023, 14:30:00 CET")).toBe("2023-03-03T14:30:00");
    expect(toIsoTimestamp("17 okt 2022, 08:00:00 CEST")).toBe("2022-10-17T08:00:00");
  });

  test("iso formats", () => {
    expect(toIsoTimestamp("2023-01-01 10:00:00")).toBe("2023-01-01T10:00:00");
    expect(toIsoTimestamp("2023-01-05T20:15:00.000Z")).toBe("2023-01-05T20:15:00");
    expect(toIsoTimestamp("2023-01-05")).toBe("2023-01-05T00:00:00");
  });

  test("narrow or missing space before the meridiem", () => {
    expect(toIsoTimestamp("Jan 5, 2023, 9:15:00\u202fPM CET")).toBe("2023-01-05T21:15:00");
    expect(toIsoTimestamp("Jan 5, 2023, 9:15:00PM CET")).toBe("2023-01-05T21:15:00");
    expect(toIsoTimestamp("Jan 5, 2023, 9:15:00 AM")).toBe("2023-01-05T09:15:00");
  });

  test("offsets keep the written wall-clock time", () => {
    expect(toIsoTimestamp("2023-01-05T22:15:00+01:00")).toBe("2023-01-05T22:15:00");
  });

  test("impossible calendar dates give empty string", () => {
    expect(toIsoTimestamp("Feb 30, 2023, 10:00:00 AM CET")).toBe("");
    expect(toIsoTimestamp("31 nov 2023, 10:00:00 CET")).toBe("");
    expect(toIsoTimestamp("2023-02-31 10:00:00")).toBe("");
    expect(toIsoTimestamp("Feb 29, 2024, 10:00:00 AM CET")).toBe("2024-02-29T10:00:00");
  });

  test("unknown text gives empty string", () => {
    expect(toIsoTimestamp("yesterday")).toBe("");
    expect(toIsoTimestamp("2023-13-01 10:00:00")).toBe("");
  });
});

describe("stripNonAscii", () => {
  test("drops narrow no-break spaces", () => {
    expect(stripNonAscii("9:15:00\u202fPM")).toBe("9:15:00PM");
  });
});
