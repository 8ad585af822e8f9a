/**
 * Unit tests for logger construction and the event sink.
 */
import { describe, test, expect } from "vitest";

import { createLogger, describeError, EventSink, isLogLevel } from "../src/core/logger.js";

describe("createLogger", () => {
  test("each sink sees only its own logger's lines", () => {
    const first = new EventSink();
    const second = new EventSink();
    createLogger({ level: "info", sink: first }).info("one");
    createLogger({ level: "info", sink: second }).info("two");
    createLogger({ level: "info", sink: first }).child({ sessionId: "s2" }).info("three");

    expect(first.lines().map((line) => JSON.parse(line).msg)).toEqual(["one", "three"]);
    expect(second.lines().map((line) => JSON.parse(line).msg)).toEqual(["two"]);
    expect(JSON.parse(first.lines()[1])).toMatchObject({ level: "info", sessionId: "s2" });
  });

  test("lines below the level are not captured", () => {
    const sink = new EventSink();
    const log = createLogger({ level: "warn", sink });
    log.info("quiet");
    log.warn("loud");
    expect(sink.size).toBe(1);
  });

  test("a silent logger writes nothing to its sink", () => {
    const sink = new EventSink();
    createLogger({ level: "silent", sink }).error("nope");
    expect(sink.lines()).toEqual([]);
  });
});

describe("EventSink", () => {
  test("splits chunks into lines", () => {
    const sink = new EventSink();
    sink.write('{"a":1}\n{"b":2}\n');
    expect(sink.lines()).toEqual(['{"a":1}', '{"b":2}']);
  });
});

describe("helpers", () => {
  test("describeError", () => {
    expect(describeError(new RangeError("out"))).toBe("RangeError: out");
    expect(describeError("plain")).toBe("plain");
  });

  test("isLogLevel", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("loud")).toBe(false);
  });
});
