import { afterEach, describe, expect, it } from "vitest";
import { createLogger, getLogLevel, setLogLevel, setLogSink } from "../src/papercast/log.js";

describe("createLogger", () => {
  const lines: string[] = [];
  const restore = setLogSink((line) => lines.push(line));
  const initialLevel = getLogLevel();

  afterEach(() => {
    lines.length = 0;
    setLogLevel(initialLevel);
  });

  it("prefixes lines with the scope and level", () => {
    setLogLevel("debug");
    createLogger("arxiv").info("3 record(s)");
    expect(lines).toEqual(["[papercast:arxiv] INFO 3 record(s)"]);
  });

  it("drops messages below the threshold", () => {
    setLogLevel("warn");
    const log = createLogger("x");
    log.debug("hidden");
    log.info("hidden");
    log.warn("shown");
    expect(lines).toEqual(["[papercast:x] WARN shown"]);
  });

  it("appends the error message", () => {
    createLogger("x").error("lookup failed", new Error("HTTP 503"));
    expect(lines).toEqual(["[papercast:x] ERROR lookup failed: HTTP 503"]);
  });

  it("nests child scopes", () => {
    createLogger("reference").child("abc123").warn("slow");
    expect(lines).toEqual(["[papercast:reference:abc123] WARN slow"]);
  });

  it("writes nothing when silent", () => {
    setLogLevel("silent");
    createLogger("x").error("nope");
    expect(lines).toEqual([]);
  });

  it("restores the previous sink", () => {
    restore();
    const captured: string[] = [];
    const undo = setLogSink((line) => captured.push(line));
    createLogger("x").warn("again");
    undo();
    expect(captured).toEqual(["[papercast:x] WARN again"]);
  });
});
