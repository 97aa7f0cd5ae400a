import { describe, expect, it, vi } from "vitest";
import { emitEvent } from "../src/papercast/workflows/events.js";
import { setLogSink } from "../src/papercast/log.js";
import { flushEvents } from "./fakes.js";

describe("emitEvent", () => {
  const event = { type: "run_started", timestamp: "2024-01-01T00:00:00.000Z", runId: "r1", workflow: "reference", query: "q" } as const;

  it("delivers on a microtask", async () => {
    const onEvent = vi.fn();
    emitEvent({ onEvent }, event);
    expect(onEvent).not.toHaveBeenCalled();

    await flushEvents();
    expect(onEvent).toHaveBeenCalledWith(event);
  });

  it("logs a throwing observer instead of propagating", async () => {
    const lines: string[] = [];
    const restore = setLogSink((line) => lines.push(line));
    try {
      emitEvent(
        {
          onEvent: () => {
            throw new Error("observer broke");
          }
        },
        event
      );
      await flushEvents();
    } finally {
      restore();
    }
    expect(lines).toEqual(["[papercast:events] WARN run_started observer threw: observer broke"]);
  });
});
