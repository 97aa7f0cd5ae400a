import { describe, expect, it, vi } from "vitest";
import { TopicRegistry } from "../src/papercast/broadcast/topicRegistry.js";
import { WorkflowScope } from "../src/papercast/broadcast/scope.js";
import { PapercastError } from "../src/papercast/errors.js";
import { createLogger } from "../src/papercast/log.js";
import { delay } from "./fakes.js";

const quiet = createLogger("test");

describe("TopicRegistry", () => {
  it("invokes every handler registered on the topic with the payload", async () => {
    const registry = new TopicRegistry<string>({ logger: quiet });
    const seen: string[] = [];
    registry.register("t", (p) => {
      seen.push(`a:${p}`);
    });
    registry.register("t", (p) => {
      seen.push(`b:${p}`);
    });

    const report = await registry.publish("t", "x");

    expect(seen.sort()).toEqual(["a:x", "b:x"]);
    expect(report.fulfilled).toBe(2);
    expect(report.rejected).toBe(0);
  });

  it("runs handlers concurrently", async () => {
    const registry = new TopicRegistry<string>({ logger: quiet });
    let running = 0;
    let maxRunning = 0;
    for (let i = 0; i < 3; i++) {
      registry.register("t", async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await new Promise((r) => setTimeout(r, 20));
        running--;
      });
    }

    await registry.publish("t", "x");
    expect(maxRunning).toBe(3);
  });

  it("bounds concurrency with maxConcurrentHandlers", async () => {
    const registry = new TopicRegistry<string>({ logger: quiet, maxConcurrentHandlers: 1 });
    let running = 0;
    let maxRunning = 0;
    for (let i = 0; i < 3; i++) {
      registry.register("t", async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await new Promise((r) => setTimeout(r, 5));
        running--;
      });
    }

    await registry.publish("t", "x");
    expect(maxRunning).toBe(1);
  });

  it("resolves immediately with an empty report when the topic has no handlers", async () => {
    const registry = new TopicRegistry<string>({ logger: quiet });
    const report = await registry.publish("nobody", "x");
    expect(report).toEqual({ topic: "nobody", outcomes: [], fulfilled: 0, rejected: 0 });
  });

  it("runs a handler registered twice twice per publish", async () => {
    const registry = new TopicRegistry<string>({ logger: quiet });
    const handler = vi.fn();
    registry.register("t", handler);
    registry.register("t", handler);

    await registry.publish("t", "x");
    expect(handler).toHaveBeenCalledTimes(2);
  });

  it("isolates a failing handler from its siblings and reports it once", async () => {
    const onHandlerError = vi.fn();
    const registry = new TopicRegistry<string>({ logger: quiet, onHandlerError });
    const sibling = vi.fn();
    registry.register("t", () => {
      throw new Error("boom");
    });
    registry.register("t", sibling);

    const report = await registry.publish("t", "x");

    expect(sibling).toHaveBeenCalledTimes(1);
    expect(report.fulfilled).toBe(1);
    expect(report.rejected).toBe(1);
    expect(report.outcomes[0]?.status).toBe("rejected");
    expect(report.outcomes[0]?.error?.code).toBe("INTERNAL");
    expect(onHandlerError).toHaveBeenCalledTimes(1);
    expect(onHandlerError.mock.calls[0]?.[1]).toEqual({ topic: "t", index: 0, payload: "x" });
  });

  it("treats a rejecting handler like a throwing one", async () => {
    const onHandlerError = vi.fn();
    const registry = new TopicRegistry<string>({ logger: quiet, onHandlerError });
    registry.register("t", async () => {
      throw new PapercastError("LOOKUP_FAILURE", "down");
    });

    const report = await registry.publish("t", "x");
    expect(report.outcomes[0]?.error?.code).toBe("LOOKUP_FAILURE");
    expect(onHandlerError).toHaveBeenCalledTimes(1);
  });

  it("does not run handlers registered during a publish until the next publish", async () => {
    const registry = new TopicRegistry<string>({ logger: quiet });
    const late = vi.fn();
    registry.register("t", () => {
      registry.register("t", late);
    });

    await registry.publish("t", "first");
    expect(late).not.toHaveBeenCalled();

    await registry.publish("t", "second");
    expect(late).toHaveBeenCalledTimes(1);
    expect(late.mock.calls[0]?.[0]).toBe("second");
  });

  it("unsubscribes a single registration", async () => {
    const registry = new TopicRegistry<string>({ logger: quiet });
    const handler = vi.fn();
    const off = registry.register("t", handler);
    registry.register("t", handler);

    expect(off()).toBe(true);
    expect(off()).toBe(false);
    expect(registry.handlerCount("t")).toBe(1);

    await registry.publish("t", "x");
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("lists and clears topics", () => {
    const registry = new TopicRegistry<string>({ logger: quiet });
    registry.register("a", () => undefined);
    registry.register("b", () => undefined);
    expect(registry.topics()).toEqual(["a", "b"]);

    registry.clear("a");
    expect(registry.topics()).toEqual(["b"]);
    registry.clear();
    expect(registry.topics()).toEqual([]);
  });

  it("gives handlers a signal that never aborts when built without one", async () => {
    const registry = new TopicRegistry<string>({ logger: quiet });
    const seen: boolean[] = [];
    registry.register("t", (_payload, context) => {
      seen.push(context.signal.aborted);
    });

    await registry.publish("t", "x");
    expect(seen).toEqual([false]);
  });

  it("keeps handlers from earlier invocations when a registry is reused", async () => {
    const registry = new TopicRegistry<string>({ logger: quiet });
    const calls: string[] = [];
    const invoke = async (label: string): Promise<void> => {
      registry.register("lookup", (p) => {
        calls.push(`${label}:${p}`);
      });
      await registry.publish("lookup", label);
    };

    await invoke("run1");
    await invoke("run2");

    // The run1 handler fires again on run2's publish.
    expect(calls).toEqual(["run1:run1", "run1:run2", "run2:run2"]);
  });
});

describe("WorkflowScope", () => {
  it("does not leak handlers between scopes", async () => {
    const calls: string[] = [];
    const invoke = async (label: string): Promise<void> => {
      const scope = new WorkflowScope<string>({ logger: quiet });
      scope.on("lookup", (p) => {
        calls.push(`${label}:${p}`);
      });
      scope.dispatch("lookup", label);
      await scope.drain();
    };

    await invoke("run1");
    await invoke("run2");

    expect(calls).toEqual(["run1:run1", "run2:run2"]);
  });

  it("hands its signal to every handler", async () => {
    const controller = new AbortController();
    const scope = new WorkflowScope<string>({ logger: quiet, signal: controller.signal });
    scope.on("t", (_payload, context) => delay(10_000, context.signal));
    scope.dispatch("t", "x");
    controller.abort();

    const [report] = await scope.drain();
    expect(report?.rejected).toBe(1);
    expect(report?.outcomes[0]?.error?.code).toBe("CANCELLED");
    expect(scope.accumulator.failureCount).toBe(1);
  });

  it("records handler failures on the accumulator under the mapped source", async () => {
    const scope = new WorkflowScope<string>({ logger: quiet, sourceOf: (info) => `kw:${info.payload}` });
    scope.on("t", (p) => {
      if (p === "bad") throw new Error("nope");
      scope.accumulator.record(p, p);
    });
    scope.dispatch("t", "good");
    scope.dispatch("t", "bad");

    const snapshot = await scope.gate(2, 1000, "tolerate");

    expect(snapshot.completedCount).toBe(1);
    expect(snapshot.failures).toHaveLength(1);
    expect(snapshot.failures[0]?.source).toBe("kw:bad");
    expect(snapshot.failures[0]?.error.message).toBe("nope");
  });

  it("fails the gate fast when a handler fails", async () => {
    const scope = new WorkflowScope<string>({ logger: quiet });
    scope.on("t", () => {
      throw new PapercastError("LOOKUP_FAILURE", "down");
    });
    scope.dispatch("t", "x");

    await expect(scope.gate(1, 1000)).rejects.toMatchObject({
      code: "GATE_FAILED",
      details: { failures: [{ source: "t#0", code: "LOOKUP_FAILURE", message: "down" }] }
    });
  });
});
