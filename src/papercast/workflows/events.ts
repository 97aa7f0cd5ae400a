import crypto from "node:crypto";
import { createLogger } from "../log.js";
import type { WorkflowEvent, WorkflowEventOptions } from "./types.js";

const log = createLogger("events");

export function isoNow(): string {
  return new Date().toISOString();
}

export function newRunId(): string {
  return crypto.randomUUID();
}

/**
 * Fire-and-forget delivery on a microtask: an observer can neither throw into
 * the workflow nor re-enter it synchronously. Observer failures are logged.
 */
export function emitEvent(options: WorkflowEventOptions | undefined, event: WorkflowEvent): void {
  if (!options?.onEvent) return;
  const handler = options.onEvent;
  if (options.emitHandlerEvents === false && (event.type === "handler_completed" || event.type === "handler_failed")) {
    return;
  }

  queueMicrotask(() => {
    try {
      const result = handler(event);
      if (result instanceof Promise) {
        result.catch((err: unknown) => log.warn(`async ${event.type} observer failed: ${String(err)}`));
      }
    } catch (err) {
      log.warn(`${event.type} observer threw: ${err instanceof Error ? err.message : String(err)}`);
    }
  });
}
