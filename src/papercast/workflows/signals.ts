/**
 * A run-local AbortController that also follows the caller's signal. Aborting
 * it on exit cancels any handler still in flight after the gate settled.
 */
export function linkedController(parent?: AbortSignal): { controller: AbortController; release: () => void } {
  const controller = new AbortController();
  if (!parent) {
    return { controller, release: () => controller.abort() };
  }
  if (parent.aborted) {
    controller.abort(parent.reason);
  }
  const onAbort = (): void => controller.abort(parent.reason);
  parent.addEventListener("abort", onAbort, { once: true });
  return {
    controller,
    release: () => {
      parent.removeEventListener("abort", onAbort);
      controller.abort();
    }
  };
}
