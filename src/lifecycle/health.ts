/**
 * Per-container health polling.
 */

import type { ContainerRuntime } from "../runtime/types";
import type { LifecycleState } from "../types";
import { getErrorMessage, sleep } from "../utils/helpers";

export type HealthOutcome = {
  state: Extract<LifecycleState, "stopped" | "running" | "healthy" | "unhealthy">;
  error?: string;
};

/**
 * Poll until the container is healthy, has no health check, stops, or the
 * signal fires (-> unhealthy). Inspect failures are retried on the next tick.
 */
export async function pollHealth(
  runtime: ContainerRuntime,
  container: string,
  intervalMs: number,
  signal: AbortSignal,
): Promise<HealthOutcome> {
  let lastError: string | undefined;

  while (!signal.aborted) {
    try {
      const state = await runtime.inspectState(container, signal);
      if (!state) return { state: "stopped", error: "Container not found" };
      if (!state.running) {
        return { state: "stopped", error: `Container is ${state.status}` };
      }
      if (!state.health) return { state: "running" };
      if (state.health === "healthy") return { state: "healthy" };
      lastError = undefined;
    } catch (err) {
      if (signal.aborted) break;
      lastError = getErrorMessage(err);
    }

    if (!(await sleep(intervalMs, signal))) break;
  }

  return {
    state: "unhealthy",
    error: lastError
      ? `Health check timed out (last error: ${lastError})`
      : "Health check timed out",
  };
}
