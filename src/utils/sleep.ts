import { setTimeout as delay } from "node:timers/promises";

/**
 * Waits `ms` milliseconds. Resolves `true` when the full delay elapsed and
 * `false` when `signal` aborted it first.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  try {
    await delay(Math.max(0, ms), undefined, { signal });
    return true;
  } catch (error) {
    if (signal?.aborted) return false;
    throw error;
  }
}
