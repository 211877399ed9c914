import type { AppContext } from "../types";

/**
 * Prometheus text exposition of the gateway's counters and timers.
 */
export async function metricsHandler(c: AppContext) {
  const { metrics, cache } = c.get("services");
  metrics.setCacheEntries(cache.size);

  return c.body(await metrics.metrics(), 200, {
    "Content-Type": metrics.contentType,
  });
}
