import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { createLogger } from "../logger";
import { FixedWindowRateLimiter } from "../middleware/rateLimit";
import type { Clock } from "../middleware/rateLimit";
import type { IdentificationResult } from "../types";
import { IdentificationPipeline } from "./identificationPipeline";
import { ImageIdentifierFactory } from "./imageIdentifier/factory";
import type { FetchLike, ImageIdentifier } from "./imageIdentifier/interface";
import { PrometheusMetrics } from "./metrics";
import { TtlCache } from "./resultCache";
import { SingleFlight } from "./singleFlight";

export interface Services {
  config: AppConfig;
  logger: Logger;
  rateLimiter: FixedWindowRateLimiter;
  cache: TtlCache<IdentificationResult>;
  identifier: ImageIdentifier;
  metrics: PrometheusMetrics;
  pipeline: IdentificationPipeline;
}

export interface ServiceOverrides {
  logger?: Logger;
  identifier?: ImageIdentifier;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  clock?: Clock;
  collectDefaultMetrics?: boolean;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const clock = overrides.clock ?? Date.now;
  const logger = overrides.logger ?? createLogger({ level: config.logLevel });
  const rateLimiter = new FixedWindowRateLimiter(config.rateLimit.limit, config.rateLimit.windowMs, clock);
  const cache = new TtlCache<IdentificationResult>(config.cache.ttlMs, config.cache.maxEntries, clock);
  const metrics = new PrometheusMetrics({ collectDefaults: overrides.collectDefaultMetrics });
  const identifier =
    overrides.identifier ??
    ImageIdentifierFactory.fromConfig(config, logger, overrides.fetch, overrides.sleep).createIdentifier();

  const pipeline = new IdentificationPipeline({
    jwtSecret: config.jwtSecret,
    rateLimiter,
    rateLimitKey: config.rateLimit.keyBy,
    cache,
    identifier,
    singleFlight: config.singleFlight ? new SingleFlight<IdentificationResult>() : undefined,
    metrics,
    logger: logger.child({ component: "pipeline" }),
    maxImages: config.maxImages,
    clock,
  });

  return { config, logger, rateLimiter, cache, identifier, metrics, pipeline };
}

/**
 * Periodically drops expired cache entries and elapsed rate-limit windows. The timer is
 * unref'd so it never keeps the process alive on its own.
 */
export function startSweeper(services: Services): () => void {
  const timer = setInterval(() => {
    const expired = services.cache.sweep();
    const windows = services.rateLimiter.sweep();
    services.metrics.setCacheEntries(services.cache.size);
    if (expired > 0 || windows > 0) {
      services.logger.debug({ expired, windows }, "Swept expired cache entries and rate windows");
    }
  }, services.config.cache.sweepIntervalMs);
  timer.unref();

  return () => clearInterval(timer);
}
