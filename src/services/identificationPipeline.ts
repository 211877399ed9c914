import type { Logger } from "pino";
import { UpstreamError, err, internalError, ok } from "../errors";
import type { ErrorOutcome, Result, ValidationError } from "../errors";
import { verifyCredential } from "../middleware/auth";
import type { Clock, FixedWindowRateLimiter, RateLimitState } from "../middleware/rateLimit";
import type { IdentificationResult } from "../types";
import { validateUploadSet } from "../utils/fileValidation";
import type { UploadSet } from "../utils/fileValidation";
import { fingerprintUploadSet } from "./fingerprint";
import type { ImageIdentifier } from "./imageIdentifier/interface";
import type { MetricsRecorder } from "./metrics";
import type { TtlCache } from "./resultCache";
import type { SingleFlight } from "./singleFlight";

export interface PipelineRequest {
  requestId: string;
  authorization: string | undefined;
  clientAddress: string;
  /** Reads the multipart body; only called once the caller is authenticated and admitted. */
  readForm: () => Promise<FormData>;
}

export type PipelineOutcome =
  | {
      ok: true;
      result: IdentificationResult;
      cached: boolean;
      fingerprint: string;
      rateLimit: RateLimitState;
    }
  | {
      ok: false;
      error: ErrorOutcome;
      rateLimit?: RateLimitState;
    };

export interface PipelineDeps {
  jwtSecret: string;
  rateLimiter: FixedWindowRateLimiter;
  rateLimitKey: "address" | "identity";
  cache: TtlCache<IdentificationResult>;
  identifier: ImageIdentifier;
  /** When set, concurrent misses for one fingerprint share a single upstream call. */
  singleFlight?: SingleFlight<IdentificationResult>;
  metrics: MetricsRecorder;
  logger: Logger;
  maxImages: number;
  clock?: Clock;
}

type Stage = "auth" | "admission" | "validation" | "fingerprint" | "cache" | "upstream";

/**
 * Runs one identify request through auth, admission, validation, the result cache and,
 * on a miss, the upstream provider. The first failing stage ends the request; nothing
 * thrown inside a stage escapes `run`.
 */
export class IdentificationPipeline {
  private readonly clock: Clock;

  constructor(private readonly deps: PipelineDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  async run(request: PipelineRequest): Promise<PipelineOutcome> {
    const startedAt = this.clock();
    const log = this.deps.logger.child({ requestId: request.requestId });
    const progress: { stage: Stage } = { stage: "auth" };

    let outcome: PipelineOutcome;
    try {
      outcome = await this.execute(request, progress, log);
    } catch (error) {
      log.error({ err: error, stage: progress.stage, clientAddress: request.clientAddress }, "Unexpected error during plant identification");
      outcome = { ok: false, error: internalError() };
    }

    this.observe(outcome, startedAt, log);
    return outcome;
  }

  private async execute(
    request: PipelineRequest,
    progress: { stage: Stage },
    log: Logger,
  ): Promise<PipelineOutcome> {
    const identity = await verifyCredential(request.authorization, this.deps.jwtSecret, new Date(this.clock()));
    if (!identity.ok) {
      // Failed attempts still count against the caller's address
      progress.stage = "admission";
      const charge = this.deps.rateLimiter.admit(`ip:${request.clientAddress}`, this.clock());
      if (!charge.ok) {
        return { ok: false, error: charge.error };
      }
      return { ok: false, error: identity.error, rateLimit: charge.value };
    }

    progress.stage = "admission";
    const admissionKey =
      this.deps.rateLimitKey === "identity" ? `sub:${identity.value.subject}` : `ip:${request.clientAddress}`;
    const admission = this.deps.rateLimiter.admit(admissionKey, this.clock());
    if (!admission.ok) {
      return { ok: false, error: admission.error };
    }
    const rateLimit = admission.value;

    progress.stage = "validation";
    const form = await readFormData(request);
    if (!form.ok) {
      return { ok: false, error: form.error, rateLimit };
    }
    const uploadSet = await validateUploadSet(form.value, this.deps.maxImages);
    if (!uploadSet.ok) {
      return { ok: false, error: uploadSet.error, rateLimit };
    }

    progress.stage = "fingerprint";
    const fingerprint = await fingerprintUploadSet(uploadSet.value);

    progress.stage = "cache";
    const cachedResult = this.deps.cache.get(fingerprint);
    if (cachedResult) {
      log.info({ fingerprint, subject: identity.value.subject }, "Returning cached identification result");
      return { ok: true, result: cachedResult, cached: true, fingerprint, rateLimit };
    }

    progress.stage = "upstream";
    const fetched = await this.identifyAndStore(fingerprint, uploadSet.value, log);
    if (!fetched.ok) {
      return { ok: false, error: fetched.error, rateLimit };
    }

    log.info({ fingerprint, subject: identity.value.subject }, "Plant identification successful");
    return { ok: true, result: fetched.value, cached: false, fingerprint, rateLimit };
  }

  private async identifyAndStore(
    fingerprint: string,
    uploadSet: UploadSet,
    log: Logger,
  ): Promise<Result<IdentificationResult>> {
    const { identifier, cache, metrics, singleFlight } = this.deps;

    const task = async () => {
      try {
        const result = await identifier.identify(uploadSet);
        metrics.recordUpstreamCall("success");
        cache.put(fingerprint, result);
        metrics.setCacheEntries(cache.size);
        return result;
      } catch (error) {
        metrics.recordUpstreamCall(error instanceof UpstreamError ? error.kind : "error");
        throw error;
      }
    };

    const flight = singleFlight ? singleFlight.run(fingerprint, task) : { promise: task(), shared: false };
    if (flight.shared) {
      log.debug({ fingerprint }, "Joining in-flight identification");
    }

    try {
      return ok(await flight.promise);
    } catch (error) {
      if (error instanceof UpstreamError) {
        log.warn(
          { fingerprint, kind: error.kind, providerStatus: error.providerStatus, reason: error.message },
          "Identification provider call failed",
        );
        return err(error.toOutcome());
      }
      throw error;
    }
  }

  private observe(outcome: PipelineOutcome, startedAt: number, log: Logger): void {
    const latencyMs = this.clock() - startedAt;
    const cached = outcome.ok && outcome.cached;
    const label = outcome.ok ? "success" : outcome.error.kind;

    this.deps.metrics.recordRequest({ outcome: label, latencyMs, cached });
    log.info({ event: "identification.completed", outcome: label, latencyMs, cached }, "Identification request completed");
  }
}

async function readFormData(request: PipelineRequest): Promise<Result<FormData, ValidationError>> {
  try {
    return ok(await request.readForm());
  } catch (error) {
    if (error instanceof Error && error.name === "BodyLimitError") {
      return err({ kind: "validation.payload_too_large", message: "Request body is too large" });
    }
    return err({ kind: "validation.invalid_body", message: "Request body must be multipart/form-data" });
  }
}
