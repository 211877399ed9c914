import type { Logger } from "pino";
import { UpstreamError } from "../../errors";
import { PlantNetResponseSchema } from "../../types";
import type { IdentificationResult, PlantNetResponse, PlantSuggestion } from "../../types";
import type { UploadSet } from "../../utils/fileValidation";
import type { FetchLike, ImageIdentifier } from "./interface";

const MAX_SUGGESTIONS = 5;
const IS_PLANT_THRESHOLD = 0.1;

export interface PlantNetIdentifierOptions {
  apiKey: string;
  endpoint: string;
  language: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  logger: Logger;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Maps an HTTP status from PlantNet onto our upstream error kinds. Quota exhaustion (429)
 * and server errors may clear up on their own; every other 4xx will not.
 */
export function classifyStatus(status: number, detail?: string): UpstreamError {
  const suffix = detail ? `: ${detail}` : "";
  if (status === 429) {
    return new UpstreamError("upstream.transient", `PlantNet quota or rate limit exceeded${suffix}`, status);
  }
  if (status >= 500) {
    return new UpstreamError("upstream.transient", `PlantNet unavailable (HTTP ${status})${suffix}`, status);
  }
  if (status === 404) {
    return new UpstreamError("upstream.permanent", `PlantNet found no matching species${suffix}`, status);
  }
  return new UpstreamError("upstream.permanent", `PlantNet rejected the request (HTTP ${status})${suffix}`, status);
}

/**
 * Classifies anything thrown while talking to PlantNet. Returns null for errors that did not
 * come from the network call, which callers should let propagate.
 */
export function classifyUpstreamFailure(error: unknown): UpstreamError | null {
  if (error instanceof UpstreamError) {
    return error;
  }
  if (error instanceof Error && error.name === "TimeoutError") {
    return new UpstreamError("upstream.transient", "PlantNet request timed out", undefined, true);
  }
  if (error instanceof Error && error.name === "AbortError") {
    return new UpstreamError("upstream.transient", "PlantNet request was aborted");
  }
  // fetch reports DNS, connection and socket failures as TypeError("fetch failed")
  if (error instanceof TypeError) {
    return new UpstreamError("upstream.transient", `Network error calling PlantNet: ${error.message}`);
  }
  return null;
}

export class PlantNetIdentifier implements ImageIdentifier {
  private readonly fetch: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: PlantNetIdentifierOptions) {
    this.fetch = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  getName(): string {
    return "PlantNet";
  }

  async identify(uploadSet: UploadSet): Promise<IdentificationResult> {
    const startTime = Date.now();
    const { maxRetries, retryBaseDelayMs, logger } = this.options;

    for (let attempt = 0; ; attempt++) {
      let body: PlantNetResponse;
      try {
        body = await this.requestOnce(uploadSet);
      } catch (error) {
        const failure = classifyUpstreamFailure(error);
        if (!failure) {
          throw error;
        }
        if (!failure.retryable || attempt >= maxRetries) {
          throw failure;
        }

        const delay = retryBaseDelayMs * 2 ** attempt;
        logger.warn(
          { attempt: attempt + 1, delayMs: delay, providerStatus: failure.providerStatus, reason: failure.message },
          "PlantNet call failed, retrying",
        );
        await this.sleep(delay);
        continue;
      }

      return this.transformResponse(body, uploadSet, Date.now() - startTime);
    }
  }

  buildUrl(): URL {
    const url = new URL(this.options.endpoint);
    url.searchParams.set("include-related-images", "false");
    url.searchParams.set("no-reject", "false");
    url.searchParams.set("lang", this.options.language);
    url.searchParams.set("api-key", this.options.apiKey);
    return url;
  }

  buildFormData(uploadSet: UploadSet): FormData {
    const formData = new FormData();
    for (const entry of uploadSet) {
      formData.append("images", new Blob([entry.data], { type: entry.contentType }), entry.filename);
    }
    // One organ per image, in the same order
    for (const entry of uploadSet) {
      formData.append("organs", entry.organ);
    }
    return formData;
  }

  private async requestOnce(uploadSet: UploadSet): Promise<PlantNetResponse> {
    const response = await this.fetch(this.buildUrl(), {
      method: "POST",
      body: this.buildFormData(uploadSet),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      throw classifyStatus(response.status, await readErrorDetail(response));
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new UpstreamError("upstream.malformed_response", "PlantNet returned a non-JSON body", response.status);
    }

    const parsed = PlantNetResponseSchema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new UpstreamError(
        "upstream.malformed_response",
        `PlantNet response did not match the expected shape (${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown"})`,
        response.status,
      );
    }
    return parsed.data;
  }

  protected transformResponse(
    body: PlantNetResponse,
    uploadSet: UploadSet,
    processingTime: number,
  ): IdentificationResult {
    const suggestions: PlantSuggestion[] = body.results.slice(0, MAX_SUGGESTIONS).map((result, index) => {
      const name = result.species.scientificNameWithoutAuthor;
      const gbifId = result.gbif ? Number.parseInt(String(result.gbif.id), 10) : Number.NaN;

      return {
        id: Number.isFinite(gbifId) ? gbifId : index + 1000, // GBIF id when PlantNet has one
        name,
        scientific_name: result.species.scientificName ?? name,
        ...(result.species.scientificNameAuthorship ? { authorship: result.species.scientificNameAuthorship } : {}),
        probability: Math.min(Math.max(result.score, 0), 1),
        common_names: result.species.commonNames,
        details: {
          taxonomy: {
            family: result.species.family?.scientificNameWithoutAuthor ?? "Unknown",
            genus: result.species.genus?.scientificNameWithoutAuthor ?? "Unknown",
          },
          ...(Number.isFinite(gbifId) && { gbif_id: gbifId }),
          ...(result.powo && { powo_id: result.powo.id }),
        },
      };
    });

    const topScore = suggestions[0]?.probability ?? 0;
    const isPlant = topScore > IS_PLANT_THRESHOLD;

    return {
      best_match: body.bestMatch ?? suggestions[0]?.scientific_name ?? null,
      is_plant: {
        probability: isPlant ? Math.max(topScore, 0.5) : topScore,
        threshold: IS_PLANT_THRESHOLD,
        binary: isPlant,
      },
      classification: { suggestions },
      organs: uploadSet.map(entry => entry.organ),
      predicted_organs: body.predictedOrgans,
      provider: this.getName(),
      language: body.language ?? this.options.language,
      ...(body.version ? { version: body.version } : {}),
      ...(body.remainingIdentificationRequests !== undefined && {
        remaining_requests: body.remainingIdentificationRequests,
      }),
      processing_time_ms: processingTime,
    };
  }
}

function messageFromBody(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === "object" && "message" in parsed && typeof parsed.message === "string") {
      return parsed.message;
    }
  } catch {
    return text.slice(0, 200);
  }
  return text.slice(0, 200);
}

async function readErrorDetail(response: Response): Promise<string | undefined> {
  const text = (await response.text().catch(() => "")).trim();
  return text ? messageFromBody(text) : undefined;
}
