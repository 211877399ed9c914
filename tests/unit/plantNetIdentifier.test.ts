import { describe, expect, it, vi } from "vitest";
import { UpstreamError } from "../../src/errors";
import {
  PlantNetIdentifier,
  classifyStatus,
  classifyUpstreamFailure,
} from "../../src/services/imageIdentifier/plantNetIdentifier";
import type { FetchLike } from "../../src/services/imageIdentifier/interface";
import type { IdentificationResult } from "../../src/types";
import type { UploadSet } from "../../src/utils/fileValidation";
import { PLANTNET_BODY, fakePlantNet, jsonResponse, silentLogger } from "../helpers";

const uploadSet: UploadSet = [
  { data: new Uint8Array([1, 2, 3]), filename: "leaf.jpg", contentType: "image/jpeg", organ: "leaf" },
  { data: new Uint8Array([4, 5]), filename: "flower.png", contentType: "image/png", organ: "auto" },
];

function createIdentifier(fetch: FetchLike, overrides: { maxRetries?: number; timeoutMs?: number } = {}) {
  const sleep = vi.fn(async (_ms: number) => {});
  const identifier = new PlantNetIdentifier({
    apiKey: "test-plantnet-key",
    endpoint: "https://plantnet.test/v2/identify/all",
    language: "en",
    timeoutMs: overrides.timeoutMs ?? 1000,
    maxRetries: overrides.maxRetries ?? 2,
    retryBaseDelayMs: 100,
    logger: silentLogger,
    fetch,
    sleep,
  });
  return { identifier, sleep };
}

describe("PlantNetIdentifier", () => {
  it("should post images and organs and normalize the response", async () => {
    const fetch = fakePlantNet(() => jsonResponse(PLANTNET_BODY));
    const { identifier } = createIdentifier(fetch);

    const result = await identifier.identify(uploadSet);

    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0];
    const requestUrl = new URL(String(url));
    expect(requestUrl.origin + requestUrl.pathname).toBe("https://plantnet.test/v2/identify/all");
    expect(requestUrl.searchParams.get("api-key")).toBe("test-plantnet-key");
    expect(requestUrl.searchParams.get("lang")).toBe("en");
    expect(requestUrl.searchParams.get("include-related-images")).toBe("false");
    expect(requestUrl.searchParams.get("no-reject")).toBe("false");
    expect(init?.method).toBe("POST");

    const body = init?.body;
    expect(body).toBeInstanceOf(FormData);
    if (body instanceof FormData) {
      expect(body.getAll("organs")).toEqual(["leaf", "auto"]);
      const images = body.getAll("images");
      expect(images).toHaveLength(2);
      const first = images[0];
      expect(first).toBeInstanceOf(File);
      if (first instanceof File) {
        expect(first.name).toBe("leaf.jpg");
        expect(Array.from(new Uint8Array(await first.arrayBuffer()))).toEqual([1, 2, 3]);
      }
    }

    expect(result.best_match).toBe("Hedera helix L.");
    expect(result.is_plant).toEqual({ probability: 0.8123, threshold: 0.1, binary: true });
    expect(result.organs).toEqual(["leaf", "auto"]);
    expect(result.predicted_organs).toEqual([{ filename: "leaf.jpg", organ: "leaf", score: 0.93 }]);
    expect(result.provider).toBe("PlantNet");
    expect(result.remaining_requests).toBe(487);
    expect(result.version).toBe("2024-01-01 (test)");
    expect(result.classification.suggestions).toEqual([
      {
        id: 8351737,
        name: "Hedera helix",
        scientific_name: "Hedera helix L.",
        authorship: "L.",
        probability: 0.8123,
        common_names: ["Common ivy", "English ivy"],
        details: {
          taxonomy: { family: "Araliaceae", genus: "Hedera" },
          gbif_id: 8351737,
          powo_id: "59153-2",
        },
      },
      {
        id: 1001,
        name: "Hedera hibernica",
        scientific_name: "Hedera hibernica (G.Kirchn.) Bean",
        authorship: "(G.Kirchn.) Bean",
        probability: 0.0512,
        common_names: [],
        details: {
          taxonomy: { family: "Unknown", genus: "Unknown" },
        },
      },
    ]);
  });

  it("should report a low score as not a plant", async () => {
    const fetch = fakePlantNet(() =>
      jsonResponse({ ...PLANTNET_BODY, bestMatch: undefined, results: [{ ...PLANTNET_BODY.results[1] }] }),
    );
    const { identifier } = createIdentifier(fetch);

    const result = await identifier.identify(uploadSet);

    expect(result.is_plant).toEqual({ probability: 0.0512, threshold: 0.1, binary: false });
    expect(result.best_match).toBe("Hedera hibernica (G.Kirchn.) Bean");
  });

  it("should retry transient failures and succeed", async () => {
    const fetch = fakePlantNet(
      () => jsonResponse({ message: "Service unavailable" }, 503),
      () => jsonResponse(PLANTNET_BODY),
    );
    const { identifier, sleep } = createIdentifier(fetch);

    const result = await identifier.identify(uploadSet);

    expect(result.best_match).toBe("Hedera helix L.");
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(100);
  });

  it("should give up after the retry bound with a transient error", async () => {
    const fetch = fakePlantNet(() => jsonResponse({ message: "Too many requests" }, 429));
    const { identifier, sleep } = createIdentifier(fetch, { maxRetries: 2 });

    const failure = await identifier.identify(uploadSet).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(UpstreamError);
    if (failure instanceof UpstreamError) {
      expect(failure.kind).toBe("upstream.transient");
      expect(failure.providerStatus).toBe(429);
      expect(failure.message).toBe("PlantNet quota or rate limit exceeded: Too many requests");
    }
    expect(fetch).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it("should not retry permanent failures", async () => {
    const fetch = fakePlantNet(() => jsonResponse({ statusCode: 404, error: "Not Found", message: "Species not found" }, 404));
    const { identifier, sleep } = createIdentifier(fetch);

    await expect(identifier.identify(uploadSet)).rejects.toMatchObject({
      kind: "upstream.permanent",
      providerStatus: 404,
      message: "PlantNet found no matching species: Species not found",
    });
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("should not retry a body that is not JSON", async () => {
    const fetch = fakePlantNet(() => new Response("<html>gateway</html>", { status: 200 }));
    const { identifier } = createIdentifier(fetch);

    await expect(identifier.identify(uploadSet)).rejects.toMatchObject({
      kind: "upstream.malformed_response",
      message: "PlantNet returned a non-JSON body",
    });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("should reject a JSON body with the wrong shape", async () => {
    const fetch = fakePlantNet(() => jsonResponse({ results: "nope" }));
    const { identifier } = createIdentifier(fetch);

    await expect(identifier.identify(uploadSet)).rejects.toMatchObject({
      kind: "upstream.malformed_response",
    });
  });

  it("should report a timeout as a transient error", async () => {
    const fetch = vi.fn<FetchLike>(async () => {
      throw new DOMException("The operation was aborted due to timeout", "TimeoutError");
    });
    const { identifier } = createIdentifier(fetch, { maxRetries: 0 });

    await expect(identifier.identify(uploadSet)).rejects.toMatchObject({
      kind: "upstream.transient",
      timedOut: true,
      message: "PlantNet request timed out",
    });
  });

  it("should abort a call that outlives the timeout", async () => {
    const fetch = vi.fn<FetchLike>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(init?.signal?.reason));
        }),
    );
    const { identifier } = createIdentifier(fetch, { maxRetries: 0, timeoutMs: 20 });

    await expect(identifier.identify(uploadSet)).rejects.toMatchObject({
      kind: "upstream.transient",
      timedOut: true,
    });
  });

  it("should not retry a failure while normalizing the response", async () => {
    class FailingNormalizer extends PlantNetIdentifier {
      protected override transformResponse(): IdentificationResult {
        throw new TypeError("Cannot read properties of undefined (reading 'score')");
      }
    }
    const fetch = fakePlantNet(() => jsonResponse(PLANTNET_BODY));
    const identifier = new FailingNormalizer({
      apiKey: "test-plantnet-key",
      endpoint: "https://plantnet.test/v2/identify/all",
      language: "en",
      timeoutMs: 1000,
      maxRetries: 2,
      retryBaseDelayMs: 0,
      logger: silentLogger,
      fetch,
      sleep: async () => {},
    });

    await expect(identifier.identify(uploadSet)).rejects.toThrow(TypeError);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("should let unexpected errors propagate unclassified", async () => {
    const fetch = vi.fn<FetchLike>(async () => {
      throw new RangeError("bug");
    });
    const { identifier } = createIdentifier(fetch);

    await expect(identifier.identify(uploadSet)).rejects.toThrow(RangeError);
    expect(fetch).toHaveBeenCalledTimes(1);
  });
});

describe("classifyStatus", () => {
  it.each([
    [500, "upstream.transient"],
    [503, "upstream.transient"],
    [429, "upstream.transient"],
    [400, "upstream.permanent"],
    [401, "upstream.permanent"],
    [404, "upstream.permanent"],
  ])("should classify HTTP %i as %s", (status, kind) => {
    expect(classifyStatus(status).kind).toBe(kind);
  });
});

describe("classifyUpstreamFailure", () => {
  it("should treat network errors as transient", () => {
    const failure = classifyUpstreamFailure(new TypeError("fetch failed"));

    expect(failure?.kind).toBe("upstream.transient");
    expect(failure?.retryable).toBe(true);
    expect(failure?.timedOut).toBe(false);
  });

  it("should return null for errors that are not upstream failures", () => {
    expect(classifyUpstreamFailure(new Error("boom"))).toBeNull();
  });
});
