import pino from "pino";
import { vi } from "vitest";
import { loadConfig } from "../src/config";
import type { AppConfig } from "../src/config";
import { createAccessToken } from "../src/middleware/auth";
import type { FetchLike } from "../src/services/imageIdentifier/interface";
import type { PlantNetResponse } from "../src/types";

export const TEST_SECRET = "test-secret";
export const BASE_TIME = Date.UTC(2024, 4, 1, 12, 0, 0);

export const silentLogger = pino({ level: "silent" });

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    JWT_SECRET_KEY: TEST_SECRET,
    PLANTNET_API_KEY: "test-plantnet-key",
    PLANTNET_API_ENDPOINT: "https://plantnet.test/v2/identify/all",
    LOG_LEVEL: "silent",
    TRUST_PROXY: "true",
    UPSTREAM_RETRY_BASE_DELAY_MS: "0",
    ...env,
  });
}

/** Controllable clock starting at BASE_TIME. */
export function createTestClock(start = BASE_TIME) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

export function bearer(subject = "user-1", ttlSeconds = 3600, issuedAt = BASE_TIME): Promise<string> {
  return createAccessToken(TEST_SECRET, subject, ttlSeconds, new Date(issuedAt)).then(
    (token) => `Bearer ${token}`,
  );
}

export function imageFile(name: string, bytes: number[] = [1, 2, 3, 4], type = "image/jpeg"): File {
  return new File([new Uint8Array(bytes)], name, { type });
}

export function imageForm(files: File[], organs: Record<number, string> = {}): FormData {
  const form = new FormData();
  for (const file of files) {
    form.append("images", file);
  }
  for (const [position, organ] of Object.entries(organs)) {
    form.append(`organ_${position}`, organ);
  }
  return form;
}

export const PLANTNET_BODY: PlantNetResponse = {
  query: { organs: ["leaf"] },
  language: "en",
  preferedReferential: "k-world-flora",
  bestMatch: "Hedera helix L.",
  results: [
    {
      score: 0.8123,
      species: {
        scientificNameWithoutAuthor: "Hedera helix",
        scientificNameAuthorship: "L.",
        scientificName: "Hedera helix L.",
        genus: { scientificNameWithoutAuthor: "Hedera", scientificNameAuthorship: "L." },
        family: { scientificNameWithoutAuthor: "Araliaceae", scientificNameAuthorship: "" },
        commonNames: ["Common ivy", "English ivy"],
      },
      gbif: { id: "8351737" },
      powo: { id: "59153-2" },
    },
    {
      score: 0.0512,
      species: {
        scientificNameWithoutAuthor: "Hedera hibernica",
        scientificNameAuthorship: "(G.Kirchn.) Bean",
        scientificName: "Hedera hibernica (G.Kirchn.) Bean",
        commonNames: [],
      },
    },
  ],
  predictedOrgans: [{ filename: "leaf.jpg", organ: "leaf", score: 0.93 }],
  version: "2024-01-01 (test)",
  remainingIdentificationRequests: 487,
};

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** A fetch stand-in for PlantNet that answers every call with the given responses in turn. */
export function fakePlantNet(...responses: Array<() => Response | Promise<Response>>) {
  let call = 0;
  return vi.fn<FetchLike>(async () => {
    const next = responses[Math.min(call, responses.length - 1)];
    call++;
    return next();
  });
}
