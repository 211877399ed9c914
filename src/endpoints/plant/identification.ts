import { OpenAPIRoute } from "chanfana";
import { z } from "zod";
import type { AppContext } from "../../types";
import {
  ErrorResponseSchema,
  IdentificationFormDataSchema,
  IdentificationResponseSchema,
} from "../../types";
import { toErrorResponse } from "../../errors";
import { resolveClientAddress } from "../../middleware/rateLimit";
import type { RateLimitState } from "../../middleware/rateLimit";

function errorResponse(description: string, example: { error_kind: string; message: string }) {
  return {
    description,
    content: {
      "application/json": {
        schema: ErrorResponseSchema,
        example,
      },
    },
  };
}

function setRateLimitHeaders(c: AppContext, state: RateLimitState) {
  c.header("X-RateLimit-Limit", String(state.limit));
  c.header("X-RateLimit-Remaining", String(state.remaining));
  c.header("X-RateLimit-Reset", String(state.resetSeconds));
}

export class PlantIdentification extends OpenAPIRoute {
  schema = {
    tags: ["Plant Identification"],
    summary: "Identify plant species from images",
    description: `
Submit between one and five images of the same plant for species identification. Each image may be
tagged with the organ it shows through the positional fields \`organ_1\` … \`organ_5\`; untagged images
are sent as \`auto\`.

## Image Requirements
- **Formats**: JPG, JPEG, PNG, GIF (\`image/jpeg\`, \`image/png\`, \`image/gif\`)
- **Count**: 1-5 images per request

## Caching
Identical uploads (same bytes, same order, same organ tags) are answered from cache for the configured
TTL; \`cached\` in the response tells whether the provider was called.

## Rate Limits
Requests are counted per caller in fixed windows. Every admitted response carries
\`X-RateLimit-Limit\`, \`X-RateLimit-Remaining\` and \`X-RateLimit-Reset\`.
    `.trim(),
    security: [{ bearerAuth: [] }],
    request: {
      body: {
        content: {
          "multipart/form-data": {
            schema: IdentificationFormDataSchema,
          },
        },
      },
      headers: z.object({
        Authorization: z.string().describe("Bearer token, e.g. `Bearer eyJhbGciOi...`"),
      }),
    },
    responses: {
      "200": {
        description: "Plant identification completed successfully",
        content: {
          "application/json": {
            schema: IdentificationResponseSchema,
          },
        },
      },
      "400": errorResponse("Invalid upload", {
        error_kind: "validation.unsupported_extension",
        message: 'Image 1: unsupported file extension ".txt"; allowed: jpg, jpeg, png, gif',
      }),
      "401": errorResponse("Missing, invalid or expired bearer token", {
        error_kind: "auth.expired",
        message: "Token has expired",
      }),
      "413": errorResponse("Request body too large", {
        error_kind: "validation.payload_too_large",
        message: "Request body is too large",
      }),
      "429": errorResponse("Rate limit exceeded", {
        error_kind: "rate_limited",
        message: "Rate limit exceeded: 10 requests per minute",
      }),
      "502": errorResponse("Identification provider failed", {
        error_kind: "upstream.permanent",
        message: "PlantNet found no matching species",
      }),
      "504": errorResponse("Identification provider timed out", {
        error_kind: "upstream.transient",
        message: "PlantNet request timed out",
      }),
      "500": errorResponse("Internal server error", {
        error_kind: "internal",
        message: "Internal server error",
      }),
    },
  };

  async handle(c: AppContext) {
    const { pipeline, config } = c.get("services");
    const requestId = c.get("requestId");

    const outcome = await pipeline.run({
      requestId,
      authorization: c.req.header("Authorization"),
      clientAddress: resolveClientAddress(
        {
          header: (name) => c.req.header(name),
          socketAddress: c.env?.incoming?.socket.remoteAddress,
        },
        config.trustProxy,
      ),
      readForm: () => c.req.formData(),
    });

    if (outcome.rateLimit) {
      setRateLimitHeaders(c, outcome.rateLimit);
    }

    if (!outcome.ok) {
      if (outcome.error.kind === "rate_limited") {
        c.header("Retry-After", String(outcome.error.retryAfterSeconds));
      }
      const { status, body } = toErrorResponse(outcome.error);
      return c.json(body, status);
    }

    return c.json(
      {
        request_id: requestId,
        status: "COMPLETED" as const,
        cached: outcome.cached,
        result: outcome.result,
      },
      200,
    );
  }
}
