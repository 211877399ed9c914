import { fromHono } from "chanfana";
import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { cors } from "hono/cors";
import { plantRouter } from "./endpoints/plant/router";
import { metricsHandler } from "./endpoints/metrics";
import { internalError, toErrorResponse } from "./errors";
import type { Services } from "./services";
import type { AppEnv } from "./types";

const REQUEST_ID_PATTERN = /^[\w.-]{1,128}$/;

export function createApp(services: Services) {
  // Start a Hono app
  const app = new Hono<AppEnv>();

  // Correlate every request and hand the shared services to the routes
  app.use("*", async (c, next) => {
    const incoming = c.req.header("X-Request-ID");
    const requestId = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : crypto.randomUUID();
    c.set("requestId", requestId);
    c.set("services", services);
    await next();
    c.header("X-Request-ID", requestId);
  });

  app.use("*", cors({
    origin: "*",
    allowMethods: ["GET", "POST", "OPTIONS"],
    allowHeaders: ["Content-Type", "Authorization"],
    exposeHeaders: ["X-Request-ID", "X-RateLimit-Limit", "X-RateLimit-Remaining", "X-RateLimit-Reset", "Retry-After"],
  }));

  app.use("/api/*", bodyLimit({
    maxSize: services.config.maxBodyBytes,
    onError: (c) => {
      const { status, body } = toErrorResponse({
        kind: "validation.payload_too_large",
        message: `Request body exceeds ${services.config.maxBodyBytes} bytes`,
      });
      return c.json(body, status);
    },
  }));

  app.get("/metrics", metricsHandler);

  app.notFound((c) => {
    const { status, body } = toErrorResponse({ kind: "not_found", message: "Not found" });
    return c.json(body, status);
  });

  app.onError((error, c) => {
    services.logger.error({ err: error, requestId: c.get("requestId"), path: c.req.path }, "Global error handler caught");
    const { status, body } = toErrorResponse(internalError());
    return c.json(body, status);
  });

  // Setup OpenAPI registry
  const openapi = fromHono(app, {
    docs_url: "/",
    redoc_url: "/redoc",
    schema: {
      info: {
        title: "Plant Identification Gateway",
        version: "1.0.0",
        description: `
# Plant Identification Gateway

Upload plant photographs and receive normalized species suggestions from PlantNet.

## Authentication

\`POST /api/identify\` requires an \`Authorization: Bearer <token>\` header carrying an HS256 JWT
with \`sub\` and \`exp\` claims.

## Errors

Every error is a JSON object \`{ "error_kind": "...", "message": "..." }\`:

| status | error_kind |
|---|---|
| 400 | \`validation.*\` |
| 401 | \`auth.missing\`, \`auth.invalid\`, \`auth.expired\` |
| 413 | \`validation.payload_too_large\` |
| 429 | \`rate_limited\` |
| 502 / 504 | \`upstream.*\` |
| 500 | \`internal\` |
        `.trim(),
      },
      tags: [
        {
          name: "Plant Identification",
          description: "Species identification from images",
        },
      ],
    },
  });

  openapi.registry.registerComponent("securitySchemes", "bearerAuth", {
    type: "http",
    scheme: "bearer",
    bearerFormat: "JWT",
  });

  // Register plant routes
  openapi.route("/", plantRouter);

  return app;
}

export type App = ReturnType<typeof createApp>;
