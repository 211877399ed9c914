import "dotenv/config";
import { serve } from "@hono/node-server";
import { ConfigError, loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createApp } from "./index";
import { createServices, startSweeper } from "./services";

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

function main() {
  const config = loadConfigOrExit();

  const services = createServices(config, { collectDefaultMetrics: true });
  const app = createApp(services);
  const stopSweeper = startSweeper(services);

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    services.logger.info(
      { port: info.port, identifier: services.identifier.getName(), rateLimit: config.rateLimit },
      "Plant identification gateway listening",
    );
  });

  const shutdown = (signal: string) => {
    services.logger.info({ signal }, "Shutting down");
    stopSweeper();
    server.close(() => process.exit(0));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main();
