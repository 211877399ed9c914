import type { Logger } from "pino";
import type { AppConfig } from "../../config";
import type { FetchLike, ImageIdentifier } from "./interface";
import { MockIdentifier } from "./mockIdentifier";
import { PlantNetIdentifier } from "./plantNetIdentifier";

export type IdentifierType = AppConfig["identifier"];

export interface ImageIdentifierConfig {
  plantnet?: {
    apiKey: string;
    endpoint: string;
    language: string;
  };
  upstream: AppConfig["upstream"];
  default: IdentifierType;
}

export class ImageIdentifierFactory {
  constructor(
    private readonly config: ImageIdentifierConfig,
    private readonly logger: Logger,
    private readonly fetchImpl?: FetchLike,
    private readonly sleep?: (ms: number) => Promise<void>,
  ) {}

  createIdentifier(type: IdentifierType = this.config.default): ImageIdentifier {
    switch (type) {
      case "plantnet":
        if (!this.config.plantnet?.apiKey) {
          throw new Error("PlantNet API key not configured");
        }
        return new PlantNetIdentifier({
          ...this.config.plantnet,
          ...this.config.upstream,
          logger: this.logger.child({ component: "plantnet" }),
          fetch: this.fetchImpl,
          sleep: this.sleep,
        });

      case "mock":
        return new MockIdentifier();
    }
  }

  static fromConfig(
    config: AppConfig,
    logger: Logger,
    fetchImpl?: FetchLike,
    sleep?: (ms: number) => Promise<void>,
  ): ImageIdentifierFactory {
    return new ImageIdentifierFactory(
      {
        plantnet: config.plantnet.apiKey ? config.plantnet : undefined,
        upstream: config.upstream,
        default: config.identifier,
      },
      logger,
      fetchImpl,
      sleep,
    );
  }
}
