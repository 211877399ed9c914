import { Hono } from "hono";
import { fromHono } from "chanfana";
import type { AppEnv } from "../../types";
import { PlantIdentification } from "./identification";

export const plantRouter = fromHono(new Hono<AppEnv>());

plantRouter.post("/api/identify", PlantIdentification);
