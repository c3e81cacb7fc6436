import type { Env } from "@shared/env";
import express, { type Express } from "express";

import { healthz, liveness } from "./health";
import { errorHandler, notFound } from "./middleware/error";
import { createChartRouter } from "./routes/chart";

export function createApp(env: Env): Express {
  const app = express();

  app.use(express.json({ limit: "10mb" }));

  app.get("/health/live", liveness);
  app.get("/healthz", healthz);

  app.use(
    "/api/chart",
    createChartRouter({ maxBars: env.CHART_MAX_BARS, stagingRoot: env.CHART_TMP_DIR }),
  );

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
