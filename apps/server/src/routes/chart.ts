// POST /api/chart/render - Render a bar series (plus optional indicators) to PNG

import { readFile } from "fs/promises";
import { renderRequestSchema } from "@shared/schemas";
import { Router, type Request, type Response } from "express";

import { ResourceError } from "../chart/errors";
import { layerFromSpec } from "../render/indicators";
import { ChartOptions } from "../render/options";
import { renderOhlc } from "../render/renderer";

export interface ChartRouteConfig {
  maxBars: number;
  /** Root for staging directories; OS temp dir when unset */
  stagingRoot?: string;
}

export async function handleChartRender(
  req: Request,
  res: Response,
  config: ChartRouteConfig,
): Promise<void> {
  const parsed = renderRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({
      ok: false,
      error: {
        code: "INVALID_REQUEST",
        message: parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
          .join("; "),
      },
    });
    return;
  }

  const { bars, settings, indicators } = parsed.data;

  if (bars.length > config.maxBars) {
    res.status(413).json({
      ok: false,
      error: {
        code: "TOO_MANY_BARS",
        message: `At most ${config.maxBars} bars per chart, got ${bars.length}`,
      },
    });
    return;
  }

  const options = indicators.reduce(
    (acc, spec) => acc.withLayer(layerFromSpec(spec)),
    ChartOptions.create(settings),
  );

  // the staged file is gone once renderOhlc returns, so read it inside
  const outcome = await renderOhlc(bars, options, (path) => readFile(path), config.stagingRoot);
  if (!outcome.ok) {
    throw new ResourceError(`failed to read rendered chart: ${outcome.error}`);
  }

  res.status(200).type("image/png").send(outcome.value);
}

export function createChartRouter(config: ChartRouteConfig): Router {
  const router: Router = Router();

  router.post("/render", (req, res, next) => {
    handleChartRender(req, res, config).catch(next);
  });

  return router;
}
