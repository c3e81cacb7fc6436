import type { NextFunction, Request, Response } from "express";

import { ChartError } from "../chart/errors";
import { logger } from "../logger";

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const known = err instanceof ChartError ? err : undefined;
  const status = known?.status ?? 500;
  const code = known?.code ?? "INTERNAL_ERROR";
  const message = err instanceof Error ? err.message : "Unexpected server error";

  const log = { status, code, message, path: req.path, method: req.method };
  if (status >= 500) {
    logger.error({ ...log, err }, "API error");
  } else {
    logger.warn(log, "API request rejected");
  }

  res.status(status).json({
    ok: false,
    error: {
      code,
      message,
    },
  });
}

export function notFound(req: Request, res: Response) {
  res.status(404).json({
    ok: false,
    error: {
      code: "NOT_FOUND",
      message: `Route not found: ${req.method} ${req.path}`,
    },
  });
}
