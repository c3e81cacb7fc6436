import type { Request, Response } from "express";

export function liveness(_req: Request, res: Response) {
  res.status(200).json({ ok: true, status: "live" });
}

export function healthz(_req: Request, res: Response) {
  res.status(200).json({
    ok: true,
    uptime: process.uptime(),
    version: "0.1.0",
    timestamp: Date.now(),
  });
}
