import type { NextFunction, Request, Response } from "express";
import { recordHttpRequest } from "./metrics.js";

function endpointLabel(req: Request): string {
  // Unrouted paths share one label so that probes cannot grow the series set.
  if (typeof req.route?.path !== "string") return "unmatched";
  const merged = `${req.baseUrl ?? ""}${req.route.path}`;
  return merged.replace(/\/{2,}/g, "/");
}

export function captureHttpMetrics(req: Request, res: Response, next: NextFunction): void {
  const startedAt = Date.now();

  res.on("finish", () => {
    recordHttpRequest({
      method: req.method,
      endpoint: endpointLabel(req),
      statusCode: res.statusCode,
      durationMs: Date.now() - startedAt
    });
  });

  next();
}
