import { nanoid } from "nanoid";
import type { NextFunction, Request, Response } from "express";
import type { LogContext } from "./logger.js";
import { logError, logInfo } from "./logger.js";

export type RequestContext = Required<LogContext>;

function pickString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

export function resolveRequestContext(req: Request): RequestContext {
  const request_id = pickString(req.header("x-request-id")) ?? nanoid(10);
  const subject = req.auth?.subject ?? "anonymous";
  const role = req.auth?.role ?? "none";

  return { request_id, subject, role };
}

export function attachRequestContext(req: Request, res: Response, next: NextFunction): void {
  req.context = resolveRequestContext(req);
  res.setHeader("x-request-id", req.context.request_id);
  next();
}

function resolvePrincipalFields(req: Request): Partial<LogContext> {
  return req.auth ? { subject: req.auth.subject, role: req.auth.role } : {};
}

export function logRequestLifecycle(req: Request, res: Response, next: NextFunction): void {
  const startedAt = Date.now();

  res.on("finish", () => {
    const duration_ms = Date.now() - startedAt;
    // The principal is only known once authentication has run.
    const context = req.context ? { ...req.context, ...resolvePrincipalFields(req) } : undefined;
    const data: Record<string, unknown> = {
      method: req.method,
      path: req.path,
      status_code: res.statusCode,
      duration_ms
    };
    if (res.statusCode >= 500) {
      logError("http.request.completed", { context, data });
    } else {
      logInfo("http.request.completed", { context, data });
    }
  });

  next();
}

function clientErrorStatus(err: unknown): number | null {
  if (!err || typeof err !== "object") return null;
  const { status, statusCode } = err as { status?: unknown; statusCode?: unknown };
  const candidate = typeof status === "number" ? status : statusCode;
  return typeof candidate === "number" && candidate >= 400 && candidate < 500 ? candidate : null;
}

export function logUnhandledError(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  void _next;
  // Body-parser failures arrive here with a 4xx status.
  const status = clientErrorStatus(err);
  if (status !== null) {
    logInfo("http.request.rejected", {
      context: req.context,
      data: { method: req.method, path: req.path, status_code: status, error: err instanceof Error ? err.message : "Invalid request" }
    });
    res.status(status).json({ error: "Invalid request body", code: "INVALID_REQUEST" });
    return;
  }

  logError("http.request.unhandled_error", {
    context: req.context,
    data: {
      method: req.method,
      path: req.path,
      status_code: 500,
      error: err instanceof Error ? err.message : "Unknown error"
    }
  });
  res.status(500).json({ error: "Internal server error" });
}
