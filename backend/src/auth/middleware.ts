import type { NextFunction, Request, Response } from "express";
import type { AuthSettings } from "../config/settings.js";
import { logWarn } from "../observability/logger.js";
import { recordAccessDecision, recordTokenValidation } from "../observability/metrics.js";
import { hasRole } from "./roles.js";
import type { TokenValidator } from "./tokenValidator.js";
import type { AuthRole } from "./types.js";

export type RequestHandler = (req: Request, res: Response, next: NextFunction) => void;

export function parseBearerToken(headerValue: string | undefined): string | null {
  if (!headerValue) return null;
  const match = headerValue.match(/^Bearer\s+(.+)$/i);
  return match?.[1]?.trim() || null;
}

function deny(res: Response, status: 401 | 403, code: string, message: string): void {
  res.status(status).json({ error: message, code });
}

/**
 * Resolves `req.auth` from the bearer token. Every token failure gets the
 * same 401 response; the reason only reaches logs and metrics.
 */
export function createAuthenticator(deps: { settings: AuthSettings; validator: TokenValidator }): RequestHandler {
  const { settings, validator } = deps;

  return (req, res, next) => {
    if (!settings.enableJwtAuth) {
      deny(res, 401, "JWT_AUTH_DISABLED", "Bearer authentication is disabled");
      return;
    }

    const token = parseBearerToken(req.header("authorization"));
    if (!token) {
      deny(res, 401, "AUTH_MISSING_BEARER", "Missing Authorization Bearer token");
      return;
    }

    validator
      .validate(token)
      .then((result) => {
        if (!result.ok) {
          recordTokenValidation(result.reason);
          logWarn("auth.token.rejected", {
            context: req.context,
            data: { reason: result.reason, detail: result.detail, path: req.path }
          });
          deny(res, 401, "ACCESS_DENIED", "Access denied");
          return;
        }

        recordTokenValidation("valid");
        req.auth = result.principal;
        next();
      })
      .catch(next);
  };
}

export function requireRole(required: AuthRole): RequestHandler {
  return (req, res, next) => {
    const principal = req.auth;
    if (!principal) {
      deny(res, 401, "AUTH_REQUIRED", "Authentication required");
      return;
    }

    const granted = hasRole(principal.role, required);
    recordAccessDecision({ required, granted });
    if (!granted) {
      logWarn("auth.access.denied", {
        context: req.context,
        data: { required, actual: principal.role, path: req.path }
      });
      deny(res, 403, "RBAC_FORBIDDEN", `${required} role required`);
      return;
    }

    next();
  };
}
