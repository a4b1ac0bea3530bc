import { Router, type NextFunction, type Request, type Response } from "express";
import { AuthError } from "../auth/errors.js";
import type { LoginService } from "../auth/loginService.js";
import { requireRole, type RequestHandler } from "../auth/middleware.js";
import { logInfo } from "../observability/logger.js";
import { recordTokenIssued } from "../observability/metrics.js";
import { UserStoreError } from "../users/store.js";

function readCredentials(body: unknown): { email: string; password: string } | null {
  if (!body || typeof body !== "object") return null;
  const { email, password } = body as { email?: unknown; password?: unknown };
  if (typeof email !== "string" || typeof password !== "string" || !email.trim() || !password) return null;
  return { email, password };
}

function sendKnownError(res: Response, error: unknown): boolean {
  if (error instanceof AuthError) {
    res.status(error.status).json({ error: error.message, code: error.code });
    return true;
  }
  if (error instanceof UserStoreError) {
    res.status(error.code === "EMAIL_TAKEN" ? 409 : 400).json({ error: error.message, code: error.code });
    return true;
  }
  return false;
}

export function createAuthHandlers(deps: { login: LoginService }) {
  const { login } = deps;

  return {
    async register(req: Request, res: Response, next: NextFunction): Promise<void> {
      const credentials = readCredentials(req.body);
      if (!credentials) {
        res.status(400).json({ error: "email and password are required", code: "INVALID_REQUEST" });
        return;
      }
      try {
        const user = await login.register(credentials.email, credentials.password);
        logInfo("auth.user.registered", { context: req.context, data: { user_id: user.id, role: user.role } });
        res.status(201).json(user);
      } catch (error) {
        if (!sendKnownError(res, error)) next(error);
      }
    },

    async login(req: Request, res: Response, next: NextFunction): Promise<void> {
      const credentials = readCredentials(req.body);
      if (!credentials) {
        res.status(400).json({ error: "email and password are required", code: "INVALID_REQUEST" });
        return;
      }
      try {
        const result = await login.login(credentials.email, credentials.password);
        recordTokenIssued(result.role);
        logInfo("auth.token.issued", { context: req.context, data: { role: result.role, expires_at: result.expires_at } });
        res.json(result);
      } catch (error) {
        if (!sendKnownError(res, error)) next(error);
      }
    },

    me(req: Request, res: Response): void {
      res.json({ principal: req.auth ?? null });
    }
  };
}

export function createAuthRouter(deps: { login: LoginService; authenticate: RequestHandler }): Router {
  const handlers = createAuthHandlers(deps);
  const router = Router();

  router.post("/auth/register", (req, res, next) => void handlers.register(req, res, next));
  router.post("/auth/login", (req, res, next) => void handlers.login(req, res, next));
  router.get("/auth/me", deps.authenticate, requireRole("USER"), handlers.me);

  return router;
}
