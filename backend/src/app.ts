import cors from "cors";
import express, { type Express } from "express";
import { createLoginService } from "./auth/loginService.js";
import { createAuthenticator } from "./auth/middleware.js";
import { createTokenValidator, type TokenValidator } from "./auth/tokenValidator.js";
import type { AuthSettings } from "./config/settings.js";
import { captureHttpMetrics } from "./observability/httpMetrics.js";
import { renderPrometheusMetrics } from "./observability/metrics.js";
import { attachRequestContext, logRequestLifecycle, logUnhandledError } from "./observability/requestContext.js";
import { createAdminRouter } from "./routes/adminRoutes.js";
import { createAuthRouter } from "./routes/authRoutes.js";
import { createUserStore, type UserStore } from "./users/store.js";

export interface AppDependencies {
  settings: AuthSettings;
  dataRoot: string;
  users?: UserStore;
  validator?: TokenValidator;
}

export function createApp(deps: AppDependencies): Express {
  const { settings } = deps;
  const users = deps.users ?? createUserStore(deps.dataRoot, settings.emailMatching);
  const validator = deps.validator ?? createTokenValidator(settings);
  const login = createLoginService({ settings, users });
  const authenticate = createAuthenticator({ settings, validator });

  const app = express();

  app.use(cors());
  app.use(express.json());
  app.use(attachRequestContext);
  app.use(logRequestLifecycle);
  app.use(captureHttpMetrics);

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "rbac-gatekeeper", jwt_auth: settings.enableJwtAuth });
  });

  app.get("/metrics", (_req, res) => {
    res.setHeader("Content-Type", "text/plain; version=0.0.4; charset=utf-8");
    res.send(renderPrometheusMetrics());
  });

  app.use(createAuthRouter({ login, authenticate }));
  app.use(createAdminRouter({ settings, users, login, authenticate }));

  app.use(logUnhandledError);

  return app;
}

export { loadAuthSettings, validateSecurityConfig, ConfigurationError, type AuthSettings } from "./config/settings.js";
export { resolveRole } from "./auth/roleResolver.js";
export { grant, hasRole } from "./auth/roles.js";
export { issueToken } from "./auth/tokenIssuer.js";
export { createTokenValidator } from "./auth/tokenValidator.js";
export { createAuthenticator, requireRole } from "./auth/middleware.js";
export type { AuthPrincipal, AuthRole, TokenFailureReason } from "./auth/types.js";
