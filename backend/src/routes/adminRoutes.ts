import { Router } from "express";
import type { LoginService } from "../auth/loginService.js";
import { requireRole, type RequestHandler } from "../auth/middleware.js";
import { describeSettings, type AuthSettings } from "../config/settings.js";
import type { UserStore } from "../users/store.js";

export function createAdminRouter(deps: {
  settings: AuthSettings;
  users: UserStore;
  login: LoginService;
  authenticate: RequestHandler;
}): Router {
  const router = Router();

  router.get("/admin/users", deps.authenticate, requireRole("ADMIN"), (_req, res, next) => {
    deps.users
      .list()
      .then((rows) => {
        res.json({ users: rows.map((row) => deps.login.describeUser(row)) });
      })
      .catch(next);
  });

  router.get("/root/settings", deps.authenticate, requireRole("ROOT"), (_req, res) => {
    res.json({ settings: describeSettings(deps.settings) });
  });

  return router;
}
