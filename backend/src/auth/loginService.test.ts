import assert from "node:assert/strict";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import test from "node:test";
import { loadAuthSettings } from "../config/settings.js";
import { createUserStore } from "../users/store.js";
import { LoginError, TokenIssueError } from "./errors.js";
import { createLoginService } from "./loginService.js";
import { createTokenValidator } from "./tokenValidator.js";

const dataRoot = await mkdtemp(path.join(tmpdir(), "rbac-login-test-"));
const settings = loadAuthSettings({
  JWT_SECRET_KEY: "this-is-a-very-strong-secret-with-at-least-32-chars",
  JWT_EXPIRATION_MS: "900000",
  APP_ROOT_USERS: "a@x.com",
  APP_ADMIN_USERS: "b@x.com"
});
const users = createUserStore(dataRoot, settings.emailMatching);
const service = createLoginService({ settings, users });

test.before(async () => {
  await service.register("a@x.com", "placeholder-password");
  await service.register("b@x.com", "placeholder-password");
  await service.register("c@x.com", "placeholder-password");
});

test.after(async () => {
  await rm(dataRoot, { recursive: true, force: true });
});

test("register returns the public view with the resolved role", async () => {
  const created = await service.register("d@x.com", "placeholder-password");

  assert.equal(created.email, "d@x.com");
  assert.equal(created.role, "USER");
  assert.equal("password_hash" in created, false);
});

test("login resolves the role from the configured lists", async () => {
  const now = new Date("2026-03-01T12:00:00.000Z");
  const root = await service.login("a@x.com", "placeholder-password", { now });
  const admin = await service.login("b@x.com", "placeholder-password", { now });
  const user = await service.login("c@x.com", "placeholder-password", { now });

  assert.equal(root.role, "ROOT");
  assert.equal(admin.role, "ADMIN");
  assert.equal(user.role, "USER");
  assert.equal(user.token_type, "Bearer");
  assert.equal(user.expires_at, "2026-03-01T12:15:00.000Z");
});

test("issued login tokens validate to the same principal", async () => {
  const now = new Date("2026-03-01T12:00:00.000Z");
  const result = await service.login("b@x.com", "placeholder-password", { now });
  const stored = await users.findByEmail("b@x.com");

  const validated = await createTokenValidator(settings).validate(result.token, { now });

  assert.equal(validated.ok, true);
  if (validated.ok) {
    assert.equal(validated.principal.role, "ADMIN");
    assert.equal(validated.principal.email, "b@x.com");
    assert.equal(validated.principal.subject, stored?.id);
  }
});

test("unknown emails and wrong passwords fail the same way", async () => {
  await assert.rejects(service.login("nobody@x.com", "placeholder-password"), LoginError);
  await assert.rejects(service.login("c@x.com", "wrong-password"), LoginError);
});

test("login fails when jwt auth is disabled", async () => {
  const disabled = loadAuthSettings({ ENABLE_JWT_AUTH: "false" });
  const sessionOnly = createLoginService({ settings: disabled, users });

  await assert.rejects(
    sessionOnly.login("c@x.com", "placeholder-password"),
    (error: unknown) => error instanceof TokenIssueError && error.code === "JWT_AUTH_DISABLED"
  );
});
