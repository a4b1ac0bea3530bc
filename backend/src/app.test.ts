import assert from "node:assert/strict";
import { mkdtemp, rm } from "node:fs/promises";
import type { AddressInfo } from "node:net";
import { tmpdir } from "node:os";
import path from "node:path";
import test from "node:test";
import { createApp } from "./app.js";
import { loadAuthSettings } from "./config/settings.js";

const dataRoot = await mkdtemp(path.join(tmpdir(), "rbac-app-test-"));
const settings = loadAuthSettings({
  JWT_SECRET_KEY: "this-is-a-very-strong-secret-with-at-least-32-chars",
  APP_ROOT_USERS: "a@x.com",
  APP_ADMIN_USERS: "b@x.com"
});
const server = createApp({ settings, dataRoot }).listen(0, "127.0.0.1");
await new Promise<void>((resolve) => server.once("listening", () => resolve()));
const { port } = server.address() as AddressInfo;
const baseUrl = `http://127.0.0.1:${port}`;

test.after(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  await rm(dataRoot, { recursive: true, force: true });
});

function postJson(route: string, body: string): Promise<Response> {
  return fetch(`${baseUrl}${route}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body
  });
}

async function loginAs(email: string): Promise<string> {
  await postJson("/auth/register", JSON.stringify({ email, password: "placeholder-password" }));
  const response = await postJson("/auth/login", JSON.stringify({ email, password: "placeholder-password" }));
  const body = (await response.json()) as { token: string };
  return body.token;
}

test("an unparsable JSON body is answered 400", async () => {
  const response = await postJson("/auth/login", "{bad");

  assert.equal(response.status, 400);
  assert.deepEqual(await response.json(), { error: "Invalid request body", code: "INVALID_REQUEST" });
});

test("a JWT-typed token with a non-JSON payload is denied with 401", async () => {
  const header = Buffer.from(JSON.stringify({ alg: "HS256", typ: "JWT" })).toString("base64url");
  const response = await fetch(`${baseUrl}/auth/me`, {
    headers: { authorization: `Bearer ${header}.abcd.sig` }
  });

  assert.equal(response.status, 401);
  assert.deepEqual(await response.json(), { code: "ACCESS_DENIED", error: "Access denied" });
});

test("a USER is refused the admin listing and an ADMIN gets it", async () => {
  const userToken = await loginAs("c@x.com");
  const adminToken = await loginAs("b@x.com");

  const denied = await fetch(`${baseUrl}/admin/users`, { headers: { authorization: `Bearer ${userToken}` } });
  const allowed = await fetch(`${baseUrl}/admin/users`, { headers: { authorization: `Bearer ${adminToken}` } });

  assert.equal(denied.status, 403);
  assert.deepEqual(await denied.json(), { code: "RBAC_FORBIDDEN", error: "ADMIN role required" });
  assert.equal(allowed.status, 200);
  const body = (await allowed.json()) as { users: Array<{ email: string; role: string }> };
  assert.deepEqual(
    body.users.map((user) => [user.email, user.role]),
    [
      ["c@x.com", "USER"],
      ["b@x.com", "ADMIN"]
    ]
  );
});

test("health is public and echoes a request id", async () => {
  const response = await fetch(`${baseUrl}/health`, { headers: { "x-request-id": "req-health" } });

  assert.equal(response.status, 200);
  assert.equal(response.headers.get("x-request-id"), "req-health");
  assert.deepEqual(await response.json(), { ok: true, service: "rbac-gatekeeper", jwt_auth: true });
});
