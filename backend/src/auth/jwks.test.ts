import assert from "node:assert/strict";
import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import test from "node:test";
import { SignJWT, exportJWK, generateKeyPair, type JWK, type KeyLike } from "jose";
import { loadAuthSettings } from "../config/settings.js";
import { clearJwksCache, getRemoteJwksResolver } from "./jwks.js";
import { createTokenValidator } from "./tokenValidator.js";

type Mode = "ok" | "error" | "reset";

const { publicKey, privateKey } = await generateKeyPair("RS256");
const jwk: JWK = { ...(await exportJWK(publicKey)), kid: "key-1", alg: "RS256" };

// Key set server; each path keeps its own fetch count.
const hits = new Map<string, number>();
let mode: Mode = "ok";
const server: Server = createServer((req, res) => {
  const route = req.url ?? "/";
  hits.set(route, (hits.get(route) ?? 0) + 1);
  if (mode === "reset") {
    req.socket.destroy();
    return;
  }
  if (mode === "error") {
    res.writeHead(500, { "content-type": "text/plain" });
    res.end("boom");
    return;
  }
  res.writeHead(200, { "content-type": "application/json" });
  res.end(JSON.stringify({ keys: [jwk] }));
});
server.listen(0, "127.0.0.1");
await new Promise<void>((resolve) => server.once("listening", () => resolve()));
const baseUrl = `http://127.0.0.1:${(server.address() as AddressInfo).port}`;

const ISSUED_AT_SECONDS = Math.floor(Date.now() / 1000);

function signExternal(key: KeyLike): Promise<string> {
  return new SignJWT({ email: "b@x.com" })
    .setProtectedHeader({ alg: "RS256", kid: "key-1" })
    .setSubject("external-user")
    .setIssuedAt(ISSUED_AT_SECONDS)
    .setExpirationTime(ISSUED_AT_SECONDS + 300)
    .sign(key);
}

function settingsFor(route: string, cacheMs = "600000") {
  return loadAuthSettings({
    JWT_SECRET_KEY: "this-is-a-very-strong-secret-with-at-least-32-chars",
    JWT_JWK_SET_URI: `${baseUrl}${route}`,
    JWT_JWK_SET_CACHE_MS: cacheMs,
    APP_ADMIN_USERS: "b@x.com"
  });
}

test.beforeEach(() => {
  mode = "ok";
  clearJwksCache();
});

test.after(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
});

test("tokens validate against the remote key set", async () => {
  const validator = createTokenValidator(settingsFor("/ok.json"));
  const token = await signExternal(privateKey);

  const first = await validator.validate(token);
  const second = await validator.validate(token);

  assert.equal(first.ok ? first.principal.role : null, "ADMIN");
  assert.equal(first.ok ? first.source : null, "jwks");
  assert.equal(second.ok, true);
  assert.equal(hits.get("/ok.json"), 1);
});

test("a failing key set endpoint is retried once then reported as key-unavailable", async () => {
  mode = "error";
  const validator = createTokenValidator(settingsFor("/error.json"));

  const result = await validator.validate(await signExternal(privateKey));

  assert.equal(result.ok ? null : result.reason, "key-unavailable");
  assert.equal(hits.get("/error.json"), 2);
});

test("a dropped connection is reported as key-unavailable after one retry", async () => {
  mode = "reset";
  const validator = createTokenValidator(settingsFor("/reset.json"));

  const result = await validator.validate(await signExternal(privateKey));

  assert.equal(result.ok ? null : result.reason, "key-unavailable");
  assert.equal(hits.get("/reset.json"), 2);
});

test("a recovered endpoint serves keys on the next validation", async () => {
  mode = "error";
  const validator = createTokenValidator(settingsFor("/recover.json"));
  const token = await signExternal(privateKey);
  const failed = await validator.validate(token);

  mode = "ok";
  const recovered = await validator.validate(token);

  assert.equal(failed.ok, false);
  assert.equal(recovered.ok, true);
  assert.equal(hits.get("/recover.json"), 3);
});

test("resolvers are cached per URL until cleared", () => {
  const url = `${baseUrl}/cache.json`;
  const first = getRemoteJwksResolver(url, 600_000);

  assert.equal(getRemoteJwksResolver(url, 600_000), first);
  assert.notEqual(getRemoteJwksResolver(`${baseUrl}/other.json`, 600_000), first);

  clearJwksCache();
  assert.notEqual(getRemoteJwksResolver(url, 600_000), first);
});

test("resolvers are rebuilt once older than the TTL, and kept forever with a TTL of 0", async () => {
  const shortLived = getRemoteJwksResolver(`${baseUrl}/ttl.json`, 5);
  const forever = getRemoteJwksResolver(`${baseUrl}/forever.json`, 0);
  await new Promise((resolve) => setTimeout(resolve, 20));

  assert.notEqual(getRemoteJwksResolver(`${baseUrl}/ttl.json`, 5), shortLived);
  assert.equal(getRemoteJwksResolver(`${baseUrl}/forever.json`, 0), forever);
});
