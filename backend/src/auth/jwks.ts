import { createLocalJWKSet, createRemoteJWKSet, type JSONWebKeySet, type JWTVerifyGetKey } from "jose";

const remoteResolvers = new Map<string, { resolver: JWTVerifyGetKey; createdAt: number }>();

/**
 * Returns a cached remote key set resolver for the URL. The resolver is
 * rebuilt once it is older than `cacheTtlMs`; 0 keeps it forever.
 */
export function getRemoteJwksResolver(url: string, cacheTtlMs: number, timeoutMs = 5000): JWTVerifyGetKey {
  const cached = remoteResolvers.get(url);
  const now = Date.now();

  if (cached && (cacheTtlMs === 0 || now - cached.createdAt < cacheTtlMs)) {
    return cached.resolver;
  }

  const resolver = createRemoteJWKSet(new URL(url), {
    cacheMaxAge: cacheTtlMs === 0 ? Infinity : cacheTtlMs,
    timeoutDuration: timeoutMs
  });
  remoteResolvers.set(url, { resolver, createdAt: now });
  return resolver;
}

export function getLocalJwksResolver(jwks: JSONWebKeySet): JWTVerifyGetKey {
  return createLocalJWKSet(jwks);
}

export function clearJwksCache(): void {
  remoteResolvers.clear();
}
