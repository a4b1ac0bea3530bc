import { errors, jwtVerify, type JSONWebKeySet, type JWTPayload, type JWTVerifyGetKey } from "jose";
import jwt, { type Jwt, type JwtPayload } from "jsonwebtoken";
import type { AuthSettings } from "../config/settings.js";
import { TokenValidationError } from "./errors.js";
import { getLocalJwksResolver, getRemoteJwksResolver } from "./jwks.js";
import { resolveRole } from "./roleResolver.js";
import { toRole } from "./roles.js";
import { LOCAL_TOKEN_ALGORITHM } from "./tokenIssuer.js";
import type { AuthPrincipal, TokenFailureReason } from "./types.js";

const EXTERNAL_ALGORITHMS = ["RS256", "RS384", "RS512", "PS256", "PS384", "PS512", "ES256", "ES384", "ES512", "EdDSA"];

export type TokenSource = "local" | "jwks";

export type TokenValidationResult =
  | { ok: true; principal: AuthPrincipal; expiresAt: Date; source: TokenSource }
  | { ok: false; reason: TokenFailureReason; detail: string };

export interface TokenValidator {
  validate(token: string, options?: { now?: Date }): Promise<TokenValidationResult>;
}

export interface TokenValidatorOptions {
  /** Key set used instead of fetching `jwkSetUri`. */
  jwks?: JSONWebKeySet;
  jwksTimeoutMs?: number;
}

function readHeaderAlgorithm(token: string): string {
  let decoded: Jwt | null;
  try {
    // Throws on a JWT-typed header followed by a non-JSON payload.
    decoded = jwt.decode(token, { complete: true });
  } catch (error) {
    throw new TokenValidationError("malformed", error instanceof Error ? error.message : "undecodable token");
  }
  if (!decoded || typeof decoded.header.alg !== "string") {
    throw new TokenValidationError("malformed", "token is not a JWT");
  }
  return decoded.header.alg;
}

function mapLocalError(error: unknown): TokenValidationError {
  if (error instanceof jwt.TokenExpiredError) {
    return new TokenValidationError("expired", error.message);
  }
  if (error instanceof jwt.JsonWebTokenError) {
    if (error.message === "invalid signature" || error.message.startsWith("jwt issuer invalid")) {
      return new TokenValidationError("signature-invalid", error.message);
    }
    return new TokenValidationError("malformed", error.message);
  }
  return new TokenValidationError("malformed", error instanceof Error ? error.message : "unknown error");
}

function mapJoseError(error: unknown): TokenValidationError {
  if (error instanceof errors.JWTExpired) {
    return new TokenValidationError("expired", error.message);
  }
  if (error instanceof errors.JWTClaimValidationFailed) {
    return new TokenValidationError(error.claim === "iss" ? "signature-invalid" : "malformed", error.message);
  }
  if (error instanceof errors.JWSSignatureVerificationFailed || error instanceof errors.JWKSNoMatchingKey) {
    return new TokenValidationError("signature-invalid", error.message);
  }
  if (error instanceof errors.JWKSTimeout || error instanceof errors.JWKSInvalid) {
    return new TokenValidationError("key-unavailable", error.message);
  }
  if (error instanceof errors.JOSEError && error.code !== "ERR_JOSE_GENERIC") {
    return new TokenValidationError("malformed", error.message);
  }
  // Non-JOSE errors come from fetching the key set.
  return new TokenValidationError("key-unavailable", error instanceof Error ? error.message : "unknown error");
}

/**
 * Validates bearer tokens. HS256 tokens are checked against the shared secret;
 * asymmetric tokens against the configured key set. Every outcome is returned,
 * never thrown.
 */
export function createTokenValidator(settings: AuthSettings, options: TokenValidatorOptions = {}): TokenValidator {
  let keySet: JWTVerifyGetKey | null = null;
  if (options.jwks) {
    keySet = getLocalJwksResolver(options.jwks);
  }

  function resolveKeySet(): JWTVerifyGetKey | null {
    if (keySet) return keySet;
    if (!settings.jwkSetUri) return null;
    return getRemoteJwksResolver(settings.jwkSetUri, settings.jwkSetCacheMs, options.jwksTimeoutMs);
  }

  function toPrincipal(payload: JWTPayload | JwtPayload): { principal: AuthPrincipal; expiresAt: Date } {
    const subject = typeof payload.sub === "string" && payload.sub ? payload.sub : null;
    if (!subject) {
      throw new TokenValidationError("malformed", "missing sub claim");
    }
    if (typeof payload.exp !== "number") {
      throw new TokenValidationError("malformed", "missing exp claim");
    }

    const email = typeof payload.email === "string" ? payload.email : undefined;
    const role = toRole(payload.role) ?? (email ? resolveRole(email, settings) : null);
    if (!role) {
      throw new TokenValidationError("malformed", "missing role claim");
    }

    return {
      principal: { subject, role, ...(email ? { email } : {}) },
      expiresAt: new Date(payload.exp * 1000)
    };
  }

  function verifyLocal(token: string, now: Date): JwtPayload {
    if (!settings.secretKey) {
      throw new TokenValidationError("signature-invalid", "no secret key configured");
    }
    let decoded: JwtPayload | string;
    try {
      decoded = jwt.verify(token, settings.secretKey, {
        algorithms: [LOCAL_TOKEN_ALGORITHM],
        clockTimestamp: Math.floor(now.getTime() / 1000),
        ...(settings.issuerUri ? { issuer: settings.issuerUri } : {})
      });
    } catch (error) {
      throw mapLocalError(error);
    }
    if (typeof decoded !== "object" || decoded === null) {
      throw new TokenValidationError("malformed", "payload is not a JSON object");
    }
    return decoded;
  }

  async function verifyExternal(token: string, now: Date, resolver: JWTVerifyGetKey): Promise<JWTPayload> {
    const verifyOnce = async () => {
      const { payload } = await jwtVerify(token, resolver, {
        algorithms: EXTERNAL_ALGORITHMS,
        currentDate: now,
        requiredClaims: ["sub", "exp"],
        ...(settings.issuerUri ? { issuer: settings.issuerUri } : {})
      });
      return payload;
    };

    try {
      return await verifyOnce();
    } catch (error) {
      const mapped = mapJoseError(error);
      if (mapped.reason !== "key-unavailable" || resolver === keySet) throw mapped;
    }

    // One retry for a transient key set failure.
    try {
      return await verifyOnce();
    } catch (error) {
      throw mapJoseError(error);
    }
  }

  return {
    async validate(token, validateOptions = {}) {
      const now = validateOptions.now ?? new Date();
      try {
        const algorithm = readHeaderAlgorithm(token);

        if (algorithm === LOCAL_TOKEN_ALGORITHM) {
          const { principal, expiresAt } = toPrincipal(verifyLocal(token, now));
          return { ok: true, principal, expiresAt, source: "local" };
        }

        const resolver = EXTERNAL_ALGORITHMS.includes(algorithm) ? resolveKeySet() : null;
        if (!resolver) {
          throw new TokenValidationError("malformed", `unsupported algorithm ${algorithm}`);
        }
        const { principal, expiresAt } = toPrincipal(await verifyExternal(token, now, resolver));
        return { ok: true, principal, expiresAt, source: "jwks" };
      } catch (error) {
        if (error instanceof TokenValidationError) {
          return { ok: false, reason: error.reason, detail: error.message };
        }
        return { ok: false, reason: "malformed", detail: error instanceof Error ? error.message : "unknown error" };
      }
    }
  };
}
