import jwt, { type Algorithm } from "jsonwebtoken";
import type { AuthSettings } from "../config/settings.js";
import { TokenIssueError } from "./errors.js";
import type { AuthPrincipal, AuthTokenClaims } from "./types.js";

export const LOCAL_TOKEN_ALGORITHM: Algorithm = "HS256";

export type IssuablePrincipal = Required<AuthPrincipal>;

export interface IssuedToken {
  token: string;
  claims: AuthTokenClaims;
  expiresAt: Date;
}

type IssuerSettings = Pick<AuthSettings, "enableJwtAuth" | "secretKey" | "expirationMs" | "issuerUri">;

/**
 * Signs a bearer token for a principal whose role has already been resolved.
 * `exp` is `iat` plus the configured lifetime, rounded up to whole seconds.
 */
export function issueToken(principal: IssuablePrincipal, settings: IssuerSettings, options: { now?: Date } = {}): IssuedToken {
  if (!settings.enableJwtAuth) {
    throw new TokenIssueError("JWT_AUTH_DISABLED", "JWT authentication is disabled");
  }
  if (!settings.secretKey) {
    throw new TokenIssueError("SECRET_MISSING", "JWT secret key is not configured");
  }

  const iat = Math.floor((options.now ?? new Date()).getTime() / 1000);
  const exp = iat + Math.ceil(settings.expirationMs / 1000);
  const claims: AuthTokenClaims = {
    sub: principal.subject,
    email: principal.email,
    role: principal.role,
    iat,
    exp,
    ...(settings.issuerUri ? { iss: settings.issuerUri } : {})
  };

  const token = jwt.sign(claims, settings.secretKey, { algorithm: LOCAL_TOKEN_ALGORITHM });
  return { token, claims, expiresAt: new Date(exp * 1000) };
}
