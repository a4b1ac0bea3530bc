export const AUTH_ROLES = ["USER", "ADMIN", "ROOT"] as const;

export type AuthRole = (typeof AUTH_ROLES)[number];

export interface AuthPrincipal {
  subject: string;
  email?: string;
  role: AuthRole;
}

export interface AuthTokenClaims {
  sub: string;
  email: string;
  role: AuthRole;
  iat: number;
  exp: number;
  iss?: string;
}

export type TokenFailureReason = "expired" | "malformed" | "signature-invalid" | "key-unavailable";
