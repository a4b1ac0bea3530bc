import type { TokenFailureReason } from "./types.js";

export class AuthError extends Error {
  constructor(
    public code: string,
    message: string,
    public status: number = 401
  ) {
    super(message);
    this.name = "AuthError";
  }
}

export class TokenIssueError extends AuthError {
  constructor(code: "JWT_AUTH_DISABLED" | "SECRET_MISSING", message: string) {
    super(code, message, 503);
    this.name = "TokenIssueError";
  }
}

/**
 * Carries the internal failure reason of a rejected token. Callers only ever
 * see "Access denied"; the reason is for logs and metrics.
 */
export class TokenValidationError extends AuthError {
  constructor(
    public reason: TokenFailureReason,
    detail?: string
  ) {
    super("ACCESS_DENIED", detail ? `Access denied (${reason}: ${detail})` : `Access denied (${reason})`, 401);
    this.name = "TokenValidationError";
  }
}

export class LoginError extends AuthError {
  constructor() {
    super("INVALID_CREDENTIALS", "Invalid email or password", 401);
    this.name = "LoginError";
  }
}
