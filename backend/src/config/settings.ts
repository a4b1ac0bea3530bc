const WEAK_SECRETS = new Set(["changeme", "secret", "dev-secret", "123456", "password", "your-256-bit-secret"]);
const MIN_DISTINCT_SECRET_CHARS = 8;
const MIN_SECRET_BYTES = 32;
const DEFAULT_EXPIRATION_MS = 86_400_000;
const DEFAULT_JWK_SET_CACHE_MS = 600_000;
const DEFAULT_PORT = 8080;

export type EmailMatching = "exact" | "case-insensitive";

export interface AuthSettings {
  readonly enableJwtAuth: boolean;
  readonly secretKey: string;
  readonly expirationMs: number;
  readonly issuerUri?: string;
  readonly jwkSetUri?: string;
  readonly jwkSetCacheMs: number;
  readonly rootUsers: readonly string[];
  readonly adminUsers: readonly string[];
  readonly emailMatching: EmailMatching;
}

export type Env = Record<string, string | undefined>;

export class ConfigurationError extends Error {
  constructor(
    public readonly setting: string,
    message: string
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const value = readString(env, name)?.toLowerCase();
  if (value === undefined) return fallback;
  if (value === "true") return true;
  if (value === "false") return false;
  throw new ConfigurationError(name, `${name} must be "true" or "false", got "${value}"`);
}

function isWeakSecret(secret: string): boolean {
  const lowered = secret.toLowerCase();
  if (new Set(lowered).size < MIN_DISTINCT_SECRET_CHARS) return true;
  // A well-known placeholder, padded out by repetition.
  for (const weak of WEAK_SECRETS) {
    if (lowered.length % weak.length === 0 && weak.repeat(lowered.length / weak.length) === lowered) return true;
  }
  return false;
}

function readInteger(env: Env, name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const value = readString(env, name);
  if (value === undefined) return fallback;
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(name, `${name} must be an integer`);
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < min) {
    throw new ConfigurationError(name, `${name} must be at least ${min}`);
  }
  if (parsed > max) {
    throw new ConfigurationError(name, `${name} must be at most ${max}`);
  }
  return parsed;
}

function readUrl(env: Env, name: string): string | undefined {
  const value = readString(env, name);
  if (value === undefined) return undefined;
  try {
    const url = new URL(value);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw new ConfigurationError(name, `${name} must be an http(s) URL`);
    }
  } catch (error) {
    if (error instanceof ConfigurationError) throw error;
    throw new ConfigurationError(name, `${name} is not a valid URL: ${value}`);
  }
  return value;
}

export function parseEmailList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

function readEmailMatching(env: Env): EmailMatching {
  const value = readString(env, "APP_EMAIL_MATCHING")?.toLowerCase() ?? "exact";
  if (value === "exact" || value === "case-insensitive") return value;
  throw new ConfigurationError("APP_EMAIL_MATCHING", `APP_EMAIL_MATCHING must be "exact" or "case-insensitive", got "${value}"`);
}

/**
 * Reads the auth settings once from the environment. The returned object is
 * frozen; changing a value requires a restart.
 */
export function loadAuthSettings(env: Env = process.env): AuthSettings {
  const settings: AuthSettings = {
    enableJwtAuth: readBoolean(env, "ENABLE_JWT_AUTH", true),
    secretKey: readString(env, "JWT_SECRET_KEY") ?? "",
    expirationMs: readInteger(env, "JWT_EXPIRATION_MS", DEFAULT_EXPIRATION_MS, 1),
    issuerUri: readUrl(env, "JWT_ISSUER_URI"),
    jwkSetUri: readUrl(env, "JWT_JWK_SET_URI"),
    jwkSetCacheMs: readInteger(env, "JWT_JWK_SET_CACHE_MS", DEFAULT_JWK_SET_CACHE_MS, 0),
    rootUsers: Object.freeze(parseEmailList(env.APP_ROOT_USERS)),
    adminUsers: Object.freeze(parseEmailList(env.APP_ADMIN_USERS)),
    emailMatching: readEmailMatching(env)
  };
  return Object.freeze(settings);
}

export function loadServerPort(env: Env = process.env): number {
  return readInteger(env, "PORT", DEFAULT_PORT, 1, 65_535);
}

export function validateSecurityConfig(settings: AuthSettings): void {
  if (!settings.enableJwtAuth) return;

  const secret = settings.secretKey;
  if (!secret) {
    throw new ConfigurationError(
      "JWT_SECRET_KEY",
      "Missing JWT_SECRET_KEY. Set a strong secret (>= 32 bytes) or ENABLE_JWT_AUTH=false."
    );
  }

  if (Buffer.byteLength(secret, "utf8") < MIN_SECRET_BYTES) {
    throw new ConfigurationError("JWT_SECRET_KEY", `JWT_SECRET_KEY is too short. Minimum length is ${MIN_SECRET_BYTES} bytes.`);
  }

  if (isWeakSecret(secret)) {
    throw new ConfigurationError("JWT_SECRET_KEY", "JWT_SECRET_KEY is weak. Use a high-entropy value.");
  }
}

export function describeSettings(settings: AuthSettings): Record<string, unknown> {
  return {
    enableJwtAuth: settings.enableJwtAuth,
    secretKey: settings.secretKey ? "[redacted]" : "",
    expirationMs: settings.expirationMs,
    issuerUri: settings.issuerUri ?? null,
    jwkSetUri: settings.jwkSetUri ?? null,
    jwkSetCacheMs: settings.jwkSetCacheMs,
    rootUsers: [...settings.rootUsers],
    adminUsers: [...settings.adminUsers],
    emailMatching: settings.emailMatching
  };
}
