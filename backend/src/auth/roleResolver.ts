import type { AuthSettings, EmailMatching } from "../config/settings.js";
import type { AuthRole } from "./types.js";

type RoleLists = Pick<AuthSettings, "rootUsers" | "adminUsers" | "emailMatching">;

function normalize(email: string, matching: EmailMatching): string {
  return matching === "case-insensitive" ? email.toLowerCase() : email;
}

export function emailsMatch(a: string, b: string, matching: EmailMatching): boolean {
  return normalize(a, matching) === normalize(b, matching);
}

function listed(email: string, list: readonly string[], matching: EmailMatching): boolean {
  return list.some((entry) => emailsMatch(entry, email, matching));
}

/**
 * Maps an email to exactly one role. The root list wins over the admin list;
 * everyone else is a USER.
 */
export function resolveRole(email: string, settings: RoleLists): AuthRole {
  if (listed(email, settings.rootUsers, settings.emailMatching)) return "ROOT";
  if (listed(email, settings.adminUsers, settings.emailMatching)) return "ADMIN";
  return "USER";
}
