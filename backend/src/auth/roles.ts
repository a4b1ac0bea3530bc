import { AUTH_ROLES, type AuthRole } from "./types.js";

export function toRole(value: unknown): AuthRole | null {
  if (typeof value !== "string") return null;
  return AUTH_ROLES.find((role) => role === value) ?? null;
}

export function roleRank(role: AuthRole): number {
  return AUTH_ROLES.indexOf(role);
}

// ROOT includes ADMIN includes USER.
export function hasRole(actual: AuthRole, required: AuthRole): boolean {
  return roleRank(actual) >= roleRank(required);
}

export function grant(required: AuthRole, actual: AuthRole): boolean {
  return hasRole(actual, required);
}
