import { existsSync } from "node:fs";
import path from "node:path";

function resolveBackendRoot(): string {
  const cwd = process.cwd();
  if (existsSync(path.join(cwd, "src")) && existsSync(path.join(cwd, "package.json"))) {
    return cwd;
  }

  const nested = path.join(cwd, "backend");
  if (existsSync(path.join(nested, "src")) && existsSync(path.join(nested, "package.json"))) {
    return nested;
  }

  return cwd;
}

export const BACKEND_ROOT = resolveBackendRoot();

export function resolveDataRoot(env: Record<string, string | undefined> = process.env): string {
  return env.RBAC_DATA_ROOT ? path.resolve(env.RBAC_DATA_ROOT) : path.join(BACKEND_ROOT, "data");
}
