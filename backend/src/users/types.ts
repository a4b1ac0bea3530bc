import type { AuthRole } from "../auth/types.js";

export interface UserRecord {
  id: string;
  email: string;
  password_hash: string;
  created_at: string;
}

export interface PublicUser {
  id: string;
  email: string;
  role: AuthRole;
  created_at: string;
}
