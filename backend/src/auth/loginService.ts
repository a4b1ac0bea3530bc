import type { AuthSettings } from "../config/settings.js";
import type { UserStore } from "../users/store.js";
import type { PublicUser, UserRecord } from "../users/types.js";
import { LoginError } from "./errors.js";
import { resolveRole } from "./roleResolver.js";
import { issueToken } from "./tokenIssuer.js";
import type { AuthRole } from "./types.js";

export interface LoginResult {
  token: string;
  token_type: "Bearer";
  expires_at: string;
  role: AuthRole;
}

export interface LoginService {
  register(email: string, password: string): Promise<PublicUser>;
  login(email: string, password: string, options?: { now?: Date }): Promise<LoginResult>;
  describeUser(user: UserRecord): PublicUser;
}

export function createLoginService(deps: { settings: AuthSettings; users: UserStore }): LoginService {
  const { settings, users } = deps;

  function describeUser(user: UserRecord): PublicUser {
    return {
      id: user.id,
      email: user.email,
      role: resolveRole(user.email, settings),
      created_at: user.created_at
    };
  }

  return {
    describeUser,

    async register(email, password) {
      return describeUser(await users.create({ email, password }));
    },

    async login(email, password, options = {}) {
      const user = await users.findByEmail(email);
      if (!user || !(await users.verifyPassword(user, password))) {
        throw new LoginError();
      }

      // Role is fixed at login time; list changes apply from the next login.
      const role = resolveRole(user.email, settings);
      const issued = issueToken({ subject: user.id, email: user.email, role }, settings, options);
      return {
        token: issued.token,
        token_type: "Bearer",
        expires_at: issued.expiresAt.toISOString(),
        role
      };
    }
  };
}
