import bcrypt from "bcryptjs";
import { nanoid } from "nanoid";
import { promises as fs } from "node:fs";
import path from "node:path";
import type { EmailMatching } from "../config/settings.js";
import { emailsMatch } from "../auth/roleResolver.js";
import type { UserRecord } from "./types.js";

const BCRYPT_ROUNDS = 10;
const MIN_PASSWORD_LENGTH = 8;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+$/;

export type UserStoreErrorCode = "EMAIL_TAKEN" | "INVALID_EMAIL" | "WEAK_PASSWORD";

export class UserStoreError extends Error {
  constructor(
    public code: UserStoreErrorCode,
    message: string
  ) {
    super(message);
    this.name = "UserStoreError";
  }
}

export interface UserStore {
  create(input: { email: string; password: string }): Promise<UserRecord>;
  findByEmail(email: string): Promise<UserRecord | null>;
  findById(id: string): Promise<UserRecord | null>;
  list(): Promise<UserRecord[]>;
  verifyPassword(user: UserRecord, password: string): Promise<boolean>;
}

export function createUserStore(dataRoot: string, matching: EmailMatching): UserStore {
  const usersFile = path.join(dataRoot, "users.json");
  // Serialises read-modify-write cycles on the users file.
  let writeQueue: Promise<unknown> = Promise.resolve();

  async function ensure(): Promise<void> {
    await fs.mkdir(dataRoot, { recursive: true });
    try {
      await fs.access(usersFile);
    } catch {
      await fs.writeFile(usersFile, JSON.stringify({ users: [] }, null, 2), "utf8");
    }
  }

  async function readUsers(): Promise<UserRecord[]> {
    await ensure();
    const raw = await fs.readFile(usersFile, "utf8");
    return (JSON.parse(raw) as { users: UserRecord[] }).users;
  }

  async function writeUsers(users: UserRecord[]): Promise<void> {
    await fs.writeFile(usersFile, JSON.stringify({ users }, null, 2), "utf8");
  }

  async function insert(input: { email: string; password: string }): Promise<UserRecord> {
    const email = input.email.trim();
    if (!EMAIL_PATTERN.test(email)) {
      throw new UserStoreError("INVALID_EMAIL", "A valid email address is required");
    }
    if (input.password.length < MIN_PASSWORD_LENGTH) {
      throw new UserStoreError("WEAK_PASSWORD", `Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
    }

    const users = await readUsers();
    if (users.some((user) => emailsMatch(user.email, email, matching))) {
      throw new UserStoreError("EMAIL_TAKEN", "An account with this email already exists");
    }

    const row: UserRecord = {
      id: nanoid(12),
      email,
      password_hash: await bcrypt.hash(input.password, BCRYPT_ROUNDS),
      created_at: new Date().toISOString()
    };
    users.push(row);
    await writeUsers(users);
    return row;
  }

  return {
    create(input) {
      const next = writeQueue.then(() => insert(input));
      writeQueue = next.catch(() => undefined);
      return next;
    },

    async findByEmail(email) {
      const wanted = email.trim();
      const users = await readUsers();
      return users.find((user) => emailsMatch(user.email, wanted, matching)) ?? null;
    },

    async findById(id) {
      const users = await readUsers();
      return users.find((user) => user.id === id) ?? null;
    },

    list() {
      return readUsers();
    },

    verifyPassword(user, password) {
      return bcrypt.compare(password, user.password_hash);
    }
  };
}
