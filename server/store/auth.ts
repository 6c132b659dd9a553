import crypto from "node:crypto";
import type { Principal, Role, User } from "@shared/api";
import bcrypt from "bcryptjs";
import type { RowDataPacket } from "mysql2/promise";
import { type DatabaseExecutor, requirePool } from "../lib/database";
import { asBoolean } from "./mappers";

interface UserRow extends RowDataPacket {
  id: string;
  username: string;
  name: string;
  email: string;
  role: Role;
  active: number | boolean;
}

interface UserWithPasswordRow extends UserRow {
  password_hash: string;
}

interface ClientIdRow extends RowDataPacket {
  id: string;
}

function mapUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    name: row.name,
    email: row.email,
    role: row.role,
    active: asBoolean(row.active),
  };
}

export async function authenticate(
  username: string,
  password: string,
): Promise<{ token: string; user: User } | null> {
  const pool = await requirePool();
  const rows = await pool.select<UserWithPasswordRow>(
    `SELECT id, username, name, email, role, active, password_hash
     FROM users
     WHERE username = ?
     LIMIT 1`,
    [username],
  );
  const row = rows[0];
  if (!row || !asBoolean(row.active)) return null;
  const valid = await bcrypt.compare(password, row.password_hash);
  if (!valid) return null;
  const token = crypto.randomUUID();
  await pool.execute(`INSERT INTO sessions (token, user_id) VALUES (?, ?)`, [
    token,
    row.id,
  ]);
  return { token, user: mapUser(row) };
}

export async function getUserByToken(
  token?: string | null,
): Promise<User | null> {
  if (!token) return null;
  const pool = await requirePool();
  const rows = await pool.select<UserRow>(
    `SELECT u.id, u.username, u.name, u.email, u.role, u.active
     FROM sessions s
     INNER JOIN users u ON u.id = s.user_id
     WHERE s.token = ?
     LIMIT 1`,
    [token],
  );
  return rows[0] ? mapUser(rows[0]) : null;
}

export async function invalidateToken(token: string) {
  if (!token) return;
  const pool = await requirePool();
  await pool.execute(`DELETE FROM sessions WHERE token = ?`, [token]);
}

/**
 * Resolves a session token to the caller's principal. Client users without a
 * client record and inactive users resolve to `null`.
 */
export async function resolvePrincipal(
  token?: string | null,
): Promise<Principal | null> {
  const user = await getUserByToken(token);
  if (!user || !user.active) return null;
  switch (user.role) {
    case "admin":
      return { kind: "admin", user };
    case "client": {
      const pool = await requirePool();
      const rows = await pool.select<ClientIdRow>(
        `SELECT id FROM clients WHERE user_id = ? LIMIT 1`,
        [user.id],
      );
      const client = rows[0];
      return client ? { kind: "client", user, clientId: client.id } : null;
    }
  }
}

export function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, 10);
}

/** Takes an already hashed password so callers can hash outside a transaction. */
export async function createUser(
  input: {
    username: string;
    name: string;
    email: string;
    role: Role;
    passwordHash: string;
  },
  executor?: DatabaseExecutor,
): Promise<User> {
  const db = executor ?? (await requirePool());
  const id = crypto.randomUUID();
  await db.execute(
    `INSERT INTO users (id, username, name, email, role, active, password_hash)
     VALUES (?, ?, ?, ?, ?, ?, ?)`,
    [id, input.username, input.name, input.email, input.role, 1, input.passwordHash],
  );
  return {
    id,
    username: input.username,
    name: input.name,
    email: input.email,
    role: input.role,
    active: true,
  } satisfies User;
}

export async function isUsernameTaken(
  username: string,
  executor?: DatabaseExecutor,
): Promise<boolean> {
  const db = executor ?? (await requirePool());
  const rows = await db.select<RowDataPacket>(
    `SELECT id FROM users WHERE username = ? LIMIT 1`,
    [username],
  );
  return rows.length > 0;
}
