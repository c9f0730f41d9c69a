/**
 * Users Repository
 * ================
 * The store contract the auth core depends on, and its PostgreSQL adapter.
 */

import type pg from "pg";

import { isUniqueViolation } from "../../shared/db.js";
import { ConflictError, DatabaseError } from "../../shared/errors.js";
import { roleSchema, type NewUser, type User } from "./users.schemas.js";

export interface UserStore {
  findByEmail(email: string): Promise<User | null>;
  create(user: NewUser): Promise<User>;
  setRefreshToken(user: User, token: string | null): Promise<void>;
  setConfirmed(user: User): Promise<void>;
  setAvatar(user: User, url: string): Promise<User>;
}

type UserRow = {
  id: number;
  username: string;
  email: string;
  password: string;
  avatar: string | null;
  refresh_token: string | null;
  confirmed: boolean;
  role: string;
  created_at: Date;
  updated_at: Date;
};

const USER_COLUMNS =
  "id, username, email, password, avatar, refresh_token, confirmed, role, created_at, updated_at";

function toUser(row: UserRow): User {
  const role = roleSchema.safeParse(row.role);
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    password: row.password,
    avatar: row.avatar,
    refreshToken: row.refresh_token,
    confirmed: row.confirmed,
    role: role.success ? role.data : "user",
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function createPgUserStore(pool: pg.Pool): UserStore {
  return {
    async findByEmail(email) {
      const result = await pool.query<UserRow>(
        `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
        [email]
      );
      const row = result.rows[0];
      return row ? toUser(row) : null;
    },

    async create(user) {
      let result: pg.QueryResult<UserRow>;
      try {
        result = await pool.query<UserRow>(
          `INSERT INTO users (username, email, password, avatar)
           VALUES ($1, $2, $3, $4)
           RETURNING ${USER_COLUMNS}`,
          [user.username, user.email, user.password, user.avatar]
        );
      } catch (err) {
        if (isUniqueViolation(err)) {throw new ConflictError("Account already exists");}
        throw err;
      }
      const row = result.rows[0];
      if (!row) {throw new DatabaseError("user insert returned no row");}
      return toUser(row);
    },

    async setRefreshToken(user, token) {
      await pool.query(
        "UPDATE users SET refresh_token = $1, updated_at = now() WHERE id = $2",
        [token, user.id]
      );
    },

    async setConfirmed(user) {
      await pool.query(
        "UPDATE users SET confirmed = TRUE, updated_at = now() WHERE id = $1",
        [user.id]
      );
    },

    async setAvatar(user, url) {
      const result = await pool.query<UserRow>(
        `UPDATE users SET avatar = $1, updated_at = now() WHERE id = $2
         RETURNING ${USER_COLUMNS}`,
        [url, user.id]
      );
      const row = result.rows[0];
      if (!row) {throw new DatabaseError(`user ${user.id} vanished during avatar update`);}
      return toUser(row);
    },
  };
}
