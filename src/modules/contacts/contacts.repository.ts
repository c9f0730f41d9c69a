/**
 * Contacts Repository
 * ===================
 * Contact store contract and its PostgreSQL adapter. Every lookup except
 * `listAll` is scoped to the owning user.
 */

import type pg from "pg";

import { isUniqueViolation } from "../../shared/db.js";
import { ConflictError, DatabaseError } from "../../shared/errors.js";
import type { Contact, ContactInput, Pagination } from "./contacts.schemas.js";

export interface ContactStore {
  create(ownerId: number, input: ContactInput): Promise<Contact>;
  findById(ownerId: number, id: number): Promise<Contact | null>;
  findByEmail(ownerId: number, email: string): Promise<Contact | null>;
  findByFullname(ownerId: number, fullname: string): Promise<Contact | null>;
  listByOwner(ownerId: number): Promise<Contact[]>;
  listAll(page: Pagination): Promise<Contact[]>;
  update(ownerId: number, id: number, input: ContactInput): Promise<Contact | null>;
  delete(ownerId: number, id: number): Promise<boolean>;
}

type ContactRow = {
  id: number;
  user_id: number;
  fullname: string;
  email: string;
  phone_number: string;
  birthday: string;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
};

// DATE is rendered as text so the pg driver never shifts it through a local timezone.
const CONTACT_COLUMNS =
  "id, user_id, fullname, email, phone_number, to_char(birthday, 'YYYY-MM-DD') AS birthday, notes, created_at, updated_at";

function toContact(row: ContactRow): Contact {
  return {
    id: row.id,
    userId: row.user_id,
    fullname: row.fullname,
    email: row.email,
    phoneNumber: row.phone_number,
    birthday: row.birthday,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function createPgContactStore(pool: pg.Pool): ContactStore {
  async function one(sql: string, params: unknown[]): Promise<Contact | null> {
    let result: pg.QueryResult<ContactRow>;
    try {
      result = await pool.query<ContactRow>(sql, params);
    } catch (err) {
      // UNIQUE (user_id, email) on insert or update
      if (isUniqueViolation(err)) {throw new ConflictError("Contact already exists!");}
      throw err;
    }
    const row = result.rows[0];
    return row ? toContact(row) : null;
  }

  return {
    async create(ownerId, input) {
      const created = await one(
        `INSERT INTO contacts (user_id, fullname, email, phone_number, birthday, notes)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING ${CONTACT_COLUMNS}`,
        [ownerId, input.fullname, input.email, input.phone_number, input.birthday, input.notes]
      );
      if (!created) {throw new DatabaseError("contact insert returned no row");}
      return created;
    },

    findById(ownerId, id) {
      return one(`SELECT ${CONTACT_COLUMNS} FROM contacts WHERE user_id = $1 AND id = $2`, [ownerId, id]);
    },

    findByEmail(ownerId, email) {
      return one(`SELECT ${CONTACT_COLUMNS} FROM contacts WHERE user_id = $1 AND email = $2`, [ownerId, email]);
    },

    findByFullname(ownerId, fullname) {
      return one(
        `SELECT ${CONTACT_COLUMNS} FROM contacts WHERE user_id = $1 AND fullname = $2 ORDER BY id LIMIT 1`,
        [ownerId, fullname]
      );
    },

    async listByOwner(ownerId) {
      const result = await pool.query<ContactRow>(
        `SELECT ${CONTACT_COLUMNS} FROM contacts WHERE user_id = $1 ORDER BY id`,
        [ownerId]
      );
      return result.rows.map(toContact);
    },

    async listAll(page) {
      const result = await pool.query<ContactRow>(
        `SELECT ${CONTACT_COLUMNS} FROM contacts ORDER BY id LIMIT $1 OFFSET $2`,
        [page.limit, page.offset]
      );
      return result.rows.map(toContact);
    },

    update(ownerId, id, input) {
      return one(
        `UPDATE contacts
         SET fullname = $3, email = $4, phone_number = $5, birthday = $6, notes = $7, updated_at = now()
         WHERE user_id = $1 AND id = $2
         RETURNING ${CONTACT_COLUMNS}`,
        [ownerId, id, input.fullname, input.email, input.phone_number, input.birthday, input.notes]
      );
    },

    async delete(ownerId, id) {
      const result = await pool.query("DELETE FROM contacts WHERE user_id = $1 AND id = $2", [ownerId, id]);
      return (result.rowCount ?? 0) > 0;
    },
  };
}
