/**
 * Contacts Schemas
 * ================
 * Validation schemas and API view for address-book contacts.
 */

import { z } from "zod";

import { parseWith } from "../../shared/validation.js";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export type CalendarDate = { year: number; month: number; day: number };

/**
 * Strict YYYY-MM-DD parser; rejects impossible dates such as 2023-02-30.
 */
export function parseIsoDate(value: string): CalendarDate | null {
  const m = ISO_DATE.exec(value);
  if (!m) {return null;}
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null;
  }
  return { year, month, day };
}

export const isoDateSchema = z
  .string()
  .trim()
  .refine((v) => parseIsoDate(v) !== null, { message: "Invalid date format. Use YYYY-MM-DD" });

export const contactInputSchema = z.object({
  fullname: z.string().trim().min(1).max(150),
  email: z.string().trim().toLowerCase().email(),
  phone_number: z
    .string()
    .trim()
    .regex(/^\+?[0-9 ()-]{5,20}$/, { message: "Invalid phone number" }),
  birthday: isoDateSchema,
  notes: z.string().trim().max(500).nullish().transform((v) => v || null),
});

export type ContactInput = z.infer<typeof contactInputSchema>;

export const paginationSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
  offset: z.coerce.number().int().min(0).default(0),
});

export type Pagination = z.infer<typeof paginationSchema>;

// Upper bound is the Postgres INTEGER range of contacts.id.
export const contactIdSchema = z.coerce.number().int().min(1).max(2147483647);

export function validateContactInput(data: unknown): ContactInput {
  return parseWith(contactInputSchema, data, "contact");
}

export function validatePagination(query: unknown): Pagination {
  return parseWith(paginationSchema, query, "pagination");
}

export function validateContactId(raw: unknown): number {
  return parseWith(contactIdSchema, raw, "contact id");
}

export function validateIsoDate(raw: unknown): string {
  return parseWith(isoDateSchema, raw, "date");
}

export type Contact = {
  id: number;
  userId: number;
  fullname: string;
  email: string;
  phoneNumber: string;
  birthday: string; // YYYY-MM-DD
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type ContactView = {
  id: number;
  fullname: string;
  email: string;
  phone_number: string;
  birthday: string;
  notes: string | null;
  user_id: number;
  created_at: string;
  updated_at: string;
};

export function toContactView(contact: Contact): ContactView {
  return {
    id: contact.id,
    fullname: contact.fullname,
    email: contact.email,
    phone_number: contact.phoneNumber,
    birthday: contact.birthday,
    notes: contact.notes,
    user_id: contact.userId,
    created_at: contact.createdAt.toISOString(),
    updated_at: contact.updatedAt.toISOString(),
  };
}
