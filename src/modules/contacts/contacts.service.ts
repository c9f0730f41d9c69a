/**
 * Contacts Service
 * ================
 * Business logic for a user's address book.
 */

import { ConflictError, NotFoundError } from "../../shared/errors.js";
import type { User } from "../users/users.schemas.js";
import type { ContactStore } from "./contacts.repository.js";
import { parseIsoDate, type Contact, type ContactInput, type Pagination } from "./contacts.schemas.js";

export const BIRTHDAY_WINDOW_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function birthdayIn(year: number, month: number, day: number): number {
  // Feb 29 birthdays are celebrated on Feb 28 in common years
  const d = month === 2 && day === 29 && !isLeapYear(year) ? 28 : day;
  return Date.UTC(year, month - 1, d);
}

/**
 * Days from `from` until the next anniversary of `birthday` (0 when it is
 * `from` itself), or null if either date is malformed.
 */
export function daysUntilBirthday(birthday: string, from: string): number | null {
  const b = parseIsoDate(birthday);
  const f = parseIsoDate(from);
  if (!b || !f) {return null;}

  const start = Date.UTC(f.year, f.month - 1, f.day);
  let next = birthdayIn(f.year, b.month, b.day);
  if (next < start) {next = birthdayIn(f.year + 1, b.month, b.day);}
  return Math.round((next - start) / DAY_MS);
}

/**
 * Contacts whose birthday falls between `from` and `from + days`, both ends
 * included, soonest first.
 */
export function upcomingBirthdays(contacts: Contact[], from: string, days = BIRTHDAY_WINDOW_DAYS): Contact[] {
  return contacts
    .map((contact) => ({ contact, inDays: daysUntilBirthday(contact.birthday, from) }))
    .filter((e): e is { contact: Contact; inDays: number } => e.inDays !== null && e.inDays <= days)
    .sort((a, b) => a.inDays - b.inDays || a.contact.id - b.contact.id)
    .map((e) => e.contact);
}

function todayUtc(): string {
  return new Date().toISOString().slice(0, 10);
}

export type ContactsService = ReturnType<typeof createContactsService>;

export function createContactsService(deps: { contacts: ContactStore; today?: () => string }) {
  const { contacts } = deps;
  const today = deps.today ?? todayUtc;

  async function requireContact(found: Promise<Contact | null>): Promise<Contact> {
    const contact = await found;
    if (!contact) {throw new NotFoundError("Contact");}
    return contact;
  }

  return {
    async createContact(owner: User, input: ContactInput): Promise<Contact> {
      const existing = await contacts.findByEmail(owner.id, input.email);
      if (existing) {throw new ConflictError("Contact already exists!");}
      return contacts.create(owner.id, input);
    },

    listAllContacts(page: Pagination): Promise<Contact[]> {
      return contacts.listAll(page);
    },

    getContactById(owner: User, id: number): Promise<Contact> {
      return requireContact(contacts.findById(owner.id, id));
    },

    getContactByFullname(owner: User, fullname: string): Promise<Contact> {
      return requireContact(contacts.findByFullname(owner.id, fullname));
    },

    getContactByEmail(owner: User, email: string): Promise<Contact> {
      return requireContact(contacts.findByEmail(owner.id, email.trim().toLowerCase()));
    },

    async upcomingBirthdays(owner: User, page: Pagination, from: string = today()): Promise<Contact[]> {
      const all = await contacts.listByOwner(owner.id);
      return upcomingBirthdays(all, from).slice(page.offset, page.offset + page.limit);
    },

    async updateContact(owner: User, id: number, input: ContactInput): Promise<Contact> {
      const clash = await contacts.findByEmail(owner.id, input.email);
      if (clash && clash.id !== id) {throw new ConflictError("Contact already exists!");}

      return requireContact(contacts.update(owner.id, id, input));
    },

    async deleteContact(owner: User, id: number): Promise<{ detail: string }> {
      const deleted = await contacts.delete(owner.id, id);
      if (!deleted) {throw new NotFoundError("Contact");}
      return { detail: "Contact deleted successfully" };
    },
  };
}
