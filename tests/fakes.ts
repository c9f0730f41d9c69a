/**
 * In-process stand-ins for the collaborators the app is wired with.
 */

import { ConflictError } from "../src/shared/errors.js";
import type { ContactStore } from "../src/modules/contacts/contacts.repository.js";
import type { Contact, ContactInput, Pagination } from "../src/modules/contacts/contacts.schemas.js";
import type { UserStore } from "../src/modules/users/users.repository.js";
import type { NewUser, Role, User } from "../src/modules/users/users.schemas.js";
import type { AvatarHost } from "../src/shared/avatar-host.js";
import type { Mailer } from "../src/shared/mailer.js";

export const FIXED_DATE = new Date("2024-01-01T00:00:00.000Z");

export class MemoryUserStore implements UserStore {
  readonly users: User[] = [];
  writes = 0;
  private nextId = 1;

  async findByEmail(email: string): Promise<User | null> {
    return this.users.find((u) => u.email === email) ?? null;
  }

  async create(input: NewUser): Promise<User> {
    // Mirrors UNIQUE (email)
    if (this.users.some((u) => u.email === input.email)) {throw new ConflictError("Account already exists");}
    this.writes += 1;
    const user: User = {
      id: this.nextId++,
      ...input,
      refreshToken: null,
      confirmed: false,
      role: "user",
      createdAt: FIXED_DATE,
      updatedAt: FIXED_DATE,
    };
    this.users.push(user);
    return user;
  }

  async setRefreshToken(user: User, token: string | null): Promise<void> {
    this.writes += 1;
    this.patch(user.id, { refreshToken: token });
  }

  async setConfirmed(user: User): Promise<void> {
    this.writes += 1;
    this.patch(user.id, { confirmed: true });
  }

  async setAvatar(user: User, url: string): Promise<User> {
    this.writes += 1;
    return this.patch(user.id, { avatar: url });
  }

  /** Test helper: flip flags without counting as an application write. */
  update(email: string, changes: Partial<Pick<User, "confirmed" | "role" | "refreshToken">>): User {
    const user = this.users.find((u) => u.email === email);
    if (!user) {throw new Error(`no user ${email}`);}
    return this.patch(user.id, changes);
  }

  get(email: string): User | undefined {
    return this.users.find((u) => u.email === email);
  }

  private patch(id: number, changes: Partial<User>): User {
    const index = this.users.findIndex((u) => u.id === id);
    const current = this.users[index];
    if (!current) {throw new Error(`no user ${id}`);}
    const next: User = { ...current, ...changes };
    this.users[index] = next;
    return next;
  }
}

export class MemoryContactStore implements ContactStore {
  readonly contacts: Contact[] = [];
  private nextId = 1;

  async create(ownerId: number, input: ContactInput): Promise<Contact> {
    this.assertUniqueEmail(ownerId, input.email);
    const contact: Contact = {
      id: this.nextId++,
      userId: ownerId,
      fullname: input.fullname,
      email: input.email,
      phoneNumber: input.phone_number,
      birthday: input.birthday,
      notes: input.notes,
      createdAt: FIXED_DATE,
      updatedAt: FIXED_DATE,
    };
    this.contacts.push(contact);
    return contact;
  }

  async findById(ownerId: number, id: number): Promise<Contact | null> {
    return this.contacts.find((c) => c.userId === ownerId && c.id === id) ?? null;
  }

  async findByEmail(ownerId: number, email: string): Promise<Contact | null> {
    return this.contacts.find((c) => c.userId === ownerId && c.email === email) ?? null;
  }

  async findByFullname(ownerId: number, fullname: string): Promise<Contact | null> {
    return this.contacts.find((c) => c.userId === ownerId && c.fullname === fullname) ?? null;
  }

  async listByOwner(ownerId: number): Promise<Contact[]> {
    return this.contacts.filter((c) => c.userId === ownerId);
  }

  async listAll(page: Pagination): Promise<Contact[]> {
    return this.contacts.slice(page.offset, page.offset + page.limit);
  }

  async update(ownerId: number, id: number, input: ContactInput): Promise<Contact | null> {
    const index = this.contacts.findIndex((c) => c.userId === ownerId && c.id === id);
    const current = this.contacts[index];
    if (!current) {return null;}
    this.assertUniqueEmail(ownerId, input.email, id);
    const next: Contact = {
      ...current,
      fullname: input.fullname,
      email: input.email,
      phoneNumber: input.phone_number,
      birthday: input.birthday,
      notes: input.notes,
    };
    this.contacts[index] = next;
    return next;
  }

  // Mirrors UNIQUE (user_id, email)
  private assertUniqueEmail(ownerId: number, email: string, exceptId?: number): void {
    if (this.contacts.some((c) => c.userId === ownerId && c.email === email && c.id !== exceptId)) {
      throw new ConflictError("Contact already exists!");
    }
  }

  async delete(ownerId: number, id: number): Promise<boolean> {
    const index = this.contacts.findIndex((c) => c.userId === ownerId && c.id === id);
    if (index < 0) {return false;}
    this.contacts.splice(index, 1);
    return true;
  }
}

export type SentVerification = { toEmail: string; username: string; verifyLink: string };

export class RecordingMailer implements Mailer {
  readonly sent: SentVerification[] = [];

  async sendVerification(toEmail: string, username: string, verifyLink: string): Promise<void> {
    this.sent.push({ toEmail, username, verifyLink });
  }

  /** Token at the end of the most recent link sent to `email`. */
  lastTokenFor(email: string): string | undefined {
    const mail = this.sent.filter((m) => m.toEmail === email).at(-1);
    return mail?.verifyLink.split("/").at(-1);
  }
}

export class FailingMailer implements Mailer {
  attempts = 0;

  async sendVerification(): Promise<void> {
    this.attempts += 1;
    throw new Error("SMTP unavailable");
  }
}

export class FakeAvatarHost implements AvatarHost {
  readonly uploads: Array<{ publicId: string; size: number; contentType: string }> = [];

  async upload(publicId: string, bytes: Buffer, contentType: string): Promise<string> {
    this.uploads.push({ publicId, size: bytes.length, contentType });
    return `https://images.test/${publicId}`;
  }
}

export type SeedUser = { username?: string; email: string; password: string; role?: Role; confirmed?: boolean };
