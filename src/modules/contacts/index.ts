/**
 * Contacts Module
 * ===============
 * Per-user address book
 */

export * from "./contacts.schemas.js";
export { createPgContactStore, type ContactStore } from "./contacts.repository.js";
export { createContactsService, upcomingBirthdays, type ContactsService } from "./contacts.service.js";
export { createContactsRouter } from "./contacts.routes.js";
