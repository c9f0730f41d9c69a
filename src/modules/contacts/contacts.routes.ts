/**
 * Contacts Routes
 * ===============
 * Address-book CRUD for the authenticated user, plus an admin/moderator
 * listing across all users.
 */

import { Router, type Request, type Response } from "express";

import { asyncHandler } from "../../middleware/async-handler.js";
import { requireRole } from "../../middleware/authz.js";
import { requireRequestUser } from "../../shared/auth-context.js";
import { ok } from "../../shared/http.js";
import type { RouteContext } from "../../shared/route-context.js";
import {
  toContactView,
  validateContactId,
  validateContactInput,
  validateIsoDate,
  validatePagination,
} from "./contacts.schemas.js";

export function createContactsRouter(ctx: RouteContext): Router {
  const router = Router();
  const { contactsService, requireUser, rateLimit } = ctx;

  /**
   * @swagger
   * /contacts/contacts:
   *   post:
   *     summary: Create a contact (2 requests per 5 s)
   *     tags: [Contacts]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [fullname, email, phone_number, birthday]
   *             properties:
   *               fullname: { type: string }
   *               email: { type: string, format: email }
   *               phone_number: { type: string }
   *               birthday: { type: string, format: date }
   *               notes: { type: string, nullable: true }
   *     responses:
   *       201:
   *         description: Created contact
   *       409:
   *         description: A contact with this email already exists
   */
  router.post(
    "/contacts",
    rateLimit({ times: 2, seconds: 5 }),
    requireUser,
    asyncHandler(async (req: Request, res: Response) => {
      const input = validateContactInput(req.body);
      const contact = await contactsService.createContact(requireRequestUser(req), input);
      return ok(res, toContactView(contact), 201);
    })
  );

  /**
   * @swagger
   * /contacts/contacts/all:
   *   get:
   *     summary: Every contact of every user (admin and moderator only, 1 request per 20 s)
   *     tags: [Contacts]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: query
   *         name: limit
   *         schema: { type: integer, default: 10 }
   *       - in: query
   *         name: offset
   *         schema: { type: integer, default: 0 }
   *     responses:
   *       200:
   *         description: Contact list
   *       403:
   *         description: Role not permitted
   */
  router.get(
    "/contacts/all",
    rateLimit({ times: 1, seconds: 20 }),
    requireUser,
    requireRole("admin", "moderator"),
    asyncHandler(async (req: Request, res: Response) => {
      const page = validatePagination(req.query);
      const contacts = await contactsService.listAllContacts(page);
      return ok(res, contacts.map(toContactView));
    })
  );

  /**
   * @swagger
   * /contacts/contacts/id/{contactId}:
   *   get:
   *     summary: One of the caller's contacts by id
   *     tags: [Contacts]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: contactId
   *         required: true
   *         schema: { type: integer, minimum: 1 }
   *     responses:
   *       200:
   *         description: Contact
   *       404:
   *         description: Contact not found
   */
  router.get(
    "/contacts/id/:contactId",
    requireUser,
    asyncHandler(async (req: Request, res: Response) => {
      const id = validateContactId(req.params.contactId);
      const contact = await contactsService.getContactById(requireRequestUser(req), id);
      return ok(res, toContactView(contact));
    })
  );

  /**
   * @swagger
   * /contacts/contacts/by_name/{fullname}:
   *   get:
   *     summary: One of the caller's contacts by exact full name
   *     tags: [Contacts]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: fullname
   *         required: true
   *         schema: { type: string }
   *     responses:
   *       200:
   *         description: Contact
   *       404:
   *         description: Contact not found
   */
  router.get(
    "/contacts/by_name/:fullname",
    requireUser,
    asyncHandler(async (req: Request, res: Response) => {
      const contact = await contactsService.getContactByFullname(
        requireRequestUser(req),
        req.params.fullname ?? ""
      );
      return ok(res, toContactView(contact));
    })
  );

  /**
   * @swagger
   * /contacts/contacts/by_email/{email}:
   *   get:
   *     summary: One of the caller's contacts by email
   *     tags: [Contacts]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: email
   *         required: true
   *         schema: { type: string }
   *     responses:
   *       200:
   *         description: Contact
   *       404:
   *         description: Contact not found
   */
  router.get(
    "/contacts/by_email/:email",
    requireUser,
    asyncHandler(async (req: Request, res: Response) => {
      const contact = await contactsService.getContactByEmail(requireRequestUser(req), req.params.email ?? "");
      return ok(res, toContactView(contact));
    })
  );

  /**
   * @swagger
   * /contacts/contacts/birthdays:
   *   get:
   *     summary: Caller's contacts with a birthday in the next 7 days
   *     tags: [Contacts]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Contacts, soonest birthday first
   */
  router.get(
    "/contacts/birthdays",
    requireUser,
    asyncHandler(async (req: Request, res: Response) => {
      const page = validatePagination(req.query);
      const contacts = await contactsService.upcomingBirthdays(requireRequestUser(req), page);
      return ok(res, contacts.map(toContactView));
    })
  );

  /**
   * @swagger
   * /contacts/contacts/get_new_day/{date}:
   *   get:
   *     summary: Caller's contacts with a birthday within 7 days of the given date
   *     tags: [Contacts]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: date
   *         required: true
   *         description: YYYY-MM-DD
   *         schema: { type: string, format: date }
   *     responses:
   *       200:
   *         description: Contacts, soonest birthday first
   *       400:
   *         description: Invalid date
   */
  router.get(
    "/contacts/get_new_day/:date",
    requireUser,
    asyncHandler(async (req: Request, res: Response) => {
      const from = validateIsoDate(req.params.date);
      const page = validatePagination(req.query);
      const contacts = await contactsService.upcomingBirthdays(requireRequestUser(req), page, from);
      return ok(res, contacts.map(toContactView));
    })
  );

  /**
   * @swagger
   * /contacts/contacts/update/{contactId}:
   *   put:
   *     summary: Replace one of the caller's contacts
   *     tags: [Contacts]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: contactId
   *         required: true
   *         schema: { type: integer, minimum: 1 }
   *     responses:
   *       200:
   *         description: Updated contact
   *       404:
   *         description: Contact not found
   */
  router.put(
    "/contacts/update/:contactId",
    requireUser,
    asyncHandler(async (req: Request, res: Response) => {
      const id = validateContactId(req.params.contactId);
      const input = validateContactInput(req.body);
      const contact = await contactsService.updateContact(requireRequestUser(req), id, input);
      return ok(res, toContactView(contact));
    })
  );

  /**
   * @swagger
   * /contacts/contacts/delete/{contactId}:
   *   delete:
   *     summary: Delete one of the caller's contacts
   *     tags: [Contacts]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: contactId
   *         required: true
   *         schema: { type: integer, minimum: 1 }
   *     responses:
   *       200:
   *         description: "{ detail: Contact deleted successfully }"
   *       404:
   *         description: Contact not found
   */
  router.delete(
    "/contacts/delete/:contactId",
    requireUser,
    asyncHandler(async (req: Request, res: Response) => {
      const id = validateContactId(req.params.contactId);
      const result = await contactsService.deleteContact(requireRequestUser(req), id);
      return ok(res, result);
    })
  );

  return router;
}
