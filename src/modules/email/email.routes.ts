/**
 * Email Routes
 * ============
 * Confirmation links and re-sending the verification email.
 */

import { Router, type Request, type Response } from "express";

import { asyncHandler } from "../../middleware/async-handler.js";
import { ok, requestBaseUrl } from "../../shared/http.js";
import type { RouteContext } from "../../shared/route-context.js";
import { validateRequestEmailInput } from "./email.schemas.js";

export function createEmailRouter(ctx: RouteContext): Router {
  const router = Router();
  const { authService } = ctx;

  /**
   * @swagger
   * /email/confirmed_email/{token}:
   *   get:
   *     summary: Confirm an email address from the link sent at signup
   *     tags: [Email]
   *     parameters:
   *       - in: path
   *         name: token
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Email confirmed (or already confirmed)
   *       400:
   *         description: No account for the token's email
   *       422:
   *         description: Invalid or expired verification token
   */
  router.get(
    "/confirmed_email/:token",
    asyncHandler(async (req: Request, res: Response) => {
      const result = await authService.confirmEmail(req.params.token ?? "");
      return ok(res, result);
    })
  );

  /**
   * @swagger
   * /email/request_email:
   *   post:
   *     summary: Send the verification email again
   *     tags: [Email]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [email]
   *             properties:
   *               email: { type: string, format: email }
   *     responses:
   *       200:
   *         description: "{ message }"
   */
  router.post(
    "/request_email",
    asyncHandler(async (req: Request, res: Response) => {
      const input = validateRequestEmailInput(req.body);
      const result = await authService.requestEmail(
        input.email,
        requestBaseUrl(req, ctx.config.publicBaseUrl)
      );
      return ok(res, result);
    })
  );

  return router;
}
