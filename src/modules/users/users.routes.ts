/**
 * Users Routes
 * ============
 * Current-user profile and avatar upload.
 */

import express, { Router, type Request, type Response } from "express";

import { asyncHandler } from "../../middleware/async-handler.js";
import { requireRequestUser } from "../../shared/auth-context.js";
import { ok } from "../../shared/http.js";
import type { RouteContext } from "../../shared/route-context.js";
import { toUserView } from "./users.schemas.js";

const MAX_AVATAR_BYTES = "5mb";

function mediaType(req: Request): string | undefined {
  const raw = req.get("content-type");
  if (!raw) {return undefined;}
  return raw.split(";")[0]?.trim().toLowerCase();
}

export function createUsersRouter(ctx: RouteContext): Router {
  const router = Router();
  const { usersService, requireUser, rateLimit } = ctx;

  /**
   * @swagger
   * /user/me:
   *   get:
   *     summary: Current user profile
   *     tags: [Users]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: User view
   *       401:
   *         description: Missing or invalid access token
   */
  router.get("/me", requireUser, (req: Request, res: Response) => {
    return ok(res, toUserView(requireRequestUser(req)));
  });

  /**
   * @swagger
   * /user/avatar:
   *   patch:
   *     summary: Upload a new avatar (raw image body, 1 request per 20 s)
   *     tags: [Users]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         image/png:
   *           schema: { type: string, format: binary }
   *         image/jpeg:
   *           schema: { type: string, format: binary }
   *     responses:
   *       200:
   *         description: Updated user view
   *       429:
   *         description: Too many requests
   */
  router.patch(
    "/avatar",
    rateLimit({ times: 1, seconds: 20 }),
    requireUser,
    express.raw({ type: "image/*", limit: MAX_AVATAR_BYTES }),
    asyncHandler(async (req: Request, res: Response) => {
      const user = requireRequestUser(req);
      const updated = await usersService.updateAvatar(user, {
        contentType: mediaType(req),
        bytes: req.body,
      });
      return ok(res, toUserView(updated));
    })
  );

  return router;
}
