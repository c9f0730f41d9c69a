/**
 * Auth Routes
 * ===========
 * Signup, login, refresh-token rotation and a protected demo route.
 */

import { Router, type Request, type Response } from "express";

import { asyncHandler } from "../../middleware/async-handler.js";
import { requireRequestUser } from "../../shared/auth-context.js";
import { ok, requestBaseUrl } from "../../shared/http.js";
import type { RouteContext } from "../../shared/route-context.js";
import { toUserView } from "../users/users.schemas.js";
import { validateLoginInput, validateSignupInput } from "./auth.schemas.js";

export function createAuthRouter(ctx: RouteContext): Router {
  const router = Router();
  const { authService, requireUser } = ctx;

  /**
   * @swagger
   * /auth/signup:
   *   post:
   *     summary: Register a new account and send a verification email
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [username, email, password]
   *             properties:
   *               username: { type: string }
   *               email: { type: string, format: email }
   *               password: { type: string, minLength: 8 }
   *     responses:
   *       201:
   *         description: Created user
   *       409:
   *         description: Account already exists
   */
  router.post(
    "/signup",
    asyncHandler(async (req: Request, res: Response) => {
      const input = validateSignupInput(req.body);
      const user = await authService.signup(input, requestBaseUrl(req, ctx.config.publicBaseUrl));
      return ok(res, toUserView(user), 201);
    })
  );

  /**
   * @swagger
   * /auth/login:
   *   post:
   *     summary: Exchange email + password for an access/refresh token pair
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/x-www-form-urlencoded:
   *           schema:
   *             type: object
   *             required: [username, password]
   *             properties:
   *               username: { type: string, description: Account email }
   *               password: { type: string }
   *     responses:
   *       200:
   *         description: "{ access_token, refresh_token, token_type: bearer }"
   *       401:
   *         description: Invalid email, unconfirmed email or invalid password
   */
  router.post(
    "/login",
    asyncHandler(async (req: Request, res: Response) => {
      const input = validateLoginInput(req.body);
      const tokens = await authService.login(input);
      return ok(res, tokens);
    })
  );

  /**
   * @swagger
   * /auth/refresh_token:
   *   get:
   *     summary: Rotate the refresh token
   *     description: "Send the current refresh token as `Authorization: Bearer <token>`."
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: New token pair
   *       401:
   *         description: Invalid, expired or already-rotated refresh token
   */
  router.get(
    "/refresh_token",
    asyncHandler(async (req: Request, res: Response) => {
      const tokens = await authService.refresh(req.headers.authorization);
      return ok(res, tokens);
    })
  );

  /**
   * @swagger
   * /auth/secret:
   *   get:
   *     summary: Protected route, returns the caller's email
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: "{ message, owner }"
   *       401:
   *         description: Missing or invalid access token
   */
  router.get("/secret", requireUser, (req: Request, res: Response) => {
    const user = requireRequestUser(req);
    return ok(res, { message: "secret router", owner: user.email });
  });

  return router;
}
