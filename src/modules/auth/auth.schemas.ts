/**
 * Auth Schemas
 * ============
 * Validation for authentication endpoints.
 */

import { z } from "zod";

import { parseWith } from "../../shared/validation.js";

const emailSchema = z.string().trim().toLowerCase().email();

export const signupInputSchema = z.object({
  username: z.string().trim().min(2).max(50),
  email: emailSchema,
  password: z.string().min(8).max(200),
});

export type SignupInput = z.infer<typeof signupInputSchema>;

/**
 * OAuth2 password-form shape: the email travels in `username`.
 */
export const loginInputSchema = z.object({
  username: z.string().trim().toLowerCase().min(1),
  password: z.string().min(1).max(200),
});

export type LoginInput = z.infer<typeof loginInputSchema>;

export function validateSignupInput(data: unknown): SignupInput {
  return parseWith(signupInputSchema, data, "signup");
}

export function validateLoginInput(data: unknown): LoginInput {
  return parseWith(loginInputSchema, data, "login");
}

export type TokenPair = {
  access_token: string;
  refresh_token: string;
  token_type: "bearer";
};
