import { z } from "zod";

import { parseWith } from "../../shared/validation.js";

export const requestEmailInputSchema = z.object({
  email: z.string().trim().toLowerCase().email(),
});

export type RequestEmailInput = z.infer<typeof requestEmailInputSchema>;

export function validateRequestEmailInput(data: unknown): RequestEmailInput {
  return parseWith(requestEmailInputSchema, data, "request-email");
}
