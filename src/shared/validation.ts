import type { z } from "zod";

import { ValidationError } from "./errors.js";
import { logger } from "./logger.js";

/**
 * Parses `data` or throws a ValidationError naming the first offending field.
 */
export function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, label: string): T {
  const result = schema.safeParse(data);
  if (result.success) {return result.data;}

  logger.warn(`Invalid ${label} input`, { issues: result.error.issues });
  const first = result.error.issues[0];
  const field = first?.path.join(".");
  const message = first ? `${field ? `${field}: ` : ""}${first.message}` : `Invalid ${label} input`;
  throw new ValidationError(message, result.error.issues);
}
