/**
 * HTTP Response Helpers
 * =====================
 * Small helpers to keep routes consistent and reduce boilerplate.
 */

import type { Request, Response } from "express";

import { AppError } from "./errors.js";
import { logger } from "./logger.js";

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {return error.message;}
  try {
    return String(error);
  } catch {
    return "Unknown error";
  }
}

/**
 * Send a success body as-is.
 */
export function ok<T>(res: Response, data: T, statusCode = 200) {
  return res.status(statusCode).json(data);
}

/**
 * Base URL the client used to reach us, for links in outbound email.
 */
export function requestBaseUrl(req: Request, configured?: string): string {
  if (configured) {return configured.replace(/\/+$/, "");}
  return `${req.protocol}://${req.get("host") ?? "localhost"}`;
}

/**
 * Send a standard error response.
 *
 * - Supports AppError for statusCode/code.
 * - Non-AppErrors are reported as a generic 500; their message stays in the logs.
 */
export function fail(
  res: Response,
  error: unknown,
  statusCode = 500,
  meta: Record<string, unknown> = {}
) {
  const msg = getErrorMessage(error);
  const app = error instanceof AppError ? error : null;
  const finalStatus = app?.statusCode ?? statusCode;

  const logPayload = {
    status: finalStatus,
    code: app?.code,
    error: msg,
    ...meta,
  };

  // ERROR level is reserved for 5xx; expected client failures stay quieter.
  if (finalStatus >= 500) {
    logger.error("API error", logPayload);
  } else if (finalStatus === 401 || finalStatus === 403 || finalStatus === 404) {
    logger.info("API error", logPayload);
  } else {
    logger.warn("API error", logPayload);
  }

  const exposeMessage = app !== null && finalStatus < 500;
  const payload: Record<string, unknown> = {
    success: false,
    error: exposeMessage ? msg : "Internal server error",
  };

  if (app?.code) {payload.code = app.code;}
  if (process.env.NODE_ENV === "development" && error instanceof Error) {
    payload.stack = error.stack;
  }
  if (finalStatus === 401) {
    res.setHeader("WWW-Authenticate", "Bearer");
  }

  return res.status(finalStatus).json(payload);
}
