/**
 * Async Handler
 * =============
 * Express 4 does not catch rejected promises from async handlers; wrap them
 * so errors reach `errorHandler`.
 */

import type { NextFunction, Request, Response } from "express";

type AsyncRouteHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

export function asyncHandler(handler: AsyncRouteHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    void handler(req, res, next).catch(next);
  };
}
