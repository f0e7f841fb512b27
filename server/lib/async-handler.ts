import type { Request, Response, NextFunction, RequestHandler } from "express";
import logger from "./logger";
import { describeError } from "./errors";

type AsyncRouteHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown> | unknown;

export function asyncHandler(handler: AsyncRouteHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(handler(req, res, next)).catch((error: unknown) => {
      logger.error("Route handler error", {
        method: req.method,
        path: req.path,
        error: describeError(error),
      });
      if (!res.headersSent) {
        res.status(500).json({ error: "Internal server error" });
      }
    });
  };
}
