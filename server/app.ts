import express, { type Express, type NextFunction, type Request, type Response } from "express";
import logger from "./lib/logger";
import { describeError } from "./lib/errors";
import { registerRoutes, type AppServices } from "./routes";

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
    if (typeof status === "number" && status >= 400 && status < 600) return status;
  }
  return 500;
}

export function createApp(services: AppServices): Express {
  const app = express();

  app.use(express.json({ limit: "1mb" }));

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      if (req.path.startsWith("/api")) {
        logger.request(req.method, req.path, res.statusCode, Date.now() - start);
      }
    });
    next();
  });

  registerRoutes(app, services);

  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    const status = statusOf(err);
    const message = status === 500 ? "Internal server error" : describeError(err);

    logger.error("Request failed", { status, path: req.path }, err instanceof Error ? err : undefined);

    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(status).json({ error: message });
  });

  return app;
}
