import type { Express, Request, Response } from "express";
import { moderationRouter } from "./routes/moderation";
import { isDatabaseAvailable } from "./db";

/** GET /api/health — liveness plus whether a database is configured */
export function healthHandler(_req: Request, res: Response) {
  const database = isDatabaseAvailable();
  res.status(database ? 200 : 503).json({ status: database ? "ok" : "degraded", database });
}

export function registerRoutes(app: Express): void {
  app.get("/api/health", healthHandler);
  app.use("/api/mod", moderationRouter);
}
