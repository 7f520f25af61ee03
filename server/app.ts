/**
 * Express Application Factory
 *
 * Creates and configures the Express app with all middleware and API routes.
 */
import express, { type NextFunction, type Request, type Response } from "express";
import compression from "compression";
import helmet from "helmet";
import cors from "cors";
import rateLimit from "express-rate-limit";
import logger from "./logger";
import { env } from "./config/env";
import {
  API_RATE_LIMIT_MAX,
  API_RATE_LIMIT_WINDOW_MS,
  BODY_PARSE_LIMIT,
  DEV_ORIGINS,
} from "./config/constants";
import { requestTracing } from "./middleware/requestTracing";
import { DatabaseUnavailableError } from "./db";
import { registerRoutes } from "./routes";
import { Errors } from "./utils/apiError";

export function getAllowedOrigins(): string[] {
  const envOrigins =
    env.ALLOWED_ORIGINS?.split(",")
      .map((o) => o.trim())
      .filter(Boolean) ?? [];
  if (env.NODE_ENV === "production") {
    return envOrigins;
  }
  return [...envOrigins, ...DEV_ORIGINS];
}

/** Maps errors that escaped the route handlers onto the standard error body */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    return next(err);
  }
  if (err instanceof DatabaseUnavailableError) {
    return Errors.dbUnavailable(res);
  }
  (req.log ?? logger).error("Unhandled request error", { error: err });
  return Errors.internal(res);
}

export function createApp(): express.Express {
  const app = express();

  // Trust the first proxy hop (the moderation gateway)
  app.set("trust proxy", 1);

  // Request tracing — generate/propagate request ID before anything else
  app.use(requestTracing);

  app.use(helmet());

  const allowedOrigins = getAllowedOrigins();
  app.use(
    cors({
      origin(origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) {
        // Allow requests with no origin (server-to-server) or matching allowed domains
        if (!origin || allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(new Error("Not allowed by CORS"));
        }
      },
      credentials: true,
    })
  );

  app.use(compression());
  app.use(express.json({ limit: BODY_PARSE_LIMIT }));

  app.use(
    "/api",
    rateLimit({
      windowMs: API_RATE_LIMIT_WINDOW_MS,
      max: API_RATE_LIMIT_MAX,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (_req, res) => {
        Errors.rateLimited(res);
      },
    })
  );

  registerRoutes(app);

  app.use("/api", (_req, res) => {
    Errors.notFound(res);
  });

  app.use(errorHandler);

  return app;
}
