import type { Request, Response, NextFunction } from "express";
import { randomUUID } from "node:crypto";
import { createChildLogger } from "../logger";

const REQUEST_ID_HEADER = "X-Request-ID";

/**
 * Tags each request with the gateway's X-Request-ID, or a fresh UUID when the
 * gateway sent none, and echoes it back on the response.
 *
 * Handlers log through `req.log`, which carries the id. One line is written
 * per finished request.
 */
export function requestTracing(req: Request, res: Response, next: NextFunction) {
  const incoming = req.headers[REQUEST_ID_HEADER.toLowerCase()];
  const requestId =
    typeof incoming === "string" && incoming.trim() ? incoming.trim() : randomUUID();

  req.requestId = requestId;
  req.log = createChildLogger({ requestId });

  res.setHeader(REQUEST_ID_HEADER, requestId);

  const startedAt = Date.now();

  res.on("finish", () => {
    req.log.info("request completed", {
      method: req.method,
      url: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - startedAt,
    });
  });

  next();
}
