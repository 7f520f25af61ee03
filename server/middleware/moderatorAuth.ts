import crypto from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { env } from "../config/env";
import { Errors } from "../utils/apiError";
import { moderatorById } from "../services/moderation/users";

export const MODERATOR_ID_HEADER = "x-moderator-id";

/** Timing-safe check of the gateway's bearer secret */
export const verifyModApiKey = (authHeader: string | undefined, apiKey = env.MOD_API_KEY): boolean => {
  const expected = `Bearer ${apiKey}`;
  if (!authHeader || authHeader.length !== expected.length) return false;
  try {
    return crypto.timingSafeEqual(Buffer.from(authHeader), Buffer.from(expected));
  } catch {
    // Same string length, different byte length (non-ASCII header)
    return false;
  }
};

/**
 * Authenticates requests forwarded by the moderation gateway.
 *
 * The gateway presents the shared API key and names the signed-in moderator
 * in X-Moderator-Id. The moderator must exist and be active.
 * Sets `req.moderator`.
 */
export async function authenticateModerator(req: Request, res: Response, next: NextFunction) {
  if (!verifyModApiKey(req.headers.authorization)) {
    req.log.warn("[ModAuth] Rejected request with invalid API key");
    return Errors.unauthorized(res);
  }

  const header = req.headers[MODERATOR_ID_HEADER];
  const moderatorId = typeof header === "string" ? header.trim() : "";
  if (!moderatorId) {
    return Errors.unauthorized(res, "MODERATOR_REQUIRED", "Moderator identity required.");
  }

  try {
    const moderator = await moderatorById(moderatorId);
    if (!moderator) {
      req.log.warn("[ModAuth] Unknown or inactive moderator", { moderatorId });
      return Errors.unauthorized(res, "UNKNOWN_MODERATOR", "Moderator not recognized.");
    }
    req.moderator = moderator;
    return next();
  } catch (error) {
    return next(error);
  }
}
