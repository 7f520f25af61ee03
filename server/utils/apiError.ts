import type { Response } from "express";

/**
 * Body of every non-2xx response. The moderation console switches on
 * `error` (e.g. NO_INQUIRY, UNKNOWN_MODERATOR) and shows `message`.
 */
export interface ApiErrorBody {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

/** `details` is omitted when empty */
export function sendError(
  res: Response,
  status: number,
  error: string,
  message: string,
  details?: Record<string, unknown>
): Response {
  const body: ApiErrorBody = { error, message };
  if (details && Object.keys(details).length > 0) body.details = details;
  return res.status(status).json(body);
}

export const Errors = {
  unauthorized: (res: Response, error = "UNAUTHORIZED", message = "Authentication required.") =>
    sendError(res, 401, error, message),

  notFound: (res: Response, error = "NOT_FOUND", message = "Resource not found.") =>
    sendError(res, 404, error, message),

  rateLimited: (res: Response, message = "Too many requests. Please try again later.") =>
    sendError(res, 429, "RATE_LIMITED", message),

  internal: (res: Response, error = "INTERNAL_ERROR", message = "An unexpected error occurred.") =>
    sendError(res, 500, error, message),

  /** Pool not configured; see `DatabaseUnavailableError` */
  dbUnavailable: (res: Response) =>
    sendError(res, 503, "DATABASE_UNAVAILABLE", "Database unavailable. Please try again shortly."),
} as const;
