import type { Logger } from "../logger";
import type { ModeratorIdentity } from "../services/moderation/types";

declare global {
  namespace Express {
    interface Request {
      /** Moderator resolved by the moderator auth middleware */
      moderator?: ModeratorIdentity;
      /** Unique request trace ID (from X-Request-ID header or generated) */
      requestId: string;
      /** Child logger with requestId pre-bound */
      log: Logger;
    }
  }
}

export {};
