import { Router, type Request, type Response } from "express";
import { authenticateModerator } from "../middleware/moderatorAuth";
import { DatabaseUnavailableError } from "../db";
import { Errors } from "../utils/apiError";
import { inquiryApi, toInquiryJson, type InquiryApi } from "../services/moderation";

/**
 * GET /inquiry — the report the signed-in moderator is working, with context.
 *
 * 200 with the inquiry, 404 when there is nothing to show (no capability, no
 * claimed report, or the reported account no longer exists).
 */
export const getInquiryHandler =
  (api: InquiryApi) =>
  async (req: Request, res: Response): Promise<Response | void> => {
    const moderator = req.moderator;
    if (!moderator) {
      return Errors.unauthorized(res);
    }

    // Stop the lookups if the console goes away before we answer
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort(new Error("Client disconnected"));
    });

    try {
      const inquiry = await api.forModerator(moderator, { signal: controller.signal });
      if (!inquiry) {
        return Errors.notFound(res, "NO_INQUIRY", "No open inquiry for this moderator.");
      }
      return res.json({ inquiry: toInquiryJson(inquiry) });
    } catch (error) {
      if (controller.signal.aborted) {
        req.log.debug("[Inquiry] Request abandoned by client", { moderatorId: moderator.id });
        return;
      }
      if (error instanceof DatabaseUnavailableError) {
        return Errors.dbUnavailable(res);
      }
      req.log.error("[Inquiry] Assembly failed", { moderatorId: moderator.id, error });
      return Errors.internal(res, "INQUIRY_FAILED", "Could not assemble the inquiry.");
    }
  };

export const createModerationRouter = (api: InquiryApi = inquiryApi): Router => {
  const router = Router();
  router.get("/inquiry", authenticateModerator, getInquiryHandler(api));
  return router;
};

export const moderationRouter = createModerationRouter();
