/**
 * @fileoverview Unit tests for GET /api/mod/inquiry
 *
 * Tests:
 * - Missing moderator
 * - Present inquiry, absent inquiry
 * - Database unavailable, unexpected failure
 * - Client disconnect aborts the lookups
 */

import { describe, it, expect, vi } from "vitest";
import { getInquiryHandler } from "../../routes/moderation";
import { DatabaseUnavailableError } from "../../db";
import { toInquiryJson } from "../../services/moderation/serialize";
import type { ForModeratorOptions, InquiryApi } from "../../services/moderation/inquiry";
import type { Inquiry, ModeratorIdentity } from "../../services/moderation/types";
import {
  createMockRequest,
  createMockResponse,
  makeModerator,
  makeReport,
  makeUser,
} from "../helpers";

const moderator = makeModerator();

const inquiry: Inquiry = {
  mod: { id: moderator.id, name: moderator.username },
  report: makeReport({ inquiryModeratorId: moderator.id }),
  accuracy: 87,
  moreReports: [],
  notes: [],
  history: [],
  user: makeUser(),
};

function fakeApi(impl: (mod: ModeratorIdentity, options?: ForModeratorOptions) => Promise<Inquiry | null>) {
  const forModerator = vi.fn(impl);
  const api: InquiryApi = { forModerator };
  return { api, forModerator };
}

describe("GET /inquiry", () => {
  it("requires an authenticated moderator", async () => {
    const { api, forModerator } = fakeApi(async () => inquiry);
    const req = createMockRequest();
    const res = createMockResponse();

    await getInquiryHandler(api)(req, res);

    expect(res.status).toHaveBeenCalledWith(401);
    expect(forModerator).not.toHaveBeenCalled();
  });

  it("returns the inquiry", async () => {
    const { api, forModerator } = fakeApi(async () => inquiry);
    const req = createMockRequest({ moderator });
    const res = createMockResponse();

    await getInquiryHandler(api)(req, res);

    expect(forModerator).toHaveBeenCalledWith(moderator, { signal: expect.any(AbortSignal) });
    expect(res.json).toHaveBeenCalledWith({ inquiry: toInquiryJson(inquiry) });
    expect(res.status).not.toHaveBeenCalled();
  });

  it("returns 404 when there is nothing to show", async () => {
    const { api } = fakeApi(async () => null);
    const req = createMockRequest({ moderator });
    const res = createMockResponse();

    await getInquiryHandler(api)(req, res);

    expect(res.status).toHaveBeenCalledWith(404);
    expect(res.json).toHaveBeenCalledWith({
      error: "NO_INQUIRY",
      message: "No open inquiry for this moderator.",
    });
  });

  it("returns 503 when the database is unavailable", async () => {
    const { api } = fakeApi(async () => {
      throw new DatabaseUnavailableError();
    });
    const req = createMockRequest({ moderator });
    const res = createMockResponse();

    await getInquiryHandler(api)(req, res);

    expect(res.status).toHaveBeenCalledWith(503);
    expect(res.json).toHaveBeenCalledWith({
      error: "DATABASE_UNAVAILABLE",
      message: "Database unavailable. Please try again shortly.",
    });
  });

  it("logs and returns 500 when assembly fails", async () => {
    const failure = new Error("notes store unavailable");
    const { api } = fakeApi(async () => {
      throw failure;
    });
    const req = createMockRequest({ moderator });
    const res = createMockResponse();

    await getInquiryHandler(api)(req, res);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({
      error: "INQUIRY_FAILED",
      message: "Could not assemble the inquiry.",
    });
    expect(req.log.error).toHaveBeenCalledWith("[Inquiry] Assembly failed", {
      moderatorId: moderator.id,
      error: failure,
    });
  });

  it("aborts the lookups and stays silent when the client disconnects", async () => {
    let seen: AbortSignal | undefined;
    const { api } = fakeApi(
      (_mod, options) =>
        new Promise<Inquiry | null>((_resolve, reject) => {
          const signal = options?.signal;
          seen = signal;
          if (signal) signal.addEventListener("abort", () => reject(signal.reason));
        })
    );
    const req = createMockRequest({ moderator });
    const res = createMockResponse();

    const pending = getInquiryHandler(api)(req, res);
    res._emit("close");
    await pending;

    expect(seen?.aborted).toBe(true);
    expect(res.status).not.toHaveBeenCalled();
    expect(res.json).not.toHaveBeenCalled();
    expect(req.log.debug).toHaveBeenCalledWith("[Inquiry] Request abandoned by client", {
      moderatorId: moderator.id,
    });
  });

  it("does not abort after the response has been sent", async () => {
    let seen: AbortSignal | undefined;
    const { api } = fakeApi(async (_mod, options) => {
      seen = options?.signal;
      return inquiry;
    });
    const req = createMockRequest({ moderator });
    const res = createMockResponse();

    await getInquiryHandler(api)(req, res);
    res._emit("close");

    expect(seen?.aborted).toBe(false);
  });
});
