import { describe, it, expect } from "vitest";
import { toInquiryJson } from "../../services/moderation/serialize";
import type { Inquiry } from "../../services/moderation/types";
import { makeHistoryEntry, makeNote, makeReport, makeUser } from "../helpers";

const inquiry: Inquiry = {
  mod: { id: "mod-1", name: "marta" },
  report: makeReport({
    id: "r1",
    inquiryModeratorId: "mod-1",
    inquiryOpenedAt: new Date("2026-03-02T08:00:00.000Z"),
  }),
  accuracy: 87,
  moreReports: [makeReport({ id: "r2" })],
  notes: [makeNote()],
  history: [makeHistoryEntry()],
  user: makeUser({ lastLoginAt: new Date("2026-03-03T09:30:00.000Z") }),
};

describe("toInquiryJson", () => {
  const json = toInquiryJson(inquiry);

  it("renders dates as ISO strings", () => {
    expect(json.report.createdAt).toBe("2026-03-01T12:00:00.000Z");
    expect(json.report.inquiryOpenedAt).toBe("2026-03-02T08:00:00.000Z");
    expect(json.moreReports[0]?.inquiryOpenedAt).toBeNull();
    expect(json.notes[0]?.createdAt).toBe("2026-03-01T12:00:00.000Z");
    expect(json.history[0]?.createdAt).toBe("2026-03-01T12:00:00.000Z");
    expect(json.user.lastLoginAt).toBe("2026-03-03T09:30:00.000Z");
  });

  it("lists the primary report first in allReports", () => {
    expect(json.allReports.map((r) => r.id)).toEqual(["r1", "r2"]);
  });

  it("keeps accuracy and the moderator as they are", () => {
    expect(json.accuracy).toBe(87);
    expect(json.mod).toEqual({ id: "mod-1", name: "marta" });
  });

  it("leaves contact details out of the subject", () => {
    expect(json.user).toEqual({
      id: "user-u1",
      username: "u1",
      trustLevel: 0,
      accountTier: "free",
      isActive: true,
      roles: [],
      createdAt: "2026-03-01T12:00:00.000Z",
      lastLoginAt: "2026-03-03T09:30:00.000Z",
    });
  });

  it("survives a JSON round trip unchanged", () => {
    expect(JSON.parse(JSON.stringify(json))).toEqual(json);
  });
});
