/**
 * Moderation Inquiry — JSON rendering for the moderation console
 */

import { allReports, type HistoryEntry, type Inquiry, type Note, type Report, type User } from "./types";

export interface ReportJson extends Omit<Report, "inquiryOpenedAt" | "createdAt"> {
  inquiryOpenedAt: string | null;
  createdAt: string;
}

export interface NoteJson extends Omit<Note, "createdAt"> {
  createdAt: string;
}

export interface HistoryEntryJson extends Omit<HistoryEntry, "createdAt"> {
  createdAt: string;
}

/** Subject fields a moderator sees; contact details stay server-side */
export interface SubjectUserJson {
  id: string;
  username: string;
  trustLevel: number;
  accountTier: User["accountTier"];
  isActive: boolean;
  roles: string[];
  createdAt: string;
  lastLoginAt: string | null;
}

export interface InquiryJson {
  mod: Inquiry["mod"];
  report: ReportJson;
  accuracy: number | null;
  moreReports: ReportJson[];
  allReports: ReportJson[];
  notes: NoteJson[];
  history: HistoryEntryJson[];
  user: SubjectUserJson;
}

const reportJson = (report: Report): ReportJson => ({
  ...report,
  inquiryOpenedAt: report.inquiryOpenedAt?.toISOString() ?? null,
  createdAt: report.createdAt.toISOString(),
});

const subjectJson = (user: User): SubjectUserJson => ({
  id: user.id,
  username: user.username,
  trustLevel: user.trustLevel,
  accountTier: user.accountTier,
  isActive: user.isActive,
  roles: user.roles,
  createdAt: user.createdAt.toISOString(),
  lastLoginAt: user.lastLoginAt?.toISOString() ?? null,
});

export const toInquiryJson = (inquiry: Inquiry): InquiryJson => ({
  mod: inquiry.mod,
  report: reportJson(inquiry.report),
  accuracy: inquiry.accuracy,
  moreReports: inquiry.moreReports.map(reportJson),
  allReports: allReports(inquiry).map(reportJson),
  notes: inquiry.notes.map((n) => ({ ...n, createdAt: n.createdAt.toISOString() })),
  history: inquiry.history.map((h) => ({ ...h, createdAt: h.createdAt.toISOString() })),
  user: subjectJson(inquiry.user),
});
