/**
 * Moderation Inquiry — Report Source
 *
 * Read-side queries over `moderation_reports`: the moderator's active claim,
 * related open reports about the same subject, and reporter accuracy.
 */

import { and, desc, eq, inArray, ne } from "drizzle-orm";
import { getDb } from "../../db";
import {
  moderationReports,
  OPEN_REPORT_STATUSES,
  normalizeUsername,
  CLOSED_REPORT_STATUSES,
  type ModerationReportRow,
  type ReportStatus,
} from "@shared/schema";
import {
  ACCURACY_MIN_CLOSED_REPORTS,
  ACCURACY_WINDOW,
  MORE_LIKE_MAX_LIMIT,
} from "../../config/constants";
import type { Report, ReportSource, SourceContext } from "./types";

export const toReport = (row: ModerationReportRow): Report => ({
  id: row.id,
  reporterId: row.reporterId,
  subjectUsername: row.subjectUsername,
  targetType: row.targetType,
  targetId: row.targetId,
  reason: row.reason,
  notes: row.notes,
  status: row.status,
  score: row.score,
  inquiryModeratorId: row.inquiryModeratorId,
  inquiryOpenedAt: row.inquiryOpenedAt,
  createdAt: row.createdAt,
});

/**
 * Score a reporter from the outcomes of their closed reports.
 *
 * @returns Percentage of closed reports that were upheld, or null with too little history
 */
export const computeAccuracy = (closedStatuses: readonly ReportStatus[]): number | null => {
  const closed = closedStatuses.filter((s) => s === "resolved" || s === "dismissed");
  if (closed.length < ACCURACY_MIN_CLOSED_REPORTS) return null;
  const upheld = closed.filter((s) => s === "resolved").length;
  return Math.round((upheld / closed.length) * 100);
};

/**
 * Find the report a moderator currently holds an inquiry on.
 *
 * Only open reports count; a claim left on a closed report is ignored.
 */
export const activeInquiryFor = async (
  moderatorId: string,
  ctx: SourceContext = {}
): Promise<Report | null> => {
  ctx.signal?.throwIfAborted();
  const db = getDb();
  const [row] = await db
    .select()
    .from(moderationReports)
    .where(
      and(
        eq(moderationReports.inquiryModeratorId, moderatorId),
        inArray(moderationReports.status, [...OPEN_REPORT_STATUSES])
      )
    )
    .orderBy(desc(moderationReports.inquiryOpenedAt))
    .limit(1);

  return row ? toReport(row) : null;
};

/**
 * Other open reports about the same subject, newest first.
 *
 * @param limit - Clamped to {@link MORE_LIKE_MAX_LIMIT}; below one returns nothing
 */
export const moreLike = async (
  report: Report,
  limit: number,
  ctx: SourceContext = {}
): Promise<Report[]> => {
  const bounded = Math.min(Math.floor(limit), MORE_LIKE_MAX_LIMIT);
  if (!(bounded > 0)) return [];
  ctx.signal?.throwIfAborted();
  const db = getDb();
  const rows = await db
    .select()
    .from(moderationReports)
    .where(
      and(
        eq(moderationReports.subjectUsername, normalizeUsername(report.subjectUsername)),
        ne(moderationReports.id, report.id),
        inArray(moderationReports.status, [...OPEN_REPORT_STATUSES])
      )
    )
    .orderBy(desc(moderationReports.createdAt))
    .limit(bounded);

  return rows.map(toReport);
};

/**
 * Accuracy of the report's author over their most recent closed reports.
 */
export const accuracyScore = async (
  report: Report,
  ctx: SourceContext = {}
): Promise<number | null> => {
  ctx.signal?.throwIfAborted();
  const db = getDb();
  const rows = await db
    .select({ status: moderationReports.status })
    .from(moderationReports)
    .where(
      and(
        eq(moderationReports.reporterId, report.reporterId),
        ne(moderationReports.id, report.id),
        inArray(moderationReports.status, [...CLOSED_REPORT_STATUSES])
      )
    )
    .orderBy(desc(moderationReports.createdAt))
    .limit(ACCURACY_WINDOW);

  return computeAccuracy(rows.map((r) => r.status));
};

export const reportSource: ReportSource = {
  activeInquiryFor,
  moreLike,
  accuracyScore,
};
