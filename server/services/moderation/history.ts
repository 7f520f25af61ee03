/**
 * Moderation Inquiry — Moderation Log
 */

import { desc, eq } from "drizzle-orm";
import { getDb } from "../../db";
import { modActions, normalizeUsername, type ModActionRow } from "@shared/schema";
import { HISTORY_LIMIT } from "../../config/constants";
import type { HistoryEntry, HistorySource, SourceContext } from "./types";

export const toHistoryEntry = (row: ModActionRow): HistoryEntry => ({
  id: row.id,
  moderatorUsername: row.moderatorUsername,
  targetUsername: row.targetUsername,
  actionType: row.actionType,
  reasonCode: row.reasonCode,
  notes: row.notes,
  relatedReportId: row.relatedReportId,
  createdAt: row.createdAt,
});

/**
 * Moderation actions taken against a user, newest first.
 */
export const historyFor = async (
  username: string,
  ctx: SourceContext = {}
): Promise<HistoryEntry[]> => {
  ctx.signal?.throwIfAborted();
  const db = getDb();
  const rows = await db
    .select()
    .from(modActions)
    .where(eq(modActions.targetUsername, normalizeUsername(username)))
    .orderBy(desc(modActions.createdAt))
    .limit(HISTORY_LIMIT);

  return rows.map(toHistoryEntry);
};

export const historySource: HistorySource = { historyFor };
