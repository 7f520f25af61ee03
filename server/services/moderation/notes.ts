/**
 * Moderation Inquiry — Note Source
 */

import { desc, eq } from "drizzle-orm";
import { getDb } from "../../db";
import { moderatorNotes, normalizeUsername, type ModeratorNoteRow } from "@shared/schema";
import { NOTES_LIMIT } from "../../config/constants";
import type { Note, NoteSource, SourceContext } from "./types";

export const toNote = (row: ModeratorNoteRow): Note => ({
  id: row.id,
  authorUsername: row.authorUsername,
  subjectUsername: row.subjectUsername,
  text: row.text,
  modOnly: row.modOnly,
  createdAt: row.createdAt,
});

/**
 * Notes left about a user, newest first. Mod-only notes are included:
 * this source only serves the moderator view.
 */
export const notesFor = async (username: string, ctx: SourceContext = {}): Promise<Note[]> => {
  ctx.signal?.throwIfAborted();
  const db = getDb();
  const rows = await db
    .select()
    .from(moderatorNotes)
    .where(eq(moderatorNotes.subjectUsername, normalizeUsername(username)))
    .orderBy(desc(moderatorNotes.createdAt))
    .limit(NOTES_LIMIT);

  return rows.map(toNote);
};

export const noteSource: NoteSource = { notesFor };
