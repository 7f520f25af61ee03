import { pgTable, text, integer, boolean, timestamp, varchar, index } from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";

// Moderation tables — read by the inquiry service, written by the moderation console

export const REPORT_STATUSES = ["queued", "reviewing", "resolved", "dismissed", "escalated"] as const;
export type ReportStatus = (typeof REPORT_STATUSES)[number];

/** Statuses of a report that still awaits a decision */
export const OPEN_REPORT_STATUSES = ["queued", "reviewing", "escalated"] as const satisfies readonly ReportStatus[];

/** Statuses of a report a moderator has ruled on */
export const CLOSED_REPORT_STATUSES = ["resolved", "dismissed"] as const satisfies readonly ReportStatus[];

export const REPORT_TARGET_TYPES = ["user", "post", "checkin", "comment"] as const;
export type ReportTargetType = (typeof REPORT_TARGET_TYPES)[number];

export const moderationReports = pgTable(
  "moderation_reports",
  {
    id: varchar("id")
      .primaryKey()
      .default(sql`gen_random_uuid()`),
    reporterId: varchar("reporter_id", { length: 255 }).notNull(),
    subjectUsername: varchar("subject_username", { length: 20 }).notNull(),
    targetType: varchar("target_type", { length: 20 }).$type<ReportTargetType>().notNull(),
    targetId: varchar("target_id", { length: 255 }).notNull(),
    reason: varchar("reason", { length: 100 }).notNull(),
    notes: text("notes"),
    status: varchar("status", { length: 20 }).$type<ReportStatus>().notNull().default("queued"),
    // Aggregate severity assigned at intake (0-100)
    score: integer("score").notNull().default(0),
    // Claim held by the moderator currently working this report
    inquiryModeratorId: varchar("inquiry_moderator_id", { length: 255 }),
    inquiryOpenedAt: timestamp("inquiry_opened_at"),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    statusIdx: index("IDX_moderation_reports_status").on(table.status),
    reporterIdx: index("IDX_moderation_reports_reporter").on(table.reporterId),
    subjectIdx: index("IDX_moderation_reports_subject").on(table.subjectUsername),
    inquiryIdx: index("IDX_moderation_reports_inquiry").on(table.inquiryModeratorId),
    createdAtIdx: index("IDX_moderation_reports_created").on(table.createdAt),
  })
);

export type ModerationReportRow = typeof moderationReports.$inferSelect;

export const modActions = pgTable(
  "mod_actions",
  {
    id: varchar("id")
      .primaryKey()
      .default(sql`gen_random_uuid()`),
    moderatorUsername: varchar("moderator_username", { length: 20 }).notNull(),
    targetUsername: varchar("target_username", { length: 20 }).notNull(),
    actionType: varchar("action_type", { length: 20 }).notNull(),
    reasonCode: varchar("reason_code", { length: 50 }).notNull(),
    notes: text("notes"),
    relatedReportId: varchar("related_report_id", { length: 255 }),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    targetIdx: index("IDX_mod_actions_target").on(table.targetUsername),
    moderatorIdx: index("IDX_mod_actions_moderator").on(table.moderatorUsername),
  })
);

export type ModActionRow = typeof modActions.$inferSelect;

export const moderatorNotes = pgTable(
  "moderator_notes",
  {
    id: varchar("id")
      .primaryKey()
      .default(sql`gen_random_uuid()`),
    authorUsername: varchar("author_username", { length: 20 }).notNull(),
    subjectUsername: varchar("subject_username", { length: 20 }).notNull(),
    text: text("text").notNull(),
    modOnly: boolean("mod_only").notNull().default(true),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    subjectIdx: index("IDX_moderator_notes_subject").on(table.subjectUsername),
  })
);

export type ModeratorNoteRow = typeof moderatorNotes.$inferSelect;
