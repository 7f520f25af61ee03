/**
 * Moderation Inquiry — Type Definitions
 */

import type { ReportStatus, ReportTargetType } from "@shared/schema";

/** Named elevated permissions a staff role can grant */
export type Capability = "hunter" | "shusher" | "admin";

/** The acting moderator, as resolved by the auth middleware */
export interface ModeratorIdentity {
  id: string;
  username: string;
  roles: string[];
}

/** Lightweight display form of a user */
export interface LightUser {
  id: string;
  name: string;
}

export interface Report {
  id: string;
  reporterId: string;
  /** Username of the reported user; also the key for notes and history */
  subjectUsername: string;
  targetType: ReportTargetType;
  targetId: string;
  reason: string;
  notes: string | null;
  status: ReportStatus;
  /** Severity assigned at intake (0-100) */
  score: number;
  inquiryModeratorId: string | null;
  inquiryOpenedAt: Date | null;
  createdAt: Date;
}

export interface Note {
  id: string;
  authorUsername: string;
  subjectUsername: string;
  text: string;
  modOnly: boolean;
  createdAt: Date;
}

/** A past moderation action taken against a user */
export interface HistoryEntry {
  id: string;
  moderatorUsername: string;
  targetUsername: string;
  actionType: string;
  reasonCode: string;
  notes: string | null;
  relatedReportId: string | null;
  createdAt: Date;
}

export interface User {
  id: string;
  username: string;
  email: string;
  firstName: string | null;
  lastName: string | null;
  trustLevel: number;
  accountTier: "free" | "pro" | "premium";
  isActive: boolean;
  roles: string[];
  createdAt: Date;
  lastLoginAt: Date | null;
}

/**
 * Consolidated view of the report a moderator is working.
 *
 * Only built once every lookup has completed and the subject resolved.
 * `accuracy` is null when the reporter cannot be scored.
 */
export interface Inquiry {
  mod: LightUser;
  report: Report;
  accuracy: number | null;
  moreReports: Report[];
  notes: Note[];
  history: HistoryEntry[];
  user: User;
}

/** The primary report followed by the related ones, in source order */
export const allReports = (inquiry: Inquiry): Report[] => [inquiry.report, ...inquiry.moreReports];

// ============================================================================
// Collaborators
// ============================================================================

/** Passed to every collaborator call so in-flight reads can be abandoned */
export interface SourceContext {
  signal?: AbortSignal;
}

export interface PermissionCheck {
  can(mod: ModeratorIdentity, capability: Capability): boolean;
}

export interface ReportSource {
  /** Report currently claimed by the moderator, if any */
  activeInquiryFor(moderatorId: string, ctx?: SourceContext): Promise<Report | null>;
  /** Reports similar to `report`, at most `limit` of them */
  moreLike(report: Report, limit: number, ctx?: SourceContext): Promise<Report[]>;
  /** Reporter accuracy 0-100, null when unscoreable */
  accuracyScore(report: Report, ctx?: SourceContext): Promise<number | null>;
}

export interface UserSource {
  byUsername(username: string, ctx?: SourceContext): Promise<User | null>;
}

export interface NoteSource {
  notesFor(username: string, ctx?: SourceContext): Promise<Note[]>;
}

export interface HistorySource {
  historyFor(username: string, ctx?: SourceContext): Promise<HistoryEntry[]>;
}
