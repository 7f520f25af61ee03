/**
 * Moderation Inquiry Service
 *
 * Assembles the moderator-facing view of the report under active inquiry:
 * the report, related reports, reporter accuracy, moderator notes, the
 * subject's moderation history and user record.
 *
 * Features:
 * - Capability gate before any lookup
 * - Concurrent fan-out over the report's subject
 * - Cooperative cancellation through AbortSignal
 *
 * @module services/moderation
 */

import { createInquiryApi } from "./inquiry";
import { roleGrants } from "./permissions";
import { reportSource } from "./reports";
import { noteSource } from "./notes";
import { historySource } from "./history";
import { userSource } from "./users";

export type {
  Capability,
  ModeratorIdentity,
  LightUser,
  Report,
  Note,
  HistoryEntry,
  User,
  Inquiry,
  SourceContext,
  PermissionCheck,
  ReportSource,
  UserSource,
  NoteSource,
  HistorySource,
} from "./types";
export { allReports } from "./types";
export type { InquiryApi, InquiryApiDeps, ForModeratorOptions } from "./inquiry";
export { createInquiryApi, INQUIRY_CAPABILITY } from "./inquiry";
export { hasCapability, roleGrants, ROLE_CAPABILITIES } from "./permissions";
export { toInquiryJson, type InquiryJson } from "./serialize";
export { moderatorById } from "./users";

/** Inquiry service over the PostgreSQL-backed sources */
export const inquiryApi = createInquiryApi({
  permissions: roleGrants,
  reports: reportSource,
  users: userSource,
  notes: noteSource,
  history: historySource,
});
