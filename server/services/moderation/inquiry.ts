/**
 * Moderation Inquiry — Assembly
 *
 * Builds the consolidated view of the report a moderator is currently
 * working. Two phases:
 *
 * 1. Sequential: capability gate, then the moderator's active report.
 *    Either coming up empty ends the call with `null`.
 * 2. Concurrent: related reports, reporter accuracy, notes, history and the
 *    subject's user record, all keyed off the report and joined together.
 *
 * Nothing is cached and nothing is written. Collaborator failures propagate.
 * Sources only see cancellation before they query; the caller is released
 * as soon as its signal aborts.
 *
 * @module services/moderation/inquiry
 */

import baseLogger, { type Logger } from "../../logger";
import { INQUIRY_MORE_LIKE_LIMIT } from "../../config/constants";
import type {
  Capability,
  HistorySource,
  Inquiry,
  ModeratorIdentity,
  NoteSource,
  PermissionCheck,
  ReportSource,
  SourceContext,
  UserSource,
} from "./types";

/** Capability a moderator needs to open inquiries */
export const INQUIRY_CAPABILITY: Capability = "hunter";

export interface InquiryApiDeps {
  permissions: PermissionCheck;
  reports: ReportSource;
  users: UserSource;
  notes: NoteSource;
  history: HistorySource;
  logger?: Logger;
}

export interface ForModeratorOptions {
  /**
   * Aborting rejects the call with the signal's reason and aborts the signal
   * handed to the sources. A query already sent runs to completion and its
   * result is dropped.
   */
  signal?: AbortSignal;
}

export interface InquiryApi {
  forModerator(mod: ModeratorIdentity, options?: ForModeratorOptions): Promise<Inquiry | null>;
}

/**
 * Rejects once `signal` aborts. The returned `release` detaches the listener.
 */
function abortion(signal: AbortSignal | undefined): { promise: Promise<never>; release: () => void } {
  if (!signal) {
    return { promise: new Promise<never>(() => {}), release: () => {} };
  }

  let onAbort = () => {};
  const promise = new Promise<never>((_resolve, reject) => {
    onAbort = () => reject(signal.reason);
  });
  signal.addEventListener("abort", onAbort, { once: true });
  return { promise, release: () => signal.removeEventListener("abort", onAbort) };
}

export const createInquiryApi = (deps: InquiryApiDeps): InquiryApi => {
  const { permissions, reports, users, notes, history } = deps;
  const log = (deps.logger ?? baseLogger).child({ component: "inquiry" });

  const forModerator = async (
    mod: ModeratorIdentity,
    options: ForModeratorOptions = {}
  ): Promise<Inquiry | null> => {
    const { signal } = options;
    signal?.throwIfAborted();

    if (!permissions.can(mod, INQUIRY_CAPABILITY)) {
      log.debug("No inquiry: moderator lacks capability", {
        moderatorId: mod.id,
        capability: INQUIRY_CAPABILITY,
      });
      return null;
    }

    const cancelled = abortion(signal);
    // One branch failing, or the caller going away, aborts the others' signal
    const branches = new AbortController();
    const forwardAbort = () => branches.abort(signal?.reason);
    signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const report = await Promise.race([
        reports.activeInquiryFor(mod.id, { signal }),
        cancelled.promise,
      ]);
      if (!report) {
        log.debug("No inquiry: no active report claim", { moderatorId: mod.id });
        return null;
      }

      const ctx: SourceContext = { signal: branches.signal };
      const failFast = <T>(pending: Promise<T>): Promise<T> =>
        pending.catch((error: unknown) => {
          branches.abort(error);
          throw error;
        });
      const subject = report.subjectUsername;

      const [moreReports, accuracy, subjectNotes, subjectHistory, user] = await Promise.race([
        Promise.all([
          failFast(reports.moreLike(report, INQUIRY_MORE_LIKE_LIMIT, ctx)),
          failFast(reports.accuracyScore(report, ctx)),
          failFast(notes.notesFor(subject, ctx)),
          failFast(history.historyFor(subject, ctx)),
          failFast(users.byUsername(subject, ctx)),
        ]),
        cancelled.promise,
      ]);

      if (!user) {
        log.debug("No inquiry: report subject does not resolve to a user", {
          moderatorId: mod.id,
          reportId: report.id,
          subjectUsername: subject,
        });
        return null;
      }

      return {
        mod: { id: mod.id, name: mod.username },
        report,
        accuracy,
        moreReports,
        notes: subjectNotes,
        history: subjectHistory,
        user,
      };
    } finally {
      cancelled.release();
      signal?.removeEventListener("abort", forwardAbort);
    }
  };

  return { forModerator };
};
