/**
 * Domain fixtures for moderation tests.
 *
 * Every factory takes overrides so a test only spells out what it asserts on.
 */

import { vi } from "vitest";
import type { Mock } from "vitest";
import type { CustomUser } from "@shared/schema";
import type {
  HistoryEntry,
  ModeratorIdentity,
  Note,
  Report,
  User,
} from "../../services/moderation/types";

export interface MockLogger {
  debug: Mock;
  info: Mock;
  warn: Mock;
  error: Mock;
  fatal: Mock;
  child: Mock;
}

/**
 * Mock logger whose `child()` returns itself, so assertions hold whichever
 * logger the code under test ends up writing to.
 */
export function createMockLogger(): MockLogger {
  const logger: MockLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

const BASE_DATE = new Date("2026-03-01T12:00:00.000Z");

export function makeModerator(overrides: Partial<ModeratorIdentity> = {}): ModeratorIdentity {
  return { id: "mod-1", username: "marta", roles: ["hunter"], ...overrides };
}

export function makeReport(overrides: Partial<Report> = {}): Report {
  return {
    id: "r1",
    reporterId: "reporter-1",
    subjectUsername: "u1",
    targetType: "user",
    targetId: "user-u1",
    reason: "harassment",
    notes: null,
    status: "reviewing",
    score: 40,
    inquiryModeratorId: null,
    inquiryOpenedAt: null,
    createdAt: BASE_DATE,
    ...overrides,
  };
}

export function makeNote(overrides: Partial<Note> = {}): Note {
  return {
    id: "n1",
    authorUsername: "marta",
    subjectUsername: "u1",
    text: "Warned in chat last week",
    modOnly: true,
    createdAt: BASE_DATE,
    ...overrides,
  };
}

export function makeHistoryEntry(overrides: Partial<HistoryEntry> = {}): HistoryEntry {
  return {
    id: "h1",
    moderatorUsername: "marta",
    targetUsername: "u1",
    actionType: "warn",
    reasonCode: "spam",
    notes: null,
    relatedReportId: null,
    createdAt: BASE_DATE,
    ...overrides,
  };
}

export function makeUser(overrides: Partial<User> = {}): User {
  return {
    id: "user-u1",
    username: "u1",
    email: "u1@example.com",
    firstName: null,
    lastName: null,
    trustLevel: 0,
    accountTier: "free",
    isActive: true,
    roles: [],
    createdAt: BASE_DATE,
    lastLoginAt: null,
    ...overrides,
  };
}

export function makeUserRow(overrides: Partial<CustomUser> = {}): CustomUser {
  return {
    id: "user-u1",
    email: "u1@example.com",
    passwordHash: "test-hash",
    firstName: null,
    lastName: null,
    isActive: true,
    trustLevel: 0,
    accountTier: "free",
    roles: [],
    lastLoginAt: null,
    createdAt: BASE_DATE,
    updatedAt: BASE_DATE,
    ...overrides,
  };
}
