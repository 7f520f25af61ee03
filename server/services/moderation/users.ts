/**
 * Moderation Inquiry — User Lookup
 *
 * Resolves usernames and moderator ids to user records. Deactivated
 * accounts resolve to null, the same as unknown ones.
 */

import { and, eq } from "drizzle-orm";
import { getDb } from "../../db";
import {
  customUsers,
  usernames,
  usernameSchema,
  normalizeUsername,
  type CustomUser,
} from "@shared/schema";
import type { ModeratorIdentity, SourceContext, User, UserSource } from "./types";

export const toUser = (row: CustomUser, username: string): User => ({
  id: row.id,
  username,
  email: row.email,
  firstName: row.firstName,
  lastName: row.lastName,
  trustLevel: row.trustLevel,
  accountTier: row.accountTier,
  isActive: row.isActive ?? true,
  roles: row.roles,
  createdAt: row.createdAt,
  lastLoginAt: row.lastLoginAt,
});

/**
 * Look up a user by username, case-insensitively.
 *
 * Names that could never have been registered resolve to null without a query.
 */
export const byUsername = async (name: string, ctx: SourceContext = {}): Promise<User | null> => {
  const parsed = usernameSchema.safeParse(name.trim());
  if (!parsed.success) return null;

  ctx.signal?.throwIfAborted();
  const db = getDb();
  const [row] = await db
    .select({ user: customUsers, username: usernames.username })
    .from(usernames)
    .innerJoin(customUsers, eq(customUsers.id, usernames.uid))
    .where(and(eq(usernames.username, normalizeUsername(parsed.data)), eq(customUsers.isActive, true)))
    .limit(1);

  return row ? toUser(row.user, row.username) : null;
};

/**
 * Load the identity of an active staff member by user id.
 */
export const moderatorById = async (id: string): Promise<ModeratorIdentity | null> => {
  const db = getDb();
  const [row] = await db
    .select({ id: customUsers.id, roles: customUsers.roles, username: usernames.username })
    .from(customUsers)
    .innerJoin(usernames, eq(usernames.uid, customUsers.id))
    .where(and(eq(customUsers.id, id), eq(customUsers.isActive, true)))
    .limit(1);

  return row ? { id: row.id, username: row.username, roles: row.roles } : null;
};

export const userSource: UserSource = { byUsername };
