import { pgEnum, pgTable, integer, boolean, timestamp, json, varchar, uuid, uniqueIndex } from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";

export const accountTierEnum = pgEnum("account_tier", ["free", "pro", "premium"]);

export const customUsers = pgTable("custom_users", {
  id: varchar("id")
    .primaryKey()
    .default(sql`gen_random_uuid()`),
  email: varchar("email", { length: 255 }).notNull().unique(),
  passwordHash: varchar("password_hash", { length: 255 }).notNull(),
  firstName: varchar("first_name", { length: 100 }),
  lastName: varchar("last_name", { length: 100 }),
  isActive: boolean("is_active").default(true),
  trustLevel: integer("trust_level").default(0).notNull(),
  accountTier: accountTierEnum("account_tier").default("free").notNull(),
  // Staff roles; granted capabilities are resolved server-side
  roles: json("roles").$type<string[]>().notNull().default(sql`'[]'::json`),
  lastLoginAt: timestamp("last_login_at"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

export type CustomUser = typeof customUsers.$inferSelect;

export const usernames = pgTable(
  "usernames",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    uid: varchar("uid", { length: 128 }).notNull().unique(),
    // Stored lowercased
    username: varchar("username", { length: 20 }).notNull().unique(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    usernameIdx: uniqueIndex("usernames_username_unique").on(table.username),
    uidIdx: uniqueIndex("usernames_uid_unique").on(table.uid),
  })
);

