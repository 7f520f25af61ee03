import { z } from "zod";

export const usernameSchema = z
  .string()
  .min(3, "Username must be at least 3 characters")
  .max(20, "Username must be at most 20 characters")
  .regex(/^[a-zA-Z0-9]+$/, "Username can only contain letters and numbers");

/** Usernames are stored and compared lowercased */
export const normalizeUsername = (name: string): string => name.trim().toLowerCase();
