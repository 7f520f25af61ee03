/**
 * Application Constants
 *
 * Named constants extracted from magic numbers across the codebase.
 * Grouped by feature area for discoverability.
 */

// ============================================================================
// Inquiry Assembly
// ============================================================================

/** Related reports fetched alongside the report under inquiry */
export const INQUIRY_MORE_LIKE_LIMIT = 10;

/** Hard cap on any related-reports query */
export const MORE_LIKE_MAX_LIMIT = 50;

/** Moderator notes shown per subject */
export const NOTES_LIMIT = 50;

/** Moderation log entries shown per subject */
export const HISTORY_LIMIT = 30;

// ============================================================================
// Reporter Accuracy
// ============================================================================

/** Most recent closed reports considered when scoring a reporter */
export const ACCURACY_WINDOW = 20;

/** Below this many closed reports a reporter is not scored */
export const ACCURACY_MIN_CLOSED_REPORTS = 4;

// ============================================================================
// HTTP
// ============================================================================

/** Express body parser size limit */
export const BODY_PARSE_LIMIT = "100kb";

/** Rate limit window for /api (15 minutes) */
export const API_RATE_LIMIT_WINDOW_MS = 15 * 60 * 1000;

/** Requests allowed per window per client on /api */
export const API_RATE_LIMIT_MAX = 300;

/** Development origins for CORS */
export const DEV_ORIGINS = [`http://localhost:${process.env.DEV_CLIENT_PORT || "3000"}`] as const;
