/**
 * Application Constants
 * Centralized configuration for magic numbers and limits
 */

// ============================================
// PHRASE VALIDATION
// ============================================

/**
 * Shortest phrase worth sending to the model
 */
export const MIN_PHRASE_LENGTH = 2;

/**
 * Longest phrase accepted from a user
 */
export const MAX_PHRASE_LENGTH = 500;

/**
 * Age range used in the prompt when none is configured
 */
export const DEFAULT_CHILD_AGE_RANGE = '10-17';

// ============================================
// RATE LIMITING
// ============================================

/**
 * Requests a single user may send per window
 */
export const RATE_LIMIT_MAX_REQUESTS = 10;

/**
 * Rate limiter window in seconds
 */
export const RATE_LIMIT_WINDOW_SECONDS = 60;

// ============================================
// TIME CONSTANTS
// ============================================

export const MS_PER_SECOND = 1000;

/**
 * Inactivity after which an analytics session is closed (30 minutes)
 */
export const SESSION_TIMEOUT_MS = 30 * 60 * 1000;

/**
 * Upper bound for a single completion request
 */
export const COMPLETION_TIMEOUT_MS = 30000;

// ============================================
// CATALOG / LISTS
// ============================================

/**
 * Matched catalog entries embedded into the prompt
 */
export const PROMPT_EXAMPLES_LIMIT = 2;

/**
 * Items kept in each list section of an analysis
 */
export const MAX_LIST_ITEMS = 3;

/**
 * Default page size for the internal analytics endpoint
 */
export const RECENT_EVENTS_DEFAULT_LIMIT = 100;

/**
 * Hard cap for the internal analytics endpoint
 */
export const RECENT_EVENTS_MAX_LIMIT = 1000;
