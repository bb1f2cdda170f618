/**
 * Configuration — Centralized constants for gatework.
 *
 * All magic numbers live here for visibility, documentation, and testing.
 */

// --- Evaluation ---

/** Maximum nesting of evaluate() calls (each level costs several JS stack frames) */
export const MAX_EVALUATION_DEPTH = 1_000;

// --- Truth Tables ---

/** Largest input count truthTable() will enumerate (2^16 rows) */
export const MAX_TRUTH_TABLE_INPUTS = 16;

// --- Logging ---

/** Prefix for console warnings */
export const LOG_PREFIX = '[gatework]';
