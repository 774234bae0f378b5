/**
 * packages/db - Database Schema (Drizzle SoT)
 *
 * - All time columns are timestamptz (UTC), named event_time / received_time
 * - Both tables are partitioned on event_time once converted to hypertables
 */

// Event log
export * from "./ob-message";
export * from "./ob-level";
