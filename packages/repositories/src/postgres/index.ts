/**
 * Postgres implementations
 */

export { createPostgresEventStore, buildScanConditions } from "./event-store";
export { toStoreError, classifyPgErrorCode } from "./pg-errors";
