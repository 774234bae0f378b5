/**
 * packages/repositories - Shared Repository Layer
 *
 * - Interface-based repository pattern
 * - Postgres implementation for production, in-memory implementation for tests
 */

export * from "./interfaces";
export * from "./postgres";
export * from "./memory";
export { paginateScan } from "./scan";
export type { PageCursor, PageFetcher } from "./scan";
export { prepareLevels } from "./levels";
