/**
 * Ingestor Services
 */

export { IngestPipeline } from "./ingest-pipeline";
export type { IngestPipelineOptions } from "./ingest-pipeline";
