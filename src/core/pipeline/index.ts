/**
 * Pipeline Module
 *
 * @module
 */

export {
  IngestionPipeline,
  type FileFailure,
  type IngestionPhase,
  type IngestionPipelineOptions,
  type IngestionProgressEvent,
  type IngestionReport,
  type IngestionRunOptions,
} from "./ingestion-pipeline.js";
