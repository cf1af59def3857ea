/**
 * Ingestion: research findings and manual entries into pending data points.
 */

export {
  FindingSchema,
  RESEARCH_TYPE_DIMENSIONS,
  findingToInput,
  parseFinding,
  resolveDimension,
  type Finding,
  type ResearchTarget,
  type ResearchTargetType,
} from "./findings.js";
export { extractJson, parseAnalyzerOutput } from "./analyzer-output.js";
export {
  ResearchSession,
  type FindingRejection,
  type ResearchCollaborator,
  type ResearchResult,
  type ResearchSessionOptions,
} from "./session.js";
export { FindingsFileCollaborator, type FindingsLocation } from "./file-collaborator.js";
export {
  ManualBatchSchema,
  ManualEntrySchema,
  ManualIngestion,
  entryToInput,
  loadManualBatch,
  parseManualBatch,
  type ManualBatch,
  type ManualEntry,
  type ManualIngestionOptions,
  type ManualIngestionResult,
  type ManualItemKind,
  type ManualRejection,
} from "./manual.js";
