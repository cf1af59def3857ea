/**
 * Storage gateway.
 */

export {
  IntelligenceRepository,
  normalizePeriod,
  type Period,
  type RepositoryOptions,
  type WriteOptions,
} from "./repository.js";
export {
  DEFAULT_REFERENCE_DATA_PATH,
  ReferenceDataSchema,
  loadReferenceData,
  type ReferenceData,
  type ReferenceDataInput,
  type SeedCounts,
} from "./seed.js";
export { parseOrViolation } from "./schema.js";
