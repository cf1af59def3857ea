/**
 * Data-quality configuration module.
 *
 * Usage:
 *   import { loadQualityConfig } from "./config/quality/index.js";
 *
 *   const quality = loadQualityConfig();                 // defaults
 *   const strict = loadQualityConfig({ ...DEFAULT_QUALITY_CONFIG, recencyYears: 3 });
 */

export type { QualityConfig, Bounds, Significance } from "./schema.js";
export { QualityConfigSchema, BoundsSchema } from "./schema.js";
export {
  loadQualityConfig,
  loadQualityConfigFile,
  QualityConfigError,
  type ConfigValidationIssue,
} from "./loader.js";
export { DEFAULT_QUALITY_CONFIG } from "./defaults.js";
