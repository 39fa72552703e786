/**
 * Engine configuration module.
 *
 * Usage:
 *   import { resolveEngineConfig } from "./config/engine/index.js";
 *
 *   // Defaults
 *   const config = resolveEngineConfig();
 *
 *   // Tighter link graph
 *   const sparse = resolveEngineConfig({ hyperlinks: { maxOutDegree: 2 } });
 */

// Domain enums
export {
  NoteFormat,
  DocumentState,
  GranularityLevel,
  MediaKind,
  ChatSender,
  NoteStatus,
  SectionProvenance,
} from "./enums.js";

// Schema types
export type {
  EngineConfig,
  EngineConfigOverrides,
  GranularityConfig,
  SegmentationConfig,
  CollaboratorConfig,
  SynthesisConfig,
  EnrichmentConfig,
  HyperlinkConfig,
  RevisionConfig,
} from "./schema.js";

export { EngineConfigSchema, EngineConfigOverridesSchema } from "./schema.js";

// Loader and validation
export {
  loadEngineConfig,
  loadEngineConfigFile,
  resolveEngineConfig,
  validateEngineConfig,
  EngineConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_ENGINE_CONFIG } from "./defaults.js";
