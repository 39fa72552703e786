/**
 * Collaborator contracts, adapters and the bounded invocation helper.
 */

export type {
  ModelTask,
  ModelImage,
  ModelRequest,
  LanguageModel,
  EnrichmentRequest,
  Enricher,
  ImageAnalyzer,
  SourceFile,
  Extractor,
  NoteRenderer,
} from "./types.js";

export {
  ModelError,
  EnrichmentUnavailableError,
  AnalysisUnavailableError,
  ExtractionError,
  isRetriable,
} from "./errors.js";

export { invokeCollaborator, toCollaboratorError, type InvokeOptions } from "./invoke.js";
export { parseModelJson, extractJsonObject, type ModelJsonResult } from "./json.js";
export { GeminiLanguageModel, toModelError, type GeminiOptions } from "./gemini.js";
export { PlainTextExtractor, findImages } from "./plain-text-extractor.js";
export { LanguageModelEnricher } from "./model-enricher.js";
