/**
 * Topic notes engine.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   import { NotesEngine, GeminiLanguageModel } from "topic-notes-engine";
 *
 *   const engine = new NotesEngine({ model: new GeminiLanguageModel({ apiKey }) });
 *   const { document, topics } = await engine.createDocument({ text }, { granularity: 70 });
 *   await engine.mergeTopics(document.id, [topics[0].key, topics[1].key]);
 *   await engine.generateNotes(document.id, { format: "markdown" });
 *   const files = await engine.exportNotes(document.id);
 */

export * from "./config/index.js";
export * from "./errors/index.js";
export * from "./logging/index.js";
export * from "./collaborators/index.js";
export * from "./topics/index.js";
export * from "./notes/index.js";
export * from "./store/index.js";

export {
  MediaReferenceSchema,
  TranscriptCueSchema,
  ExtractedContentSchema,
  StudyDocumentSchema,
  DocumentRecordSchema,
  RECORD_VERSION,
  type MediaReference,
  type TranscriptCue,
  type ExtractedContent,
  type ExtractedContentInput,
  type SegmentationSummary,
  type StudyDocument,
  type DocumentRecord,
} from "./documents/schema.js";

export { ChatTurnSchema, ChatTurnKind, type ChatTurn } from "./revision/schema.js";
export {
  RevisionSession,
  applyAnswer,
  type RevisionState,
  type RevisionSessionDeps,
  type RevisionTurnInput,
  type RevisionOutcome,
  type RevisionAnswer,
} from "./revision/session.js";

export { GranularityMapper, normalizeGranularity, type SegmentationHint } from "./granularity/mapper.js";
export { splitBlocks, previewBlocks, type ContentBlock } from "./segmentation/blocks.js";
export {
  Segmenter,
  checkContentSize,
  buildSegmentationPrompt,
  type SegmentationInput,
  type SegmentationOutcome,
  type SegmenterDeps,
} from "./segmentation/segmenter.js";
export { MergeEngine, fallbackName, type MergeEngineDeps, type MergeOutcome, type MergeName } from "./merge/merge-engine.js";

export {
  PromptLibrary,
  PROMPT_NAMES,
  buildSegmentationConstraints,
  buildRevisionConstraints,
  type PromptName,
} from "./prompts/index.js";

export { DocumentLocks } from "./engine/locks.js";
export {
  NotesEngine,
  validateGranularity,
  type NotesEngineOptions,
  type OperationOptions,
  type CreateDocumentOptions,
  type GenerateNotesOptions,
  type ReviseNoteOptions,
  type GetNoteOptions,
  type DocumentOverview,
  type CreateDocumentResult,
  type SegmentationResult,
  type MergeResult,
  type GenerationFailure,
  type GenerateNotesResult,
  type ReviseNoteResult,
  type TopicListing,
  type ExportedFile,
} from "./engine/engine.js";
