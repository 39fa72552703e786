/**
 * Contracts for the external capabilities the engine consumes.
 *
 * The engine never talks to a provider directly. Swapping the language
 * model, adding an enricher, or storing records elsewhere means supplying
 * a different implementation of one of these interfaces.
 */

import type { NoteFormat } from "../config/engine/enums.js";
import type { ExtractedContent, MediaReference } from "../documents/schema.js";
import type { RenderableIndex, RenderableNote } from "../notes/schema.js";

// ---------------------------------------------------------------------------
// Language model
// ---------------------------------------------------------------------------

/**
 * What the engine is asking the model to do. Adapters may use it to pick
 * generation settings; fakes use it to route scripted responses.
 */
export type ModelTask = "segment" | "summarize" | "merge-name" | "revise" | "supplement" | "describe-image";

export interface ModelImage {
  mimeType: string;
  /** Base64-encoded bytes */
  data: string;
}

export interface ModelRequest {
  task: ModelTask;
  prompt: string;
  images?: readonly ModelImage[];
  /** Aborted when the attempt times out or the caller cancels */
  signal?: AbortSignal;
}

/**
 * Text-in, text-out model. Implementations throw ModelError on failure.
 */
export interface LanguageModel {
  readonly name: string;
  generate(request: ModelRequest): Promise<string>;
}

// ---------------------------------------------------------------------------
// Enrichment and images
// ---------------------------------------------------------------------------

export interface EnrichmentRequest {
  topicKey: string;
  topicName: string;
  /** What the source material already says about the topic */
  summary: string;
}

/**
 * Supplies supplementary material for thinly covered topics.
 * Implementations throw EnrichmentUnavailableError on failure.
 */
export interface Enricher {
  readonly name: string;
  supplement(request: EnrichmentRequest, signal?: AbortSignal): Promise<string>;
}

/**
 * Produces a textual description of an image.
 * Implementations throw AnalysisUnavailableError on failure.
 */
export interface ImageAnalyzer {
  describe(image: MediaReference, signal?: AbortSignal): Promise<string>;
}

// ---------------------------------------------------------------------------
// Extraction and rendering
// ---------------------------------------------------------------------------

export interface SourceFile {
  path: string;
  /** Overrides detection from the file extension */
  mimeType?: string;
}

/**
 * Turns an uploaded file into text plus media references.
 * Implementations throw ExtractionError on failure.
 */
export interface Extractor {
  extract(file: SourceFile, signal?: AbortSignal): Promise<ExtractedContent>;
}

export interface NoteRenderer {
  render(note: RenderableNote, format: NoteFormat): string;
  renderIndex(index: RenderableIndex, format: NoteFormat): string;
  fileExtension(format: NoteFormat): string;
}
