/**
 * NotesEngine: the facade over the topic graph engine.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * MUTATION PROTOCOL
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   lock(documentId)
 *     └─ load record ─► working copy ─► operation ─► cancelled? ─► save
 *   unlock
 *
 * Every mutating operation holds the document's lock, works on a copy of
 * the stored record and commits it with one store.save() after the
 * operation succeeds. A failure or cancellation discards the copy, so
 * readers only ever see committed records.
 */

import { randomUUID } from "node:crypto";

import type { NoteFormat } from "../config/engine/enums.js";
import { DEFAULT_ENGINE_CONFIG } from "../config/engine/defaults.js";
import { loadEngineConfig } from "../config/engine/loader.js";
import type { EngineConfig } from "../config/engine/schema.js";
import {
  ExtractedContentSchema,
  type ExtractedContentInput,
  type SegmentationSummary,
  type StudyDocument,
} from "../documents/schema.js";
import { DocumentWorkspace } from "../documents/workspace.js";
import {
  CollaboratorError,
  DocumentNotFoundError,
  EngineError,
  InputError,
  InvariantViolationError,
  NoteNotFoundError,
  OperationCancelledError,
  StaleTargetError,
  TopicNotFoundError,
} from "../errors/index.js";
import { GranularityMapper } from "../granularity/mapper.js";
import { createSilentLogger, generateOperationId, type Logger } from "../logging/index.js";
import { MergeEngine, type MergeOutcome } from "../merge/merge-engine.js";
import { computeHyperlinks } from "../notes/hyperlinks.js";
import { TextNoteRenderer } from "../notes/renderer.js";
import type { Note } from "../notes/schema.js";
import { NoteSynthesizer } from "../notes/synthesizer.js";
import { renderNote, type RenderedNote } from "../notes/view.js";
import { PromptLibrary } from "../prompts/index.js";
import type { ChatTurn } from "../revision/schema.js";
import { RevisionSession } from "../revision/session.js";
import { checkContentSize, Segmenter } from "../segmentation/segmenter.js";
import { MemoryStore } from "../store/memory-store.js";
import type { Store } from "../store/types.js";
import type { Topic } from "../topics/schema.js";
import type { TextSpan } from "../topics/spans.js";
import { invokeCollaborator } from "../collaborators/invoke.js";
import { LanguageModelEnricher } from "../collaborators/model-enricher.js";
import { PlainTextExtractor } from "../collaborators/plain-text-extractor.js";
import type {
  Enricher,
  Extractor,
  ImageAnalyzer,
  LanguageModel,
  NoteRenderer,
  SourceFile,
} from "../collaborators/types.js";
import { DocumentLocks } from "./locks.js";

// ---------------------------------------------------------------------------
// Options and results
// ---------------------------------------------------------------------------

export interface NotesEngineOptions {
  model: LanguageModel;
  store?: Store;
  /** Validated once; defaults to DEFAULT_ENGINE_CONFIG */
  config?: EngineConfig;
  logger?: Logger;
  prompts?: PromptLibrary;
  /** Defaults to the language model itself; null disables enrichment */
  enricher?: Enricher | null;
  imageAnalyzer?: ImageAnalyzer;
  extractor?: Extractor;
  renderer?: NoteRenderer;
  generateId?: () => string;
  clock?: () => Date;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

export interface CreateDocumentOptions extends OperationOptions {
  granularity?: number;
  title?: string;
}

export interface GenerateNotesOptions extends OperationOptions {
  format?: NoteFormat;
  processImages?: boolean;
  /** Regenerate notes that are already current */
  regenerate?: boolean;
  /** Restrict generation to these live topics */
  topicKeys?: readonly string[];
}

export interface ReviseNoteOptions extends OperationOptions {
  /** Fail with StaleTargetError unless the note is at this revision */
  expectedRevision?: number;
}

export interface GetNoteOptions {
  /** Render in another format than the note was generated in */
  format?: NoteFormat;
  /** Serve the latest note even when it is stale or superseded */
  allowStale?: boolean;
}

export interface DocumentOverview {
  document: StudyDocument;
  topics: Readonly<Topic>[];
  unassigned: TextSpan[];
}

export interface CreateDocumentResult extends DocumentOverview {
  /** Set when the document was segmented */
  segmentation?: SegmentationSummary;
  /** Set when the document was stored but could not be segmented */
  segmentationError?: CollaboratorError;
}

export interface SegmentationResult extends DocumentOverview {
  segmentation: SegmentationSummary;
  /** Topic keys whose notes became stale */
  staleNotes: string[];
}

export interface MergeResult extends MergeOutcome {
  topics: Readonly<Topic>[];
  staleNotes: string[];
}

export interface GenerationFailure {
  topicKey: string;
  error: CollaboratorError;
}

export interface GenerateNotesResult {
  /** Current notes of the requested topics, in display order */
  notes: Note[];
  generated: string[];
  reused: string[];
  failures: GenerationFailure[];
}

export interface ReviseNoteResult {
  note: Note;
  reply: string;
  turns: ChatTurn[];
}

export interface TopicListing {
  key: string;
  name: string;
  description: string;
  version: number;
  origin: Topic["origin"];
  spans: Topic["spans"];
  /** Revision of the current note, null when there is none */
  noteRevision: number | null;
  noteFormat: NoteFormat | null;
}

export interface ExportedFile {
  fileName: string;
  content: string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * @throws InputError unless `value` is an integer in [0, 100]
 */
export function validateGranularity(value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > 100) {
    throw new InputError(`Granularity must be an integer between 0 and 100, got ${value}.`, { value });
  }
  return value;
}

function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation);
  }
}

function overviewOf(ws: DocumentWorkspace): DocumentOverview {
  const record = ws.toRecord();
  return {
    document: record.document,
    topics: record.graph.topics,
    unassigned: record.graph.unassigned,
  };
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class NotesEngine {
  readonly config: Readonly<EngineConfig>;
  private readonly store: Store;
  private readonly logger: Logger;
  private readonly extractor: Extractor;
  private readonly renderer: NoteRenderer;
  private readonly mapper: GranularityMapper;
  private readonly segmenter: Segmenter;
  private readonly mergeEngine: MergeEngine;
  private readonly synthesizer: NoteSynthesizer;
  private readonly locks = new DocumentLocks();
  private readonly sessions = new Map<string, RevisionSession>();
  private readonly model: LanguageModel;
  private readonly prompts: PromptLibrary;
  private readonly generateId: () => string;
  private readonly clock: () => Date;

  constructor(options: NotesEngineOptions) {
    this.config = loadEngineConfig(options.config ?? DEFAULT_ENGINE_CONFIG);
    this.model = options.model;
    this.store = options.store ?? new MemoryStore();
    this.logger = options.logger ?? createSilentLogger();
    this.prompts = options.prompts ?? new PromptLibrary().preload();
    this.extractor = options.extractor ?? new PlainTextExtractor();
    this.renderer = options.renderer ?? new TextNoteRenderer();
    this.generateId = options.generateId ?? randomUUID;
    this.clock = options.clock ?? (() => new Date());

    const enricher =
      options.enricher === null ? undefined : (options.enricher ?? new LanguageModelEnricher(this.model, this.prompts));
    const deps = { model: this.model, prompts: this.prompts, config: this.config };

    this.mapper = new GranularityMapper(this.config.granularity);
    this.segmenter = new Segmenter({ ...deps, logger: this.logger.child("segmenter") });
    this.mergeEngine = new MergeEngine({ ...deps, logger: this.logger.child("merge") });
    this.synthesizer = new NoteSynthesizer({
      ...deps,
      logger: this.logger.child("synthesizer"),
      enricher,
      imageAnalyzer: options.imageAnalyzer,
    });
  }

  // ============================================================
  // Documents
  // ============================================================

  /**
   * Store extracted content as a new document and segment it.
   *
   * The document is stored before segmentation; when segmentation fails
   * on the model side it stays `uploaded` and the error is returned in
   * `segmentationError` so the caller can retry with segmentDocument().
   *
   * @throws ExtractionInsufficientError / InputError before anything is stored
   */
  async createDocument(
    content: string | ExtractedContentInput,
    options: CreateDocumentOptions = {}
  ): Promise<CreateDocumentResult> {
    const parsed = ExtractedContentSchema.safeParse(typeof content === "string" ? { text: content } : content);
    if (!parsed.success) {
      throw new InputError(
        `Invalid document content: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`
      );
    }
    const extracted = parsed.data;
    checkContentSize(extracted.text, this.config.segmentation);
    const granularity = validateGranularity(options.granularity ?? this.config.granularity.defaultGranularity);
    throwIfAborted(options.signal, "createDocument");

    const title = options.title ?? extracted.title;
    const ws = DocumentWorkspace.create({
      id: this.generateId(),
      content: extracted.text,
      ...(title !== undefined ? { title } : {}),
      media: extracted.media,
      cues: extracted.cues,
      granularity,
      now: this.clock(),
    });
    await this.store.save(ws.toRecord());
    this.logger.info("Document created", { documentId: ws.id, length: extracted.text.length, granularity });

    try {
      return await this.segmentDocument(ws.id, options);
    } catch (err) {
      if (err instanceof CollaboratorError) {
        return { ...overviewOf(ws), segmentationError: err };
      }
      throw err;
    }
  }

  /**
   * Segment a document that has no topics yet.
   *
   * @throws InputError if the document is already segmented
   */
  async segmentDocument(documentId: string, options: OperationOptions = {}): Promise<SegmentationResult> {
    return this.mutate(documentId, "segmentDocument", options.signal, async (ws) => {
      if (ws.graph.size > 0) {
        throw new InputError(
          `Document ${documentId} is already segmented; change its granularity to segment it again.`,
          { documentId }
        );
      }
      return this.resegment(ws, options.signal);
    });
  }

  /**
   * Read a file through the extractor and create a document from it.
   */
  async importFile(file: SourceFile, options: CreateDocumentOptions = {}): Promise<CreateDocumentResult> {
    const extracted = await invokeCollaborator(
      "extractor",
      (signal) => this.extractor.extract(file, signal),
      { ...this.config.collaborators, signal: options.signal, logger: this.logger, operation: "importFile" }
    );
    return this.createDocument(extracted, options);
  }

  async getDocument(documentId: string): Promise<DocumentOverview> {
    return overviewOf(await this.read(documentId));
  }

  /**
   * Delete a document with its topics, notes and chat.
   */
  async deleteDocument(documentId: string): Promise<void> {
    await this.locks.runExclusive(documentId, "deleteDocument", async () => {
      const existed = await this.store.delete(documentId);
      if (!existed) {
        throw new DocumentNotFoundError(documentId);
      }
      this.sessions.delete(documentId);
      this.logger.info("Document deleted", { documentId });
    });
  }

  // ============================================================
  // Topics
  // ============================================================

  /**
   * Re-segment at a new granularity. The previous topics are tombstoned and
   * their notes become stale.
   *
   * @throws InputError unless granularity is an integer in [0, 100]
   */
  async setGranularity(
    documentId: string,
    granularity: number,
    options: OperationOptions = {}
  ): Promise<SegmentationResult> {
    validateGranularity(granularity);
    return this.mutate(documentId, "setGranularity", options.signal, async (ws) => {
      ws.document.granularity = granularity;
      return this.resegment(ws, options.signal);
    });
  }

  async mergeTopics(
    documentId: string,
    topicKeys: readonly string[],
    options: OperationOptions = {}
  ): Promise<MergeResult> {
    return this.mutate(documentId, "mergeTopics", options.signal, async (ws) => {
      const outcome = await this.mergeEngine.merge(ws.graph, topicKeys, {
        signal: options.signal,
        now: this.clock(),
      });
      const staleNotes = ws.markStaleNotes();
      ws.refreshState();
      return { ...outcome, topics: [...ws.graph.list()], staleNotes };
    });
  }

  async listTopics(documentId: string): Promise<TopicListing[]> {
    const ws = await this.read(documentId);
    return ws.graph.list().map((topic) => {
      const note = ws.currentNote(topic.key);
      return {
        key: topic.key,
        name: topic.name,
        description: topic.description,
        version: topic.version,
        origin: topic.origin,
        spans: topic.spans,
        noteRevision: note?.revision ?? null,
        noteFormat: note?.format ?? null,
      };
    });
  }

  // ============================================================
  // Notes
  // ============================================================

  /**
   * Generate notes for every live topic (or the given ones).
   *
   * Topics whose current note already has the requested format are reused
   * unless `regenerate` is set. A topic whose synthesis fails is reported
   * in `failures`; the others are still committed.
   *
   * @throws StaleTargetError if a requested key was merged away or replaced
   */
  async generateNotes(documentId: string, options: GenerateNotesOptions = {}): Promise<GenerateNotesResult> {
    const format = options.format ?? this.config.synthesis.defaultFormat;

    return this.mutate(documentId, "generateNotes", options.signal, async (ws, log) => {
      if (ws.graph.size === 0) {
        throw new InputError(`Document ${documentId} has no topics yet; segment it first.`, { documentId });
      }
      const keys = options.topicKeys ?? ws.graph.list().map((topic) => topic.key);
      for (const key of keys) {
        if (!ws.graph.has(key)) this.throwMissingTopic(ws, key);
      }

      const result: GenerateNotesResult = { notes: [], generated: [], reused: [], failures: [] };

      for (const key of keys) {
        const topic = ws.graph.get(key);
        if (!topic) continue;

        const existing = ws.currentNote(key);
        if (!options.regenerate && existing?.format === format && existing.topicVersion === topic.version) {
          result.reused.push(key);
          continue;
        }

        try {
          const synthesis = await this.synthesizer.synthesize(topic, ws.document, ws.graph, {
            format,
            processImages: options.processImages,
            signal: options.signal,
            now: this.clock(),
          });
          ws.putNote(synthesis.note);
          ws.graph.setOutboundEdges(key, synthesis.edges);
          if (synthesis.title !== topic.name) {
            ws.graph.rename(key, synthesis.title);
          }
          result.generated.push(key);
        } catch (err) {
          if (!(err instanceof CollaboratorError)) throw err;
          log.warn("Note generation failed", { topic: key, error: err.message });
          result.failures.push({ topicKey: key, error: err });
        }
      }

      result.notes = keys.flatMap((key) => {
        const note = ws.currentNote(key);
        return note ? [note] : [];
      });
      ws.refreshState();
      return result;
    });
  }

  /**
   * Apply one conversational revision to a topic's current note.
   *
   * The chat turns are committed even when the model fails; the error is
   * thrown after the commit and the note is left unchanged.
   *
   * @throws StaleTargetError if the note is not current or not at expectedRevision
   */
  async reviseNote(
    documentId: string,
    topicKey: string,
    instruction: string,
    options: ReviseNoteOptions = {}
  ): Promise<ReviseNoteResult> {
    const outcome = await this.mutate(documentId, "reviseNote", options.signal, async (ws) => {
      const note = this.currentNoteOrThrow(ws, topicKey);
      const outcome = await this.sessionFor(documentId).submit({
        note,
        topic: ws.graph.get(topicKey),
        currentKey: ws.graph.resolve(topicKey),
        instruction,
        history: ws.chatFor(topicKey),
        expectedRevision: options.expectedRevision,
        signal: options.signal,
        now: this.clock(),
      });

      ws.appendTurns(outcome.turns);
      if (outcome.ok) {
        ws.replaceNote(outcome.note);
        ws.graph.setOutboundEdges(
          topicKey,
          computeHyperlinks(topicKey, noteText(outcome.note), ws.graph.list(), this.config.hyperlinks)
        );
      }
      return outcome;
    });

    if (!outcome.ok) {
      throw outcome.error;
    }
    return { note: outcome.note, reply: outcome.reply, turns: outcome.turns };
  }

  /**
   * Render a topic's note with links resolved against the current graph.
   *
   * @throws StaleTargetError if the latest note is not current (unless allowStale)
   * @throws NoteNotFoundError if the topic has no note yet
   */
  async getNote(documentId: string, topicKey: string, options: GetNoteOptions = {}): Promise<RenderedNote> {
    const ws = await this.read(documentId);
    const note =
      (options.allowStale ? (ws.currentNote(topicKey) ?? ws.latestNote(topicKey)) : undefined) ??
      this.currentNoteOrThrow(ws, topicKey);

    return renderNote(note, ws.graph, this.renderer, options.format ?? note.format, (key) =>
      ws.currentNote(key) !== undefined
    );
  }

  async getChatHistory(documentId: string, topicKey?: string): Promise<ChatTurn[]> {
    return (await this.read(documentId)).chatFor(topicKey);
  }

  /**
   * One file per current note plus an index page linking them.
   *
   * @throws InputError if no note has been generated yet
   */
  async exportNotes(documentId: string, format?: NoteFormat): Promise<ExportedFile[]> {
    const ws = await this.read(documentId);
    const outputFormat = format ?? this.config.synthesis.defaultFormat;
    const hasNote = (key: string): boolean => ws.currentNote(key) !== undefined;

    const rendered = ws.graph.list().flatMap((topic) => {
      const note = ws.currentNote(topic.key);
      return note ? [renderNote(note, ws.graph, this.renderer, outputFormat, hasNote)] : [];
    });
    if (rendered.length === 0) {
      throw new InputError(`Document ${documentId} has no notes to export yet.`, { documentId });
    }

    const index = this.renderer.renderIndex(
      {
        title: ws.document.title ?? "Study notes",
        entries: rendered.map((entry) => ({ title: entry.note.body.title, href: entry.fileName })),
      },
      outputFormat
    );

    return [
      ...rendered.map((entry) => ({ fileName: entry.fileName, content: entry.content })),
      { fileName: `index.${this.renderer.fileExtension(outputFormat)}`, content: index },
    ];
  }

  // ============================================================
  // Internals
  // ============================================================

  private async read(documentId: string): Promise<DocumentWorkspace> {
    const record = await this.store.load(documentId);
    if (!record) {
      throw new DocumentNotFoundError(documentId);
    }
    return DocumentWorkspace.fromRecord(record);
  }

  private async mutate<T>(
    documentId: string,
    operation: string,
    signal: AbortSignal | undefined,
    fn: (ws: DocumentWorkspace, log: Logger) => Promise<T>
  ): Promise<T> {
    return this.locks.runExclusive(documentId, operation, async () => {
      const log = this.logger.child("engine", { operationId: generateOperationId(), operation, documentId });
      try {
        throwIfAborted(signal, operation);
        const ws = await this.read(documentId);
        const result = await fn(ws, log);
        throwIfAborted(signal, operation);

        ws.touch(this.clock());
        await this.store.save(ws.toRecord());
        log.info("Operation committed", { state: ws.document.state, topics: ws.graph.size });
        return result;
      } catch (err) {
        logFailure(log, err);
        throw err;
      }
    });
  }

  private async resegment(ws: DocumentWorkspace, signal: AbortSignal | undefined): Promise<SegmentationResult> {
    const hint = this.mapper.map(ws.document.granularity);
    const outcome = await this.segmenter.segment(
      { text: ws.document.content, cues: ws.document.cues },
      hint,
      { signal }
    );

    ws.graph.apply(outcome.proposals, {
      allowGaps: this.config.segmentation.allowUnassigned,
      now: this.clock(),
    });
    const segmentation: SegmentationSummary = {
      reduced: outcome.reduced,
      attempts: outcome.attempts,
      blockCount: outcome.blockCount,
      unassignedBlocks: outcome.unassignedBlocks,
    };
    ws.document.segmentation = segmentation;
    const staleNotes = ws.markStaleNotes();
    ws.refreshState();

    return { ...overviewOf(ws), segmentation, staleNotes };
  }

  /**
   * @throws TopicNotFoundError / StaleTargetError / NoteNotFoundError
   */
  private currentNoteOrThrow(ws: DocumentWorkspace, topicKey: string): Note {
    const note = ws.currentNote(topicKey);
    if (note) return note;

    if (!ws.graph.has(topicKey)) {
      this.throwMissingTopic(ws, topicKey);
    }
    if (ws.latestNote(topicKey)) {
      throw new StaleTargetError(`The note for ${topicKey} is out of date; generate notes again.`, topicKey, topicKey);
    }
    throw new NoteNotFoundError(ws.id, topicKey);
  }

  /**
   * @throws StaleTargetError for a merged-away or replaced key, TopicNotFoundError otherwise
   */
  private throwMissingTopic(ws: DocumentWorkspace, topicKey: string): never {
    if (ws.graph.tombstone(topicKey)) {
      const currentKey = ws.graph.resolve(topicKey);
      throw new StaleTargetError(
        currentKey !== undefined
          ? `Topic ${topicKey} was merged into ${currentKey}.`
          : `Topic ${topicKey} was replaced when the document was segmented again.`,
        topicKey,
        currentKey
      );
    }
    throw new TopicNotFoundError(ws.id, topicKey);
  }

  private sessionFor(documentId: string): RevisionSession {
    let session = this.sessions.get(documentId);
    if (!session) {
      session = new RevisionSession(documentId, {
        model: this.model,
        prompts: this.prompts,
        config: this.config,
        logger: this.logger.child("revision", { documentId }),
      });
      this.sessions.set(documentId, session);
    }
    return session;
  }
}

function noteText(note: Note): string {
  return [note.body.title, ...note.body.sections.map((s) => `${s.heading}\n${s.content}`)].join("\n");
}

function logFailure(log: Logger, err: unknown): void {
  if (err instanceof InvariantViolationError) {
    log.error("Invariant violation", { issues: err.issues, error: err.message });
  } else if (err instanceof CollaboratorError) {
    log.warn("Operation failed", { category: err.category, collaborator: err.collaborator, error: err.message });
  } else if (err instanceof EngineError) {
    log.info("Operation rejected", { category: err.category, error: err.message });
  } else {
    log.error("Unexpected failure", { error: err });
  }
}
