/**
 * Error taxonomy of the topic graph engine.
 *
 * Every error the engine raises to its caller extends EngineError and
 * falls into one of these categories:
 *
 *   input         user-fixable: empty/oversized content, unknown keys
 *   invariant     internal bug: the topic partition would break
 *   collaborator  model / enrichment / image / store failure, maybe retriable
 *   stale         the target note or topic is out of date
 *   concurrency   the document is already being mutated
 *   cancelled     the caller aborted the operation
 *
 * Collaborators throw their own error shapes (see collaborators/errors.ts);
 * components translate them into this taxonomy before they propagate.
 */

export type ErrorCategory =
  | "input"
  | "invariant"
  | "collaborator"
  | "stale"
  | "concurrency"
  | "cancelled";

/**
 * External capabilities the engine consumes.
 */
export type CollaboratorName =
  | "extractor"
  | "language-model"
  | "enricher"
  | "image-analyzer"
  | "renderer"
  | "store";

export abstract class EngineError extends Error {
  abstract readonly category: ErrorCategory;

  /** Structured details for logs; never shown to users verbatim. */
  public readonly context: Readonly<Record<string, unknown>>;

  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.context = context;
  }

  /**
   * Message safe to show to an end user.
   */
  userMessage(): string {
    return this.message;
  }
}

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

export class InputError extends EngineError {
  readonly category = "input";
}

/**
 * Content is empty or too short to segment.
 */
export class ExtractionInsufficientError extends InputError {
  constructor(
    public readonly length: number,
    public readonly minimum: number
  ) {
    super(
      length === 0
        ? "The document has no extractable text."
        : `The document has too little text to segment (${length} characters, need at least ${minimum}).`,
      { length, minimum }
    );
  }
}

export class MergeTargetInvalidError extends InputError {
  constructor(
    message: string,
    public readonly topicKeys: readonly string[]
  ) {
    super(message, { topicKeys });
  }
}

export class DocumentNotFoundError extends InputError {
  constructor(public readonly documentId: string) {
    super(`Document not found: ${documentId}`, { documentId });
  }
}

export class TopicNotFoundError extends InputError {
  constructor(
    public readonly documentId: string,
    public readonly topicKey: string
  ) {
    super(`Topic ${topicKey} does not exist in document ${documentId}`, { documentId, topicKey });
  }
}

export class NoteNotFoundError extends InputError {
  constructor(
    public readonly documentId: string,
    public readonly topicKey: string
  ) {
    super(`No note has been generated for topic ${topicKey} yet`, { documentId, topicKey });
  }
}

// ---------------------------------------------------------------------------
// Invariant
// ---------------------------------------------------------------------------

/**
 * The topic partition or key space would become inconsistent.
 * Always logged in full; users only see a generic message.
 */
export class InvariantViolationError extends EngineError {
  readonly category = "invariant";

  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(message, { issues });
  }

  userMessage(): string {
    return "A processing error occurred. The document was left unchanged.";
  }

  format(): string {
    return [this.message, ...this.issues.map((issue) => `  - ${issue}`)].join("\n");
  }
}

// ---------------------------------------------------------------------------
// Collaborator
// ---------------------------------------------------------------------------

export interface CollaboratorErrorOptions {
  collaborator: CollaboratorName;
  retriable: boolean;
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class CollaboratorError extends EngineError {
  readonly category = "collaborator";
  public readonly collaborator: CollaboratorName;
  public readonly retriable: boolean;

  constructor(message: string, options: CollaboratorErrorOptions) {
    super(
      message,
      { ...options.context, collaborator: options.collaborator, retriable: options.retriable },
      { cause: options.cause }
    );
    this.collaborator = options.collaborator;
    this.retriable = options.retriable;
  }

  userMessage(): string {
    return this.retriable
      ? `The ${this.collaborator} is temporarily unavailable. Please try again.`
      : `The ${this.collaborator} could not complete the request: ${this.message}`;
  }
}

export class CollaboratorTimeoutError extends CollaboratorError {
  constructor(
    collaborator: CollaboratorName,
    public readonly timeoutMs: number
  ) {
    super(`${collaborator} did not respond within ${timeoutMs}ms`, {
      collaborator,
      retriable: true,
      context: { timeoutMs },
    });
  }
}

/**
 * The language model could not produce a usable segmentation.
 */
export class SegmentationUpstreamError extends CollaboratorError {
  constructor(
    message: string,
    options: { retriable: boolean; attempts: number; issues?: readonly string[]; cause?: unknown }
  ) {
    super(message, {
      collaborator: "language-model",
      retriable: options.retriable,
      cause: options.cause,
      context: { attempts: options.attempts, issues: options.issues ?? [] },
    });
  }
}

/**
 * Core summarization failed; no note was recorded for the topic.
 */
export class SynthesisFailedError extends CollaboratorError {
  constructor(
    public readonly topicKey: string,
    message: string,
    options: { retriable: boolean; cause?: unknown }
  ) {
    super(message, {
      collaborator: "language-model",
      retriable: options.retriable,
      cause: options.cause,
      context: { topicKey },
    });
  }
}

export class StoreError extends CollaboratorError {
  constructor(message: string, options: { retriable?: boolean; cause?: unknown; documentId?: string } = {}) {
    super(message, {
      collaborator: "store",
      retriable: options.retriable ?? false,
      cause: options.cause,
      context: { documentId: options.documentId },
    });
  }
}

// ---------------------------------------------------------------------------
// Stale / concurrency / cancellation
// ---------------------------------------------------------------------------

export class StaleTargetError extends EngineError {
  readonly category = "stale";

  constructor(
    message: string,
    public readonly targetKey: string,
    /** Live key that now owns the target's content, when there is one */
    public readonly currentKey?: string
  ) {
    super(message, { targetKey, currentKey });
  }
}

export class ConcurrencyError extends EngineError {
  readonly category = "concurrency";

  constructor(
    public readonly documentId: string,
    public readonly operation: string,
    public readonly activeOperation: string
  ) {
    super(
      `Document ${documentId} is busy (${activeOperation} in progress); retry ${operation} later`,
      { documentId, operation, activeOperation }
    );
  }
}

export class OperationCancelledError extends EngineError {
  readonly category = "cancelled";

  constructor(public readonly operation: string) {
    super(`${operation} was cancelled; no changes were saved`, { operation });
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

/**
 * Map any thrown value to a message fit for an end user.
 */
export function toUserMessage(err: unknown): string {
  if (err instanceof EngineError) {
    return err.userMessage();
  }
  return "A processing error occurred.";
}
