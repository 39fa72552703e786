/**
 * Errors thrown by collaborator implementations.
 *
 * These are the shapes adapters use to report failure. Engine components
 * never let them escape: invokeCollaborator() converts them into the
 * engine taxonomy in errors/index.ts.
 */

export class ModelError extends Error {
  /** HTTP status reported by the provider, when known */
  public readonly status?: number;

  constructor(
    message: string,
    public readonly retriable: boolean,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, { cause: options?.cause });
    this.name = "ModelError";
    this.status = options?.status;
  }
}

export class EnrichmentUnavailableError extends Error {
  constructor(message: string, public readonly retriable = false, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EnrichmentUnavailableError";
  }
}

export class AnalysisUnavailableError extends Error {
  constructor(message: string, public readonly retriable = false, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AnalysisUnavailableError";
  }
}

export class ExtractionError extends Error {
  constructor(message: string, public readonly retriable = false, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExtractionError";
  }
}

/**
 * Whether a collaborator failure is worth retrying.
 * Anything that does not say so explicitly is treated as permanent.
 */
export function isRetriable(err: unknown): boolean {
  if (
    err instanceof ModelError ||
    err instanceof EnrichmentUnavailableError ||
    err instanceof AnalysisUnavailableError ||
    err instanceof ExtractionError
  ) {
    return err.retriable;
  }
  return false;
}
