/**
 * Bounded collaborator invocation.
 *
 * Every call to an external capability goes through invokeCollaborator():
 *
 *   - each attempt gets its own AbortController and timeout
 *   - retriable failures are retried with exponential backoff
 *   - the caller's AbortSignal cancels the attempt and any pending backoff
 *   - whatever the collaborator throws comes out as a CollaboratorError
 *     (or OperationCancelledError), never as a provider-specific shape
 */

import {
  CollaboratorError,
  CollaboratorTimeoutError,
  OperationCancelledError,
  type CollaboratorName,
} from "../errors/index.js";
import type { Logger } from "../logging/index.js";
import { isRetriable } from "./errors.js";

export interface InvokeOptions {
  /** Per-attempt timeout */
  timeoutMs: number;
  /** Retries after the first attempt, for retriable failures only */
  retries: number;
  /** Delay before the first retry; doubles each time */
  backoffMs: number;
  signal?: AbortSignal;
  logger?: Logger;
  /** Operation name used in cancellation errors and log lines */
  operation?: string;
}

export async function invokeCollaborator<T>(
  collaborator: CollaboratorName,
  call: (signal: AbortSignal) => Promise<T>,
  options: InvokeOptions
): Promise<T> {
  const operation = options.operation ?? collaborator;
  let attempt = 0;

  for (;;) {
    if (options.signal?.aborted) {
      throw new OperationCancelledError(operation);
    }

    try {
      return await attemptOnce(collaborator, call, options.timeoutMs, operation, options.signal);
    } catch (err) {
      if (err instanceof OperationCancelledError) throw err;

      const failure = toCollaboratorError(collaborator, err);
      if (!failure.retriable || attempt >= options.retries) {
        throw failure;
      }

      attempt += 1;
      const delayMs = options.backoffMs * 2 ** (attempt - 1);
      options.logger?.warn(`${collaborator} call failed, retrying`, {
        attempt,
        delayMs,
        error: failure.message,
      });
      await delay(delayMs, operation, options.signal);
    }
  }
}

/**
 * Wrap anything a collaborator threw into the engine taxonomy.
 */
export function toCollaboratorError(collaborator: CollaboratorName, err: unknown): CollaboratorError {
  if (err instanceof CollaboratorError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new CollaboratorError(`${collaborator} failed: ${message}`, {
    collaborator,
    retriable: isRetriable(err),
    cause: err,
  });
}

function attemptOnce<T>(
  collaborator: CollaboratorName,
  call: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operation: string,
  outer: AbortSignal | undefined
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      outer?.removeEventListener("abort", onAbort);
      settle();
    };

    const onAbort = (): void => {
      controller.abort();
      finish(() => reject(new OperationCancelledError(operation)));
    };

    const timer = setTimeout(() => {
      controller.abort();
      finish(() => reject(new CollaboratorTimeoutError(collaborator, timeoutMs)));
    }, timeoutMs);

    outer?.addEventListener("abort", onAbort, { once: true });

    try {
      call(controller.signal).then(
        (value) => finish(() => resolve(value)),
        (err: unknown) => finish(() => reject(err))
      );
    } catch (err) {
      finish(() => reject(err));
    }
  });
}

function delay(ms: number, operation: string, signal: AbortSignal | undefined): Promise<void> {
  if (ms <= 0) return Promise.resolve();

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new OperationCancelledError(operation));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
