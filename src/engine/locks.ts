/**
 * Per-document exclusive sections.
 *
 * A document is mutated by one operation at a time. A second operation on
 * the same document is rejected immediately with ConcurrencyError rather
 * than queued; operations on different documents never wait for each
 * other.
 */

import { ConcurrencyError } from "../errors/index.js";

export class DocumentLocks {
  /** documentId → operation holding it */
  private readonly active = new Map<string, string>();

  async runExclusive<T>(documentId: string, operation: string, fn: () => Promise<T>): Promise<T> {
    const holder = this.active.get(documentId);
    if (holder !== undefined) {
      throw new ConcurrencyError(documentId, operation, holder);
    }

    this.active.set(documentId, operation);
    try {
      return await fn();
    } finally {
      this.active.delete(documentId);
    }
  }

  activeOperation(documentId: string): string | undefined {
    return this.active.get(documentId);
  }
}
