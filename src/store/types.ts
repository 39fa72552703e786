/**
 * Persistence contract for document records.
 *
 * Each call is all-or-nothing: a failed save leaves the previously saved
 * record in place, and a load never returns a half-written record.
 * Implementations report failures as StoreError.
 */

import type { DocumentRecord } from "../documents/schema.js";

export interface Store {
  load(documentId: string): Promise<DocumentRecord | undefined>;
  save(record: DocumentRecord): Promise<void>;
  /** @returns whether a record existed */
  delete(documentId: string): Promise<boolean>;
  list(): Promise<string[]>;
}
