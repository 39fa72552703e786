/**
 * In-process store. Records are kept serialized so that callers never
 * share objects with the store.
 */

import type { DocumentRecord } from "../documents/schema.js";
import { deserializeRecord, serializeRecord } from "./serialization.js";
import type { Store } from "./types.js";

export class MemoryStore implements Store {
  private readonly records = new Map<string, string>();

  async load(documentId: string): Promise<DocumentRecord | undefined> {
    const json = this.records.get(documentId);
    return json === undefined ? undefined : deserializeRecord(json, documentId);
  }

  async save(record: DocumentRecord): Promise<void> {
    const json = serializeRecord(record, false);
    // Reject records that could not be loaded back
    deserializeRecord(json, record.document.id);
    this.records.set(record.document.id, json);
  }

  async delete(documentId: string): Promise<boolean> {
    return this.records.delete(documentId);
  }

  async list(): Promise<string[]> {
    return [...this.records.keys()].sort();
  }
}
