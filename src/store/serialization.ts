/**
 * Document record serialization.
 *
 * Records are stored as JSON and validated on the way back in, so a file
 * edited by hand or written by an older version fails loudly instead of
 * corrupting a topic graph.
 */

import { DocumentRecordSchema, RECORD_VERSION, type DocumentRecord } from "../documents/schema.js";
import { StoreError } from "../errors/index.js";

export function serializeRecord(record: DocumentRecord, pretty = true): string {
  return JSON.stringify(record, null, pretty ? 2 : undefined);
}

/**
 * @throws StoreError if the JSON is malformed, the version is unknown, or
 *         the record does not match the schema
 */
export function deserializeRecord(json: string, documentId?: string): DocumentRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new StoreError(
      `Failed to parse document record: ${err instanceof Error ? err.message : String(err)}`,
      { documentId, cause: err }
    );
  }

  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "version" in parsed &&
    parsed.version !== RECORD_VERSION
  ) {
    throw new StoreError(
      `Incompatible document record version: ${String(parsed.version)} (current: ${RECORD_VERSION})`,
      { documentId }
    );
  }

  const result = DocumentRecordSchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new StoreError(`Invalid document record: ${errors}`, { documentId });
  }
  return result.data;
}
