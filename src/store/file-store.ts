/**
 * File-backed store: one JSON file per document.
 *
 * Saves write a temporary file beside the target and rename it into
 * place, so a crash mid-write leaves the previous record intact.
 */

import { randomBytes } from "node:crypto";
import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

import type { DocumentRecord } from "../documents/schema.js";
import { StoreError } from "../errors/index.js";
import { deserializeRecord, serializeRecord } from "./serialization.js";
import type { Store } from "./types.js";

const RECORD_SUFFIX = ".json";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class FileStore implements Store {
  constructor(readonly directory: string) {}

  /** Record file of a document; ids are URI-encoded. */
  pathFor(documentId: string): string {
    return join(this.directory, `${encodeURIComponent(documentId)}${RECORD_SUFFIX}`);
  }

  async load(documentId: string): Promise<DocumentRecord | undefined> {
    let json: string;
    try {
      json = await readFile(this.pathFor(documentId), "utf-8");
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw new StoreError(`Cannot read document ${documentId}: ${describe(err)}`, {
        documentId,
        retriable: true,
        cause: err,
      });
    }
    return deserializeRecord(json, documentId);
  }

  async save(record: DocumentRecord): Promise<void> {
    const documentId = record.document.id;
    const target = this.pathFor(documentId);
    const temp = `${target}.${randomBytes(4).toString("hex")}.tmp`;

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(temp, serializeRecord(record), "utf-8");
      await rename(temp, target);
    } catch (err) {
      await rm(temp, { force: true });
      throw new StoreError(`Cannot save document ${documentId}: ${describe(err)}`, {
        documentId,
        retriable: true,
        cause: err,
      });
    }
  }

  async delete(documentId: string): Promise<boolean> {
    try {
      await rm(this.pathFor(documentId));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw new StoreError(`Cannot delete document ${documentId}: ${describe(err)}`, {
        documentId,
        cause: err,
      });
    }
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new StoreError(`Cannot list documents: ${describe(err)}`, { cause: err });
    }
    return entries
      .filter((name) => name.endsWith(RECORD_SUFFIX))
      .map((name) => decodeURIComponent(name.slice(0, -RECORD_SUFFIX.length)))
      .sort();
  }
}
