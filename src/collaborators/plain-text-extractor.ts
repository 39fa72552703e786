/**
 * Extractor for plain text and Markdown files.
 *
 * Markdown image references (`![caption](path)`) are reported as media
 * anchored at the offset where they appear; relative paths resolve against
 * the file's directory.
 */

import { readFile } from "node:fs/promises";
import { dirname, extname, isAbsolute, resolve } from "node:path";

import type { ExtractedContent, MediaReference } from "../documents/schema.js";
import { ExtractionError } from "./errors.js";
import type { Extractor, SourceFile } from "./types.js";

const SUPPORTED_TYPES: Readonly<Record<string, string>> = {
  ".txt": "text/plain",
  ".md": "text/markdown",
  ".markdown": "text/markdown",
};

const IMAGE_REFERENCE = /!\[([^\]]*)\]\(([^)\s]+)(?:\s+"[^"]*")?\)/g;
const HEADING = /^#\s+(.+)$/m;

export class PlainTextExtractor implements Extractor {
  async extract(file: SourceFile, signal?: AbortSignal): Promise<ExtractedContent> {
    const mimeType = file.mimeType ?? SUPPORTED_TYPES[extname(file.path).toLowerCase()];
    if (mimeType !== "text/plain" && mimeType !== "text/markdown") {
      throw new ExtractionError(`Unsupported file type: ${file.path}`);
    }

    let raw: string;
    try {
      raw = await readFile(file.path, { encoding: "utf-8", signal });
    } catch (err) {
      throw new ExtractionError(`Cannot read ${file.path}`, false, { cause: err });
    }

    const text = raw.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
    if (mimeType === "text/plain") {
      return { text, media: [], cues: [] };
    }

    const title = HEADING.exec(text)?.[1]?.trim();
    return {
      text,
      ...(title ? { title } : {}),
      media: findImages(text, dirname(file.path)),
      cues: [],
    };
  }
}

export function findImages(text: string, baseDir: string): MediaReference[] {
  const media: MediaReference[] = [];
  for (const match of text.matchAll(IMAGE_REFERENCE)) {
    const [, caption, target] = match;
    const ref = /^[a-z]+:\/\//i.test(target) || isAbsolute(target) ? target : resolve(baseDir, target);
    media.push({
      ref,
      kind: "image",
      offset: match.index ?? 0,
      ...(caption.trim() !== "" ? { caption: caption.trim() } : {}),
    });
  }
  return media;
}
