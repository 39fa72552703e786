/**
 * Splits document content into contiguous blocks for segmentation.
 *
 * Blocks tile the content: block i runs from its start to the next
 * block's start (the separator belongs to the block before it) and the
 * last block runs to the end of the text. Whatever block set the model
 * picks for a topic therefore maps to exact, non-overlapping spans.
 */

import type { BlockPreview } from "../prompts/context.js";

export interface ContentBlock {
  index: number;
  start: number;
  end: number;
}

const PARAGRAPH_BREAK = /\n[ \t]*\n\s*/g;
const LINE_BREAK = /\n\s*/g;

export function splitBlocks(text: string): ContentBlock[] {
  if (text.length === 0) return [];
  const paragraphs = tile(text, PARAGRAPH_BREAK);
  if (paragraphs.length > 1 || !text.trim().includes("\n")) {
    return paragraphs;
  }
  return tile(text, LINE_BREAK);
}

function tile(text: string, separator: RegExp): ContentBlock[] {
  const starts = [0];
  separator.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = separator.exec(text)) !== null) {
    const next = match.index + match[0].length;
    if (next < text.length && next > starts[starts.length - 1]) {
      starts.push(next);
    }
  }

  const ranges = starts.map((start, i) => ({
    start,
    end: i + 1 < starts.length ? starts[i + 1] : text.length,
  }));

  // Whitespace-only leading range folds into the block after it
  const merged: { start: number; end: number }[] = [];
  for (const range of ranges) {
    const previous = merged[merged.length - 1];
    if (previous && text.slice(previous.start, previous.end).trim() === "") {
      previous.end = range.end;
    } else {
      merged.push({ ...range });
    }
  }

  return merged.map((range, index) => ({ index, ...range }));
}

/**
 * Block text as shown to the model: trimmed, whitespace collapsed,
 * truncated to `maxChars`.
 */
export function previewBlocks(text: string, blocks: readonly ContentBlock[], maxChars: number): BlockPreview[] {
  return blocks.map((block) => {
    const body = text.slice(block.start, block.end).replace(/\s+/g, " ").trim();
    return {
      index: block.index,
      text: body.length > maxChars ? `${body.slice(0, maxChars - 1)}…` : body,
    };
  });
}
