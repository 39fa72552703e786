/**
 * Source spans: the units of content a topic claims ownership of.
 *
 *   text  half-open character range [start, end) of the document content
 *   time  half-open media range [startMs, endMs) of one audio/video reference
 *
 * Spans of different kinds never overlap each other; time spans only
 * overlap when they belong to the same media reference.
 */

import { z } from "zod";

export const TextSpanSchema = z
  .object({
    kind: z.literal("text"),
    start: z.number().int().min(0),
    end: z.number().int().min(0),
  })
  .strict();
export type TextSpan = z.infer<typeof TextSpanSchema>;

export const TimeSpanSchema = z
  .object({
    kind: z.literal("time"),
    media: z.string().min(1),
    startMs: z.number().min(0),
    endMs: z.number().min(0),
  })
  .strict();
export type TimeSpan = z.infer<typeof TimeSpanSchema>;

export const SourceSpanSchema = z.discriminatedUnion("kind", [TextSpanSchema, TimeSpanSchema]);
export type SourceSpan = z.infer<typeof SourceSpanSchema>;

export function textSpan(start: number, end: number): TextSpan {
  return { kind: "text", start, end };
}

export function timeSpan(media: string, startMs: number, endMs: number): TimeSpan {
  return { kind: "time", media, startMs, endMs };
}

/**
 * Spans that can overlap share a lane: all text spans, or all time spans
 * of one media reference.
 */
export function spanLane(span: SourceSpan): string {
  return span.kind === "text" ? "text" : `time:${span.media}`;
}

export function spanStart(span: SourceSpan): number {
  return span.kind === "text" ? span.start : span.startMs;
}

export function spanEnd(span: SourceSpan): number {
  return span.kind === "text" ? span.end : span.endMs;
}

export function isEmptySpan(span: SourceSpan): boolean {
  return spanEnd(span) <= spanStart(span);
}

export function spansOverlap(a: SourceSpan, b: SourceSpan): boolean {
  if (spanLane(a) !== spanLane(b)) return false;
  return spanStart(a) < spanEnd(b) && spanStart(b) < spanEnd(a);
}

/**
 * Order: text before time, then by lane, start, end.
 */
export function compareSpans(a: SourceSpan, b: SourceSpan): number {
  if (a.kind !== b.kind) return a.kind === "text" ? -1 : 1;
  const lane = spanLane(a).localeCompare(spanLane(b));
  if (lane !== 0) return lane;
  return spanStart(a) - spanStart(b) || spanEnd(a) - spanEnd(b);
}

export function sortSpans(spans: readonly SourceSpan[]): SourceSpan[] {
  return [...spans].sort(compareSpans);
}

/** Stable identity of a span, for set comparisons. */
export function spanKey(span: SourceSpan): string {
  return `${spanLane(span)}@${spanStart(span)}-${spanEnd(span)}`;
}

/**
 * Whether two span lists contain exactly the same spans (order ignored).
 */
export function sameSpanSet(a: readonly SourceSpan[], b: readonly SourceSpan[]): boolean {
  if (a.length !== b.length) return false;
  const keys = a.map(spanKey).sort();
  const other = b.map(spanKey).sort();
  return keys.every((key, i) => key === other[i]);
}

export function describeSpan(span: SourceSpan): string {
  return span.kind === "text"
    ? `[${span.start},${span.end})`
    : `${span.media}@[${span.startMs}ms,${span.endMs}ms)`;
}

export function textSpansOf(spans: readonly SourceSpan[]): TextSpan[] {
  return spans.filter((span): span is TextSpan => span.kind === "text");
}

/**
 * Collapse touching or overlapping text spans into covering ranges.
 * Display helper: a merged topic owning [0,120) and [120,260) covers [0,260).
 */
export function coalesceTextSpans(spans: readonly SourceSpan[]): TextSpan[] {
  const sorted = textSpansOf(spans).sort((a, b) => a.start - b.start);
  const result: TextSpan[] = [];
  for (const span of sorted) {
    const last = result[result.length - 1];
    if (last && span.start <= last.end) {
      result[result.length - 1] = textSpan(last.start, Math.max(last.end, span.end));
    } else {
      result.push(textSpan(span.start, span.end));
    }
  }
  return result;
}

/**
 * Character ranges of [0, length) not covered by any text span.
 */
export function textGaps(length: number, spans: readonly SourceSpan[]): TextSpan[] {
  const gaps: TextSpan[] = [];
  let cursor = 0;
  for (const covered of coalesceTextSpans(spans)) {
    if (covered.start > cursor) gaps.push(textSpan(cursor, Math.min(covered.start, length)));
    cursor = Math.max(cursor, covered.end);
  }
  if (cursor < length) gaps.push(textSpan(cursor, length));
  return gaps.filter((gap) => gap.end > gap.start);
}

/**
 * Total number of characters covered by the text spans.
 */
export function textLength(spans: readonly SourceSpan[]): number {
  return coalesceTextSpans(spans).reduce((sum, span) => sum + (span.end - span.start), 0);
}
