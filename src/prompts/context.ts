/**
 * Typed prompt context.
 *
 * Defines the strongly-typed context object that templates are rendered against.
 * Every valid `{{path.to.value}}` placeholder in a prompt template maps to a
 * concrete path in this context tree. Invalid paths produce compile-time errors
 * when building the context, and runtime errors when rendering.
 *
 * DESIGN:
 *
 * The context is a *flat namespace of dotted paths* backed by the real domain
 * objects. Template authors only reach for stable, meaningful values:
 *
 *   hint.maxTopics        → SegmentationHint.maxTopics
 *   content.blocks        → numbered block previews, one per paragraph
 *   topic.source          → the text spans a topic owns, concatenated
 *   note.body             → note sections as markdown-ish plain text
 *
 * Adding a new variable requires exactly three changes:
 *   1. Add the key to PromptContextMap
 *   2. Add it to VALID_VARIABLES in template.ts
 *   3. Add the extraction in buildPromptContext()
 */

import type { NoteFormat } from "../config/engine/enums.js";
import type { SegmentationHint } from "../granularity/mapper.js";
import type { NoteBody } from "../notes/schema.js";
import type { ChatTurn } from "../revision/schema.js";
import type { Topic } from "../topics/schema.js";

// ---------------------------------------------------------------------------
// Context map: every legal template variable and its string type
// ---------------------------------------------------------------------------

/**
 * Exhaustive map of every variable available inside prompt templates.
 *
 * Keys are dotted paths exactly as they appear in `{{…}}` placeholders.
 * Values are always strings (template rendering is text-to-text).
 */
export interface PromptContextMap {
  // ── Segmentation hint ─────────────────────────────────────
  "hint.granularity": string;
  "hint.level": string;
  "hint.description": string;
  "hint.minTopics": string;
  "hint.maxTopics": string;

  // ── Content ───────────────────────────────────────────────
  "content.blockCount": string;
  "content.lastBlock": string;
  "content.blocks": string;

  // ── Corrective re-prompt ──────────────────────────────────
  "correction.issues": string;

  // ── Topic ─────────────────────────────────────────────────
  "topic.key": string;
  "topic.name": string;
  "topic.description": string;
  "topic.source": string;

  // ── Merge ─────────────────────────────────────────────────
  "merge.topics": string;

  // ── Note ──────────────────────────────────────────────────
  "note.title": string;
  "note.format": string;
  "note.body": string;

  // ── Revision ──────────────────────────────────────────────
  "revision.instruction": string;
  "revision.history": string;
}

/** A legal prompt variable name. */
export type PromptVariable = keyof PromptContextMap;

/** The concrete context object passed to the renderer. */
export type PromptContext = Readonly<PromptContextMap>;

// ---------------------------------------------------------------------------
// Builder input
// ---------------------------------------------------------------------------

export interface BlockPreview {
  index: number;
  text: string;
}

/**
 * Input for building a prompt context.
 *
 * Every group is optional; variables that depend on a missing source are
 * populated with a sentinel value so the renderer can detect their absence
 * if a template requires them.
 */
export interface PromptContextInput {
  hint?: Readonly<SegmentationHint>;
  blocks?: readonly BlockPreview[];
  correctionIssues?: readonly string[];
  topic?: Pick<Topic, "key" | "name" | "description">;
  sourceText?: string;
  mergeCandidates?: readonly Pick<Topic, "key" | "name" | "description">[];
  note?: { body: NoteBody; format: NoteFormat };
  /** Target format when there is no note yet */
  format?: NoteFormat;
  instruction?: string;
  history?: readonly Pick<ChatTurn, "sender" | "kind" | "text">[];
}

/** Sentinel for variables whose source was not provided. */
const UNSET = "__UNSET__";

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

/**
 * Build a fully-populated prompt context from domain objects.
 */
export function buildPromptContext(input: PromptContextInput): PromptContext {
  const { hint, blocks, correctionIssues, topic, mergeCandidates, note, history } = input;

  const ctx: PromptContextMap = {
    // ── Segmentation hint ───────────────────────────────────
    "hint.granularity": hint ? String(hint.granularity) : UNSET,
    "hint.level": hint?.level ?? UNSET,
    "hint.description": hint?.description ?? UNSET,
    "hint.minTopics": hint ? String(hint.minTopics) : UNSET,
    "hint.maxTopics": hint ? String(hint.maxTopics) : UNSET,

    // ── Content ─────────────────────────────────────────────
    "content.blockCount": blocks ? String(blocks.length) : UNSET,
    "content.lastBlock": blocks ? String(Math.max(0, blocks.length - 1)) : UNSET,
    "content.blocks": blocks ? blocks.map((b) => `[${b.index}] ${b.text}`).join("\n\n") : UNSET,

    // ── Corrective re-prompt ────────────────────────────────
    "correction.issues":
      correctionIssues && correctionIssues.length > 0
        ? correctionIssues.map((issue) => `- ${issue}`).join("\n")
        : UNSET,

    // ── Topic ───────────────────────────────────────────────
    "topic.key": topic?.key ?? UNSET,
    "topic.name": topic?.name ?? UNSET,
    "topic.description": topic ? topic.description : UNSET,
    "topic.source": input.sourceText ?? UNSET,

    // ── Merge ───────────────────────────────────────────────
    "merge.topics": mergeCandidates
      ? mergeCandidates
          .map((t) => (t.description ? `- ${t.name}: ${t.description}` : `- ${t.name}`))
          .join("\n")
      : UNSET,

    // ── Note ────────────────────────────────────────────────
    "note.title": note?.body.title ?? UNSET,
    "note.format": note?.format ?? input.format ?? UNSET,
    "note.body": note ? formatNoteBody(note.body) : UNSET,

    // ── Revision ────────────────────────────────────────────
    "revision.instruction": input.instruction ?? UNSET,
    "revision.history": history
      ? history
          .filter((turn) => turn.kind === "message")
          .map((turn) => `${turn.sender}: ${turn.text}`)
          .join("\n")
      : UNSET,
  };

  return Object.freeze(ctx);
}

/**
 * Plain-text view of a note body, as shown to the model.
 */
export function formatNoteBody(body: NoteBody): string {
  return body.sections.map((section) => `## ${section.heading}\n\n${section.content}`).join("\n\n");
}

/**
 * Check whether a context value is the UNSET sentinel.
 * Used by the renderer to produce clear errors.
 */
export function isUnset(value: string): boolean {
  return value === UNSET;
}
