/**
 * Domain enumerations shared by the engine configuration and the data model.
 *
 * Stored document records carry these values, so renaming a member breaks
 * every record written before the change.
 */

import { z } from "zod";

/**
 * Output formats a note can be rendered to.
 */
export const NoteFormat = z.enum(["markdown", "latex", "html"]);
export type NoteFormat = z.infer<typeof NoteFormat>;

/**
 * Document lifecycle.
 *
 *   uploaded         → content extracted, no topics yet (or segmentation failed)
 *   segmented        → live topic set present
 *   notes_generated  → at least one live topic has a current note
 */
export const DocumentState = z.enum(["uploaded", "segmented", "notes_generated"]);
export type DocumentState = z.infer<typeof DocumentState>;

/**
 * Coarse bands of the granularity scale, from fewest/broadest topics to
 * most/narrowest.
 */
export const GranularityLevel = z.enum(["macro", "broad", "balanced", "detailed", "micro"]);
export type GranularityLevel = z.infer<typeof GranularityLevel>;

/**
 * Kinds of media an extractor can report alongside the text.
 */
export const MediaKind = z.enum(["image", "audio", "video"]);
export type MediaKind = z.infer<typeof MediaKind>;

export const ChatSender = z.enum(["user", "assistant"]);
export type ChatSender = z.infer<typeof ChatSender>;

export const NoteStatus = z.enum([
  "current", // Bound to the live topic version
  "stale", // Topic was merged away or replaced by re-segmentation
  "superseded", // Replaced by a newer generation for the same topic
]);
export type NoteStatus = z.infer<typeof NoteStatus>;

/**
 * Where a note section's text came from.
 */
export const SectionProvenance = z.enum(["source", "enrichment"]);
export type SectionProvenance = z.infer<typeof SectionProvenance>;
