/**
 * Note data model.
 *
 * A note stores a structured body rather than rendered text. Rendering
 * happens on read so that hyperlinks always point at the current topic
 * graph and one body can be shown in any format.
 */

import { z } from "zod";
import { NoteFormat, NoteStatus, SectionProvenance } from "../config/engine/enums.js";
import { TopicKey } from "../topics/schema.js";

export const NoteSectionSchema = z
  .object({
    heading: z.string().min(1),
    content: z.string(),
    provenance: SectionProvenance,
    /** Enricher that produced the section, when provenance is "enrichment" */
    source: z.string().optional(),
  })
  .strict();
export type NoteSection = z.infer<typeof NoteSectionSchema>;

export const NoteImageSchema = z
  .object({
    ref: z.string().min(1),
    caption: z.string().optional(),
    description: z.string().min(1),
  })
  .strict();
export type NoteImage = z.infer<typeof NoteImageSchema>;

export const NoteBodySchema = z
  .object({
    title: z.string().min(1),
    sections: z.array(NoteSectionSchema).min(1),
    images: z.array(NoteImageSchema),
  })
  .strict();
export type NoteBody = z.infer<typeof NoteBodySchema>;

export const NoteSchema = z
  .object({
    id: z.string().min(1),
    topicKey: TopicKey,
    /** Topic version the note summarizes */
    topicVersion: z.number().int().min(1),
    format: NoteFormat,
    body: NoteBodySchema,
    /** 1 on generation, +1 per accepted revision */
    revision: z.number().int().min(1),
    status: NoteStatus,
    /** Enrichment or image analysis was requested but failed */
    partial: z.boolean(),
    warnings: z.array(z.string()),
    generatedAt: z.string().datetime(),
    updatedAt: z.string().datetime(),
  })
  .strict();
export type Note = z.infer<typeof NoteSchema>;

/**
 * A link as the renderer sees it.
 */
export interface RenderableLink {
  anchor: string;
  href: string;
}

/**
 * Everything a renderer needs for one note.
 */
export interface RenderableNote {
  title: string;
  sections: readonly NoteSection[];
  images: readonly NoteImage[];
  links: readonly RenderableLink[];
}

/**
 * Table-of-contents page written alongside exported notes.
 */
export interface RenderableIndex {
  title: string;
  entries: readonly { title: string; href: string }[];
}
