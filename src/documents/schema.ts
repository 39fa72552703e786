/**
 * Document data model and the persisted record that bundles a document
 * with its topic graph, notes and revision chat.
 */

import { z } from "zod";
import { DocumentState, MediaKind } from "../config/engine/enums.js";
import { GraphSnapshotSchema } from "../topics/schema.js";
import { NoteSchema } from "../notes/schema.js";
import { ChatTurnSchema } from "../revision/schema.js";

/**
 * Non-text material found during extraction, anchored at a character
 * offset of the extracted text.
 */
export const MediaReferenceSchema = z
  .object({
    ref: z.string().min(1).describe("Path or identifier the image analyzer understands"),
    kind: MediaKind,
    offset: z.number().int().min(0),
    mimeType: z.string().optional(),
    caption: z.string().optional(),
  })
  .strict();
export type MediaReference = z.infer<typeof MediaReferenceSchema>;

/**
 * Maps a character range of a transcript to a time range of its media.
 */
export const TranscriptCueSchema = z
  .object({
    start: z.number().int().min(0),
    end: z.number().int().min(0),
    media: z.string().min(1),
    startMs: z.number().min(0),
    endMs: z.number().min(0),
  })
  .strict();
export type TranscriptCue = z.infer<typeof TranscriptCueSchema>;

/**
 * What an extractor returns for one uploaded file.
 */
export const ExtractedContentSchema = z
  .object({
    text: z.string(),
    title: z.string().optional(),
    media: z.array(MediaReferenceSchema).default([]),
    cues: z.array(TranscriptCueSchema).default([]),
  })
  .strict();
export type ExtractedContent = z.infer<typeof ExtractedContentSchema>;
export type ExtractedContentInput = z.input<typeof ExtractedContentSchema>;

/**
 * Outcome of the last segmentation, kept for display.
 */
export const SegmentationSummarySchema = z
  .object({
    reduced: z.boolean(),
    attempts: z.number().int().min(1),
    blockCount: z.number().int().min(0),
    unassignedBlocks: z.array(z.number().int().min(0)),
  })
  .strict();
export type SegmentationSummary = z.infer<typeof SegmentationSummarySchema>;

export const StudyDocumentSchema = z
  .object({
    id: z.string().min(1),
    title: z.string().optional(),
    content: z.string(),
    media: z.array(MediaReferenceSchema),
    cues: z.array(TranscriptCueSchema),
    granularity: z.number().int().min(0).max(100),
    state: DocumentState,
    segmentation: SegmentationSummarySchema.optional(),
    createdAt: z.string().datetime(),
    updatedAt: z.string().datetime(),
  })
  .strict();
export type StudyDocument = z.infer<typeof StudyDocumentSchema>;

export const RECORD_VERSION = 1;

/**
 * Unit of persistence: everything the engine knows about one document.
 */
export const DocumentRecordSchema = z
  .object({
    version: z.literal(RECORD_VERSION),
    document: StudyDocumentSchema,
    graph: GraphSnapshotSchema,
    notes: z.array(NoteSchema),
    chat: z.array(ChatTurnSchema),
  })
  .strict();
export type DocumentRecord = z.infer<typeof DocumentRecordSchema>;
