/**
 * Engine configuration schema.
 *
 * Every tunable threshold of the topic graph engine lives here: how the
 * granularity scale maps to topic counts, how hard the segmenter retries,
 * collaborator timeouts, when a note is enriched, and how dense the
 * hyperlink graph may get.
 *
 * The configuration is validated once when an engine is constructed and
 * then treated as read-only. A different tuning requires a new engine.
 */

import { z } from "zod";
import { NoteFormat } from "./enums.js";

/**
 * Granularity → topic count mapping.
 */
export const GranularityConfigSchema = z
  .object({
    /** Topic-count ceiling hinted at granularity 0 */
    minCeiling: z
      .number()
      .int()
      .min(1)
      .describe("Maximum topics hinted at the coarsest granularity"),

    /** Topic-count ceiling hinted at granularity 100 */
    maxCeiling: z
      .number()
      .int()
      .min(1)
      .describe("Maximum topics hinted at the finest granularity"),

    /** Granularity used when a document is created without one */
    defaultGranularity: z.number().int().min(0).max(100),
  })
  .strict();

export type GranularityConfig = z.infer<typeof GranularityConfigSchema>;

/**
 * Segmentation contract and retry policy.
 */
export const SegmentationConfigSchema = z
  .object({
    /** Content shorter than this (after trimming) cannot be segmented */
    minContentChars: z.number().int().min(1),

    /** Content longer than this is rejected as oversized input */
    maxContentChars: z.number().int().min(1),

    /** Corrective re-prompts after the first response */
    maxRetries: z.number().int().min(0).max(5),

    /** Accept blocks the model never assigned as "unassigned" content */
    allowUnassigned: z.boolean(),

    /** Characters of each block shown to the model */
    blockPreviewChars: z.number().int().min(40),
  })
  .strict();

export type SegmentationConfig = z.infer<typeof SegmentationConfigSchema>;

/**
 * Bounds applied to every external collaborator call.
 */
export const CollaboratorConfigSchema = z
  .object({
    /** Per-attempt timeout in milliseconds */
    timeoutMs: z.number().int().min(1),

    /** Transport-level retries for retriable failures */
    retries: z.number().int().min(0).max(5),

    /** First backoff delay; doubles on each retry */
    backoffMs: z.number().int().min(0),
  })
  .strict();

export type CollaboratorConfig = z.infer<typeof CollaboratorConfigSchema>;

export const SynthesisConfigSchema = z
  .object({
    /** Corrective retries when the summary response is malformed */
    parseRetries: z.number().int().min(0).max(3),

    /** Characters of source text passed to the summarization prompt */
    maxSourceChars: z.number().int().min(100),

    defaultFormat: NoteFormat,
  })
  .strict();

export type SynthesisConfig = z.infer<typeof SynthesisConfigSchema>;

export const EnrichmentConfigSchema = z
  .object({
    /** Topics with less source text than this are enriched */
    minSourceChars: z.number().int().min(0),

    /** Also enrich when the model reports it is unsure about the material */
    enrichOnUncertainty: z.boolean(),
  })
  .strict();

export type EnrichmentConfig = z.infer<typeof EnrichmentConfigSchema>;

export const HyperlinkConfigSchema = z
  .object({
    /** Minimum similarity score (0..1) for an edge to be kept */
    threshold: z.number().min(0).max(1),

    /** Maximum outbound edges per note */
    maxOutDegree: z.number().int().min(0),

    /** Tokens shorter than this are ignored when scoring */
    minTokenLength: z.number().int().min(1),
  })
  .strict();

export type HyperlinkConfig = z.infer<typeof HyperlinkConfigSchema>;

export const RevisionConfigSchema = z
  .object({
    /** Most recent chat turns for the topic sent with each instruction */
    historyTurns: z.number().int().min(0),

    /** Instructions longer than this are rejected */
    maxInstructionChars: z.number().int().min(1),
  })
  .strict();

export type RevisionConfig = z.infer<typeof RevisionConfigSchema>;

/**
 * Complete engine configuration.
 */
export const EngineConfigSchema = z
  .object({
    granularity: GranularityConfigSchema,
    segmentation: SegmentationConfigSchema,
    collaborators: CollaboratorConfigSchema,
    synthesis: SynthesisConfigSchema,
    enrichment: EnrichmentConfigSchema,
    hyperlinks: HyperlinkConfigSchema,
    revision: RevisionConfigSchema,
  })
  .strict()
  .refine((c) => c.granularity.maxCeiling >= c.granularity.minCeiling, {
    message: "maxCeiling must be greater than or equal to minCeiling",
    path: ["granularity", "maxCeiling"],
  });

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Partial overrides, section by section, as accepted from a JSON file or
 * from code. Missing fields fall back to the defaults.
 */
export const EngineConfigOverridesSchema = z
  .object({
    granularity: GranularityConfigSchema.partial().optional(),
    segmentation: SegmentationConfigSchema.partial().optional(),
    collaborators: CollaboratorConfigSchema.partial().optional(),
    synthesis: SynthesisConfigSchema.partial().optional(),
    enrichment: EnrichmentConfigSchema.partial().optional(),
    hyperlinks: HyperlinkConfigSchema.partial().optional(),
    revision: RevisionConfigSchema.partial().optional(),
  })
  .strict();

export type EngineConfigOverrides = z.infer<typeof EngineConfigOverridesSchema>;
