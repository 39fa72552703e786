/**
 * Topic schema and type definitions.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * PARTITION INVARIANT
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The live topics of a document partition its content: every source span
 * is owned by at most one live topic. A topic key is `T<n>` from a
 * per-document counter and is never reused, so a key that was merged away
 * or replaced by re-segmentation can still be looked up as a tombstone.
 *
 *   ✓ T1 [0,120)   T2 [120,260)   T3 [260,400)
 *   ✗ T1 [0,130)   T2 [120,260)          (overlap on [120,130))
 *
 * Gaps are allowed only where segmentation reported content as unassigned.
 */

import { z } from "zod";
import { SourceSpanSchema, TextSpanSchema } from "./spans.js";

export const TopicKey = z
  .string()
  .regex(/^T[1-9][0-9]*$/, "Topic keys have the form T<n>");
export type TopicKey = z.infer<typeof TopicKey>;

/**
 * How a topic came into being.
 */
export const TopicOriginSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("segmentation") }).strict(),
  z
    .object({
      kind: z.literal("merge"),
      absorbed: z.array(TopicKey).min(2),
    })
    .strict(),
]);
export type TopicOrigin = z.infer<typeof TopicOriginSchema>;

export const TopicSchema = z
  .object({
    key: TopicKey.describe("Stable identifier, unique within the document"),
    name: z.string().min(1).max(200),
    description: z.string(),
    spans: z.array(SourceSpanSchema).min(1).describe("Content owned by this topic"),
    version: z
      .number()
      .int()
      .min(1)
      .describe("Bumped when the topic's content changes; notes record the version they summarize"),
    origin: TopicOriginSchema,
    createdAt: z.string().datetime(),
  })
  .strict();
export type Topic = z.infer<typeof TopicSchema>;

/**
 * What the segmenter hands the graph: a topic without identity.
 */
export const TopicProposalSchema = z
  .object({
    name: z.string().min(1).max(200),
    description: z.string(),
    spans: z.array(SourceSpanSchema),
  })
  .strict();
export type TopicProposal = z.infer<typeof TopicProposalSchema>;

export const TombstoneReason = z.enum(["merged", "resegmented"]);
export type TombstoneReason = z.infer<typeof TombstoneReason>;

/**
 * Record of a key that is no longer live.
 */
export const TombstoneSchema = z
  .object({
    key: TopicKey,
    name: z.string(),
    /** Live topic that took over the content; null after re-segmentation */
    absorbedBy: TopicKey.nullable(),
    reason: TombstoneReason,
    version: z.number().int().min(1),
    at: z.string().datetime(),
  })
  .strict();
export type Tombstone = z.infer<typeof TombstoneSchema>;

/**
 * Directed hyperlink between two live topics' notes.
 */
export const HyperlinkEdgeSchema = z
  .object({
    source: TopicKey,
    target: TopicKey,
    anchor: z.string().min(1),
    score: z.number().min(0).max(1),
  })
  .strict();
export type HyperlinkEdge = z.infer<typeof HyperlinkEdgeSchema>;

/**
 * Serialized form of a TopicGraph.
 */
export const GraphSnapshotSchema = z
  .object({
    contentLength: z.number().int().min(0),
    nextKey: z.number().int().min(1),
    topics: z.array(TopicSchema),
    tombstones: z.array(TombstoneSchema),
    edges: z.array(HyperlinkEdgeSchema),
    unassigned: z.array(TextSpanSchema),
  })
  .strict();
export type GraphSnapshot = z.infer<typeof GraphSnapshotSchema>;
