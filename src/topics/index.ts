/**
 * Topic module.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ARCHITECTURE OVERVIEW
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. SPANS: content ownership units (text ranges, media time ranges).
 * 2. PARTITION: validators that detect overlapping or out-of-bounds spans.
 * 3. GRAPH: live topics, tombstones and hyperlink edges of one document.
 *
 *   import { TopicGraph } from "./topics/index.js";
 *
 *   const graph = TopicGraph.create(content.length);
 *   graph.apply(proposals, { allowGaps: true });
 *   const merged = graph.recordMerge(draft, ["T1", "T2"]);
 *   graph.resolve("T1"); // → merged.key
 */

export {
  TopicKey,
  TopicSchema,
  TopicOriginSchema,
  TopicProposalSchema,
  TombstoneSchema,
  TombstoneReason,
  HyperlinkEdgeSchema,
  GraphSnapshotSchema,
  type Topic,
  type TopicOrigin,
  type TopicProposal,
  type Tombstone,
  type HyperlinkEdge,
  type GraphSnapshot,
} from "./schema.js";

export {
  TextSpanSchema,
  TimeSpanSchema,
  SourceSpanSchema,
  textSpan,
  timeSpan,
  spansOverlap,
  sortSpans,
  sameSpanSet,
  describeSpan,
  coalesceTextSpans,
  textGaps,
  textSpansOf,
  type TextSpan,
  type TimeSpan,
  type SourceSpan,
} from "./spans.js";

export {
  findOverlaps,
  validateProposals,
  assertPartition,
  formatPartitionIssues,
  type PartitionIssue,
  type PartitionRule,
  type SpanOwner,
} from "./partition.js";

export {
  TopicGraph,
  rewriteEdges,
  type ApplyOptions,
  type ApplyResult,
  type MergeDraft,
} from "./graph.js";
