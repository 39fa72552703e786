/**
 * TopicGraph: the live topics of one document, their tombstones, and the
 * hyperlink edges between them.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * MUTATION MODEL
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The graph is mutated only through apply() (replace everything after
 * segmentation), recordMerge() (fold several topics into one) and the edge
 * setters. Every mutation re-checks the partition and throws
 * InvariantViolationError before touching state, so a failed call leaves
 * the graph as it was.
 *
 * Callers that need all-or-nothing semantics across several steps work on
 * clone() and persist the clone only when every step succeeded.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * KEYS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   T1, T2, T3           first segmentation
 *   T4                   merge of T1 + T2 (placed where T1 was)
 *   resolve("T1") → T4   tombstones point at their absorber
 */

import { InvariantViolationError } from "../errors/index.js";
import { assertPartition, validateProposals } from "./partition.js";
import {
  GraphSnapshotSchema,
  type GraphSnapshot,
  type HyperlinkEdge,
  type Tombstone,
  type Topic,
  type TopicOrigin,
  type TopicProposal,
} from "./schema.js";
import { sameSpanSet, sortSpans, textGaps, type SourceSpan, type TextSpan } from "./spans.js";

export interface ApplyOptions {
  /** Accept content no proposal claims (recorded as unassigned) */
  allowGaps?: boolean;
  now?: Date;
}

export interface ApplyResult {
  topics: readonly Readonly<Topic>[];
  unassigned: readonly TextSpan[];
  /** Keys that were live before and are now tombstoned */
  replaced: readonly string[];
}

export interface MergeDraft {
  name: string;
  description: string;
  spans: readonly SourceSpan[];
}

export class TopicGraph {
  private readonly contentLength: number;
  private nextKey: number;
  private order: string[];
  private readonly topics: Map<string, Readonly<Topic>>;
  private readonly tombstones: Map<string, Readonly<Tombstone>>;
  private edgeList: HyperlinkEdge[];
  private unassignedSpans: TextSpan[];

  private constructor(snapshot: GraphSnapshot) {
    this.contentLength = snapshot.contentLength;
    this.nextKey = snapshot.nextKey;
    this.order = snapshot.topics.map((t) => t.key);
    this.topics = new Map(snapshot.topics.map((t) => [t.key, freezeTopic(t)]));
    this.tombstones = new Map(snapshot.tombstones.map((t) => [t.key, Object.freeze({ ...t })]));
    this.edgeList = snapshot.edges.map((e) => ({ ...e }));
    this.unassignedSpans = snapshot.unassigned.map((s) => ({ ...s }));
  }

  /**
   * Empty graph for content of the given length.
   */
  static create(contentLength: number): TopicGraph {
    return new TopicGraph({
      contentLength,
      nextKey: 1,
      topics: [],
      tombstones: [],
      edges: [],
      unassigned: contentLength > 0 ? [{ kind: "text", start: 0, end: contentLength }] : [],
    });
  }

  /**
   * Rebuild a graph from a snapshot, re-checking every invariant.
   *
   * @throws InvariantViolationError if the snapshot is malformed or inconsistent
   */
  static restore(input: unknown): TopicGraph {
    const parsed = GraphSnapshotSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvariantViolationError(
        "Stored topic graph is malformed",
        parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      );
    }
    const snapshot = parsed.data;
    const issues: string[] = [];
    const maxKey = Math.max(
      0,
      ...[...snapshot.topics, ...snapshot.tombstones].map((t) => Number(t.key.slice(1)))
    );
    if (snapshot.nextKey <= maxKey) {
      issues.push(`nextKey ${snapshot.nextKey} would reuse existing key T${maxKey}`);
    }
    const live = new Set(snapshot.topics.map((t) => t.key));
    if (live.size !== snapshot.topics.length) issues.push("duplicate live topic keys");
    for (const tomb of snapshot.tombstones) {
      if (live.has(tomb.key)) issues.push(`${tomb.key} is both live and tombstoned`);
    }
    for (const edge of snapshot.edges) {
      if (!live.has(edge.source) || !live.has(edge.target) || edge.source === edge.target) {
        issues.push(`edge ${edge.source} → ${edge.target} does not connect two live topics`);
      }
    }
    if (issues.length > 0) {
      throw new InvariantViolationError("Stored topic graph is inconsistent", issues);
    }
    assertPartition(
      snapshot.topics.map((t) => ({ label: t.key, spans: t.spans })),
      "Stored topic graph"
    );
    return new TopicGraph(snapshot);
  }

  snapshot(): GraphSnapshot {
    return {
      contentLength: this.contentLength,
      nextKey: this.nextKey,
      topics: this.list().map((t): Topic => ({
        ...t,
        spans: t.spans.map((s) => ({ ...s })),
        origin: copyOrigin(t.origin),
      })),
      tombstones: [...this.tombstones.values()].map((t) => ({ ...t })),
      edges: this.edgeList.map((e) => ({ ...e })),
      unassigned: this.unassignedSpans.map((s) => ({ ...s })),
    };
  }

  /**
   * Independent copy; mutations on the clone never reach this graph.
   */
  clone(): TopicGraph {
    return new TopicGraph(this.snapshot());
  }

  // ============================================================
  // Queries
  // ============================================================

  get size(): number {
    return this.order.length;
  }

  get length(): number {
    return this.contentLength;
  }

  /** Live topics in display order. */
  list(): readonly Readonly<Topic>[] {
    return this.order.map((key) => this.mustGet(key));
  }

  get(key: string): Readonly<Topic> | undefined {
    return this.topics.get(key);
  }

  has(key: string): boolean {
    return this.topics.has(key);
  }

  tombstone(key: string): Readonly<Tombstone> | undefined {
    return this.tombstones.get(key);
  }

  /**
   * Follow tombstones to the live key that now owns a key's content.
   * Undefined for unknown keys and for keys replaced by re-segmentation.
   */
  resolve(key: string): string | undefined {
    const seen = new Set<string>();
    let current: string | null = key;
    while (current !== null && !seen.has(current)) {
      if (this.topics.has(current)) return current;
      seen.add(current);
      current = this.tombstones.get(current)?.absorbedBy ?? null;
    }
    return undefined;
  }

  unassigned(): readonly TextSpan[] {
    return this.unassignedSpans;
  }

  edges(): readonly HyperlinkEdge[] {
    return this.edgeList;
  }

  edgesFrom(key: string): HyperlinkEdge[] {
    return this.edgeList.filter((edge) => edge.source === key);
  }

  // ============================================================
  // Mutations
  // ============================================================

  /**
   * Replace all live topics with a fresh segmentation.
   *
   * Previous topics become tombstones with reason "resegmented" and all
   * edges are dropped, since they described notes of the old topics.
   *
   * @throws InvariantViolationError if the proposals overlap, fall outside
   *         the content, or leave gaps while gaps are not allowed
   */
  apply(proposals: readonly TopicProposal[], options: ApplyOptions = {}): ApplyResult {
    const at = (options.now ?? new Date()).toISOString();
    const issues = validateProposals(proposals, this.contentLength).map((i) => i.message);
    const gaps = textGaps(
      this.contentLength,
      proposals.flatMap((p) => p.spans)
    );
    if (gaps.length > 0 && !options.allowGaps) {
      issues.push(`content not owned by any topic: ${gaps.map((g) => `[${g.start},${g.end})`).join(", ")}`);
    }
    if (issues.length > 0) {
      throw new InvariantViolationError("Topic proposals do not partition the content", issues);
    }

    const replaced = [...this.order];
    for (const key of replaced) {
      const old = this.mustGet(key);
      this.tombstones.set(
        key,
        Object.freeze({ key, name: old.name, absorbedBy: null, reason: "resegmented", version: old.version, at })
      );
    }
    this.topics.clear();
    this.order = [];
    this.edgeList = [];

    for (const proposal of proposals) {
      const key = this.allocateKey();
      this.topics.set(
        key,
        freezeTopic({
          key,
          name: proposal.name.trim(),
          description: proposal.description.trim(),
          spans: sortSpans(proposal.spans),
          version: 1,
          origin: { kind: "segmentation" },
          createdAt: at,
        })
      );
      this.order.push(key);
    }
    this.unassignedSpans = gaps;

    return { topics: this.list(), unassigned: this.unassignedSpans, replaced };
  }

  /**
   * Replace two or more live topics by one topic owning exactly the union
   * of their spans. The new topic takes a fresh key, sits at the earliest
   * absorbed position, and has version max(absorbed) + 1.
   *
   * Edges are rewritten onto the new key; self-loops are dropped and
   * duplicates keep the highest score.
   *
   * @throws InvariantViolationError on dead keys or a span set that is not
   *         exactly the union of the absorbed topics' spans
   */
  recordMerge(draft: MergeDraft, absorbedKeys: readonly string[], now: Date = new Date()): Readonly<Topic> {
    const absorbed = [...new Set(absorbedKeys)];
    const issues: string[] = [];
    if (absorbed.length < 2) issues.push("a merge needs at least two distinct topics");
    const dead = absorbed.filter((key) => !this.topics.has(key));
    if (dead.length > 0) issues.push(`not live: ${dead.join(", ")}`);
    if (draft.name.trim() === "") issues.push("merged topic has no name");
    if (issues.length > 0) {
      throw new InvariantViolationError("Merge cannot be recorded", issues);
    }

    const sources = absorbed.map((key) => this.mustGet(key));
    const union = sources.flatMap((t) => t.spans);
    if (!sameSpanSet(union, draft.spans)) {
      throw new InvariantViolationError("Merge cannot be recorded", [
        "merged topic must own exactly the union of the absorbed topics' spans",
      ]);
    }

    const at = now.toISOString();
    const key = this.allocateKey();
    const topic = freezeTopic({
      key,
      name: draft.name.trim(),
      description: draft.description.trim(),
      spans: sortSpans(draft.spans),
      version: Math.max(...sources.map((t) => t.version)) + 1,
      origin: { kind: "merge", absorbed: this.order.filter((k) => absorbed.includes(k)) },
      createdAt: at,
    });

    const absorbedSet = new Set(absorbed);
    const position = Math.min(...absorbed.map((k) => this.order.indexOf(k)));
    const order = this.order.filter((k) => !absorbedSet.has(k));
    order.splice(position, 0, key);

    const owners = order.map((k) => (k === key ? topic : this.mustGet(k)));
    assertPartition(
      owners.map((t) => ({ label: t.key, spans: t.spans })),
      `Merge into ${key}`
    );

    for (const source of sources) {
      this.topics.delete(source.key);
      this.tombstones.set(
        source.key,
        Object.freeze({
          key: source.key,
          name: source.name,
          absorbedBy: key,
          reason: "merged",
          version: source.version,
          at,
        })
      );
    }
    this.topics.set(key, topic);
    this.order = order;
    this.edgeList = rewriteEdges(this.edgeList, (k) => (absorbedSet.has(k) ? key : k));

    return topic;
  }

  /**
   * Rename a live topic without changing its content or version.
   */
  rename(key: string, name: string): Readonly<Topic> {
    const topic = this.topics.get(key);
    if (!topic || name.trim() === "") {
      throw new InvariantViolationError("Rename rejected", [
        !topic ? `${key} is not live` : "name is empty",
      ]);
    }
    const renamed = freezeTopic({ ...topic, name: name.trim() });
    this.topics.set(key, renamed);
    return renamed;
  }

  /**
   * Replace every edge leaving `source`.
   *
   * @throws InvariantViolationError if an edge does not leave `source` or
   *         points at a missing topic or at itself
   */
  setOutboundEdges(source: string, edges: readonly HyperlinkEdge[]): void {
    const issues: string[] = [];
    if (!this.topics.has(source)) issues.push(`${source} is not live`);
    for (const edge of edges) {
      if (edge.source !== source) issues.push(`edge ${edge.source} → ${edge.target} does not leave ${source}`);
      if (edge.target === source) issues.push(`${source} cannot link to itself`);
      if (!this.topics.has(edge.target)) issues.push(`link target ${edge.target} is not live`);
    }
    if (issues.length > 0) {
      throw new InvariantViolationError("Hyperlinks rejected", issues);
    }
    const kept = this.edgeList.filter((edge) => edge.source !== source);
    this.edgeList = rewriteEdges([...kept, ...edges.map((e) => ({ ...e }))], (k) => k);
  }

  private allocateKey(): string {
    const key = `T${this.nextKey}`;
    this.nextKey += 1;
    return key;
  }

  private mustGet(key: string): Readonly<Topic> {
    const topic = this.topics.get(key);
    if (!topic) {
      throw new InvariantViolationError("Topic order is out of sync", [`${key} is listed but not stored`]);
    }
    return topic;
  }
}

/**
 * Map edge endpoints, drop self-loops, and collapse duplicate pairs onto
 * the first occurrence (keeping the highest score).
 */
export function rewriteEdges(
  edges: readonly HyperlinkEdge[],
  mapKey: (key: string) => string
): HyperlinkEdge[] {
  const result: HyperlinkEdge[] = [];
  const index = new Map<string, number>();
  for (const edge of edges) {
    const source = mapKey(edge.source);
    const target = mapKey(edge.target);
    if (source === target) continue;
    const pair = `${source}→${target}`;
    const existing = index.get(pair);
    if (existing === undefined) {
      index.set(pair, result.length);
      result.push({ ...edge, source, target });
    } else if (edge.score > result[existing].score) {
      result[existing] = { ...result[existing], score: edge.score };
    }
  }
  return result;
}

function freezeTopic(topic: Topic): Readonly<Topic> {
  const spans = topic.spans.map((s) => Object.freeze({ ...s }));
  const origin = copyOrigin(topic.origin);
  Object.freeze(spans);
  Object.freeze(origin);
  return Object.freeze({ ...topic, spans, origin });
}

function copyOrigin(origin: TopicOrigin): TopicOrigin {
  return origin.kind === "merge"
    ? { kind: "merge", absorbed: [...origin.absorbed] }
    : { kind: "segmentation" };
}
