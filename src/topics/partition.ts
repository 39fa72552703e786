/**
 * Partition validators.
 *
 * Validation does not throw by itself: it returns structured issues that
 * say which owners collide and where. Callers decide whether the issues
 * are a model mistake to re-prompt about (segmentation) or a bug that must
 * abort the mutation (graph operations).
 *
 * USAGE:
 *   const issues = validateProposals(proposals, content.length);
 *   if (issues.length > 0) {
 *     console.log(formatPartitionIssues(issues));
 *   }
 */

import { InvariantViolationError } from "../errors/index.js";
import {
  describeSpan,
  isEmptySpan,
  spanEnd,
  spanLane,
  spanStart,
  type SourceSpan,
} from "./spans.js";

export type PartitionRule = "EMPTY_NAME" | "NO_SPANS" | "EMPTY_SPAN" | "OUT_OF_BOUNDS" | "OVERLAP";

export interface PartitionIssue {
  rule: PartitionRule;
  message: string;
  /** Owners involved, by label (topic key or proposal name) */
  owners: string[];
}

/**
 * Anything that claims spans: a live topic or a proposal.
 */
export interface SpanOwner {
  label: string;
  spans: readonly SourceSpan[];
}

interface LaneEntry {
  owner: string;
  span: SourceSpan;
}

/**
 * Report overlaps, at least one per overlapping region.
 *
 * Sweep per lane: sorted by start, each span is compared with the
 * furthest-reaching span seen before it, so a region covered by three
 * owners may report only two of the pairs.
 */
export function findOverlaps(owners: readonly SpanOwner[]): PartitionIssue[] {
  const lanes = new Map<string, LaneEntry[]>();
  for (const owner of owners) {
    for (const span of owner.spans) {
      const lane = spanLane(span);
      const entries = lanes.get(lane) ?? [];
      entries.push({ owner: owner.label, span });
      lanes.set(lane, entries);
    }
  }

  const issues: PartitionIssue[] = [];
  const reported = new Set<string>();

  for (const entries of lanes.values()) {
    entries.sort((a, b) => spanStart(a.span) - spanStart(b.span) || spanEnd(a.span) - spanEnd(b.span));
    let reach: LaneEntry | undefined;
    for (const entry of entries) {
      if (isEmptySpan(entry.span)) continue;
      if (reach && spanStart(entry.span) < spanEnd(reach.span)) {
        const pair = [reach.owner, entry.owner].sort().join("|");
        if (!reported.has(pair)) {
          reported.add(pair);
          issues.push({
            rule: "OVERLAP",
            message:
              reach.owner === entry.owner
                ? `"${entry.owner}" claims ${describeSpan(entry.span)} twice`
                : `"${reach.owner}" ${describeSpan(reach.span)} overlaps "${entry.owner}" ${describeSpan(entry.span)}`,
            owners: reach.owner === entry.owner ? [entry.owner] : [reach.owner, entry.owner],
          });
        }
      }
      if (!reach || spanEnd(entry.span) > spanEnd(reach.span)) {
        reach = entry;
      }
    }
  }

  return issues;
}

/**
 * Validate a full replacement set of topic proposals against the content.
 */
export function validateProposals(
  proposals: readonly { name: string; spans: readonly SourceSpan[] }[],
  contentLength: number
): PartitionIssue[] {
  const issues: PartitionIssue[] = [];

  proposals.forEach((proposal, index) => {
    const label = proposal.name.trim() || `#${index}`;
    if (proposal.name.trim() === "") {
      issues.push({ rule: "EMPTY_NAME", message: `Proposal #${index} has no name`, owners: [label] });
    }
    if (proposal.spans.length === 0) {
      issues.push({ rule: "NO_SPANS", message: `"${label}" owns no content`, owners: [label] });
    }
    for (const span of proposal.spans) {
      if (isEmptySpan(span)) {
        issues.push({
          rule: "EMPTY_SPAN",
          message: `"${label}" has an empty span ${describeSpan(span)}`,
          owners: [label],
        });
      }
      if (span.kind === "text" && span.end > contentLength) {
        issues.push({
          rule: "OUT_OF_BOUNDS",
          message: `"${label}" span ${describeSpan(span)} exceeds content length ${contentLength}`,
          owners: [label],
        });
      }
    }
  });

  issues.push(
    ...findOverlaps(proposals.map((p, index) => ({ label: p.name.trim() || `#${index}`, spans: p.spans })))
  );
  return issues;
}

/**
 * Throw if any two owners overlap.
 *
 * @throws InvariantViolationError
 */
export function assertPartition(owners: readonly SpanOwner[], context: string): void {
  const issues = findOverlaps(owners);
  if (issues.length > 0) {
    throw new InvariantViolationError(
      `${context}: live topics overlap`,
      issues.map((issue) => issue.message)
    );
  }
}

export function formatPartitionIssues(issues: readonly PartitionIssue[]): string {
  return issues.map((issue) => `[${issue.rule}] ${issue.message}`).join("\n");
}
