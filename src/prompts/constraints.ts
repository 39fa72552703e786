/**
 * Prompt constraint generation and injection.
 *
 * PromptConstraints are rules built in code and appended to rendered
 * prompts. They restate what the engine checks in the model's answer, so
 * they live here rather than in the editable template files.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CONSTRAINT SOURCES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   Block count of the document        → partition rules for segmentation
 *   Previous attempt's rejected issues → restated on corrective re-prompts
 *   Note being revised                 → revision scope rules
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * A single constraint rule with a category label.
 */
export interface ConstraintRule {
  /** Which aspect this constraint governs. */
  category: "format" | "partition" | "scope" | "correction";
  /** The constraint text, written as a directive. */
  text: string;
}

/**
 * The complete set of constraints for a single render.
 *
 *   - `universal`: apply to every prompt of the task
 *   - `directional`: apply to this particular call (a retry, a note)
 *
 * Both groups are injected together. The separation is for testing
 * and introspection only; at render time they are concatenated.
 */
export interface PromptConstraints {
  universal: readonly ConstraintRule[];
  directional: readonly ConstraintRule[];
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

/**
 * Partition rules for a segmentation prompt over `blockCount` blocks.
 *
 * When `retry` is set, the rules are restated as corrections so the model
 * sees that its previous answer broke them.
 */
export function buildSegmentationConstraints(blockCount: number, retry = false): PromptConstraints {
  const last = Math.max(0, blockCount - 1);
  const universal: ConstraintRule[] = [
    { category: "format", text: "Respond with a single JSON object and nothing else." },
    {
      category: "partition",
      text: `Every block index from 0 to ${last} MUST appear in exactly one topic.`,
    },
    { category: "partition", text: "A block MUST NOT appear in more than one topic." },
    { category: "partition", text: `Only use block indexes between 0 and ${last}.` },
    { category: "partition", text: "Every topic MUST contain at least one block." },
  ];

  const directional: ConstraintRule[] = retry
    ? [
        {
          category: "correction",
          text: "Your previous answer broke the rules above. Reassign blocks so that each index is used exactly once.",
        },
      ]
    : [];

  return Object.freeze({
    universal: Object.freeze(universal),
    directional: Object.freeze(directional),
  });
}

/**
 * Scope rules for revising one note.
 */
export function buildRevisionConstraints(topicName: string): PromptConstraints {
  const universal: ConstraintRule[] = [
    { category: "format", text: "Respond with a single JSON object and nothing else." },
    {
      category: "scope",
      text: `Only edit the note about "${topicName}". Do not add material about other topics.`,
    },
    {
      category: "scope",
      text: "Keep every section you were not asked to change word for word.",
    },
  ];

  return Object.freeze({
    universal: Object.freeze(universal),
    directional: Object.freeze([]),
  });
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/** Section heading used when injecting constraints into prompts. */
const CONSTRAINTS_HEADING = "## Constraints";

/** Subheading for universal constraints. */
const UNIVERSAL_SUBHEADING = "### Rules";

/** Subheading for directional constraints. */
const DIRECTIONAL_SUBHEADING = "### For This Answer";

/**
 * Format PromptConstraints as a markdown string for prompt injection.
 *
 * The output is deterministic: same constraints → same string, always.
 */
export function formatConstraints(constraints: PromptConstraints): string {
  const lines: string[] = [CONSTRAINTS_HEADING, ""];

  if (constraints.universal.length > 0) {
    lines.push(UNIVERSAL_SUBHEADING, "");
    for (const rule of constraints.universal) {
      lines.push(`- [${rule.category}] ${rule.text}`);
    }
    lines.push("");
  }

  if (constraints.directional.length > 0) {
    lines.push(DIRECTIONAL_SUBHEADING, "");
    for (const rule of constraints.directional) {
      lines.push(`- [${rule.category}] ${rule.text}`);
    }
    lines.push("");
  }

  if (constraints.universal.length === 0 && constraints.directional.length === 0) {
    lines.push("No additional constraints.", "");
  }

  return lines.join("\n");
}

/**
 * Get the total number of constraint rules.
 */
export function countConstraints(constraints: PromptConstraints): number {
  return constraints.universal.length + constraints.directional.length;
}
