/**
 * Prompt template parsing.
 *
 *   {{topic.name}}                       substitution
 *   {{ hint.maxTopics }}                 inner whitespace is ignored
 *   {{#if hint.level == "micro"}}…{{/if}}  conditional block (nesting is rejected)
 *   {{#if correction.issues}}…{{/if}}      truthy check
 *
 * Every placeholder and condition must name a variable of
 * PromptContextMap; enum comparisons must use an allowed value. Both are
 * checked when the template is parsed, not when it is rendered.
 */

import type { PromptContextMap, PromptVariable } from "./context.js";
import { parseConditionalBlocks, type ConditionalBlock } from "./conditional.js";

export interface ParsedTemplate {
  source: string;
  /** Placeholder names, deduplicated and sorted */
  variables: PromptVariable[];
  conditionals: ConditionalBlock[];
  name?: string;
}

export class TemplateParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly invalidVariables: string[]
  ) {
    super(`Template "${templateName}" references unknown variable(s): ${invalidVariables.join(", ")}`);
    this.name = "TemplateParseError";
  }
}

// Keyed by PromptContextMap so a variable added there cannot be missed here.
const VARIABLES = {
  "hint.granularity": true,
  "hint.level": true,
  "hint.description": true,
  "hint.minTopics": true,
  "hint.maxTopics": true,
  "content.blockCount": true,
  "content.lastBlock": true,
  "content.blocks": true,
  "correction.issues": true,
  "topic.key": true,
  "topic.name": true,
  "topic.description": true,
  "topic.source": true,
  "merge.topics": true,
  "note.title": true,
  "note.format": true,
  "note.body": true,
  "revision.instruction": true,
  "revision.history": true,
} as const satisfies Record<keyof PromptContextMap, true>;

const VALID_VARIABLES: ReadonlySet<string> = new Set(Object.keys(VARIABLES));

export function isValidVariable(name: string): name is PromptVariable {
  return VALID_VARIABLES.has(name);
}

/** Every legal variable name, sorted. */
export function getValidVariables(): PromptVariable[] {
  return [...VALID_VARIABLES].filter(isValidVariable).sort();
}

const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z][a-zA-Z0-9_.]*)\s*\}\}/g;

/** Placeholder names in `source`, deduplicated and sorted. */
export function extractVariables(source: string): string[] {
  const found = new Set<string>();
  for (const match of source.matchAll(PLACEHOLDER_RE)) {
    found.add(match[1]);
  }
  return [...found].sort();
}

/**
 * @throws TemplateParseError if a placeholder names an unknown variable
 * @throws ConditionalParseError if a condition is malformed or names an unknown variable or value
 */
export function parseTemplate(source: string, name?: string): ParsedTemplate {
  const label = name ?? "(anonymous)";
  const conditionals = parseConditionalBlocks(source, label, isValidVariable);

  const names = extractVariables(source);
  const invalid = names.filter((variable) => !isValidVariable(variable));
  if (invalid.length > 0) {
    throw new TemplateParseError(label, invalid);
  }

  return { source, variables: names.filter(isValidVariable), conditionals, name };
}
