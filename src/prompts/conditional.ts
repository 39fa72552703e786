/**
 * Conditional blocks in prompt templates.
 *
 *   {{#if correction.issues}}…{{/if}}       non-empty and set
 *   {{#if hint.level == "macro"}}…{{/if}}   equal to a literal
 *   {{#if note.format != "latex"}}…{{/if}}  not equal (an unset value is never equal)
 *
 * Blocks do not nest and have no else branch. Comparisons against
 * hint.level and note.format must use one of the enum's values.
 */

import { isUnset, type PromptVariable } from "./context.js";
import { GranularityLevel, NoteFormat } from "../config/engine/enums.js";

export type ConditionalOperator = "==" | "!=" | "truthy";

export interface ConditionalBlock {
  variable: PromptVariable;
  operator: ConditionalOperator;
  /** Literal compared against; unset for truthy checks */
  value?: string;
  body: string;
}

export class ConditionalParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly issues: string[]
  ) {
    super(`Template "${templateName}" has invalid conditional(s):\n  - ${issues.join("\n  - ")}`);
    this.name = "ConditionalParseError";
  }
}

const ENUM_VALUES: Partial<Record<PromptVariable, readonly string[]>> = {
  "hint.level": GranularityLevel.options,
  "note.format": NoteFormat.options,
};

/** Allowed comparison values of a variable, when it is an enum. */
export function getEnumValues(variable: PromptVariable): readonly string[] | undefined {
  return ENUM_VALUES[variable];
}

interface Condition {
  variable: string;
  operator: ConditionalOperator;
  value?: string;
}

const TAG_RE = /\{\{(?:#if\s+([^}]*?)|\/if)\s*\}\}/g;
const BLOCK_RE = /\{\{#if\s+([^}]*?)\s*\}\}([\s\S]*?)\{\{\/if\}\}/g;
const CONDITION_RE = /^([a-zA-Z][a-zA-Z0-9_.]*)(?:\s*(==|!=)\s*"([^"]*)")?$/;

function parseCondition(text: string): Condition | undefined {
  const match = CONDITION_RE.exec(text.trim());
  if (!match) return undefined;
  const [, variable, operator, value] = match;
  return operator === "==" || operator === "!="
    ? { variable, operator, value }
    : { variable, operator: "truthy" };
}

/**
 * Scan the `{{#if}}`/`{{/if}}` tags of a template and validate each block.
 *
 * @throws ConditionalParseError listing every problem found
 */
export function parseConditionalBlocks(
  source: string,
  templateName: string,
  isValidVar: (name: string) => name is PromptVariable
): ConditionalBlock[] {
  const blocks: ConditionalBlock[] = [];
  const issues: string[] = [];
  let opened = 0;
  let closed = 0;
  let open: { condition: string; bodyStart: number; nested: boolean } | undefined;

  for (const tag of source.matchAll(TAG_RE)) {
    const start = tag.index ?? 0;
    const condition = tag[1];

    if (condition !== undefined) {
      opened++;
      if (open) {
        if (!open.nested) {
          const outer = parseCondition(open.condition)?.variable ?? open.condition;
          issues.push(`Nested conditionals are not supported (found {{#if inside {{#if ${outer}…}})`);
        }
        open.nested = true;
        continue;
      }
      open = { condition, bodyStart: start + tag[0].length, nested: false };
      continue;
    }

    closed++;
    if (!open) continue;
    if (open.nested && opened - closed > 0) continue;

    const current = open;
    open = undefined;
    if (current.nested) continue;

    const parsed = parseCondition(current.condition);
    if (!parsed) {
      issues.push(`Malformed condition "${current.condition}"`);
      continue;
    }
    const { variable, operator, value } = parsed;
    if (!isValidVar(variable)) {
      issues.push(`Unknown variable "${variable}" in conditional`);
      continue;
    }
    const allowed = ENUM_VALUES[variable];
    if (value !== undefined && allowed && !allowed.includes(value)) {
      issues.push(`Invalid value "${value}" for "${variable}" (allowed: ${[...allowed].sort().join(", ")})`);
      continue;
    }
    blocks.push({ variable, operator, value, body: source.slice(current.bodyStart, start) });
  }

  if (opened !== closed) {
    issues.push(`Mismatched conditional tags: ${opened} opening {{#if}}, ${closed} closing {{/if}}`);
  }
  if (issues.length > 0) {
    throw new ConditionalParseError(templateName, issues);
  }
  return blocks;
}

/**
 * An unset value fails truthy and == checks and passes != checks.
 */
export function evaluateCondition(block: Pick<ConditionalBlock, "operator" | "value">, contextValue: string): boolean {
  if (isUnset(contextValue)) return block.operator === "!=";
  switch (block.operator) {
    case "truthy":
      return contextValue !== "";
    case "==":
      return contextValue === block.value;
    case "!=":
      return contextValue !== block.value;
  }
}

/**
 * Replace every block with its body or nothing. Blocks naming a variable
 * the context does not have are dropped.
 */
export function resolveConditionals(source: string, context: Readonly<Record<PromptVariable, string>>): string {
  return source.replace(BLOCK_RE, (_raw, text: string, body: string) => {
    const condition = parseCondition(text);
    if (!condition || !hasVariable(context, condition.variable)) return "";
    return evaluateCondition(condition, context[condition.variable]) ? body : "";
  });
}

function hasVariable(
  context: Readonly<Record<PromptVariable, string>>,
  name: string
): name is PromptVariable {
  return Object.prototype.hasOwnProperty.call(context, name);
}
