/**
 * Prompt renderer.
 *
 *   template ─► {{#if}} blocks ─► placeholder check ─► substitution ─► + constraints
 *
 * Conditional blocks are resolved first, so placeholders inside an
 * excluded block never need a value. Blank-line runs left behind by
 * excluded blocks are squeezed to one empty line. Constraints are appended
 * after everything else; a template cannot drop or reorder them.
 */

import type { ParsedTemplate } from "./template.js";
import { extractVariables, getValidVariables, isValidVariable } from "./template.js";
import { isUnset, type PromptContext } from "./context.js";
import { resolveConditionals } from "./conditional.js";
import { formatConstraints, type PromptConstraints } from "./constraints.js";

export class PromptRenderError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly missingVariables: string[]
  ) {
    super(`Cannot render prompt "${templateName}": no value for ${missingVariables.join(", ")}`);
    this.name = "PromptRenderError";
  }
}

export class UnusedVariableError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly unusedVariables: string[]
  ) {
    super(`Prompt "${templateName}" ignores context variable(s): ${unusedVariables.join(", ")}`);
    this.name = "UnusedVariableError";
  }
}

export interface RenderOptions {
  /**
   * Fail when the context sets a variable the template never reads.
   * Defaults to true; the engine renders with `false` because one context
   * type serves every prompt.
   */
  strict?: boolean;
  constraints?: PromptConstraints;
}

const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z][a-zA-Z0-9_.]*)\s*\}\}/g;
const BLANK_RUN_RE = /\n{3,}/g;

/**
 * @throws PromptRenderError if a remaining placeholder has no value
 * @throws UnusedVariableError in strict mode, if a set variable is never read
 */
export function renderPrompt(template: ParsedTemplate, context: PromptContext, options: RenderOptions = {}): string {
  const { strict = true, constraints } = options;
  const name = template.name ?? "(anonymous)";

  const text =
    template.conditionals.length > 0
      ? resolveConditionals(template.source, context).replace(BLANK_RUN_RE, "\n\n")
      : template.source;
  const placeholders = extractVariables(text);

  const missing = placeholders.filter((variable) => valueOf(context, variable) === undefined);
  if (missing.length > 0) {
    throw new PromptRenderError(name, missing);
  }

  if (strict) {
    const read = new Set([...placeholders, ...template.conditionals.map((block) => block.variable)]);
    const unused = getValidVariables().filter((variable) => !read.has(variable) && !isUnset(context[variable]));
    if (unused.length > 0) {
      throw new UnusedVariableError(name, unused);
    }
  }

  const rendered = text.replace(PLACEHOLDER_RE, (_match, variable: string) => valueOf(context, variable) ?? "");
  return constraints ? `${rendered}\n${formatConstraints(constraints)}` : rendered;
}

function valueOf(context: PromptContext, variable: string): string | undefined {
  if (!isValidVariable(variable)) return undefined;
  const value = context[variable];
  return isUnset(value) ? undefined : value;
}
