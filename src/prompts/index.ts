/**
 * Prompt template system.
 *
 * Provides typed, validated prompt template loading and rendering for the
 * engine's model calls. Templates use `{{variable}}` placeholders and
 * `{{#if …}}…{{/if}}` conditional blocks that are validated against a typed
 * context derived from the domain model.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * ```typescript
 * import { PromptLibrary, buildSegmentationConstraints } from "./prompts/index.js";
 *
 * const prompts = new PromptLibrary().preload();
 *
 * const prompt = prompts.render(
 *   "segment",
 *   { hint, blocks },
 *   buildSegmentationConstraints(blocks.length)
 * );
 * ```
 *
 * The template directory, parser and renderer are exported for tooling
 * such as the CLI preview command.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CONDITIONAL SYNTAX
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   Truthy:     {{#if variable}}body{{/if}}
 *   Equality:   {{#if variable == "value"}}body{{/if}}
 *   Inequality: {{#if variable != "value"}}body{{/if}}
 *
 * See conditional.ts for full documentation.
 */

// Context
export {
  buildPromptContext,
  formatNoteBody,
  isUnset,
  type BlockPreview,
  type PromptContext,
  type PromptContextMap,
  type PromptContextInput,
  type PromptVariable,
} from "./context.js";

// Template parsing
export {
  parseTemplate,
  extractVariables,
  isValidVariable,
  getValidVariables,
  TemplateParseError,
  type ParsedTemplate,
} from "./template.js";

// Rendering
export {
  renderPrompt,
  PromptRenderError,
  UnusedVariableError,
  type RenderOptions,
} from "./renderer.js";

// Loader
export {
  TemplateDirectory,
  TemplateLoadError,
  TEMPLATE_EXTENSIONS,
} from "./loader.js";

// Conditionals
export {
  parseConditionalBlocks,
  evaluateCondition,
  resolveConditionals,
  getEnumValues,
  ConditionalParseError,
  type ConditionalBlock,
  type ConditionalOperator,
} from "./conditional.js";

// Constraints
export {
  buildSegmentationConstraints,
  buildRevisionConstraints,
  formatConstraints,
  countConstraints,
  type ConstraintRule,
  type PromptConstraints,
} from "./constraints.js";

// Named templates
export {
  PromptLibrary,
  PROMPT_NAMES,
  DEFAULT_PROMPTS_DIR,
  type PromptName,
} from "./library.js";
