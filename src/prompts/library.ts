/**
 * Named prompt templates used by the engine.
 *
 * One PromptLibrary per engine: templates are parsed once and cached by
 * the directory, only the context changes per call.
 */

import { fileURLToPath } from "node:url";

import { buildPromptContext, type PromptContextInput } from "./context.js";
import type { PromptConstraints } from "./constraints.js";
import { TemplateDirectory, TemplateLoadError } from "./loader.js";
import { renderPrompt } from "./renderer.js";

export type PromptName = "segment" | "summarize" | "merge-name" | "revise" | "supplement";

export const PROMPT_NAMES: readonly PromptName[] = [
  "segment",
  "summarize",
  "merge-name",
  "revise",
  "supplement",
];

/** Templates shipped with the package, at <root>/prompts. */
export const DEFAULT_PROMPTS_DIR = fileURLToPath(new URL("../../prompts/", import.meta.url));

export class PromptLibrary {
  private readonly templates: TemplateDirectory;

  constructor(baseDir: string = DEFAULT_PROMPTS_DIR) {
    this.templates = new TemplateDirectory(baseDir);
  }

  get baseDir(): string {
    return this.templates.baseDir;
  }

  /**
   * Load and validate every named template up front.
   *
   * @throws TemplateLoadError naming every missing template
   * @throws TemplateParseError / ConditionalParseError
   */
  preload(): this {
    const missing = this.templates.missing(PROMPT_NAMES);
    if (missing.length > 0) {
      throw new TemplateLoadError(
        this.templates.baseDir,
        `Missing prompt template(s) in ${this.templates.baseDir}: ${missing.join(", ")}`
      );
    }
    for (const name of PROMPT_NAMES) {
      this.templates.get(name);
    }
    return this;
  }

  render(name: PromptName, input: PromptContextInput, constraints?: PromptConstraints): string {
    return renderPrompt(this.templates.get(name), buildPromptContext(input), { strict: false, constraints });
  }
}
