/**
 * Template directory: prompt templates looked up by name.
 *
 *   prompts/
 *     segment.md       → "segment"
 *     summarize.md     → "summarize"
 *     notes.txt        → "notes"
 *
 * A name resolves to `<name>.md`, falling back to `<name>.txt`. Each
 * template is read and parsed on first use and kept for the lifetime of
 * the directory object.
 */

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { extname, join, resolve } from "node:path";

import { parseTemplate, type ParsedTemplate } from "./template.js";

export class TemplateLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message: string
  ) {
    super(message);
    this.name = "TemplateLoadError";
  }
}

/** Lookup order of template file extensions. */
export const TEMPLATE_EXTENSIONS = [".md", ".txt"] as const;

const NAME_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

export class TemplateDirectory {
  readonly baseDir: string;
  private readonly parsed = new Map<string, ParsedTemplate>();

  /**
   * @throws TemplateLoadError if the directory does not exist
   */
  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);
    if (!existsSync(this.baseDir) || !statSync(this.baseDir).isDirectory()) {
      throw new TemplateLoadError(this.baseDir, `Prompt directory does not exist: ${this.baseDir}`);
    }
  }

  /** File a template name resolves to, if any. */
  fileFor(name: string): string | undefined {
    if (!NAME_PATTERN.test(name)) return undefined;
    for (const ext of TEMPLATE_EXTENSIONS) {
      const path = join(this.baseDir, `${name}${ext}`);
      if (existsSync(path) && statSync(path).isFile()) return path;
    }
    return undefined;
  }

  /**
   * @throws TemplateLoadError if no file exists for the name
   * @throws TemplateParseError / ConditionalParseError if the file is invalid
   */
  get(name: string): ParsedTemplate {
    const cached = this.parsed.get(name);
    if (cached) return cached;

    const path = this.fileFor(name);
    if (path === undefined) {
      throw new TemplateLoadError(
        join(this.baseDir, name),
        `No template named "${name}" in ${this.baseDir} (looked for ${TEMPLATE_EXTENSIONS.map((ext) => name + ext).join(", ")})`
      );
    }

    const template = parseTemplate(readFileSync(path, "utf-8"), name);
    this.parsed.set(name, template);
    return template;
  }

  /** Names of the given templates that have no file. */
  missing(names: readonly string[]): string[] {
    return names.filter((name) => this.fileFor(name) === undefined);
  }

  /** Template names present in the directory, sorted. */
  names(): string[] {
    const names = new Set<string>();
    for (const entry of readdirSync(this.baseDir)) {
      const ext = extname(entry).toLowerCase();
      const name = entry.slice(0, -ext.length);
      if (TEMPLATE_EXTENSIONS.some((known) => known === ext) && this.fileFor(name) !== undefined) {
        names.add(name);
      }
    }
    return [...names].sort();
  }
}
