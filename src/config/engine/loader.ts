/**
 * Engine configuration loader and validator.
 *
 * Responsible for:
 * - Merging partial overrides onto the defaults
 * - Validating against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing configuration to enforce immutability
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import {
  EngineConfigSchema,
  EngineConfigOverridesSchema,
  type EngineConfig,
  type EngineConfigOverrides,
} from "./schema.js";
import { DEFAULT_ENGINE_CONFIG } from "./defaults.js";

/**
 * Structured validation error for engine configuration.
 */
export class EngineConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "EngineConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Engine configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "invalid_json" for unreadable files */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate and load a complete engine configuration.
 *
 * @throws EngineConfigError if validation fails
 */
export function loadEngineConfig(input: unknown): Readonly<EngineConfig> {
  const result = EngineConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new EngineConfigError(
      `Invalid engine configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate engine configuration without loading.
 */
export function validateEngineConfig(input: unknown): {
  success: boolean;
  config?: EngineConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = EngineConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Merge section-level overrides onto a base configuration and validate
 * the result.
 *
 * @example
 *   const config = resolveEngineConfig({ hyperlinks: { maxOutDegree: 3 } });
 */
export function resolveEngineConfig(
  overrides: EngineConfigOverrides = {},
  base: EngineConfig = DEFAULT_ENGINE_CONFIG
): Readonly<EngineConfig> {
  return loadEngineConfig({
    granularity: { ...base.granularity, ...overrides.granularity },
    segmentation: { ...base.segmentation, ...overrides.segmentation },
    collaborators: { ...base.collaborators, ...overrides.collaborators },
    synthesis: { ...base.synthesis, ...overrides.synthesis },
    enrichment: { ...base.enrichment, ...overrides.enrichment },
    hyperlinks: { ...base.hyperlinks, ...overrides.hyperlinks },
    revision: { ...base.revision, ...overrides.revision },
  });
}

/**
 * Read overrides from a JSON file and resolve them onto the defaults.
 *
 * @throws EngineConfigError if the file is unreadable, not JSON, or invalid
 */
export function loadEngineConfigFile(filePath: string): Readonly<EngineConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new EngineConfigError(`Cannot read engine configuration: ${filePath}`, [
      {
        path: [],
        message: err instanceof Error ? err.message : String(err),
        code: "invalid_json",
      },
    ]);
  }

  const parsed = EngineConfigOverridesSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error.issues);
    throw new EngineConfigError(
      `Invalid engine configuration in ${filePath}: ${issues.length} validation error(s)`,
      issues
    );
  }

  return resolveEngineConfig(parsed.data);
}
