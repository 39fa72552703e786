/**
 * Parsing of JSON answers from a language model.
 *
 * Models wrap JSON in code fences or add a sentence before it, so the
 * object is taken from the first "{" to the last "}" before parsing.
 */

import type { ZodType, ZodTypeDef } from "zod";

export type ModelJsonResult<T> =
  | { success: true; data: T }
  | { success: false; issues: string[] };

export function extractJsonObject(raw: string): string | undefined {
  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start === -1 || end <= start) return undefined;
  return raw.slice(start, end + 1);
}

export function parseModelJson<T>(
  raw: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): ModelJsonResult<T> {
  const json = extractJsonObject(raw);
  if (json === undefined) {
    return { success: false, issues: ["Response does not contain a JSON object"] };
  }

  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (err) {
    return {
      success: false,
      issues: [`Response is not valid JSON: ${err instanceof Error ? err.message : String(err)}`],
    };
  }

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    return {
      success: false,
      issues: parsed.error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${path}: ${issue.message}`;
      }),
    };
  }
  return { success: true, data: parsed.data };
}
