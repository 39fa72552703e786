/**
 * Gemini adapter: LanguageModel and ImageAnalyzer backed by
 * @google/generative-ai.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  type GenerativeModel,
  type Part,
} from "@google/generative-ai";

import type { MediaReference } from "../documents/schema.js";
import { AnalysisUnavailableError, ModelError } from "./errors.js";
import type { ImageAnalyzer, LanguageModel, ModelRequest, ModelTask } from "./types.js";

export interface GeminiOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

/** Tasks whose prompts ask for a JSON answer. */
const JSON_TASKS: ReadonlySet<ModelTask> = new Set(["segment", "summarize", "merge-name", "revise"]);

const IMAGE_MIME_TYPES: Readonly<Record<string, string>> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
};

const DESCRIBE_IMAGE_PROMPT =
  "Describe this figure from a student's study material. Explain what it shows and " +
  "which concepts it illustrates, in at most 120 words. Answer with plain text.";

export class GeminiLanguageModel implements LanguageModel, ImageAnalyzer {
  readonly name = "gemini";
  private readonly jsonModel: GenerativeModel;
  private readonly textModel: GenerativeModel;

  constructor(options: GeminiOptions) {
    const genAI = new GoogleGenerativeAI(options.apiKey);
    const generationConfig = {
      temperature: options.temperature ?? 0.2,
      topP: 0.95,
      topK: 40,
      maxOutputTokens: options.maxOutputTokens ?? 8192,
    };
    const model = options.model ?? "gemini-1.5-pro";
    this.jsonModel = genAI.getGenerativeModel({
      model,
      generationConfig: { ...generationConfig, responseMimeType: "application/json" },
    });
    this.textModel = genAI.getGenerativeModel({ model, generationConfig });
  }

  async generate(request: ModelRequest): Promise<string> {
    const parts: Part[] = [
      { text: request.prompt },
      ...(request.images ?? []).map((image) => ({
        inlineData: { data: image.data, mimeType: image.mimeType },
      })),
    ];
    const model = JSON_TASKS.has(request.task) ? this.jsonModel : this.textModel;

    try {
      const result = await model.generateContent(parts, { signal: request.signal });
      const text = result.response.text();
      if (text.trim() === "") {
        throw new ModelError("Gemini returned an empty response", true);
      }
      return text;
    } catch (err) {
      throw toModelError(err);
    }
  }

  async describe(image: MediaReference, signal?: AbortSignal): Promise<string> {
    const mimeType = image.mimeType ?? IMAGE_MIME_TYPES[extname(image.ref).toLowerCase()];
    if (image.kind !== "image" || mimeType === undefined) {
      throw new AnalysisUnavailableError(`Unsupported image: ${image.ref}`);
    }

    let data: string;
    try {
      data = (await readFile(image.ref)).toString("base64");
    } catch (err) {
      throw new AnalysisUnavailableError(`Cannot read image ${image.ref}`, false, { cause: err });
    }

    const prompt = image.caption
      ? `${DESCRIBE_IMAGE_PROMPT}\nThe figure is captioned: "${image.caption}".`
      : DESCRIBE_IMAGE_PROMPT;

    try {
      return (
        await this.generate({ task: "describe-image", prompt, images: [{ data, mimeType }], signal })
      ).trim();
    } catch (err) {
      if (err instanceof ModelError) {
        throw new AnalysisUnavailableError(err.message, err.retriable, { cause: err });
      }
      throw err;
    }
  }
}

/**
 * Classify a Gemini SDK failure. Rate limits, server errors and aborted
 * requests are retriable; blocked prompts and bad requests are not.
 */
export function toModelError(err: unknown): ModelError {
  if (err instanceof ModelError) return err;
  if (err instanceof GoogleGenerativeAIFetchError) {
    const status = err.status;
    const retriable = status === undefined || status === 429 || status >= 500;
    return new ModelError(err.message, retriable, { cause: err, status });
  }
  if (err instanceof Error && err.name === "AbortError") {
    return new ModelError("Gemini request was aborted", true, { cause: err });
  }
  return new ModelError(err instanceof Error ? err.message : String(err), false, { cause: err });
}
