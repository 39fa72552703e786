/**
 * Enricher that uses the language model itself as the knowledge source.
 */

import type { PromptLibrary } from "../prompts/index.js";
import { EnrichmentUnavailableError, ModelError } from "./errors.js";
import type { Enricher, EnrichmentRequest, LanguageModel } from "./types.js";

export class LanguageModelEnricher implements Enricher {
  readonly name: string;

  constructor(
    private readonly model: LanguageModel,
    private readonly prompts: PromptLibrary
  ) {
    this.name = `${model.name} (background knowledge)`;
  }

  async supplement(request: EnrichmentRequest, signal?: AbortSignal): Promise<string> {
    const prompt = this.prompts.render("supplement", {
      topic: { key: request.topicKey, name: request.topicName, description: "" },
      sourceText: request.summary,
    });

    try {
      return (await this.model.generate({ task: "supplement", prompt, signal })).trim();
    } catch (err) {
      if (err instanceof ModelError) {
        throw new EnrichmentUnavailableError(err.message, err.retriable, { cause: err });
      }
      throw err;
    }
  }
}
