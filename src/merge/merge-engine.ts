/**
 * MergeEngine: folds two or more live topics into one.
 *
 * The merged topic owns exactly the union of the absorbed topics' spans,
 * so the partition is preserved by construction. The model only proposes
 * a name; when it is unavailable or answers badly, the absorbed names are
 * joined with " & " and the merge goes ahead.
 */

import { z } from "zod";

import type { EngineConfig } from "../config/engine/schema.js";
import { CollaboratorError, MergeTargetInvalidError } from "../errors/index.js";
import type { Logger } from "../logging/index.js";
import type { PromptLibrary } from "../prompts/index.js";
import type { TopicGraph } from "../topics/graph.js";
import type { Topic } from "../topics/schema.js";
import { invokeCollaborator } from "../collaborators/invoke.js";
import { parseModelJson } from "../collaborators/json.js";
import type { LanguageModel } from "../collaborators/types.js";

export interface MergeEngineDeps {
  model: LanguageModel;
  prompts: PromptLibrary;
  config: Pick<EngineConfig, "collaborators">;
  logger: Logger;
}

export interface MergeOutcome {
  topic: Readonly<Topic>;
  /** Absorbed keys, in the graph's display order */
  absorbed: string[];
  nameSource: "model" | "fallback";
}

const MergeNameSchema = z.object({
  name: z.string().trim().min(1).max(200),
  description: z.string().trim().default(""),
});

export interface MergeName {
  name: string;
  description: string;
}

export class MergeEngine {
  constructor(private readonly deps: MergeEngineDeps) {}

  /**
   * Check that `keys` name at least two distinct live topics.
   *
   * @returns the live topics in display order
   * @throws MergeTargetInvalidError
   */
  validate(graph: TopicGraph, keys: readonly string[]): Readonly<Topic>[] {
    const unique = [...new Set(keys)];
    if (unique.length < 2) {
      throw new MergeTargetInvalidError("Select at least two different topics to merge.", keys);
    }

    const invalid = unique.filter((key) => !graph.has(key));
    if (invalid.length > 0) {
      const details = invalid.map((key) => {
        const tomb = graph.tombstone(key);
        if (!tomb) return `${key} (unknown)`;
        return tomb.absorbedBy !== null
          ? `${key} (merged into ${graph.resolve(key) ?? tomb.absorbedBy})`
          : `${key} (replaced by re-segmentation)`;
      });
      throw new MergeTargetInvalidError(`Cannot merge topics that are not live: ${details.join(", ")}`, invalid);
    }

    return graph.list().filter((topic) => unique.includes(topic.key));
  }

  async merge(graph: TopicGraph, keys: readonly string[], options: { signal?: AbortSignal; now?: Date } = {}): Promise<MergeOutcome> {
    const topics = this.validate(graph, keys);
    const { name, source } = await this.proposeName(topics, options.signal);

    const topic = graph.recordMerge(
      { name: name.name, description: name.description, spans: topics.flatMap((t) => t.spans) },
      topics.map((t) => t.key),
      options.now
    );

    this.deps.logger.info("Topics merged", {
      absorbed: topics.map((t) => t.key),
      key: topic.key,
      version: topic.version,
      nameSource: source,
    });

    return { topic, absorbed: topics.map((t) => t.key), nameSource: source };
  }

  private async proposeName(
    topics: readonly Readonly<Topic>[],
    signal: AbortSignal | undefined
  ): Promise<{ name: MergeName; source: "model" | "fallback" }> {
    const { model, prompts, config, logger } = this.deps;
    const prompt = prompts.render("merge-name", { mergeCandidates: topics });

    try {
      const raw = await invokeCollaborator(
        "language-model",
        (attemptSignal) => model.generate({ task: "merge-name", prompt, signal: attemptSignal }),
        { ...config.collaborators, signal, logger, operation: "merge" }
      );
      const parsed = parseModelJson(raw, MergeNameSchema);
      if (parsed.success) {
        return { name: parsed.data, source: "model" };
      }
      logger.warn("Merge name answer rejected, using fallback name", { issues: parsed.issues });
    } catch (err) {
      if (!(err instanceof CollaboratorError)) throw err;
      logger.warn("Merge name unavailable, using fallback name", { error: err.message });
    }

    return { name: fallbackName(topics), source: "fallback" };
  }
}

export function fallbackName(topics: readonly Pick<Topic, "name" | "description">[]): MergeName {
  return {
    name: topics
      .map((t) => t.name)
      .join(" & ")
      .slice(0, 200),
    description: topics
      .map((t) => t.description)
      .filter((d) => d !== "")
      .join(" "),
  };
}
