/**
 * NoteSynthesizer: turns one topic into a note.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * PIPELINE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   topic text spans ──► summarize ──► enrich? ──► describe images? ──► links
 *        (source)         (required)    (optional)     (optional)
 *
 * Only summarization is required: when it fails nothing is produced and
 * SynthesisFailedError is raised. Enrichment and image analysis degrade to
 * a `partial` note with a warning per failure.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";

import type { NoteFormat } from "../config/engine/enums.js";
import type { EngineConfig } from "../config/engine/schema.js";
import type { MediaReference, StudyDocument } from "../documents/schema.js";
import { CollaboratorError, SynthesisFailedError } from "../errors/index.js";
import type { Logger } from "../logging/index.js";
import type { PromptLibrary } from "../prompts/index.js";
import type { TopicGraph } from "../topics/graph.js";
import type { HyperlinkEdge, Topic } from "../topics/schema.js";
import { coalesceTextSpans, type TextSpan } from "../topics/spans.js";
import { invokeCollaborator, type InvokeOptions } from "../collaborators/invoke.js";
import { parseModelJson } from "../collaborators/json.js";
import type { Enricher, ImageAnalyzer, LanguageModel } from "../collaborators/types.js";
import { computeHyperlinks } from "./hyperlinks.js";
import type { Note, NoteImage, NoteSection } from "./schema.js";

export const SUPPLEMENT_HEADING = "Supplementary material";

const SummarySchema = z.object({
  title: z.string().trim().min(1).max(200).optional(),
  sections: z
    .array(
      z.object({
        heading: z.string().trim().min(1),
        content: z.string().trim(),
      })
    )
    .min(1),
  uncertain: z.boolean().default(false),
});
type Summary = z.infer<typeof SummarySchema>;

export interface NoteSynthesizerDeps {
  model: LanguageModel;
  prompts: PromptLibrary;
  config: Pick<EngineConfig, "synthesis" | "enrichment" | "hyperlinks" | "collaborators">;
  logger: Logger;
  enricher?: Enricher;
  imageAnalyzer?: ImageAnalyzer;
}

export interface SynthesisOptions {
  format: NoteFormat;
  processImages?: boolean;
  signal?: AbortSignal;
  now?: Date;
}

export interface SynthesisResult {
  note: Note;
  /** Outbound edges of the new note */
  edges: HyperlinkEdge[];
  /** Title proposed by the model, or the topic name */
  title: string;
  warnings: string[];
}

/**
 * Source text of a topic: its text spans in document order, trimmed and
 * separated by blank lines.
 */
export function gatherSourceText(content: string, spans: readonly TextSpan[], maxChars: number): string {
  const text = spans
    .map((span) => content.slice(span.start, span.end).trim())
    .filter((part) => part !== "")
    .join("\n\n");
  return text.length > maxChars ? text.slice(0, maxChars) : text;
}

export class NoteSynthesizer {
  constructor(private readonly deps: NoteSynthesizerDeps) {}

  async synthesize(
    topic: Readonly<Topic>,
    document: Pick<StudyDocument, "content" | "media">,
    graph: TopicGraph,
    options: SynthesisOptions
  ): Promise<SynthesisResult> {
    const { config, logger } = this.deps;
    const spans = coalesceTextSpans(topic.spans);
    const sourceText = gatherSourceText(document.content, spans, config.synthesis.maxSourceChars);
    const invoke: InvokeOptions = {
      ...config.collaborators,
      signal: options.signal,
      logger,
      operation: "generate-notes",
    };

    const summary = await this.summarize(topic, sourceText, options.format, invoke);
    const sections: NoteSection[] = summary.sections.map(
      (section): NoteSection => ({ ...section, provenance: "source" })
    );
    const warnings: string[] = [];

    const thin = sourceText.length < config.enrichment.minSourceChars;
    if (thin || (summary.uncertain && config.enrichment.enrichOnUncertainty)) {
      const supplement = await this.enrich(topic, sourceText, invoke, warnings);
      if (supplement) sections.push(supplement);
    }

    const images = options.processImages
      ? await this.describeImages(imagesWithin(document.media, spans), invoke, warnings)
      : [];

    const title = summary.title ?? topic.name;
    const noteText = [title, ...sections.map((section) => `${section.heading}\n${section.content}`)].join("\n");
    const edges = computeHyperlinks(topic.key, noteText, graph.list(), config.hyperlinks);

    const at = (options.now ?? new Date()).toISOString();
    const note: Note = {
      id: randomUUID(),
      topicKey: topic.key,
      topicVersion: topic.version,
      format: options.format,
      body: { title, sections, images },
      revision: 1,
      status: "current",
      partial: warnings.length > 0,
      warnings,
      generatedAt: at,
      updatedAt: at,
    };

    logger.info("Note synthesized", {
      topic: topic.key,
      sections: sections.length,
      images: images.length,
      links: edges.length,
      partial: note.partial,
    });

    return { note, edges, title, warnings };
  }

  private async summarize(
    topic: Readonly<Topic>,
    sourceText: string,
    format: NoteFormat,
    invoke: InvokeOptions
  ): Promise<Summary> {
    const { model, prompts, config, logger } = this.deps;
    const maxAttempts = config.synthesis.parseRetries + 1;
    let issues: string[] = [];

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const prompt = prompts.render("summarize", { topic, sourceText, format, correctionIssues: issues });

      let raw: string;
      try {
        raw = await invokeCollaborator(
          "language-model",
          (signal) => model.generate({ task: "summarize", prompt, signal }),
          invoke
        );
      } catch (err) {
        if (err instanceof CollaboratorError) {
          throw new SynthesisFailedError(topic.key, `Could not summarize ${topic.key}: ${err.message}`, {
            retriable: err.retriable,
            cause: err,
          });
        }
        throw err;
      }

      const parsed = parseModelJson(raw, SummarySchema);
      if (parsed.success) return parsed.data;

      issues = parsed.issues;
      logger.warn("Summary answer rejected", { topic: topic.key, attempt, issues });
    }

    throw new SynthesisFailedError(
      topic.key,
      `The language model did not produce a usable summary for ${topic.key}`,
      { retriable: false }
    );
  }

  private async enrich(
    topic: Readonly<Topic>,
    sourceText: string,
    invoke: InvokeOptions,
    warnings: string[]
  ): Promise<NoteSection | undefined> {
    const { enricher } = this.deps;
    if (!enricher) {
      warnings.push("Supplementary material was needed but no enricher is configured");
      return undefined;
    }

    try {
      const text = await invokeCollaborator(
        "enricher",
        (signal) =>
          enricher.supplement({ topicKey: topic.key, topicName: topic.name, summary: sourceText }, signal),
        invoke
      );
      if (text.trim() === "") return undefined;
      return { heading: SUPPLEMENT_HEADING, content: text.trim(), provenance: "enrichment", source: enricher.name };
    } catch (err) {
      if (!(err instanceof CollaboratorError)) throw err;
      this.deps.logger.warn("Enrichment unavailable", { topic: topic.key, error: err.message });
      warnings.push(`Supplementary material unavailable: ${err.message}`);
      return undefined;
    }
  }

  private async describeImages(
    media: readonly MediaReference[],
    invoke: InvokeOptions,
    warnings: string[]
  ): Promise<NoteImage[]> {
    const { imageAnalyzer } = this.deps;
    if (media.length === 0) return [];
    if (!imageAnalyzer) {
      warnings.push("Images were not analyzed: no image analyzer is configured");
      return [];
    }

    const images: NoteImage[] = [];
    for (const image of media) {
      try {
        const description = await invokeCollaborator(
          "image-analyzer",
          (signal) => imageAnalyzer.describe(image, signal),
          invoke
        );
        if (description.trim() === "") continue;
        images.push({
          ref: image.ref,
          ...(image.caption !== undefined ? { caption: image.caption } : {}),
          description: description.trim(),
        });
      } catch (err) {
        if (!(err instanceof CollaboratorError)) throw err;
        this.deps.logger.warn("Image analysis unavailable", { ref: image.ref, error: err.message });
        warnings.push(`Image ${image.ref} could not be analyzed: ${err.message}`);
      }
    }
    return images;
  }
}

/**
 * Image references anchored inside one of the spans.
 */
export function imagesWithin(media: readonly MediaReference[], spans: readonly TextSpan[]): MediaReference[] {
  return media.filter(
    (item) => item.kind === "image" && spans.some((span) => item.offset >= span.start && item.offset < span.end)
  );
}
