/**
 * Segmenter: asks the language model to group content blocks into topics
 * and turns the answer into non-overlapping topic proposals.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CONTRACT
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   1. Content is split into blocks that tile it (see blocks.ts).
 *   2. The model answers {"topics":[{name, description, blocks:[i…]}]}.
 *   3. The answer is checked: JSON shape, indexes in range, no block in
 *      two topics, at least one block owned, every block assigned.
 *   4. A rejected answer triggers a corrective re-prompt that lists the
 *      problems and restates the partition rules, up to maxRetries times.
 *   5. Blocks still unassigned after the last attempt are accepted as
 *      unassigned content when allowUnassigned is set.
 *
 * Each contiguous run of blocks in a topic becomes one text span; a
 * transcript cue inside a run adds the matching time span. Time spans are
 * clipped in content order so runs never share a media range.
 */

import { z } from "zod";

import type { EngineConfig } from "../config/engine/schema.js";
import type { TranscriptCue } from "../documents/schema.js";
import {
  CollaboratorError,
  ExtractionInsufficientError,
  InputError,
  SegmentationUpstreamError,
} from "../errors/index.js";
import type { SegmentationHint } from "../granularity/mapper.js";
import type { Logger } from "../logging/index.js";
import { buildSegmentationConstraints, type PromptLibrary } from "../prompts/index.js";
import type { TopicProposal } from "../topics/schema.js";
import { textSpan, timeSpan, type SourceSpan } from "../topics/spans.js";
import { invokeCollaborator } from "../collaborators/invoke.js";
import { parseModelJson } from "../collaborators/json.js";
import type { LanguageModel } from "../collaborators/types.js";
import { previewBlocks, splitBlocks, type ContentBlock } from "./blocks.js";

export interface SegmentationInput {
  text: string;
  cues?: readonly TranscriptCue[];
}

export interface SegmentationOutcome {
  proposals: TopicProposal[];
  /** Fewer topics than the hint asked for, or empty topics were dropped */
  reduced: boolean;
  /** Blocks no topic claimed in the accepted answer */
  unassignedBlocks: number[];
  attempts: number;
  blockCount: number;
}

export interface SegmenterDeps {
  model: LanguageModel;
  prompts: PromptLibrary;
  config: Pick<EngineConfig, "segmentation" | "collaborators">;
  logger: Logger;
}

const SegmentationAnswerSchema = z.object({
  topics: z.array(
    z.object({
      name: z.string().trim().min(1),
      description: z.string().trim().default(""),
      blocks: z.array(z.number().int()),
    })
  ),
});
type SegmentationAnswer = z.infer<typeof SegmentationAnswerSchema>;

interface Review {
  /** Problems that force a retry */
  errors: string[];
  /** Blocks nobody claimed */
  omitted: number[];
}

/**
 * Reject content that cannot be segmented.
 *
 * @throws ExtractionInsufficientError if the trimmed text is empty or too short
 * @throws InputError if the text is larger than the configured maximum
 */
export function checkContentSize(text: string, config: EngineConfig["segmentation"]): void {
  const length = text.trim().length;
  if (length < config.minContentChars) {
    throw new ExtractionInsufficientError(length, config.minContentChars);
  }
  if (text.length > config.maxContentChars) {
    throw new InputError(
      `The document is too large to segment (${text.length} characters, limit ${config.maxContentChars}).`,
      { length: text.length, maximum: config.maxContentChars }
    );
  }
}

/**
 * Render the segmentation prompt. Also used by the CLI preview, which has
 * no model to call.
 */
export function buildSegmentationPrompt(
  prompts: PromptLibrary,
  input: {
    text: string;
    blocks: readonly ContentBlock[];
    hint: SegmentationHint;
    previewChars: number;
    correctionIssues?: readonly string[];
  }
): string {
  const { blocks, hint } = input;
  const correctionIssues = input.correctionIssues ?? [];
  return prompts.render(
    "segment",
    {
      hint: {
        ...hint,
        minTopics: Math.min(hint.minTopics, blocks.length),
        maxTopics: Math.min(hint.maxTopics, blocks.length),
      },
      blocks: previewBlocks(input.text, blocks, input.previewChars),
      correctionIssues,
    },
    buildSegmentationConstraints(blocks.length, correctionIssues.length > 0)
  );
}

export class Segmenter {
  constructor(private readonly deps: SegmenterDeps) {}

  async segment(
    input: SegmentationInput,
    hint: SegmentationHint,
    options: { signal?: AbortSignal } = {}
  ): Promise<SegmentationOutcome> {
    const { config, logger } = this.deps;
    checkContentSize(input.text, config.segmentation);

    const blocks = splitBlocks(input.text);
    const maxAttempts = config.segmentation.maxRetries + 1;
    let issues: string[] = [];

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const prompt = this.buildPrompt(input.text, blocks, hint, issues);
      const raw = await this.ask(prompt, attempt, options.signal);

      const parsed = parseModelJson(raw, SegmentationAnswerSchema);
      if (!parsed.success) {
        issues = parsed.issues;
        logger.warn("Segmentation answer rejected", { attempt, issues });
        continue;
      }

      const review = reviewAnswer(parsed.data, blocks.length);
      if (review.errors.length > 0 || (review.omitted.length > 0 && attempt < maxAttempts)) {
        issues = [...review.errors, ...describeOmissions(review.omitted)];
        logger.warn("Segmentation answer rejected", { attempt, issues });
        continue;
      }

      if (review.omitted.length > 0 && !config.segmentation.allowUnassigned) {
        issues = describeOmissions(review.omitted);
        break;
      }

      const outcome = buildOutcome(parsed.data, blocks, input.cues ?? [], hint, review.omitted, attempt);
      logger.info("Segmentation accepted", {
        attempt,
        topics: outcome.proposals.length,
        blocks: blocks.length,
        unassigned: outcome.unassignedBlocks.length,
        reduced: outcome.reduced,
      });
      return outcome;
    }

    throw new SegmentationUpstreamError(
      `The language model did not produce a valid segmentation after ${maxAttempts} attempt(s)`,
      { retriable: false, attempts: maxAttempts, issues }
    );
  }

  private buildPrompt(
    text: string,
    blocks: readonly ContentBlock[],
    hint: SegmentationHint,
    correctionIssues: readonly string[] = []
  ): string {
    return buildSegmentationPrompt(this.deps.prompts, {
      text,
      blocks,
      hint,
      previewChars: this.deps.config.segmentation.blockPreviewChars,
      correctionIssues,
    });
  }

  private async ask(prompt: string, attempt: number, signal: AbortSignal | undefined): Promise<string> {
    const { model, config, logger } = this.deps;
    try {
      return await invokeCollaborator(
        "language-model",
        (attemptSignal) => model.generate({ task: "segment", prompt, signal: attemptSignal }),
        { ...config.collaborators, signal, logger, operation: "segment" }
      );
    } catch (err) {
      if (err instanceof CollaboratorError) {
        throw new SegmentationUpstreamError(`Segmentation failed: ${err.message}`, {
          retriable: err.retriable,
          attempts: attempt,
          cause: err,
        });
      }
      throw err;
    }
  }
}

function reviewAnswer(answer: SegmentationAnswer, blockCount: number): Review {
  const errors: string[] = [];
  const owner = new Map<number, string>();

  for (const topic of answer.topics) {
    for (const index of new Set(topic.blocks)) {
      if (index < 0 || index >= blockCount) {
        errors.push(`Block ${index} in "${topic.name}" does not exist (valid: 0-${blockCount - 1})`);
        continue;
      }
      const existing = owner.get(index);
      if (existing !== undefined) {
        errors.push(`Block ${index} is assigned to both "${existing}" and "${topic.name}"`);
        continue;
      }
      owner.set(index, topic.name);
    }
  }

  if (owner.size === 0) {
    errors.push("No topic was assigned any block");
  }

  const omitted: number[] = [];
  for (let i = 0; i < blockCount; i++) {
    if (!owner.has(i)) omitted.push(i);
  }
  return { errors, omitted };
}

function describeOmissions(omitted: readonly number[]): string[] {
  return omitted.length > 0 ? [`Blocks ${omitted.join(", ")} are not assigned to any topic`] : [];
}

function buildOutcome(
  answer: SegmentationAnswer,
  blocks: readonly ContentBlock[],
  cues: readonly TranscriptCue[],
  hint: SegmentationHint,
  omitted: number[],
  attempts: number
): SegmentationOutcome {
  const nonEmpty = answer.topics
    .map((topic) => ({ ...topic, blocks: [...new Set(topic.blocks)].sort((a, b) => a - b) }))
    .filter((topic) => topic.blocks.length > 0)
    .sort((a, b) => a.blocks[0] - b.blocks[0]);

  const spans = runsToSpans(nonEmpty.map((topic) => topic.blocks), blocks, cues);
  const proposals = nonEmpty.map((topic, i) => ({
    name: topic.name,
    description: topic.description,
    spans: spans[i],
  }));

  return {
    proposals,
    reduced:
      nonEmpty.length < answer.topics.length ||
      proposals.length < hint.minTopics ||
      hint.minTopics > blocks.length,
    unassignedBlocks: omitted,
    attempts,
    blockCount: blocks.length,
  };
}

interface BlockRun {
  owner: number;
  start: number;
  end: number;
}

/** Contiguous runs of sorted block indexes, as character ranges. */
function blockRuns(owner: number, indexes: readonly number[], blocks: readonly ContentBlock[]): BlockRun[] {
  const runs: BlockRun[] = [];
  let runStart = 0;
  for (let i = 1; i <= indexes.length; i++) {
    if (i < indexes.length && indexes[i] === indexes[i - 1] + 1) continue;
    runs.push({ owner, start: blocks[indexes[runStart]].start, end: blocks[indexes[i - 1]].end });
    runStart = i;
  }
  return runs;
}

/**
 * One text span per run, plus one time span per media reference whose
 * cues start inside the run. Cue times of neighbouring paragraphs may
 * overlap, so each time span starts no earlier than the end of the last
 * one kept for that media; a span clipped to nothing is dropped.
 */
function runsToSpans(
  topics: readonly (readonly number[])[],
  blocks: readonly ContentBlock[],
  cues: readonly TranscriptCue[]
): SourceSpan[][] {
  const spans = topics.map((): SourceSpan[] => []);
  const runs = topics.flatMap((indexes, owner) => blockRuns(owner, indexes, blocks)).sort((a, b) => a.start - b.start);
  const laneEnd = new Map<string, number>();

  for (const run of runs) {
    spans[run.owner].push(textSpan(run.start, run.end));

    const byMedia = new Map<string, { startMs: number; endMs: number }>();
    for (const cue of cues) {
      if (cue.start < run.start || cue.start >= run.end) continue;
      const range = byMedia.get(cue.media);
      byMedia.set(cue.media, {
        startMs: Math.min(range?.startMs ?? cue.startMs, cue.startMs),
        endMs: Math.max(range?.endMs ?? cue.endMs, cue.endMs),
      });
    }
    for (const [media, range] of byMedia) {
      const previousEnd = laneEnd.get(media);
      const startMs = previousEnd === undefined ? range.startMs : Math.max(range.startMs, previousEnd);
      if (range.endMs <= startMs) continue;
      spans[run.owner].push(timeSpan(media, startMs, range.endMs));
      laneEnd.set(media, Math.max(previousEnd ?? range.endMs, range.endMs));
    }
  }

  return spans;
}
