/**
 * In-process stand-ins for the engine's collaborators, plus fixtures
 * shared by the tests.
 */

import { resolveEngineConfig } from "../config/engine/loader.js";
import type { EngineConfig, EngineConfigOverrides } from "../config/engine/schema.js";
import type { MediaReference } from "../documents/schema.js";
import { createLogger, type Logger, type LogLevel } from "../logging/index.js";
import { AnalysisUnavailableError, EnrichmentUnavailableError, ModelError } from "../collaborators/errors.js";
import type {
  Enricher,
  EnrichmentRequest,
  ImageAnalyzer,
  LanguageModel,
  ModelRequest,
  ModelTask,
} from "../collaborators/types.js";

// ═══════════════════════════════════════════════════════════════════════════
// LANGUAGE MODEL
// ═══════════════════════════════════════════════════════════════════════════

export type ScriptedReply = string | Error | ((request: ModelRequest) => string | Promise<string>);

/**
 * Answers each task from its own queue of scripted replies, in order.
 * Running out of replies for a task fails the call with a permanent
 * ModelError.
 */
export class ScriptedLanguageModel implements LanguageModel {
  readonly name = "scripted";
  readonly requests: ModelRequest[] = [];
  private readonly queues = new Map<ModelTask, ScriptedReply[]>();

  reply(task: ModelTask, ...replies: ScriptedReply[]): this {
    const queue = this.queues.get(task) ?? [];
    queue.push(...replies);
    this.queues.set(task, queue);
    return this;
  }

  async generate(request: ModelRequest): Promise<string> {
    this.requests.push(request);
    const next = this.queues.get(request.task)?.shift();
    if (next === undefined) {
      throw new ModelError(`No scripted reply for ${request.task}`, false);
    }
    if (next instanceof Error) throw next;
    return typeof next === "function" ? next(request) : next;
  }

  requestsFor(task: ModelTask): ModelRequest[] {
    return this.requests.filter((request) => request.task === task);
  }

  pending(task: ModelTask): number {
    return this.queues.get(task)?.length ?? 0;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// ENRICHER AND IMAGE ANALYZER
// ═══════════════════════════════════════════════════════════════════════════

export class FakeEnricher implements Enricher {
  readonly name = "test-enricher";
  readonly requests: EnrichmentRequest[] = [];

  constructor(private readonly result: string | Error = "Background material.") {}

  async supplement(request: EnrichmentRequest): Promise<string> {
    this.requests.push(request);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

export class FakeImageAnalyzer implements ImageAnalyzer {
  readonly described: string[] = [];

  /**
   * @param descriptions - ref → description; a missing ref fails permanently
   */
  constructor(private readonly descriptions: Readonly<Record<string, string | Error>> = {}) {}

  async describe(image: MediaReference): Promise<string> {
    this.described.push(image.ref);
    const result = this.descriptions[image.ref];
    if (result === undefined) {
      throw new AnalysisUnavailableError(`No description for ${image.ref}`);
    }
    if (result instanceof Error) throw result;
    return result;
  }
}

export function unavailableEnricher(message = "source offline"): FakeEnricher {
  return new FakeEnricher(new EnrichmentUnavailableError(message));
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION AND LOGGING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Fast, deterministic configuration: no transport retries or backoff,
 * enrichment only when a test asks for it.
 */
export function testConfig(overrides: EngineConfigOverrides = {}): Readonly<EngineConfig> {
  const base = resolveEngineConfig({
    collaborators: { timeoutMs: 1000, retries: 0, backoffMs: 0 },
    enrichment: { minSourceChars: 0, enrichOnUncertainty: false },
  });
  return resolveEngineConfig(overrides, base);
}

export interface CapturedLine {
  level: LogLevel;
  line: string;
}

/**
 * Logger that records lines instead of printing or writing them.
 */
export function captureLogger(level: LogLevel = "debug"): { logger: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const logger = createLogger({
    level,
    console: false,
    file: false,
    sink: (entryLevel, line) => lines.push({ level: entryLevel, line }),
  });
  return { logger, lines };
}

// ═══════════════════════════════════════════════════════════════════════════
// MODEL ANSWERS
// ═══════════════════════════════════════════════════════════════════════════

export interface ScriptedTopic {
  name: string;
  description?: string;
  blocks: number[];
}

export function segmentReply(topics: readonly ScriptedTopic[]): string {
  return JSON.stringify({
    topics: topics.map((t) => ({ name: t.name, description: t.description ?? "", blocks: t.blocks })),
  });
}

export function summaryReply(
  title: string,
  sections: readonly [heading: string, content: string][],
  uncertain = false
): string {
  return JSON.stringify({
    title,
    sections: sections.map(([heading, content]) => ({ heading, content })),
    uncertain,
  });
}

export function revisionReply(
  title: string,
  sections: readonly [heading: string, content: string][],
  reply: string
): string {
  return JSON.stringify({
    title,
    sections: sections.map(([heading, content]) => ({ heading, content })),
    reply,
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// CONTENT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Exactly `length` characters of `text` repeated, on one line, never
 * ending in a space.
 */
export function sizedParagraph(text: string, length: number): string {
  let out = text;
  while (out.length < length) {
    out += ` ${text}`;
  }
  out = out.slice(0, length);
  return out.endsWith(" ") ? `${out.slice(0, -1)}.` : out;
}

/**
 * Three paragraphs tiling [0,120), [120,260) and [260,400).
 */
export const LECTURE_PARAGRAPHS = [
  sizedParagraph("Cell membranes are lipid bilayers that separate the inside of a cell from its surroundings.", 118),
  sizedParagraph("Membrane transport moves ions and molecules across the bilayer through channels and pumps.", 138),
  sizedParagraph("Cell signalling lets receptors on the membrane pass messages from hormones into the cell.", 140),
] as const;

export const LECTURE = LECTURE_PARAGRAPHS.join("\n\n");

export const LECTURE_TOPICS: readonly ScriptedTopic[] = [
  { name: "Cell membranes", description: "Structure of the lipid bilayer", blocks: [0] },
  { name: "Membrane transport", description: "Channels and pumps", blocks: [1] },
  { name: "Cell signalling", description: "Receptors and messages", blocks: [2] },
];
