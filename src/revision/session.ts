/**
 * RevisionSession: conversational editing of one note per turn.
 *
 * One session per document. A turn moves the session from `idle` to
 * `awaiting_response` and back; a second turn while one is in flight is
 * rejected. The session never mutates state itself: it returns the revised
 * note and the chat turns, and the caller commits them.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";

import type { EngineConfig } from "../config/engine/schema.js";
import {
  CollaboratorError,
  ConcurrencyError,
  InputError,
  StaleTargetError,
} from "../errors/index.js";
import type { Logger } from "../logging/index.js";
import { buildRevisionConstraints, type PromptLibrary } from "../prompts/index.js";
import type { Note, NoteSection } from "../notes/schema.js";
import type { Topic } from "../topics/schema.js";
import { invokeCollaborator } from "../collaborators/invoke.js";
import { parseModelJson } from "../collaborators/json.js";
import type { LanguageModel } from "../collaborators/types.js";
import type { ChatTurn } from "./schema.js";

export type RevisionState = "idle" | "awaiting_response";

export interface RevisionSessionDeps {
  model: LanguageModel;
  prompts: PromptLibrary;
  config: Pick<EngineConfig, "revision" | "synthesis" | "collaborators">;
  logger: Logger;
}

export interface RevisionTurnInput {
  note: Note;
  /** Live topic the note is bound to; undefined when the key is no longer live */
  topic: Readonly<Topic> | undefined;
  /** Live key that absorbed the note's topic, for stale-target errors */
  currentKey?: string;
  instruction: string;
  /** Earlier turns about this topic, oldest first */
  history: readonly ChatTurn[];
  expectedRevision?: number;
  signal?: AbortSignal;
  now?: Date;
}

export type RevisionOutcome =
  | { ok: true; note: Note; reply: string; turns: [ChatTurn, ChatTurn] }
  | { ok: false; error: CollaboratorError; turns: [ChatTurn, ChatTurn] };

const RevisionAnswerSchema = z.object({
  title: z.string().trim().min(1).max(200).optional(),
  sections: z
    .array(
      z.object({
        heading: z.string().trim().min(1),
        content: z.string().trim(),
      })
    )
    .min(1),
  reply: z.string().trim().default(""),
});
export type RevisionAnswer = z.infer<typeof RevisionAnswerSchema>;

const DEFAULT_REPLY = "The note was updated.";

export class RevisionSession {
  private current: RevisionState = "idle";

  constructor(
    readonly documentId: string,
    private readonly deps: RevisionSessionDeps
  ) {}

  get state(): RevisionState {
    return this.current;
  }

  /**
   * @throws ConcurrencyError if a turn is already in flight
   * @throws InputError if the instruction is empty or too long
   * @throws StaleTargetError if the note no longer matches the live topic
   *   or the expected revision
   */
  async submit(input: RevisionTurnInput): Promise<RevisionOutcome> {
    if (this.current !== "idle") {
      throw new ConcurrencyError(this.documentId, "revise", "revise");
    }
    const instruction = this.validate(input);

    this.current = "awaiting_response";
    const at = (input.now ?? new Date()).toISOString();
    const { note } = input;
    const userTurn = makeTurn(note, "user", "message", instruction, at);

    try {
      const answer = await this.ask(input, instruction);
      const revised = applyAnswer(note, answer, at);
      this.deps.logger.info("Note revised", {
        topic: note.topicKey,
        revision: revised.revision,
        sections: revised.body.sections.length,
      });
      const reply = answer.reply === "" ? DEFAULT_REPLY : answer.reply;
      return {
        ok: true,
        note: revised,
        reply,
        turns: [userTurn, makeTurn(revised, "assistant", "message", reply, at)],
      };
    } catch (err) {
      if (!(err instanceof CollaboratorError)) throw err;
      this.deps.logger.warn("Revision failed", { topic: note.topicKey, error: err.message });
      return {
        ok: false,
        error: err,
        turns: [userTurn, makeTurn(note, "assistant", "error", `Revision failed: ${err.userMessage()}`, at)],
      };
    } finally {
      this.current = "idle";
    }
  }

  private validate(input: RevisionTurnInput): string {
    const { note, topic } = input;
    const config = this.deps.config.revision;
    const instruction = input.instruction.trim();

    if (instruction === "") {
      throw new InputError("The revision instruction must not be empty.");
    }
    if (instruction.length > config.maxInstructionChars) {
      throw new InputError(
        `The revision instruction is too long (${instruction.length} characters, limit ${config.maxInstructionChars}).`,
        { length: instruction.length, maximum: config.maxInstructionChars }
      );
    }

    if (note.status !== "current" || topic === undefined || topic.version !== note.topicVersion) {
      throw new StaleTargetError(
        `The note for ${note.topicKey} is out of date; generate notes again before revising it.`,
        note.topicKey,
        input.currentKey
      );
    }
    if (input.expectedRevision !== undefined && input.expectedRevision !== note.revision) {
      throw new StaleTargetError(
        `The note for ${note.topicKey} is at revision ${note.revision}, not ${input.expectedRevision}.`,
        note.topicKey,
        note.topicKey
      );
    }

    return instruction;
  }

  private async ask(input: RevisionTurnInput, instruction: string): Promise<RevisionAnswer> {
    const { model, prompts, config, logger } = this.deps;
    const { note } = input;
    const topicName = input.topic?.name ?? note.body.title;
    const history = config.revision.historyTurns > 0 ? input.history.slice(-config.revision.historyTurns) : [];
    const maxAttempts = config.synthesis.parseRetries + 1;
    let issues: string[] = [];

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const prompt = prompts.render(
        "revise",
        {
          topic: input.topic,
          note: { body: note.body, format: note.format },
          instruction,
          history,
          correctionIssues: issues,
        },
        buildRevisionConstraints(topicName)
      );

      const raw = await invokeCollaborator(
        "language-model",
        (signal) => model.generate({ task: "revise", prompt, signal }),
        { ...config.collaborators, signal: input.signal, logger, operation: "revise" }
      );

      const parsed = parseModelJson(raw, RevisionAnswerSchema);
      if (parsed.success) return parsed.data;

      issues = parsed.issues;
      logger.warn("Revision answer rejected", { topic: note.topicKey, attempt, issues });
    }

    throw new CollaboratorError("The language model did not return a usable revision", {
      collaborator: "language-model",
      retriable: false,
      context: { issues },
    });
  }
}

/**
 * New revision of `note` with the answer's sections. A section whose
 * heading already existed keeps that section's provenance.
 */
export function applyAnswer(note: Note, answer: RevisionAnswer, at: string): Note {
  const previous = new Map(note.body.sections.map((section) => [section.heading, section]));
  const sections: NoteSection[] = answer.sections.map((section): NoteSection => {
    const prior = previous.get(section.heading);
    return prior?.provenance === "enrichment"
      ? { ...section, provenance: "enrichment", ...(prior.source !== undefined ? { source: prior.source } : {}) }
      : { ...section, provenance: "source" };
  });

  return {
    ...note,
    body: { title: answer.title ?? note.body.title, sections, images: note.body.images },
    revision: note.revision + 1,
    updatedAt: at,
  };
}

function makeTurn(
  note: Pick<Note, "id" | "topicKey" | "revision">,
  sender: ChatTurn["sender"],
  kind: ChatTurn["kind"],
  text: string,
  at: string
): ChatTurn {
  return {
    id: randomUUID(),
    topicKey: note.topicKey,
    sender,
    kind,
    text,
    at,
    noteId: note.id,
    noteRevision: note.revision,
  };
}
