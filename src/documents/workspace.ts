/**
 * DocumentWorkspace: the mutable working copy of one document record.
 *
 * The engine loads a record into a workspace, mutates the workspace, and
 * saves it back with a single store call. Nothing outside the workspace
 * sees intermediate state.
 */

import { TopicGraph } from "../topics/graph.js";
import type { Note } from "../notes/schema.js";
import type { ChatTurn } from "../revision/schema.js";
import type { DocumentState } from "../config/engine/enums.js";
import {
  RECORD_VERSION,
  type DocumentRecord,
  type MediaReference,
  type StudyDocument,
  type TranscriptCue,
} from "./schema.js";

export interface NewDocument {
  id: string;
  content: string;
  title?: string;
  media?: readonly MediaReference[];
  cues?: readonly TranscriptCue[];
  granularity: number;
  now?: Date;
}

export class DocumentWorkspace {
  private constructor(
    public document: StudyDocument,
    readonly graph: TopicGraph,
    private notes: Note[],
    private chat: ChatTurn[]
  ) {}

  static create(input: NewDocument): DocumentWorkspace {
    const at = (input.now ?? new Date()).toISOString();
    const document: StudyDocument = {
      id: input.id,
      ...(input.title !== undefined ? { title: input.title } : {}),
      content: input.content,
      media: [...(input.media ?? [])],
      cues: [...(input.cues ?? [])],
      granularity: input.granularity,
      state: "uploaded",
      createdAt: at,
      updatedAt: at,
    };
    return new DocumentWorkspace(document, TopicGraph.create(input.content.length), [], []);
  }

  /**
   * Working copy of a stored record. The record itself is never aliased.
   */
  static fromRecord(record: DocumentRecord): DocumentWorkspace {
    const copy = structuredClone(record);
    return new DocumentWorkspace(copy.document, TopicGraph.restore(copy.graph), copy.notes, copy.chat);
  }

  toRecord(): DocumentRecord {
    const record: DocumentRecord = {
      version: RECORD_VERSION,
      document: this.document,
      graph: this.graph.snapshot(),
      notes: this.notes,
      chat: this.chat,
    };
    return structuredClone(record);
  }

  get id(): string {
    return this.document.id;
  }

  // ---------------------------------------------------------------------------
  // Notes
  // ---------------------------------------------------------------------------

  allNotes(): readonly Note[] {
    return this.notes;
  }

  currentNote(topicKey: string): Note | undefined {
    return this.notes.find((note) => note.topicKey === topicKey && note.status === "current");
  }

  /** Most recently recorded note for the key, whatever its status. */
  latestNote(topicKey: string): Note | undefined {
    for (let i = this.notes.length - 1; i >= 0; i--) {
      if (this.notes[i].topicKey === topicKey) return this.notes[i];
    }
    return undefined;
  }

  /**
   * Record a freshly generated note; the key's previous current note is
   * kept as superseded.
   */
  putNote(note: Note): void {
    for (const existing of this.notes) {
      if (existing.topicKey === note.topicKey && existing.status === "current") {
        existing.status = "superseded";
      }
    }
    this.notes.push(note);
  }

  /** Replace a note in place by id (a new revision of the same note). */
  replaceNote(note: Note): void {
    const index = this.notes.findIndex((existing) => existing.id === note.id);
    if (index === -1) {
      this.notes.push(note);
    } else {
      this.notes[index] = note;
    }
  }

  /**
   * Mark every current note whose topic is no longer live at the note's
   * version as stale.
   *
   * @returns keys of the notes that became stale
   */
  markStaleNotes(): string[] {
    const stale: string[] = [];
    for (const note of this.notes) {
      if (note.status !== "current") continue;
      const topic = this.graph.get(note.topicKey);
      if (!topic || topic.version !== note.topicVersion) {
        note.status = "stale";
        stale.push(note.topicKey);
      }
    }
    return stale;
  }

  // ---------------------------------------------------------------------------
  // Chat
  // ---------------------------------------------------------------------------

  appendTurns(turns: readonly ChatTurn[]): void {
    this.chat.push(...turns);
  }

  chatFor(topicKey?: string): ChatTurn[] {
    return topicKey === undefined ? [...this.chat] : this.chat.filter((turn) => turn.topicKey === topicKey);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  touch(now: Date = new Date()): void {
    this.document.updatedAt = now.toISOString();
  }

  setState(state: DocumentState): void {
    this.document.state = state;
  }

  /**
   * Derive the lifecycle state from the topics and notes present.
   */
  refreshState(): DocumentState {
    if (this.graph.size === 0) {
      this.document.state = "uploaded";
    } else if (this.graph.list().some((topic) => this.currentNote(topic.key) !== undefined)) {
      this.document.state = "notes_generated";
    } else {
      this.document.state = "segmented";
    }
    return this.document.state;
  }
}
