/**
 * RevisionSession tests.
 *
 * Run: node --import tsx src/revision/session.test.ts
 *
 * Tests cover:
 *   1. Accepted revisions — new note revision, provenance, chat turns
 *   2. Prompting — scope constraints and bounded history
 *   3. Rejections — empty/long instructions, stale targets, busy session
 *   4. Failures — model errors become error turns, cancellation propagates
 */

import { strict as assert } from "node:assert";

import type { EngineConfigOverrides } from "../config/engine/schema.js";
import { ConcurrencyError, InputError, OperationCancelledError, StaleTargetError } from "../errors/index.js";
import { ModelError } from "../collaborators/errors.js";
import type { Note } from "../notes/schema.js";
import { PromptLibrary } from "../prompts/index.js";
import type { Topic } from "../topics/schema.js";
import { textSpan } from "../topics/spans.js";
import { captureLogger, revisionReply, ScriptedLanguageModel, testConfig } from "../testing/fakes.js";
import { run, section, test } from "../testing/harness.js";
import type { ChatTurn } from "./schema.js";
import { applyAnswer, RevisionSession } from "./session.js";

const prompts = new PromptLibrary();
const GENERATED = "2026-03-01T11:00:00.000Z";
const NOW = new Date("2026-03-01T12:00:00.000Z");

const TOPIC: Readonly<Topic> = {
  key: "T1",
  name: "Cell membranes",
  description: "Structure of the lipid bilayer",
  spans: [textSpan(0, 120)],
  version: 1,
  origin: { kind: "segmentation" },
  createdAt: GENERATED,
};

const NOTE: Note = {
  id: "note-1",
  topicKey: "T1",
  topicVersion: 1,
  format: "markdown",
  body: {
    title: "Cell membranes",
    sections: [
      { heading: "Structure", content: "Two layers.", provenance: "source" },
      { heading: "Supplementary material", content: "Background.", provenance: "enrichment", source: "test-enricher" },
    ],
    images: [],
  },
  revision: 1,
  status: "current",
  partial: false,
  warnings: [],
  generatedAt: GENERATED,
  updatedAt: GENERATED,
};

const REVISED = revisionReply(
  "Cell membranes",
  [
    ["Structure", "Two layers of lipids."],
    ["Supplementary material", "Background."],
    ["Example", "Red blood cells."],
  ],
  "Added an example."
);

function setup(overrides: EngineConfigOverrides = {}) {
  const model = new ScriptedLanguageModel();
  const { logger } = captureLogger();
  const session = new RevisionSession("doc-1", { model, prompts, config: testConfig(overrides), logger });
  return { model, session };
}

function turn(sender: ChatTurn["sender"], text: string): ChatTurn {
  return {
    id: `turn-${text}`,
    topicKey: "T1",
    sender,
    kind: "message",
    text,
    at: GENERATED,
    noteId: "note-1",
    noteRevision: 1,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// ACCEPTED REVISIONS
// ═══════════════════════════════════════════════════════════════════════════

section("Accepted revisions");

test("a revision bumps the note and records both turns", async () => {
  const { model, session } = setup();
  model.reply("revise", REVISED);
  const outcome = await session.submit({
    note: NOTE,
    topic: TOPIC,
    instruction: "  Add an example. ",
    history: [],
    now: NOW,
  });
  assert.ok(outcome.ok);
  assert.equal(outcome.reply, "Added an example.");
  assert.equal(outcome.note.revision, 2);
  assert.equal(outcome.note.updatedAt, "2026-03-01T12:00:00.000Z");
  assert.equal(outcome.note.generatedAt, GENERATED);
  assert.deepEqual(outcome.note.body.sections, [
    { heading: "Structure", content: "Two layers of lipids.", provenance: "source" },
    { heading: "Supplementary material", content: "Background.", provenance: "enrichment", source: "test-enricher" },
    { heading: "Example", content: "Red blood cells.", provenance: "source" },
  ]);

  const [user, assistant] = outcome.turns;
  assert.deepEqual(
    [user.sender, user.kind, user.text, user.noteRevision, user.noteId],
    ["user", "message", "Add an example.", 1, "note-1"]
  );
  assert.deepEqual(
    [assistant.sender, assistant.kind, assistant.text, assistant.noteRevision],
    ["assistant", "message", "Added an example.", 2]
  );
  assert.equal(session.state, "idle");
});

test("an empty reply gets a default", async () => {
  const { model, session } = setup();
  model.reply("revise", revisionReply("Cell membranes", [["Structure", "Two layers."]], ""));
  const outcome = await session.submit({ note: NOTE, topic: TOPIC, instruction: "Shorter", history: [] });
  assert.ok(outcome.ok);
  assert.equal(outcome.reply, "The note was updated.");
});

test("applyAnswer keeps the title when none is given", () => {
  const revised = applyAnswer(NOTE, { sections: [{ heading: "Structure", content: "x" }], reply: "" }, GENERATED);
  assert.equal(revised.body.title, "Cell membranes");
  assert.deepEqual(revised.body.images, []);
  assert.equal(revised.id, "note-1");
});

// ═══════════════════════════════════════════════════════════════════════════
// PROMPTING
// ═══════════════════════════════════════════════════════════════════════════

section("Prompting");

test("the prompt scopes the edit and carries recent history", async () => {
  const { model, session } = setup({ revision: { historyTurns: 2 } });
  model.reply("revise", REVISED);
  await session.submit({
    note: NOTE,
    topic: TOPIC,
    instruction: "Add an example.",
    history: [turn("user", "A"), turn("assistant", "B"), turn("user", "C")],
  });
  const [request] = model.requestsFor("revise");
  assert.ok(request.prompt.includes("## Current note\n\n## Structure\n\nTwo layers.\n\n## Supplementary material\n\nBackground.\n"));
  assert.ok(request.prompt.includes("## Earlier conversation about this note\n\nassistant: B\nuser: C\n"));
  assert.ok(request.prompt.includes('- [scope] Only edit the note about "Cell membranes". Do not add material about other topics.'));
});

// ═══════════════════════════════════════════════════════════════════════════
// REJECTIONS
// ═══════════════════════════════════════════════════════════════════════════

section("Rejections");

test("empty and oversized instructions are rejected", async () => {
  const { model, session } = setup({ revision: { maxInstructionChars: 10 } });
  await assert.rejects(
    session.submit({ note: NOTE, topic: TOPIC, instruction: "   ", history: [] }),
    (err: unknown) => err instanceof InputError && err.message === "The revision instruction must not be empty."
  );
  await assert.rejects(
    session.submit({ note: NOTE, topic: TOPIC, instruction: "Add a table", history: [] }),
    (err: unknown) =>
      err instanceof InputError &&
      err.message === "The revision instruction is too long (11 characters, limit 10)."
  );
  assert.equal(model.requests.length, 0);
});

test("stale notes point at the topic that replaced them", async () => {
  const { session } = setup();
  await assert.rejects(
    session.submit({ note: { ...NOTE, status: "stale" }, topic: undefined, currentKey: "T4", instruction: "x", history: [] }),
    (err: unknown) =>
      err instanceof StaleTargetError &&
      err.currentKey === "T4" &&
      err.message === "The note for T1 is out of date; generate notes again before revising it."
  );
  await assert.rejects(
    session.submit({ note: NOTE, topic: { ...TOPIC, version: 2 }, instruction: "x", history: [] }),
    StaleTargetError
  );
});

test("an outdated expected revision is rejected", async () => {
  const { session } = setup();
  await assert.rejects(
    session.submit({ note: NOTE, topic: TOPIC, instruction: "x", history: [], expectedRevision: 3 }),
    (err: unknown) =>
      err instanceof StaleTargetError && err.message === "The note for T1 is at revision 1, not 3."
  );
});

test("a second turn while one is in flight is rejected", async () => {
  const { model, session } = setup();
  model.reply("revise", () => new Promise<string>((resolve) => setTimeout(() => resolve(REVISED), 20)));
  const first = session.submit({ note: NOTE, topic: TOPIC, instruction: "Add an example.", history: [] });
  assert.equal(session.state, "awaiting_response");
  await assert.rejects(
    session.submit({ note: NOTE, topic: TOPIC, instruction: "Again", history: [] }),
    (err: unknown) =>
      err instanceof ConcurrencyError && err.message === "Document doc-1 is busy (revise in progress); retry revise later"
  );
  assert.equal((await first).ok, true);
  assert.equal(session.state, "idle");
});

// ═══════════════════════════════════════════════════════════════════════════
// FAILURES
// ═══════════════════════════════════════════════════════════════════════════

section("Failures");

test("a model failure becomes an error turn", async () => {
  const { model, session } = setup();
  model.reply("revise", new ModelError("down", false));
  const outcome = await session.submit({ note: NOTE, topic: TOPIC, instruction: "Add an example.", history: [] });
  assert.equal(outcome.ok, false);
  assert.ok(!outcome.ok);
  assert.equal(outcome.error.message, "language-model failed: down");
  assert.deepEqual(
    [outcome.turns[1].sender, outcome.turns[1].kind, outcome.turns[1].text, outcome.turns[1].noteRevision],
    ["assistant", "error", "Revision failed: The language-model could not complete the request: language-model failed: down", 1]
  );
  assert.equal(session.state, "idle");
});

test("unusable answers end in an error turn after the retry", async () => {
  const { model, session } = setup();
  model.reply("revise", "Sure, done!", '{"reply": "done"}');
  const outcome = await session.submit({ note: NOTE, topic: TOPIC, instruction: "Add an example.", history: [] });
  assert.ok(!outcome.ok);
  assert.equal(outcome.error.message, "The language model did not return a usable revision");
  assert.ok(model.requestsFor("revise")[1].prompt.includes("- Response does not contain a JSON object"));
});

test("cancellation propagates and frees the session", async () => {
  const { session } = setup();
  const controller = new AbortController();
  controller.abort();
  await assert.rejects(
    session.submit({ note: NOTE, topic: TOPIC, instruction: "x", history: [], signal: controller.signal }),
    OperationCancelledError
  );
  assert.equal(session.state, "idle");
});

await run();
