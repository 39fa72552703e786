/**
 * NotesEngine tests.
 *
 * Run: node --import tsx src/engine/engine.test.ts
 *
 * Tests cover:
 *   1. Documents — create, import, segmentation failures, delete
 *   2. Merge, generate, revise — keys, notes, links and chat across operations
 *   3. Stale targets — merged and re-segmented keys
 *   4. Concurrency and cancellation — rejected and discarded operations
 *   5. Export — one file per note plus an index
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  CollaboratorError,
  ConcurrencyError,
  DocumentNotFoundError,
  ExtractionInsufficientError,
  InputError,
  NoteNotFoundError,
  OperationCancelledError,
  SegmentationUpstreamError,
  StaleTargetError,
  TopicNotFoundError,
} from "../errors/index.js";
import { ModelError } from "../collaborators/errors.js";
import { INDEX_INTRO } from "../notes/renderer.js";
import { PromptLibrary } from "../prompts/index.js";
import { MemoryStore } from "../store/memory-store.js";
import {
  captureLogger,
  LECTURE,
  LECTURE_PARAGRAPHS,
  LECTURE_TOPICS,
  revisionReply,
  ScriptedLanguageModel,
  segmentReply,
  summaryReply,
  testConfig,
} from "../testing/fakes.js";
import { run, section, test } from "../testing/harness.js";
import { NotesEngine } from "./engine.js";

const prompts = new PromptLibrary();
const NOW = new Date("2026-03-01T10:00:00.000Z");

const MERGED_NAME = JSON.stringify({
  name: "Membranes and transport",
  description: "Bilayer structure and movement across it",
});
const MERGED_SUMMARY = summaryReply("Membranes and transport", [
  ["Bilayer", "Lipids form two layers."],
  ["Transport", "Channels and pumps move ions."],
]);
const SIGNALLING_SUMMARY = summaryReply("Cell signalling", [
  ["Receptors", "Hormones bind receptors on membranes and transport signals."],
]);

function setup() {
  const model = new ScriptedLanguageModel();
  const store = new MemoryStore();
  const { logger, lines } = captureLogger();
  let ids = 0;
  const engine = new NotesEngine({
    model,
    store,
    prompts,
    logger,
    config: testConfig(),
    enricher: null,
    generateId: () => `doc-${++ids}`,
    clock: () => NOW,
  });
  return { model, store, engine, lines };
}

async function segmented() {
  const context = setup();
  context.model.reply("segment", segmentReply(LECTURE_TOPICS));
  await context.engine.createDocument(LECTURE, { title: "Lecture" });
  return context;
}

/** Lecture merged into T4 + T3, with notes for both. */
async function withNotes() {
  const context = await segmented();
  context.model.reply("merge-name", MERGED_NAME);
  await context.engine.mergeTopics("doc-1", ["T1", "T2"]);
  context.model.reply("summarize", MERGED_SUMMARY, SIGNALLING_SUMMARY);
  await context.engine.generateNotes("doc-1");
  return context;
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

// ═══════════════════════════════════════════════════════════════════════════
// DOCUMENTS
// ═══════════════════════════════════════════════════════════════════════════

section("Documents");

test("a new document is stored and segmented", async () => {
  const { model, engine } = setup();
  model.reply("segment", segmentReply(LECTURE_TOPICS));
  const result = await engine.createDocument(LECTURE, { title: "Lecture" });

  assert.equal(result.segmentationError, undefined);
  assert.equal(result.document.id, "doc-1");
  assert.equal(result.document.title, "Lecture");
  assert.equal(result.document.granularity, 50);
  assert.equal(result.document.state, "segmented");
  assert.equal(result.document.updatedAt, NOW.toISOString());
  assert.deepEqual(result.segmentation, { reduced: true, attempts: 1, blockCount: 3, unassignedBlocks: [] });
  assert.deepEqual(
    result.topics.map((t) => [t.key, t.name]),
    [
      ["T1", "Cell membranes"],
      ["T2", "Membrane transport"],
      ["T3", "Cell signalling"],
    ]
  );
  assert.deepEqual(result.unassigned, []);
  assert.deepEqual((await engine.getDocument("doc-1")).document, result.document);
});

test("too little text is rejected before anything is stored", async () => {
  const { engine, store } = setup();
  await assert.rejects(engine.createDocument("Too short."), ExtractionInsufficientError);
  assert.deepEqual(await store.list(), []);
});

test("granularity must be an integer on the scale", async () => {
  const { engine } = await segmented();
  await assert.rejects(
    engine.setGranularity("doc-1", 50.5),
    (err: unknown) =>
      err instanceof InputError && err.message === "Granularity must be an integer between 0 and 100, got 50.5."
  );
  await assert.rejects(engine.createDocument(LECTURE, { granularity: 101 }), InputError);
});

test("a failed segmentation leaves the document uploaded", async () => {
  const { model, engine } = setup();
  model.reply("segment", new ModelError("quota exceeded", false));
  const result = await engine.createDocument(LECTURE);

  assert.ok(result.segmentationError instanceof CollaboratorError);
  assert.equal(result.segmentationError.message, "Segmentation failed: language-model failed: quota exceeded");
  assert.equal(result.document.state, "uploaded");
  assert.deepEqual(result.topics, []);
  assert.deepEqual(result.unassigned, [{ kind: "text", start: 0, end: 400 }]);

  model.reply("segment", segmentReply(LECTURE_TOPICS));
  const retried = await engine.segmentDocument("doc-1");
  assert.equal(retried.document.state, "segmented");
  assert.equal(retried.topics.length, 3);
  await assert.rejects(
    engine.segmentDocument("doc-1"),
    (err: unknown) =>
      err instanceof InputError &&
      err.message === "Document doc-1 is already segmented; change its granularity to segment it again."
  );
});

test("a segmentation with no topics is an error, not an empty document", async () => {
  const { model, engine } = setup();
  const empty = segmentReply([{ name: "x", blocks: [] }]);
  model.reply("segment", empty, empty, empty);
  const result = await engine.createDocument(LECTURE);

  assert.ok(result.segmentationError instanceof SegmentationUpstreamError);
  assert.equal(
    result.segmentationError.message,
    "The language model did not produce a valid segmentation after 3 attempt(s)"
  );
  assert.equal(result.document.state, "uploaded");
  assert.deepEqual(result.topics, []);
});

test("overlapping transcript cues still segment", async () => {
  const { model, engine } = setup();
  model.reply("segment", segmentReply(LECTURE_TOPICS));
  const cue = (start: number, startMs: number, endMs: number) => ({
    start,
    end: start + 10,
    media: "lecture.mp3",
    startMs,
    endMs,
  });
  const result = await engine.createDocument({
    text: LECTURE,
    cues: [cue(0, 0, 10500), cue(120, 10000, 20500), cue(260, 20000, 30000)],
  });

  assert.equal(result.segmentationError, undefined);
  assert.equal(result.document.state, "segmented");
  assert.deepEqual(
    result.topics.map((t) => [t.key, t.spans.filter((span) => span.kind === "time")]),
    [
      ["T1", [{ kind: "time", media: "lecture.mp3", startMs: 0, endMs: 10500 }]],
      ["T2", [{ kind: "time", media: "lecture.mp3", startMs: 10500, endMs: 20500 }]],
      ["T3", [{ kind: "time", media: "lecture.mp3", startMs: 20500, endMs: 30000 }]],
    ]
  );
});

test("files are imported through the extractor", async () => {
  const dir = mkdtempSync(join(tmpdir(), "engine-import-"));
  try {
    const file = join(dir, "lecture.md");
    writeFileSync(file, `# Lecture notes\n\n${LECTURE}`);
    const { model, engine } = setup();
    model.reply(
      "segment",
      segmentReply([
        { name: "Cell membranes", blocks: [0, 1] },
        { name: "Membrane transport", blocks: [2] },
        { name: "Cell signalling", blocks: [3] },
      ])
    );
    const result = await engine.importFile({ path: file });
    assert.equal(result.document.title, "Lecture notes");
    assert.deepEqual(
      result.topics.map((t) => t.name),
      ["Cell membranes", "Membrane transport", "Cell signalling"]
    );

    await assert.rejects(
      engine.importFile({ path: join(dir, "slides.pdf") }),
      (err: unknown) =>
        err instanceof CollaboratorError &&
        err.message === `extractor failed: Unsupported file type: ${join(dir, "slides.pdf")}`
    );
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("deleted documents are gone", async () => {
  const { engine } = await segmented();
  await engine.deleteDocument("doc-1");
  await assert.rejects(
    engine.getDocument("doc-1"),
    (err: unknown) => err instanceof DocumentNotFoundError && err.message === "Document not found: doc-1"
  );
  await assert.rejects(engine.deleteDocument("doc-1"), DocumentNotFoundError);
});

// ═══════════════════════════════════════════════════════════════════════════
// MERGE, GENERATE, REVISE
// ═══════════════════════════════════════════════════════════════════════════

section("Merge, generate and revise");

test("merging two topics creates a new key in place of both", async () => {
  const { model, engine } = await segmented();
  model.reply("merge-name", MERGED_NAME);
  const result = await engine.mergeTopics("doc-1", ["T1", "T2"]);

  assert.equal(result.topic.key, "T4");
  assert.equal(result.topic.name, "Membranes and transport");
  assert.deepEqual(result.absorbed, ["T1", "T2"]);
  assert.equal(result.nameSource, "model");
  assert.deepEqual(result.staleNotes, []);
  assert.deepEqual(
    result.topics.map((t) => t.key),
    ["T4", "T3"]
  );
});

test("notes are generated for every live topic", async () => {
  const { model, engine } = await segmented();
  model.reply("merge-name", MERGED_NAME);
  await engine.mergeTopics("doc-1", ["T1", "T2"]);
  model.reply("summarize", MERGED_SUMMARY, SIGNALLING_SUMMARY);
  const result = await engine.generateNotes("doc-1");

  assert.deepEqual(result.generated, ["T4", "T3"]);
  assert.deepEqual(result.reused, []);
  assert.deepEqual(result.failures, []);
  assert.deepEqual(
    result.notes.map((n) => [n.topicKey, n.topicVersion, n.revision, n.body.title]),
    [
      ["T4", 2, 1, "Membranes and transport"],
      ["T3", 1, 1, "Cell signalling"],
    ]
  );
  assert.equal((await engine.getDocument("doc-1")).document.state, "notes_generated");

  const [merged] = model.requestsFor("summarize");
  assert.ok(merged.prompt.includes(LECTURE_PARAGRAPHS[0]));
  assert.ok(merged.prompt.includes(LECTURE_PARAGRAPHS[1]));
  assert.ok(!merged.prompt.includes(LECTURE_PARAGRAPHS[2]));
});

test("current notes are reused unless regeneration is asked for", async () => {
  const { model, engine } = await withNotes();
  const again = await engine.generateNotes("doc-1");
  assert.deepEqual(again.generated, []);
  assert.deepEqual(again.reused, ["T4", "T3"]);
  assert.equal(model.requestsFor("summarize").length, 2);

  model.reply("summarize", MERGED_SUMMARY);
  const forced = await engine.generateNotes("doc-1", { regenerate: true, topicKeys: ["T4"] });
  assert.deepEqual(forced.generated, ["T4"]);
  assert.deepEqual(
    (await engine.listTopics("doc-1")).map((t) => [t.key, t.noteRevision, t.noteFormat]),
    [
      ["T4", 1, "markdown"],
      ["T3", 1, "markdown"],
    ]
  );
});

test("a failed topic does not block the others", async () => {
  const { model, engine } = await segmented();
  model.reply(
    "summarize",
    new ModelError("rate limited", true),
    summaryReply("Membrane transport", [["Pumps", "Ions move."]]),
    summaryReply("Cell signalling", [["Receptors", "Messages arrive."]])
  );
  const result = await engine.generateNotes("doc-1");

  assert.deepEqual(result.generated, ["T2", "T3"]);
  assert.equal(result.failures.length, 1);
  assert.equal(result.failures[0].topicKey, "T1");
  assert.equal(result.failures[0].error.message, "Could not summarize T1: language-model failed: rate limited");
  assert.deepEqual(
    (await engine.listTopics("doc-1")).map((t) => t.noteRevision),
    [null, 1, 1]
  );
});

test("unknown topics are rejected before any generation", async () => {
  const { model, engine } = await segmented();
  await assert.rejects(
    engine.generateNotes("doc-1", { topicKeys: ["T1", "T9"] }),
    (err: unknown) => err instanceof TopicNotFoundError && err.message === "Topic T9 does not exist in document doc-1"
  );
  assert.equal(model.requestsFor("summarize").length, 0);
});

test("generating for a merged-away key names the merged topic", async () => {
  const { model, engine } = await segmented();
  model.reply("merge-name", MERGED_NAME);
  await engine.mergeTopics("doc-1", ["T1", "T2"]);
  await assert.rejects(
    engine.generateNotes("doc-1", { topicKeys: ["T1"] }),
    (err: unknown) =>
      err instanceof StaleTargetError && err.message === "Topic T1 was merged into T4." && err.currentKey === "T4"
  );
  assert.equal(model.requestsFor("summarize").length, 0);
});

test("links point at related notes by their current name", async () => {
  const { engine } = await withNotes();
  const signalling = await engine.getNote("doc-1", "T3");
  assert.equal(signalling.fileName, "t3-cell-signalling.md");
  assert.equal(
    signalling.content,
    [
      "# Cell signalling",
      "## Receptors",
      "Hormones bind receptors on membranes and transport signals.",
      "## Related topics",
      "- [Membranes and transport](t4-membranes-and-transport.md)",
    ].join("\n\n") + "\n"
  );

  const merged = await engine.getNote("doc-1", "T4");
  assert.equal(
    merged.content,
    "# Membranes and transport\n\n## Bilayer\n\nLipids form two layers.\n\n## Transport\n\nChannels and pumps move ions.\n"
  );
});

test("notes can be rendered in another format", async () => {
  const { engine } = await withNotes();
  const html = await engine.getNote("doc-1", "T3", { format: "html" });
  assert.equal(html.fileName, "t3-cell-signalling.html");
  assert.ok(html.content.includes('<li><a href="t4-membranes-and-transport.html">Membranes and transport</a></li>'));
});

test("revising one note leaves the other untouched", async () => {
  const { model, engine } = await withNotes();
  const before = await engine.getNote("doc-1", "T3");

  model.reply(
    "revise",
    revisionReply(
      "Membranes and transport",
      [
        ["Bilayer", "Lipids form two layers."],
        ["Transport", "Channels and pumps move ions."],
        ["Example", "Nerve cells pump sodium."],
      ],
      "Added an example."
    )
  );
  const result = await engine.reviseNote("doc-1", "T4", "Add an example", { expectedRevision: 1 });

  assert.equal(result.reply, "Added an example.");
  assert.equal(result.note.revision, 2);
  assert.deepEqual(
    result.note.body.sections.map((s) => s.heading),
    ["Bilayer", "Transport", "Example"]
  );
  assert.deepEqual(
    result.turns.map((t) => [t.sender, t.kind, t.text]),
    [
      ["user", "message", "Add an example"],
      ["assistant", "message", "Added an example."],
    ]
  );
  assert.deepEqual(
    (await engine.getChatHistory("doc-1", "T4")).map((t) => t.text),
    ["Add an example", "Added an example."]
  );
  assert.deepEqual(await engine.getChatHistory("doc-1", "T3"), []);

  const after = await engine.getNote("doc-1", "T3");
  assert.equal(after.content, before.content);
  assert.deepEqual(after.note, before.note);
});

test("a failed revision records an error turn and keeps the note", async () => {
  const { model, engine } = await withNotes();
  model.reply("revise", new ModelError("down", false));
  await assert.rejects(
    engine.reviseNote("doc-1", "T4", "Shorten it"),
    (err: unknown) => err instanceof CollaboratorError && err.message === "language-model failed: down"
  );

  assert.deepEqual(
    (await engine.getChatHistory("doc-1", "T4")).map((t) => [t.sender, t.kind, t.text]),
    [
      ["user", "message", "Shorten it"],
      [
        "assistant",
        "error",
        "Revision failed: The language-model could not complete the request: language-model failed: down",
      ],
    ]
  );
  assert.equal((await engine.getNote("doc-1", "T4")).note.revision, 1);
});

test("a revision against an older revision is refused", async () => {
  const { engine } = await withNotes();
  await assert.rejects(
    engine.reviseNote("doc-1", "T4", "Add an example", { expectedRevision: 3 }),
    (err: unknown) =>
      err instanceof StaleTargetError && err.message === "The note for T4 is at revision 1, not 3."
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// STALE TARGETS
// ═══════════════════════════════════════════════════════════════════════════

section("Stale targets");

test("merged-away keys point at the merged topic", async () => {
  const { engine } = await withNotes();
  await assert.rejects(
    engine.reviseNote("doc-1", "T1", "Add an example"),
    (err: unknown) =>
      err instanceof StaleTargetError && err.message === "Topic T1 was merged into T4." && err.currentKey === "T4"
  );
  await assert.rejects(engine.getNote("doc-1", "T2"), StaleTargetError);
});

test("merging topics with notes makes those notes stale", async () => {
  const { model, engine } = await withNotes();
  model.reply("merge-name", new ModelError("offline", false));
  const result = await engine.mergeTopics("doc-1", ["T4", "T3"]);

  assert.equal(result.topic.key, "T5");
  assert.equal(result.topic.name, "Membranes and transport & Cell signalling");
  assert.equal(result.nameSource, "fallback");
  assert.deepEqual(result.staleNotes, ["T4", "T3"]);
  assert.equal((await engine.getDocument("doc-1")).document.state, "segmented");

  await assert.rejects(
    engine.getNote("doc-1", "T4"),
    (err: unknown) => err instanceof StaleTargetError && err.message === "Topic T4 was merged into T5."
  );
  await assert.rejects(engine.getNote("doc-1", "T5"), NoteNotFoundError);

  const old = await engine.getNote("doc-1", "T4", { allowStale: true });
  assert.equal(old.note.status, "stale");
  assert.equal(old.fileName, "t4-membranes-and-transport.md");
  assert.ok(!old.content.includes("## Related topics"));
});

test("re-segmenting replaces every key", async () => {
  const { model, engine } = await segmented();
  model.reply("summarize", summaryReply("Cell membranes", [["Structure", "Two layers."]]));
  await engine.generateNotes("doc-1", { topicKeys: ["T1"] });

  model.reply("segment", segmentReply(LECTURE_TOPICS));
  const result = await engine.setGranularity("doc-1", 0);

  assert.equal(result.document.granularity, 0);
  assert.deepEqual(
    result.topics.map((t) => t.key),
    ["T4", "T5", "T6"]
  );
  assert.deepEqual(result.staleNotes, ["T1"]);
  await assert.rejects(
    engine.getNote("doc-1", "T1"),
    (err: unknown) =>
      err instanceof StaleTargetError &&
      err.message === "Topic T1 was replaced when the document was segmented again." &&
      err.currentKey === undefined
  );
});

test("a re-segmentation with no topics keeps the previous ones", async () => {
  const { model, engine } = await segmented();
  model.reply("summarize", summaryReply("Cell membranes", [["Structure", "Two layers."]]));
  await engine.generateNotes("doc-1", { topicKeys: ["T1"] });

  model.reply("segment", segmentReply([]), segmentReply([]), segmentReply([]));
  await assert.rejects(engine.setGranularity("doc-1", 0), SegmentationUpstreamError);

  const overview = await engine.getDocument("doc-1");
  assert.equal(overview.document.granularity, 50);
  assert.deepEqual(
    overview.topics.map((t) => t.key),
    ["T1", "T2", "T3"]
  );
  assert.equal((await engine.getNote("doc-1", "T1")).note.status, "current");
});

// ═══════════════════════════════════════════════════════════════════════════
// CONCURRENCY AND CANCELLATION
// ═══════════════════════════════════════════════════════════════════════════

section("Concurrency and cancellation");

test("a second mutation of a busy document is rejected", async () => {
  const { model, engine } = await segmented();
  const gate = deferred();
  model.reply(
    "summarize",
    () => gate.promise.then(() => summaryReply("Cell membranes", [["Structure", "Two layers."]])),
    summaryReply("Membrane transport", [["Pumps", "Ions move."]]),
    summaryReply("Cell signalling", [["Receptors", "Messages arrive."]])
  );

  const generation = engine.generateNotes("doc-1");
  await assert.rejects(
    engine.mergeTopics("doc-1", ["T1", "T2"]),
    (err: unknown) =>
      err instanceof ConcurrencyError &&
      err.message === "Document doc-1 is busy (generateNotes in progress); retry mergeTopics later"
  );

  gate.resolve();
  assert.deepEqual((await generation).generated, ["T1", "T2", "T3"]);
  assert.deepEqual(
    (await engine.listTopics("doc-1")).map((t) => t.key),
    ["T1", "T2", "T3"]
  );
});

test("a cancelled operation saves nothing", async () => {
  const { model, engine } = await segmented();
  const controller = new AbortController();
  controller.abort();
  await assert.rejects(
    engine.mergeTopics("doc-1", ["T1", "T2"], { signal: controller.signal }),
    (err: unknown) =>
      err instanceof OperationCancelledError && err.message === "mergeTopics was cancelled; no changes were saved"
  );
  assert.equal(model.requestsFor("merge-name").length, 0);
  assert.equal((await engine.listTopics("doc-1")).length, 3);
});

test("cancelling during generation discards the notes already made", async () => {
  const { model, engine } = await segmented();
  const controller = new AbortController();
  model.reply(
    "summarize",
    () => {
      controller.abort();
      return summaryReply("Cell membranes", [["Structure", "Two layers."]]);
    },
    summaryReply("Membrane transport", [["Pumps", "Ions move."]]),
    summaryReply("Cell signalling", [["Receptors", "Messages arrive."]])
  );

  await assert.rejects(engine.generateNotes("doc-1", { signal: controller.signal }), OperationCancelledError);
  assert.deepEqual(
    (await engine.listTopics("doc-1")).map((t) => t.noteRevision),
    [null, null, null]
  );
  assert.equal((await engine.getDocument("doc-1")).document.state, "segmented");
});

// ═══════════════════════════════════════════════════════════════════════════
// EXPORT
// ═══════════════════════════════════════════════════════════════════════════

section("Export");

test("every current note is exported with an index", async () => {
  const { engine } = await withNotes();
  const files = await engine.exportNotes("doc-1");

  assert.deepEqual(
    files.map((f) => f.fileName),
    ["t4-membranes-and-transport.md", "t3-cell-signalling.md", "index.md"]
  );
  assert.equal(
    files[2].content,
    `# Lecture\n\n${INDEX_INTRO}\n\n- [Membranes and transport](t4-membranes-and-transport.md)\n- [Cell signalling](t3-cell-signalling.md)\n`
  );
  assert.equal(files[1].content, (await engine.getNote("doc-1", "T3")).content);
});

test("LaTeX exports use .tex files", async () => {
  const { engine } = await withNotes();
  const files = await engine.exportNotes("doc-1", "latex");
  assert.deepEqual(
    files.map((f) => f.fileName),
    ["t4-membranes-and-transport.tex", "t3-cell-signalling.tex", "index.tex"]
  );
});

test("a document without notes has nothing to export", async () => {
  const { engine } = await segmented();
  await assert.rejects(
    engine.exportNotes("doc-1"),
    (err: unknown) => err instanceof InputError && err.message === "Document doc-1 has no notes to export yet."
  );
});

await run();
