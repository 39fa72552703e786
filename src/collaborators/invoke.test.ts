/**
 * Collaborator invocation and model answer parsing tests.
 *
 * Run: node --import tsx src/collaborators/invoke.test.ts
 *
 * Tests cover:
 *   1. Retries — retriable vs permanent failures, backoff, exhaustion
 *   2. Bounds — per-attempt timeout and caller cancellation
 *   3. JSON answers — extraction from prose, syntax and schema issues
 */

import { strict as assert } from "node:assert";
import { z } from "zod";

import { CollaboratorError, CollaboratorTimeoutError, OperationCancelledError } from "../errors/index.js";
import { EnrichmentUnavailableError, isRetriable, ModelError } from "./errors.js";
import { invokeCollaborator, toCollaboratorError } from "./invoke.js";
import { extractJsonObject, parseModelJson } from "./json.js";
import { captureLogger } from "../testing/fakes.js";
import { run, section, test } from "../testing/harness.js";

const FAST = { timeoutMs: 1000, retries: 0, backoffMs: 0 };

/** Call that fails with the given errors in turn, then returns "ok". */
function failing(...errors: unknown[]): { call: () => Promise<string>; attempts: () => number } {
  let attempts = 0;
  return {
    call: async () => {
      const err = errors[attempts];
      attempts += 1;
      if (err !== undefined) throw err;
      return "ok";
    },
    attempts: () => attempts,
  };
}

/** Call that only settles when its signal aborts. */
function hanging(seen: AbortSignal[]): (signal: AbortSignal) => Promise<string> {
  return (signal) =>
    new Promise<string>((_resolve, reject) => {
      seen.push(signal);
      signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
    });
}

// ═══════════════════════════════════════════════════════════════════════════
// RETRIES
// ═══════════════════════════════════════════════════════════════════════════

section("Retries");

test("a successful call returns its value", async () => {
  assert.equal(await invokeCollaborator("language-model", async () => 42, FAST), 42);
});

test("retriable failures are retried and logged", async () => {
  const { logger, lines } = captureLogger();
  const flaky = failing(new ModelError("overloaded", true), new ModelError("overloaded", true));
  const value = await invokeCollaborator("language-model", flaky.call, { ...FAST, retries: 2, logger });
  assert.equal(value, "ok");
  assert.equal(flaky.attempts(), 3);
  assert.equal(lines.length, 2);
  assert.ok(lines[0].line.includes('language-model call failed, retrying {"attempt":1,"delayMs":0,'));
  assert.ok(lines[1].line.includes('{"attempt":2,"delayMs":0,'));
});

test("permanent failures are not retried", async () => {
  const cause = new ModelError("bad request", false, { status: 400 });
  const broken = failing(cause);
  await assert.rejects(
    invokeCollaborator("language-model", broken.call, { ...FAST, retries: 3 }),
    (err: unknown) =>
      err instanceof CollaboratorError &&
      err.message === "language-model failed: bad request" &&
      err.retriable === false &&
      err.cause === cause
  );
  assert.equal(broken.attempts(), 1);
});

test("the last retriable failure is raised when retries run out", async () => {
  const down = failing(new EnrichmentUnavailableError("offline", true), new EnrichmentUnavailableError("still offline", true));
  await assert.rejects(
    invokeCollaborator("enricher", down.call, { ...FAST, retries: 1 }),
    (err: unknown) =>
      err instanceof CollaboratorError && err.message === "enricher failed: still offline" && err.retriable
  );
  assert.equal(down.attempts(), 2);
});

test("engine errors pass through unchanged", async () => {
  const original = new CollaboratorError("store failed: disk full", { collaborator: "store", retriable: false });
  await assert.rejects(
    invokeCollaborator("store", failing(original).call, FAST),
    (err: unknown) => err === original
  );
});

test("thrown non-errors and synchronous throws are wrapped", async () => {
  await assert.rejects(
    invokeCollaborator("store", () => Promise.reject("boom"), FAST),
    (err: unknown) => err instanceof CollaboratorError && err.message === "store failed: boom"
  );
  await assert.rejects(
    invokeCollaborator(
      "renderer",
      () => {
        throw new TypeError("not a function");
      },
      FAST
    ),
    (err: unknown) => err instanceof CollaboratorError && err.message === "renderer failed: not a function"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// BOUNDS
// ═══════════════════════════════════════════════════════════════════════════

section("Timeouts and cancellation");

test("an attempt that outlives its timeout is aborted", async () => {
  const seen: AbortSignal[] = [];
  await assert.rejects(
    invokeCollaborator("enricher", hanging(seen), { ...FAST, timeoutMs: 20 }),
    (err: unknown) =>
      err instanceof CollaboratorTimeoutError && err.message === "enricher did not respond within 20ms"
  );
  assert.equal(seen.length, 1);
  assert.equal(seen[0].aborted, true);
});

test("timeouts are retriable", async () => {
  const seen: AbortSignal[] = [];
  await assert.rejects(
    invokeCollaborator("enricher", hanging(seen), { ...FAST, timeoutMs: 10, retries: 1 }),
    CollaboratorTimeoutError
  );
  assert.equal(seen.length, 2);
});

test("an already aborted signal never calls the collaborator", async () => {
  const controller = new AbortController();
  controller.abort();
  const never = failing();
  await assert.rejects(
    invokeCollaborator("language-model", never.call, { ...FAST, signal: controller.signal, operation: "generateNotes" }),
    (err: unknown) =>
      err instanceof OperationCancelledError && err.message === "generateNotes was cancelled; no changes were saved"
  );
  assert.equal(never.attempts(), 0);
});

test("aborting mid-call cancels the attempt", async () => {
  const controller = new AbortController();
  const seen: AbortSignal[] = [];
  setTimeout(() => controller.abort(), 10);
  await assert.rejects(
    invokeCollaborator("language-model", hanging(seen), { ...FAST, signal: controller.signal }),
    (err: unknown) => err instanceof OperationCancelledError && err.operation === "language-model"
  );
  assert.equal(seen[0].aborted, true);
});

test("aborting during backoff stops the retry", async () => {
  const controller = new AbortController();
  const flaky = failing(new ModelError("overloaded", true));
  setTimeout(() => controller.abort(), 10);
  const started = Date.now();
  await assert.rejects(
    invokeCollaborator("language-model", flaky.call, {
      ...FAST,
      retries: 1,
      backoffMs: 5000,
      signal: controller.signal,
    }),
    OperationCancelledError
  );
  assert.equal(flaky.attempts(), 1);
  assert.ok(Date.now() - started < 5000);
});

test("only errors that say so are retriable", () => {
  assert.equal(isRetriable(new ModelError("429", true)), true);
  assert.equal(isRetriable(new EnrichmentUnavailableError("gone")), false);
  assert.equal(isRetriable(new Error("socket hang up")), false);
  assert.equal(toCollaboratorError("extractor", new Error("unreadable")).collaborator, "extractor");
});

// ═══════════════════════════════════════════════════════════════════════════
// JSON ANSWERS
// ═══════════════════════════════════════════════════════════════════════════

section("JSON answers");

const NameSchema = z.object({ name: z.string() }).strict();

test("the object is taken from fenced or chatty answers", () => {
  assert.equal(extractJsonObject('Sure!\n```json\n{"name": "Osmosis"}\n```'), '{"name": "Osmosis"}');
  assert.equal(extractJsonObject("no braces here"), undefined);
  assert.equal(extractJsonObject("} backwards {"), undefined);
});

test("valid answers are parsed and typed", () => {
  assert.deepEqual(parseModelJson('Here you go: {"name": "Osmosis"}', NameSchema), {
    success: true,
    data: { name: "Osmosis" },
  });
});

test("answers without an object or with broken JSON are reported", () => {
  assert.deepEqual(parseModelJson("I cannot help with that.", NameSchema), {
    success: false,
    issues: ["Response does not contain a JSON object"],
  });
  const broken = parseModelJson('{"name": }', NameSchema);
  assert.equal(broken.success, false);
  assert.ok(!broken.success && broken.issues[0].startsWith("Response is not valid JSON: "));
});

test("schema issues carry their paths", () => {
  assert.deepEqual(parseModelJson('{"title": "x"}', NameSchema), {
    success: false,
    issues: ["name: Required", "(root): Unrecognized key(s) in object: 'title'"],
  });
});

await run();
