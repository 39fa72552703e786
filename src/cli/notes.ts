#!/usr/bin/env node
/**
 * Command-line front end: turn a study document into linked topic notes.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Generate notes:
 *   npm run notes -- generate lecture.md --granularity 70 --format markdown
 *
 * Merge topics before generating:
 *   npm run notes -- generate lecture.md --merge T1,T2
 *
 * Preview the segmentation prompt without calling the model:
 *   npm run notes -- preview lecture.md --granularity 30
 *
 * Options:
 *   --granularity <n>   0 (few broad topics) to 100 (many narrow ones); default 50
 *   --format <f>        markdown | latex | html (default: markdown)
 *   --images            Describe images referenced by the document
 *   --merge <keys>      Comma-separated topic keys to merge after segmentation
 *   --out <dir>         Where to write the notes (default: output/notes/<documentId>)
 *   --store <dir>       Document store directory (default: NOTES_STORE_DIR)
 *   --json              Print a JSON summary instead of text
 *   --verbose           Also print log lines to the console
 *   --no-color          Disable ANSI colors
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - Notes written (or preview printed)
 *   1 - Error
 *   2 - Notes written, but some topics failed
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  config,
  EngineConfigError,
  loadEngineConfigFile,
  NoteFormat,
  requireGeminiApiKey,
  resolveEngineConfig,
  type EngineConfig,
} from "../config/index.js";
import { GeminiLanguageModel } from "../collaborators/gemini.js";
import { PlainTextExtractor } from "../collaborators/plain-text-extractor.js";
import { NotesEngine, validateGranularity } from "../engine/engine.js";
import { EngineError } from "../errors/index.js";
import { GranularityMapper } from "../granularity/mapper.js";
import { createLogger, initRunId } from "../logging/index.js";
import { PromptLibrary } from "../prompts/index.js";
import { splitBlocks } from "../segmentation/blocks.js";
import { buildSegmentationPrompt, checkContentSize } from "../segmentation/segmenter.js";
import { FileStore } from "../store/file-store.js";
import type { Topic } from "../topics/schema.js";
import { describeSpan } from "../topics/spans.js";

// ============================================================
// CLI Parsing
// ============================================================

const HELP = `
Usage: topic-notes <command> <file> [options]

Commands:
  generate <file>     Segment the file, generate notes and write them to disk
  preview <file>      Print the segmentation prompt without calling the model

Options:
  --granularity <n>   0 (few broad topics) to 100 (many narrow ones); default 50
  --format <f>        markdown | latex | html (default: markdown)
  --images            Describe images referenced by the document
  --merge <keys>      Comma-separated topic keys to merge after segmentation
  --out <dir>         Where to write the notes (default: output/notes/<documentId>)
  --store <dir>       Document store directory (default: NOTES_STORE_DIR)
  --json              Print a JSON summary instead of text
  --verbose           Also print log lines to the console
  --no-color          Disable ANSI colors
  -h, --help          Show this help message

Exit codes:
  0 - Notes written (or preview printed)
  1 - Error
  2 - Notes written, but some topics failed
`;

export interface CliOptions {
  command: "generate" | "preview";
  file: string;
  granularity?: number;
  format?: NoteFormat;
  images: boolean;
  merge: string[];
  out?: string;
  store?: string;
  json: boolean;
  verbose: boolean;
  color: boolean;
}

/**
 * Thrown for unusable command lines; the message is shown with the usage.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Split "T1, T2,,T3" into ["T1", "T2", "T3"].
 */
export function parseTopicKeys(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value
    .split(",")
    .map((key) => key.trim().toUpperCase())
    .filter((key) => key !== "");
}

export function parseCliArgs(argv: string[]): CliOptions | "help" {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      granularity: { type: "string" },
      format: { type: "string" },
      images: { type: "boolean", default: false },
      merge: { type: "string" },
      out: { type: "string" },
      store: { type: "string" },
      json: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) return "help";

  const [command, file] = positionals;
  if (command !== "generate" && command !== "preview") {
    throw new UsageError(command === undefined ? "A command is required" : `Unknown command: ${command}`);
  }
  if (file === undefined) {
    throw new UsageError(`${command} needs a file`);
  }

  let granularity: number | undefined;
  if (values.granularity !== undefined) {
    granularity = Number(values.granularity);
    if (!Number.isInteger(granularity) || granularity < 0 || granularity > 100) {
      throw new UsageError(`--granularity must be an integer from 0 to 100, got: ${values.granularity}`);
    }
  }

  let format: NoteFormat | undefined;
  if (values.format !== undefined) {
    const parsed = NoteFormat.safeParse(values.format);
    if (!parsed.success) {
      throw new UsageError(`--format must be one of: ${NoteFormat.options.join(", ")}`);
    }
    format = parsed.data;
  }

  return {
    command,
    file,
    granularity,
    format,
    images: values.images,
    merge: parseTopicKeys(values.merge),
    out: values.out,
    store: values.store,
    json: values.json,
    verbose: values.verbose,
    color: !values["no-color"],
  };
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

let useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

/**
 * One line per topic: key, name and owned spans.
 */
export function formatTopicLines(topics: readonly Pick<Topic, "key" | "name" | "spans">[]): string[] {
  const width = Math.max(0, ...topics.map((topic) => topic.key.length));
  return topics.map(
    (topic) => `  ${topic.key.padEnd(width)}  ${topic.name}  ${topic.spans.map(describeSpan).join(" ")}`
  );
}

function describeFailure(err: unknown): string {
  if (err instanceof EngineConfigError) return err.format();
  if (err instanceof EngineError) return err.userMessage();
  return err instanceof Error ? err.message : String(err);
}

function engineConfigFromEnv(): EngineConfig {
  return config.engineConfigPath ? loadEngineConfigFile(config.engineConfigPath) : resolveEngineConfig();
}

// ============================================================
// Commands
// ============================================================

async function preview(options: CliOptions): Promise<void> {
  const engineConfig = engineConfigFromEnv();
  const extracted = await new PlainTextExtractor().extract({ path: resolve(options.file) });
  checkContentSize(extracted.text, engineConfig.segmentation);

  const hint = new GranularityMapper(engineConfig.granularity).map(
    options.granularity ?? engineConfig.granularity.defaultGranularity
  );
  const blocks = splitBlocks(extracted.text);
  const prompt = buildSegmentationPrompt(new PromptLibrary().preload(), {
    text: extracted.text,
    blocks,
    hint,
    previewChars: engineConfig.segmentation.blockPreviewChars,
  });

  if (options.json) {
    console.log(JSON.stringify({ hint, blockCount: blocks.length, prompt }, null, 2));
    return;
  }
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", ` Segmentation prompt (granularity ${hint.granularity}, ${hint.level})`));
  console.log(c("bold", "═".repeat(60)));
  console.log("");
  console.log(prompt);
}

async function generate(options: CliOptions): Promise<number> {
  const engineConfig = engineConfigFromEnv();
  const logger = createLogger({
    level: config.logLevel,
    logDir: config.logDir,
    file: config.logToFile,
    console: options.verbose,
    component: config.appName,
  });

  const model = new GeminiLanguageModel({ apiKey: requireGeminiApiKey(), model: config.gemini.model });
  const engine = new NotesEngine({
    model,
    config: engineConfig,
    logger,
    store: new FileStore(resolve(options.store ?? config.storeDir)),
    imageAnalyzer: options.images ? model : undefined,
  });

  const created = await engine.importFile(
    { path: resolve(options.file) },
    { granularity: options.granularity === undefined ? undefined : validateGranularity(options.granularity) }
  );
  const documentId = created.document.id;
  if (created.segmentationError) {
    throw created.segmentationError;
  }

  let topics = created.topics;
  if (options.merge.length > 0) {
    const merged = await engine.mergeTopics(documentId, options.merge);
    topics = merged.topics;
  }

  const generation = await engine.generateNotes(documentId, {
    format: options.format,
    processImages: options.images,
  });
  const outDir = resolve(options.out ?? join("output", "notes", documentId));
  const written: string[] = [];
  if (generation.notes.length > 0) {
    mkdirSync(outDir, { recursive: true });
    for (const file of await engine.exportNotes(documentId, options.format)) {
      const path = join(outDir, file.fileName);
      writeFileSync(path, file.content, "utf-8");
      written.push(path);
    }
  }

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          documentId,
          topics: topics.map((t) => ({ key: t.key, name: t.name })),
          generated: generation.generated,
          failures: generation.failures.map((f) => ({ topicKey: f.topicKey, error: f.error.message })),
          files: written,
        },
        null,
        2
      )
    );
  } else {
    console.log(c("bold", `Document ${documentId}`));
    console.log(c("cyan", `Topics (${topics.length}):`));
    for (const line of formatTopicLines(topics)) console.log(line);
    for (const note of generation.notes) {
      if (note.partial) {
        console.log(c("yellow", `  ${note.topicKey}: ${note.warnings.join("; ")}`));
      }
    }
    for (const failure of generation.failures) {
      console.log(c("red", `  ${failure.topicKey} failed: ${failure.error.userMessage()}`));
    }
    console.log(c("green", `Wrote ${written.length} file(s) to ${outDir}`));
  }

  return generation.failures.length > 0 ? 2 : 0;
}

async function main(): Promise<void> {
  let options: CliOptions | "help";
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(c("red", `Error: ${err instanceof Error ? err.message : String(err)}`));
    console.error(HELP);
    process.exit(1);
  }

  if (options === "help") {
    console.log(HELP);
    process.exit(0);
  }

  useColors = useColors && options.color;
  initRunId();

  if (options.command === "preview") {
    await preview(options);
    process.exit(0);
  }
  process.exit(await generate(options));
}

// Only run when executed directly (not imported by tests)
const isDirectExecution =
  process.argv[1] !== undefined &&
  (process.argv[1].endsWith("notes.ts") || process.argv[1].endsWith("notes.js"));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    console.error(c("red", `Error: ${describeFailure(err)}`));
    process.exit(1);
  });
}
