/**
 * Note rendering and read-time view tests.
 *
 * Run: node --import tsx src/notes/renderer.test.ts
 *
 * Tests cover:
 *   1. Content parsing — paragraphs and "- " lists
 *   2. Markdown, HTML and LaTeX output, escaping
 *   3. View — file names, link resolution against the live graph
 */

import { strict as assert } from "node:assert";

import { TopicGraph } from "../topics/graph.js";
import { textSpan } from "../topics/spans.js";
import {
  escapeLatex,
  escapeLatexProse,
  escapeMarkdownLinkText,
  INDEX_INTRO,
  parseContent,
  TextNoteRenderer,
} from "./renderer.js";
import type { Note, RenderableNote } from "./schema.js";
import { noteFileName, renderNote, resolveLinks, slugify } from "./view.js";
import { run, section, test } from "../testing/harness.js";

const renderer = new TextNoteRenderer();

const NOTE: RenderableNote = {
  title: "Cell membranes",
  sections: [
    { heading: "Structure", content: "Two layers.\n\n- Lipids\n- Proteins", provenance: "source" },
    { heading: "Background", content: "Extra.", provenance: "enrichment", source: "test-enricher" },
  ],
  images: [{ ref: "fig1.png", caption: "Figure 1", description: "A bilayer." }],
  links: [{ anchor: "Membrane transport", href: "t2-membrane-transport.md" }],
};

// ═══════════════════════════════════════════════════════════════════════════
// CONTENT PARSING
// ═══════════════════════════════════════════════════════════════════════════

section("Content parsing");

test("paragraphs and lists are told apart", () => {
  assert.deepEqual(parseContent("First line\nsecond line\n\n- a\n- b\n\n  \n"), [
    { kind: "paragraph", text: "First line\nsecond line" },
    { kind: "list", items: ["a", "b"] },
  ]);
});

test("a chunk with one non-list line stays a paragraph", () => {
  assert.deepEqual(parseContent("Intro:\n- a"), [{ kind: "paragraph", text: "Intro:\n- a" }]);
});

// ═══════════════════════════════════════════════════════════════════════════
// FORMATS
// ═══════════════════════════════════════════════════════════════════════════

section("Markdown");

test("a full note renders section by section", () => {
  assert.equal(
    renderer.render(NOTE, "markdown"),
    [
      "# Cell membranes",
      "## Structure",
      "Two layers.\n\n- Lipids\n- Proteins",
      "## Background",
      "> Supplementary material from test-enricher",
      "Extra.",
      "## Figures",
      "**Figure 1**: A bilayer.",
      "## Related topics",
      "- [Membrane transport](t2-membrane-transport.md)",
    ].join("\n\n") + "\n"
  );
});

test("the index lists every note", () => {
  assert.equal(
    renderer.renderIndex({ title: "Lecture", entries: [{ title: "Cell membranes", href: "t1-cell-membranes.md" }] }, "markdown"),
    `# Lecture\n\n${INDEX_INTRO}\n\n- [Cell membranes](t1-cell-membranes.md)\n`
  );
});

test("brackets and parentheses in link text are escaped", () => {
  assert.equal(escapeMarkdownLinkText("Ion [Na+] pumps (active)"), "Ion \\[Na+\\] pumps \\(active\\)");
  const note: RenderableNote = { ...NOTE, links: [{ anchor: "Pumps [part 2]", href: "t2-pumps-part-2.md" }] };
  assert.ok(renderer.render(note, "markdown").endsWith("## Related topics\n\n- [Pumps \\[part 2\\]](t2-pumps-part-2.md)\n"));
  assert.equal(
    renderer.renderIndex({ title: "Lecture", entries: [{ title: "a) Intro", href: "t1-a-intro.md" }] }, "markdown"),
    `# Lecture\n\n${INDEX_INTRO}\n\n- [a\\) Intro](t1-a-intro.md)\n`
  );
});

test("file extensions follow the format", () => {
  assert.deepEqual(
    [renderer.fileExtension("markdown"), renderer.fileExtension("latex"), renderer.fileExtension("html")],
    ["md", "tex", "html"]
  );
});

section("HTML");

test("sections, lists and links become elements", () => {
  const html = renderer.render(NOTE, "html");
  assert.ok(html.startsWith('<!DOCTYPE html>\n<html lang="en">\n'));
  assert.ok(html.includes("<title>Cell membranes</title>"));
  assert.ok(html.includes("<h2>Structure</h2>\n<p>Two layers.</p>\n<ul>\n<li>Lipids</li>\n<li>Proteins</li>\n</ul>"));
  assert.ok(html.includes('<p class="supplementary">Supplementary material from test-enricher</p>'));
  assert.ok(html.includes('<li><a href="t2-membrane-transport.md">Membrane transport</a></li>'));
  assert.ok(html.endsWith("</body>\n</html>\n"));
});

test("model text is escaped", () => {
  const html = renderer.render(
    {
      title: "A < B",
      sections: [{ heading: "Tom & Jerry", content: 'Say "hi"\nthen <b>', provenance: "source" }],
      images: [],
      links: [],
    },
    "html"
  );
  assert.ok(html.includes("<h1>A &lt; B</h1>"));
  assert.ok(html.includes("<h2>Tom &amp; Jerry</h2>"));
  assert.ok(html.includes("<p>Say &quot;hi&quot;<br>\nthen &lt;b&gt;</p>"));
});

section("LaTeX");

test("specials are escaped and inline math is kept", () => {
  assert.equal(escapeLatex("a_b{c}\\"), "a\\_b\\{c\\}\\textbackslash{}");
  assert.equal(escapeLatexProse("50% of $x_1$ & more"), "50\\% of $x_1$ \\& more");
});

test("a full note becomes an article", () => {
  const tex = renderer.render(NOTE, "latex");
  assert.ok(tex.startsWith("\\documentclass{article}\n"));
  assert.ok(tex.includes("\\title{Cell membranes}"));
  assert.ok(tex.includes("\\section{Structure}\n\nTwo layers.\n\n\\begin{itemize}\n  \\item Lipids\n  \\item Proteins\n\\end{itemize}"));
  assert.ok(tex.includes("\\emph{Supplementary material from test-enricher}"));
  assert.ok(tex.includes("\\paragraph{Figure 1} A bilayer."));
  assert.ok(tex.includes("  \\item \\href{t2-membrane-transport.md}{Membrane transport}"));
  assert.ok(tex.endsWith("\\end{document}\n"));
});

// ═══════════════════════════════════════════════════════════════════════════
// VIEW
// ═══════════════════════════════════════════════════════════════════════════

section("View");

const AT = "2026-03-01T10:00:00.000Z";

function noteFor(topicKey: string, status: Note["status"] = "current"): Note {
  return {
    id: `note-${topicKey}`,
    topicKey,
    topicVersion: 1,
    format: "markdown",
    body: {
      title: "Cell membranes",
      sections: [{ heading: "Structure", content: "Two layers.", provenance: "source" }],
      images: [],
    },
    revision: 1,
    status,
    partial: false,
    warnings: [],
    generatedAt: AT,
    updatedAt: AT,
  };
}

function linkedGraph(): TopicGraph {
  const graph = TopicGraph.create(400);
  graph.apply([
    { name: "Cell membranes", description: "", spans: [textSpan(0, 120)] },
    { name: "Membrane transport", description: "", spans: [textSpan(120, 260)] },
    { name: "Cell signalling", description: "", spans: [textSpan(260, 400)] },
  ]);
  graph.setOutboundEdges("T1", [
    { source: "T1", target: "T2", anchor: "Membrane transport", score: 1 },
    { source: "T1", target: "T3", anchor: "Cell signalling", score: 0.5 },
  ]);
  return graph;
}

test("slugs are lowercase ASCII", () => {
  assert.equal(slugify("Cell membranes & Transport!"), "cell-membranes-transport");
  assert.equal(slugify("Énergie"), "energie");
  assert.equal(slugify("!!!"), "note");
  assert.equal(slugify("a".repeat(70)), "a".repeat(60));
  assert.equal(noteFileName({ key: "T4", name: "Cell membranes" }, "md"), "t4-cell-membranes.md");
});

test("links use the target's current name", () => {
  const graph = linkedGraph();
  graph.rename("T2", "Active transport");
  assert.deepEqual(resolveLinks(noteFor("T1"), graph, "md"), [
    { anchor: "Active transport", href: "t2-active-transport.md" },
    { anchor: "Cell signalling", href: "t3-cell-signalling.md" },
  ]);
});

test("links are filtered and stale notes have none", () => {
  const graph = linkedGraph();
  assert.deepEqual(
    resolveLinks(noteFor("T1"), graph, "md", (key) => key !== "T3").map((l) => l.href),
    ["t2-membrane-transport.md"]
  );
  assert.deepEqual(resolveLinks(noteFor("T1", "stale"), graph, "md"), []);
});

test("renderNote names the file after the live topic", () => {
  const graph = linkedGraph();
  const rendered = renderNote(noteFor("T1"), graph, renderer, "markdown", (key) => key === "T2");
  assert.equal(rendered.fileName, "t1-cell-membranes.md");
  assert.equal(
    rendered.content,
    "# Cell membranes\n\n## Structure\n\nTwo layers.\n\n## Related topics\n\n- [Membrane transport](t2-membrane-transport.md)\n"
  );
  assert.equal(renderNote(noteFor("T1"), graph, renderer, "html").fileName, "t1-cell-membranes.html");
});

await run();
