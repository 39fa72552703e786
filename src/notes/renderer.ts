/**
 * TextNoteRenderer: renders note bodies to Markdown, LaTeX or HTML.
 *
 * Section content is treated as lightweight markup: paragraphs separated
 * by blank lines, lists written as "- " lines. Markdown section content is
 * passed through as markup and only link text is escaped; HTML and LaTeX
 * escape all model text, and LaTeX keeps its inline math ($…$) untouched.
 */

import type { NoteFormat } from "../config/engine/enums.js";
import type { NoteRenderer } from "../collaborators/types.js";
import type { NoteImage, NoteSection, RenderableIndex, RenderableNote } from "./schema.js";

export const INDEX_INTRO = "This document provides an overview and links to all generated notes:";

const FILE_EXTENSIONS: Readonly<Record<NoteFormat, string>> = {
  markdown: "md",
  latex: "tex",
  html: "html",
};

export class TextNoteRenderer implements NoteRenderer {
  render(note: RenderableNote, format: NoteFormat): string {
    switch (format) {
      case "markdown":
        return renderMarkdown(note);
      case "latex":
        return renderLatex(note);
      case "html":
        return renderHtml(note);
    }
  }

  renderIndex(index: RenderableIndex, format: NoteFormat): string {
    switch (format) {
      case "markdown":
        return [
          `# ${index.title}`,
          INDEX_INTRO,
          index.entries.map((entry) => markdownLink(entry.title, entry.href)).join("\n"),
        ].join("\n\n") + "\n";
      case "latex":
        return latexDocument(index.title, [
          escapeLatex(INDEX_INTRO),
          latexList(index.entries.map((entry) => `\\href{${entry.href}}{${escapeLatex(entry.title)}}`)),
        ]);
      case "html":
        return htmlDocument(index.title, [
          `<p>${escapeHtml(INDEX_INTRO)}</p>`,
          htmlList(index.entries.map((entry) => htmlLink(entry.href, entry.title))),
        ]);
    }
  }

  fileExtension(format: NoteFormat): string {
    return FILE_EXTENSIONS[format];
  }
}

// ---------------------------------------------------------------------------
// Content parsing
// ---------------------------------------------------------------------------

type ContentBlock = { kind: "paragraph"; text: string } | { kind: "list"; items: string[] };

/**
 * Split section content into paragraphs and "- " lists.
 */
export function parseContent(content: string): ContentBlock[] {
  return content
    .split(/\n[ \t]*\n/)
    .map((chunk) => chunk.trim())
    .filter((chunk) => chunk !== "")
    .map((chunk): ContentBlock => {
      const lines = chunk.split("\n").map((line) => line.trim());
      if (lines.every((line) => line.startsWith("- "))) {
        return { kind: "list", items: lines.map((line) => line.slice(2).trim()) };
      }
      return { kind: "paragraph", text: lines.join("\n") };
    });
}

function supplementNote(section: NoteSection): string | undefined {
  if (section.provenance !== "enrichment") return undefined;
  return `Supplementary material from ${section.source ?? "an external source"}`;
}

function imageLabel(image: NoteImage): string {
  return image.caption ?? image.ref;
}

// ---------------------------------------------------------------------------
// Markdown
// ---------------------------------------------------------------------------

/** Backslash-escape characters that would end a link's text or target early. */
export function escapeMarkdownLinkText(text: string): string {
  return text.replace(/[\\[\]()]/g, "\\$&");
}

function markdownLink(text: string, href: string): string {
  return `- [${escapeMarkdownLinkText(text)}](${href})`;
}

function renderMarkdown(note: RenderableNote): string {
  const blocks: string[] = [`# ${note.title}`];

  for (const section of note.sections) {
    blocks.push(`## ${section.heading}`);
    const supplement = supplementNote(section);
    if (supplement) blocks.push(`> ${supplement}`);
    if (section.content.trim() !== "") blocks.push(section.content.trim());
  }

  if (note.images.length > 0) {
    blocks.push("## Figures");
    for (const image of note.images) {
      blocks.push(`**${imageLabel(image)}**: ${image.description}`);
    }
  }

  if (note.links.length > 0) {
    blocks.push("## Related topics");
    blocks.push(note.links.map((link) => markdownLink(link.anchor, link.href)).join("\n"));
  }

  return blocks.join("\n\n") + "\n";
}

// ---------------------------------------------------------------------------
// HTML
// ---------------------------------------------------------------------------

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function htmlLink(href: string, text: string): string {
  return `<a href="${escapeHtml(href)}">${escapeHtml(text)}</a>`;
}

function htmlList(items: readonly string[]): string {
  return ["<ul>", ...items.map((item) => `<li>${item}</li>`), "</ul>"].join("\n");
}

function htmlDocument(title: string, body: readonly string[]): string {
  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    "</head>",
    "<body>",
    `<h1>${escapeHtml(title)}</h1>`,
    ...body,
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

function renderHtml(note: RenderableNote): string {
  const body: string[] = [];

  for (const section of note.sections) {
    body.push("<section>", `<h2>${escapeHtml(section.heading)}</h2>`);
    const supplement = supplementNote(section);
    if (supplement) body.push(`<p class="supplementary">${escapeHtml(supplement)}</p>`);
    for (const block of parseContent(section.content)) {
      body.push(
        block.kind === "list"
          ? htmlList(block.items.map(escapeHtml))
          : `<p>${escapeHtml(block.text).replace(/\n/g, "<br>\n")}</p>`
      );
    }
    body.push("</section>");
  }

  if (note.images.length > 0) {
    body.push("<h2>Figures</h2>");
    for (const image of note.images) {
      body.push(
        `<figure><figcaption>${escapeHtml(imageLabel(image))}</figcaption><p>${escapeHtml(image.description)}</p></figure>`
      );
    }
  }

  if (note.links.length > 0) {
    body.push("<h2>Related topics</h2>", htmlList(note.links.map((link) => htmlLink(link.href, link.anchor))));
  }

  return htmlDocument(note.title, body);
}

// ---------------------------------------------------------------------------
// LaTeX
// ---------------------------------------------------------------------------

const LATEX_SPECIALS: Readonly<Record<string, string>> = {
  "\\": "\\textbackslash{}",
  "{": "\\{",
  "}": "\\}",
  $: "\\$",
  "&": "\\&",
  "%": "\\%",
  "#": "\\#",
  _: "\\_",
  "~": "\\textasciitilde{}",
  "^": "\\textasciicircum{}",
};

export function escapeLatex(text: string): string {
  return text.replace(/[\\{}$&%#_~^]/g, (char) => LATEX_SPECIALS[char] ?? char);
}

/**
 * Escape prose but keep $…$ inline math as written.
 */
export function escapeLatexProse(text: string): string {
  return text
    .split(/(\$[^$\n]+\$)/)
    .map((part, i) => (i % 2 === 1 ? part : escapeLatex(part)))
    .join("");
}

function latexList(items: readonly string[]): string {
  return ["\\begin{itemize}", ...items.map((item) => `  \\item ${item}`), "\\end{itemize}"].join("\n");
}

function latexDocument(title: string, body: readonly string[]): string {
  return [
    "\\documentclass{article}",
    "\\usepackage[utf8]{inputenc}",
    "\\usepackage{hyperref}",
    `\\title{${escapeLatex(title)}}`,
    "\\date{}",
    "\\begin{document}",
    "\\maketitle",
    "",
    body.join("\n\n"),
    "",
    "\\end{document}",
    "",
  ].join("\n");
}

function renderLatex(note: RenderableNote): string {
  const body: string[] = [];

  for (const section of note.sections) {
    body.push(`\\section{${escapeLatex(section.heading)}}`);
    const supplement = supplementNote(section);
    if (supplement) body.push(`\\emph{${escapeLatex(supplement)}}`);
    for (const block of parseContent(section.content)) {
      body.push(block.kind === "list" ? latexList(block.items.map(escapeLatexProse)) : escapeLatexProse(block.text));
    }
  }

  if (note.images.length > 0) {
    body.push("\\section*{Figures}");
    for (const image of note.images) {
      body.push(`\\paragraph{${escapeLatex(imageLabel(image))}} ${escapeLatexProse(image.description)}`);
    }
  }

  if (note.links.length > 0) {
    body.push(
      "\\section*{Related topics}",
      latexList(note.links.map((link) => `\\href{${link.href}}{${escapeLatex(link.anchor)}}`))
    );
  }

  return latexDocument(note.title, body);
}
