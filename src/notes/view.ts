/**
 * Read-time view of notes: resolves hyperlinks through the current edge
 * table and names the files notes are exported to.
 */

import type { NoteFormat } from "../config/engine/enums.js";
import type { NoteRenderer } from "../collaborators/types.js";
import type { TopicGraph } from "../topics/graph.js";
import type { Topic } from "../topics/schema.js";
import type { Note, RenderableLink, RenderableNote } from "./schema.js";

export function slugify(name: string): string {
  const slug = name
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 60)
    .replace(/-+$/, "");
  return slug === "" ? "note" : slug;
}

/**
 * Export file name of a topic's note, e.g. "t4-cell-membranes.md".
 */
export function noteFileName(topic: Pick<Topic, "key" | "name">, extension: string): string {
  return `${topic.key.toLowerCase()}-${slugify(topic.name)}.${extension}`;
}

/** Decides whether a topic's note exists to link to. */
export type LinkFilter = (topicKey: string) => boolean;

/**
 * Links of a note, resolved against the live graph. Only current notes
 * carry links; a stale note's edges no longer exist.
 */
export function resolveLinks(
  note: Note,
  graph: TopicGraph,
  extension: string,
  linkable: LinkFilter = () => true
): RenderableLink[] {
  if (note.status !== "current") return [];

  const links: RenderableLink[] = [];
  for (const edge of graph.edgesFrom(note.topicKey)) {
    const target = graph.get(edge.target);
    if (target && linkable(target.key)) {
      links.push({ anchor: target.name, href: noteFileName(target, extension) });
    }
  }
  return links;
}

export function toRenderable(
  note: Note,
  graph: TopicGraph,
  extension: string,
  linkable?: LinkFilter
): RenderableNote {
  return {
    title: note.body.title,
    sections: note.body.sections,
    images: note.body.images,
    links: resolveLinks(note, graph, extension, linkable),
  };
}

export interface RenderedNote {
  note: Note;
  format: NoteFormat;
  fileName: string;
  content: string;
}

export function renderNote(
  note: Note,
  graph: TopicGraph,
  renderer: NoteRenderer,
  format: NoteFormat = note.format,
  linkable?: LinkFilter
): RenderedNote {
  const extension = renderer.fileExtension(format);
  const topic = graph.get(note.topicKey);
  return {
    note,
    format,
    fileName: noteFileName({ key: note.topicKey, name: topic?.name ?? note.body.title }, extension),
    content: renderer.render(toRenderable(note, graph, extension, linkable), format),
  };
}
