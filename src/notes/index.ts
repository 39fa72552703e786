/**
 * Notes: synthesis, hyperlink scoring and rendering.
 */

export {
  NoteSchema,
  NoteBodySchema,
  NoteSectionSchema,
  NoteImageSchema,
  type Note,
  type NoteBody,
  type NoteSection,
  type NoteImage,
  type RenderableNote,
  type RenderableLink,
  type RenderableIndex,
} from "./schema.js";

export { tokenize, scoreCandidate, computeHyperlinks, type LinkCandidate } from "./hyperlinks.js";

export {
  NoteSynthesizer,
  gatherSourceText,
  imagesWithin,
  SUPPLEMENT_HEADING,
  type NoteSynthesizerDeps,
  type SynthesisOptions,
  type SynthesisResult,
} from "./synthesizer.js";

export { TextNoteRenderer, INDEX_INTRO, escapeHtml, escapeLatex, escapeLatexProse, parseContent } from "./renderer.js";

export { slugify, noteFileName, resolveLinks, toRenderable, renderNote, type RenderedNote, type LinkFilter } from "./view.js";
