/**
 * Hyperlink scoring between a note and the other live topics.
 *
 * A candidate topic scores 1 when its full name appears in the note text;
 * otherwise its score is the share of its name and description tokens that
 * also occur in the note. Edges at or above the threshold are kept, best
 * first, up to the configured out-degree.
 */

import type { HyperlinkConfig } from "../config/engine/schema.js";
import type { HyperlinkEdge } from "../topics/schema.js";

export interface LinkCandidate {
  key: string;
  name: string;
  description: string;
}

/** Names shorter than this never count as an exact mention. */
const MIN_MENTION_LENGTH = 4;

const STOPWORDS: ReadonlySet<string> = new Set([
  "and", "are", "but", "can", "for", "from", "has", "have", "how", "into",
  "its", "not", "of", "one", "such", "than", "that", "the", "their", "then",
  "there", "these", "this", "those", "use", "used", "was", "were", "what",
  "when", "which", "with", "you", "your",
]);

export function tokenize(text: string, minLength: number): Set<string> {
  const tokens = new Set<string>();
  for (const token of text.toLowerCase().split(/[^\p{L}\p{N}]+/u)) {
    if (token.length >= minLength && !STOPWORDS.has(token)) {
      tokens.add(token);
    }
  }
  return tokens;
}

export function scoreCandidate(
  noteText: string,
  noteTokens: ReadonlySet<string>,
  candidate: LinkCandidate,
  minTokenLength: number
): number {
  const name = candidate.name.trim().toLowerCase();
  if (name.length >= MIN_MENTION_LENGTH && noteText.toLowerCase().includes(name)) {
    return 1;
  }

  const tokens = tokenize(`${candidate.name} ${candidate.description}`, minTokenLength);
  if (tokens.size === 0) return 0;
  let hits = 0;
  for (const token of tokens) {
    if (noteTokens.has(token)) hits += 1;
  }
  return hits / tokens.size;
}

/**
 * Outbound edges for the note of `sourceKey`. Candidates are live topics
 * in display order; ties keep that order.
 */
export function computeHyperlinks(
  sourceKey: string,
  noteText: string,
  candidates: readonly LinkCandidate[],
  config: HyperlinkConfig
): HyperlinkEdge[] {
  const noteTokens = tokenize(noteText, config.minTokenLength);

  return candidates
    .filter((candidate) => candidate.key !== sourceKey)
    .map((candidate) => ({
      candidate,
      score: scoreCandidate(noteText, noteTokens, candidate, config.minTokenLength),
    }))
    .filter(({ score }) => score > 0 && score >= config.threshold)
    .sort((a, b) => b.score - a.score)
    .slice(0, config.maxOutDegree)
    .map(({ candidate, score }) => ({
      source: sourceKey,
      target: candidate.key,
      anchor: candidate.name,
      score: Math.round(score * 1000) / 1000,
    }));
}
