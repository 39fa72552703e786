/**
 * Granularity mapper: turns the 0–100 granularity scale into a
 * segmentation hint (topic-count range plus a level instruction).
 *
 *   0 ──── macro ──── broad ──── balanced ──── detailed ──── micro ──── 100
 *
 * Pure and total: out-of-range input is clamped, fractions are rounded,
 * and the ranges never shrink as granularity grows.
 */

import type { GranularityLevel } from "../config/engine/enums.js";
import type { GranularityConfig } from "../config/engine/schema.js";
import { DEFAULT_ENGINE_CONFIG } from "../config/engine/defaults.js";

export interface SegmentationHint {
  /** Normalized granularity, an integer in [0, 100] */
  granularity: number;
  level: GranularityLevel;
  /** Instruction sentence passed to the segmentation prompt */
  description: string;
  minTopics: number;
  maxTopics: number;
}

interface LevelBand {
  /** Exclusive upper bound of the band */
  below: number;
  level: GranularityLevel;
  description: string;
}

const LEVEL_BANDS: readonly LevelBand[] = [
  {
    below: 20,
    level: "macro",
    description: "Extract only the broadest, most general macro-topics (very few top-level topics).",
  },
  {
    below: 40,
    level: "broad",
    description: "Extract general macro-topics (a small number of broad topics).",
  },
  {
    below: 60,
    level: "balanced",
    description: "Extract a balanced mix of general topics and some specific sub-topics.",
  },
  {
    below: 80,
    level: "detailed",
    description: "Extract more specific sub-topics with moderate detail.",
  },
  {
    below: Number.POSITIVE_INFINITY,
    level: "micro",
    description: "Extract highly specific, detailed micro-topics (many fine-grained topics).",
  },
];

/**
 * Clamp to [0, 100] and round. Non-finite input falls back to `fallback`.
 */
export function normalizeGranularity(value: number, fallback: number): number {
  if (!Number.isFinite(value)) return fallback;
  return Math.min(100, Math.max(0, Math.round(value)));
}

export class GranularityMapper {
  constructor(private readonly config: GranularityConfig = DEFAULT_ENGINE_CONFIG.granularity) {}

  map(granularity: number): SegmentationHint {
    const g = normalizeGranularity(granularity, this.config.defaultGranularity);
    const { minCeiling, maxCeiling } = this.config;

    const maxTopics = minCeiling + Math.round((g * (maxCeiling - minCeiling)) / 100);
    const minTopics = Math.max(1, Math.ceil(maxTopics / 3));
    const band = LEVEL_BANDS.find((b) => g < b.below) ?? LEVEL_BANDS[LEVEL_BANDS.length - 1];

    return {
      granularity: g,
      level: band.level,
      description: band.description,
      minTopics,
      maxTopics,
    };
  }
}
