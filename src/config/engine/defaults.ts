/**
 * Default engine configuration.
 *
 * The enrichment and hyperlink thresholds are starting points, not
 * calibrated values; override them per deployment.
 */

import type { EngineConfig } from "./schema.js";

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  granularity: {
    minCeiling: 2,
    maxCeiling: 24,
    defaultGranularity: 50,
  },

  segmentation: {
    minContentChars: 50,
    maxContentChars: 500_000,
    maxRetries: 2,
    allowUnassigned: true,
    blockPreviewChars: 1200,
  },

  collaborators: {
    timeoutMs: 120_000,
    retries: 1,
    backoffMs: 1000,
  },

  synthesis: {
    parseRetries: 1,
    maxSourceChars: 30_000,
    defaultFormat: "markdown",
  },

  enrichment: {
    minSourceChars: 400,
    enrichOnUncertainty: true,
  },

  hyperlinks: {
    threshold: 0.5,
    maxOutDegree: 5,
    minTokenLength: 3,
  },

  revision: {
    historyTurns: 10,
    maxInstructionChars: 4000,
  },
};
