/**
 * Remix Configuration Constants
 *
 * Default values for the similarity metric, graph building, the walk and the
 * reference beat analyzer. Everything here is frozen; callers override
 * values through RemixOptions instead of mutating these objects.
 */

import type { BeatAnalysisOptions, SimilarityWeights } from "../types.js";

/**
 * Per-feature weights of the similarity distance.
 *
 * Duration and pitch dominate: two beats of clearly different length are
 * never interchangeable no matter how close their timbre is.
 */
export const DEFAULT_SIMILARITY_WEIGHTS: Readonly<SimilarityWeights> = Object.freeze({
  timbre: 1,
  pitch: 10,
  loudnessStart: 1,
  loudnessMax: 1,
  duration: 100,
  confidence: 1
});

/**
 * Graph building defaults
 */
export const GRAPH_DEFAULTS = {
  /** Distance below which a transition is kept (lower is stricter) */
  THRESHOLD: 60,

  /** Penalty for connecting beats at different positions in the bar */
  PHASE_PENALTY: 100,

  /** Assumed 4/4; no downbeat analysis is done */
  BEATS_PER_BAR: 4
} as const;

/**
 * Walk defaults
 */
export const GENERATION_DEFAULTS = {
  /** 5 minutes */
  TARGET_DURATION_SECONDS: 300,

  BRANCH_PROBABILITY: 0.5
} as const;

/**
 * Reference analyzer defaults
 */
export const DEFAULT_ANALYSIS_OPTIONS: Readonly<BeatAnalysisOptions> = Object.freeze({
  windowSize: 1024,
  envelopeRate: 50, // 20ms frames
  onsetThreshold: 0.05,
  minBeatInterval: 0.3
});

/** Length of the timbre and pitch vectors */
export const FEATURE_DIMENSIONS = 12;

/** Lowest frequency that contributes to chroma (A0) */
export const CHROMA_MIN_FREQUENCY = 27.5;

/** Keeps log() finite on silent frames */
export const LOG_FLOOR = 1e-9;
