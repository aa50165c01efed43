/**
 * Remix Option Resolution
 *
 * Turns the user-facing RemixOptions (everything optional) into the fully
 * specified ResolvedRemixOptions the pipeline runs on, and produces the
 * replay options stored in the result metadata.
 *
 * Every value is validated here, before any audio is analyzed, so a bad
 * option surfaces as a ConfigurationError instead of failing halfway through
 * graph building or generation:
 * - threshold: finite, >= 0
 * - branchProbability: within [0, 1]
 * - targetDurationSeconds: finite, > 0
 * - weights: finite, >= 0
 * - phasePenalty: finite, >= 0
 * - beatsPerBar: positive integer
 * - analysis: power-of-two window, positive rates and intervals
 *
 * The seed is truncated to an integer; when omitted, one is drawn and
 * recorded in the replay options so the exact walk can be reproduced.
 */

import type {
  BeatAnalysisOptions,
  RemixOptions,
  ResolvedRemixOptions,
  SimilarityWeights
} from "../types.js";
import {
  DEFAULT_ANALYSIS_OPTIONS,
  DEFAULT_SIMILARITY_WEIGHTS,
  GENERATION_DEFAULTS,
  GRAPH_DEFAULTS
} from "../constants/remix-config.js";
import { ConfigurationError } from "../errors.js";
import { drawSeed } from "../random.js";

interface ResolveResult {
  options: ResolvedRemixOptions;
  replayOptions: RemixOptions;
}

const WEIGHT_KEYS: (keyof SimilarityWeights)[] = [
  "timbre",
  "pitch",
  "loudnessStart",
  "loudnessMax",
  "duration",
  "confidence"
];

function requireFinite(name: string, value: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a finite number, got ${value}`);
  }
  return value;
}

function requireNonNegative(name: string, value: number): number {
  if (requireFinite(name, value) < 0) {
    throw new ConfigurationError(`${name} must not be negative, got ${value}`);
  }
  return value;
}

function requirePositive(name: string, value: number): number {
  if (requireFinite(name, value) <= 0) {
    throw new ConfigurationError(`${name} must be positive, got ${value}`);
  }
  return value;
}

function resolveWeights(patch: Partial<SimilarityWeights> | undefined): Readonly<SimilarityWeights> {
  if (!patch) {
    return DEFAULT_SIMILARITY_WEIGHTS;
  }
  const weights: SimilarityWeights = { ...DEFAULT_SIMILARITY_WEIGHTS };
  for (const key of WEIGHT_KEYS) {
    const value = patch[key];
    if (value !== undefined) {
      weights[key] = requireNonNegative(`weights.${key}`, value);
    }
  }
  return Object.freeze(weights);
}

function resolveAnalysis(patch: Partial<BeatAnalysisOptions> | undefined): Readonly<BeatAnalysisOptions> {
  const analysis: BeatAnalysisOptions = {
    windowSize: patch?.windowSize ?? DEFAULT_ANALYSIS_OPTIONS.windowSize,
    envelopeRate: patch?.envelopeRate ?? DEFAULT_ANALYSIS_OPTIONS.envelopeRate,
    onsetThreshold: patch?.onsetThreshold ?? DEFAULT_ANALYSIS_OPTIONS.onsetThreshold,
    minBeatInterval: patch?.minBeatInterval ?? DEFAULT_ANALYSIS_OPTIONS.minBeatInterval
  };
  const { windowSize } = analysis;
  if (!Number.isInteger(windowSize) || windowSize < 2 || (windowSize & (windowSize - 1)) !== 0) {
    throw new ConfigurationError(`analysis.windowSize must be a power of two, got ${windowSize}`);
  }
  requirePositive("analysis.envelopeRate", analysis.envelopeRate);
  requireNonNegative("analysis.onsetThreshold", analysis.onsetThreshold);
  requireNonNegative("analysis.minBeatInterval", analysis.minBeatInterval);
  return Object.freeze(analysis);
}

/**
 * Validates RemixOptions and fills in defaults.
 *
 * @throws ConfigurationError when any value is out of range
 */
export function resolveRemixOptions(input: RemixOptions = {}): ResolveResult {
  const targetDurationSeconds = requirePositive(
    "targetDurationSeconds",
    input.targetDurationSeconds ?? GENERATION_DEFAULTS.TARGET_DURATION_SECONDS
  );
  const threshold = requireNonNegative("threshold", input.threshold ?? GRAPH_DEFAULTS.THRESHOLD);

  const branchProbability = requireFinite(
    "branchProbability",
    input.branchProbability ?? GENERATION_DEFAULTS.BRANCH_PROBABILITY
  );
  if (branchProbability < 0 || branchProbability > 1) {
    throw new ConfigurationError(`branchProbability must be within [0, 1], got ${branchProbability}`);
  }

  const phasePenalty = requireNonNegative("phasePenalty", input.phasePenalty ?? GRAPH_DEFAULTS.PHASE_PENALTY);
  const beatsPerBar = input.beatsPerBar ?? GRAPH_DEFAULTS.BEATS_PER_BAR;
  if (!Number.isInteger(beatsPerBar) || beatsPerBar < 1) {
    throw new ConfigurationError(`beatsPerBar must be a positive integer, got ${beatsPerBar}`);
  }

  const degenerateGraph = input.degenerateGraph ?? "warn";
  if (degenerateGraph !== "warn" && degenerateGraph !== "reject") {
    throw new ConfigurationError(`degenerateGraph must be "warn" or "reject", got ${String(degenerateGraph)}`);
  }

  const seed =
    input.seed === undefined ? drawSeed() : Math.trunc(requireFinite("seed", input.seed));

  const options: ResolvedRemixOptions = {
    targetDurationSeconds,
    threshold,
    branchProbability,
    seed,
    weights: resolveWeights(input.weights),
    phasePenalty,
    beatsPerBar,
    degenerateGraph,
    analysis: resolveAnalysis(input.analysis)
  };

  const replayOptions: RemixOptions = {
    targetDurationSeconds,
    threshold,
    branchProbability,
    seed,
    weights: { ...options.weights },
    phasePenalty,
    beatsPerBar,
    degenerateGraph,
    analysis: { ...options.analysis }
  };

  return { options, replayOptions };
}
