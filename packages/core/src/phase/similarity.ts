import type { Beat, SimilarityWeights } from "../types.js";
import { DEFAULT_SIMILARITY_WEIGHTS } from "../constants/remix-config.js";

type FeatureSource = Pick<
  Beat,
  "timbre" | "pitch" | "loudnessStart" | "loudnessMax" | "duration" | "confidence"
>;

/**
 * Euclidean distance between two feature vectors.
 *
 * Components missing from the shorter vector count as zero, which keeps the
 * result symmetric when analyzers disagree on vector length.
 */
export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  const length = Math.max(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

/**
 * Weighted distance between two beats. Lower means more interchangeable.
 *
 * The metric is a sum of per-feature terms, each symmetric in its arguments,
 * so `beatDistance(a, b) === beatDistance(b, a)` for any weights.
 */
export function beatDistance(
  a: FeatureSource,
  b: FeatureSource,
  weights: Readonly<SimilarityWeights> = DEFAULT_SIMILARITY_WEIGHTS
): number {
  const timbre = euclideanDistance(a.timbre, b.timbre);
  const pitch = euclideanDistance(a.pitch, b.pitch);
  const loudnessStart = Math.abs(a.loudnessStart - b.loudnessStart);
  const loudnessMax = Math.abs(a.loudnessMax - b.loudnessMax);
  const duration = Math.abs(a.duration - b.duration);
  const confidence = Math.abs(a.confidence - b.confidence);

  return (
    timbre * weights.timbre +
    pitch * weights.pitch +
    loudnessStart * weights.loudnessStart +
    loudnessMax * weights.loudnessMax +
    duration * weights.duration +
    confidence * weights.confidence
  );
}
