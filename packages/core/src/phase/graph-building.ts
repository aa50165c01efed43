import type { Beat, GraphOptions, GraphSummary } from "../types.js";
import { DEFAULT_SIMILARITY_WEIGHTS, GRAPH_DEFAULTS } from "../constants/remix-config.js";
import { DegenerateGraphError, EmptyInputError, InputError } from "../errors.js";
import { beatDistance } from "./similarity.js";

const DEFAULT_GRAPH_OPTIONS: GraphOptions = {
  threshold: GRAPH_DEFAULTS.THRESHOLD,
  weights: DEFAULT_SIMILARITY_WEIGHTS,
  phasePenalty: GRAPH_DEFAULTS.PHASE_PENALTY,
  beatsPerBar: GRAPH_DEFAULTS.BEATS_PER_BAR
};

/**
 * Checks the ordering invariants the graph and the walk rely on:
 * indices match positions, durations are positive, starts strictly increase
 * and slices do not overlap.
 */
export function assertBeatSequence(beats: readonly Beat[]): void {
  for (let i = 0; i < beats.length; i++) {
    const beat = beats[i];
    if (beat.index !== i) {
      throw new InputError(`Beat at position ${i} has index ${beat.index}`);
    }
    if (!(beat.duration > 0) || !Number.isFinite(beat.duration)) {
      throw new InputError(`Beat ${i} has non-positive duration ${beat.duration}`);
    }
    if (!(beat.start >= 0) || !Number.isFinite(beat.start)) {
      throw new InputError(`Beat ${i} has invalid start ${beat.start}`);
    }
    if (i > 0) {
      const previous = beats[i - 1];
      if (beat.start <= previous.start) {
        throw new InputError(`Beat ${i} does not start after beat ${i - 1}`);
      }
      // Small tolerance: boundaries usually come from sample positions divided by the rate
      if (previous.start + previous.duration > beat.start + 1e-9) {
        throw new InputError(`Beat ${i - 1} overlaps beat ${i}`);
      }
    }
  }
}

/**
 * Bar-position penalty between two beats.
 */
export function phasePenalty(
  a: Pick<Beat, "index">,
  b: Pick<Beat, "index">,
  options: Pick<GraphOptions, "phasePenalty" | "beatsPerBar"> = DEFAULT_GRAPH_OPTIONS
): number {
  return a.index % options.beatsPerBar === b.index % options.beatsPerBar ? 0 : options.phasePenalty;
}

/**
 * Populates every beat's `neighbors` with the transitions whose distance
 * (similarity plus phase penalty) is strictly below the threshold.
 *
 * Each unordered pair is measured once and recorded in both adjacency lists.
 * Scanning pairs row by row keeps every list in ascending `dest` order, the
 * same order an exhaustive (i, j) scan would produce. The walk relies on that
 * order when it picks a neighbor by position.
 *
 * Existing neighbor lists are replaced, so rebuilding with another threshold
 * never accumulates stale edges.
 */
export function buildGraph(beats: Beat[], options: Partial<GraphOptions> = {}): GraphSummary {
  const resolved: GraphOptions = {
    threshold: options.threshold ?? DEFAULT_GRAPH_OPTIONS.threshold,
    weights: options.weights ?? DEFAULT_GRAPH_OPTIONS.weights,
    phasePenalty: options.phasePenalty ?? DEFAULT_GRAPH_OPTIONS.phasePenalty,
    beatsPerBar: options.beatsPerBar ?? DEFAULT_GRAPH_OPTIONS.beatsPerBar
  };

  if (beats.length === 0) {
    throw new EmptyInputError();
  }
  assertBeatSequence(beats);
  if (beats.length < 2) {
    throw new DegenerateGraphError(
      `Graph needs at least 2 beats to form a transition, got ${beats.length}`
    );
  }

  for (const beat of beats) {
    beat.neighbors = [];
  }

  let edgeCount = 0;
  let distanceSum = 0;
  let minDistance = Number.POSITIVE_INFINITY;
  let maxDistance = Number.NEGATIVE_INFINITY;

  for (let i = 0; i < beats.length; i++) {
    const source = beats[i];
    for (let j = i + 1; j < beats.length; j++) {
      const target = beats[j];
      const distance =
        beatDistance(source, target, resolved.weights) + phasePenalty(source, target, resolved);

      if (distance < resolved.threshold) {
        source.neighbors.push({ dest: j, distance });
        target.neighbors.push({ dest: i, distance });
        edgeCount += 2;
        distanceSum += distance * 2;
        minDistance = Math.min(minDistance, distance);
        maxDistance = Math.max(maxDistance, distance);
      }
    }
  }

  return {
    beatCount: beats.length,
    edgeCount,
    threshold: resolved.threshold,
    branchingBeats: beats.filter((beat) => beat.neighbors.length > 0).length,
    minDistance: edgeCount > 0 ? minDistance : null,
    meanDistance: edgeCount > 0 ? distanceSum / edgeCount : null,
    maxDistance: edgeCount > 0 ? maxDistance : null
  };
}
