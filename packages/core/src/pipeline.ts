import type {
  Beat,
  GraphSummary,
  Logger,
  PipelineContext,
  PipelineResult,
  RemixOptions,
  ResolvedRemixOptions,
  SampleBuffer
} from "./types.js";
import { resolveRemixOptions } from "./config/options-resolver.js";
import { analyzeBeats } from "./phase/beat-analysis.js";
import { buildGraph } from "./phase/graph-building.js";
import { generateTrack } from "./phase/track-generation.js";
import { createSeededRandom } from "./random.js";
import { createConsoleLogger } from "./logger.js";
import { ConfigurationError, DegenerateGraphError, EmptyInputError, InputError } from "./errors.js";

/**
 * Runs the three-phase remix pipeline on a decoded sample buffer.
 *
 * - Phase 1 (Beat Analysis): segments the audio into beats with features
 * - Phase 2 (Graph Building): connects beats whose distance is below the threshold
 * - Phase 3 (Track Generation): walks the graph until the target duration is reached
 *
 * Options are resolved and validated before any analysis runs. A graph
 * without edges (or a single-beat input) degrades to a sequential walk with a
 * warning, unless `degenerateGraph: "reject"` asks for a DegenerateGraphError.
 *
 * @param buffer Decoded input audio
 * @param options Remix options; unspecified values use the defaults
 * @param context Logger and an optional replacement beat extractor
 * @returns Generated audio with the analyzed beats, diagnostics and replay metadata
 */
export function runPipeline(
  buffer: SampleBuffer,
  options: RemixOptions = {},
  context: PipelineContext = {}
): PipelineResult {
  const logger = context.logger ?? createConsoleLogger();
  const { options: resolved, replayOptions } = resolveRemixOptions(options);
  assertSampleBuffer(buffer);

  const extractBeats = context.extractBeats ?? ((input: SampleBuffer) => analyzeBeats(input, resolved.analysis));
  logger.info(`Analyzing ${buffer.channels[0].length} frames at ${buffer.sampleRate} Hz...`);
  const beats = extractBeats(buffer);
  if (beats.length === 0) {
    throw new EmptyInputError();
  }
  logger.info(`Detected ${beats.length} beats`);

  logger.info(`Building graph with threshold ${resolved.threshold}...`);
  const { graph, degenerate } = buildGraphWithPolicy(beats, resolved, logger);
  logger.info(`Created ${graph.edgeCount} edges across ${graph.branchingBeats} branching beats`);

  logger.info(`Generating ${resolved.targetDurationSeconds} seconds of audio (seed ${resolved.seed})...`);
  const generation = generateTrack(buffer, beats, {
    targetDurationSeconds: resolved.targetDurationSeconds,
    branchProbability: resolved.branchProbability,
    random: createSeededRandom(resolved.seed)
  });
  const { diagnostics } = generation;
  logger.info(
    `Emitted ${diagnostics.path.length} beats (${diagnostics.jumps} jumps, ${diagnostics.wraparounds} wraparounds)`
  );

  return {
    output: generation.output,
    beats,
    diagnostics: {
      graph,
      generation: diagnostics,
      degenerateGraph: degenerate
    },
    meta: {
      sampleRate: buffer.sampleRate,
      channelCount: buffer.channels.length,
      targetSamples: diagnostics.targetSamples,
      seed: resolved.seed,
      replayOptions
    }
  };
}

/**
 * Main API entry point for remix generation.
 *
 * Async wrapper around runPipeline so callers can await it alongside file
 * decoding and encoding; the work itself is synchronous.
 */
export async function generateRemix(
  buffer: SampleBuffer,
  options: RemixOptions = {},
  context: PipelineContext = {}
): Promise<PipelineResult> {
  return runPipeline(buffer, options, context);
}

function assertSampleBuffer(buffer: SampleBuffer): void {
  if (!Number.isFinite(buffer.sampleRate) || buffer.sampleRate <= 0) {
    throw new ConfigurationError(`sampleRate must be positive, got ${buffer.sampleRate}`);
  }
  if (buffer.channels.length === 0) {
    throw new InputError("Sample buffer has no channels");
  }
  const frameCount = buffer.channels[0].length;
  if (buffer.channels.some((channel) => channel.length !== frameCount)) {
    throw new InputError("Sample buffer channels differ in length");
  }
}

function buildGraphWithPolicy(
  beats: Beat[],
  options: ResolvedRemixOptions,
  logger: Logger
): { graph: GraphSummary; degenerate: boolean } {
  const graphOptions = {
    threshold: options.threshold,
    weights: options.weights,
    phasePenalty: options.phasePenalty,
    beatsPerBar: options.beatsPerBar
  };

  let graph: GraphSummary;
  try {
    graph = buildGraph(beats, graphOptions);
  } catch (error) {
    if (!(error instanceof DegenerateGraphError) || options.degenerateGraph === "reject") {
      throw error;
    }
    logger.warn(`${error.message}; looping the track sequentially`);
    return { graph: emptyGraphSummary(beats, options.threshold), degenerate: true };
  }

  if (graph.edgeCount === 0) {
    const message = `No beat pair is closer than threshold ${options.threshold}`;
    if (options.degenerateGraph === "reject") {
      throw new DegenerateGraphError(message);
    }
    logger.warn(`${message}; looping the track sequentially`);
    return { graph, degenerate: true };
  }

  return { graph, degenerate: false };
}

function emptyGraphSummary(beats: Beat[], threshold: number): GraphSummary {
  for (const beat of beats) {
    beat.neighbors = [];
  }
  return {
    beatCount: beats.length,
    edgeCount: 0,
    threshold,
    branchingBeats: 0,
    minDistance: null,
    meanDistance: null,
    maxDistance: null
  };
}
