export { generateRemix, runPipeline } from "./pipeline.js";
export { analyzeBeats } from "./phase/beat-analysis.js";
export { beatDistance, euclideanDistance } from "./phase/similarity.js";
export { buildGraph, phasePenalty, assertBeatSequence } from "./phase/graph-building.js";
export { generateTrack, targetSampleCount, beatSampleSpan } from "./phase/track-generation.js";
export { resolveRemixOptions } from "./config/options-resolver.js";
export { createSeededRandom, drawSeed } from "./random.js";
export { createConsoleLogger, silentLogger } from "./logger.js";
export type { ConsoleLoggerOptions, LogLevel } from "./logger.js";
export {
  ConfigurationError,
  DegenerateGraphError,
  EmptyInputError,
  InputError,
  LoopwalkError,
  isLoopwalkError
} from "./errors.js";
export type { LoopwalkErrorCode } from "./errors.js";
export {
  DEFAULT_ANALYSIS_OPTIONS,
  DEFAULT_SIMILARITY_WEIGHTS,
  GENERATION_DEFAULTS,
  GRAPH_DEFAULTS
} from "./constants/remix-config.js";
export type {
  Beat,
  BeatAnalysisOptions,
  BeatExtractor,
  DegenerateGraphPolicy,
  GenerationDiagnostics,
  GraphOptions,
  GraphSummary,
  Logger,
  Neighbor,
  PipelineContext,
  PipelineDiagnostics,
  PipelineResult,
  RandomSource,
  RemixOptions,
  ResolvedRemixOptions,
  SampleBuffer,
  SimilarityWeights,
  TrackGenerationOptions,
  TrackGenerationResult
} from "./types.js";
