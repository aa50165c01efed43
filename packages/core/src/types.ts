/**
 * A candidate transition from one beat to another.
 *
 * `dest` is an index into the same beat array the source beat lives in,
 * so the graph never holds object references between beats.
 */
export interface Neighbor {
  dest: number;
  distance: number;
}

/**
 * One beat-synchronized slice of the song together with its features.
 */
export interface Beat {
  /** Position in the beat sequence (0-based). Its value mod 4 is the rhythmic phase. */
  index: number;
  /** Start of the slice in seconds */
  start: number;
  /** Length of the slice in seconds (always > 0) */
  duration: number;
  /** 12-dimensional timbre vector (log band energies) */
  timbre: number[];
  /** 12-dimensional chroma vector */
  pitch: number[];
  /** Loudness at the start of the slice in dB */
  loudnessStart: number;
  /** Peak loudness of the slice in dB */
  loudnessMax: number;
  /** Detection confidence from 0 to 1 */
  confidence: number;
  /** Outgoing transitions, filled in by graph building */
  neighbors: Neighbor[];
}

/**
 * Raw audio handed to and produced by the engine.
 * Every channel holds the same number of frames.
 */
export interface SampleBuffer {
  sampleRate: number;
  channels: Float32Array[];
}

export interface SimilarityWeights {
  timbre: number;
  pitch: number;
  loudnessStart: number;
  loudnessMax: number;
  duration: number;
  confidence: number;
}

export interface GraphOptions {
  /** Edges are kept when their distance is strictly below this value */
  threshold: number;
  weights: Readonly<SimilarityWeights>;
  /** Added to the distance of two beats in different bar positions */
  phasePenalty: number;
  beatsPerBar: number;
}

export interface GraphSummary {
  beatCount: number;
  edgeCount: number;
  threshold: number;
  /** Beats with at least one outgoing edge */
  branchingBeats: number;
  minDistance: number | null;
  meanDistance: number | null;
  maxDistance: number | null;
}

/** Returns a uniform value in [0, 1) */
export type RandomSource = () => number;

export interface TrackGenerationOptions {
  targetDurationSeconds: number;
  branchProbability: number;
  random: RandomSource;
}

export interface GenerationDiagnostics {
  /** Beat indices in the order they were emitted */
  path: number[];
  jumps: number;
  wraparounds: number;
  /** Frames emitted before the final trim */
  emittedSamples: number;
  targetSamples: number;
}

export interface TrackGenerationResult {
  output: SampleBuffer;
  diagnostics: GenerationDiagnostics;
}

export interface BeatAnalysisOptions {
  /** Samples per spectral analysis frame (power of two) */
  windowSize: number;
  /** RMS envelope frames per second */
  envelopeRate: number;
  /** Minimum RMS for an envelope peak to count as an onset */
  onsetThreshold: number;
  /** Minimum spacing between onsets in seconds */
  minBeatInterval: number;
}

/**
 * Anything that turns a sample buffer into an ordered beat sequence.
 * The last detected boundary without a successor must not produce a beat.
 */
export type BeatExtractor = (buffer: SampleBuffer) => Beat[];

export type DegenerateGraphPolicy = "warn" | "reject";

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Options accepted by the remix pipeline. Everything except the input is optional.
 */
export interface RemixOptions {
  /** Requested output length in seconds */
  targetDurationSeconds?: number;
  threshold?: number;
  branchProbability?: number;
  /** Seed for the walk; drawn at random when omitted and reported in the result */
  seed?: number;
  weights?: Partial<SimilarityWeights>;
  phasePenalty?: number;
  beatsPerBar?: number;
  degenerateGraph?: DegenerateGraphPolicy;
  analysis?: Partial<BeatAnalysisOptions>;
}

export interface ResolvedRemixOptions {
  targetDurationSeconds: number;
  threshold: number;
  branchProbability: number;
  seed: number;
  weights: Readonly<SimilarityWeights>;
  phasePenalty: number;
  beatsPerBar: number;
  degenerateGraph: DegenerateGraphPolicy;
  analysis: Readonly<BeatAnalysisOptions>;
}

export interface PipelineContext {
  logger?: Logger;
  /** Replaces the built-in analyzer */
  extractBeats?: BeatExtractor;
}

export interface PipelineDiagnostics {
  graph: GraphSummary;
  generation: GenerationDiagnostics;
  /** Set when the graph had no usable edges and the walk ran sequentially */
  degenerateGraph: boolean;
}

export interface PipelineResult {
  output: SampleBuffer;
  beats: Beat[];
  diagnostics: PipelineDiagnostics;
  meta: {
    sampleRate: number;
    channelCount: number;
    targetSamples: number;
    seed: number;
    /** Fully resolved options; passing them back reproduces the run */
    replayOptions: RemixOptions;
  };
}
