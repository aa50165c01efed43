import type {
  Beat,
  GenerationDiagnostics,
  SampleBuffer,
  TrackGenerationOptions,
  TrackGenerationResult
} from "../types.js";
import { ConfigurationError, EmptyInputError, InputError } from "../errors.js";
import { pickIndex } from "../random.js";

interface SampleSpan {
  start: number;
  end: number;
}

/**
 * Converts a requested duration to an output frame count.
 */
export function targetSampleCount(durationSeconds: number, sampleRate: number): number {
  return Math.round(durationSeconds * sampleRate);
}

/**
 * Frame range a beat occupies in the source buffer.
 *
 * Both edges are rounded to the nearest frame, so beats whose times were
 * derived from frame positions map back to those exact frames. Spans are at
 * least one frame long so every step of the walk makes progress, and are
 * clamped to the end of the buffer.
 */
export function beatSampleSpan(beat: Beat, sampleRate: number, frameCount: number): SampleSpan {
  const start = Math.round(beat.start * sampleRate);
  if (start >= frameCount) {
    throw new InputError(
      `Beat ${beat.index} starts at frame ${start}, beyond the buffer (${frameCount} frames)`
    );
  }
  const end = Math.min(Math.max(start + 1, Math.round((beat.start + beat.duration) * sampleRate)), frameCount);
  return { start, end };
}

/**
 * Walks the beat graph and concatenates the audio of every visited beat
 * until the target duration is reached.
 *
 * Each step emits the current beat, then draws one value from the random
 * source. A draw below the branch probability on a beat with neighbors
 * jumps to one of them, chosen uniformly by list position (distance plays
 * no part). Otherwise the walk advances to the next beat, wrapping to beat 0
 * after the last one.
 *
 * The output is exactly `round(duration * sampleRate)` frames: the last
 * segment is cut short if needed, nothing is ever padded.
 */
export function generateTrack(
  buffer: SampleBuffer,
  beats: readonly Beat[],
  options: TrackGenerationOptions
): TrackGenerationResult {
  const { targetDurationSeconds, branchProbability, random } = options;

  if (!(targetDurationSeconds > 0) || !Number.isFinite(targetDurationSeconds)) {
    throw new ConfigurationError(`Target duration must be positive, got ${targetDurationSeconds}`);
  }
  if (!(branchProbability >= 0 && branchProbability <= 1)) {
    throw new ConfigurationError(`Branch probability must be within [0, 1], got ${branchProbability}`);
  }
  if (beats.length === 0) {
    throw new EmptyInputError("Cannot generate a track without beats");
  }
  if (buffer.channels.length === 0) {
    throw new InputError("Sample buffer has no channels");
  }

  const frameCount = buffer.channels[0].length;
  if (buffer.channels.some((channel) => channel.length !== frameCount)) {
    throw new InputError("Sample buffer channels differ in length");
  }
  // Resolve every span up front so a bad beat is rejected before the loop starts
  const spans = beats.map((beat) => beatSampleSpan(beat, buffer.sampleRate, frameCount));

  const targetSamples = targetSampleCount(targetDurationSeconds, buffer.sampleRate);
  const output = buffer.channels.map(() => new Float32Array(targetSamples));

  const diagnostics: GenerationDiagnostics = {
    path: [],
    jumps: 0,
    wraparounds: 0,
    emittedSamples: 0,
    targetSamples
  };

  let currentIndex = 0;
  let generatedSamples = 0;

  while (generatedSamples < targetSamples) {
    if (currentIndex >= beats.length) {
      currentIndex = 0;
      diagnostics.wraparounds++;
    }

    const span = spans[currentIndex];
    const length = span.end - span.start;
    const writable = Math.min(length, targetSamples - generatedSamples);
    buffer.channels.forEach((channel, channelIndex) => {
      output[channelIndex].set(channel.subarray(span.start, span.start + writable), generatedSamples);
    });
    generatedSamples += length;
    diagnostics.path.push(currentIndex);

    const neighbors = beats[currentIndex].neighbors;
    const draw = random();
    if (draw < branchProbability && neighbors.length > 0) {
      currentIndex = neighbors[pickIndex(random, neighbors.length)].dest;
      diagnostics.jumps++;
    } else {
      currentIndex++;
    }
  }

  diagnostics.emittedSamples = generatedSamples;

  return {
    output: { sampleRate: buffer.sampleRate, channels: output },
    diagnostics
  };
}
