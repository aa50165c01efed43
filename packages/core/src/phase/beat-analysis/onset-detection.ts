/**
 * Onset detection for beat segmentation
 */

import type { BeatAnalysisOptions } from "../../types.js";

/**
 * Downmix all channels to mono by averaging.
 */
export function downmix(channels: readonly Float32Array[]): Float32Array {
  if (channels.length === 1) {
    return channels[0];
  }
  const length = channels[0]?.length ?? 0;
  const mono = new Float32Array(length);
  for (const channel of channels) {
    for (let i = 0; i < length; i++) {
      mono[i] += channel[i] / channels.length;
    }
  }
  return mono;
}

/**
 * RMS of consecutive non-overlapping frames. The last frame may be shorter.
 */
export function computeRmsEnvelope(samples: Float32Array, frameSize: number): number[] {
  const envelope: number[] = [];
  for (let offset = 0; offset < samples.length; offset += frameSize) {
    const end = Math.min(offset + frameSize, samples.length);
    let sum = 0;
    for (let i = offset; i < end; i++) {
      sum += samples[i] * samples[i];
    }
    envelope.push(Math.sqrt(sum / (end - offset)));
  }
  return envelope;
}

/**
 * Finds beat boundaries as sample positions.
 *
 * A boundary is an envelope frame that is a strict local maximum above the
 * onset threshold and lies more than the minimum beat interval after the
 * previous boundary. Position 0 always opens the list. The end of the buffer
 * is deliberately not a boundary: the audio after the last onset has no
 * closing boundary and never becomes a beat.
 */
export function detectOnsets(
  samples: Float32Array,
  sampleRate: number,
  options: Pick<BeatAnalysisOptions, "envelopeRate" | "onsetThreshold" | "minBeatInterval">
): number[] {
  const frameSize = Math.max(1, Math.floor(sampleRate / options.envelopeRate));
  const envelope = computeRmsEnvelope(samples, frameSize);
  const minFrames = Math.round(options.minBeatInterval * options.envelopeRate);

  const onsets = [0];
  let lastPeak = 0;
  for (let i = 1; i < envelope.length - 1; i++) {
    const value = envelope[i];
    if (value > envelope[i - 1] && value > envelope[i + 1] && value > options.onsetThreshold) {
      if (i - lastPeak > minFrames) {
        onsets.push(i * frameSize);
        lastPeak = i;
      }
    }
  }
  return onsets;
}
