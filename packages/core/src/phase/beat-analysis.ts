import type { Beat, BeatAnalysisOptions, SampleBuffer } from "../types.js";
import { DEFAULT_ANALYSIS_OPTIONS } from "../constants/remix-config.js";
import { InputError } from "../errors.js";
import { detectOnsets, downmix } from "./beat-analysis/onset-detection.js";
import {
  amplitudeToDecibels,
  computeChroma,
  computeRms,
  computeTimbre,
  hannWindow,
  magnitudeSpectrum
} from "./beat-analysis/spectrum.js";

/**
 * Segments a sample buffer into beats and measures their features.
 *
 * Segmentation runs on a mono downmix. Every pair of consecutive onsets
 * becomes a candidate beat; candidates shorter than one analysis window are
 * skipped and the survivors are re-indexed so `index` stays equal to the
 * position in the returned array. Features come from a single Hann-windowed
 * frame centered on the beat:
 * - timbre: log band energies
 * - pitch: chroma
 * - loudness: RMS in dB, used for both start and max loudness
 * - confidence: always 1 (the onset detector does not grade its picks)
 *
 * @param buffer Decoded audio
 * @param overrides Analyzer tuning; unspecified values use the defaults
 * @returns Ordered beats with empty neighbor lists
 */
export function analyzeBeats(buffer: SampleBuffer, overrides: Partial<BeatAnalysisOptions> = {}): Beat[] {
  const options: BeatAnalysisOptions = {
    windowSize: overrides.windowSize ?? DEFAULT_ANALYSIS_OPTIONS.windowSize,
    envelopeRate: overrides.envelopeRate ?? DEFAULT_ANALYSIS_OPTIONS.envelopeRate,
    onsetThreshold: overrides.onsetThreshold ?? DEFAULT_ANALYSIS_OPTIONS.onsetThreshold,
    minBeatInterval: overrides.minBeatInterval ?? DEFAULT_ANALYSIS_OPTIONS.minBeatInterval
  };
  const { sampleRate } = buffer;

  if (buffer.channels.length === 0) {
    throw new InputError("Sample buffer has no channels");
  }

  const mono = downmix(buffer.channels);
  const onsets = detectOnsets(mono, sampleRate, options);
  const window = hannWindow(options.windowSize);
  const beats: Beat[] = [];

  for (let i = 0; i < onsets.length - 1; i++) {
    const startSample = onsets[i];
    const endSample = onsets[i + 1];
    if (endSample - startSample < options.windowSize) {
      continue;
    }

    const mid = Math.floor((startSample + endSample) / 2);
    const windowStart = Math.min(
      Math.max(0, mid - Math.floor(options.windowSize / 2)),
      mono.length - options.windowSize
    );
    const chunk = mono.subarray(windowStart, windowStart + options.windowSize);
    const windowed = chunk.map((sample, k) => sample * window[k]);
    const spectrum = magnitudeSpectrum(windowed);
    const loudness = amplitudeToDecibels(computeRms(chunk));

    beats.push({
      index: beats.length,
      start: startSample / sampleRate,
      duration: (endSample - startSample) / sampleRate,
      timbre: computeTimbre(spectrum),
      pitch: computeChroma(spectrum, sampleRate),
      loudnessStart: loudness,
      loudnessMax: loudness,
      confidence: 1,
      neighbors: []
    });
  }

  return beats;
}
