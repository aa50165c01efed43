/**
 * Spectral helpers: Hann window, magnitude spectrum and per-beat features
 */

import { CHROMA_MIN_FREQUENCY, FEATURE_DIMENSIONS, LOG_FLOOR } from "../../constants/remix-config.js";

const MIDI_A4 = 69;
const FREQ_A4 = 440;

const hannCache = new Map<number, Float32Array>();

export function hannWindow(size: number): Float32Array {
  const cached = hannCache.get(size);
  if (cached) {
    return cached;
  }
  const window = new Float32Array(size);
  for (let i = 0; i < size; i++) {
    window[i] = 0.5 - 0.5 * Math.cos((2 * Math.PI * i) / (size - 1));
  }
  hannCache.set(size, window);
  return window;
}

/**
 * Magnitudes of the non-negative frequency bins (size / 2 + 1 values) of a
 * real frame, computed with an in-place radix-2 FFT.
 */
export function magnitudeSpectrum(frame: Float32Array): Float64Array {
  const size = frame.length;
  if (size < 2 || (size & (size - 1)) !== 0) {
    throw new Error(`FFT size must be a power of two, got ${size}`);
  }

  const re = Float64Array.from(frame);
  const im = new Float64Array(size);

  // Bit-reversal permutation
  for (let i = 1, j = 0; i < size; i++) {
    let bit = size >> 1;
    for (; j & bit; bit >>= 1) {
      j ^= bit;
    }
    j ^= bit;
    if (i < j) {
      [re[i], re[j]] = [re[j], re[i]];
      [im[i], im[j]] = [im[j], im[i]];
    }
  }

  for (let length = 2; length <= size; length <<= 1) {
    const angle = (-2 * Math.PI) / length;
    const wRe = Math.cos(angle);
    const wIm = Math.sin(angle);
    for (let start = 0; start < size; start += length) {
      let curRe = 1;
      let curIm = 0;
      for (let k = 0; k < length / 2; k++) {
        const a = start + k;
        const b = a + length / 2;
        const tRe = re[b] * curRe - im[b] * curIm;
        const tIm = re[b] * curIm + im[b] * curRe;
        re[b] = re[a] - tRe;
        im[b] = im[a] - tIm;
        re[a] += tRe;
        im[a] += tIm;
        const nextRe = curRe * wRe - curIm * wIm;
        curIm = curRe * wIm + curIm * wRe;
        curRe = nextRe;
      }
    }
  }

  const magnitudes = new Float64Array(size / 2 + 1);
  for (let i = 0; i < magnitudes.length; i++) {
    magnitudes[i] = Math.hypot(re[i], im[i]);
  }
  return magnitudes;
}

/**
 * Timbre approximation: log energy of equal-width spectral bands.
 */
export function computeTimbre(spectrum: Float64Array, bands = FEATURE_DIMENSIONS): number[] {
  const binSize = Math.floor(spectrum.length / bands);
  const timbre: number[] = [];
  for (let band = 0; band < bands; band++) {
    let sum = 0;
    for (let j = 0; j < binSize; j++) {
      sum += spectrum[band * binSize + j];
    }
    timbre.push(Math.log(sum + LOG_FLOOR));
  }
  return timbre;
}

/**
 * 12-bin chroma: each bin collects the magnitude of the frequencies nearest
 * to its pitch class, normalized so the strongest class is 1.
 */
export function computeChroma(spectrum: Float64Array, sampleRate: number): number[] {
  const chroma: number[] = new Array(FEATURE_DIMENSIONS).fill(0);
  const fftSize = (spectrum.length - 1) * 2;

  for (let i = 1; i < spectrum.length; i++) {
    const frequency = (i * sampleRate) / fftSize;
    if (frequency < CHROMA_MIN_FREQUENCY) {
      continue;
    }
    const midi = MIDI_A4 + 12 * Math.log2(frequency / FREQ_A4);
    const pitchClass = ((Math.round(midi) % 12) + 12) % 12;
    chroma[pitchClass] += spectrum[i];
  }

  const max = Math.max(...chroma);
  return max > 0 ? chroma.map((value) => value / max) : chroma;
}

export function computeRms(samples: Float32Array): number {
  if (samples.length === 0) {
    return 0;
  }
  let sum = 0;
  for (const sample of samples) {
    sum += sample * sample;
  }
  return Math.sqrt(sum / samples.length);
}

export function amplitudeToDecibels(amplitude: number): number {
  return 20 * Math.log10(amplitude + LOG_FLOOR);
}
