/**
 * RIFF/WAVE codec.
 *
 * Decoding accepts PCM integer samples (8, 16, 24 and 32 bit) and IEEE float
 * samples (32 and 64 bit), including WAVE_FORMAT_EXTENSIBLE headers, with any
 * channel count. Chunks other than "fmt " and "data" are skipped.
 * Encoding always writes interleaved 16-bit PCM.
 */

import { InputError } from "@loopwalk/core";
import type { SampleBuffer } from "@loopwalk/core";

const FORMAT_PCM = 1;
const FORMAT_IEEE_FLOAT = 3;
const FORMAT_EXTENSIBLE = 0xfffe;

const RIFF_HEADER_SIZE = 12;
const CHUNK_HEADER_SIZE = 8;
const PCM16_HEADER_SIZE = 44;

interface WavFormat {
  audioFormat: number;
  channelCount: number;
  sampleRate: number;
  blockAlign: number;
  bitsPerSample: number;
}

function readTag(view: DataView, offset: number): string {
  return String.fromCharCode(
    view.getUint8(offset),
    view.getUint8(offset + 1),
    view.getUint8(offset + 2),
    view.getUint8(offset + 3)
  );
}

function writeTag(view: DataView, offset: number, tag: string): void {
  for (let i = 0; i < 4; i++) {
    view.setUint8(offset + i, tag.charCodeAt(i));
  }
}

function parseFormat(view: DataView, offset: number, size: number): WavFormat {
  if (size < 16) {
    throw new InputError(`fmt chunk too short (${size} bytes)`);
  }
  let audioFormat = view.getUint16(offset, true);
  // Extensible headers carry the real format in the first two bytes of the sub-format GUID
  if (audioFormat === FORMAT_EXTENSIBLE && size >= 26) {
    audioFormat = view.getUint16(offset + 24, true);
  }
  return {
    audioFormat,
    channelCount: view.getUint16(offset + 2, true),
    sampleRate: view.getUint32(offset + 4, true),
    blockAlign: view.getUint16(offset + 12, true),
    bitsPerSample: view.getUint16(offset + 14, true)
  };
}

function sampleReader(format: WavFormat): (view: DataView, offset: number) => number {
  const { audioFormat, bitsPerSample } = format;
  if (audioFormat === FORMAT_PCM) {
    switch (bitsPerSample) {
      case 8:
        return (view, offset) => (view.getUint8(offset) - 128) / 128;
      case 16:
        return (view, offset) => view.getInt16(offset, true) / 0x8000;
      case 24:
        return (view, offset) => {
          const value =
            view.getUint8(offset) | (view.getUint8(offset + 1) << 8) | (view.getInt8(offset + 2) << 16);
          return value / 0x800000;
        };
      case 32:
        return (view, offset) => view.getInt32(offset, true) / 0x80000000;
    }
  }
  if (audioFormat === FORMAT_IEEE_FLOAT) {
    if (bitsPerSample === 32) {
      return (view, offset) => view.getFloat32(offset, true);
    }
    if (bitsPerSample === 64) {
      return (view, offset) => view.getFloat64(offset, true);
    }
  }
  throw new InputError(`Unsupported WAV encoding: format ${audioFormat}, ${bitsPerSample} bits`);
}

/**
 * Decodes a WAV file into one Float32Array per channel.
 *
 * @throws InputError when the data is not a readable WAV file
 */
export function decodeWav(data: Uint8Array): SampleBuffer {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  if (data.byteLength < RIFF_HEADER_SIZE || readTag(view, 0) !== "RIFF" || readTag(view, 8) !== "WAVE") {
    throw new InputError("Not a RIFF/WAVE file");
  }

  let format: WavFormat | null = null;
  let dataOffset = -1;
  let dataSize = 0;

  let offset = RIFF_HEADER_SIZE;
  while (offset + CHUNK_HEADER_SIZE <= data.byteLength) {
    const id = readTag(view, offset);
    const size = view.getUint32(offset + 4, true);
    const body = offset + CHUNK_HEADER_SIZE;
    if (id === "fmt ") {
      format = parseFormat(view, body, Math.min(size, data.byteLength - body));
    } else if (id === "data") {
      dataOffset = body;
      // Streaming writers sometimes leave the size unset; take what is there
      dataSize = Math.min(size, data.byteLength - body);
    }
    // Chunks are word-aligned
    offset = body + size + (size % 2);
  }

  if (!format) {
    throw new InputError("WAV file has no fmt chunk");
  }
  if (dataOffset < 0) {
    throw new InputError("WAV file has no data chunk");
  }
  if (format.channelCount === 0 || format.sampleRate === 0) {
    throw new InputError("WAV header declares zero channels or a zero sample rate");
  }

  const read = sampleReader(format);
  const bytesPerSample = format.bitsPerSample / 8;
  const blockAlign = format.blockAlign || bytesPerSample * format.channelCount;
  if (blockAlign < bytesPerSample * format.channelCount) {
    throw new InputError(`WAV block align ${blockAlign} is too small for ${format.channelCount} channels`);
  }
  const frameCount = Math.floor(dataSize / blockAlign);
  const channels = Array.from({ length: format.channelCount }, () => new Float32Array(frameCount));

  for (let frame = 0; frame < frameCount; frame++) {
    const frameOffset = dataOffset + frame * blockAlign;
    for (let channel = 0; channel < format.channelCount; channel++) {
      channels[channel][frame] = read(view, frameOffset + channel * bytesPerSample);
    }
  }

  return { sampleRate: format.sampleRate, channels };
}

/**
 * Encodes a sample buffer as 16-bit PCM WAV. Samples are clamped to [-1, 1].
 */
export function encodeWav(buffer: SampleBuffer): Uint8Array {
  const channelCount = buffer.channels.length;
  const frameCount = buffer.channels[0]?.length ?? 0;
  const blockAlign = channelCount * 2;
  const dataSize = frameCount * blockAlign;

  const bytes = new Uint8Array(PCM16_HEADER_SIZE + dataSize);
  const view = new DataView(bytes.buffer);

  writeTag(view, 0, "RIFF");
  view.setUint32(4, 36 + dataSize, true);
  writeTag(view, 8, "WAVE");
  writeTag(view, 12, "fmt ");
  view.setUint32(16, 16, true);
  view.setUint16(20, FORMAT_PCM, true);
  view.setUint16(22, channelCount, true);
  view.setUint32(24, buffer.sampleRate, true);
  view.setUint32(28, buffer.sampleRate * blockAlign, true);
  view.setUint16(32, blockAlign, true);
  view.setUint16(34, 16, true);
  writeTag(view, 36, "data");
  view.setUint32(40, dataSize, true);

  let offset = PCM16_HEADER_SIZE;
  for (let frame = 0; frame < frameCount; frame++) {
    for (let channel = 0; channel < channelCount; channel++) {
      const sample = Math.max(-1, Math.min(1, buffer.channels[channel][frame]));
      view.setInt16(offset, Math.round(sample < 0 ? sample * 0x8000 : sample * 0x7fff), true);
      offset += 2;
    }
  }

  return bytes;
}
