export { createRecordingLogger, makeClickTrack } from "../../../core/src/test/test-utils.js";
export type { RecordingLogger } from "../../../core/src/test/test-utils.js";

function tagBytes(tag: string): number[] {
  return Array.from(tag, (char) => char.charCodeAt(0));
}

/** A RIFF chunk with its size field and padding byte */
export function chunk(id: string, body: Uint8Array): Uint8Array {
  const bytes = new Uint8Array(8 + body.length + (body.length % 2));
  bytes.set(tagBytes(id), 0);
  new DataView(bytes.buffer).setUint32(4, body.length, true);
  bytes.set(body, 8);
  return bytes;
}

export interface FmtFields {
  audioFormat: number;
  channelCount: number;
  sampleRate: number;
  bitsPerSample: number;
  /** Writes a 40-byte extensible header carrying this sub-format */
  subFormat?: number;
}

export function fmtChunk(fields: FmtFields): Uint8Array {
  const body = new Uint8Array(fields.subFormat === undefined ? 16 : 40);
  const view = new DataView(body.buffer);
  const blockAlign = (fields.channelCount * fields.bitsPerSample) / 8;
  view.setUint16(0, fields.audioFormat, true);
  view.setUint16(2, fields.channelCount, true);
  view.setUint32(4, fields.sampleRate, true);
  view.setUint32(8, fields.sampleRate * blockAlign, true);
  view.setUint16(12, blockAlign, true);
  view.setUint16(14, fields.bitsPerSample, true);
  if (fields.subFormat !== undefined) {
    view.setUint16(16, 22, true);
    view.setUint16(24, fields.subFormat, true);
  }
  return chunk("fmt ", body);
}

export function riff(chunks: Uint8Array[]): Uint8Array {
  const size = chunks.reduce((total, part) => total + part.length, 4);
  const bytes = new Uint8Array(8 + size);
  bytes.set(tagBytes("RIFF"), 0);
  new DataView(bytes.buffer).setUint32(4, size, true);
  bytes.set(tagBytes("WAVE"), 8);
  let offset = 12;
  for (const part of chunks) {
    bytes.set(part, offset);
    offset += part.length;
  }
  return bytes;
}
