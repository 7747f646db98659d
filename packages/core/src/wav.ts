/**
 * Canonical 44-byte RIFF/WAVE header codec.
 * Only the plain PCM layout is supported: RIFF, a 16-byte fmt chunk, then data.
 */

import { FormatError } from "./errors.js";
import { BufferSource, type ByteSink, type ByteSource } from "./io.js";

export const WAV_HEADER_SIZE = 44;
export const PCM_FORMAT = 1;
export const FMT_CHUNK_SIZE = 16;

export interface WavHeader {
  readonly formatTag: number;
  readonly channelCount: number;
  readonly sampleRate: number;
  readonly byteRate: number;
  readonly blockAlign: number;
  readonly bitsPerSample: number;
  readonly dataSize: number;
}

function readTag(view: DataView, offset: number): string {
  return String.fromCharCode(
    view.getUint8(offset), view.getUint8(offset + 1),
    view.getUint8(offset + 2), view.getUint8(offset + 3)
  );
}

function writeTag(view: DataView, offset: number, tag: string): void {
  for (let i = 0; i < 4; i++) {
    view.setUint8(offset + i, tag.charCodeAt(i));
  }
}

function readSection(source: ByteSource, length: number): DataView {
  const bytes = source.read(length);
  if (bytes.length < length) {
    throw new FormatError("not a valid WAV file (unexpected end of header)");
  }
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

const UINT16_MAX = 0xffff;
const UINT32_MAX = 0xffffffff;

function requireField(name: string, value: number, max: number, bits: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new FormatError(`cannot write WAV header (${name} ${value} does not fit in ${bits} bits)`);
  }
}

/**
 * Builds the header value that `writeHeader` emits for these parameters.
 */
export function createHeader(
  channelCount: number,
  sampleRate: number,
  bitsPerSample: number,
  dataSize: number
): WavHeader {
  // Whole bytes, as stored: 12-bit samples give a block align of 1 per channel
  const bytesPerSample = Math.floor(bitsPerSample / 8);
  return {
    formatTag: PCM_FORMAT,
    channelCount,
    sampleRate,
    byteRate: sampleRate * channelCount * bytesPerSample,
    blockAlign: channelCount * bytesPerSample,
    bitsPerSample,
    dataSize,
  };
}

/**
 * Reads the header and leaves `source` at the first payload byte.
 * Channel count and bit depth are returned as found; callers decide what they accept.
 */
export function readHeader(source: ByteSource): WavHeader {
  const riff = readSection(source, 12);
  if (readTag(riff, 0) !== "RIFF") {
    throw new FormatError("not a valid WAV file (missing RIFF header)");
  }
  if (readTag(riff, 8) !== "WAVE") {
    throw new FormatError("not a valid WAV file (missing WAVE format)");
  }

  const fmt = readSection(source, 8);
  if (readTag(fmt, 0) !== "fmt ") {
    throw new FormatError("invalid WAV file (missing fmt chunk)");
  }
  const fmtSize = fmt.getUint32(4, true);
  if (fmtSize !== FMT_CHUNK_SIZE) {
    throw new FormatError(`invalid WAV file (fmt chunk is ${fmtSize} bytes, expected ${FMT_CHUNK_SIZE})`);
  }

  const fields = readSection(source, FMT_CHUNK_SIZE);
  const formatTag = fields.getUint16(0, true);
  if (formatTag !== PCM_FORMAT) {
    throw new FormatError(`unsupported audio format ${formatTag} (only PCM is supported)`);
  }

  const data = readSection(source, 8);
  if (readTag(data, 0) !== "data") {
    throw new FormatError("invalid WAV file (missing data chunk)");
  }

  return {
    formatTag,
    channelCount: fields.getUint16(2, true),
    sampleRate: fields.getUint32(4, true),
    byteRate: fields.getUint32(8, true),
    blockAlign: fields.getUint16(12, true),
    bitsPerSample: fields.getUint16(14, true),
    dataSize: data.getUint32(4, true),
  };
}

export function decodeHeader(bytes: Uint8Array): WavHeader {
  return readHeader(new BufferSource(bytes));
}

/**
 * Serializes a header; the payload is not included.
 * Throws FormatError when a field does not fit its slot, so the bytes always
 * match `createHeader` for the same arguments.
 */
export function encodeHeader(
  channelCount: number,
  sampleRate: number,
  bitsPerSample: number,
  dataSize: number
): Uint8Array {
  const header = createHeader(channelCount, sampleRate, bitsPerSample, dataSize);
  const riffSize = 4 + (8 + FMT_CHUNK_SIZE) + (8 + dataSize);
  requireField("channelCount", header.channelCount, UINT16_MAX, 16);
  requireField("sampleRate", header.sampleRate, UINT32_MAX, 32);
  requireField("byteRate", header.byteRate, UINT32_MAX, 32);
  requireField("blockAlign", header.blockAlign, UINT16_MAX, 16);
  requireField("bitsPerSample", header.bitsPerSample, UINT16_MAX, 16);
  requireField("dataSize", header.dataSize, UINT32_MAX, 32);
  requireField("riffSize", riffSize, UINT32_MAX, 32);

  const bytes = new Uint8Array(WAV_HEADER_SIZE);
  const view = new DataView(bytes.buffer);

  // RIFF header
  writeTag(view, 0, "RIFF");
  view.setUint32(4, riffSize, true);
  writeTag(view, 8, "WAVE");

  // fmt chunk
  writeTag(view, 12, "fmt ");
  view.setUint32(16, FMT_CHUNK_SIZE, true);
  view.setUint16(20, header.formatTag, true);
  view.setUint16(22, header.channelCount, true);
  view.setUint32(24, header.sampleRate, true);
  view.setUint32(28, header.byteRate, true);
  view.setUint16(32, header.blockAlign, true);
  view.setUint16(34, header.bitsPerSample, true);

  // data chunk
  writeTag(view, 36, "data");
  view.setUint32(40, header.dataSize, true);

  return bytes;
}

export function writeHeader(
  sink: ByteSink,
  channelCount: number,
  sampleRate: number,
  bitsPerSample: number,
  dataSize: number
): void {
  sink.write(encodeHeader(channelCount, sampleRate, bitsPerSample, dataSize));
}
