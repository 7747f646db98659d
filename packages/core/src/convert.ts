/**
 * Whole-buffer converters between stereo, mono and 32-bit coded mono WAV data.
 *
 * Every converter checks the input header(s) before touching the payload and
 * writes to the sink only after all checks pass, so a failed call leaves the
 * sink untouched. Frames are emitted in input order.
 */

import {
  FormatError,
  InvalidModeError,
  MismatchError,
  NotMonoError,
  NotStereoError,
  UnsupportedFormatError,
} from "./errors.js";
import type { ByteSink, ByteSource } from "./io.js";
import {
  isChannelMode,
  pack32,
  selectOrCombine,
  unpack32,
  type ChannelMode,
  type Unpack32Options,
} from "./samples.js";
import { createHeader, readHeader, writeHeader, type WavHeader } from "./wav.js";

/**
 * Bit depths the channel split/merge operations accept.
 */
export const SUPPORTED_BIT_DEPTHS = [16, 32] as const;

const CODED_INPUT_BITS = 16;
const CODED_OUTPUT_BITS = 32;

function requireStereo(header: WavHeader): void {
  if (header.channelCount !== 2) {
    throw new NotStereoError(header.channelCount);
  }
}

function requireMono(header: WavHeader, input?: string): void {
  if (header.channelCount !== 1) {
    throw new NotMonoError(header.channelCount, input);
  }
}

function requireBitDepth(header: WavHeader, allowed: readonly number[]): void {
  if (!allowed.includes(header.bitsPerSample)) {
    throw new UnsupportedFormatError(header.bitsPerSample, allowed);
  }
}

function requireWholeFrames(header: WavHeader, frameSize: number): void {
  if (header.dataSize % frameSize !== 0) {
    throw new FormatError(
      `invalid WAV file (data size ${header.dataSize} is not a multiple of the ${frameSize}-byte frame)`
    );
  }
}

function readPayload(source: ByteSource, header: WavHeader): Uint8Array {
  const bytes = source.read(header.dataSize);
  if (bytes.length < header.dataSize) {
    throw new FormatError(
      `invalid WAV file (data chunk truncated: expected ${header.dataSize} bytes, got ${bytes.length})`
    );
  }
  return bytes;
}

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function readSample(view: DataView, offset: number, width: number): number {
  return width === 2 ? view.getInt16(offset, true) : view.getInt32(offset, true);
}

function writeSample(view: DataView, offset: number, width: number, value: number): void {
  if (width === 2) {
    view.setInt16(offset, value, true);
  } else {
    view.setInt32(offset, value, true);
  }
}

function emit(
  output: ByteSink,
  channelCount: number,
  sampleRate: number,
  bitsPerSample: number,
  payload: Uint8Array
): WavHeader {
  writeHeader(output, channelCount, sampleRate, bitsPerSample, payload.length);
  output.write(payload);
  return createHeader(channelCount, sampleRate, bitsPerSample, payload.length);
}

/**
 * Derives a mono signal from a stereo one.
 * @param mode which channel to keep, or the half-sum (mid) / half-difference (side)
 * @returns the header written to `output`
 */
export function stereoToMono(
  input: ByteSource,
  output: ByteSink,
  mode: ChannelMode = "mid"
): WavHeader {
  if (!isChannelMode(mode)) {
    throw new InvalidModeError(String(mode));
  }

  const header = readHeader(input);
  requireStereo(header);
  requireBitDepth(header, SUPPORTED_BIT_DEPTHS);
  const width = header.bitsPerSample / 8;
  requireWholeFrames(header, 2 * width);

  const source = viewOf(readPayload(input, header));
  const frames = header.dataSize / (2 * width);
  const mono = new Uint8Array(frames * width);
  const target = viewOf(mono);

  for (let i = 0; i < frames; i++) {
    const left = readSample(source, i * 2 * width, width);
    const right = readSample(source, i * 2 * width + width, width);
    writeSample(target, i * width, width, selectOrCombine(left, right, mode));
  }

  return emit(output, 1, header.sampleRate, header.bitsPerSample, mono);
}

/**
 * Interleaves two mono signals into one stereo signal, left channel first.
 */
export function monoPairToStereo(
  leftInput: ByteSource,
  rightInput: ByteSource,
  output: ByteSink
): WavHeader {
  const left = readHeader(leftInput);
  const right = readHeader(rightInput);
  requireMono(left, "left");
  requireMono(right, "right");

  for (const field of ["sampleRate", "bitsPerSample", "dataSize"] as const) {
    if (left[field] !== right[field]) {
      throw new MismatchError(field, left[field], right[field]);
    }
  }
  requireBitDepth(left, SUPPORTED_BIT_DEPTHS);
  const width = left.bitsPerSample / 8;
  requireWholeFrames(left, width);

  const leftData = readPayload(leftInput, left);
  const rightData = readPayload(rightInput, right);
  const frames = left.dataSize / width;
  const stereo = new Uint8Array(frames * 2 * width);

  for (let i = 0; i < frames; i++) {
    const at = i * width;
    stereo.set(leftData.subarray(at, at + width), 2 * at);
    stereo.set(rightData.subarray(at, at + width), 2 * at + width);
  }

  return emit(output, 2, left.sampleRate, left.bitsPerSample, stereo);
}

/**
 * Packs 16-bit stereo into 32-bit mono: mid in the high half, side in the low half.
 */
export function stereoToCoded32(input: ByteSource, output: ByteSink): WavHeader {
  const header = readHeader(input);
  requireStereo(header);
  requireBitDepth(header, [CODED_INPUT_BITS]);
  requireWholeFrames(header, 4);

  const source = viewOf(readPayload(input, header));
  const frames = header.dataSize / 4;
  const coded = new Uint8Array(frames * 4);
  const target = viewOf(coded);

  for (let i = 0; i < frames; i++) {
    const left = source.getInt16(i * 4, true);
    const right = source.getInt16(i * 4 + 2, true);
    target.setUint32(i * 4, pack32(left, right), true);
  }

  return emit(output, 1, header.sampleRate, CODED_OUTPUT_BITS, coded);
}

/**
 * Unpacks 32-bit coded mono back into 16-bit stereo.
 */
export function coded32ToStereo(
  input: ByteSource,
  output: ByteSink,
  options: Unpack32Options = {}
): WavHeader {
  const header = readHeader(input);
  requireMono(header);
  requireBitDepth(header, [CODED_OUTPUT_BITS]);
  requireWholeFrames(header, 4);

  const source = viewOf(readPayload(input, header));
  const frames = header.dataSize / 4;
  const stereo = new Uint8Array(frames * 4);
  const target = viewOf(stereo);

  for (let i = 0; i < frames; i++) {
    const { left, right } = unpack32(source.getUint32(i * 4, true), options);
    target.setInt16(i * 4, left, true);
    target.setInt16(i * 4 + 2, right, true);
  }

  return emit(output, 2, header.sampleRate, CODED_INPUT_BITS, stereo);
}
