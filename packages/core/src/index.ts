// Pure TypeScript WAV channel conversion logic
// No Node.js or browser APIs - works in both environments

import type { WavHeader } from "./wav.js";

export type { ByteSink, ByteSource } from "./io.js";
export { BufferSink, BufferSource } from "./io.js";
export type { WavHeader } from "./wav.js";
export {
  FMT_CHUNK_SIZE,
  PCM_FORMAT,
  WAV_HEADER_SIZE,
  createHeader,
  decodeHeader,
  encodeHeader,
  readHeader,
  writeHeader,
} from "./wav.js";
export type { ChannelMode, StereoSample, Unpack32Options } from "./samples.js";
export {
  CHANNEL_MODES,
  INT16_MAX,
  INT16_MIN,
  floorDiv,
  isChannelMode,
  pack32,
  parseChannelMode,
  saturate16,
  selectOrCombine,
  signExtend16,
  unpack32,
} from "./samples.js";
export {
  SUPPORTED_BIT_DEPTHS,
  coded32ToStereo,
  monoPairToStereo,
  stereoToCoded32,
  stereoToMono,
} from "./convert.js";
export type { MismatchField, WavErrorCode } from "./errors.js";
export {
  FormatError,
  InvalidModeError,
  MismatchError,
  NotMonoError,
  NotStereoError,
  UnsupportedFormatError,
  WavError,
} from "./errors.js";

/**
 * Number of whole frames in the payload; 0 when the header has no block alignment.
 */
export function frameCount(header: WavHeader): number {
  return header.blockAlign > 0 ? Math.floor(header.dataSize / header.blockAlign) : 0;
}

/**
 * Playback length in seconds, from the frame count and sample rate.
 */
export function durationSeconds(header: WavHeader): number {
  return header.sampleRate > 0 ? frameCount(header) / header.sampleRate : 0;
}
