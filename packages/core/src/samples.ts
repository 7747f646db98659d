// Per-sample arithmetic for channel selection and 32-bit mid/side coding

import { InvalidModeError } from "./errors.js";

export const INT16_MIN = -32768;
export const INT16_MAX = 32767;

/**
 * Channel modes for deriving one mono sample from a stereo frame.
 * Numeric tags 0..3 map to these in order.
 */
export const CHANNEL_MODES = ["left", "right", "mid", "side"] as const;

export type ChannelMode = (typeof CHANNEL_MODES)[number];

export interface StereoSample {
  left: number;
  right: number;
}

export interface Unpack32Options {
  /**
   * Sign-extend the high half before rebuilding the channels.
   * Off by default: the high half is used as an unsigned 0..65535 value,
   * so a negative mid saturates on decode.
   */
  signedMid?: boolean;
}

export function isChannelMode(value: unknown): value is ChannelMode {
  return typeof value === "string" && (CHANNEL_MODES as readonly string[]).includes(value);
}

/**
 * Accepts a mode name or its numeric tag (0 left, 1 right, 2 mid, 3 side).
 */
export function parseChannelMode(value: string | number): ChannelMode {
  if (isChannelMode(value)) {
    return value;
  }
  const tag = typeof value === "number" ? value : /^\d+$/.test(value) ? Number(value) : NaN;
  const mode = Number.isInteger(tag) ? CHANNEL_MODES[tag] : undefined;
  if (mode === undefined) {
    throw new InvalidModeError(String(value));
  }
  return mode;
}

/**
 * Integer division rounding toward negative infinity: floorDiv(-3, 2) === -2.
 * Halving must floor, not truncate, or negative samples pick up a bias.
 */
export function floorDiv(a: number, b: number): number {
  if (b === 0) {
    throw new RangeError("division by zero");
  }
  const quotient = Math.trunc(a / b);
  return a % b !== 0 && (a < 0) !== (b < 0) ? quotient - 1 : quotient;
}

/**
 * Low 16 bits of `x` as a signed value.
 */
export function signExtend16(x: number): number {
  const low = x & 0xffff;
  return low < 0x8000 ? low : low - 0x10000;
}

export function saturate16(x: number): number {
  return Math.max(INT16_MIN, Math.min(INT16_MAX, x));
}

export function selectOrCombine(left: number, right: number, mode: ChannelMode): number {
  switch (mode) {
    case "left":
      return left;
    case "right":
      return right;
    case "mid":
      return floorDiv(left + right, 2);
    case "side":
      return floorDiv(left - right, 2);
    default:
      throw new InvalidModeError(String(mode));
  }
}

/**
 * Packs a 16-bit stereo pair as (mid << 16) | side.
 * Both halves are truncated to 16 bits, never clamped.
 */
export function pack32(left: number, right: number): number {
  const mid = floorDiv(left + right, 2);
  const side = floorDiv(left - right, 2);
  return (((mid & 0xffff) << 16) | (side & 0xffff)) >>> 0;
}

/**
 * Rebuilds a 16-bit stereo pair from a coded sample, saturating each channel.
 */
export function unpack32(coded: number, options: Unpack32Options = {}): StereoSample {
  const high = coded >>> 16;
  const mid = options.signedMid ? signExtend16(high) : high;
  const side = signExtend16(coded);
  return {
    left: saturate16(mid + side),
    right: saturate16(mid - side),
  };
}
