// Error types raised by the container codec, sample transforms and converters

export type WavErrorCode =
  | "FORMAT"
  | "NOT_STEREO"
  | "NOT_MONO"
  | "UNSUPPORTED_FORMAT"
  | "MISMATCH"
  | "INVALID_MODE";

export class WavError extends Error {
  constructor(
    message: string,
    // eslint-disable-next-line no-unused-vars
    public readonly code: WavErrorCode
  ) {
    super(message);
    this.name = "WavError";
  }
}

/**
 * Malformed, truncated or non-PCM container.
 */
export class FormatError extends WavError {
  constructor(message: string) {
    super(message, "FORMAT");
    this.name = "FormatError";
  }
}

export class NotStereoError extends WavError {
  constructor(
    // eslint-disable-next-line no-unused-vars
    public readonly channelCount: number
  ) {
    super(`${channelCount} channels detected, expected 2 (stereo)`, "NOT_STEREO");
    this.name = "NotStereoError";
  }
}

export class NotMonoError extends WavError {
  constructor(
    // eslint-disable-next-line no-unused-vars
    public readonly channelCount: number,
    // eslint-disable-next-line no-unused-vars
    public readonly input?: string
  ) {
    super(
      `${input ? `${input} input: ` : ""}${channelCount} channels detected, expected 1 (mono)`,
      "NOT_MONO"
    );
    this.name = "NotMonoError";
  }
}

export class UnsupportedFormatError extends WavError {
  constructor(
    // eslint-disable-next-line no-unused-vars
    public readonly bitsPerSample: number,
    expected: readonly number[]
  ) {
    super(
      `${bitsPerSample}-bit samples are not supported here (expected ${expected.join(" or ")}-bit)`,
      "UNSUPPORTED_FORMAT"
    );
    this.name = "UnsupportedFormatError";
  }
}

export type MismatchField = "sampleRate" | "bitsPerSample" | "dataSize";

/**
 * Two mono inputs that cannot be merged into one stereo file.
 */
export class MismatchError extends WavError {
  constructor(
    // eslint-disable-next-line no-unused-vars
    public readonly field: MismatchField,
    // eslint-disable-next-line no-unused-vars
    public readonly left: number,
    // eslint-disable-next-line no-unused-vars
    public readonly right: number
  ) {
    super(`${field} differs between inputs (left ${left}, right ${right})`, "MISMATCH");
    this.name = "MismatchError";
  }
}

export class InvalidModeError extends WavError {
  constructor(
    // eslint-disable-next-line no-unused-vars
    public readonly mode: string
  ) {
    super(`'${mode}' is not a valid channel mode (left, right, mid, side)`, "INVALID_MODE");
    this.name = "InvalidModeError";
  }
}
