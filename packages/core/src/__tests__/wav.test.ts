import { describe, it, expect } from "vitest";
import {
  BufferSink,
  BufferSource,
  FormatError,
  WAV_HEADER_SIZE,
  createHeader,
  decodeHeader,
  encodeHeader,
  readHeader,
  writeHeader,
  frameCount,
  durationSeconds,
} from "../index.js";
import { createTestWav } from "./test-utils.js";

function readAscii(bytes: Uint8Array, off: number, len: number): string {
  return new TextDecoder().decode(bytes.subarray(off, off + len));
}

function withUint32(bytes: Uint8Array, offset: number, value: number): Uint8Array {
  const copy = bytes.slice();
  new DataView(copy.buffer).setUint32(offset, value, true);
  return copy;
}

function withUint16(bytes: Uint8Array, offset: number, value: number): Uint8Array {
  const copy = bytes.slice();
  new DataView(copy.buffer).setUint16(offset, value, true);
  return copy;
}

describe("writeHeader / readHeader", () => {
  it("returns exactly the fields that were written", () => {
    const sink = new BufferSink();
    writeHeader(sink, 2, 44100, 16, 400);

    const header = readHeader(new BufferSource(sink.toUint8Array()));
    expect(header).toEqual({
      formatTag: 1,
      channelCount: 2,
      sampleRate: 44100,
      byteRate: 176400,
      blockAlign: 4,
      bitsPerSample: 16,
      dataSize: 400,
    });
    expect(header).toEqual(createHeader(2, 44100, 16, 400));
  });

  it("writes the 44-byte canonical layout and nothing else", () => {
    const sink = new BufferSink();
    writeHeader(sink, 1, 8000, 32, 12);
    const bytes = sink.toUint8Array();
    const view = new DataView(bytes.buffer);

    expect(bytes.length).toBe(WAV_HEADER_SIZE);
    expect(readAscii(bytes, 0, 4)).toBe("RIFF");
    expect(view.getUint32(4, true)).toBe(36 + 12);
    expect(readAscii(bytes, 8, 4)).toBe("WAVE");
    expect(readAscii(bytes, 12, 4)).toBe("fmt ");
    expect(view.getUint32(16, true)).toBe(16);
    expect(view.getUint16(20, true)).toBe(1);
    expect(view.getUint16(22, true)).toBe(1);
    expect(view.getUint32(24, true)).toBe(8000);
    expect(view.getUint32(28, true)).toBe(32000);
    expect(view.getUint16(32, true)).toBe(4);
    expect(view.getUint16(34, true)).toBe(32);
    expect(readAscii(bytes, 36, 4)).toBe("data");
    expect(view.getUint32(40, true)).toBe(12);
  });

  it("matches an independently built header byte for byte", () => {
    const wav = createTestWav(48000, 2, 16, [1, 2, 3, 4]);
    expect(encodeHeader(2, 48000, 16, 8)).toEqual(wav.subarray(0, 44));
  });

  it("stops at the first payload byte", () => {
    const source = new BufferSource(createTestWav(22050, 1, 16, [7, 8, 9]));
    const header = readHeader(source);

    expect(header.dataSize).toBe(6);
    expect(source.position).toBe(44);
    expect(source.remaining).toBe(6);
  });

  it("does not judge channel count or bit depth", () => {
    const header = decodeHeader(createTestWav(96000, 8, 24, []));
    expect(header.channelCount).toBe(8);
    expect(header.bitsPerSample).toBe(24);
    expect(header.blockAlign).toBe(24);
  });
});

describe("header field limits", () => {
  it("counts whole bytes per sample", () => {
    const header = createHeader(1, 8000, 12, 3);

    expect(header.blockAlign).toBe(1);
    expect(header.byteRate).toBe(8000);
    expect(decodeHeader(encodeHeader(1, 8000, 12, 3))).toEqual(header);
  });

  it("refuses a byte rate beyond 32 bits", () => {
    expect(() => encodeHeader(2, 0xffffffff, 16, 0)).toThrow(
      "cannot write WAV header (byteRate 17179869180 does not fit in 32 bits)"
    );
  });

  it("refuses a channel count beyond 16 bits", () => {
    expect(() => encodeHeader(70000, 8000, 16, 0)).toThrow(
      "cannot write WAV header (channelCount 70000 does not fit in 16 bits)"
    );
  });

  it("refuses a data size that overflows the RIFF size", () => {
    expect(() => encodeHeader(1, 8000, 16, 0xffffffff)).toThrow(
      "cannot write WAV header (riffSize 4294967331 does not fit in 32 bits)"
    );
  });

  it("writes nothing when a field does not fit", () => {
    const sink = new BufferSink();

    expect(() => writeHeader(sink, 2, 0xffffffff, 32, 8)).toThrow(FormatError);
    expect(sink.length).toBe(0);
  });
});

describe("readHeader failures", () => {
  const valid = createTestWav(44100, 2, 16, [0, 0]);

  it("rejects a header cut short", () => {
    expect(() => decodeHeader(valid.subarray(0, 40))).toThrow(
      "not a valid WAV file (unexpected end of header)"
    );
    expect(() => decodeHeader(new Uint8Array(10))).toThrow(FormatError);
  });

  it("rejects a missing RIFF tag", () => {
    expect(() => decodeHeader(withUint32(valid, 0, 0x12345678))).toThrow(
      "not a valid WAV file (missing RIFF header)"
    );
  });

  it("rejects a missing WAVE tag", () => {
    expect(() => decodeHeader(withUint32(valid, 8, 0x12345678))).toThrow(
      "not a valid WAV file (missing WAVE format)"
    );
  });

  it("rejects a missing fmt chunk", () => {
    expect(() => decodeHeader(withUint32(valid, 12, 0x5453494c))).toThrow(
      "invalid WAV file (missing fmt chunk)"
    );
  });

  it("rejects a fmt chunk that is not 16 bytes", () => {
    expect(() => decodeHeader(withUint32(valid, 16, 18))).toThrow(
      "invalid WAV file (fmt chunk is 18 bytes, expected 16)"
    );
  });

  it("rejects non-PCM formats", () => {
    expect(() => decodeHeader(withUint16(valid, 20, 3))).toThrow(
      "unsupported audio format 3 (only PCM is supported)"
    );
  });

  it("rejects a missing data chunk", () => {
    expect(() => decodeHeader(withUint32(valid, 36, 0x5453494c))).toThrow(
      "invalid WAV file (missing data chunk)"
    );
  });

  it("raises FormatError with its code", () => {
    try {
      decodeHeader(withUint32(valid, 0, 0));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FormatError);
      expect(error instanceof FormatError && error.code).toBe("FORMAT");
      expect(error instanceof FormatError && error.name).toBe("FormatError");
    }
  });
});

describe("frameCount / durationSeconds", () => {
  it("derives frames and duration from the header", () => {
    const header = createHeader(2, 8000, 16, 32000);
    expect(frameCount(header)).toBe(8000);
    expect(durationSeconds(header)).toBe(1);
  });

  it("returns 0 for degenerate headers", () => {
    const header = createHeader(0, 0, 16, 100);
    expect(frameCount(header)).toBe(0);
    expect(durationSeconds(header)).toBe(0);
  });
});
