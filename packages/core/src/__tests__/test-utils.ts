/**
 * Shared test utilities for WAV file creation and inspection
 */

/**
 * Creates a canonical 44-byte-header WAV file holding `samples` as given
 * (already interleaved for multi-channel data)
 */
export function createTestWav(
  sampleRate: number,
  channels: number,
  bitsPerSample: number,
  samples: readonly number[]
): Uint8Array {
  const bytesPerSample = bitsPerSample / 8;
  const dataSize = samples.length * bytesPerSample;
  const totalSize = 36 + dataSize;

  const bytes = new Uint8Array(44 + dataSize);
  const view = new DataView(bytes.buffer);

  // RIFF header
  view.setUint32(0, 0x46464952, true); // "RIFF"
  view.setUint32(4, totalSize, true);
  view.setUint32(8, 0x45564157, true); // "WAVE"

  // fmt chunk
  view.setUint32(12, 0x20746d66, true); // "fmt "
  view.setUint32(16, 16, true); // chunk size
  view.setUint16(20, 1, true); // audio format (PCM)
  view.setUint16(22, channels, true);
  view.setUint32(24, sampleRate, true);
  view.setUint32(28, sampleRate * channels * bytesPerSample, true); // byte rate
  view.setUint16(32, channels * bytesPerSample, true); // block align
  view.setUint16(34, bitsPerSample, true);

  // data chunk
  view.setUint32(36, 0x61746164, true); // "data"
  view.setUint32(40, dataSize, true);

  samples.forEach((sample, i) => {
    const offset = 44 + i * bytesPerSample;
    if (bitsPerSample === 8) {
      view.setUint8(offset, sample);
    } else if (bitsPerSample === 16) {
      view.setInt16(offset, sample, true);
    } else if (bitsPerSample === 24) {
      view.setUint8(offset, sample & 0xff);
      view.setUint8(offset + 1, (sample >> 8) & 0xff);
      view.setUint8(offset + 2, (sample >> 16) & 0xff);
    } else {
      view.setInt32(offset, sample, true);
    }
  });

  return bytes;
}

/**
 * Reads the payload of a canonical WAV file back as numbers.
 * 32-bit samples are read unsigned when `signed` is false (coded output).
 */
export function readSamples(bytes: Uint8Array, bitsPerSample: number, signed = true): number[] {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const width = bitsPerSample / 8;
  const samples: number[] = [];
  for (let offset = 44; offset + width <= bytes.length; offset += width) {
    if (width === 2) {
      samples.push(view.getInt16(offset, true));
    } else {
      samples.push(signed ? view.getInt32(offset, true) : view.getUint32(offset, true));
    }
  }
  return samples;
}
