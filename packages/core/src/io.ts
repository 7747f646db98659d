/**
 * Minimal byte stream interfaces used by the codec and converters.
 * Kept free of Node.js and browser APIs so the core runs in both.
 */

export interface ByteSource {
  /**
   * Returns up to `length` bytes and advances past them.
   * A shorter result means the source is exhausted.
   */
  read(length: number): Uint8Array;
}

export interface ByteSink {
  write(chunk: Uint8Array): void;
}

/**
 * Read cursor over an in-memory buffer.
 */
export class BufferSource implements ByteSource {
  private offset = 0;

  // eslint-disable-next-line no-unused-vars
  constructor(private readonly bytes: Uint8Array) {}

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  read(length: number): Uint8Array {
    const end = Math.min(this.bytes.length, this.offset + Math.max(0, length));
    const chunk = this.bytes.subarray(this.offset, end);
    this.offset = end;
    return chunk;
  }
}

export class BufferSink implements ByteSink {
  private chunks: Uint8Array[] = [];
  private size = 0;

  get length(): number {
    return this.size;
  }

  write(chunk: Uint8Array): void {
    // Copy so later changes to the caller's buffer don't leak in
    this.chunks.push(chunk.slice());
    this.size += chunk.length;
  }

  toUint8Array(): Uint8Array {
    const output = new Uint8Array(this.size);
    let offset = 0;
    for (const chunk of this.chunks) {
      output.set(chunk, offset);
      offset += chunk.length;
    }
    return output;
  }
}
