import * as fs from "node:fs";
import * as path from "node:path";
import type { Readable, Writable } from "node:stream";
import { BufferSource } from "@wavmix/core";

/**
 * Path that stands for stdin (as input) or stdout (as output).
 */
export const STDIO_PATH = "-";

/**
 * Drains a readable stream into memory.
 * The stream must be in binary mode; string chunks are rejected.
 * @param stream Source stream, e.g. process.stdin
 */
export async function readStream(stream: Readable): Promise<BufferSource> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of stream) {
    // A stream with an encoding set yields strings, which no longer hold the raw bytes
    if (!(chunk instanceof Uint8Array)) {
      throw new TypeError(`expected binary chunks, got ${typeof chunk} (was setEncoding called?)`);
    }
    chunks.push(chunk);
  }
  return new BufferSource(Buffer.concat(chunks));
}

/**
 * Loads a whole WAV file, or stdin for "-".
 * @param filePath Path to input file
 * @returns Promise<BufferSource> Cursor positioned at the start of the file
 */
export async function openInput(
  filePath: string,
  stdin: Readable = process.stdin
): Promise<BufferSource> {
  if (filePath === STDIO_PATH) {
    return readStream(stdin);
  }
  return new BufferSource(fs.readFileSync(filePath));
}

/**
 * Resolves once `stream` has accepted `bytes`, rejects on a write error (EPIPE).
 */
function writeStream(stream: Writable, bytes: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    // Stays attached after a failure: the stream emits the same error again
    const onError = (error: Error) => reject(error);
    stream.once("error", onError);
    stream.write(bytes, (error) => {
      if (error) {
        reject(error);
        return;
      }
      stream.off("error", onError);
      resolve();
    });
  });
}

/**
 * Writes a complete output file, or stdout for "-".
 * Files are written to a temporary sibling and renamed into place, so a
 * failed write never leaves a partial file at `filePath`.
 */
export async function writeOutput(
  filePath: string,
  bytes: Uint8Array,
  stdout: Writable = process.stdout
): Promise<void> {
  if (filePath === STDIO_PATH) {
    await writeStream(stdout, bytes);
    return;
  }

  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.tmp`
  );
  try {
    fs.writeFileSync(tempPath, bytes);
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}
