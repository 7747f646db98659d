import yargs from "yargs";
import * as fs from "node:fs";
import type { Readable, Writable } from "node:stream";
import {
  BufferSink,
  BufferSource,
  coded32ToStereo,
  durationSeconds,
  frameCount,
  monoPairToStereo,
  parseChannelMode,
  readHeader,
  stereoToCoded32,
  stereoToMono,
  type ChannelMode,
  type WavHeader,
} from "@wavmix/core";
import { openInput, writeOutput, STDIO_PATH } from "@wavmix/node-io";
import { CliError, errors, toCliError, warnings } from "./errors.js";

interface OutputFlags {
  force: boolean;
  verbose: boolean;
}

/**
 * Streams that stand in for "-" paths.
 */
export interface Stdio {
  stdin: Readable;
  stdout: Writable;
}

type Conversion = (sources: BufferSource[], sink: BufferSink) => WavHeader;

/**
 * Human-readable header fields, one per line
 */
export function formatHeader(header: WavHeader): string[] {
  return [
    `  channels:        ${header.channelCount}`,
    `  sample rate:     ${header.sampleRate} Hz`,
    `  bits per sample: ${header.bitsPerSample}`,
    `  byte rate:       ${header.byteRate}`,
    `  block align:     ${header.blockAlign}`,
    `  data size:       ${header.dataSize} bytes`,
    `  frames:          ${frameCount(header)}`,
    `  duration:        ${durationSeconds(header).toFixed(3)} s`,
  ];
}

function summary(output: string, header: WavHeader): string {
  return `Wrote ${output} (${header.channelCount}ch, ${header.bitsPerSample}-bit, ` +
    `${header.sampleRate} Hz, ${frameCount(header)} frames)`;
}

function checkInputs(inputs: string[]): void {
  if (inputs.filter((input) => input === STDIO_PATH).length > 1) {
    throw errors.stdinTwice();
  }
  for (const input of inputs) {
    if (input !== STDIO_PATH && !fs.existsSync(input)) {
      throw errors.fileNotFound(input);
    }
  }
}

/**
 * Loads the inputs, runs one conversion fully in memory and only then
 * writes the output, so a failed run never leaves an output file behind.
 */
async function convert(
  inputs: string[],
  output: string,
  flags: OutputFlags,
  stdio: Stdio,
  run: Conversion
): Promise<void> {
  checkInputs(inputs);

  if (output !== STDIO_PATH && fs.existsSync(output) && !flags.force) {
    console.warn(warnings.overwrite(output));
    return;
  }

  const sources: BufferSource[] = [];
  for (const input of inputs) {
    if (flags.verbose) {
      console.error(`Reading ${input}...`);
    }
    try {
      sources.push(await openInput(input, stdio.stdin));
    } catch (error) {
      throw toCliError(error, input);
    }
  }

  const sink = new BufferSink();
  let header: WavHeader;
  try {
    header = run(sources, sink);
  } catch (error) {
    throw toCliError(error, inputs.join(", "));
  }

  if (flags.verbose) {
    console.error(`  Output header:`);
    formatHeader(header).forEach((line) => console.error(line));
  }

  try {
    await writeOutput(output, sink.toUint8Array(), stdio.stdout);
  } catch {
    throw errors.writeFailed(output);
  }

  // Keep stdout clean when it carries the audio
  const report = output === STDIO_PATH ? console.error : console.log;
  report(summary(output, header));
}

async function info(input: string, stdio: Stdio): Promise<void> {
  checkInputs([input]);
  let header: WavHeader;
  try {
    header = readHeader(await openInput(input, stdio.stdin));
  } catch (error) {
    throw toCliError(error, input);
  }
  console.log(input);
  formatHeader(header).forEach((line) => console.log(line));
}

/**
 * Parses `args` (without the node and script entries) and runs the command.
 * Rejects with a CliError carrying the message and exit code.
 */
export async function main(
  args: string[],
  stdio: Stdio = { stdin: process.stdin, stdout: process.stdout }
): Promise<void> {
  await yargs(args)
    .scriptName("wavmix")
    .usage("Usage: $0 <command> [options]")
    .epilogue(
      `Channel modes (split --channel):
  left  (0)  - left channel only
  right (1)  - right channel only
  mid   (2)  - half-sum (L + R) / 2, rounded down
  side  (3)  - half-difference (L - R) / 2, rounded down

Notes:
  • Input and output are canonical 44-byte-header PCM WAV files
  • split/merge take 16- or 32-bit samples; encode takes 16-bit stereo
  • encode stores mid in the high 16 bits and side in the low 16 bits
  • '-' reads stdin (one input at most) or writes stdout

Examples:
  $0 split --channel left song.wav left.wav
  $0 merge left.wav right.wav song.wav
  $0 encode song.wav song32.wav
  $0 decode song32.wav song.wav`
    )
    .option("force", {
      alias: "f",
      describe: "Overwrite existing output files",
      type: "boolean",
      default: false,
    })
    .option("verbose", {
      alias: "v",
      describe: "Verbose output",
      type: "boolean",
      default: false,
    })
    .command(
      "split <input> <output>",
      "Derive a mono file from a stereo file",
      (y) =>
        y
          .positional("input", { describe: "Stereo WAV file", type: "string", demandOption: true })
          .positional("output", { describe: "Mono WAV file to write", type: "string", demandOption: true })
          .option("channel", {
            alias: "c",
            describe: "Channel mode (left | right | mid | side, or 0-3)",
            type: "string",
            default: "mid",
          }),
      async (argv) => {
        let mode: ChannelMode;
        try {
          mode = parseChannelMode(argv.channel);
        } catch (error) {
          throw toCliError(error, argv.input);
        }
        if (argv.verbose) {
          console.error(`Channel mode: ${mode}`);
        }
        await convert([argv.input], argv.output, argv, stdio, ([input], sink) =>
          stereoToMono(input, sink, mode)
        );
      }
    )
    .command(
      "merge <left> <right> <output>",
      "Interleave two mono files into one stereo file",
      (y) =>
        y
          .positional("left", { describe: "Mono WAV file for the left channel", type: "string", demandOption: true })
          .positional("right", { describe: "Mono WAV file for the right channel", type: "string", demandOption: true })
          .positional("output", { describe: "Stereo WAV file to write", type: "string", demandOption: true }),
      async (argv) => {
        await convert([argv.left, argv.right], argv.output, argv, stdio, ([left, right], sink) =>
          monoPairToStereo(left, right, sink)
        );
      }
    )
    .command(
      "encode <input> <output>",
      "Pack 16-bit stereo into 32-bit mid/side mono",
      (y) =>
        y
          .positional("input", { describe: "16-bit stereo WAV file", type: "string", demandOption: true })
          .positional("output", { describe: "32-bit mono WAV file to write", type: "string", demandOption: true }),
      async (argv) => {
        await convert([argv.input], argv.output, argv, stdio, ([input], sink) =>
          stereoToCoded32(input, sink)
        );
      }
    )
    .command(
      "decode <input> <output>",
      "Unpack 32-bit mid/side mono into 16-bit stereo",
      (y) =>
        y
          .positional("input", { describe: "32-bit coded mono WAV file", type: "string", demandOption: true })
          .positional("output", { describe: "16-bit stereo WAV file to write", type: "string", demandOption: true })
          .option("signed-mid", {
            describe: "Treat the high 16 bits as signed (default: unsigned, negative mids saturate)",
            type: "boolean",
            default: false,
          }),
      async (argv) => {
        await convert([argv.input], argv.output, argv, stdio, ([input], sink) =>
          coded32ToStereo(input, sink, { signedMid: argv.signedMid })
        );
      }
    )
    .command(
      "info <input>",
      "Print the header of a WAV file",
      (y) => y.positional("input", { describe: "WAV file", type: "string", demandOption: true }),
      async (argv) => {
        await info(argv.input, stdio);
      }
    )
    .demandCommand(1, "A command is required")
    .strict()
    .fail((message: string | null, error: Error | undefined) => {
      if (error) {
        throw error;
      }
      throw errors.usage(message ?? "invalid arguments");
    })
    .exitProcess(false)
    .help()
    .alias("h", "help")
    .parseAsync();
}

/**
 * Prints a failure and returns the exit code for it.
 */
export function reportError(error: unknown): number {
  if (error instanceof CliError) {
    console.error(error.message);
    return error.exitCode;
  }
  const unexpected = errors.processingFailed(error instanceof Error ? error.message : String(error));
  console.error(unexpected.message);
  return unexpected.exitCode;
}
