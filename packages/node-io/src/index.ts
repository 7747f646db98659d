// Node.js I/O adapters for wavmix
// Provides file and stdio sources and all-or-nothing output writes

export { STDIO_PATH, openInput, readStream, writeOutput } from "./files.js";
