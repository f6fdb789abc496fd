import fs from "node:fs";
import path from "node:path";
import { DEFAULT_BACKEND, type CompressionBackend } from "./backends";
import { compressBytes, decompressBytes } from "./publicApi";

export type ConvertOptions = {
  backend?: CompressionBackend;
};

export type ConvertResult = {
  inputBytes: number;
  outputBytes: number;
};

function ensureDirForFile(filePath: string) {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
}

/**
 * Write through a temp file and rename, so a failed conversion never leaves
 * a partial output behind.
 */
function writeFileAtomic(filePath: string, bytes: Uint8Array): void {
  ensureDirForFile(filePath);
  const tmp = `${filePath}.${process.pid}.tmp`;
  try {
    fs.writeFileSync(tmp, bytes);
    fs.renameSync(tmp, filePath);
  } catch (err) {
    fs.rmSync(tmp, { force: true });
    throw err;
  }
}

function convertFile(
  inPath: string,
  outPath: string,
  convert: (input: Uint8Array) => Uint8Array
): ConvertResult {
  const input = fs.readFileSync(inPath);
  const output = convert(input);
  writeFileAtomic(outPath, output);
  return { inputBytes: input.length, outputBytes: output.length };
}

/** AVF file -> CVF file. */
export function compressFile(inPath: string, outPath: string, opts: ConvertOptions = {}): ConvertResult {
  const backend = opts.backend ?? DEFAULT_BACKEND;
  return convertFile(inPath, outPath, (input) => compressBytes(input, backend));
}

/** CVF file -> AVF file. */
export function decompressFile(inPath: string, outPath: string, opts: ConvertOptions = {}): ConvertResult {
  const backend = opts.backend ?? DEFAULT_BACKEND;
  return convertFile(inPath, outPath, (input) => decompressBytes(input, backend));
}
