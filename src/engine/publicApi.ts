import { parseAvfBytes } from "./avfParser";
import { writeAvfBytes } from "./avfWriter";
import { DEFAULT_BACKEND, unwrapPayload, wrapPayload, type CompressionBackend } from "./backends";
import { compressRecord } from "./cvfWriter";
import { decompressRecord } from "./cvfReader";

/**
 * AVF file bytes -> CVF file bytes.
 */
export function compressBytes(avf: Uint8Array, backend: CompressionBackend = DEFAULT_BACKEND): Uint8Array {
  return wrapPayload(compressRecord(parseAvfBytes(avf)), backend);
}

/**
 * CVF file bytes -> AVF file bytes, identical to the ones compressed.
 */
export function decompressBytes(cvf: Uint8Array, backend: CompressionBackend = DEFAULT_BACKEND): Uint8Array {
  return writeAvfBytes(decompressRecord(unwrapPayload(cvf, backend)));
}
