import { DEFAULT_BACKEND, isCompressionBackend, type CompressionBackend } from "../engine";

type Env = Record<string, string | undefined>;

export function envFlag(env: Env, name: string, defaultValue = false): boolean {
  const v = env[name];
  if (v == null) return defaultValue;
  const s = String(v).trim().toLowerCase();
  return s === "1" || s === "true" || s === "yes" || s === "on";
}

export function envInt(env: Env, name: string, defaultValue: number): number {
  const v = env[name];
  if (v == null) return defaultValue;
  const n = Number(v);
  return Number.isFinite(n) ? n : defaultValue;
}

export function envString(env: Env, name: string, defaultValue: string): string {
  const v = env[name];
  return v == null || v.trim() === "" ? defaultValue : v.trim();
}

export type ServerConfig = {
  port: number;
  defaultBackend: CompressionBackend;
  maxPayloadBytes: number;
  logRequests: boolean;
};

export const DEFAULT_WS_PORT = 8790;
export const DEFAULT_MAX_PAYLOAD_BYTES = 4 * 1024 * 1024;

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const backend = envString(env, "AVFCODEC_BACKEND", DEFAULT_BACKEND);
  if (!isCompressionBackend(backend)) {
    throw new Error(`AVFCODEC_BACKEND must be one of plain, gzip, deflate, brotli; got "${backend}"`);
  }

  return {
    port: envInt(env, "AVFCODEC_WS_PORT", DEFAULT_WS_PORT),
    defaultBackend: backend,
    maxPayloadBytes: envInt(env, "AVFCODEC_MAX_PAYLOAD_BYTES", DEFAULT_MAX_PAYLOAD_BYTES),
    logRequests: envFlag(env, "AVFCODEC_LOG_REQUESTS", false),
  };
}
