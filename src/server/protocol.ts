// src/server/protocol.ts

import type { CompressionBackend, LevelCode, ReplayCodecErrorCode, ReplayProfile } from "../engine";

/* =========================
 * Client → Server messages
 * ========================= */

export type ClientMessage = HelloMessage | CompressMessage | DecompressMessage | InspectMessage;

export interface HelloMessage {
  type: "hello";
  reqId?: string;
}

/** payload: base64 AVF bytes */
export interface CompressMessage {
  type: "compress";
  payload: string;
  backend?: CompressionBackend;
  reqId?: string;
}

/** payload: base64 CVF bytes */
export interface DecompressMessage {
  type: "decompress";
  payload: string;
  backend?: CompressionBackend;
  reqId?: string;
}

/** payload: base64 AVF bytes */
export interface InspectMessage {
  type: "inspect";
  payload: string;
  reqId?: string;
}

/* =========================
 * Server → Client messages
 * ========================= */

export type ServerMessage =
  | WelcomeMessage
  | CompressedMessage
  | DecompressedMessage
  | SummaryMessage
  | ErrorMessage;

export interface WelcomeMessage {
  type: "welcome";
  serverVersion: string;
  backends: readonly CompressionBackend[];
  defaultBackend: CompressionBackend;
  reqId?: string;
}

export interface CompressedMessage {
  type: "compressed";
  payload: string;
  backend: CompressionBackend;
  inputBytes: number;
  outputBytes: number;
  reqId?: string;
}

export interface DecompressedMessage {
  type: "decompressed";
  payload: string;
  backend: CompressionBackend;
  inputBytes: number;
  outputBytes: number;
  reqId?: string;
}

export interface ReplaySummary {
  version: number;
  profile: ReplayProfile;
  level: LevelCode;
  levelName: string;
  cols: number;
  rows: number;
  mineCount: number;
  eventCount: number;

  /** gametime of the last event, 0 without events */
  durationMs: number;

  skin: string;
  playerId: string;
  arbiterVersion: string;
}

export interface SummaryMessage {
  type: "summary";
  summary: ReplaySummary;
  reqId?: string;
}

export type ServerErrorCode =
  | ReplayCodecErrorCode
  | "BAD_MESSAGE"
  | "PAYLOAD_TOO_LARGE"
  | "INTERNAL";

export interface ErrorMessage {
  type: "error";
  code: ServerErrorCode;
  message: string;
  reqId?: string;
}
