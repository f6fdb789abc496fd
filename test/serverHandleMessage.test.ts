import { describe, it, expect } from "vitest";
import { handleClientMessage, summarize, type HandlerOptions } from "../src/server/handleMessage";
import type { ServerMessage } from "../src/server/protocol";
import { compressBytes, parseAvfBytes } from "../src/engine";
import { buildAvf } from "./helpers";

const opts: HandlerOptions = { defaultBackend: "gzip", maxPayloadBytes: 64 * 1024 };

const b64 = (bytes: Uint8Array) => Buffer.from(bytes).toString("base64");

function expectError(msg: ServerMessage, code: string) {
  expect(msg.type).toBe("error");
  if (msg.type !== "error") return;
  expect(msg.code).toBe(code);
}

describe("server handleClientMessage (pure)", () => {
  it("answers hello with the server capabilities", () => {
    expect(handleClientMessage({ type: "hello", reqId: "r1" }, opts)).toEqual({
      type: "welcome",
      serverVersion: "1.0.0",
      backends: ["plain", "gzip", "deflate", "brotli"],
      defaultBackend: "gzip",
      reqId: "r1",
    });
  });

  it("compresses then decompresses a replay", () => {
    const avf = buildAvf();

    const packed = handleClientMessage({ type: "compress", payload: b64(avf), backend: "plain" }, opts);
    if (packed.type !== "compressed") throw new Error(`unexpected ${packed.type}`);
    expect(packed.backend).toBe("plain");
    expect(packed.inputBytes).toBe(avf.length);
    expect(packed.payload).toBe(b64(compressBytes(avf, "plain")));

    const unpacked = handleClientMessage({ type: "decompress", payload: packed.payload, backend: "plain" }, opts);
    if (unpacked.type !== "decompressed") throw new Error(`unexpected ${unpacked.type}`);
    expect(unpacked.payload).toBe(b64(avf));
    expect(unpacked.outputBytes).toBe(avf.length);
  });

  it("falls back to the configured backend", () => {
    const avf = buildAvf();
    const packed = handleClientMessage({ type: "compress", payload: b64(avf) }, opts);
    if (packed.type !== "compressed") throw new Error(`unexpected ${packed.type}`);
    expect(packed.backend).toBe("gzip");

    const unpacked = handleClientMessage({ type: "decompress", payload: packed.payload }, opts);
    if (unpacked.type !== "decompressed") throw new Error(`unexpected ${unpacked.type}`);
    expect(unpacked.payload).toBe(b64(avf));
  });

  it("summarizes a replay", () => {
    const reply = handleClientMessage({ type: "inspect", payload: b64(buildAvf()), reqId: "s" }, opts);
    expect(reply).toEqual({
      type: "summary",
      reqId: "s",
      summary: {
        version: 1,
        profile: "avf",
        level: 3,
        levelName: "beginner",
        cols: 8,
        rows: 8,
        mineCount: 10,
        eventCount: 5,
        durationMs: 2340,
        skin: "Classic",
        playerId: "test-player",
        arbiterVersion: "0.52.3",
      },
    });
  });

  it("reports a FreeSweeper profile", () => {
    expect(summarize(parseAvfBytes(buildAvf({ version: 0 }))).profile).toBe("freesweeper");
  });

  it("turns codec failures into coded errors", () => {
    const reply = handleClientMessage({ type: "inspect", payload: b64(buildAvf({ level: 7 })), reqId: "x" }, opts);
    expectError(reply, "INVALID_LEVEL");
    expect(reply.reqId).toBe("x");
  });

  it("reports a stream the backend cannot unwrap", () => {
    const reply = handleClientMessage({ type: "decompress", payload: b64(buildAvf()), backend: "gzip" }, opts);
    expectError(reply, "BACKEND_FAILURE");
  });

  it("answers a corrupt CVF with a coded error", () => {
    const cvf = compressBytes(buildAvf(), "plain");
    cvf[43 + 9] = 0x15; // first x residual decodes to a negative position
    const reply = handleClientMessage({ type: "decompress", payload: b64(cvf), backend: "plain", reqId: "c" }, opts);
    expectError(reply, "EVENT_OUT_OF_RANGE");
    expect(reply.reqId).toBe("c");
  });

  it("refuses payloads over the limit", () => {
    const reply = handleClientMessage(
      { type: "compress", payload: b64(buildAvf()) },
      { ...opts, maxPayloadBytes: 16 }
    );
    expectError(reply, "PAYLOAD_TOO_LARGE");
  });
});
