import { describe, it, expect } from "vitest";
import WebSocket, { type RawData } from "ws";
import { startWsServer } from "../src/server/wsServer";
import type { ServerMessage } from "../src/server/protocol";
import { buildAvf } from "./helpers";

function makeQueue(ws: WebSocket) {
  const q: string[] = [];
  let resolve: ((s: string) => void) | null = null;

  ws.on("message", (d: RawData) => {
    const s = Buffer.isBuffer(d) ? d.toString("utf8") : String(d);
    if (resolve) {
      const r = resolve;
      resolve = null;
      r(s);
    } else {
      q.push(s);
    }
  });

  return async () => {
    const head = q.shift();
    if (head !== undefined) return head;
    return await new Promise<string>((r) => (resolve = r));
  };
}

async function nextWithTimeout(next: () => Promise<string>, label: string, ms = 2000): Promise<ServerMessage> {
  const raw = await Promise.race([
    next(),
    new Promise<string>((_, reject) =>
      setTimeout(() => reject(new Error(`Timeout waiting for message (${label}) after ${ms}ms`)), ms)
    ),
  ]);
  return JSON.parse(raw);
}

async function connect(port: number) {
  const ws = new WebSocket(`ws://localhost:${port}`);
  const nextMsg = makeQueue(ws);

  await new Promise<void>((resolve, reject) => {
    ws.on("open", () => resolve());
    ws.on("error", (e) => reject(e));
  });

  return { ws, nextMsg };
}

const b64 = (bytes: Uint8Array) => Buffer.from(bytes).toString("base64");

describe("wsServer integration", () => {
  it("welcome -> compress -> decompress round-trips a replay", async () => {
    const lines: string[] = [];
    const server = startWsServer({ port: 0, defaultBackend: "deflate", log: (l) => lines.push(l) });
    const { ws, nextMsg } = await connect(server.port);

    // 1) welcome on connect
    const m0 = await nextWithTimeout(nextMsg, "welcome");
    if (m0.type !== "welcome") throw new Error(`unexpected ${m0.type}`);
    expect(m0.defaultBackend).toBe("deflate");
    expect(m0.backends).toEqual(["plain", "gzip", "deflate", "brotli"]);

    // 2) compress with the server default
    const avf = buildAvf();
    ws.send(JSON.stringify({ type: "compress", payload: b64(avf), reqId: "c1" }));
    const m1 = await nextWithTimeout(nextMsg, "compressed");
    if (m1.type !== "compressed") throw new Error(`unexpected ${JSON.stringify(m1)}`);
    expect(m1.reqId).toBe("c1");
    expect(m1.backend).toBe("deflate");
    expect(m1.inputBytes).toBe(avf.length);

    // 3) decompress it again
    ws.send(JSON.stringify({ type: "decompress", payload: m1.payload, reqId: "d1" }));
    const m2 = await nextWithTimeout(nextMsg, "decompressed");
    if (m2.type !== "decompressed") throw new Error(`unexpected ${JSON.stringify(m2)}`);
    expect(m2.reqId).toBe("d1");
    expect(m2.payload).toBe(b64(avf));

    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^compress -> compressed \(\d+ms\)$/);
    expect(lines[1]).toMatch(/^decompress -> decompressed \(\d+ms\)$/);

    ws.close();
    await server.close();
  });

  it("returns BAD_MESSAGE for invalid JSON and unknown messages", async () => {
    const server = startWsServer({ port: 0 });
    const { ws, nextMsg } = await connect(server.port);
    await nextWithTimeout(nextMsg, "welcome");

    ws.send("{not json");
    const e1 = await nextWithTimeout(nextMsg, "invalid json");
    expect(e1).toEqual({ type: "error", code: "BAD_MESSAGE", message: "Invalid JSON." });

    ws.send(JSON.stringify({ type: "nope", reqId: "n1" }));
    const e2 = await nextWithTimeout(nextMsg, "unknown type");
    expect(e2).toEqual({ type: "error", code: "BAD_MESSAGE", message: "Unrecognized message.", reqId: "n1" });

    ws.send(JSON.stringify({ type: "compress", payload: "AA==", backend: "lzma" }));
    const e3 = await nextWithTimeout(nextMsg, "unknown backend");
    expect(e3.type).toBe("error");
    if (e3.type === "error") expect(e3.code).toBe("BAD_MESSAGE");

    ws.close();
    await server.close();
  });

  it("reports codec errors with their code", async () => {
    const server = startWsServer({ port: 0 });
    const { ws, nextMsg } = await connect(server.port);
    await nextWithTimeout(nextMsg, "welcome");

    ws.send(JSON.stringify({ type: "inspect", payload: b64(buildAvf({ level: 8 })), reqId: "i1" }));
    const m = await nextWithTimeout(nextMsg, "inspect error");
    if (m.type !== "error") throw new Error(`unexpected ${m.type}`);
    expect(m.code).toBe("INVALID_LEVEL");
    expect(m.reqId).toBe("i1");

    ws.send(JSON.stringify({ type: "inspect", payload: b64(buildAvf()) }));
    const s = await nextWithTimeout(nextMsg, "summary");
    if (s.type !== "summary") throw new Error(`unexpected ${s.type}`);
    expect(s.summary.eventCount).toBe(5);

    ws.close();
    await server.close();
  });

  it("serves several clients independently", async () => {
    const server = startWsServer({ port: 0 });
    const a = await connect(server.port);
    const b = await connect(server.port);
    await nextWithTimeout(a.nextMsg, "welcome a");
    await nextWithTimeout(b.nextMsg, "welcome b");

    b.ws.send(JSON.stringify({ type: "hello", reqId: "b" }));
    a.ws.send(JSON.stringify({ type: "hello", reqId: "a" }));

    const ra = await nextWithTimeout(a.nextMsg, "hello a");
    const rb = await nextWithTimeout(b.nextMsg, "hello b");
    expect(ra.reqId).toBe("a");
    expect(rb.reqId).toBe("b");

    a.ws.close();
    b.ws.close();
    await server.close();
  });
});
