import { WebSocketServer, type RawData, type WebSocket } from "ws";
import { COMPRESSION_BACKENDS, DEFAULT_BACKEND, isCompressionBackend, type CompressionBackend } from "../engine";
import type { ClientMessage, ServerMessage } from "./protocol";
import { handleClientMessage, mkError, SERVER_VERSION } from "./handleMessage";
import { DEFAULT_MAX_PAYLOAD_BYTES } from "./config";

export type WsServerOptions = {
  port: number;
  defaultBackend?: CompressionBackend;
  maxPayloadBytes?: number;

  /** Receives one line per handled request. */
  log?: (line: string) => void;

  /** Receives every failure answered with INTERNAL. Falls back to `log`. */
  onError?: (line: string, err: unknown) => void;
};

export type WsServerHandle = {
  port: number;
  close: () => Promise<void>;
};

function safeParseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

function isPlainObject(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function getReqId(x: unknown): string | undefined {
  if (!isPlainObject(x)) return undefined;
  const v = x.reqId;
  return typeof v === "string" ? v : undefined;
}

function isClientMessage(x: unknown): x is ClientMessage {
  if (!isPlainObject(x)) return false;
  if ("reqId" in x && typeof x.reqId !== "string") return false;

  switch (x.type) {
    case "hello":
      return true;

    case "compress":
    case "decompress":
      return typeof x.payload === "string" && (!("backend" in x) || isCompressionBackend(x.backend));

    case "inspect":
      return typeof x.payload === "string";

    default:
      return false;
  }
}

function send(ws: WebSocket, msg: ServerMessage) {
  ws.send(JSON.stringify(msg));
}

// base64 grows payloads by 4/3; leave room for the JSON envelope
function frameLimit(maxPayloadBytes: number): number {
  return Math.ceil((maxPayloadBytes * 4) / 3) + 64 * 1024;
}

export function startWsServer(opts: WsServerOptions): WsServerHandle {
  const handlerOptions = {
    defaultBackend: opts.defaultBackend ?? DEFAULT_BACKEND,
    maxPayloadBytes: opts.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES,
  };
  const log = opts.log;
  const reportError = opts.onError ?? ((line: string) => log?.(line));

  const wss = new WebSocketServer({
    port: opts.port,
    maxPayload: frameLimit(handlerOptions.maxPayloadBytes),
  });

  wss.on("connection", (ws) => {
    // welcome-on-connect
    send(ws, {
      type: "welcome",
      serverVersion: SERVER_VERSION,
      backends: COMPRESSION_BACKENDS,
      defaultBackend: handlerOptions.defaultBackend,
    });

    ws.on("message", (data) => {
      const parsed = safeParseJson(rawToString(data));
      const reqId = getReqId(parsed);

      if (!isClientMessage(parsed)) {
        send(ws, mkError("BAD_MESSAGE", parsed === null ? "Invalid JSON." : "Unrecognized message.", reqId));
        return;
      }

      const startedAt = Date.now();
      let reply: ServerMessage;
      try {
        reply = handleClientMessage(parsed, handlerOptions);
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        reportError(`${parsed.type} failed: ${message}`, err);
        reply = mkError("INTERNAL", message, reqId);
      }

      send(ws, reply);
      log?.(`${parsed.type} -> ${reply.type}${reply.type === "error" ? ` ${reply.code}` : ""} (${Date.now() - startedAt}ms)`);
    });

    ws.on("error", (err) => {
      log?.(`socket error: ${err.message}`);
    });
  });

  const address = wss.address();
  const port = typeof address === "object" && address !== null ? address.port : opts.port;

  return {
    port,
    close: async () => {
      for (const ws of wss.clients) {
        ws.terminate();
      }
      await new Promise<void>((resolve, reject) => wss.close((err) => (err ? reject(err) : resolve())));
    },
  };
}
