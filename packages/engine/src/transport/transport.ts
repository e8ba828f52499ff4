/**
 * Transport abstraction: one object per connection attempt.
 *
 * The connection manager never reuses a transport. Once `onClose` (or
 * `onError`) has fired the instance is dead and a new one is created.
 *
 * @module transport
 */
import WebSocket from "ws";
import { MAX_FRAME_BYTES } from "../protocol/constants.js";

export type TransportHandlers = {
  onOpen?: () => void;
  onMessage?: (data: string) => void;
  onError?: (err: Error) => void;
  onClose?: (code: number, reason: string) => void;
};

export interface Transport {
  setHandlers(handlers: TransportHandlers): void;
  connect(): void;
  send(data: string): void;
  /** Close the connection. `onClose` may still fire afterwards. */
  close(code?: number, reason?: string): void;
}

export type TransportFactory = (url: string) => Transport;

export class WebSocketTransport implements Transport {
  private ws: WebSocket | null = null;
  private handlers: TransportHandlers = {};

  constructor(private readonly url: string) {}

  setHandlers(handlers: TransportHandlers): void {
    this.handlers = handlers;
  }

  connect(): void {
    if (this.ws) return;
    const ws = new WebSocket(this.url, { maxPayload: MAX_FRAME_BYTES });
    this.ws = ws;

    ws.on("open", () => {
      this.handlers.onOpen?.();
    });
    ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) return;
      this.handlers.onMessage?.(rawToString(data));
    });
    ws.on("error", (err: Error) => {
      this.handlers.onError?.(err);
    });
    ws.on("close", (code: number, reason: Buffer) => {
      this.ws = null;
      this.handlers.onClose?.(code, reason.toString("utf8"));
    });
  }

  send(data: string): void {
    if (this.ws?.readyState !== WebSocket.OPEN) {
      throw new Error("WebSocket is not open");
    }
    this.ws.send(data);
  }

  close(code = 1000, reason = ""): void {
    const ws = this.ws;
    if (!ws) return;
    if (ws.readyState === WebSocket.CONNECTING) {
      ws.terminate();
      return;
    }
    ws.close(code, closeReason(reason));
  }
}

/** Close frames carry at most 123 bytes of reason. */
export const MAX_CLOSE_REASON_BYTES = 123;

/** Cut `reason` to fit a close frame without splitting a character. */
export function closeReason(reason: string): string {
  if (Buffer.byteLength(reason, "utf8") <= MAX_CLOSE_REASON_BYTES) return reason;
  let out = "";
  let bytes = 0;
  for (const char of reason) {
    bytes += Buffer.byteLength(char, "utf8");
    if (bytes > MAX_CLOSE_REASON_BYTES) break;
    out += char;
  }
  return out;
}

function rawToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

export const webSocketTransportFactory: TransportFactory = (url) =>
  new WebSocketTransport(url);
