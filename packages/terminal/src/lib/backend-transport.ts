/**
 * Backend Transports
 *
 * Both carry the same JSON envelopes:
 * - WsBackendTransport: one socket to /ws/terminal, responses pushed back on it
 * - HttpBackendTransport: one POST /terminal/request per call
 *
 * Neither blocks the caller; results reach the broker through its receiver.
 */

import { fetch } from "undici";
import { WebSocket, type RawData } from "ws";

import {
  backendMessageSchema,
  createLogger,
  TerminalError,
  toError,
  type BackendMessage,
  type TerminalRequestEnvelope,
} from "@workshop-access/shared";

import type { BackendTransport, ResponseReceiver } from "./request-broker.js";

const logger = createLogger("terminal:transport");

export interface BackendTransportConfig {
  backendUrl: string;
  /** Sent as a bearer token when set */
  terminalToken?: string;
  terminalId?: string;
}

function authHeaders(config: BackendTransportConfig): Record<string, string> {
  const headers: Record<string, string> = {};
  if (config.terminalToken) {
    headers.authorization = `Bearer ${config.terminalToken}`;
  }
  if (config.terminalId) {
    headers["x-terminal-id"] = config.terminalId;
  }
  return headers;
}

/**
 * Route a parsed backend message to the receiver.
 */
export function deliverBackendMessage(receiver: ResponseReceiver, message: BackendMessage): void {
  if (message.type === "terminal-response") {
    receiver.onResponse(message.id, message.payload);
  } else {
    receiver.onTransportFailure(
      message.id,
      new TerminalError("Unspecified", `${message.error.code}: ${message.error.message}`),
    );
  }
}

abstract class ReceivingTransport implements BackendTransport {
  private receiver: ResponseReceiver | null = null;

  setReceiver(receiver: ResponseReceiver): void {
    this.receiver = receiver;
  }

  abstract send(request: TerminalRequestEnvelope): void;

  protected get target(): ResponseReceiver {
    if (!this.receiver) {
      throw new Error("Transport has no receiver");
    }
    return this.receiver;
  }
}

export interface WsReconnectOptions {
  /** Delay before the first reconnect attempt, doubled on every further one */
  reconnectDelayMs?: number;
  maxReconnectDelayMs?: number;
}

export class WsBackendTransport extends ReceivingTransport {
  private ws: WebSocket | null = null;
  private inflight = new Set<string>();
  private closing = false;
  private reconnectAttempts = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private reconnectDelayMs: number;
  private maxReconnectDelayMs: number;

  constructor(
    private config: BackendTransportConfig,
    options: WsReconnectOptions = {},
  ) {
    super();
    this.reconnectDelayMs = options.reconnectDelayMs ?? 1000;
    this.maxReconnectDelayMs = options.maxReconnectDelayMs ?? 60_000;
  }

  /**
   * Open the socket. Resolves once it is usable. A socket that closes later is
   * reopened with exponential backoff until `close` is called.
   */
  async connect(): Promise<void> {
    if (this.ws && this.ws.readyState === WebSocket.OPEN) {
      return;
    }
    this.closing = false;

    const wsUrl = this.config.backendUrl
      .replace(/^http:/, "ws:")
      .replace(/^https:/, "wss:")
      .replace(/\/$/, "");

    const ws = new WebSocket(`${wsUrl}/ws/terminal`, { headers: authHeaders(this.config) });
    this.ws = ws;

    ws.on("message", (data) => this.handleMessage(data));
    ws.on("close", (code) => this.handleClose(code));

    await new Promise<void>((resolve, reject) => {
      const onOpen = () => {
        ws.off("error", onError);
        logger.info("Connected to backend", { url: wsUrl });
        resolve();
      };
      const onError = (err: Error) => {
        ws.off("open", onOpen);
        reject(err);
      };
      ws.once("open", onOpen);
      ws.once("error", onError);
    });

    this.reconnectAttempts = 0;
    ws.on("error", (err) => {
      logger.error("WebSocket error", err);
    });
  }

  isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  send(request: TerminalRequestEnvelope): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      throw new Error("Not connected to backend");
    }
    this.ws.send(JSON.stringify(request));
    this.inflight.add(request.id);
  }

  async close(): Promise<void> {
    this.closing = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    const ws = this.ws;
    if (!ws || ws.readyState === WebSocket.CLOSED) {
      return;
    }
    await new Promise<void>((resolve) => {
      ws.once("close", () => resolve());
      ws.close();
    });
  }

  private handleMessage(data: RawData): void {
    let message: BackendMessage;
    try {
      message = backendMessageSchema.parse(JSON.parse(data.toString()));
    } catch (error) {
      logger.warn("Discarding unparseable backend message", { error: toError(error).message });
      return;
    }
    this.inflight.delete(message.id);
    deliverBackendMessage(this.target, message);
  }

  private handleClose(code: number): void {
    logger.warn("Backend connection closed", { code, inflight: this.inflight.size });
    const ids = Array.from(this.inflight);
    this.inflight.clear();
    this.ws = null;
    for (const id of ids) {
      this.target.onTransportFailure(id, new TerminalError("Unspecified", "Backend connection closed"));
    }
    if (!this.closing) {
      this.scheduleReconnect();
    }
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) {
      return;
    }
    this.reconnectAttempts++;
    const delay = Math.min(
      this.reconnectDelayMs * Math.pow(2, this.reconnectAttempts - 1),
      this.maxReconnectDelayMs,
    );
    logger.info("Reconnecting to backend", { delay, attempt: this.reconnectAttempts });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      // A failed attempt closes its socket, which schedules the next one.
      this.connect().catch((error: unknown) => {
        logger.warn("Reconnect failed", { attempt: this.reconnectAttempts, error: toError(error).message });
      });
    }, delay);
  }
}

export class HttpBackendTransport extends ReceivingTransport {
  constructor(private config: BackendTransportConfig) {
    super();
  }

  send(request: TerminalRequestEnvelope): void {
    this.post(request)
      .then((message) => deliverBackendMessage(this.target, message))
      .catch((error: unknown) => {
        const cause = toError(error);
        logger.warn("Backend request failed", { requestId: request.id, error: cause.message });
        this.target.onTransportFailure(request.id, new TerminalError("Unspecified", cause.message));
      });
  }

  private async post(request: TerminalRequestEnvelope): Promise<BackendMessage> {
    const url = `${this.config.backendUrl.replace(/\/$/, "")}/terminal/request`;
    const res = await fetch(url, {
      method: "POST",
      headers: { "content-type": "application/json", ...authHeaders(this.config) },
      body: JSON.stringify(request),
    });

    const body: unknown = await res.json().catch(() => null);
    const parsed = backendMessageSchema.safeParse(body);
    if (parsed.success) {
      return parsed.data;
    }
    throw new Error(`Backend answered ${res.status} ${res.statusText}`);
  }
}
