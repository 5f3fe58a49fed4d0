/**
 * Request Broker
 *
 * Correlates fire-and-forget requests to the backend with responses that arrive
 * later (or never). Each pending request is removed exactly once: by its
 * response, by a transport failure, or by the timeout sweep in `tick`.
 */

import { randomBytes } from "node:crypto";

import {
  createLogger,
  systemClock,
  TerminalError,
  toError,
  type Clock,
  type TerminalMethod,
  type TerminalMethodMap,
  type TerminalRequestEnvelope,
} from "@workshop-access/shared";

const logger = createLogger("terminal:broker");

/**
 * Receives correlated results from a transport.
 */
export interface ResponseReceiver {
  onResponse(requestId: string, payload: unknown): void;
  onTransportFailure(requestId: string, error: TerminalError): void;
}

/**
 * Outbound channel to the backend. `send` must not block; a synchronous throw
 * means the request never left the terminal.
 */
export interface BackendTransport {
  setReceiver(receiver: ResponseReceiver): void;
  send(request: TerminalRequestEnvelope): void;
}

export interface RequestHandlers {
  timeoutMs: number;
  onResponse(payload: unknown): void;
  onFailure(error: TerminalError): void;
}

export interface PendingRequestHandle {
  readonly requestId: string;
  readonly method: TerminalMethod;
  readonly deadline: number;
}

interface PendingRequest extends PendingRequestHandle {
  onResponse(payload: unknown): void;
  onFailure(error: TerminalError): void;
}

export class RequestBroker implements ResponseReceiver {
  private pending = new Map<string, PendingRequest>();
  private counter = 0;

  constructor(
    private transport: BackendTransport,
    private clock: Clock = systemClock,
  ) {
    transport.setReceiver(this);
  }

  /**
   * Register a request and hand it to the transport.
   */
  send<M extends TerminalMethod>(
    method: M,
    payload: TerminalMethodMap[M]["request"],
    handlers: RequestHandlers,
  ): PendingRequestHandle {
    const requestId = this.nextRequestId();
    const deadline = this.clock.now() + handlers.timeoutMs;
    const entry: PendingRequest = {
      requestId,
      method,
      deadline,
      onResponse: handlers.onResponse,
      onFailure: handlers.onFailure,
    };
    this.pending.set(requestId, entry);

    logger.debug("Sending request", { requestId, method, deadline });

    try {
      this.transport.send({ type: "terminal-request", id: requestId, method, payload });
    } catch (error) {
      const cause = toError(error);
      logger.warn("Transport refused request", { requestId, method, error: cause.message });
      this.settle(requestId, (p) =>
        p.onFailure(new TerminalError("Unspecified", `Send failed: ${cause.message}`)),
      );
    }

    return { requestId, method, deadline };
  }

  /**
   * Promise form of `send`, for callers that do not run inside a state machine.
   */
  request<M extends TerminalMethod>(
    method: M,
    payload: TerminalMethodMap[M]["request"],
    timeoutMs: number,
  ): Promise<unknown> {
    return new Promise((resolve, reject) => {
      this.send(method, payload, {
        timeoutMs,
        onResponse: resolve,
        onFailure: reject,
      });
    });
  }

  onResponse(requestId: string, payload: unknown): void {
    const entry = this.pending.get(requestId);
    if (!entry) {
      logger.warn("Discarding response for unknown request", { requestId });
      return;
    }
    if (this.clock.now() > entry.deadline) {
      logger.warn("Late response delivered before timeout sweep", {
        requestId,
        method: entry.method,
      });
    }
    this.settle(requestId, (p) => p.onResponse(payload));
  }

  onTransportFailure(requestId: string, error: TerminalError): void {
    const entry = this.pending.get(requestId);
    if (!entry) {
      logger.warn("Discarding failure for unknown request", { requestId, error: error.message });
      return;
    }
    this.settle(requestId, (p) => p.onFailure(error));
  }

  /**
   * Time out every request whose deadline has passed.
   */
  tick(now: number = this.clock.now()): number {
    const expired = Array.from(this.pending.values()).filter((p) => now > p.deadline);
    for (const entry of expired) {
      logger.warn("Request timed out", { requestId: entry.requestId, method: entry.method });
      this.settle(entry.requestId, (p) =>
        p.onFailure(new TerminalError("Timeout", `${entry.method} timed out`)),
      );
    }
    return expired.length;
  }

  /**
   * Forget a request without notifying anyone.
   */
  cancel(requestId: string): boolean {
    return this.pending.delete(requestId);
  }

  pendingCount(): number {
    return this.pending.size;
  }

  private settle(requestId: string, deliver: (entry: PendingRequest) => void): void {
    const entry = this.pending.get(requestId);
    if (!entry) {
      return;
    }
    this.pending.delete(requestId);
    try {
      deliver(entry);
    } catch (error) {
      logger.error("Request handler threw", toError(error), { requestId, method: entry.method });
    }
  }

  private nextRequestId(): string {
    this.counter += 1;
    return `req_${this.counter}_${randomBytes(4).toString("hex")}`;
  }
}
