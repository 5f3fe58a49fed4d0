/**
 * Session Creation State Machine
 *
 * Drives one tag from "presented" to a registered session:
 *
 *   begin ─► awaitStartSession ─┬─ existingSession ──────────────────────────► succeeded
 *                               ├─ authRequired ─► tag frame 1 ─► awaitAuthenticateNewSession
 *                               │                   ─► tag frame 2 ─► awaitCompleteAuthentication ─► succeeded
 *                               └─ rejected ─────────────────────────────────► rejected
 *
 * Any broker failure or malformed payload ends in `failed`. `step()` is called
 * from the terminal's tick; responses are picked up on the next step, failures
 * apply as soon as they arrive.
 */

import {
  authenticateNewSessionResponseSchema,
  bytesToHex,
  completeAuthenticationResponseSchema,
  createLogger,
  parseHexToBytes,
  startSessionResponseSchema,
  systemClock,
  tagUidToHex,
  toError,
  type Clock,
  type ErrorKind,
  type Logger,
  type TagUid,
  type TerminalError,
  type TerminalMethod,
  type TerminalMethodMap,
} from "@workshop-access/shared";

import type { PendingRequestHandle, RequestBroker } from "./request-broker.js";
import type { SessionRegistry } from "./session-registry.js";
import { describeTagFailure, type TagAuthenticationRelay, type TagResult } from "./tag-auth-relay.js";
import type { TokenSession } from "./token-session.js";

export type SessionCreationState =
  | { readonly type: "begin" }
  | { readonly type: "awaitStartSessionResponse"; readonly request: PendingRequestHandle }
  | { readonly type: "awaitAuthenticateNewSessionResponse"; readonly request: PendingRequestHandle }
  | { readonly type: "awaitCompleteAuthenticationResponse"; readonly request: PendingRequestHandle }
  | { readonly type: "succeeded"; readonly session: TokenSession }
  | { readonly type: "rejected"; readonly message: string }
  | { readonly type: "failed"; readonly error: ErrorKind; readonly message: string };

type AwaitState = Extract<SessionCreationState, { request: PendingRequestHandle }>;

export type StateChangeListener = (state: SessionCreationState, previous: SessionCreationState) => void;

export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

export function isTerminalState(state: SessionCreationState): boolean {
  return state.type === "succeeded" || state.type === "rejected" || state.type === "failed";
}

type Outcome = { ok: true; payload: unknown } | { ok: false; error: TerminalError };

/**
 * Result slot for the request the machine currently waits on.
 */
interface Inbox {
  outcome: Outcome | null;
}

export interface SessionCreationOptions {
  tagUid: TagUid;
  broker: RequestBroker;
  registry: SessionRegistry;
  relay: TagAuthenticationRelay;
  clock?: Clock;
  requestTimeoutMs?: number;
}

export class SessionCreationStateMachine {
  readonly tagUid: TagUid;
  readonly tagUidHex: string;

  private state: SessionCreationState = Object.freeze({ type: "begin" });
  private inbox: Inbox | null = null;
  private busy = false;
  private listeners: StateChangeListener[] = [];

  private broker: RequestBroker;
  private registry: SessionRegistry;
  private relay: TagAuthenticationRelay;
  private clock: Clock;
  private requestTimeoutMs: number;
  private logger: Logger;

  constructor(options: SessionCreationOptions) {
    this.tagUid = options.tagUid;
    this.tagUidHex = tagUidToHex(options.tagUid);
    this.broker = options.broker;
    this.registry = options.registry;
    this.relay = options.relay;
    this.clock = options.clock ?? systemClock;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = createLogger("terminal:session-creation").child({ tagUid: this.tagUidHex });
  }

  getState(): SessionCreationState {
    return this.state;
  }

  isDone(): boolean {
    return isTerminalState(this.state);
  }

  onStateChange(listener: StateChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  /**
   * Advance by at most one transition. Overlapping calls return immediately.
   */
  async step(): Promise<SessionCreationState> {
    if (this.busy) {
      return this.state;
    }
    this.busy = true;
    try {
      await this.advance();
    } finally {
      this.busy = false;
    }
    return this.state;
  }

  /**
   * Stop wherever the machine is. No effect once it has finished.
   */
  abort(message = "aborted"): void {
    const state = this.state;
    if (isTerminalState(state)) {
      return;
    }
    if ("request" in state) {
      this.broker.cancel(state.request.requestId);
    }
    this.transition({ type: "failed", error: "Aborted", message });
  }

  private async advance(): Promise<void> {
    const state = this.state;
    switch (state.type) {
      case "begin":
        this.begin();
        return;
      case "awaitStartSessionResponse": {
        const response = this.receivedResponse();
        if (response) {
          await this.onStartSessionResponse(state, response.payload);
        }
        return;
      }
      case "awaitAuthenticateNewSessionResponse": {
        const response = this.receivedResponse();
        if (response) {
          await this.onAuthenticateNewSessionResponse(state, response.payload);
        }
        return;
      }
      case "awaitCompleteAuthenticationResponse": {
        const response = this.receivedResponse();
        if (response) {
          this.onCompleteAuthenticationResponse(response.payload);
        }
        return;
      }
      case "succeeded":
      case "rejected":
      case "failed":
        return;
    }
  }

  private begin(): void {
    const existing = this.registry.getActiveByTagUid(this.tagUid, this.clock.now());
    if (existing) {
      this.logger.debug("Reusing registered session", { sessionId: existing.sessionId });
      this.transition({ type: "succeeded", session: existing });
      return;
    }
    this.issue("startSession", { tagUid: this.tagUidHex }, (request) => ({
      type: "awaitStartSessionResponse",
      request,
    }));
  }

  private async onStartSessionResponse(state: AwaitState, payload: unknown): Promise<void> {
    const parsed = startSessionResponseSchema.safeParse(payload);
    if (!parsed.success) {
      this.fail("MalformedResponse", `Invalid StartSession response: ${parsed.error.message}`);
      return;
    }

    const result = parsed.data.result;
    switch (result.type) {
      case "existingSession":
        this.succeedWith(result.session);
        return;
      case "rejected":
        this.transition({ type: "rejected", message: result.message });
        return;
      case "authRequired": {
        const tag = await this.relay.beginAuthentication();
        if (this.state !== state || !this.acceptTagResult(tag)) {
          return;
        }
        this.issue(
          "authenticateNewSession",
          { tagUid: this.tagUidHex, tagChallenge: bytesToHex(tag.value) },
          (request) => ({ type: "awaitAuthenticateNewSessionResponse", request }),
        );
        return;
      }
    }
  }

  private async onAuthenticateNewSessionResponse(state: AwaitState, payload: unknown): Promise<void> {
    const parsed = authenticateNewSessionResponseSchema.safeParse(payload);
    if (!parsed.success) {
      this.fail("MalformedResponse", `Invalid AuthenticateNewSession response: ${parsed.error.message}`);
      return;
    }

    const tag = await this.relay.completeAuthentication(parseHexToBytes(parsed.data.cloudChallenge));
    if (this.state !== state || !this.acceptTagResult(tag)) {
      return;
    }
    this.issue(
      "completeAuthentication",
      { sessionId: parsed.data.sessionId, encryptedTagResponse: bytesToHex(tag.value) },
      (request) => ({ type: "awaitCompleteAuthenticationResponse", request }),
    );
  }

  private onCompleteAuthenticationResponse(payload: unknown): void {
    const parsed = completeAuthenticationResponseSchema.safeParse(payload);
    if (!parsed.success) {
      this.fail("MalformedResponse", `Invalid CompleteAuthentication response: ${parsed.error.message}`);
      return;
    }

    const result = parsed.data.result;
    switch (result.type) {
      case "newSession":
        this.succeedWith(result.session);
        return;
      case "rejected":
        this.transition({ type: "rejected", message: result.message });
        return;
    }
  }

  /**
   * Narrows a tag result. On a delay request nothing transitions, so the
   * response stays in the inbox and the next step retries the tag.
   */
  private acceptTagResult(result: TagResult<Uint8Array>): result is { ok: true; value: Uint8Array } {
    if (result.ok) {
      return true;
    }
    if (result.failure.type === "authenticationDelay") {
      this.logger.info("Tag asked for an authentication delay, retrying");
      return false;
    }
    this.fail("NtagFailed", describeTagFailure(result.failure));
    return false;
  }

  private succeedWith(record: unknown): void {
    let session: TokenSession;
    try {
      session = this.registry.register(record);
    } catch (error) {
      this.fail("MalformedResponse", `Invalid session record: ${toError(error).message}`);
      return;
    }
    if (session.tagUidHex !== this.tagUidHex) {
      this.fail("MalformedResponse", `Session ${session.sessionId} belongs to another tag`);
      return;
    }
    this.transition({ type: "succeeded", session });
  }

  private issue<M extends TerminalMethod>(
    method: M,
    payload: TerminalMethodMap[M]["request"],
    next: (request: PendingRequestHandle) => AwaitState,
  ): void {
    const inbox: Inbox = { outcome: null };
    const request = this.broker.send(method, payload, {
      timeoutMs: this.requestTimeoutMs,
      onResponse: (response) => this.deliver(inbox, { ok: true, payload: response }),
      onFailure: (error) => this.deliver(inbox, { ok: false, error }),
    });

    this.transition(next(request));
    this.inbox = inbox;

    // failure reported synchronously by send()
    if (inbox.outcome && !inbox.outcome.ok) {
      this.failFromBroker(inbox.outcome.error);
    }
  }

  private deliver(inbox: Inbox, outcome: Outcome): void {
    inbox.outcome = outcome;
    if (inbox !== this.inbox || isTerminalState(this.state)) {
      return;
    }
    if (!outcome.ok) {
      this.failFromBroker(outcome.error);
    }
  }

  private receivedResponse(): { payload: unknown } | null {
    const outcome = this.inbox?.outcome;
    return outcome && outcome.ok ? { payload: outcome.payload } : null;
  }

  private failFromBroker(error: TerminalError): void {
    this.fail(error.kind, error.message);
  }

  private fail(error: ErrorKind, message: string): void {
    this.logger.warn("Session creation failed", { error, message });
    this.transition({ type: "failed", error, message });
  }

  private transition(next: SessionCreationState): void {
    const previous = this.state;
    this.state = Object.freeze(next);
    this.inbox = null;
    this.logger.debug("Transition", { from: previous.type, to: next.type });
    for (const listener of this.listeners) {
      try {
        listener(this.state, previous);
      } catch (error) {
        this.logger.error("State listener threw", toError(error));
      }
    }
  }
}
