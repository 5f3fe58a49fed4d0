/**
 * Terminal Service
 *
 * Single owner of the terminal's moving parts. One periodic tick sweeps broker
 * timeouts, steps the session creation in progress, applies its outcome to the
 * machine and runs the machine's own timers. Each tick publishes a frozen
 * snapshot for displays.
 */

import { EventEmitter } from "node:events";

import {
  createLogger,
  systemClock,
  tagUidToHex,
  toError,
  type CheckoutReason,
  type Clock,
  type ErrorKind,
  type TagUid,
} from "@workshop-access/shared";

import { RelayError } from "./machine-relay.js";
import { WrongStateError, type MachineUsageState, type MachineUsageStateMachine } from "./machine-usage.js";
import type { RequestBroker } from "./request-broker.js";
import {
  SessionCreationStateMachine,
  type SessionCreationState,
} from "./session-creation.js";
import type { SessionRegistry } from "./session-registry.js";
import { AUTHORIZATION_KEY_SLOT, TagAuthenticationRelay, type NfcTransceiver } from "./tag-auth-relay.js";
import type { TokenSession } from "./token-session.js";

const logger = createLogger("terminal:service");

export interface TerminalSnapshot {
  readonly time: number;
  readonly creation: { readonly tagUid: string; readonly state: SessionCreationState } | null;
  readonly machine: MachineUsageState;
  readonly pendingRequests: number;
  readonly registeredSessions: number;
  readonly lastError: { readonly kind: ErrorKind | "Relay" | "WrongState"; readonly message: string } | null;
}

export interface TerminalServiceOptions {
  broker: RequestBroker;
  registry: SessionRegistry;
  machineUsage: MachineUsageStateMachine;
  clock?: Clock;
  keySlot?: number;
  requestTimeoutMs?: number;
  tickIntervalMs?: number;
}

export class TerminalService extends EventEmitter {
  private broker: RequestBroker;
  private registry: SessionRegistry;
  private machineUsage: MachineUsageStateMachine;
  private clock: Clock;
  private keySlot: number;
  private requestTimeoutMs: number | undefined;
  private tickIntervalMs: number;

  private creation: SessionCreationStateMachine | null = null;
  private appliedFor: SessionCreationStateMachine | null = null;
  private lastError: TerminalSnapshot["lastError"] = null;
  private latest: TerminalSnapshot;
  private ticking = false;
  private interval: NodeJS.Timeout | null = null;

  constructor(options: TerminalServiceOptions) {
    super();
    this.broker = options.broker;
    this.registry = options.registry;
    this.machineUsage = options.machineUsage;
    this.clock = options.clock ?? systemClock;
    this.keySlot = options.keySlot ?? AUTHORIZATION_KEY_SLOT;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.tickIntervalMs = options.tickIntervalMs ?? 100;
    this.latest = this.buildSnapshot(this.machineUsage.getState());
  }

  /**
   * Restore persisted usage and start ticking.
   */
  async start(): Promise<void> {
    if (this.interval) {
      throw new Error("Terminal already running");
    }
    await this.machineUsage.restore();
    this.interval = setInterval(() => {
      this.tick().catch((error: unknown) => {
        logger.error("Tick failed", toError(error));
      });
    }, this.tickIntervalMs);
    logger.info("Terminal started", { machineId: this.machineUsage.machine.machineId });
  }

  async stop(): Promise<void> {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    this.creation?.abort("terminal stopped");
    logger.info("Terminal stopped");
  }

  isRunning(): boolean {
    return this.interval !== null;
  }

  onSnapshot(listener: (snapshot: TerminalSnapshot) => void): () => void {
    this.on("snapshot", listener);
    return () => {
      this.off("snapshot", listener);
    };
  }

  snapshot(): TerminalSnapshot {
    return this.latest;
  }

  /**
   * A tag entered the field. Starts a session creation for it unless one for
   * the same tag is already running; a different tag aborts the running one.
   */
  tagPresented(tagUid: TagUid, transceiver: NfcTransceiver): void {
    const uidHex = tagUidToHex(tagUid);
    const current = this.creation;
    if (current && !current.isDone()) {
      if (current.tagUidHex === uidHex) {
        return;
      }
      current.abort("another tag presented");
    }

    const creation = new SessionCreationStateMachine({
      tagUid,
      broker: this.broker,
      registry: this.registry,
      relay: new TagAuthenticationRelay(transceiver, this.keySlot),
      clock: this.clock,
      requestTimeoutMs: this.requestTimeoutMs,
    });
    creation.onStateChange((state, previous) => {
      logger.debug("Session creation progressed", { tagUid: uidHex, from: previous.type, to: state.type });
    });
    this.creation = creation;
    logger.info("Tag presented", { tagUid: uidHex });
  }

  /**
   * The tag left the field before its session was created.
   */
  tagRemoved(tagUid: TagUid): void {
    const current = this.creation;
    if (current && current.tagUidHex === tagUidToHex(tagUid)) {
      current.abort("tag removed");
    }
  }

  async requestCheckout(reason: CheckoutReason = "uiRequested"): Promise<MachineUsageState> {
    return this.machineUsage.checkOut(reason);
  }

  async tick(): Promise<TerminalSnapshot> {
    if (this.ticking) {
      return this.latest;
    }
    this.ticking = true;
    try {
      const now = this.clock.now();
      this.broker.tick(now);

      const stepped = this.creation;
      if (stepped && !stepped.isDone()) {
        await stepped.step();
      }
      // A tag presented during the step replaces the creation; its outcome waits for its own step.
      const creation = this.creation;
      if (creation && creation.isDone() && this.appliedFor !== creation) {
        this.appliedFor = creation;
        await this.applyOutcome(creation.getState());
      }

      this.registry.pruneExpired(now);
      await this.machineUsage.loop(now);
      return this.publish();
    } finally {
      this.ticking = false;
    }
  }

  private async applyOutcome(state: SessionCreationState): Promise<void> {
    switch (state.type) {
      case "succeeded":
        await this.useSession(state.session);
        return;
      case "rejected":
        this.clearDenial();
        if (this.machineUsage.getState().type === "idle") {
          this.machineUsage.deny(state.message);
        } else {
          logger.info("Tag rejected while machine in use", { message: state.message });
        }
        return;
      case "failed":
        if (state.error !== "Aborted") {
          this.lastError = { kind: state.error, message: state.message };
        }
        return;
      default:
        return;
    }
  }

  /**
   * Apply a validated session: start usage, end it for the same user, or hand
   * the machine over to another user.
   */
  private async useSession(session: TokenSession): Promise<void> {
    this.clearDenial();
    try {
      const machine = this.machineUsage.getState();
      if (machine.type === "active") {
        if (machine.session.sessionId === session.sessionId) {
          await this.machineUsage.checkOut("selfCheckout");
          return;
        }
        await this.machineUsage.checkOut("otherTagCheckedIn");
      }
      await this.machineUsage.checkIn(session);
      this.lastError = null;
    } catch (error) {
      const err = toError(error);
      logger.error("Failed to apply session", err, { sessionId: session.sessionId });
      const kind =
        err instanceof RelayError ? "Relay" : err instanceof WrongStateError ? "WrongState" : "Unspecified";
      this.lastError = { kind, message: err.message };
    }
  }

  private clearDenial(): void {
    if (this.machineUsage.getState().type === "denied") {
      this.machineUsage.observe();
    }
  }

  private publish(): TerminalSnapshot {
    this.latest = this.buildSnapshot(this.machineUsage.observe());
    this.emit("snapshot", this.latest);
    return this.latest;
  }

  private buildSnapshot(machine: MachineUsageState): TerminalSnapshot {
    const creation = this.creation;
    return Object.freeze({
      time: this.clock.now(),
      creation: creation ? Object.freeze({ tagUid: creation.tagUidHex, state: creation.getState() }) : null,
      machine,
      pendingRequests: this.broker.pendingCount(),
      registeredSessions: this.registry.size(),
      lastError: this.lastError,
    });
  }
}
