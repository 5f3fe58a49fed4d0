/**
 * Machine Usage State Machine
 *
 * Turns a validated session into machine power. Every check-in appends a usage
 * record and every check-out closes it with a reason; records are persisted
 * locally first and uploaded to the backend afterwards.
 */

import {
  createLogger,
  systemClock,
  toError,
  type CheckoutReason,
  type Clock,
  type Logger,
  type UsageHistory,
  type UsageHistoryRecord,
} from "@workshop-access/shared";

import { RelayError, type MachineRelay } from "./machine-relay.js";
import type { TokenSession } from "./token-session.js";
import type { UsageHistoryStore } from "./usage-history-store.js";
import type { UsageUploader } from "./usage-uploader.js";

export type MachineUsageState =
  | { readonly type: "idle" }
  | { readonly type: "active"; readonly session: TokenSession; readonly startTime: number }
  | { readonly type: "denied"; readonly message: string; readonly time: number };

export interface MachineDescriptor {
  machineId: string;
  requiredPermissions: readonly string[];
}

export class WrongStateError extends Error {
  constructor(
    public readonly operation: string,
    public readonly state: MachineUsageState["type"] | "busy",
  ) {
    super(`Cannot ${operation} while ${state}`);
    this.name = "WrongStateError";
  }
}

export const DEFAULT_ABSOLUTE_TIMEOUT_MS = 8 * 60 * 60 * 1000;
export const DEFAULT_UPLOAD_RETRY_MS = 30 * 1000;

export interface MachineUsageOptions {
  machine: MachineDescriptor;
  relay: MachineRelay;
  historyStore: UsageHistoryStore;
  uploader?: UsageUploader;
  clock?: Clock;
  absoluteTimeoutMs?: number;
  uploadRetryMs?: number;
}

const IDLE: MachineUsageState = Object.freeze({ type: "idle" });

export class MachineUsageStateMachine {
  readonly machine: MachineDescriptor;

  private state: MachineUsageState = IDLE;
  private records: UsageHistoryRecord[] = [];
  private busy = false;
  private persistPending = false;
  private uploadPending = false;
  private nextUploadAt = 0;
  private uploading: Promise<void> | null = null;
  private persisting: Promise<void> = Promise.resolve();

  private relay: MachineRelay;
  private historyStore: UsageHistoryStore;
  private uploader: UsageUploader | undefined;
  private clock: Clock;
  private absoluteTimeoutMs: number;
  private uploadRetryMs: number;
  private logger: Logger;

  constructor(options: MachineUsageOptions) {
    this.machine = options.machine;
    this.relay = options.relay;
    this.historyStore = options.historyStore;
    this.uploader = options.uploader;
    this.clock = options.clock ?? systemClock;
    this.absoluteTimeoutMs = options.absoluteTimeoutMs ?? DEFAULT_ABSOLUTE_TIMEOUT_MS;
    this.uploadRetryMs = options.uploadRetryMs ?? DEFAULT_UPLOAD_RETRY_MS;
    this.logger = createLogger("terminal:machine").child({ machineId: options.machine.machineId });
  }

  getState(): MachineUsageState {
    return this.state;
  }

  getHistory(): readonly UsageHistoryRecord[] {
    return [...this.records];
  }

  /**
   * Read back whatever an earlier run persisted. A record left open by a crash
   * is closed as timed out and the relay is forced off.
   */
  async restore(): Promise<void> {
    const machineId = this.machine.machineId;
    let stored: UsageHistory | null = null;
    try {
      stored = await this.historyStore.load(machineId);
    } catch (error) {
      this.logger.error("Failed to load usage history", toError(error));
    }

    if (stored && stored.machineId !== machineId) {
      this.logger.warn("Ignoring usage history of another machine", { storedMachineId: stored.machineId });
    } else if (stored) {
      this.records = stored.records;
    }

    const now = this.clock.now();
    const last = this.records.at(-1);
    if (last && last.checkOutTime === undefined) {
      this.logger.warn("Closing usage record left open", { sessionId: last.sessionId });
      this.records[this.records.length - 1] = { ...last, checkOutTime: now, checkoutReason: "timedOut" };
      this.persistPending = true;
    }

    try {
      if (await this.relay.isEnabled()) {
        this.logger.warn("Relay was left enabled, disabling");
        await this.relay.disable();
      }
    } catch (error) {
      this.logger.error("Failed to reset relay", toError(error));
    }

    if (this.persistPending) {
      await this.persist();
    }
    this.uploadPending = this.records.some((r) => r.checkOutTime !== undefined);
  }

  /**
   * Switch the machine on for `session`. A session lacking a required
   * permission leads to `denied` without touching the relay.
   */
  async checkIn(session: TokenSession): Promise<MachineUsageState> {
    this.requireIdle("check in");
    const now = this.clock.now();

    const missing = session.missingPermissions(this.machine.requiredPermissions);
    if (missing.length > 0) {
      return this.deny(`Missing permission: ${missing.join(", ")}`);
    }
    if (!session.isActive(now)) {
      return this.deny("Session expired");
    }

    await this.exclusive(() => this.switchRelay(true));

    this.state = Object.freeze({ type: "active", session, startTime: now });
    this.records.push({
      machineId: this.machine.machineId,
      tagUid: session.tagUidHex,
      sessionId: session.sessionId,
      userId: session.userId,
      checkInTime: now,
    });
    this.logger.info("Checked in", { sessionId: session.sessionId, userId: session.userId });
    await this.persist();
    return this.state;
  }

  /**
   * Refuse the presented tag. Only valid while idle.
   */
  deny(message: string): MachineUsageState {
    this.requireIdle("deny");
    this.state = Object.freeze({ type: "denied", message, time: this.clock.now() });
    this.logger.info("Denied", { message });
    return this.state;
  }

  async checkOut(reason: CheckoutReason): Promise<MachineUsageState> {
    const state = this.state;
    if (this.busy) {
      throw new WrongStateError("check out", "busy");
    }
    if (state.type !== "active") {
      throw new WrongStateError("check out", state.type);
    }

    await this.exclusive(() => this.switchRelay(false));

    const now = this.clock.now();
    const index = this.records.length - 1;
    const last = this.records[index];
    if (last && last.sessionId === state.session.sessionId && last.checkOutTime === undefined) {
      this.records[index] = { ...last, checkOutTime: now, checkoutReason: reason };
    } else {
      this.logger.error("No open usage record for session", undefined, {
        sessionId: state.session.sessionId,
      });
    }

    this.state = IDLE;
    this.logger.info("Checked out", { sessionId: state.session.sessionId, reason });
    await this.persist();
    this.uploadPending = true;
    this.nextUploadAt = 0;
    this.startUpload(now);
    return this.state;
  }

  /**
   * Periodic work: session expiry, the absolute usage limit and retries of
   * persistence and upload. An upload runs in the background and is never
   * awaited here.
   */
  async loop(now: number = this.clock.now()): Promise<void> {
    if (this.busy) {
      return;
    }

    const state = this.state;
    if (state.type === "active") {
      const expired = !state.session.isActive(now);
      const overLimit = now - state.startTime >= this.absoluteTimeoutMs;
      if (expired || overLimit) {
        this.logger.info("Usage ended by time limit", { expired, overLimit });
        try {
          await this.checkOut("timedOut");
        } catch (error) {
          this.logger.error("Timed checkout failed", toError(error));
        }
        return;
      }
    }

    if (this.persistPending) {
      await this.persist();
    }
    this.startUpload(now);
  }

  /**
   * Settles once the upload in flight, if any, has finished.
   */
  whenUploaded(): Promise<void> {
    return this.uploading ?? Promise.resolve();
  }

  /**
   * Current state for display. A denial is shown once, then the machine is idle again.
   */
  observe(): MachineUsageState {
    const state = this.state;
    if (state.type === "denied") {
      this.state = IDLE;
    }
    return state;
  }

  private requireIdle(operation: string): void {
    if (this.busy) {
      throw new WrongStateError(operation, "busy");
    }
    if (this.state.type !== "idle") {
      throw new WrongStateError(operation, this.state.type);
    }
  }

  private async exclusive(operation: () => Promise<void>): Promise<void> {
    this.busy = true;
    try {
      await operation();
    } finally {
      this.busy = false;
    }
  }

  private async switchRelay(enable: boolean): Promise<void> {
    try {
      if (enable) {
        await this.relay.enable();
      } else {
        await this.relay.disable();
      }
    } catch (error) {
      const relayError = error instanceof RelayError ? error : new RelayError(toError(error).message);
      this.logger.error(`Relay ${enable ? "enable" : "disable"} failed`, relayError);
      throw relayError;
    }
  }

  /**
   * Saves are chained so that an older snapshot never lands after a newer one.
   */
  private persist(): Promise<void> {
    const run = this.persisting.then(() => this.save());
    this.persisting = run;
    return run;
  }

  private async save(): Promise<void> {
    try {
      await this.historyStore.save({ machineId: this.machine.machineId, records: [...this.records] });
      this.persistPending = false;
    } catch (error) {
      this.persistPending = true;
      this.logger.error("Failed to persist usage history", toError(error));
    }
  }

  private startUpload(now: number): void {
    if (this.uploading || !this.uploadPending || now < this.nextUploadAt) {
      return;
    }
    const uploader = this.uploader;
    const closed = this.records.filter((r) => r.checkOutTime !== undefined);
    if (!uploader || closed.length === 0) {
      this.uploadPending = false;
      return;
    }
    this.uploading = this.upload(uploader, closed, now).finally(() => {
      this.uploading = null;
    });
  }

  private async upload(uploader: UsageUploader, closed: UsageHistoryRecord[], now: number): Promise<void> {
    try {
      const accepted = await uploader.upload({ machineId: this.machine.machineId, records: closed });
      const done = new Set(closed.slice(0, accepted));
      this.records = this.records.filter((r) => !done.has(r));
      this.uploadPending = accepted < closed.length || this.records.some((r) => r.checkOutTime !== undefined);
      this.nextUploadAt = accepted < closed.length ? now + this.uploadRetryMs : 0;
      this.logger.info("Usage uploaded", { accepted, remaining: this.records.length });
      await this.persist();
    } catch (error) {
      this.uploadPending = true;
      this.nextUploadAt = now + this.uploadRetryMs;
      this.logger.warn("Usage upload failed, will retry", { error: toError(error).message });
    }
  }
}
