/**
 * Unit tests for MachineUsageStateMachine
 */

import { describe, it, expect, beforeEach } from "vitest";

import type { TokenSessionRecord, UsageHistory } from "@workshop-access/shared";

import { RelayError, SimulatedRelay } from "../src/lib/machine-relay.js";
import {
  DEFAULT_ABSOLUTE_TIMEOUT_MS,
  MachineUsageStateMachine,
  WrongStateError,
} from "../src/lib/machine-usage.js";
import { TokenSession } from "../src/lib/token-session.js";
import type { UsageUploader } from "../src/lib/usage-uploader.js";
import { FakeClock } from "./helpers/fake-clock.js";
import { MemoryHistoryStore } from "./helpers/memory-history-store.js";

const EXPIRES_MS = 1_710_295_200_000;

function session(overrides: Partial<TokenSessionRecord> = {}): TokenSession {
  return TokenSession.fromRecord({
    tagUid: "04a1b2c3d4e5f6",
    sessionId: "sess_1",
    expirationUnixSeconds: EXPIRES_MS / 1000,
    userId: "user-ada",
    userLabel: "Ada Example",
    permissions: ["laser", "cnc"],
    ...overrides,
  });
}

class FakeUploader implements UsageUploader {
  public uploads: UsageHistory[] = [];
  public error: Error | null = null;
  public acceptAtMost = Number.POSITIVE_INFINITY;

  async upload(history: UsageHistory): Promise<number> {
    this.uploads.push(structuredClone(history));
    if (this.error) {
      throw this.error;
    }
    return Math.min(history.records.length, this.acceptAtMost);
  }
}

class HeldUploader implements UsageUploader {
  public calls = 0;
  public lastSessionIds: string[] = [];
  private resolve: ((accepted: number) => void) | null = null;

  upload(history: UsageHistory): Promise<number> {
    this.calls += 1;
    this.lastSessionIds = history.records.map((r) => r.sessionId);
    return new Promise((resolve) => {
      this.resolve = resolve;
    });
  }

  release(accepted: number): void {
    this.resolve?.(accepted);
    this.resolve = null;
  }
}

describe("MachineUsageStateMachine", () => {
  let clock: FakeClock;
  let relay: SimulatedRelay;
  let store: MemoryHistoryStore;
  let uploader: FakeUploader;
  let machine: MachineUsageStateMachine;

  function create(requiredPermissions: string[] = ["laser"]): MachineUsageStateMachine {
    return new MachineUsageStateMachine({
      machine: { machineId: "laser-1", requiredPermissions },
      relay,
      historyStore: store,
      uploader,
      clock,
    });
  }

  beforeEach(() => {
    clock = new FakeClock();
    relay = new SimulatedRelay();
    store = new MemoryHistoryStore();
    uploader = new FakeUploader();
    machine = create();
  });

  describe("Check-in", () => {
    it("should enable the relay and open a usage record", async () => {
      const start = clock.now();
      const state = await machine.checkIn(session());

      expect(state.type).toBe("active");
      expect(await relay.isEnabled()).toBe(true);
      expect(machine.getHistory()).toEqual([
        {
          machineId: "laser-1",
          tagUid: "04a1b2c3d4e5f6",
          sessionId: "sess_1",
          userId: "user-ada",
          checkInTime: start,
        },
      ]);
      expect(store.saved?.records).toHaveLength(1);
    });

    it("should deny a session missing a required permission", async () => {
      machine = create(["laser", "lathe", "welder"]);

      const state = await machine.checkIn(session());

      expect(state).toEqual({
        type: "denied",
        message: "Missing permission: lathe, welder",
        time: clock.now(),
      });
      expect(relay.switchCount).toBe(0);
      expect(machine.getHistory()).toHaveLength(0);
    });

    it("should deny an expired session", async () => {
      clock.set(EXPIRES_MS);
      const state = await machine.checkIn(session());
      expect(state.type).toBe("denied");
      expect(state.type === "denied" && state.message).toBe("Session expired");
    });

    it("should refuse a check-in while active", async () => {
      await machine.checkIn(session());
      await expect(machine.checkIn(session({ sessionId: "sess_2" }))).rejects.toThrow(WrongStateError);
      await expect(machine.checkIn(session({ sessionId: "sess_2" }))).rejects.toThrow(
        "Cannot check in while active",
      );
    });

    it("should stay idle when the relay does not switch", async () => {
      relay.setStuck(true);

      await expect(machine.checkIn(session())).rejects.toThrow(RelayError);

      expect(machine.getState().type).toBe("idle");
      expect(machine.getHistory()).toHaveLength(0);
    });
  });

  describe("Check-out", () => {
    it("should disable the relay, close the record and upload it", async () => {
      await machine.checkIn(session());
      const start = clock.now();
      clock.advance(60_000);

      const state = await machine.checkOut("uiRequested");
      await machine.whenUploaded();

      expect(state.type).toBe("idle");
      expect(await relay.isEnabled()).toBe(false);
      expect(uploader.uploads).toEqual([
        {
          machineId: "laser-1",
          records: [
            {
              machineId: "laser-1",
              tagUid: "04a1b2c3d4e5f6",
              sessionId: "sess_1",
              userId: "user-ada",
              checkInTime: start,
              checkOutTime: start + 60_000,
              checkoutReason: "uiRequested",
            },
          ],
        },
      ]);
      expect(machine.getHistory()).toHaveLength(0);
      expect(store.saved?.records).toHaveLength(0);
    });

    it("should keep records when the upload fails and retry later", async () => {
      uploader.error = new Error("offline");
      await machine.checkIn(session());
      await machine.checkOut("selfCheckout");
      await machine.whenUploaded();

      expect(machine.getHistory()).toHaveLength(1);
      expect(machine.getHistory()[0].checkoutReason).toBe("selfCheckout");

      uploader.error = null;
      await machine.loop(clock.now() + 1_000);
      expect(uploader.uploads).toHaveLength(1);

      await machine.loop(clock.now() + 30_000);
      await machine.whenUploaded();
      expect(uploader.uploads).toHaveLength(2);
      expect(machine.getHistory()).toHaveLength(0);
    });

    it("should drop only the records the backend accepted", async () => {
      uploader.error = new Error("offline");
      await machine.checkIn(session());
      await machine.checkOut("uiRequested");
      await machine.whenUploaded();
      await machine.checkIn(session({ sessionId: "sess_2" }));
      await machine.checkOut("uiRequested");
      await machine.whenUploaded();

      uploader.error = null;
      uploader.acceptAtMost = 1;
      await machine.loop(clock.now() + 60_000);
      await machine.whenUploaded();

      expect(machine.getHistory().map((r) => r.sessionId)).toEqual(["sess_2"]);
    });

    it("should not block the check-out on an unanswered upload", async () => {
      const held = new HeldUploader();
      machine = new MachineUsageStateMachine({
        machine: { machineId: "laser-1", requiredPermissions: ["laser"] },
        relay,
        historyStore: store,
        uploader: held,
        clock,
      });
      await machine.checkIn(session());

      const state = await machine.checkOut("uiRequested");

      expect(state.type).toBe("idle");
      expect(held.calls).toBe(1);
      expect(machine.getHistory()).toHaveLength(1);
    });

    it("should send a single upload while one is in flight", async () => {
      const held = new HeldUploader();
      machine = new MachineUsageStateMachine({
        machine: { machineId: "laser-1", requiredPermissions: ["laser"] },
        relay,
        historyStore: store,
        uploader: held,
        clock,
      });
      await machine.checkIn(session());
      await machine.checkOut("uiRequested");

      await machine.loop(clock.now() + 60_000);
      await machine.loop(clock.now() + 120_000);
      expect(held.calls).toBe(1);

      held.release(1);
      await machine.whenUploaded();
      expect(machine.getHistory()).toHaveLength(0);

      await machine.loop(clock.now() + 180_000);
      expect(held.calls).toBe(1);
    });

    it("should upload a record closed during an upload in flight", async () => {
      const held = new HeldUploader();
      machine = new MachineUsageStateMachine({
        machine: { machineId: "laser-1", requiredPermissions: ["laser"] },
        relay,
        historyStore: store,
        uploader: held,
        clock,
      });
      await machine.checkIn(session());
      await machine.checkOut("uiRequested");
      await machine.checkIn(session({ sessionId: "sess_2" }));
      await machine.checkOut("uiRequested");
      expect(held.calls).toBe(1);

      held.release(1);
      await machine.whenUploaded();
      expect(machine.getHistory().map((r) => r.sessionId)).toEqual(["sess_2"]);

      await machine.loop();
      expect(held.calls).toBe(2);
      expect(held.lastSessionIds).toEqual(["sess_2"]);
    });

    it("should refuse a check-out while idle", async () => {
      await expect(machine.checkOut("uiRequested")).rejects.toThrow("Cannot check out while idle");
    });

    it("should stay active when the relay does not switch off", async () => {
      await machine.checkIn(session());
      relay.setStuck(true);

      await expect(machine.checkOut("uiRequested")).rejects.toThrow("Relay did not disable");
      expect(machine.getState().type).toBe("active");
    });
  });

  describe("Time limits", () => {
    it("should check out when the session expires", async () => {
      await machine.checkIn(session({ expirationUnixSeconds: (clock.now() + 60_000) / 1000 }));

      await machine.loop(clock.now() + 59_999);
      expect(machine.getState().type).toBe("active");

      await machine.loop(clock.now() + 60_000);
      expect(machine.getState().type).toBe("idle");
      expect(uploader.uploads[0].records[0].checkoutReason).toBe("timedOut");
    });

    it("should check out after the absolute usage limit", async () => {
      await machine.checkIn(session());
      clock.advance(DEFAULT_ABSOLUTE_TIMEOUT_MS);

      await machine.loop();

      expect(machine.getState().type).toBe("idle");
      expect(await relay.isEnabled()).toBe(false);
    });
  });

  describe("Denied display", () => {
    it("should show a denial once and return to idle", async () => {
      machine.deny("Token has been deactivated");

      expect(machine.observe().type).toBe("denied");
      expect(machine.observe().type).toBe("idle");
    });
  });

  describe("Restore", () => {
    it("should close a record left open and switch the relay off", async () => {
      const checkInTime = clock.now() - 3_600_000;
      store = new MemoryHistoryStore({
        machineId: "laser-1",
        records: [
          { machineId: "laser-1", tagUid: "04a1b2c3d4e5f6", sessionId: "sess_0", userId: "user-ada", checkInTime },
        ],
      });
      relay = new SimulatedRelay(true);
      machine = create();

      await machine.restore();

      expect(await relay.isEnabled()).toBe(false);
      expect(machine.getHistory()[0]).toEqual({
        machineId: "laser-1",
        tagUid: "04a1b2c3d4e5f6",
        sessionId: "sess_0",
        userId: "user-ada",
        checkInTime,
        checkOutTime: clock.now(),
        checkoutReason: "timedOut",
      });
      expect(store.saveCount).toBe(1);

      await machine.loop();
      await machine.whenUploaded();
      expect(uploader.uploads).toHaveLength(1);
      expect(machine.getHistory()).toHaveLength(0);
    });

    it("should start empty without stored history", async () => {
      await machine.restore();
      expect(machine.getHistory()).toHaveLength(0);
      expect(machine.getState().type).toBe("idle");
    });
  });

  describe("Persistence", () => {
    it("should retry saving on the next loop", async () => {
      store.failSaves = true;
      await machine.checkIn(session());
      expect(store.saved).toBeNull();

      store.failSaves = false;
      await machine.loop();

      expect(store.saved?.records).toHaveLength(1);
    });
  });
});
