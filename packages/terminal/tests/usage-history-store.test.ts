/**
 * Unit tests for FileUsageHistoryStore
 */

import { existsSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import type { UsageHistory } from "@workshop-access/shared";

import { FileUsageHistoryStore } from "../src/lib/usage-history-store.js";

describe("FileUsageHistoryStore", () => {
  let testDir: string;
  let store: FileUsageHistoryStore;

  const history: UsageHistory = {
    machineId: "laser/1",
    records: [
      {
        machineId: "laser/1",
        tagUid: "04a1b2c3d4e5f6",
        sessionId: "sess_1",
        userId: "user-ada",
        checkInTime: 1_710_235_800_000,
        checkOutTime: 1_710_235_860_000,
        checkoutReason: "uiRequested",
      },
    ],
  };

  beforeEach(() => {
    testDir = join(tmpdir(), `workshop-history-test-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    store = new FileUsageHistoryStore(join(testDir, "history"));
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true });
    }
  });

  it("should return null when nothing was saved", async () => {
    expect(await store.load("laser/1")).toBeNull();
  });

  it("should save and load a history", async () => {
    await store.save(history);

    expect(store.pathFor("laser/1")).toBe(join(testDir, "history", "laser%2F1.json"));
    expect(existsSync(store.pathFor("laser/1"))).toBe(true);
    expect(existsSync(`${store.pathFor("laser/1")}.tmp`)).toBe(false);
    expect(await store.load("laser/1")).toEqual(history);
  });

  it("should fail on a corrupted file", async () => {
    mkdirSync(join(testDir, "history"), { recursive: true });
    writeFileSync(store.pathFor("laser/1"), "[]");

    await expect(store.load("laser/1")).rejects.toThrow(/^Failed to load usage history from/);
  });
});
