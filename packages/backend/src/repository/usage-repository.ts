/**
 * Usage Repository
 * Uploaded usage records per machine. A record is identified by machine,
 * session and check-in time, so re-uploads do not duplicate it.
 */

import type { UsageHistoryRecord } from "@workshop-access/shared";

export class UsageRepository {
  private records = new Map<string, UsageHistoryRecord>();

  private keyOf(record: UsageHistoryRecord): string {
    return `${record.machineId}|${record.sessionId}|${record.checkInTime}`;
  }

  /**
   * Store or replace a record. Returns true when it was not known before.
   */
  put(record: UsageHistoryRecord): boolean {
    const key = this.keyOf(record);
    const isNew = !this.records.has(key);
    this.records.set(key, { ...record });
    return isNew;
  }

  listByMachine(machineId: string): UsageHistoryRecord[] {
    return Array.from(this.records.values())
      .filter((r) => r.machineId === machineId)
      .sort((a, b) => a.checkInTime - b.checkInTime);
  }

  count(): number {
    return this.records.size;
  }
}
