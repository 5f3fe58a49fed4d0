/**
 * Usage History Store
 * Durable per-machine usage records, written before any upload is attempted.
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { toError, usageHistorySchema, type UsageHistory } from "@workshop-access/shared";

export interface UsageHistoryStore {
  load(machineId: string): Promise<UsageHistory | null>;
  save(history: UsageHistory): Promise<void>;
}

/**
 * One JSON file per machine. Writes go to a temporary file first and are
 * renamed into place.
 */
export class FileUsageHistoryStore implements UsageHistoryStore {
  constructor(private directory: string) {}

  pathFor(machineId: string): string {
    return join(this.directory, `${encodeURIComponent(machineId)}.json`);
  }

  async load(machineId: string): Promise<UsageHistory | null> {
    let content: string;
    try {
      content = await readFile(this.pathFor(machineId), "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    try {
      return usageHistorySchema.parse(JSON.parse(content));
    } catch (error) {
      throw new Error(
        `Failed to load usage history from ${this.pathFor(machineId)}: ${toError(error).message}`,
      );
    }
  }

  async save(history: UsageHistory): Promise<void> {
    await mkdir(this.directory, { recursive: true, mode: 0o700 });
    const target = this.pathFor(history.machineId);
    const temporary = `${target}.tmp`;
    await writeFile(temporary, JSON.stringify(history, null, 2), { mode: 0o600 });
    await rename(temporary, target);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
