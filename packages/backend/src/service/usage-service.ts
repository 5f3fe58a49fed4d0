/**
 * Usage Service
 * Accepts machine usage history uploaded by terminals
 */

import {
  createLogger,
  type UploadUsageRequest,
  type UploadUsageResponse,
  type UsageHistoryRecord,
} from "@workshop-access/shared";

import type { UsageRepository } from "../repository/usage-repository.js";
import { BackendError } from "../shared/errors.js";

const logger = createLogger("backend:usage-service");

export class UsageService {
  constructor(private usageRepo: UsageRepository) {}

  /**
   * Store every record of the upload. Records already known are replaced,
   * so a terminal may resend after a lost response.
   */
  upload(request: UploadUsageRequest): UploadUsageResponse {
    const { machineId, records } = request.history;
    const foreign = records.find((r) => r.machineId !== machineId);
    if (foreign) {
      throw new BackendError(
        "BAD_REQUEST",
        `Record for machine ${foreign.machineId} in history of ${machineId}`,
      );
    }

    let added = 0;
    for (const record of records) {
      if (this.usageRepo.put(record)) {
        added++;
      }
    }
    logger.info("Usage uploaded", { machineId, records: records.length, added });
    return { accepted: records.length };
  }

  listByMachine(machineId: string): UsageHistoryRecord[] {
    return this.usageRepo.listByMachine(machineId);
  }

  count(): number {
    return this.usageRepo.count();
  }
}
