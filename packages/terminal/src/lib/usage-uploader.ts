/**
 * Usage Uploader
 * Sends closed usage records to the backend through the request broker.
 */

import { uploadUsageResponseSchema, type UsageHistory } from "@workshop-access/shared";

import type { RequestBroker } from "./request-broker.js";

export interface UsageUploader {
  /**
   * Resolves with the number of records the backend accepted.
   */
  upload(history: UsageHistory): Promise<number>;
}

export class BrokerUsageUploader implements UsageUploader {
  constructor(
    private broker: RequestBroker,
    private timeoutMs = 10_000,
  ) {}

  async upload(history: UsageHistory): Promise<number> {
    const response = await this.broker.request("uploadUsage", { history }, this.timeoutMs);
    return uploadUsageResponseSchema.parse(response).accepted;
  }
}
