/**
 * Machine Relay
 * Power latch for the machine. Implementations verify the latch after switching.
 */

import { createLogger } from "@workshop-access/shared";

const logger = createLogger("terminal:relay");

export class RelayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RelayError";
  }
}

export interface MachineRelay {
  isEnabled(): Promise<boolean>;
  /** Rejects with RelayError when the latch does not read back as enabled. */
  enable(): Promise<void>;
  /** Rejects with RelayError when the latch does not read back as disabled. */
  disable(): Promise<void>;
}

/**
 * In-process relay for tests and `--simulate`. A stuck latch ignores switching
 * and fails the read-back check.
 */
export class SimulatedRelay implements MachineRelay {
  private enabled: boolean;
  private stuck = false;
  switchCount = 0;

  constructor(initiallyEnabled = false) {
    this.enabled = initiallyEnabled;
  }

  setStuck(stuck: boolean): void {
    this.stuck = stuck;
  }

  async isEnabled(): Promise<boolean> {
    return this.enabled;
  }

  async enable(): Promise<void> {
    await this.switchTo(true);
  }

  async disable(): Promise<void> {
    await this.switchTo(false);
  }

  private async switchTo(target: boolean): Promise<void> {
    this.switchCount += 1;
    if (!this.stuck) {
      this.enabled = target;
    }
    if (this.enabled !== target) {
      throw new RelayError(`Relay did not ${target ? "enable" : "disable"}`);
    }
    logger.debug("Relay switched", { enabled: this.enabled });
  }
}
