/**
 * Backend - Main Application
 * Wires repositories, services and use cases. Usable as a library or
 * started as a standalone server.
 */

import { createLogger, type Clock, type RandomSource } from "@workshop-access/shared";

import { SessionRepository } from "./repository/session-repository.js";
import { TokenRepository } from "./repository/token-repository.js";
import { UsageRepository } from "./repository/usage-repository.js";
import { UserRepository } from "./repository/user-repository.js";
import { applySeed, type SeedData } from "./repository/seed.js";
import { KeyService } from "./service/key-service.js";
import { SessionService } from "./service/session-service.js";
import { TagVerificationService } from "./service/tag-verification-service.js";
import { UsageService } from "./service/usage-service.js";
import { TerminalUseCase } from "./usecase/terminal-usecase.js";

const logger = createLogger("backend");

export interface BackendOptions {
  masterKey: Uint8Array;
  systemName: string;
  /** Decrypts SUN PICC data; tag verification is off without it */
  sdmMetaReadKey?: Uint8Array;
  timezone?: string;
  clock?: Clock;
  random?: RandomSource;
  generateSessionId?: () => string;
  cleanupIntervalMs?: number;
}

export interface BackendStats {
  running: boolean;
  users: number;
  tokens: number;
  sessions: number;
  activeSessions: number;
  usageRecords: number;
}

export class Backend {
  // Repositories
  public readonly userRepo = new UserRepository();
  public readonly tokenRepo = new TokenRepository();
  private sessionRepo = new SessionRepository();
  private usageRepo = new UsageRepository();

  // Services
  public readonly keyService: KeyService;
  public readonly sessionService: SessionService;
  public readonly usageService: UsageService;
  public readonly tagVerificationService: TagVerificationService;

  // Use cases
  public readonly terminalUseCase: TerminalUseCase;

  private running = false;
  private cleanupInterval: NodeJS.Timeout | null = null;
  private readonly cleanupIntervalMs: number;

  constructor(options: BackendOptions) {
    this.keyService = new KeyService(options.masterKey, options.systemName);
    this.sessionService = new SessionService(
      this.sessionRepo,
      this.tokenRepo,
      this.userRepo,
      this.keyService,
      {
        timezone: options.timezone,
        clock: options.clock,
        random: options.random,
        generateSessionId: options.generateSessionId,
      },
    );
    this.usageService = new UsageService(this.usageRepo);
    this.tagVerificationService = new TagVerificationService(
      this.tokenRepo,
      this.userRepo,
      this.keyService,
      options.sdmMetaReadKey,
    );
    this.terminalUseCase = new TerminalUseCase(this.sessionService, this.usageService);
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? 60 * 1000;
  }

  seed(data: SeedData): void {
    applySeed(data, this.userRepo, this.tokenRepo);
    logger.info("Seed data loaded", { users: data.users.length, tokens: data.tokens.length });
  }

  async start(): Promise<void> {
    if (this.running) {
      throw new Error("Backend already running");
    }

    this.cleanupInterval = setInterval(() => {
      const removed = this.sessionService.cleanup();
      if (removed > 0) {
        logger.debug("Sessions cleaned up", { removed });
      }
    }, this.cleanupIntervalMs);

    this.running = true;
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.running = false;
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): BackendStats {
    return {
      running: this.running,
      users: this.userRepo.count(),
      tokens: this.tokenRepo.count(),
      sessions: this.sessionRepo.count(),
      activeSessions: this.sessionService.getActiveCount(),
      usageRecords: this.usageService.count(),
    };
  }
}
