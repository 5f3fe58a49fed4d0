/**
 * Configuration Manager for the terminal
 * Persists terminal identity and settings in a JSON config file
 */

import { randomUUID } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

import { z } from "zod";

import { toError } from "@workshop-access/shared";

export const terminalConfigSchema = z.object({
  terminalId: z.string().min(1),
  backendUrl: z.string().url(),
  transport: z.enum(["ws", "http"]),
  machineId: z.string().min(1),
  requiredPermissions: z.array(z.string().min(1)),
  keySlot: z.number().int().min(0).max(4),
  requestTimeoutMs: z.number().int().positive(),
  tickIntervalMs: z.number().int().positive(),
  historyDir: z.string().min(1),
  createdAt: z.string(),
});

export type TerminalPersistedConfig = z.infer<typeof terminalConfigSchema>;

export type TerminalConfigOverrides = Partial<Omit<TerminalPersistedConfig, "terminalId" | "createdAt">>;

const CONFIG_DIR = join(homedir(), ".workshop-terminal");
const CONFIG_FILE = join(CONFIG_DIR, "config.json");

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Loads the terminal config, creating it with defaults on first run.
 * BACKEND_URL overrides the stored backend URL without rewriting the file.
 */
export class ConfigManager {
  private config: TerminalPersistedConfig | null = null;

  constructor(
    private configPath: string = CONFIG_FILE,
    private configDir: string = CONFIG_DIR,
    private env: NodeJS.ProcessEnv = process.env,
  ) {}

  loadOrCreate(defaults: TerminalConfigOverrides = {}): TerminalPersistedConfig {
    if (this.config) {
      return this.config;
    }

    this.ensureConfigDir();
    const stored = existsSync(this.configPath) ? this.loadExisting() : this.createNew(defaults);

    this.config = this.env.BACKEND_URL
      ? this.validate({ ...stored, backendUrl: this.env.BACKEND_URL })
      : stored;
    return this.config;
  }

  getConfig(): TerminalPersistedConfig {
    if (!this.config) {
      throw new ConfigError("Config not loaded. Call loadOrCreate() first.");
    }
    return this.config;
  }

  /**
   * Terminal secret for the backend. Never written to the config file.
   */
  getTerminalToken(): string | undefined {
    return this.env.TERMINAL_TOKEN || undefined;
  }

  update(changes: TerminalConfigOverrides): TerminalPersistedConfig {
    const current = this.getConfig();
    this.config = this.validate({ ...current, ...definedOnly(changes) });
    this.save(this.config);
    return this.config;
  }

  private loadExisting(): TerminalPersistedConfig {
    let content: unknown;
    try {
      content = JSON.parse(readFileSync(this.configPath, "utf8"));
    } catch (error) {
      throw new ConfigError(`Failed to load config from ${this.configPath}: ${toError(error).message}`);
    }
    return this.validate(content);
  }

  private createNew(defaults: TerminalConfigOverrides): TerminalPersistedConfig {
    const config = this.validate({
      terminalId: `term_${randomUUID()}`,
      backendUrl: "http://localhost:3000",
      transport: "ws",
      machineId: "machine-1",
      requiredPermissions: [],
      keySlot: 2,
      requestTimeoutMs: 5000,
      tickIntervalMs: 100,
      historyDir: join(this.configDir, "history"),
      ...definedOnly(defaults),
      createdAt: new Date().toISOString(),
    });
    this.save(config);
    return config;
  }

  private save(config: TerminalPersistedConfig): void {
    try {
      writeFileSync(this.configPath, JSON.stringify(config, null, 2), { mode: 0o600 });
    } catch (error) {
      throw new ConfigError(`Failed to save config to ${this.configPath}: ${toError(error).message}`);
    }
  }

  private ensureConfigDir(): void {
    if (!existsSync(this.configDir)) {
      mkdirSync(this.configDir, { recursive: true, mode: 0o700 });
    }
  }

  private validate(value: unknown): TerminalPersistedConfig {
    const parsed = terminalConfigSchema.safeParse(value);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new ConfigError(`Invalid config: ${issues}`);
    }
    return parsed.data;
  }
}

function definedOnly(values: TerminalConfigOverrides): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));
}
