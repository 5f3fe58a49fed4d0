/**
 * Backend configuration from environment variables
 */

import { z } from "zod";

import {
  AES_KEY_SIZE,
  isLogLevel,
  KEY_ID_LENGTH,
  MAX_DIVERSIFICATION_INPUT,
  parseFixedHex,
  TAG_UID_LENGTH,
  toError,
  toUtf8,
  type LogLevel,
} from "@workshop-access/shared";

import { DEFAULT_SESSION_TIMEZONE, isValidTimezone } from "./shared/session-expiration.js";

/** UID and key id fill the rest of the diversification input */
export const MAX_SYSTEM_NAME_BYTES = MAX_DIVERSIFICATION_INPUT - TAG_UID_LENGTH - KEY_ID_LENGTH;

export interface BackendConfig {
  port: number;
  host: string;
  masterKey: Uint8Array;
  systemName: string;
  sdmMetaReadKey?: Uint8Array;
  timezone: string;
  /** Required from terminals as a bearer token when set */
  terminalToken?: string;
  seedFile?: string;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  MASTER_KEY: z.string({ required_error: "MASTER_KEY is required" }),
  SYSTEM_NAME: z
    .string()
    .min(1)
    .default("workshop")
    .refine((name) => toUtf8(name).length <= MAX_SYSTEM_NAME_BYTES, {
      message: `SYSTEM_NAME must be at most ${MAX_SYSTEM_NAME_BYTES} bytes`,
    }),
  SDM_META_READ_KEY: z.string().optional(),
  SESSION_TIMEZONE: z
    .string()
    .default(DEFAULT_SESSION_TIMEZONE)
    .refine(isValidTimezone, { message: "SESSION_TIMEZONE is not a known time zone" }),
  TERMINAL_TOKEN: z.string().min(1).optional(),
  SEED_FILE: z.string().min(1).optional(),
  LOG_LEVEL: z.string().default("info").refine(isLogLevel, { message: "LOG_LEVEL is invalid" }),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BackendConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`);
  }
  const parsed = result.data;

  let masterKey: Uint8Array;
  let sdmMetaReadKey: Uint8Array | undefined;
  try {
    masterKey = parseFixedHex(parsed.MASTER_KEY, AES_KEY_SIZE, "MASTER_KEY");
    if (parsed.SDM_META_READ_KEY !== undefined) {
      sdmMetaReadKey = parseFixedHex(parsed.SDM_META_READ_KEY, AES_KEY_SIZE, "SDM_META_READ_KEY");
    }
  } catch (error) {
    throw new ConfigError(toError(error).message);
  }

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    masterKey,
    systemName: parsed.SYSTEM_NAME,
    sdmMetaReadKey,
    timezone: parsed.SESSION_TIMEZONE,
    terminalToken: parsed.TERMINAL_TOKEN,
    seedFile: parsed.SEED_FILE,
    logLevel: parsed.LOG_LEVEL,
  };
}
