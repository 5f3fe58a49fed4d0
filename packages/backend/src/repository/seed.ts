/**
 * Seed data loader
 * Fills the user and token repositories from a JSON file
 */

import { readFileSync } from "node:fs";

import { z } from "zod";

import { hexBytes } from "@workshop-access/shared";

import type { TokenRepository } from "./token-repository.js";
import type { UserRepository } from "./user-repository.js";

export const seedSchema = z.object({
  users: z.array(
    z.object({
      userId: z.string().min(1),
      label: z.string(),
      permissions: z.array(z.string()).default([]),
    }),
  ),
  tokens: z.array(
    z.object({
      tagUid: hexBytes(7),
      userId: z.string().min(1),
      label: z.string().optional(),
      deactivated: z.boolean().default(false),
    }),
  ),
});

export type SeedData = z.infer<typeof seedSchema>;

export function applySeed(seed: SeedData, users: UserRepository, tokens: TokenRepository): void {
  for (const user of seed.users) {
    users.upsert(user);
  }
  for (const token of seed.tokens) {
    if (!users.get(token.userId)) {
      throw new Error(`Token ${token.tagUid} refers to unknown user ${token.userId}`);
    }
    tokens.upsert(token);
  }
}

export function loadSeedFile(path: string): SeedData {
  return seedSchema.parse(JSON.parse(readFileSync(path, "utf8")));
}
