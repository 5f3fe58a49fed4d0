/**
 * Tag REST Routes
 * POST /tags/verify checks a SUN message from a tag tap. The tag's MAC is the
 * credential, so no bearer token is asked for.
 */

import { Hono } from "hono";

import { verifyTagRequestSchema } from "@workshop-access/shared";

import type { TagVerificationService } from "../../service/tag-verification-service.js";
import { BackendError } from "../../shared/errors.js";
import { statusFor } from "./terminal-routes.js";

export function createTagRoutes(tagVerificationService: TagVerificationService): Hono {
  const app = new Hono();

  app.post("/tags/verify", async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const request = verifyTagRequestSchema.safeParse(body);
    if (!request.success) {
      return c.json({ error: { code: "BAD_REQUEST", message: "Expected picc (16 bytes hex) and cmac (8 bytes hex)" } }, 400);
    }

    try {
      return c.json(tagVerificationService.verify(request.data), 200);
    } catch (error) {
      if (error instanceof BackendError) {
        return c.json({ error: { code: error.code, message: error.message } }, statusFor(error.code));
      }
      throw error;
    }
  });

  return app;
}
